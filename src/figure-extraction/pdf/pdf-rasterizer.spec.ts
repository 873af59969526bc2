import { PDFDocument } from 'pdf-lib';
import { pdfToPng } from 'pdf-to-png-converter';
import { SourceUnavailableError } from '../../common/errors';
import { PngPageRasterizer } from './pdf-rasterizer';

jest.mock('pdf-to-png-converter', () => ({ pdfToPng: jest.fn() }));

const mockedPdfToPng = pdfToPng as unknown as jest.Mock;

async function threePagePdf(): Promise<Buffer> {
  const document = await PDFDocument.create();
  for (let index = 0; index < 3; index++) {
    document.addPage([612, 792]);
  }
  return Buffer.from(await document.save());
}

describe('PngPageRasterizer', () => {
  const rasterizer = new PngPageRasterizer();

  beforeEach(() => {
    mockedPdfToPng.mockReset();
  });

  it('should render every page at the requested scale and skip failures', async () => {
    mockedPdfToPng.mockImplementation(async (_data: ArrayBuffer, options: { pagesToProcess: number[] }) => {
      const [pageNumber] = options.pagesToProcess;
      if (pageNumber === 2) {
        throw new Error('bad page');
      }
      return [
        {
          pageNumber,
          name: `page_${pageNumber}.png`,
          content: Buffer.from(`png-${pageNumber}`),
          path: '',
          width: 1275,
          height: 1650,
        },
      ];
    });

    const pages = await rasterizer.rasterize(await threePagePdf(), 144);

    expect(pages.map((page) => [page.pageNumber, page.png.toString()])).toEqual([
      [1, 'png-1'],
      [3, 'png-3'],
    ]);
    expect(mockedPdfToPng).toHaveBeenCalledTimes(3);
    expect(mockedPdfToPng.mock.calls[0][1]).toEqual({ viewportScale: 2, pagesToProcess: [1] });
  });

  it('should render only the requested pages', async () => {
    mockedPdfToPng.mockResolvedValue([]);

    expect(await rasterizer.rasterize(Buffer.from('unused'), 300, [4])).toEqual([]);
    expect(mockedPdfToPng).toHaveBeenCalledWith(expect.any(ArrayBuffer), { viewportScale: 300 / 72, pagesToProcess: [4] });
  });

  it('should reject a document that cannot be opened', async () => {
    await expect(rasterizer.rasterize(Buffer.from('not a pdf'), 300)).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(mockedPdfToPng).not.toHaveBeenCalled();
  });
});
