import { Injectable, Logger } from '@nestjs/common';
import { PDFDocument } from 'pdf-lib';
import { pdfToPng } from 'pdf-to-png-converter';
import { debugLog } from '../../common/debug-logger';
import { errorMessage, SourceUnavailableError } from '../../common/errors';
import { PageImage, PdfRasterizer } from './pdf-content.interface';

/**
 * Renders PDF pages to PNG one page at a time, so that one broken page does
 * not cost the others.
 */
@Injectable()
export class PngPageRasterizer implements PdfRasterizer {
  private readonly logger = new Logger(PngPageRasterizer.name);

  async rasterize(pdf: Buffer, dpi: number, pageNumbers?: number[]): Promise<PageImage[]> {
    const pages = pageNumbers ?? (await this.allPages(pdf));
    const data = new Uint8Array(pdf).buffer;
    const images: PageImage[] = [];

    for (const pageNumber of pages) {
      try {
        const [output] = await pdfToPng(data, { viewportScale: dpi / 72, pagesToProcess: [pageNumber] });
        if (!output?.content) {
          this.logger.warn(`Page ${pageNumber} rendered no image`);
          continue;
        }
        images.push({ pageNumber, png: output.content, width: output.width, height: output.height });
      } catch (error) {
        this.logger.warn(`Skipping page ${pageNumber}: rasterization failed: ${errorMessage(error)}`);
      }
    }

    debugLog(`Rasterized ${images.length}/${pages.length} pages at ${dpi} dpi`);
    return images;
  }

  private async allPages(pdf: Buffer): Promise<number[]> {
    try {
      const document = await PDFDocument.load(pdf, { ignoreEncryption: true });
      return Array.from({ length: document.getPageCount() }, (_, index) => index + 1);
    } catch (error) {
      throw new SourceUnavailableError(`Unable to open PDF: ${errorMessage(error)}`, { cause: error });
    }
  }
}
