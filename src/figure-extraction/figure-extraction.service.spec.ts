import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FetchError } from '../common/errors';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { FirebaseStorageService } from '../storage/storage.service';
import { FAILED_RUN_CACHED, FIGURE_EXTRACTORS, FigureExtractionService } from './figure-extraction.service';
import { FigurePublisher } from './figure-publisher.service';
import { FigureStorageLayout } from './figure-storage-layout';
import { createFigureRecord, FigureRegistry, PaperSource } from './interfaces/figure.interface';
import { FigureMetadataStore } from './metadata/figure-metadata.store';

const PAPER_ID = '2301.00003';
const IMAGE = Buffer.from('png-bytes');

function figureRegistry(outputDir: string): FigureRegistry {
  return { fig1: createFigureRecord('fig1', 'Overview', path.join(outputDir, 'fig1.png')) };
}

async function writeFigure(outputDir: string): Promise<FigureRegistry> {
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(path.join(outputDir, 'fig1.png'), IMAGE);
  return figureRegistry(outputDir);
}

describe('FigureExtractionService', () => {
  let service: FigureExtractionService;
  let dataDir: string;
  let outputDir: string;
  let htmlExtractor: { method: 'html'; canExtract: jest.Mock; extract: jest.Mock };
  let pdfExtractor: { method: 'pdf'; canExtract: jest.Mock; extract: jest.Mock };
  let publisher: { isEnabled: jest.Mock; publishRegistry: jest.Mock };
  let storageService: { deleteFolderContents: jest.Mock };
  let paperFigureRepository: { isEnabled: jest.Mock; findByPaper: jest.Mock; deleteByPaper: jest.Mock };
  const source: PaperSource = { paperId: PAPER_ID, html: '<html></html>', pdf: Buffer.from('%PDF') };

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'figures-data-'));
    outputDir = path.join(dataDir, PAPER_ID, 'figures');

    htmlExtractor = {
      method: 'html',
      canExtract: jest.fn().mockReturnValue(true),
      extract: jest.fn((_source: PaperSource, dir: string) => writeFigure(dir)),
    };
    pdfExtractor = {
      method: 'pdf',
      canExtract: jest.fn().mockReturnValue(true),
      extract: jest.fn().mockResolvedValue({}),
    };
    publisher = {
      isEnabled: jest.fn().mockReturnValue(false),
      publishRegistry: jest.fn(),
    };
    storageService = { deleteFolderContents: jest.fn().mockResolvedValue(2) };
    paperFigureRepository = {
      isEnabled: jest.fn().mockReturnValue(false),
      findByPaper: jest.fn().mockResolvedValue([]),
      deleteByPaper: jest.fn().mockResolvedValue(3),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FigureExtractionService,
        FigureMetadataStore,
        FigureStorageLayout,
        { provide: ConfigService, useValue: { get: jest.fn((key: string, fallback?: unknown) => (key === 'FIGURES_DATA_DIR' ? dataDir : fallback)) } },
        { provide: FIGURE_EXTRACTORS, useValue: [htmlExtractor, pdfExtractor] },
        { provide: FigurePublisher, useValue: publisher },
        { provide: FirebaseStorageService, useValue: storageService },
        { provide: PaperFigureRepository, useValue: paperFigureRepository },
      ],
    }).compile();

    service = module.get<FigureExtractionService>(FigureExtractionService);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('should extract from HTML and write the sidecar', async () => {
    const result = await service.extractFigures(source);

    expect(result).toEqual({
      paperId: PAPER_ID,
      registry: figureRegistry(outputDir),
      totalFound: 1,
      extractionMethod: 'html',
      status: 'done',
    });
    expect(pdfExtractor.extract).not.toHaveBeenCalled();
    const sidecar: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'figures_metadata.json'), 'utf-8'));
    expect(sidecar).toEqual({
      fig1: {
        id: 'fig1',
        caption: 'Overview',
        type: 'figure',
        has_subfigures: false,
        subfigures: [],
        content: null,
        path: 'fig1.png',
      },
    });
  });

  it('should reuse the cached registry without extracting again', async () => {
    await service.extractFigures(source);
    paperFigureRepository.isEnabled.mockReturnValue(true);
    paperFigureRepository.findByPaper.mockResolvedValue([
      { figureId: 'fig1', caption: 'Overview', type: 'figure', remoteUrl: 'https://storage.example/fig1.png', updatedAt: null },
    ]);

    const result = await service.extractFigures(source);

    expect(htmlExtractor.extract).toHaveBeenCalledTimes(1);
    expect(result.extractionMethod).toBe('cache');
    expect(result.status).toBe('done');
    expect(result.registry.fig1.remotePath).toBe('https://storage.example/fig1.png');
    expect(result.registry.fig1.localPath).toBe(path.join(outputDir, 'fig1.png'));
  });

  it('should fall back to the PDF when the HTML page is unavailable', async () => {
    htmlExtractor.extract.mockRejectedValue(new FetchError('https://ar5iv.example/html/x', 3));
    pdfExtractor.extract.mockImplementation((_source: PaperSource, dir: string) => writeFigure(dir));

    const result = await service.extractFigures(source);

    expect(result.extractionMethod).toBe('pdf');
    expect(result.status).toBe('done');
    expect(result.errors).toEqual(['html: Failed to fetch https://ar5iv.example/html/x after 3 attempt(s)']);
  });

  it('should skip extractors that cannot read the source', async () => {
    htmlExtractor.canExtract.mockReturnValue(false);
    pdfExtractor.extract.mockImplementation((_source: PaperSource, dir: string) => writeFigure(dir));

    const result = await service.extractFigures({ paperId: PAPER_ID, pdf: Buffer.from('%PDF') });

    expect(htmlExtractor.extract).not.toHaveBeenCalled();
    expect(result.extractionMethod).toBe('pdf');
  });

  it('should cache a failed run until forced', async () => {
    htmlExtractor.extract.mockResolvedValue({});

    const failed = await service.extractFigures(source);
    expect(failed).toEqual({
      paperId: PAPER_ID,
      registry: {},
      totalFound: 0,
      extractionMethod: 'none',
      status: 'failed',
      errors: ['html: no figures found', 'pdf: no figures found'],
    });

    const cached = await service.extractFigures(source);
    expect(cached).toEqual({
      paperId: PAPER_ID,
      registry: {},
      totalFound: 0,
      extractionMethod: 'cache',
      status: 'failed',
      errors: [FAILED_RUN_CACHED],
    });
    expect(htmlExtractor.extract).toHaveBeenCalledTimes(1);

    htmlExtractor.extract.mockImplementation((_source: PaperSource, dir: string) => writeFigure(dir));
    const forced = await service.extractFigures(source, { force: true });
    expect(forced.extractionMethod).toBe('html');
    expect(forced.totalFound).toBe(1);
  });

  it('should replace old artifacts on a forced run', async () => {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(path.join(outputDir, 'fig9.png'), IMAGE);
    await fs.writeFile(path.join(outputDir, 'figures.json'), '{}');

    await service.extractFigures(source, { force: true });

    expect((await fs.readdir(outputDir)).sort()).toEqual(['fig1.png', 'figures_metadata.json']);
  });

  it('should publish the registry when storage is enabled', async () => {
    publisher.isEnabled.mockReturnValue(true);
    const published = {
      fig1: { ...figureRegistry(outputDir).fig1, remotePath: 'https://storage.example/fig1.png' },
    };
    publisher.publishRegistry.mockResolvedValue({ registry: published, uploaded: ['fig1'], failed: [] });

    const result = await service.extractFigures(source);

    expect(publisher.publishRegistry).toHaveBeenCalledWith(PAPER_ID, figureRegistry(outputDir), outputDir);
    expect(result.registry).toEqual(published);
    expect(result.errors).toBeUndefined();
  });

  it('should report failed uploads without failing the run', async () => {
    publisher.isEnabled.mockReturnValue(true);
    publisher.publishRegistry.mockResolvedValue({ registry: figureRegistry(outputDir), uploaded: [], failed: ['fig1'] });

    const result = await service.extractFigures(source);

    expect(result.status).toBe('done');
    expect(result.errors).toEqual(['upload: fig1 failed']);
  });

  it('should not publish when upload is off', async () => {
    publisher.isEnabled.mockReturnValue(true);

    await service.extractFigures(source, { upload: false });

    expect(publisher.publishRegistry).not.toHaveBeenCalled();
  });

  it('should clear local and remote state', async () => {
    await service.extractFigures(source);

    const result = await service.clearFigureCache(PAPER_ID);

    expect(result).toEqual({ paperId: PAPER_ID, localRemoved: true, remoteObjectsDeleted: 2, remoteRecordsDeleted: 3 });
    expect(storageService.deleteFolderContents).toHaveBeenCalledWith(`figures/${PAPER_ID}`);
    expect(await service.getRegistry(PAPER_ID)).toEqual({});
  });
});
