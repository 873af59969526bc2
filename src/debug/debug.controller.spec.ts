import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArxivService } from '../arxiv/arxiv.service';
import { FigureExtractionService } from '../figure-extraction/figure-extraction.service';
import { FigureSyncService } from '../figure-extraction/figure-sync.service';
import { DebugController } from './debug.controller';

describe('DebugController', () => {
  let controller: DebugController;
  let figureExtractionService: { extractFigures: jest.Mock; clearFigureCache: jest.Mock };
  let figureSyncService: { syncPaper: jest.Mock };

  beforeEach(async () => {
    figureExtractionService = {
      extractFigures: jest.fn().mockResolvedValue({ paperId: '2301.00003', registry: {}, totalFound: 0 }),
      clearFigureCache: jest.fn().mockResolvedValue({ paperId: '2301.00003' }),
    };
    figureSyncService = { syncPaper: jest.fn().mockResolvedValue({ paperId: '2301.00003' }) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DebugController],
      providers: [
        ArxivService,
        { provide: ConfigService, useValue: { get: jest.fn((_key: string, fallback?: unknown) => fallback) } },
        { provide: FigureExtractionService, useValue: figureExtractionService },
        { provide: FigureSyncService, useValue: figureSyncService },
      ],
    }).compile();

    controller = module.get<DebugController>(DebugController);
  });

  it('should force extraction from the ar5iv page and the PDF', async () => {
    await controller.forceExtractFigures('2301.00003');

    expect(figureExtractionService.extractFigures).toHaveBeenCalledWith(
      {
        paperId: '2301.00003',
        htmlUrl: 'https://ar5iv.labs.arxiv.org/html/2301.00003',
        baseUrl: 'https://ar5iv.labs.arxiv.org/html/2301.00003/',
        pdfUrl: 'https://arxiv.org/pdf/2301.00003.pdf',
      },
      { force: true, upload: true },
    );
  });

  it('should skip the upload when asked', async () => {
    await controller.forceExtractFigures('2301.00003', 'false');

    expect(figureExtractionService.extractFigures).toHaveBeenCalledWith(expect.anything(), {
      force: true,
      upload: false,
    });
  });

  it('should sync and clear by paper id', async () => {
    await controller.syncFigures('https://arxiv.org/abs/2301.00003');
    await controller.clearFigureCache('2301.00003');

    expect(figureSyncService.syncPaper).toHaveBeenCalledWith('2301.00003');
    expect(figureExtractionService.clearFigureCache).toHaveBeenCalledWith('2301.00003');
  });

  it('should reject an invalid arXiv id', async () => {
    await expect(controller.clearFigureCache('nope')).rejects.toThrow(BadRequestException);
  });

  it('should not clear or extract for a URL pointing outside a paper', async () => {
    await expect(controller.clearFigureCache('https://arxiv.org/abs/..')).rejects.toThrow(BadRequestException);
    await expect(controller.forceExtractFigures('https://arxiv.org/abs/.')).rejects.toThrow(BadRequestException);
    expect(figureExtractionService.clearFigureCache).not.toHaveBeenCalled();
    expect(figureExtractionService.extractFigures).not.toHaveBeenCalled();
  });
});
