import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArxivService } from '../arxiv/arxiv.service';
import { FigureExtractionService } from '../figure-extraction/figure-extraction.service';
import { createFigureRecord, FigureRegistry } from '../figure-extraction/interfaces/figure.interface';
import { FigureReferenceResolver } from '../figure-resolver/figure-reference.resolver';
import { ResolvedFigure } from '../figure-resolver/interfaces/resolved-figure.interface';
import { PaperController } from './paper.controller';

const REGISTRY: FigureRegistry = {
  fig1: createFigureRecord('fig1', 'Overview', '/data/2301.00003/figures/fig1.png'),
};

const RESOLVED: ResolvedFigure = {
  id: 'fig1',
  displayId: '1',
  type: 'figure',
  caption: 'Overview',
  url: '/static/papers/2301.00003/figures/fig1.png',
};

describe('PaperController', () => {
  let controller: PaperController;
  let figureExtractionService: { getRegistry: jest.Mock };
  let figureReferenceResolver: {
    resolve: jest.Mock;
    resolveAll: jest.Mock;
    resolveThumbnail: jest.Mock;
    substitutePlaceholders: jest.Mock;
  };

  beforeEach(async () => {
    figureExtractionService = { getRegistry: jest.fn().mockResolvedValue(REGISTRY) };
    figureReferenceResolver = {
      resolve: jest.fn().mockResolvedValue(RESOLVED),
      resolveAll: jest.fn().mockResolvedValue([RESOLVED]),
      resolveThumbnail: jest.fn().mockResolvedValue(RESOLVED),
      substitutePlaceholders: jest.fn().mockResolvedValue('See Figure 1'),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [PaperController],
      providers: [
        ArxivService,
        { provide: ConfigService, useValue: { get: jest.fn((_key: string, fallback?: unknown) => fallback) } },
        { provide: FigureExtractionService, useValue: figureExtractionService },
        { provide: FigureReferenceResolver, useValue: figureReferenceResolver },
      ],
    }).compile();

    controller = module.get<PaperController>(PaperController);
  });

  it('should list resolved figures of a paper', async () => {
    expect(await controller.listFigures('2301.00003')).toEqual([RESOLVED]);
    expect(figureReferenceResolver.resolveAll).toHaveBeenCalledWith('2301.00003', REGISTRY);
  });

  it('should normalize loose figure ids before resolving', async () => {
    await controller.getFigure('2301.00003', 'fig2_a');

    expect(figureReferenceResolver.resolve).toHaveBeenCalledWith('2301.00003', '2.a', REGISTRY);
  });

  it('should answer 404 for a figure id without a number', async () => {
    await expect(controller.getFigure('2301.00003', 'overview')).rejects.toThrow(NotFoundException);
    expect(figureReferenceResolver.resolve).not.toHaveBeenCalled();
  });

  it('should reject an invalid paper id', async () => {
    await expect(controller.listFigures('not a paper')).rejects.toThrow(BadRequestException);
    expect(figureExtractionService.getRegistry).not.toHaveBeenCalled();
  });

  it('should pass the requested thumbnail figure through', async () => {
    await controller.getThumbnail('2301.00003', 'figure1');

    expect(figureReferenceResolver.resolveThumbnail).toHaveBeenCalledWith('2301.00003', '1', REGISTRY);
  });

  it('should answer 404 when a paper has no thumbnail', async () => {
    figureReferenceResolver.resolveThumbnail.mockResolvedValue(null);

    await expect(controller.getThumbnail('2301.00003')).rejects.toThrow(NotFoundException);
  });

  it('should substitute figure placeholders in posted text', async () => {
    expect(await controller.renderMarkdown('2301.00003', 'See <FIGURE_ID>1</FIGURE_ID>')).toEqual({
      markdown: 'See Figure 1',
    });
    expect(figureReferenceResolver.substitutePlaceholders).toHaveBeenCalledWith(
      '2301.00003',
      'See <FIGURE_ID>1</FIGURE_ID>',
      REGISTRY,
    );
  });

  it('should reject a markdown request without text', async () => {
    await expect(controller.renderMarkdown('2301.00003', undefined)).rejects.toThrow(BadRequestException);
  });
});
