import { BadRequestException, Body, Controller, Get, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { ArxivService } from '../arxiv/arxiv.service';
import { errorMessage } from '../common/errors';
import { FigureExtractionService } from '../figure-extraction/figure-extraction.service';
import { toDisplayId } from '../figure-extraction/identifiers/figure-id';
import { FigureReferenceResolver } from '../figure-resolver/figure-reference.resolver';
import { ResolvedFigure } from '../figure-resolver/interfaces/resolved-figure.interface';

@Controller('api')
export class PaperController {
  constructor(
    private readonly arxivService: ArxivService,
    private readonly figureExtractionService: FigureExtractionService,
    private readonly figureReferenceResolver: FigureReferenceResolver,
  ) {}

  @Get('papers/:paperId/figures')
  async listFigures(@Param('paperId') paperId: string): Promise<ResolvedFigure[]> {
    const id = this.toPaperId(paperId);
    const registry = await this.figureExtractionService.getRegistry(id);
    return this.figureReferenceResolver.resolveAll(id, registry);
  }

  /**
   * `figureId` may be `3`, `3.a`, `fig3_a` or `figure3`. Unknown figures still
   * answer 200 with a generic caption; only ids without a number are 404.
   */
  @Get('papers/:paperId/figures/:figureId')
  async getFigure(@Param('paperId') paperId: string, @Param('figureId') figureId: string): Promise<ResolvedFigure> {
    const id = this.toPaperId(paperId);
    const displayId = toDisplayId(figureId);
    if (!displayId) {
      throw new NotFoundException(`Figure ${figureId} not found`);
    }
    const registry = await this.figureExtractionService.getRegistry(id);
    return this.figureReferenceResolver.resolve(id, displayId, registry);
  }

  @Get('papers/:paperId/thumbnail')
  async getThumbnail(@Param('paperId') paperId: string, @Query('figure') figure?: string): Promise<ResolvedFigure> {
    const id = this.toPaperId(paperId);
    const registry = await this.figureExtractionService.getRegistry(id);
    const thumbnail = await this.figureReferenceResolver.resolveThumbnail(id, toDisplayId(figure), registry);
    if (!thumbnail) {
      throw new NotFoundException(`No thumbnail available for paper ${id}`);
    }
    return thumbnail;
  }

  @Post('papers/:paperId/markdown')
  async renderMarkdown(@Param('paperId') paperId: string, @Body('text') text: unknown): Promise<{ markdown: string }> {
    const id = this.toPaperId(paperId);
    if (typeof text !== 'string') {
      throw new BadRequestException('text must be a string');
    }
    const registry = await this.figureExtractionService.getRegistry(id);
    return { markdown: await this.figureReferenceResolver.substitutePlaceholders(id, text, registry) };
  }

  private toPaperId(input: string): string {
    try {
      return this.arxivService.extractArxivId(input);
    } catch (error) {
      throw new BadRequestException(errorMessage(error));
    }
  }
}
