import { BadRequestException, Controller, Delete, Param, Post, Query } from '@nestjs/common';
import { ArxivService } from '../arxiv/arxiv.service';
import { errorMessage } from '../common/errors';
import { FigureExtractionService } from '../figure-extraction/figure-extraction.service';
import { FigureSyncService } from '../figure-extraction/figure-sync.service';
import {
  FigureCacheClearResult,
  FigureExtractionResult,
  FigureSyncResult,
} from '../figure-extraction/interfaces/figure.interface';

@Controller('debug')
export class DebugController {
  constructor(
    private readonly arxivService: ArxivService,
    private readonly figureExtractionService: FigureExtractionService,
    private readonly figureSyncService: FigureSyncService,
  ) {}

  /**
   * Force re-extract figures for a paper
   */
  @Post('figures/:arxivId/extract')
  async forceExtractFigures(
    @Param('arxivId') arxivId: string,
    @Query('upload') upload?: string,
  ): Promise<FigureExtractionResult> {
    const source = this.paperSource(arxivId);
    return this.figureExtractionService.extractFigures(source, { force: true, upload: upload !== 'false' });
  }

  /**
   * Upload local figures missing from remote storage
   */
  @Post('figures/:arxivId/sync')
  async syncFigures(@Param('arxivId') arxivId: string): Promise<FigureSyncResult> {
    return this.figureSyncService.syncPaper(this.paperSource(arxivId).paperId);
  }

  /**
   * Clear figure cache for a specific ArXiv paper
   */
  @Delete('figures/:arxivId')
  async clearFigureCache(@Param('arxivId') arxivId: string): Promise<FigureCacheClearResult> {
    return this.figureExtractionService.clearFigureCache(this.paperSource(arxivId).paperId);
  }

  private paperSource(arxivId: string) {
    try {
      return this.arxivService.buildPaperSource(arxivId);
    } catch (error) {
      throw new BadRequestException(errorMessage(error));
    }
  }
}
