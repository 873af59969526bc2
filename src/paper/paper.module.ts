import { Module } from '@nestjs/common';
import { ArxivModule } from '../arxiv/arxiv.module';
import { FigureExtractionModule } from '../figure-extraction/figure-extraction.module';
import { FigureResolverModule } from '../figure-resolver/figure-resolver.module';
import { PaperController } from './paper.controller';

@Module({
  imports: [ArxivModule, FigureExtractionModule, FigureResolverModule],
  controllers: [PaperController],
})
export class PaperModule {}
