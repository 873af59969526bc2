import { Module } from '@nestjs/common';
import { DebugController } from './debug.controller';
import { ArxivModule } from '../arxiv/arxiv.module';
import { FigureExtractionModule } from '../figure-extraction/figure-extraction.module';

@Module({
  imports: [ArxivModule, FigureExtractionModule],
  controllers: [DebugController],
})
export class DebugModule {}
