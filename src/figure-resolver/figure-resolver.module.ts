import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { FigureExtractionModule } from '../figure-extraction/figure-extraction.module';
import { FigureReferenceResolver } from './figure-reference.resolver';

@Module({
  imports: [FigureExtractionModule, DataModule],
  providers: [FigureReferenceResolver],
  exports: [FigureReferenceResolver],
})
export class FigureResolverModule {}
