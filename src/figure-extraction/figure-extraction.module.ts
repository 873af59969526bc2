import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { HttpModule } from '../http/http.module';
import { StorageModule } from '../storage/storage.module';
import { FIGURE_EXTRACTORS, FigureExtractionService } from './figure-extraction.service';
import { FigurePublisher } from './figure-publisher.service';
import { FigureStorageLayout } from './figure-storage-layout';
import { FigureSyncService } from './figure-sync.service';
import { HtmlFigureExtractor } from './html/html-figure-extractor';
import { ImageResolver } from './html/image-resolver';
import { FigureMetadataStore } from './metadata/figure-metadata.store';
import { PDF_CONTENT_READER, PDF_RASTERIZER } from './pdf/pdf-content.interface';
import { PdfLibContentReader } from './pdf/pdf-content-reader';
import { PdfFigureExtractor } from './pdf/pdf-figure-extractor';
import { PngPageRasterizer } from './pdf/pdf-rasterizer';

@Module({
  imports: [HttpModule, StorageModule, DataModule],
  providers: [
    FigureStorageLayout,
    FigureMetadataStore,
    ImageResolver,
    HtmlFigureExtractor,
    PdfFigureExtractor,
    { provide: PDF_CONTENT_READER, useClass: PdfLibContentReader },
    { provide: PDF_RASTERIZER, useClass: PngPageRasterizer },
    {
      provide: FIGURE_EXTRACTORS,
      useFactory: (html: HtmlFigureExtractor, pdf: PdfFigureExtractor) => [html, pdf],
      inject: [HtmlFigureExtractor, PdfFigureExtractor],
    },
    FigurePublisher,
    FigureExtractionService,
    FigureSyncService,
  ],
  exports: [FigureExtractionService, FigureSyncService, FigureStorageLayout, FigureMetadataStore],
})
export class FigureExtractionModule {}
