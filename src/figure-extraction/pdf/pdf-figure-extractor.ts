import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import { getNumberSetting } from '../../common/config-values';
import { debugLog } from '../../common/debug-logger';
import { errorMessage, SourceUnavailableError } from '../../common/errors';
import { HttpFetchService } from '../../http/http-fetch.service';
import { ExtractionContext } from '../extraction-context';
import {
  createFigureRecord,
  ElementOutcome,
  extracted,
  FigureExtractor,
  FigureRegistry,
  PaperSource,
  skipped,
} from '../interfaces/figure.interface';
import { PdfCaption, scanCaptions } from './pdf-captions';
import {
  PageImage,
  PDF_CONTENT_READER,
  PDF_RASTERIZER,
  PdfContentReader,
  PdfRasterizer,
} from './pdf-content.interface';
import { cropPageRegion, pairFiguresWithCaptions, PdfFigurePair, unionBox } from './pdf-figure-pairing';

/**
 * Fallback extractor for papers without a usable HTML rendering. Pairs
 * embedded images (or whole pages) with `Figure N` captions found in the text
 * layer. Tables are recognised so that their regions are not mistaken for
 * figures, but produce no record.
 */
@Injectable()
export class PdfFigureExtractor implements FigureExtractor {
  readonly method = 'pdf';
  private readonly logger = new Logger(PdfFigureExtractor.name);
  private readonly dpi: number;
  private readonly minImageSize: number;
  private readonly cropMargin: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpFetchService: HttpFetchService,
    @Inject(PDF_CONTENT_READER) private readonly contentReader: PdfContentReader,
    @Inject(PDF_RASTERIZER) private readonly rasterizer: PdfRasterizer,
  ) {
    this.dpi = getNumberSetting(this.configService, 'PDF_RASTER_DPI', 300);
    this.minImageSize = getNumberSetting(this.configService, 'PDF_MIN_IMAGE_SIZE', 100);
    this.cropMargin = getNumberSetting(this.configService, 'PDF_CROP_MARGIN', 10);
  }

  canExtract(source: PaperSource): boolean {
    return Boolean(source.pdf || source.pdfPath || source.pdfUrl);
  }

  async extract(source: PaperSource, outputDir: string): Promise<FigureRegistry> {
    const pdf = await this.loadPdf(source);
    const pages = await this.contentReader.readPages(pdf);
    const captions = scanCaptions(pages);
    if (captions.length === 0) {
      debugLog(`[${source.paperId}] No figure or table captions in PDF text`);
      return {};
    }

    const pairs = pairFiguresWithCaptions(pages, captions, this.minImageSize);
    const rasters = await this.rasterizePages(pdf, pairs);
    const context = new ExtractionContext(source.paperId, outputDir, null);
    for (const caption of captions) {
      if (caption.id) {
        context.reserve(caption.id);
      }
    }

    let figureIndex = 0;
    for (const pair of pairs) {
      if (pair.caption.kind === 'tab') {
        debugLog(`[${source.paperId}] Region on page ${pair.candidate.pageNumber} belongs to table ${pair.caption.label}`);
        continue;
      }

      figureIndex++;
      const id = this.figureId(pair.caption, figureIndex, context);
      if (context.has(id)) {
        this.logger.warn(`[${source.paperId}] Skipping duplicate figure ${id}`);
        continue;
      }

      const image = await this.figureImage(pair, rasters);
      if (image.kind === 'skipped') {
        this.logger.warn(`[${source.paperId}] Skipping ${id} on page ${pair.candidate.pageNumber}: ${image.reason}`);
        continue;
      }

      try {
        const localPath = await context.writeArtifact(`${id}.png`, image.value);
        context.add(createFigureRecord(id, pair.caption.text, localPath));
      } catch (error) {
        this.logger.warn(`[${source.paperId}] Could not write ${id}: ${errorMessage(error)}`);
      }
    }

    debugLog(
      `[${source.paperId}] PDF extraction: ${captions.length} captions, ${pairs.length} pairs, ${context.size} figures`,
    );
    return context.registry;
  }

  private figureId(caption: PdfCaption, figureIndex: number, context: ExtractionContext): string {
    return caption.id ?? context.nextFreeId('fig', figureIndex);
  }

  private async figureImage(pair: PdfFigurePair, rasters: Map<number, PageImage>): Promise<ElementOutcome<Buffer>> {
    const { candidate, caption, structural } = pair;
    const raster = rasters.get(candidate.pageNumber);

    if (structural && raster && candidate.box && caption.box) {
      try {
        const cropped = await cropPageRegion(raster, unionBox(candidate.box, caption.box), this.dpi, this.cropMargin);
        if (cropped) {
          return extracted(cropped);
        }
      } catch (error) {
        this.logger.warn(`Crop failed on page ${candidate.pageNumber}, using the embedded image: ${errorMessage(error)}`);
      }
    }

    if (candidate.image) {
      return extracted(candidate.image);
    }
    if (raster) {
      return extracted(raster.png);
    }
    return skipped('page could not be rasterized');
  }

  /** Only pages that will be cropped or used whole are rendered. */
  private async rasterizePages(pdf: Buffer, pairs: PdfFigurePair[]): Promise<Map<number, PageImage>> {
    const needed = new Set<number>();
    for (const pair of pairs) {
      if (pair.caption.kind === 'fig' && (pair.structural || !pair.candidate.image)) {
        needed.add(pair.candidate.pageNumber);
      }
    }
    if (needed.size === 0) {
      return new Map();
    }

    try {
      const images = await this.rasterizer.rasterize(pdf, this.dpi, [...needed].sort((a, b) => a - b));
      return new Map(images.map((image) => [image.pageNumber, image]));
    } catch (error) {
      this.logger.warn(`Page rasterization failed, using embedded images only: ${errorMessage(error)}`);
      return new Map();
    }
  }

  private async loadPdf(source: PaperSource): Promise<Buffer> {
    if (source.pdf) {
      return source.pdf;
    }
    if (source.pdfPath) {
      try {
        return await fs.readFile(source.pdfPath);
      } catch (error) {
        throw new SourceUnavailableError(`Unable to read PDF ${source.pdfPath}`, { cause: error });
      }
    }
    if (source.pdfUrl) {
      return this.httpFetchService.fetchBytes(source.pdfUrl);
    }
    throw new SourceUnavailableError(`No PDF source for paper ${source.paperId}`);
  }
}
