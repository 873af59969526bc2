import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import { debugLog } from '../common/debug-logger';
import { errorMessage } from '../common/errors';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { FirebaseStorageService } from '../storage/storage.service';
import { FigurePublisher } from './figure-publisher.service';
import { FigureStorageLayout } from './figure-storage-layout';
import { subfigureStorageId } from './identifiers/figure-id';
import {
  ExtractionMethod,
  FigureCacheClearResult,
  FigureExtractionOptions,
  FigureExtractionResult,
  FigureExtractor,
  FigureRegistry,
  PaperSource,
} from './interfaces/figure.interface';
import { FigureMetadataStore } from './metadata/figure-metadata.store';

/** Ordered list of extractors; the first that yields figures wins. */
export const FIGURE_EXTRACTORS = Symbol('FIGURE_EXTRACTORS');

export const FAILED_RUN_CACHED = 'cache: an earlier extraction found no figures; force a new run to retry';

@Injectable()
export class FigureExtractionService {
  private readonly logger = new Logger(FigureExtractionService.name);

  constructor(
    @Inject(FIGURE_EXTRACTORS) private readonly extractors: FigureExtractor[],
    private readonly metadataStore: FigureMetadataStore,
    private readonly layout: FigureStorageLayout,
    private readonly publisher: FigurePublisher,
    private readonly storageService: FirebaseStorageService,
    private readonly paperFigureRepository: PaperFigureRepository,
  ) {}

  /**
   * Extracts a paper's figures once. A sidecar from an earlier run is returned
   * unless `force` is set; only failed runs leave an empty sidecar, so an empty
   * cached registry comes back as `failed`. A forced run replaces the previous
   * registry entirely.
   */
  async extractFigures(source: PaperSource, options: FigureExtractionOptions = {}): Promise<FigureExtractionResult> {
    const { force = false, upload = true } = options;
    const { paperId } = source;
    const outputDir = this.layout.figuresDir(paperId);

    if (force) {
      await this.removeLocal(outputDir);
    } else {
      const cached = await this.metadataStore.loadFromDir(outputDir);
      if (cached) {
        debugLog(`[${paperId}] Using cached figure registry (${Object.keys(cached).length} entries)`);
        if (Object.keys(cached).length === 0) {
          return {
            paperId,
            registry: {},
            totalFound: 0,
            extractionMethod: 'cache',
            status: 'failed',
            errors: [FAILED_RUN_CACHED],
          };
        }
        const registry = await this.withRemotePaths(paperId, cached);
        return {
          paperId,
          registry,
          totalFound: Object.keys(registry).length,
          extractionMethod: 'cache',
          status: 'done',
        };
      }
    }

    const errors: string[] = [];
    for (const extractor of this.extractors) {
      if (!extractor.canExtract(source)) {
        continue;
      }

      try {
        const registry = await extractor.extract(source, outputDir);
        if (Object.keys(registry).length > 0) {
          return this.complete(paperId, registry, extractor.method, outputDir, upload, errors);
        }
        this.logger.warn(`[${paperId}] ${extractor.method} extraction found no figures`);
        errors.push(`${extractor.method}: no figures found`);
      } catch (error) {
        this.logger.warn(`[${paperId}] ${extractor.method} extraction failed: ${errorMessage(error)}`);
        errors.push(`${extractor.method}: ${errorMessage(error)}`);
      }
    }

    this.logger.warn(`[${paperId}] Figure extraction failed; caching the empty result`);
    await this.saveSidecar(paperId, {}, outputDir, errors);
    return { paperId, registry: {}, totalFound: 0, extractionMethod: 'none', status: 'failed', errors };
  }

  /** Registry from the local sidecar with remote paths filled in; empty when never extracted. */
  async getRegistry(paperId: string): Promise<FigureRegistry> {
    const registry = await this.metadataStore.loadFromDir(this.layout.figuresDir(paperId));
    return registry ? this.withRemotePaths(paperId, registry) : {};
  }

  /** Removes local artifacts, remote images and remote registry rows of a paper. */
  async clearFigureCache(paperId: string): Promise<FigureCacheClearResult> {
    const errors: string[] = [];
    const outputDir = this.layout.figuresDir(paperId);
    const localRemoved = await fs.stat(outputDir).then(
      () => true,
      () => false,
    );
    await this.removeLocal(outputDir);

    let remoteObjectsDeleted = 0;
    try {
      remoteObjectsDeleted = await this.storageService.deleteFolderContents(this.layout.remotePrefix(paperId));
    } catch (error) {
      this.logger.error(`[${paperId}] ${errorMessage(error)}`);
      errors.push(errorMessage(error));
    }

    let remoteRecordsDeleted = 0;
    try {
      remoteRecordsDeleted = await this.paperFigureRepository.deleteByPaper(paperId);
    } catch (error) {
      this.logger.error(`[${paperId}] ${errorMessage(error)}`);
      errors.push(errorMessage(error));
    }

    this.logger.log(
      `[${paperId}] Cleared figure cache: ${remoteObjectsDeleted} remote objects, ${remoteRecordsDeleted} registry rows`,
    );
    return {
      paperId,
      localRemoved,
      remoteObjectsDeleted,
      remoteRecordsDeleted,
      ...(errors.length > 0 ? { errors } : {}),
    };
  }

  private async complete(
    paperId: string,
    extracted: FigureRegistry,
    method: ExtractionMethod,
    outputDir: string,
    upload: boolean,
    errors: string[],
  ): Promise<FigureExtractionResult> {
    await this.saveSidecar(paperId, extracted, outputDir, errors);

    let registry = extracted;
    if (upload && this.publisher.isEnabled()) {
      const outcome = await this.publisher.publishRegistry(paperId, extracted, outputDir);
      registry = outcome.registry;
      errors.push(...outcome.failed.map((id) => `upload: ${id} failed`));
    } else {
      debugLog(`[${paperId}] Skipping upload (requested: ${upload}, storage enabled: ${this.publisher.isEnabled()})`);
    }

    const totalFound = Object.keys(registry).length;
    this.logger.log(`[${paperId}] Extracted ${totalFound} figures and tables via ${method}`);
    return {
      paperId,
      registry,
      totalFound,
      extractionMethod: method,
      status: 'done',
      ...(errors.length > 0 ? { errors } : {}),
    };
  }

  private async saveSidecar(paperId: string, registry: FigureRegistry, dir: string, errors: string[]): Promise<void> {
    try {
      await this.metadataStore.save(registry, dir);
    } catch (error) {
      // Local files remain usable; the next run re-extracts
      this.logger.error(`[${paperId}] ${errorMessage(error)}`);
      errors.push(errorMessage(error));
    }
  }

  private async withRemotePaths(paperId: string, registry: FigureRegistry): Promise<FigureRegistry> {
    if (!this.paperFigureRepository.isEnabled()) {
      return registry;
    }

    const urls = new Map<string, string | null>();
    for (const document of await this.paperFigureRepository.findByPaper(paperId)) {
      urls.set(document.figureId, document.remoteUrl);
    }

    const hydrated: FigureRegistry = {};
    for (const record of Object.values(registry)) {
      hydrated[record.id] =
        record.type === 'table'
          ? record
          : {
              ...record,
              remotePath: urls.get(record.id) ?? null,
              subfigures: record.subfigures.map((subfigure) => ({
                ...subfigure,
                remotePath: urls.get(subfigureStorageId(record.id, subfigure.id)) ?? null,
              })),
            };
    }
    return hydrated;
  }

  private async removeLocal(outputDir: string): Promise<void> {
    await fs.rm(outputDir, { recursive: true, force: true });
  }
}
