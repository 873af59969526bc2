import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { debugLog } from '../common/debug-logger';
import { errorMessage } from '../common/errors';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { FigurePublisher } from './figure-publisher.service';
import { FigureStorageLayout } from './figure-storage-layout';
import { FigureRegistry, FigureSyncResult } from './interfaces/figure.interface';
import { FigureMetadataStore } from './metadata/figure-metadata.store';

const SUBFIGURE_FILE_ID = /^(.+)_([a-z])$/;

/**
 * Uploads local figure images the remote registry does not know about.
 * Safe to run repeatedly: ids already present remotely are left alone.
 */
@Injectable()
export class FigureSyncService {
  private readonly logger = new Logger(FigureSyncService.name);

  constructor(
    private readonly layout: FigureStorageLayout,
    private readonly metadataStore: FigureMetadataStore,
    private readonly paperFigureRepository: PaperFigureRepository,
    private readonly publisher: FigurePublisher,
  ) {}

  async syncPaper(paperId: string): Promise<FigureSyncResult> {
    const dir = this.layout.figuresDir(paperId);
    const localIds = await this.listLocalImageIds(dir);
    const remoteIds = new Set(await this.paperFigureRepository.listFigureIds(paperId));
    const result: FigureSyncResult = {
      paperId,
      localFigures: localIds.length,
      remoteFigures: remoteIds.size,
      uploaded: [],
      failed: [],
    };

    if (!this.publisher.isEnabled()) {
      this.logger.warn(`[${paperId}] Remote storage disabled; nothing to sync`);
      return result;
    }

    const registry = (await this.metadataStore.loadFromDir(dir)) ?? {};
    for (const figureId of localIds) {
      if (remoteIds.has(figureId)) {
        continue;
      }
      const url = await this.publisher.publishImage(
        paperId,
        figureId,
        path.join(dir, `${figureId}.png`),
        captionFor(figureId, registry),
      );
      (url ? result.uploaded : result.failed).push(figureId);
    }

    // Parents of subfigures have no image but carry the caption subfigures fall back to
    for (const record of Object.values(registry)) {
      if (record.hasSubfigures && !remoteIds.has(record.id)) {
        await this.publisher.publishCaption(paperId, record.id, record.caption);
      }
    }

    result.remoteFigures = remoteIds.size + result.uploaded.length;
    this.logger.log(
      `[${paperId}] Sync: ${localIds.length} local, ${result.uploaded.length} uploaded, ${result.failed.length} failed`,
    );
    return result;
  }

  private async listLocalImageIds(dir: string): Promise<string[]> {
    try {
      const files = await fs.readdir(dir);
      return files
        .filter((file) => file.toLowerCase().endsWith('.png'))
        .map((file) => file.slice(0, -'.png'.length))
        .sort();
    } catch (error) {
      debugLog(`No local figures in ${dir}: ${errorMessage(error)}`);
      return [];
    }
  }
}

/** Sidecar caption; a subfigure image takes its caption from the parent's list. */
export function captionFor(figureId: string, registry: FigureRegistry): string {
  const record = registry[figureId];
  if (record) {
    return record.caption;
  }
  const subfigure = SUBFIGURE_FILE_ID.exec(figureId);
  if (!subfigure) {
    return '';
  }
  const parent = registry[subfigure[1]];
  if (parent?.type !== 'figure') {
    return '';
  }
  return parent.subfigures.find((entry) => entry.id === subfigure[2])?.caption ?? '';
}
