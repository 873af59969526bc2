import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { debugLog } from '../common/debug-logger';
import { errorMessage } from '../common/errors';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { PaperFigureUpsert } from '../firestore/interfaces/firestore.interfaces';
import { FirebaseStorageService } from '../storage/storage.service';
import { FigureStorageLayout } from './figure-storage-layout';
import { subfigureStorageId } from './identifiers/figure-id';
import { FigureRegistry, RegistryRecord, SubfigureEntry } from './interfaces/figure.interface';

export interface PublishOutcome {
  registry: FigureRegistry;
  uploaded: string[];
  failed: string[];
}

/**
 * Copies figure images to remote storage and records them in the remote
 * figure registry. Best effort: failures are logged and reported, never thrown.
 */
@Injectable()
export class FigurePublisher {
  private readonly logger = new Logger(FigurePublisher.name);

  constructor(
    private readonly storageService: FirebaseStorageService,
    private readonly paperFigureRepository: PaperFigureRepository,
    private readonly layout: FigureStorageLayout,
  ) {}

  isEnabled(): boolean {
    return this.storageService.isEnabled();
  }

  /**
   * Uploads every figure and subfigure image of the registry. Returns a copy
   * of the registry with remote paths filled in. Tables stay local.
   */
  async publishRegistry(paperId: string, registry: FigureRegistry, dir: string): Promise<PublishOutcome> {
    const published: FigureRegistry = {};
    const uploaded: string[] = [];
    const failed: string[] = [];

    for (const record of Object.values(registry)) {
      const next = await this.publishRecord(paperId, record, dir, uploaded, failed);
      published[next.id] = next;
    }

    debugLog(`[${paperId}] Published ${uploaded.length} images, ${failed.length} failed`);
    return { registry: published, uploaded, failed };
  }

  /** Uploads one PNG and upserts its registry row. Returns the public URL or null. */
  async publishImage(paperId: string, figureId: string, filePath: string, caption: string): Promise<string | null> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      this.logger.warn(`[${paperId}] Cannot read ${filePath} for upload: ${errorMessage(error)}`);
      return null;
    }

    const url = await this.storageService.putObject(this.layout.remoteKey(paperId, figureId), bytes, 'image/png');
    if (!url) {
      return null;
    }
    await this.recordFigure(paperId, { figureId, caption, type: 'figure', remoteUrl: url });
    return url;
  }

  /** Registry row without an image, so a parent's caption can be looked up remotely. */
  async publishCaption(paperId: string, figureId: string, caption: string): Promise<void> {
    await this.recordFigure(paperId, { figureId, caption, type: 'figure', remoteUrl: null });
  }

  private async publishRecord(
    paperId: string,
    record: RegistryRecord,
    dir: string,
    uploaded: string[],
    failed: string[],
  ): Promise<RegistryRecord> {
    if (record.type === 'table') {
      return record;
    }

    if (record.hasSubfigures) {
      await this.publishCaption(paperId, record.id, record.caption);
      const subfigures: SubfigureEntry[] = [];
      for (const subfigure of record.subfigures) {
        const storageId = subfigureStorageId(record.id, subfigure.id);
        const url = await this.publishImage(paperId, storageId, path.join(dir, `${storageId}.png`), subfigure.caption);
        (url ? uploaded : failed).push(storageId);
        subfigures.push({ ...subfigure, remotePath: url });
      }
      return { ...record, subfigures };
    }

    if (!record.localPath) {
      return record;
    }
    const url = await this.publishImage(paperId, record.id, record.localPath, record.caption);
    (url ? uploaded : failed).push(record.id);
    return { ...record, remotePath: url };
  }

  private async recordFigure(paperId: string, figure: PaperFigureUpsert): Promise<void> {
    try {
      await this.paperFigureRepository.upsert(paperId, figure);
    } catch (error) {
      this.logger.warn(`[${paperId}] Remote registry update failed for ${figure.figureId}: ${errorMessage(error)}`);
    }
  }
}
