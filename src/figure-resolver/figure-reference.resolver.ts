import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { debugLog } from '../common/debug-logger';
import { PaperFigureRepository } from '../data/repositories/paper-figure.repository';
import { FigureStorageLayout } from '../figure-extraction/figure-storage-layout';
import {
  displayIdFromCanonical,
  mainIdCandidates,
  parseCanonicalId,
  parseDisplayId,
  subfigureStorageId,
} from '../figure-extraction/identifiers/figure-id';
import {
  FigureRecord,
  FigureRegistry,
  RegistryRecord,
  SubfigureEntry,
} from '../figure-extraction/interfaces/figure.interface';
import { FigureMetadataStore } from '../figure-extraction/metadata/figure-metadata.store';
import { substituteFigurePlaceholders } from './figure-placeholders';
import { selectThumbnail } from './figure-thumbnail';
import { ResolvedFigure, ResolvedSubfigure } from './interfaces/resolved-figure.interface';
import { findMainFigure, findMainRecord } from './registry-lookup';

/**
 * Turns display ids (`3`, `3.a`) into something a reader can show. Always
 * answers: when nothing is known about a figure the caption is `Figure <n>`
 * and the url is null.
 */
@Injectable()
export class FigureReferenceResolver {
  private readonly logger = new Logger(FigureReferenceResolver.name);

  constructor(
    private readonly layout: FigureStorageLayout,
    private readonly metadataStore: FigureMetadataStore,
    private readonly paperFigureRepository: PaperFigureRepository,
  ) {}

  async resolve(paperId: string, displayId: string, registry: FigureRegistry): Promise<ResolvedFigure> {
    const parts = parseDisplayId(displayId);
    if (!parts) {
      this.logger.warn(`[${paperId}] Unresolvable figure reference "${displayId}"`);
      const id = displayId.trim();
      return { id, displayId: id, type: 'figure', caption: `Figure ${id}`, url: null };
    }
    return parts.letter
      ? this.resolveSubfigure(paperId, parts.number, parts.letter, registry)
      : this.resolveMain(paperId, parts.number, registry);
  }

  /** Every main figure and table of the registry, in registry order. */
  async resolveAll(paperId: string, registry: FigureRegistry): Promise<ResolvedFigure[]> {
    const mains = Object.values(registry).filter((record) => parseCanonicalId(record.id)?.letter === null);
    return Promise.all(mains.map((record) => this.describe(paperId, record)));
  }

  /** Replaces `<FIGURE_ID>` placeholders in generated text with figures of this paper. */
  async substitutePlaceholders(paperId: string, text: string, registry: FigureRegistry): Promise<string> {
    return substituteFigurePlaceholders(text, (displayId) => this.resolve(paperId, displayId, registry));
  }

  async resolveThumbnail(
    paperId: string,
    displayId: string | null,
    registry: FigureRegistry,
  ): Promise<ResolvedFigure | null> {
    const id = selectThumbnail(displayId, registry);
    if (!id) {
      return null;
    }
    const record: RegistryRecord | undefined = registry[id];
    if (record) {
      return this.describe(paperId, record);
    }
    const thumbnailDisplayId = displayIdFromCanonical(id);
    return thumbnailDisplayId ? this.resolve(paperId, thumbnailDisplayId, registry) : null;
  }

  private async resolveMain(paperId: string, number: number, registry: FigureRegistry): Promise<ResolvedFigure> {
    const record = findMainRecord(registry, number);
    if (record) {
      return this.describe(paperId, record);
    }

    for (const id of mainIdCandidates(number)) {
      const remote = await this.paperFigureRepository.findOne(paperId, id);
      if (remote) {
        return {
          id: remote.figureId,
          displayId: `${number}`,
          type: remote.type,
          caption: remote.caption || genericCaption(number),
          url: remote.remoteUrl,
        };
      }
    }

    debugLog(`[${paperId}] Figure ${number} not found locally or remotely`);
    return { id: `fig${number}`, displayId: `${number}`, type: 'figure', caption: genericCaption(number), url: null };
  }

  private async resolveSubfigure(
    paperId: string,
    number: number,
    letter: string,
    registry: FigureRegistry,
  ): Promise<ResolvedFigure> {
    const displayId = `${number}.${letter}`;
    const parent = findMainFigure(registry, number);

    if (!parent) {
      const id = subfigureStorageId(`fig${number}`, letter);
      const remote = await this.paperFigureRepository.findOne(paperId, id);
      return {
        id,
        displayId,
        type: 'figure',
        caption: remote?.caption || `(${letter})`,
        url: remote?.remoteUrl ?? null,
        parentCaption: await this.findParentCaption(paperId, number),
      };
    }

    const id = subfigureStorageId(parent.id, letter);
    // A panel can be materialized as its own record under the storage id
    const own: RegistryRecord | undefined = registry[id];
    const entry = parent.subfigures.find((subfigure) => subfigure.id === letter);
    const caption =
      own?.caption || entry?.caption || (await this.paperFigureRepository.getFigureCaption(paperId, id)) || `(${letter})`;

    let url = own?.remotePath ?? entry?.remotePath ?? (await this.paperFigureRepository.getFigureUrl(paperId, id));
    if (!url && own?.localPath) {
      url = this.layout.staticUrl(paperId, path.basename(own.localPath));
    } else if (!url && entry) {
      url = this.layout.staticUrl(paperId, `${id}.png`);
    }

    return {
      id,
      displayId,
      type: 'figure',
      caption,
      url,
      parentCaption: parent.caption || genericCaption(number),
    };
  }

  /**
   * Parent caption when the parent is not in the registry at hand: the remote
   * registry, then every cached sidecar of the paper, then any remote id carrying
   * the same number.
   */
  private async findParentCaption(paperId: string, number: number): Promise<string> {
    const figureIds = mainIdCandidates(number).filter((id) => parseCanonicalId(id)?.kind === 'fig');
    for (const id of figureIds) {
      const caption = await this.paperFigureRepository.getFigureCaption(paperId, id);
      if (caption) {
        return caption;
      }
    }

    const dir = this.layout.figuresDir(paperId);
    for (const file of await this.metadataStore.findAllMetadataFiles(dir)) {
      const cached = findMainFigure(await this.metadataStore.load(file, dir), number);
      if (cached?.caption) {
        return cached.caption;
      }
    }

    for (const id of await this.paperFigureRepository.listFigureIds(paperId)) {
      const parts = parseCanonicalId(id);
      if (!parts || parts.number !== number || parts.letter !== null || figureIds.includes(id)) {
        continue;
      }
      const caption = await this.paperFigureRepository.getFigureCaption(paperId, id);
      if (caption) {
        return caption;
      }
    }

    this.logger.warn(`[${paperId}] No caption found for figure ${number}; using a generic one`);
    return genericCaption(number);
  }

  private async describe(paperId: string, record: RegistryRecord): Promise<ResolvedFigure> {
    const resolved: ResolvedFigure = {
      id: record.id,
      displayId: displayIdFromCanonical(record.id) ?? record.id,
      type: record.type,
      caption: record.caption,
      url: await this.mainUrl(paperId, record),
    };
    if (record.type === 'table') {
      resolved.content = record.content;
    } else if (record.hasSubfigures) {
      const parent = record;
      resolved.subfigures = parent.subfigures.map((entry) => this.describeSubfigure(paperId, parent, entry));
    }
    return resolved;
  }

  private async mainUrl(paperId: string, record: RegistryRecord): Promise<string | null> {
    const url = record.remotePath ?? (await this.paperFigureRepository.getFigureUrl(paperId, record.id));
    if (url) {
      return url;
    }
    return record.localPath ? this.layout.staticUrl(paperId, path.basename(record.localPath)) : null;
  }

  private describeSubfigure(paperId: string, parent: FigureRecord, entry: SubfigureEntry): ResolvedSubfigure {
    const id = subfigureStorageId(parent.id, entry.id);
    return {
      id,
      displayId: displayIdFromCanonical(id) ?? id,
      caption: entry.caption,
      url: entry.remotePath ?? this.layout.staticUrl(paperId, `${id}.png`),
    };
  }
}

function genericCaption(number: number): string {
  return `Figure ${number}`;
}
