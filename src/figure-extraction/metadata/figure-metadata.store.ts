import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage, PersistenceError } from '../../common/errors';
import {
  createFigureRecord,
  createTableRecord,
  FigureRegistry,
  RegistryRecord,
} from '../interfaces/figure.interface';

export const METADATA_FILE = 'figures_metadata.json';
export const LEGACY_METADATA_FILE = 'figures.json';

/** Load order: the canonical name wins when both exist. */
export const METADATA_FILES = [METADATA_FILE, LEGACY_METADATA_FILE] as const;

const subfigureSchema = z.object({
  id: z.string().regex(/^[a-z]$/),
  caption: z.string().nullish(),
});

const sidecarEntrySchema = z.object({
  id: z.string().optional(),
  caption: z.string().nullish(),
  type: z.enum(['figure', 'table']).optional(),
  has_subfigures: z.boolean().optional(),
  subfigures: z.array(subfigureSchema).optional(),
  content: z.string().nullish(),
  path: z.string().nullable().optional(),
});

const sidecarSchema = z.record(z.string(), z.unknown());

type SidecarEntry = z.infer<typeof sidecarEntrySchema>;

interface SerializedRecord {
  id: string;
  caption: string;
  type: RegistryRecord['type'];
  has_subfigures: boolean;
  subfigures: Array<{ id: string; caption: string }>;
  content: string | null;
  path: string | null;
}

@Injectable()
export class FigureMetadataStore {
  private readonly logger = new Logger(FigureMetadataStore.name);

  /**
   * Writes the registry as `figures_metadata.json` in dir. Paths are stored
   * relative to dir; remote paths are not stored.
   */
  async save(registry: FigureRegistry, dir: string): Promise<string> {
    const serialized: Record<string, SerializedRecord> = {};
    for (const record of Object.values(registry)) {
      serialized[record.id] = {
        id: record.id,
        caption: record.caption,
        type: record.type,
        has_subfigures: record.hasSubfigures,
        subfigures: record.subfigures.map((subfigure) => ({
          id: subfigure.id,
          caption: subfigure.caption,
        })),
        content: record.type === 'table' ? record.content : null,
        path: record.localPath ? toPortable(path.relative(dir, record.localPath)) : null,
      };
    }

    const target = path.join(dir, METADATA_FILE);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(target, `${JSON.stringify(serialized, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to write figure metadata to ${target}`, { cause: error });
    }
    return target;
  }

  async findMetadataFile(dir: string): Promise<string | null> {
    for (const name of METADATA_FILES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  /** Every sidecar present in dir, canonical name first. */
  async findAllMetadataFiles(dir: string): Promise<string[]> {
    const found: string[] = [];
    for (const name of METADATA_FILES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) {
        found.push(candidate);
      }
    }
    return found;
  }

  /**
   * Inverse of save. localPath is set only when the referenced file exists;
   * remotePath is always null. Entries that fail validation are dropped.
   */
  async load(filePath: string, baseDir: string): Promise<FigureRegistry> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      this.logger.warn(`Unreadable figure metadata ${filePath}: ${errorMessage(error)}`);
      return {};
    }

    const parsed = sidecarSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Figure metadata ${filePath} is not an object keyed by figure id`);
      return {};
    }

    const registry: FigureRegistry = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      const entry = sidecarEntrySchema.safeParse(value);
      if (!entry.success) {
        this.logger.warn(`Dropping malformed metadata entry ${key} in ${filePath}`);
        continue;
      }
      const record = await this.toRecord(key, entry.data, baseDir);
      if (record) {
        registry[record.id] = record;
      } else {
        this.logger.warn(`Dropping incomplete metadata entry ${key} in ${filePath}`);
      }
    }
    return registry;
  }

  /** Loads the preferred sidecar in dir, or null when there is none. */
  async loadFromDir(dir: string): Promise<FigureRegistry | null> {
    const file = await this.findMetadataFile(dir);
    return file ? this.load(file, dir) : null;
  }

  private async toRecord(key: string, entry: SidecarEntry, baseDir: string): Promise<RegistryRecord | null> {
    const relativePath = entry.path === undefined ? `${key}.png` : entry.path;
    const localPath = await resolveExisting(baseDir, relativePath);
    const caption = entry.caption ?? '';
    const type = entry.type ?? (entry.content ? 'table' : 'figure');

    if (type === 'table') {
      if (!entry.content) {
        return null;
      }
      return createTableRecord(key, caption, entry.content, localPath);
    }

    const subfigures = (entry.subfigures ?? []).map((subfigure) => ({
      id: subfigure.id,
      caption: subfigure.caption ?? '',
    }));
    if (entry.has_subfigures && subfigures.length === 0) {
      return null;
    }
    return createFigureRecord(key, caption, localPath, subfigures);
  }
}

async function resolveExisting(baseDir: string, relativePath: string | null): Promise<string | null> {
  if (!relativePath) {
    return null;
  }
  const candidate = path.resolve(baseDir, relativePath);
  return (await fileExists(candidate)) ? candidate : null;
}

async function fileExists(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isFile();
  } catch {
    return false;
  }
}

function toPortable(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}
