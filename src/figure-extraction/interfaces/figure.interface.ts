export interface SubfigureEntry {
  /** Single lowercase letter, `a` first. */
  id: string;
  caption: string;
  /** Filled in after upload or from the remote registry; never persisted to the sidecar. */
  remotePath?: string | null;
}

interface RecordBase {
  id: string;
  caption: string;
  localPath: string | null;
  remotePath: string | null;
}

export interface FigureRecord extends RecordBase {
  type: 'figure';
  hasSubfigures: boolean;
  subfigures: SubfigureEntry[];
  content: null;
}

export interface TableRecord extends RecordBase {
  type: 'table';
  hasSubfigures: false;
  subfigures: [];
  /** Markdown table body. */
  content: string;
}

export type RegistryRecord = FigureRecord | TableRecord;

export type FigureType = RegistryRecord['type'];

/** Canonical id -> record, in document order. */
export type FigureRegistry = Record<string, RegistryRecord>;

export interface PaperSource {
  paperId: string;
  html?: string;
  htmlUrl?: string;
  /** Base for resolving relative image references; defaults to htmlUrl. */
  baseUrl?: string;
  pdf?: Buffer;
  pdfPath?: string;
  pdfUrl?: string;
}

export type ExtractionMethod = 'html' | 'pdf';

export interface FigureExtractor {
  readonly method: ExtractionMethod;
  canExtract(source: PaperSource): boolean;
  /** Writes artifacts into outputDir and returns the registry. Throws only when the source itself is unavailable. */
  extract(source: PaperSource, outputDir: string): Promise<FigureRegistry>;
}

export type ElementOutcome<T> =
  | { kind: 'extracted'; value: T }
  | { kind: 'skipped'; reason: string };

export interface FigureExtractionOptions {
  force?: boolean;
  upload?: boolean;
}

export interface FigureExtractionResult {
  paperId: string;
  registry: FigureRegistry;
  totalFound: number;
  extractionMethod: ExtractionMethod | 'cache' | 'none';
  status: 'done' | 'failed';
  errors?: string[];
}

export interface FigureSyncResult {
  paperId: string;
  localFigures: number;
  remoteFigures: number;
  uploaded: string[];
  failed: string[];
}

export interface FigureCacheClearResult {
  paperId: string;
  localRemoved: boolean;
  remoteObjectsDeleted: number;
  remoteRecordsDeleted: number;
  errors?: string[];
}

export function extracted<T>(value: T): ElementOutcome<T> {
  return { kind: 'extracted', value };
}

export function skipped<T>(reason: string): ElementOutcome<T> {
  return { kind: 'skipped', reason };
}

export function createFigureRecord(
  id: string,
  caption: string,
  localPath: string | null,
  subfigures: SubfigureEntry[] = [],
): FigureRecord {
  return {
    id,
    caption,
    type: 'figure',
    hasSubfigures: subfigures.length > 0,
    subfigures,
    content: null,
    localPath,
    remotePath: null,
  };
}

export function createTableRecord(
  id: string,
  caption: string,
  content: string,
  localPath: string | null,
): TableRecord {
  return {
    id,
    caption,
    type: 'table',
    hasSubfigures: false,
    subfigures: [],
    content,
    localPath,
    remotePath: null,
  };
}
