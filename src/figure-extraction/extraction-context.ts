import * as fs from 'fs/promises';
import * as path from 'path';
import { formatCanonicalId, FigureKind } from './identifiers/figure-id';
import { FigureRegistry, RegistryRecord } from './interfaces/figure.interface';

/**
 * State of a single extraction run for one paper. Owned by the extractor call
 * that created it and discarded once the registry is returned.
 */
export class ExtractionContext {
  private readonly records: FigureRegistry = {};
  private readonly reserved = new Set<string>();

  constructor(
    readonly paperId: string,
    readonly outputDir: string,
    readonly baseUrl: string | null,
  ) {}

  has(id: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.records, id);
  }

  /** Returns false when the id is already taken; the first record wins. */
  add(record: RegistryRecord): boolean {
    if (this.has(record.id)) {
      return false;
    }
    this.records[record.id] = record;
    return true;
  }

  /** Keeps positional ids away from an id a later element will claim. */
  reserve(id: string): void {
    this.reserved.add(id);
  }

  /** `fig<n>` / `tab<n>` starting at `preferred`, moved up until unused and unreserved. */
  nextFreeId(kind: FigureKind, preferred: number, appendix = false): string {
    let number = Math.max(1, preferred);
    let id = formatCanonicalId({ appendix, kind, number, letter: null });
    while (this.has(id) || this.reserved.has(id)) {
      number++;
      id = formatCanonicalId({ appendix, kind, number, letter: null });
    }
    return id;
  }

  artifactPath(fileName: string): string {
    return path.join(this.outputDir, fileName);
  }

  async writeArtifact(fileName: string, data: Buffer | string): Promise<string> {
    const target = this.artifactPath(fileName);
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(target, data);
    return target;
  }

  get registry(): FigureRegistry {
    return { ...this.records };
  }

  get size(): number {
    return Object.keys(this.records).length;
  }
}
