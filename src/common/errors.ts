/**
 * A paper source (HTML page, PDF, remote image) could not be fetched or opened.
 * Extractors let this propagate so the orchestrator can move to its fallback.
 */
export class SourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
  }
}

export class FetchError extends SourceUnavailableError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s)`, options);
    this.name = 'FetchError';
  }
}

/**
 * Metadata sidecar or remote registry write failed.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/** A paper id that cannot name a directory under the data dir. */
export class InvalidPaperIdError extends Error {
  constructor(readonly paperId: string) {
    super(`Invalid paper id: ${JSON.stringify(paperId)}`);
    this.name = 'InvalidPaperIdError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
