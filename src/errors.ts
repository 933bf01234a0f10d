/**
 * Pipeline error taxonomy.
 *
 * Per-record problems are not errors: the normalizer returns null and the
 * batch counts the record as dropped.
 */

export class UnknownDatasetError extends Error {
  readonly code = "UNKNOWN_DATASET" as const;

  constructor(readonly datasetId: string) {
    super(`Unknown dataset: ${datasetId}`);
    this.name = "UnknownDatasetError";
  }
}

export interface SourceErrorDetails {
  datasetId: string;
  url: string;
  query: Record<string, string>;
  status?: number;
  transient: boolean;
  cause?: unknown;
}

/**
 * Upstream or network failure. `transient` is true when the request was
 * retried and the retries ran out.
 */
export class SourceError extends Error {
  readonly code = "SOURCE_ERROR" as const;
  readonly datasetId: string;
  readonly url: string;
  readonly query: Record<string, string>;
  readonly status: number | undefined;
  readonly transient: boolean;

  constructor(message: string, details: SourceErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "SourceError";
    this.datasetId = details.datasetId;
    this.url = details.url;
    this.query = details.query;
    this.status = details.status;
    this.transient = details.transient;
  }
}

/**
 * A natural-key invariant was violated inside the store. Never retried.
 */
export class RepositoryConflictError extends Error {
  readonly code = "REPOSITORY_CONFLICT" as const;

  constructor(message: string) {
    super(message);
    this.name = "RepositoryConflictError";
  }
}

export class LockTimeoutError extends Error {
  readonly code = "LOCK_TIMEOUT" as const;

  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${String(timeoutMs)}ms waiting for lock ${key}`);
    this.name = "LockTimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
