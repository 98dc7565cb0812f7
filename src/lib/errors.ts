/**
 * Error types shared across the cache, index and configuration layers.
 */

/**
 * Invalid or missing configuration. Raised at startup and never absorbed:
 * the service must not run with a misconfigured cache.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A cache backend call exceeded its time budget.
 * Treated exactly like a connectivity failure.
 */
export class CacheTimeoutError extends Error {
  constructor(
    readonly backend: string,
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`Cache ${operation} on ${backend} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

/**
 * The caller cancelled the cache call (e.g. the client disconnected).
 */
export class CacheAbortedError extends Error {
  constructor(
    readonly backend: string,
    readonly operation: string
  ) {
    super(`Cache ${operation} on ${backend} was aborted`);
    this.name = 'CacheAbortedError';
  }
}

/**
 * A saved vector index could not be read back.
 */
export class IndexFileError extends Error {
  constructor(
    readonly filePath: string,
    reason: string
  ) {
    super(`Cannot load index from ${filePath}: ${reason}`);
    this.name = 'IndexFileError';
  }
}

/**
 * Throw if the signal has already fired.
 */
export function assertNotAborted(
  signal: AbortSignal | undefined,
  backend: string,
  operation: string
): void {
  if (signal?.aborted) {
    throw new CacheAbortedError(backend, operation);
  }
}
