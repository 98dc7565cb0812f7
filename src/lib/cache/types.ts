/**
 * Cache backend contract.
 *
 * Implemented by RedisCacheBackend (remote), LocalFileCache (on-disk)
 * and ResilientCache (failover router over the other two).
 */

export type Clock = () => number;

export interface CacheCallOptions {
  /**
   * Cancels the call. A write still waiting to run when the signal fires is
   * dropped; one already handed to the backend may still land.
   */
  signal?: AbortSignal;
}

export interface CacheBackend {
  readonly name: string;

  /**
   * Stored value, or null when absent or expired.
   * Throws only on transport failure.
   */
  get(key: string, options?: CacheCallOptions): Promise<string | null>;

  /**
   * Store a value that expires after ttlSeconds.
   * Resolves true once stored; throws on transport failure.
   */
  set(key: string, value: string, ttlSeconds: number, options?: CacheCallOptions): Promise<boolean>;

  delete(key: string): Promise<boolean>;

  /**
   * Remove every key starting with prefix.
   * @returns Number of keys removed
   */
  clear(prefix: string): Promise<number>;

  /**
   * Liveness probe. Resolves false instead of throwing.
   */
  isAvailable(): Promise<boolean>;

  close(): Promise<void>;
}

/**
 * A stored value with the metadata needed for lazy expiry.
 */
export interface CacheEntry {
  key: string;
  value: string;
  /** Epoch milliseconds */
  createdAt: number;
  ttlSeconds: number;
}

export function isValidTtl(ttlSeconds: number): boolean {
  return Number.isInteger(ttlSeconds) && ttlSeconds > 0;
}

/**
 * An entry is expired once more than ttlSeconds have passed since it was written.
 */
export function isExpired(entry: Pick<CacheEntry, 'createdAt' | 'ttlSeconds'>, now: number): boolean {
  return now - entry.createdAt > entry.ttlSeconds * 1000;
}
