/**
 * Bounded Cache
 *
 * Puts the per-call time budget on a single backend when no failover router
 * sits in front of it (CACHE_BACKEND=file). get, set and delete give up
 * after operationTimeoutMs; clear and close get MAINTENANCE_TIMEOUT_MS.
 */

import { createLayerLogger, describeError, type LogSink } from '@/lib/logger';
import { CacheAbortedError } from '@/lib/errors';
import { DEFAULT_OPERATION_TIMEOUT_MS, MAINTENANCE_TIMEOUT_MS } from './resilient-cache';
import { withTimeout } from './timeout';
import type { CacheBackend, CacheCallOptions } from './types';

export interface BoundedCacheOptions {
  operationTimeoutMs?: number;
  logger?: LogSink;
}

export class BoundedCache implements CacheBackend {
  readonly name: string;

  private readonly operationTimeoutMs: number;
  private readonly log: LogSink;

  constructor(
    readonly inner: CacheBackend,
    options: BoundedCacheOptions = {}
  ) {
    this.name = inner.name;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.log = options.logger ?? createLayerLogger('cache', 'BoundedCache');
  }

  /**
   * Timeouts and transport errors propagate; an aborted call resolves to the fallback.
   */
  private async bounded<T>(
    operation: string,
    run: () => Promise<T>,
    fallback: T,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await withTimeout(run, {
        backend: this.name,
        operation,
        timeoutMs: this.operationTimeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof CacheAbortedError) {
        this.log.debug({ event: 'cache_aborted', operation }, 'Cache call aborted by caller');
        return fallback;
      }
      throw error;
    }
  }

  get(key: string, options?: CacheCallOptions): Promise<string | null> {
    return this.bounded('get', () => this.inner.get(key, options), null, options?.signal);
  }

  set(key: string, value: string, ttlSeconds: number, options?: CacheCallOptions): Promise<boolean> {
    return this.bounded('set', () => this.inner.set(key, value, ttlSeconds, options), false, options?.signal);
  }

  delete(key: string): Promise<boolean> {
    return withTimeout(() => this.inner.delete(key), {
      backend: this.name,
      operation: 'delete',
      timeoutMs: this.operationTimeoutMs,
    });
  }

  clear(prefix: string): Promise<number> {
    return withTimeout(() => this.inner.clear(prefix), {
      backend: this.name,
      operation: 'clear',
      timeoutMs: MAINTENANCE_TIMEOUT_MS,
    });
  }

  isAvailable(): Promise<boolean> {
    return withTimeout(() => this.inner.isAvailable(), {
      backend: this.name,
      operation: 'probe',
      timeoutMs: this.operationTimeoutMs,
    }).catch((error: unknown) => {
      this.log.warn(
        { event: 'cache_probe_failed', backend: this.name, error: describeError(error) },
        'Cache availability check failed'
      );
      return false;
    });
  }

  close(): Promise<void> {
    return withTimeout(() => this.inner.close(), {
      backend: this.name,
      operation: 'close',
      timeoutMs: MAINTENANCE_TIMEOUT_MS,
    });
  }
}
