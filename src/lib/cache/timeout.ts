/**
 * Bounded execution for cache backend calls.
 */

import { CacheAbortedError, CacheTimeoutError } from '@/lib/errors';

export interface GuardOptions {
  backend: string;
  operation: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Run a backend call, rejecting with CacheTimeoutError once timeoutMs passes
 * and with CacheAbortedError when the signal fires first.
 */
export function withTimeout<T>(run: () => Promise<T>, options: GuardOptions): Promise<T> {
  const { backend, operation, timeoutMs, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new CacheAbortedError(backend, operation));
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      cleanup();
      reject(new CacheAbortedError(backend, operation));
    };

    const cleanup = () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    timer = setTimeout(() => {
      cleanup();
      reject(new CacheTimeoutError(backend, operation, timeoutMs));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(run)
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
  });
}
