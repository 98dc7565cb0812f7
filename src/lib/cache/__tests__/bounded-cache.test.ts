/**
 * Tests for the time-bounded single-backend wrapper
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BoundedCache } from '../bounded-cache';
import { RAGQueryCache } from '../rag-cache';
import { CacheTimeoutError } from '@/lib/errors';
import type { RAGResponse } from '@/types/rag';
import { createMockLogger, MemoryBackend, type MockLogger } from './helpers';

let inner: MemoryBackend;
let log: MockLogger;

function createCache(operationTimeoutMs = 20): BoundedCache {
  return new BoundedCache(inner, { operationTimeoutMs, logger: log });
}

describe('BoundedCache', () => {
  beforeEach(() => {
    inner = new MemoryBackend('file');
    log = createMockLogger();
  });

  it('should pass calls through to the wrapped backend', async () => {
    const cache = createCache();

    expect(await cache.set('k', 'v', 60)).toBe(true);
    expect(await cache.get('k')).toBe('v');
    expect(await cache.delete('k')).toBe(true);
    expect(cache.name).toBe('file');
  });

  it('should time out a hanging get', async () => {
    const cache = createCache();
    inner.hanging = true;

    const pending = cache.get('k');

    await expect(pending).rejects.toBeInstanceOf(CacheTimeoutError);
    await expect(pending).rejects.toThrow('Cache get on file timed out after 20ms');
  });

  it('should time out a hanging delete with the per-call bound', async () => {
    const cache = createCache();
    inner.hanging = true;

    await expect(cache.delete('k')).rejects.toThrow('Cache delete on file timed out after 20ms');
  });

  it('should resolve an aborted set to false without reaching the backend', async () => {
    const cache = createCache();
    const controller = new AbortController();
    controller.abort();

    expect(await cache.set('k', 'v', 60, { signal: controller.signal })).toBe(false);
    expect(await cache.get('k', { signal: controller.signal })).toBeNull();
    expect(inner.count('set')).toBe(0);
    expect(inner.count('get')).toBe(0);
  });

  it('should keep a hanging file cache from stalling the query cache', async () => {
    const queryCache = new RAGQueryCache({ backend: createCache(), logger: log });
    const params = { embeddingsModel: 'test-model', topK: 3, similarityThreshold: 0.7 };
    const response: RAGResponse = {
      answer: 'Answer.',
      sources: ['a.md'],
      status: 'success',
      confidence: 1,
      retrievedChunks: 3,
      processingMs: 10,
    };
    inner.hanging = true;

    expect(await queryCache.lookup('Slow disk?', params)).toBeNull();
    expect(await queryCache.store('Slow disk?', params, response)).toBe(false);
    expect(queryCache.getStats()).toEqual({ hits: 0, misses: 1, stores: 0, storeFailures: 1 });
  });
});
