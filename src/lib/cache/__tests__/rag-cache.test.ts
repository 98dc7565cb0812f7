/**
 * Tests for the RAG query cache
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RAGQueryCache, CACHE_VERSION, DEFAULT_TTL_SECONDS } from '../rag-cache';
import { ResilientCache, CacheState } from '../resilient-cache';
import { ConfigurationError } from '@/lib/errors';
import type { RAGResponse, RetrievalParams } from '@/types/rag';
import { createMockLogger, loggedEvents, MemoryBackend, type MockLogger } from './helpers';

// =============================================================================
// Test Setup
// =============================================================================

const params: RetrievalParams = {
  embeddingsModel: 'text-embedding-3-small',
  topK: 3,
  similarityThreshold: 0.7,
};

const sampleResponse: RAGResponse = {
  answer: 'AI stands for Artificial Intelligence [1].',
  sources: ['ai-overview.md'],
  status: 'success',
  confidence: 1,
  retrievedChunks: 3,
  processingMs: 120,
};

let backend: MemoryBackend;
let log: MockLogger;
let clock: number;

function createCache(overrides: Partial<ConstructorParameters<typeof RAGQueryCache>[0]> = {}): RAGQueryCache {
  return new RAGQueryCache({ backend, now: () => clock, logger: log, ...overrides });
}

describe('RAGQueryCache', () => {
  beforeEach(() => {
    backend = new MemoryBackend('memory');
    log = createMockLogger();
    clock = 1_700_000_000_000;
  });

  // ===========================================================================
  // Round Trip
  // ===========================================================================

  describe('store and lookup', () => {
    it('returns the stored response on the next lookup', async () => {
      const cache = createCache();

      expect(await cache.store('What is AI?', params, sampleResponse)).toBe(true);
      expect(await cache.lookup('What is AI?', params)).toEqual(sampleResponse);
    });

    it('hits for an equivalent phrasing of the question', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);

      expect(await cache.lookup('  what is   ai ', params)).toEqual(sampleResponse);
    });

    it('misses when a retrieval parameter differs', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);

      expect(await cache.lookup('What is AI?', { ...params, topK: 5 })).toBeNull();
    });

    it('stores the payload with cache metadata', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);

      const raw = backend.data.get(cache.deriveKey('What is AI?', params));
      expect(JSON.parse(raw ?? '')).toEqual({
        ...sampleResponse,
        cachedAt: 1_700_000_000_000,
        ttlSeconds: DEFAULT_TTL_SECONDS,
        cacheVersion: CACHE_VERSION,
        originalQuery: 'What is AI?',
      });
    });

    it('keeps the error field of a cached response', async () => {
      const cache = createCache();
      const partial: RAGResponse = { ...sampleResponse, error: 'one source unavailable' };
      await cache.store('What is AI?', params, partial);

      expect(await cache.lookup('What is AI?', params)).toEqual(partial);
    });
  });

  // ===========================================================================
  // Expiry
  // ===========================================================================

  describe('expiry', () => {
    it('serves the entry until the TTL has fully elapsed', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);

      clock += DEFAULT_TTL_SECONDS * 1000;
      expect(await cache.lookup('What is AI?', params)).toEqual(sampleResponse);

      clock += 1;
      expect(await cache.lookup('What is AI?', params)).toBeNull();
    });

    it('honours a per-call TTL', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse, 60);

      clock += 60_001;
      expect(await cache.lookup('What is AI?', params)).toBeNull();
    });

    it('answers the sigmoid question until its TTL expires', async () => {
      const cache = createCache();
      const sigmoidParams: RetrievalParams = { embeddingsModel: 'm1', topK: 3, similarityThreshold: 0.7 };
      const question = 'O que é a função Sigmoid?';
      const response: RAGResponse = {
        ...sampleResponse,
        answer: 'A função sigmoid mapeia qualquer número real para o intervalo (0, 1) [1].',
        sources: ['activation-functions.md'],
      };

      await cache.store(question, sigmoidParams, response, 3600);

      expect(backend.data.has('rag:qa:f8cbc53cadc9b6cf57b52038057f7a9d')).toBe(true);
      expect(await cache.lookup(question, sigmoidParams)).toEqual(response);

      clock += 3600 * 1000 + 1;
      expect(await cache.lookup(question, sigmoidParams)).toBeNull();
    });
  });

  // ===========================================================================
  // Corrupt and Stale Entries
  // ===========================================================================

  describe('corrupt and stale entries', () => {
    it('treats invalid JSON as a miss and lets the next store overwrite it', async () => {
      const cache = createCache();
      const key = cache.deriveKey('What is AI?', params);
      backend.data.set(key, '{not json');

      expect(await cache.lookup('What is AI?', params)).toBeNull();
      expect(loggedEvents(log.warn)).toContain('cache_corrupted');
      expect(backend.data.get(key)).toBe('{not json');

      await cache.store('What is AI?', params, sampleResponse);
      expect(await cache.lookup('What is AI?', params)).toEqual(sampleResponse);
    });

    it('treats a payload of the wrong shape as a miss', async () => {
      const cache = createCache();
      backend.data.set(cache.deriveKey('What is AI?', params), JSON.stringify({ answer: 42 }));

      expect(await cache.lookup('What is AI?', params)).toBeNull();
    });

    it('deletes an entry written by another cache version', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);
      const key = cache.deriveKey('What is AI?', params);
      const stored: Record<string, unknown> = JSON.parse(backend.data.get(key) ?? '');
      backend.data.set(key, JSON.stringify({ ...stored, cacheVersion: '0.9.0' }));

      expect(await cache.lookup('What is AI?', params)).toBeNull();
      expect(backend.data.has(key)).toBe(false);
    });
  });

  // ===========================================================================
  // Validation and Failures
  // ===========================================================================

  describe('validation', () => {
    it('rejects a non-positive default TTL at construction', () => {
      expect(() => createCache({ ttlSeconds: -1 })).toThrow(ConfigurationError);
      expect(() => createCache({ ttlSeconds: -1 })).toThrow(
        'Cache TTL must be a positive integer number of seconds, got -1'
      );
    });

    it('refuses to store with an invalid per-call TTL', async () => {
      const cache = createCache();

      expect(await cache.store('What is AI?', params, sampleResponse, 0)).toBe(false);
      expect(await cache.store('What is AI?', params, sampleResponse, 1.5)).toBe(false);

      expect(backend.count('set')).toBe(0);
      expect(loggedEvents(log.warn)).toEqual(['cache_invalid_ttl', 'cache_invalid_ttl']);
      expect(cache.getStats().storeFailures).toBe(2);
    });

    it('absorbs backend errors', async () => {
      const cache = createCache();
      backend.failing = true;

      expect(await cache.lookup('What is AI?', params)).toBeNull();
      expect(await cache.store('What is AI?', params, sampleResponse)).toBe(false);
      expect(loggedEvents(log.error)).toEqual(['cache_get_error', 'cache_set_error']);
    });

    it('does nothing when disabled', async () => {
      const cache = createCache({ enabled: false });

      expect(cache.isEnabled()).toBe(false);
      expect(await cache.store('What is AI?', params, sampleResponse)).toBe(false);
      expect(await cache.lookup('What is AI?', params)).toBeNull();
      expect(backend.calls).toEqual([]);
    });
  });

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  describe('maintenance', () => {
    it('invalidates a single question', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);
      await cache.store('What is ML?', params, sampleResponse);

      expect(await cache.invalidate('what is ai', params)).toBe(true);

      expect(await cache.lookup('What is AI?', params)).toBeNull();
      expect(await cache.lookup('What is ML?', params)).toEqual(sampleResponse);
    });

    it('clears only keys under its prefix', async () => {
      const cache = createCache();
      await cache.store('What is AI?', params, sampleResponse);
      await cache.store('What is ML?', params, sampleResponse);
      backend.data.set('sessions:1', 'kept');

      expect(await cache.clear()).toBe(2);
      expect(backend.data.get('sessions:1')).toBe('kept');
    });

    it('counts hits, misses and stores', async () => {
      const cache = createCache();
      await cache.lookup('What is AI?', params);
      await cache.store('What is AI?', params, sampleResponse);
      await cache.lookup('What is AI?', params);
      await cache.lookup('What is AI?', params);

      expect(cache.getStats()).toEqual({ hits: 2, misses: 1, stores: 1, storeFailures: 0 });
    });
  });

  // ===========================================================================
  // Over the failover router
  // ===========================================================================

  describe('with ResilientCache', () => {
    it('keeps answering from the local backend while the remote is down', async () => {
      const remote = new MemoryBackend('redis');
      const local = new MemoryBackend('file');
      const router = await ResilientCache.create({ remote, local, now: () => clock, logger: log });
      const cache = createCache({ backend: router });
      remote.failing = true;

      expect(await cache.store('What is AI?', params, sampleResponse)).toBe(true);
      expect(await cache.lookup('What is AI?', params)).toEqual(sampleResponse);
      expect(local.data.has(cache.deriveKey('What is AI?', params))).toBe(true);
    });

    it('answers a stale-version lookup within the call bound while the remote hangs', async () => {
      const remote = new MemoryBackend('redis');
      const local = new MemoryBackend('file');
      remote.hanging = true;
      const router = await ResilientCache.create({
        remote,
        local,
        operationTimeoutMs: 50,
        now: () => clock,
        logger: log,
      });
      const cache = createCache({ backend: router });
      const key = cache.deriveKey('What is AI?', params);
      local.data.set(
        key,
        JSON.stringify({
          ...sampleResponse,
          cachedAt: clock,
          ttlSeconds: 3600,
          cacheVersion: '0.9.0',
          originalQuery: 'What is AI?',
        })
      );

      const startedAt = Date.now();
      expect(await cache.lookup('What is AI?', params)).toBeNull();

      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(local.data.has(key)).toBe(false);
      expect(router.getState()).toBe(CacheState.LOCAL_ACTIVE);
    });

    it('does not count a cancelled store as a failure', async () => {
      const router = await ResilientCache.create({
        remote: new MemoryBackend('redis'),
        local: new MemoryBackend('file'),
        now: () => clock,
        logger: log,
      });
      const cache = createCache({ backend: router });
      const controller = new AbortController();
      controller.abort();

      expect(await cache.store('What is AI?', params, sampleResponse, undefined, { signal: controller.signal })).toBe(
        false
      );

      expect(cache.getStats().storeFailures).toBe(0);
      expect(loggedEvents(log.debug)).toContain('cache_set_aborted');
    });
  });
});
