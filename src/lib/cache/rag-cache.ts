/**
 * RAG Query Cache
 *
 * Caches full Q&A responses to reduce LLM API costs
 * and improve response latency for repeated questions.
 *
 * Features:
 * - Keys derived from the normalized question and retrieval parameters
 * - Configurable default TTL with per-call override
 * - Cache version tracking for schema migrations
 * - Corrupted or expired entries read as misses
 * - Cache errors logged, never thrown to the query path
 */

import { z } from 'zod';
import { createLayerLogger, describeError, truncateText, type LogSink } from '@/lib/logger';
import { ConfigurationError } from '@/lib/errors';
import type { RAGResponse, RetrievalParams } from '@/types/rag';
import { deriveCacheKey, DEFAULT_KEY_PREFIX } from './cache-key';
import { isExpired, isValidTtl, type CacheBackend, type CacheCallOptions, type Clock } from './types';

// =============================================================================
// Constants
// =============================================================================

/**
 * Cache version - increment when response structure changes.
 * This ensures stale cached data with incompatible structure is invalidated.
 */
export const CACHE_VERSION = '1.0.0';

/**
 * Default TTL: 1 hour
 */
export const DEFAULT_TTL_SECONDS = 3600;

// =============================================================================
// Types
// =============================================================================

const cachedResponseSchema = z.object({
  answer: z.string(),
  sources: z.array(z.string()),
  status: z.enum(['success', 'no_results', 'error']),
  confidence: z.number(),
  retrievedChunks: z.number().int().nonnegative(),
  processingMs: z.number().nonnegative(),
  error: z.string().optional(),
  cachedAt: z.number(),
  ttlSeconds: z.number().int().positive(),
  cacheVersion: z.string(),
  originalQuery: z.string(),
});

/**
 * Cached RAG response with metadata.
 */
type CachedRAGResponse = z.infer<typeof cachedResponseSchema>;

/**
 * Cache configuration.
 */
export interface RAGCacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  keyPrefix: string;
}

export interface RAGCacheStats {
  hits: number;
  misses: number;
  stores: number;
  storeFailures: number;
}

export interface RAGQueryCacheOptions extends Partial<RAGCacheConfig> {
  /** ResilientCache in redis mode, BoundedCache over LocalFileCache in file mode */
  backend: CacheBackend;
  now?: Clock;
  logger?: LogSink;
}

// =============================================================================
// RAG Query Cache
// =============================================================================

export class RAGQueryCache {
  private readonly config: RAGCacheConfig;
  private readonly backend: CacheBackend;
  private readonly now: Clock;
  private readonly log: LogSink;
  private readonly stats: RAGCacheStats = { hits: 0, misses: 0, stores: 0, storeFailures: 0 };

  constructor(options: RAGQueryCacheOptions) {
    this.config = {
      enabled: options.enabled ?? true,
      ttlSeconds: options.ttlSeconds ?? DEFAULT_TTL_SECONDS,
      keyPrefix: options.keyPrefix ?? DEFAULT_KEY_PREFIX,
    };

    if (!isValidTtl(this.config.ttlSeconds)) {
      throw new ConfigurationError(
        `Cache TTL must be a positive integer number of seconds, got ${this.config.ttlSeconds}`
      );
    }

    this.backend = options.backend;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLayerLogger('cache', 'RAGQueryCache');
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  deriveKey(query: string, params: RetrievalParams): string {
    return deriveCacheKey(query, params, this.config.keyPrefix);
  }

  /**
   * Attempt to get a cached response.
   * Returns null on miss, expiry, version mismatch, corruption, or cache failure.
   */
  async lookup(
    query: string,
    params: RetrievalParams,
    options?: CacheCallOptions
  ): Promise<RAGResponse | null> {
    if (!this.config.enabled) {
      return null;
    }

    const startTime = this.now();
    const cacheKey = this.deriveKey(query, params);

    let raw: string | null;
    try {
      raw = await this.backend.get(cacheKey, options);
    } catch (error) {
      this.log.error(
        { event: 'cache_get_error', key: cacheKey, error: describeError(error) },
        'Error reading from cache'
      );
      return this.miss();
    }

    if (raw === null) {
      this.log.debug(
        { event: 'cache_miss', key: cacheKey, duration_ms: this.now() - startTime },
        'Cache miss'
      );
      return this.miss();
    }

    const cached = this.decode(cacheKey, raw);
    if (!cached) {
      return this.miss();
    }

    // Version check - invalidate if schema changed
    if (cached.cacheVersion !== CACHE_VERSION) {
      this.log.debug(
        {
          event: 'cache_version_mismatch',
          key: cacheKey,
          cached: cached.cacheVersion,
          current: CACHE_VERSION,
        },
        'Cache version mismatch, treating as miss'
      );
      await this.invalidateKey(cacheKey);
      return this.miss();
    }

    // Backends expire on their own; this guards against clock skew and late reads
    if (isExpired({ createdAt: cached.cachedAt, ttlSeconds: cached.ttlSeconds }, this.now())) {
      this.log.debug({ event: 'cache_expired', key: cacheKey }, 'Cached response expired');
      return this.miss();
    }

    this.stats.hits++;
    this.log.info(
      { event: 'cache_hit', key: cacheKey, duration_ms: this.now() - startTime },
      'Cache hit'
    );

    return {
      answer: cached.answer,
      sources: cached.sources,
      status: cached.status,
      confidence: cached.confidence,
      retrievedChunks: cached.retrievedChunks,
      processingMs: cached.processingMs,
      ...(cached.error !== undefined && { error: cached.error }),
    };
  }

  /**
   * Store a response in cache.
   * The result is advisory: false means the response was not cached.
   */
  async store(
    query: string,
    params: RetrievalParams,
    response: RAGResponse,
    ttlSeconds: number = this.config.ttlSeconds,
    options?: CacheCallOptions
  ): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }

    if (!isValidTtl(ttlSeconds)) {
      this.log.warn(
        { event: 'cache_invalid_ttl', ttl: ttlSeconds },
        'Refusing to cache with a non-positive or fractional TTL'
      );
      this.stats.storeFailures++;
      return false;
    }

    const cacheKey = this.deriveKey(query, params);
    const cached: CachedRAGResponse = {
      ...response,
      cachedAt: this.now(),
      ttlSeconds,
      cacheVersion: CACHE_VERSION,
      originalQuery: query,
    };

    let stored = false;
    try {
      stored = await this.backend.set(cacheKey, JSON.stringify(cached), ttlSeconds, options);
    } catch (error) {
      this.log.error(
        { event: 'cache_set_error', key: cacheKey, error: describeError(error) },
        'Error writing to cache'
      );
    }

    if (stored) {
      this.stats.stores++;
      this.log.debug(
        { event: 'cache_set', key: cacheKey, ttl: ttlSeconds, query: truncateText(query) },
        'Response cached'
      );
    } else if (options?.signal?.aborted) {
      this.log.debug({ event: 'cache_set_aborted', key: cacheKey }, 'Caching cancelled by caller');
    } else {
      this.stats.storeFailures++;
      this.log.warn({ event: 'cache_set_failed', key: cacheKey }, 'Response was not cached');
    }
    return stored;
  }

  /**
   * Drop the cached answer for one question.
   */
  async invalidate(query: string, params: RetrievalParams): Promise<boolean> {
    return this.invalidateKey(this.deriveKey(query, params));
  }

  /**
   * Remove every cached response under this cache's key prefix.
   * Call when documents are added or removed.
   *
   * @returns Number of entries deleted
   */
  async clear(): Promise<number> {
    try {
      const deleted = await this.backend.clear(this.config.keyPrefix);
      this.log.info(
        { event: 'cache_cleared', prefix: this.config.keyPrefix, deleted },
        `Cleared ${deleted} cached responses`
      );
      return deleted;
    } catch (error) {
      this.log.error(
        { event: 'cache_clear_error', error: describeError(error) },
        'Error clearing cache'
      );
      return 0;
    }
  }

  getStats(): RAGCacheStats {
    return { ...this.stats };
  }

  getConfig(): RAGCacheConfig {
    return { ...this.config };
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private miss(): null {
    this.stats.misses++;
    return null;
  }

  private decode(cacheKey: string, raw: string): CachedRAGResponse | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn(
        { event: 'cache_corrupted', key: cacheKey, error: describeError(error) },
        'Cached entry is not valid JSON, treating as miss'
      );
      return null;
    }

    const result = cachedResponseSchema.safeParse(parsed);
    if (!result.success) {
      this.log.warn(
        { event: 'cache_corrupted', key: cacheKey, issues: result.error.issues.length },
        'Cached entry has an unexpected shape, treating as miss'
      );
      return null;
    }
    return result.data;
  }

  private async invalidateKey(cacheKey: string): Promise<boolean> {
    try {
      return await this.backend.delete(cacheKey);
    } catch (error) {
      this.log.error(
        { event: 'cache_invalidate_error', key: cacheKey, error: describeError(error) },
        'Error invalidating cache entry'
      );
      return false;
    }
  }
}
