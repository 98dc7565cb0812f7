/**
 * Cache Module
 *
 * Response caching for the RAG pipeline: Redis first, local file fallback.
 */

// Cache key utilities
export {
  normalizeQuestion,
  serializeKeyParams,
  deriveCacheKey,
  DEFAULT_KEY_PREFIX,
  HASH_LENGTH,
} from './cache-key';

// Backends
export type { CacheBackend, CacheCallOptions, CacheEntry, Clock } from './types';
export { isExpired, isValidTtl } from './types';
export {
  RedisCacheBackend,
  maskRedisUrl,
  reconnectDelay,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  MAX_RECONNECT_DELAY_MS,
  RECONNECT_BACKOFF_BASE_MS,
  type RedisCacheOptions,
} from './redis-cache';
export { LocalFileCache, DEFAULT_NAMESPACE, type LocalFileCacheOptions } from './file-cache';
export {
  ResilientCache,
  CacheState,
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_REPROBE_INTERVAL_MS,
  MAINTENANCE_TIMEOUT_MS,
  type ResilientCacheOptions,
} from './resilient-cache';
export { BoundedCache, type BoundedCacheOptions } from './bounded-cache';
export { withTimeout } from './timeout';

// RAG query cache
export {
  RAGQueryCache,
  CACHE_VERSION,
  DEFAULT_TTL_SECONDS,
  type RAGCacheConfig,
  type RAGCacheStats,
  type RAGQueryCacheOptions,
} from './rag-cache';

// Construction
export {
  createCacheBackend,
  createLocalFileCache,
  createRAGQueryCache,
  type CacheFactoryOptions,
} from './factory';
