/**
 * Cache Construction
 *
 * Builds the cache stack for the configured backend:
 *   redis -> ResilientCache(RedisCacheBackend, LocalFileCache)
 *   file  -> BoundedCache(LocalFileCache)
 */

import type { CacheConfig } from '@/lib/config/env';
import type { LogSink } from '@/lib/logger';
import { BoundedCache } from './bounded-cache';
import { LocalFileCache } from './file-cache';
import { RAGQueryCache } from './rag-cache';
import { RedisCacheBackend } from './redis-cache';
import { ResilientCache } from './resilient-cache';
import type { CacheBackend, Clock } from './types';

export interface CacheFactoryOptions {
  now?: Clock;
  logger?: LogSink;
}

export function createLocalFileCache(
  config: CacheConfig,
  options: CacheFactoryOptions = {}
): LocalFileCache {
  return new LocalFileCache({
    directory: config.directory,
    namespace: config.namespace,
    now: options.now,
    logger: options.logger,
  });
}

/**
 * Create the backend the query cache talks to.
 * In redis mode the remote is probed once before this resolves.
 */
export async function createCacheBackend(
  config: CacheConfig,
  options: CacheFactoryOptions = {}
): Promise<CacheBackend> {
  const local = createLocalFileCache(config, options);

  if (config.backend === 'file') {
    return new BoundedCache(local, {
      operationTimeoutMs: config.operationTimeoutMs,
      logger: options.logger,
    });
  }

  const remote = new RedisCacheBackend({ ...config.redis, logger: options.logger });
  return ResilientCache.create({
    remote,
    local,
    operationTimeoutMs: config.operationTimeoutMs,
    reprobeIntervalMs: config.reprobeIntervalMs,
    now: options.now,
    logger: options.logger,
  });
}

export async function createRAGQueryCache(
  config: CacheConfig,
  options: CacheFactoryOptions = {}
): Promise<RAGQueryCache> {
  const backend = await createCacheBackend(config, options);
  return new RAGQueryCache({
    backend,
    enabled: config.enabled,
    ttlSeconds: config.ttlSeconds,
    now: options.now,
    logger: options.logger,
  });
}
