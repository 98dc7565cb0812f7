/**
 * Redis Cache Backend
 *
 * Remote CacheBackend over a node-redis client.
 *
 * Features:
 * - Lazy connection on first use
 * - Automatic reconnection with capped linear backoff
 * - Offline queue disabled, so commands fail fast while disconnected
 * - Expiry delegated to Redis (SET ... EX)
 * - Caller's AbortSignal handed to node-redis, so a command not yet sent is dropped
 */

import { commandOptions, createClient } from 'redis';
import { createLayerLogger, describeError, type LogSink } from '@/lib/logger';
import { assertNotAborted } from '@/lib/errors';
import { withTimeout } from './timeout';
import type { CacheBackend, CacheCallOptions } from './types';

// =============================================================================
// Constants
// =============================================================================

/** Default timeout for establishing Redis connection (ms) */
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/** Upper bound for a standalone availability probe (ms) */
export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

/** Maximum delay between reconnection attempts (ms) */
export const MAX_RECONNECT_DELAY_MS = 30000;

/** Base delay multiplier for reconnection backoff (ms) */
export const RECONNECT_BACKOFF_BASE_MS = 100;

/** Number of keys to scan per iteration when clearing a prefix */
const SCAN_BATCH_SIZE = 100;

// =============================================================================
// Types
// =============================================================================

type RedisClient = ReturnType<typeof createClient>;

export interface RedisCacheOptions {
  /** Full connection URL; takes precedence over host/port/password/database */
  url?: string;
  host: string;
  port: number;
  password?: string;
  database: number;
  /** Prepended to every key, for sharing one Redis database between deployments */
  keyPrefix: string;
  connectTimeoutMs?: number;
  probeTimeoutMs?: number;
  logger?: LogSink;
}

/**
 * Backoff used between reconnection attempts.
 */
export function reconnectDelay(retries: number): number {
  return Math.min(retries * RECONNECT_BACKOFF_BASE_MS, MAX_RECONNECT_DELAY_MS);
}

/**
 * Mask Redis URL for logging (hide password if present).
 */
export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '****';
    }
    return parsed.toString();
  } catch {
    return 'invalid-url';
  }
}

// =============================================================================
// Redis Cache Backend
// =============================================================================

export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  private client: RedisClient | null = null;
  private connecting: Promise<RedisClient> | null = null;
  private readonly log: LogSink;

  constructor(private readonly options: RedisCacheOptions) {
    this.log = options.logger ?? createLayerLogger('cache', 'RedisCache');
  }

  private fullKey(key: string): string {
    return `${this.options.keyPrefix}${key}`;
  }

  private describeTarget(): string {
    return this.options.url
      ? maskRedisUrl(this.options.url)
      : `redis://${this.options.host}:${this.options.port}/${this.options.database}`;
  }

  /**
   * Get the connected client, connecting on first use.
   * Concurrent callers share one pending connection.
   */
  private async getClient(): Promise<RedisClient> {
    if (this.client?.isReady) {
      return this.client;
    }

    if (!this.connecting) {
      this.connecting = this.connect().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }

    return this.connecting;
  }

  private async connect(): Promise<RedisClient> {
    this.log.info({ event: 'redis_connecting', target: this.describeTarget() }, 'Connecting to Redis');

    const client = createClient({
      url: this.options.url,
      password: this.options.password,
      database: this.options.database,
      disableOfflineQueue: true,
      socket: {
        host: this.options.host,
        port: this.options.port,
        connectTimeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        reconnectStrategy: (retries: number) => {
          const delay = reconnectDelay(retries);
          this.log.debug(
            { event: 'redis_reconnect', retries, delay_ms: delay },
            `Reconnecting to Redis in ${delay}ms`
          );
          return delay;
        },
      },
    });

    client.on('error', (error: unknown) => {
      this.log.error({ event: 'redis_error', error: describeError(error) }, 'Redis client error');
    });

    client.on('reconnecting', () => {
      this.log.info({ event: 'redis_reconnecting' }, 'Redis client reconnecting');
    });

    client.on('ready', () => {
      this.log.info({ event: 'redis_ready' }, 'Redis client ready');
    });

    client.on('end', () => {
      this.log.info({ event: 'redis_disconnected' }, 'Redis client disconnected');
      if (this.client === client) {
        this.client = null;
        this.connecting = null;
      }
    });

    this.client = client;

    try {
      await client.connect();
    } catch (error) {
      this.log.error(
        { event: 'redis_connect_error', error: describeError(error) },
        'Failed to connect to Redis'
      );
      if (this.client === client) {
        this.client = null;
      }
      throw error;
    }

    this.log.info({ event: 'redis_connected' }, 'Redis client connected');
    return client;
  }

  async get(key: string, options?: CacheCallOptions): Promise<string | null> {
    assertNotAborted(options?.signal, this.name, 'get');
    const client = await this.getClient();
    return client.get(commandOptions({ signal: options?.signal }), this.fullKey(key));
  }

  async set(
    key: string,
    value: string,
    ttlSeconds: number,
    options?: CacheCallOptions
  ): Promise<boolean> {
    assertNotAborted(options?.signal, this.name, 'set');
    const client = await this.getClient();
    assertNotAborted(options?.signal, this.name, 'set');
    const result = await client.set(commandOptions({ signal: options?.signal }), this.fullKey(key), value, {
      EX: ttlSeconds,
    });
    return result === 'OK';
  }

  async delete(key: string): Promise<boolean> {
    const client = await this.getClient();
    const removed = await client.del(this.fullKey(key));
    return removed > 0;
  }

  /**
   * Delete every key under the prefix.
   * Uses SCAN (safer than KEYS for large datasets).
   */
  async clear(prefix: string): Promise<number> {
    const client = await this.getClient();
    const pattern = `${this.fullKey(prefix)}*`;

    let deletedCount = 0;
    let batch: string[] = [];

    for await (const key of client.scanIterator({ MATCH: pattern, COUNT: SCAN_BATCH_SIZE })) {
      batch.push(key);
      if (batch.length >= SCAN_BATCH_SIZE) {
        deletedCount += await client.del(batch);
        batch = [];
      }
    }

    if (batch.length > 0) {
      deletedCount += await client.del(batch);
    }

    this.log.info({ event: 'redis_cleared', pattern, deleted: deletedCount }, 'Cleared Redis cache keys');
    return deletedCount;
  }

  /**
   * Ping Redis. Resolves false on any connectivity problem.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const reply = await withTimeout(
        async () => {
          const client = await this.getClient();
          return client.ping();
        },
        {
          backend: this.name,
          operation: 'ping',
          timeoutMs: this.options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
        }
      );
      return reply === 'PONG';
    } catch (error) {
      this.log.debug({ event: 'redis_ping_failed', error: describeError(error) }, 'Redis ping failed');
      return false;
    }
  }

  /**
   * Close the Redis connection.
   * Call during application shutdown.
   */
  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;

    if (!client?.isOpen) {
      return;
    }

    try {
      if (client.isReady) {
        await client.quit();
      } else {
        await client.disconnect();
      }
      this.log.info({ event: 'redis_closed' }, 'Redis connection closed gracefully');
    } catch (error) {
      this.log.error(
        { event: 'redis_close_error', error: describeError(error) },
        'Error closing Redis connection'
      );
    }
  }
}
