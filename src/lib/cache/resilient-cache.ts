/**
 * Resilient Cache
 *
 * Routes cache calls to Redis while it is healthy and to the local file
 * cache while it is not. Two states:
 *
 *   remote_active --(remote get/set fails or times out)--> local_active
 *   local_active  --(re-probe succeeds, or remote serves a retry)--> remote_active
 *
 * A failed call is retried once on the other backend inside the same call.
 * When both fail the call degrades to a miss (get) or false (set); cache
 * errors never reach the caller. Writes made while local_active stay local.
 */

import { createLayerLogger, describeError, type LogSink } from '@/lib/logger';
import { CacheAbortedError } from '@/lib/errors';
import { withTimeout } from './timeout';
import type { CacheBackend, CacheCallOptions, Clock } from './types';

// =============================================================================
// Constants
// =============================================================================

export const CacheState = {
  REMOTE_ACTIVE: 'remote_active',
  LOCAL_ACTIVE: 'local_active',
} as const;

export type CacheState = (typeof CacheState)[keyof typeof CacheState];

/** Time budget for a single backend call (ms) */
export const DEFAULT_OPERATION_TIMEOUT_MS = 300;

/** Minimum spacing between remote re-probes while local_active (ms) */
export const DEFAULT_REPROBE_INTERVAL_MS = 30000;

/** Time budget for clear/close, which may scan or flush (ms) */
export const MAINTENANCE_TIMEOUT_MS = 10000;

// =============================================================================
// Types
// =============================================================================

export interface ResilientCacheOptions {
  remote: CacheBackend;
  local: CacheBackend;
  operationTimeoutMs?: number;
  reprobeIntervalMs?: number;
  now?: Clock;
  logger?: LogSink;
}

type Route = 'remote' | 'local';

type Operation = 'get' | 'set';

// =============================================================================
// Resilient Cache
// =============================================================================

export class ResilientCache implements CacheBackend {
  readonly name = 'resilient';

  private readonly remote: CacheBackend;
  private readonly local: CacheBackend;
  private readonly operationTimeoutMs: number;
  private readonly reprobeIntervalMs: number;
  private readonly now: Clock;
  private readonly log: LogSink;

  private state: CacheState = CacheState.LOCAL_ACTIVE;
  private lastProbeAt = Number.NEGATIVE_INFINITY;
  private probeInFlight: Promise<boolean> | null = null;

  constructor(options: ResilientCacheOptions) {
    this.remote = options.remote;
    this.local = options.local;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.reprobeIntervalMs = options.reprobeIntervalMs ?? DEFAULT_REPROBE_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLayerLogger('cache', 'ResilientCache');
  }

  /**
   * Build a cache whose initial state comes from probing the remote backend.
   * The starting state is not a transition and is logged only as cache_initialized.
   */
  static async create(options: ResilientCacheOptions): Promise<ResilientCache> {
    const cache = new ResilientCache(options);
    cache.lastProbeAt = cache.now();
    const available = await cache.checkRemote();
    cache.state = available ? CacheState.REMOTE_ACTIVE : CacheState.LOCAL_ACTIVE;
    cache.log.info(
      { event: 'cache_initialized', state: cache.getState() },
      `Cache routing started in ${cache.getState()}`
    );
    return cache;
  }

  getState(): CacheState {
    return this.state;
  }

  // ===========================================================================
  // State Transitions
  // ===========================================================================

  /**
   * Compare-and-set transition. Only the call that actually moves the state
   * logs it, so each change is reported once however many calls race.
   */
  private transition(from: CacheState, to: CacheState, reason: string, error?: unknown): boolean {
    if (this.state !== from || from === to) {
      return false;
    }

    this.state = to;

    if (to === CacheState.LOCAL_ACTIVE) {
      this.log.warn(
        {
          event: 'cache_failover',
          from,
          to,
          reason,
          ...(error !== undefined && { error: describeError(error) }),
        },
        'Remote cache unavailable, routing to local cache'
      );
    } else {
      this.log.info(
        { event: 'cache_recovered', from, to, reason },
        'Remote cache available again, routing to remote cache'
      );
    }
    return true;
  }

  /**
   * Probe the remote backend and move to the matching state.
   * Concurrent callers share one in-flight probe.
   */
  probeRemote(): Promise<boolean> {
    if (!this.probeInFlight) {
      this.probeInFlight = this.runProbe().finally(() => {
        this.probeInFlight = null;
      });
    }
    return this.probeInFlight;
  }

  private async runProbe(): Promise<boolean> {
    this.lastProbeAt = this.now();
    const available = await this.checkRemote();

    if (available) {
      this.transition(CacheState.LOCAL_ACTIVE, CacheState.REMOTE_ACTIVE, 'probe_succeeded');
    } else {
      this.transition(CacheState.REMOTE_ACTIVE, CacheState.LOCAL_ACTIVE, 'probe_failed');
    }
    return available;
  }

  private async checkRemote(): Promise<boolean> {
    try {
      return await withTimeout(() => this.remote.isAvailable(), {
        backend: this.remote.name,
        operation: 'probe',
        timeoutMs: this.operationTimeoutMs,
      });
    } catch (error) {
      this.log.debug(
        { event: 'cache_probe_failed', error: describeError(error) },
        'Remote cache probe failed'
      );
      return false;
    }
  }

  /**
   * Opportunistic recovery: while local_active, re-probe at most once per interval.
   */
  private async maybeReprobe(): Promise<void> {
    if (this.state !== CacheState.LOCAL_ACTIVE) {
      return;
    }
    if (this.now() - this.lastProbeAt < this.reprobeIntervalMs) {
      return;
    }
    await this.probeRemote();
  }

  // ===========================================================================
  // Routed Operations
  // ===========================================================================

  private backendFor(route: Route): CacheBackend {
    return route === 'remote' ? this.remote : this.local;
  }

  private call<T>(
    route: Route,
    operation: Operation,
    run: (backend: CacheBackend) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const backend = this.backendFor(route);
    return withTimeout(() => run(backend), {
      backend: backend.name,
      operation,
      timeoutMs: this.operationTimeoutMs,
      signal,
    });
  }

  private async execute<T>(
    operation: Operation,
    run: (backend: CacheBackend) => Promise<T>,
    fallback: T,
    signal?: AbortSignal
  ): Promise<T> {
    await this.maybeReprobe();

    const primary: Route = this.state === CacheState.REMOTE_ACTIVE ? 'remote' : 'local';
    const secondary: Route = primary === 'remote' ? 'local' : 'remote';

    try {
      return await this.call(primary, operation, run, signal);
    } catch (error) {
      if (error instanceof CacheAbortedError) {
        this.log.debug({ event: 'cache_aborted', operation }, 'Cache call aborted by caller');
        return fallback;
      }
      this.recordFailure(primary, operation, error);
    }

    try {
      const result = await this.call(secondary, operation, run, signal);
      if (secondary === 'remote') {
        this.transition(CacheState.LOCAL_ACTIVE, CacheState.REMOTE_ACTIVE, `local_${operation}_failed`);
      }
      return result;
    } catch (error) {
      if (error instanceof CacheAbortedError) {
        this.log.debug({ event: 'cache_aborted', operation }, 'Cache call aborted by caller');
        return fallback;
      }
      this.log.error(
        { event: 'cache_unavailable', operation, error: describeError(error) },
        'Both cache backends failed, continuing without cache'
      );
      return fallback;
    }
  }

  private recordFailure(route: Route, operation: Operation, error: unknown): void {
    if (route === 'remote') {
      this.lastProbeAt = this.now();
      this.transition(CacheState.REMOTE_ACTIVE, CacheState.LOCAL_ACTIVE, `remote_${operation}_failed`, error);
      return;
    }

    this.log.warn(
      { event: 'cache_local_error', operation, error: describeError(error) },
      'Local cache call failed, trying remote cache'
    );
  }

  async get(key: string, options?: CacheCallOptions): Promise<string | null> {
    return this.execute('get', (backend) => backend.get(key, options), null, options?.signal);
  }

  async set(
    key: string,
    value: string,
    ttlSeconds: number,
    options?: CacheCallOptions
  ): Promise<boolean> {
    return this.execute(
      'set',
      (backend) => backend.set(key, value, ttlSeconds, options),
      false,
      options?.signal
    );
  }

  // ===========================================================================
  // Maintenance (applied to both backends)
  // ===========================================================================

  /**
   * Remove the key from both backends so a stale local copy cannot resurface.
   * Runs on the query path, so it gets the per-call bound, not the maintenance one.
   */
  async delete(key: string): Promise<boolean> {
    const results = await this.onBoth('delete', (backend) => backend.delete(key), this.operationTimeoutMs);
    return results.some(Boolean);
  }

  async clear(prefix: string): Promise<number> {
    const results = await this.onBoth('clear', (backend) => backend.clear(prefix));
    return results.reduce((total, removed) => total + removed, 0);
  }

  async isAvailable(): Promise<boolean> {
    const results = await this.onBoth('probe', (backend) => backend.isAvailable(), this.operationTimeoutMs);
    return results.some(Boolean);
  }

  async close(): Promise<void> {
    await this.onBoth('close', (backend) => backend.close());
  }

  /**
   * Run on both backends, returning the values of the calls that succeeded.
   */
  private async onBoth<T>(
    operation: string,
    run: (backend: CacheBackend) => Promise<T>,
    timeoutMs: number = MAINTENANCE_TIMEOUT_MS
  ): Promise<T[]> {
    const backends = [this.remote, this.local];
    const settled = await Promise.allSettled(
      backends.map((backend) =>
        withTimeout(() => run(backend), {
          backend: backend.name,
          operation,
          timeoutMs,
        })
      )
    );

    const values: T[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        values.push(result.value);
      } else {
        const backend = backends[index].name;
        this.log.warn(
          { event: 'cache_maintenance_error', operation, backend, error: describeError(result.reason) },
          `Cache ${operation} failed on ${backend}`
        );
      }
    });
    return values;
  }
}
