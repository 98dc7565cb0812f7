/**
 * Local File Cache
 *
 * On-disk CacheBackend used when Redis is unreachable, or on its own when
 * CACHE_BACKEND=file. One JSON file per namespace maps key to
 * { value, createdAt, ttlSeconds }. Expiry is checked on read; expired
 * entries are pruned whenever the file is rewritten.
 *
 * Writes replace the file atomically (temp file + rename) and are
 * serialized per instance.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { createLayerLogger, describeError, type LogSink } from '@/lib/logger';
import { assertNotAborted } from '@/lib/errors';
import { isExpired, type CacheBackend, type CacheCallOptions, type Clock } from './types';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_NAMESPACE = 'rag-cache';

const fileEntrySchema = z.object({
  value: z.string(),
  createdAt: z.number(),
  ttlSeconds: z.number().int().positive(),
});

type FileEntry = z.infer<typeof fileEntrySchema>;

const fileStoreSchema = z.record(z.string(), z.unknown());

// =============================================================================
// Types
// =============================================================================

export interface LocalFileCacheOptions {
  directory: string;
  namespace?: string;
  now?: Clock;
  logger?: LogSink;
}

// =============================================================================
// Local File Cache
// =============================================================================

export class LocalFileCache implements CacheBackend {
  readonly name = 'file';
  readonly filePath: string;

  private readonly directory: string;
  private readonly now: Clock;
  private readonly log: LogSink;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: LocalFileCacheOptions) {
    this.directory = options.directory;
    this.filePath = path.join(options.directory, `${options.namespace ?? DEFAULT_NAMESPACE}.json`);
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLayerLogger('cache', 'LocalFileCache');
  }

  async get(key: string, options?: CacheCallOptions): Promise<string | null> {
    assertNotAborted(options?.signal, this.name, 'get');
    const entries = await this.readEntries();
    const entry = entries.get(key);

    if (!entry || isExpired(entry, this.now())) {
      return null;
    }

    return entry.value;
  }

  async set(
    key: string,
    value: string,
    ttlSeconds: number,
    options?: CacheCallOptions
  ): Promise<boolean> {
    assertNotAborted(options?.signal, this.name, 'set');
    return this.mutate(options?.signal, (entries) => {
      const now = this.now();
      for (const [existingKey, entry] of entries) {
        if (isExpired(entry, now)) {
          entries.delete(existingKey);
        }
      }
      entries.set(key, { value, createdAt: now, ttlSeconds });
      return true;
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.mutate(undefined, (entries) => entries.delete(key));
  }

  async clear(prefix: string): Promise<number> {
    return this.mutate(undefined, (entries) => {
      let removed = 0;
      for (const key of [...entries.keys()]) {
        if (key.startsWith(prefix)) {
          entries.delete(key);
          removed++;
        }
      }
      return removed;
    });
  }

  /**
   * The cache is usable when its directory exists (or can be created) and is writable.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.access(this.directory, fsConstants.W_OK);
      return true;
    } catch (error) {
      this.log.warn(
        { event: 'file_cache_unavailable', directory: this.directory, error: describeError(error) },
        'Local cache directory is not writable'
      );
      return false;
    }
  }

  /**
   * Wait for pending writes to land.
   */
  async close(): Promise<void> {
    await this.writeChain;
  }

  // ===========================================================================
  // File I/O
  // ===========================================================================

  /**
   * Load all well-formed entries. A missing file is an empty cache; an
   * unparseable file or record is skipped and left for the next write to replace.
   */
  private async readEntries(): Promise<Map<string, FileEntry>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn(
        { event: 'file_cache_corrupted', file: this.filePath, error: describeError(error) },
        'Local cache file is not valid JSON, treating as empty'
      );
      return new Map();
    }

    const store = fileStoreSchema.safeParse(parsed);
    if (!store.success) {
      this.log.warn(
        { event: 'file_cache_corrupted', file: this.filePath },
        'Local cache file has an unexpected shape, treating as empty'
      );
      return new Map();
    }

    const entries = new Map<string, FileEntry>();
    for (const [key, value] of Object.entries(store.data)) {
      const entry = fileEntrySchema.safeParse(value);
      if (entry.success) {
        entries.set(key, entry.data);
      } else {
        this.log.debug({ event: 'file_cache_bad_record', key }, 'Skipping malformed cache record');
      }
    }
    return entries;
  }

  private async writeEntries(entries: Map<string, FileEntry>): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    const payload = JSON.stringify(Object.fromEntries(entries), null, 2);

    try {
      await fs.writeFile(tempPath, payload, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Read-modify-write under the instance's write queue. A signal that fires
   * while the write waits in the queue drops it before the file is touched.
   */
  private mutate<T>(
    signal: AbortSignal | undefined,
    update: (entries: Map<string, FileEntry>) => T
  ): Promise<T> {
    const run = async (): Promise<T> => {
      const entries = await this.readEntries();
      assertNotAborted(signal, this.name, 'set');
      const result = update(entries);
      await this.writeEntries(entries);
      return result;
    };

    const next = this.writeChain.then(run);
    // The caller observes failures through `next`; the queue itself keeps going.
    this.writeChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
