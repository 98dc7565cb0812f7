/**
 * Shared fakes for cache tests.
 */

import { vi } from 'vitest';
import type { CacheBackend } from '../types';

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export type MockLogger = ReturnType<typeof createMockLogger>;

/**
 * Events logged through one level of a mock logger, in call order.
 */
export function loggedEvents(level: MockLogger[keyof MockLogger]): string[] {
  return level.mock.calls.map((call) => {
    const fields: unknown = call[0];
    if (typeof fields === 'object' && fields !== null && 'event' in fields) {
      return String(fields.event);
    }
    return '';
  });
}

/**
 * In-process CacheBackend that can be switched to fail or hang.
 * Expiry is not modelled; RAGQueryCache checks it on read.
 */
export class MemoryBackend implements CacheBackend {
  readonly data = new Map<string, string>();
  readonly calls: string[] = [];
  failing = false;
  hanging = false;

  constructor(readonly name: string) {}

  private async enter(operation: string): Promise<void> {
    this.calls.push(operation);
    if (this.hanging) {
      await new Promise<never>(() => undefined);
    }
    if (this.failing) {
      throw new Error(`${this.name} unreachable`);
    }
  }

  async get(key: string): Promise<string | null> {
    await this.enter('get');
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<boolean> {
    await this.enter('set');
    this.data.set(key, value);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    await this.enter('delete');
    return this.data.delete(key);
  }

  async clear(prefix: string): Promise<number> {
    await this.enter('clear');
    let removed = 0;
    for (const key of [...this.data.keys()]) {
      if (key.startsWith(prefix)) {
        this.data.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async isAvailable(): Promise<boolean> {
    this.calls.push('isAvailable');
    return !this.failing && !this.hanging;
  }

  async close(): Promise<void> {
    this.calls.push('close');
  }

  count(operation: string): number {
    return this.calls.filter((call) => call === operation).length;
  }
}
