/**
 * Check Cache Script
 *
 * Reports which cache backends are reachable and which one is serving traffic.
 *
 * Usage:
 *   npm run cache:check
 */

import { loadAppConfig } from '../src/lib/config/env';
import {
  createLocalFileCache,
  maskRedisUrl,
  RedisCacheBackend,
  ResilientCache,
} from '../src/lib/cache';
import { describeError } from '../src/lib/logger';

async function main() {
  const config = loadAppConfig();
  const local = createLocalFileCache(config.cache);

  console.log('Cache configuration:');
  console.log(`  enabled:   ${config.cache.enabled}`);
  console.log(`  backend:   ${config.cache.backend}`);
  console.log(`  ttl:       ${config.cache.ttlSeconds}s`);
  console.log(`  file:      ${local.filePath}`);

  if (config.cache.backend === 'file') {
    const available = await local.isAvailable();
    console.log(`\n${available ? '✓' : '✗'} Local file cache ${available ? 'writable' : 'NOT writable'}`);
    await local.close();
    process.exitCode = available ? 0 : 1;
    return;
  }

  const { redis } = config.cache;
  console.log(
    `  redis:     ${redis.url ? maskRedisUrl(redis.url) : `redis://${redis.host}:${redis.port}/${redis.database}`}`
  );

  const cache = await ResilientCache.create({
    remote: new RedisCacheBackend(redis),
    local,
    operationTimeoutMs: config.cache.operationTimeoutMs,
    reprobeIntervalMs: config.cache.reprobeIntervalMs,
  });

  try {
    const localAvailable = await local.isAvailable();
    const state = cache.getState();

    console.log(`\n${state === 'remote_active' ? '✓' : '✗'} Redis ${state === 'remote_active' ? 'reachable' : 'unreachable'}`);
    console.log(`${localAvailable ? '✓' : '✗'} Local file cache ${localAvailable ? 'writable' : 'NOT writable'}`);
    console.log(`\nActive state: ${state}`);

    process.exitCode = state === 'remote_active' || localAvailable ? 0 : 1;
  } finally {
    await cache.close();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', describeError(error));
  process.exit(1);
});
