/**
 * Flush RAG Cache Script
 *
 * Clears all cached RAG responses from the configured backend
 * (Redis and the local fallback file, or the file alone).
 *
 * Usage:
 *   npm run cache:flush
 */

import { loadAppConfig } from '../src/lib/config/env';
import { createRAGQueryCache } from '../src/lib/cache';
import { describeError } from '../src/lib/logger';

async function main() {
  console.log('Flushing RAG cache...');

  const config = loadAppConfig();
  const cache = await createRAGQueryCache(config.cache);

  try {
    if (!cache.isEnabled()) {
      console.log('Cache is not enabled. Set CACHE_ENABLED=true to use it.');
      return;
    }

    console.log(`Backend: ${config.cache.backend}, scanning for cache entries...`);
    const deleted = await cache.clear();

    if (deleted === 0) {
      console.log('\n✓ Cache is already empty (0 entries)');
    } else {
      console.log(`\n✓ Flushed ${deleted} cached entries`);
    }
  } finally {
    await cache.close();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', describeError(error));
  process.exit(1);
});
