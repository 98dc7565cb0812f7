/**
 * Cache Key Generation
 *
 * Utilities for generating consistent cache keys from questions.
 * Keys cover the normalized question plus every retrieval parameter
 * that changes the answer, so a config change never serves a stale answer.
 */

import crypto from 'crypto';
import type { RetrievalParams } from '@/types/rag';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_KEY_PREFIX = 'rag:qa:';

/** Length of the SHA-256 hash to use in cache keys (first N hex characters) */
export const HASH_LENGTH = 32;

// =============================================================================
// Question Normalization
// =============================================================================

/**
 * Normalize a question for consistent cache key generation.
 *
 * Steps:
 * 1. Convert to lowercase
 * 2. Collapse whitespace runs to a single space and trim
 * 3. Remove trailing punctuation (?, !, .)
 *
 * This ensures "What is AI?" and "  what   is ai " hit the same cache key.
 */
export function normalizeQuestion(question: string): string {
  return question
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[?!.]+$/g, '')
    .trim();
}

// =============================================================================
// Cache Key Generation
// =============================================================================

/**
 * Stable serialization of the fields that affect the answer.
 * Field order is fixed; extra properties on the input are ignored.
 */
export function serializeKeyParams(params: RetrievalParams): string {
  return [
    `model=${params.embeddingsModel}`,
    `top_k=${params.topK}`,
    `threshold=${params.similarityThreshold}`,
  ].join('|');
}

/**
 * Derive the cache key for a question under a retrieval configuration.
 *
 * Format: {prefix}{hash}
 * Example: rag:qa:a1b2c3d4e5f6...
 *
 * @param question - User's question (will be normalized)
 * @param params - Retrieval parameters (model id, top-k, similarity threshold)
 * @param prefix - Key namespace (default: 'rag:qa:')
 */
export function deriveCacheKey(
  question: string,
  params: RetrievalParams,
  prefix: string = DEFAULT_KEY_PREFIX
): string {
  const material = `${normalizeQuestion(question)}\n${serializeKeyParams(params)}`;
  const hash = crypto.createHash('sha256').update(material).digest('hex').slice(0, HASH_LENGTH);
  return `${prefix}${hash}`;
}
