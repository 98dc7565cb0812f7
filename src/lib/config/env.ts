/**
 * Application Configuration
 *
 * Reads and validates environment variables once at startup.
 * Any invalid value is a ConfigurationError listing every offending variable.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { createLayerLogger } from '@/lib/logger';
import type { RetrievalConfig } from '@/types/rag';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_EMBEDDINGS_MODEL,
  DEFAULT_LLM_MODEL,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_TOP_K,
} from '@/lib/rag/config';
import { DEFAULT_NAMESPACE } from '@/lib/cache/file-cache';
import { DEFAULT_TTL_SECONDS } from '@/lib/cache/rag-cache';
import {
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_REPROBE_INTERVAL_MS,
} from '@/lib/cache/resilient-cache';

// =============================================================================
// Types
// =============================================================================

export type CacheBackendKind = 'redis' | 'file';

export interface RedisConnectionConfig {
  url?: string;
  host: string;
  port: number;
  password?: string;
  database: number;
  keyPrefix: string;
}

export interface CacheConfig {
  enabled: boolean;
  backend: CacheBackendKind;
  directory: string;
  namespace: string;
  ttlSeconds: number;
  operationTimeoutMs: number;
  reprobeIntervalMs: number;
  redis: RedisConnectionConfig;
}

export interface LLMConfig {
  model: string;
  apiKey?: string;
}

export interface AppConfig {
  cache: CacheConfig;
  retrieval: RetrievalConfig;
  llm: LLMConfig;
}

// =============================================================================
// Schema
// =============================================================================

const log = createLayerLogger('config', 'AppConfig');

/** Unset and empty variables both fall back to the default */
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const booleanFlag = (defaultValue: boolean) =>
  z.preprocess(
    blankAsUndefined,
    z
      .enum(['true', 'false'])
      .default(defaultValue ? 'true' : 'false')
      .transform((value) => value === 'true')
  );

const positiveInt = (defaultValue: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(defaultValue));

const envSchema = z
  .object({
    CACHE_ENABLED: booleanFlag(true),
    CACHE_BACKEND: z.preprocess(blankAsUndefined, z.enum(['redis', 'file']).default('redis')),
    CACHE_DIR: z.preprocess(blankAsUndefined, z.string().default('cache/rag')),
    CACHE_NAMESPACE: z.preprocess(
      blankAsUndefined,
      z
        .string()
        .regex(/^[a-zA-Z0-9._-]+$/, 'must be a plain file name')
        .default(DEFAULT_NAMESPACE)
    ),
    CACHE_TTL_SECONDS: positiveInt(DEFAULT_TTL_SECONDS),
    CACHE_OPERATION_TIMEOUT_MS: positiveInt(DEFAULT_OPERATION_TIMEOUT_MS),
    CACHE_REPROBE_INTERVAL_MS: positiveInt(DEFAULT_REPROBE_INTERVAL_MS),

    REDIS_URL: z.preprocess(
      blankAsUndefined,
      z
        .string()
        .regex(/^rediss?:\/\//, 'must start with redis:// or rediss://')
        .optional()
    ),
    REDIS_HOST: z.preprocess(blankAsUndefined, z.string().default('localhost')),
    REDIS_PORT: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(1).max(65535).default(6379)
    ),
    REDIS_PASSWORD: optionalString,
    REDIS_DB: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(0)),
    REDIS_KEY_PREFIX: z.preprocess(blankAsUndefined, z.string().default('')),

    RAG_TOP_K: positiveInt(DEFAULT_TOP_K),
    RAG_SIMILARITY_THRESHOLD: z.preprocess(
      blankAsUndefined,
      z.coerce.number().min(0).max(1).default(DEFAULT_SIMILARITY_THRESHOLD)
    ),
    RAG_CHUNK_SIZE: positiveInt(DEFAULT_CHUNK_SIZE),
    RAG_CHUNK_OVERLAP: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP)
    ),
    EMBEDDINGS_MODEL: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_EMBEDDINGS_MODEL)),

    LLM_MODEL: z.preprocess(blankAsUndefined, z.string().default(DEFAULT_LLM_MODEL)),
    OPENAI_API_KEY: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: 'must be smaller than RAG_CHUNK_SIZE',
      });
    }
  });

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate the environment and build the typed configuration.
 *
 * @throws ConfigurationError when any variable is invalid
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    log.error({ event: 'config_invalid', issues }, 'Invalid configuration');
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const vars = parsed.data;
  const config: AppConfig = {
    cache: {
      enabled: vars.CACHE_ENABLED,
      backend: vars.CACHE_BACKEND,
      directory: vars.CACHE_DIR,
      namespace: vars.CACHE_NAMESPACE,
      ttlSeconds: vars.CACHE_TTL_SECONDS,
      operationTimeoutMs: vars.CACHE_OPERATION_TIMEOUT_MS,
      reprobeIntervalMs: vars.CACHE_REPROBE_INTERVAL_MS,
      redis: {
        url: vars.REDIS_URL,
        host: vars.REDIS_HOST,
        port: vars.REDIS_PORT,
        password: vars.REDIS_PASSWORD,
        database: vars.REDIS_DB,
        keyPrefix: vars.REDIS_KEY_PREFIX,
      },
    },
    retrieval: {
      embeddingsModel: vars.EMBEDDINGS_MODEL,
      topK: vars.RAG_TOP_K,
      similarityThreshold: vars.RAG_SIMILARITY_THRESHOLD,
      chunkSize: vars.RAG_CHUNK_SIZE,
      chunkOverlap: vars.RAG_CHUNK_OVERLAP,
    },
    llm: {
      model: vars.LLM_MODEL,
      apiKey: vars.OPENAI_API_KEY,
    },
  };

  log.debug(
    {
      event: 'config_loaded',
      cacheBackend: config.cache.backend,
      cacheEnabled: config.cache.enabled,
      topK: config.retrieval.topK,
    },
    'Configuration loaded'
  );

  return config;
}
