/**
 * Tests for RAG Service
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { RAGService, uniqueSources } from '../service';
import { createRAGService } from '../index';
import { ERROR_ANSWER, NO_RESULTS_ANSWER } from '../config';
import { RAGQueryCache } from '@/lib/cache/rag-cache';
import { buildRAGSystemPrompt, buildRAGUserPrompt } from '@/lib/llm/prompts';
import { loadAppConfig } from '@/lib/config/env';
import { ConfigurationError } from '@/lib/errors';
import { createMockLogger, MemoryBackend } from '@/lib/cache/__tests__/helpers';
import type { LLMCompletionResponse } from '@/types/llm';
import type { RetrievalParams, RetrievedPassage } from '@/types/rag';

// =============================================================================
// Test Setup
// =============================================================================

const params: RetrievalParams = { embeddingsModel: 'test-model', topK: 3, similarityThreshold: 0.7 };

const passages: RetrievedPassage[] = [
  { content: 'Redis is tried first.', source: 'cache.md', similarity: 0.93 },
  { content: 'The file cache is the fallback.', source: 'cache.md', similarity: 0.88 },
  { content: 'Keys hash the normalized question.', source: 'keys.md', similarity: 0.8 },
];

let clock: number;
let backend: MemoryBackend;
let cache: RAGQueryCache;

function createIndex() {
  return {
    retrieve: vi.fn(async (): Promise<RetrievedPassage[]> => {
      clock += 30;
      return passages;
    }),
    addDocuments: vi.fn(async (): Promise<number> => 2),
    clear: vi.fn(),
    size: vi.fn(() => 0),
    save: vi.fn(async (_filePath: string): Promise<void> => undefined),
    load: vi.fn(async (_filePath: string): Promise<number> => 4),
  };
}

function createLLM() {
  return {
    complete: vi.fn(async (): Promise<LLMCompletionResponse> => {
      clock += 100;
      return {
        content: '  Redis serves answers first [1].  ',
        finishReason: 'stop',
        usage: { promptTokens: 200, completionTokens: 20, totalTokens: 220 },
      };
    }),
  };
}

function createService() {
  const index = createIndex();
  const llm = createLLM();
  const service = new RAGService({
    cache,
    index,
    llm,
    params,
    now: () => clock,
    logger: createMockLogger(),
  });
  return { service, index, llm };
}

describe('RAGService', () => {
  beforeEach(() => {
    clock = 1_700_000_000_000;
    backend = new MemoryBackend('memory');
    cache = new RAGQueryCache({ backend, now: () => clock, logger: createMockLogger() });
  });

  // ===========================================================================
  // query
  // ===========================================================================

  describe('query', () => {
    it('retrieves, generates and caches an answer on a miss', async () => {
      const { service, index, llm } = createService();

      const response = await service.query('How does the cache fail over?');

      expect(response).toEqual({
        answer: 'Redis serves answers first [1].',
        sources: ['cache.md', 'keys.md'],
        status: 'success',
        confidence: 1,
        retrievedChunks: 3,
        processingMs: 130,
      });
      expect(index.retrieve).toHaveBeenCalledWith('How does the cache fail over?', { signal: undefined });
      expect(llm.complete).toHaveBeenCalledWith(
        [
          { role: 'system', content: buildRAGSystemPrompt() },
          { role: 'user', content: buildRAGUserPrompt('How does the cache fail over?', passages) },
        ],
        { temperature: 0.3, maxTokens: 1024, signal: undefined }
      );
      expect(backend.data.has(cache.deriveKey('How does the cache fail over?', params))).toBe(true);
    });

    it('answers a repeated question from the cache', async () => {
      const { service, index, llm } = createService();

      const first = await service.query('How does the cache fail over?');
      const second = await service.query('how does the cache fail over');

      expect(second).toEqual(first);
      expect(index.retrieve).toHaveBeenCalledTimes(1);
      expect(llm.complete).toHaveBeenCalledTimes(1);
    });

    it('runs the pipeline again once the cached answer expires', async () => {
      const { service, index } = createService();

      await service.query('How does the cache fail over?', { ttlSeconds: 60 });
      clock += 60_001;
      await service.query('How does the cache fail over?');

      expect(index.retrieve).toHaveBeenCalledTimes(2);
    });

    it('scales confidence by the passages found', async () => {
      const { service, index } = createService();
      index.retrieve.mockResolvedValueOnce(passages.slice(0, 2));

      const response = await service.query('Which backend is first?');

      expect(response.confidence).toBeCloseTo(2 / 3);
      expect(response.sources).toEqual(['cache.md']);
    });

    it('returns no_results without generating or caching', async () => {
      const { service, index, llm } = createService();
      index.retrieve.mockResolvedValue([]);

      const response = await service.query('What is the capital of Mars?');

      expect(response).toEqual({
        answer: NO_RESULTS_ANSWER,
        sources: [],
        status: 'no_results',
        confidence: 0,
        retrievedChunks: 0,
        processingMs: 0,
      });
      expect(llm.complete).not.toHaveBeenCalled();
      expect(backend.data.size).toBe(0);
    });

    it('returns an uncached error response when the pipeline fails', async () => {
      const { service, llm } = createService();
      llm.complete.mockRejectedValueOnce(new Error('model overloaded'));

      const response = await service.query('How does the cache fail over?');

      expect(response).toEqual({
        answer: ERROR_ANSWER,
        sources: [],
        status: 'error',
        confidence: 0,
        retrievedChunks: 0,
        processingMs: 30,
        error: 'model overloaded',
      });
      expect(backend.data.size).toBe(0);
    });

    it('rejects a blank question without touching the cache', async () => {
      const { service, index } = createService();

      const response = await service.query('   ');

      expect(response.status).toBe('error');
      expect(response.error).toBe('Question must not be empty');
      expect(backend.calls).toEqual([]);
      expect(index.retrieve).not.toHaveBeenCalled();
    });

    it('keeps answering when the cache backend is down', async () => {
      const { service } = createService();
      backend.failing = true;

      const response = await service.query('How does the cache fail over?');

      expect(response.status).toBe('success');
      expect(response.answer).toBe('Redis serves answers first [1].');
    });

    it('forwards the abort signal', async () => {
      const { service, index, llm } = createService();
      const controller = new AbortController();

      await service.query('How does the cache fail over?', { signal: controller.signal });

      expect(index.retrieve).toHaveBeenCalledWith('How does the cache fail over?', { signal: controller.signal });
      expect(llm.complete).toHaveBeenCalledWith(expect.any(Array), expect.objectContaining({ signal: controller.signal }));
    });
  });

  // ===========================================================================
  // Documents and Stats
  // ===========================================================================

  describe('addDocuments', () => {
    it('clears cached answers when chunks are added', async () => {
      const { service, index } = createService();
      await service.query('How does the cache fail over?');

      expect(await service.addDocuments([{ content: 'New runbook.', source: 'runbook.md' }])).toBe(2);

      expect(index.addDocuments).toHaveBeenCalledWith([{ content: 'New runbook.', source: 'runbook.md' }], {
        signal: undefined,
      });
      expect(backend.data.size).toBe(0);
    });

    it('keeps the cache when nothing was indexed', async () => {
      const { service, index } = createService();
      index.addDocuments.mockResolvedValueOnce(0);

      await service.addDocuments([{ content: '   ' }]);

      expect(backend.count('clear')).toBe(0);
    });
  });

  describe('index persistence', () => {
    it('saves the index to the given path', async () => {
      const { service, index } = createService();

      await service.saveIndex('/data/index.json');

      expect(index.save).toHaveBeenCalledWith('/data/index.json');
    });

    it('clears cached answers after loading a saved index', async () => {
      const { service, index } = createService();
      await service.query('How does the cache fail over?');

      expect(await service.loadIndex('/data/index.json')).toBe(4);

      expect(index.load).toHaveBeenCalledWith('/data/index.json');
      expect(backend.data.size).toBe(0);
    });
  });

  describe('getStats', () => {
    it('starts at zero', () => {
      const { service } = createService();

      expect(service.getStats()).toEqual({ totalQueries: 0, cacheHits: 0, avgResponseMs: 0 });
    });

    it('counts every query and averages response time', async () => {
      const { service } = createService();

      await service.query('How does the cache fail over?');
      await service.query('How does the cache fail over?');

      expect(service.getStats()).toEqual({ totalQueries: 2, cacheHits: 1, avgResponseMs: 65 });
    });
  });

  it('exposes the parameters it keys the cache with', () => {
    const { service } = createService();

    expect(service.getParams()).toEqual(params);
  });
});

describe('uniqueSources', () => {
  it('lists each source once in retrieval order', () => {
    expect(uniqueSources(passages)).toEqual(['cache.md', 'keys.md']);
  });
});

describe('createRAGService', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-service-test-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('wires a service from configuration', async () => {
    const config = loadAppConfig({
      CACHE_BACKEND: 'file',
      CACHE_DIR: directory,
      RAG_TOP_K: '4',
      OPENAI_API_KEY: 'test-openai-key',
    });

    const service = await createRAGService(config, { logger: createMockLogger() });

    expect(service.getParams()).toEqual({
      embeddingsModel: 'text-embedding-3-small',
      topK: 4,
      similarityThreshold: 0.7,
    });
    await service.close();
  });

  it('fails fast without an API key', async () => {
    const config = loadAppConfig({ CACHE_BACKEND: 'file', CACHE_DIR: directory });

    await expect(createRAGService(config)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
