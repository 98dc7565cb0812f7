/**
 * RAG Service
 *
 * Orchestrates the complete RAG pipeline:
 * 1. Return a cached answer when one exists
 * 2. Retrieve relevant passages from the index
 * 3. Generate a response with the LLM
 * 4. Cache the successful response
 */

import { createLayerLogger, describeError, Timer, truncateText, type LogSink } from '@/lib/logger';
import type { RAGQueryCache } from '@/lib/cache/rag-cache';
import type { Clock } from '@/lib/cache/types';
import type { LLMAdapter, LLMCompletionOptions } from '@/types/llm';
import type { RAGResponse, RetrievalParams, RetrievedPassage, SourceDocument } from '@/types/rag';
import { buildRAGSystemPrompt, buildRAGUserPrompt } from '@/lib/llm/prompts';
import type { DocumentIndex } from './retrieval';
import {
  DEFAULT_RAG_MAX_TOKENS,
  DEFAULT_RAG_TEMPERATURE,
  ERROR_ANSWER,
  NO_RESULTS_ANSWER,
} from './config';

// =============================================================================
// Types
// =============================================================================

export interface QueryOptions {
  /** Overrides the cache's default TTL for this answer */
  ttlSeconds?: number;
  /** Cancels cache calls and model requests */
  signal?: AbortSignal;
}

export interface RAGServiceStats {
  totalQueries: number;
  cacheHits: number;
  avgResponseMs: number;
}

export type GenerationOptions = Pick<LLMCompletionOptions, 'model' | 'temperature' | 'maxTokens'>;

export interface RAGServiceOptions {
  cache: RAGQueryCache;
  index: DocumentIndex;
  llm: Pick<LLMAdapter, 'complete'>;
  /** Must match the parameters the index retrieves with; they key the cache */
  params: RetrievalParams;
  generation?: GenerationOptions;
  now?: Clock;
  logger?: LogSink;
}

// =============================================================================
// RAG Service
// =============================================================================

export class RAGService {
  private readonly cache: RAGQueryCache;
  private readonly index: DocumentIndex;
  private readonly llm: Pick<LLMAdapter, 'complete'>;
  private readonly params: RetrievalParams;
  private readonly generation: GenerationOptions;
  private readonly now: Clock;
  private readonly log: LogSink;

  private totalQueries = 0;
  private cacheHits = 0;
  private totalResponseMs = 0;

  constructor(options: RAGServiceOptions) {
    this.cache = options.cache;
    this.index = options.index;
    this.llm = options.llm;
    this.params = { ...options.params };
    this.generation = {
      temperature: DEFAULT_RAG_TEMPERATURE,
      maxTokens: DEFAULT_RAG_MAX_TOKENS,
      ...options.generation,
    };
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLayerLogger('rag', 'RAGService');
  }

  /**
   * Answer a question. Never throws: pipeline failures come back as a
   * response with status 'error', which is not cached.
   */
  async query(question: string, options: QueryOptions = {}): Promise<RAGResponse> {
    const timer = new Timer(this.now);
    this.totalQueries++;

    if (!question.trim()) {
      return this.finish(this.errorResponse('Question must not be empty', timer.elapsed()));
    }

    const cacheOptions = { signal: options.signal };

    // 1. Check cache for existing response
    const cached = await this.cache.lookup(question, this.params, cacheOptions);
    if (cached) {
      this.cacheHits++;
      this.log.info(
        { event: 'rag_cache_hit', query: truncateText(question), duration_ms: timer.elapsed() },
        'Returning cached RAG response'
      );
      return this.finish(cached, timer.elapsed());
    }

    try {
      // 2. Retrieve passages
      timer.mark('retrieval');
      const passages = await this.index.retrieve(question, cacheOptions);
      timer.measure('retrieval');

      if (passages.length === 0) {
        this.log.info(
          { event: 'rag_no_results', query: truncateText(question), ...timer.getAllDurations() },
          'No passages above the similarity threshold'
        );
        return this.finish({
          answer: NO_RESULTS_ANSWER,
          sources: [],
          status: 'no_results',
          confidence: 0,
          retrievedChunks: 0,
          processingMs: timer.elapsed(),
        });
      }

      // 3. Generate
      timer.mark('llm');
      const completion = await this.llm.complete(
        [
          { role: 'system', content: buildRAGSystemPrompt() },
          { role: 'user', content: buildRAGUserPrompt(question, passages) },
        ],
        { ...this.generation, signal: options.signal }
      );
      timer.measure('llm');

      const response: RAGResponse = {
        answer: completion.content.trim(),
        sources: uniqueSources(passages),
        status: 'success',
        confidence: Math.min(1, passages.length / this.params.topK),
        retrievedChunks: passages.length,
        processingMs: timer.elapsed(),
      };

      // 4. Cache
      await this.cache.store(question, this.params, response, options.ttlSeconds, cacheOptions);

      this.log.info(
        {
          event: 'rag_complete',
          retrievedChunks: response.retrievedChunks,
          confidence: response.confidence,
          tokens: completion.usage.totalTokens,
          ...timer.getAllDurations(),
          total_ms: response.processingMs,
        },
        'RAG query complete'
      );

      return this.finish(response);
    } catch (error) {
      this.log.error(
        { event: 'rag_error', query: truncateText(question), error: describeError(error) },
        'RAG pipeline failed'
      );
      return this.finish(this.errorResponse(describeError(error), timer.elapsed()));
    }
  }

  /**
   * Index new documents. Cached answers were built without them, so the
   * response cache is cleared whenever any chunk is added.
   *
   * @returns Number of chunks added
   */
  async addDocuments(documents: SourceDocument[], options: QueryOptions = {}): Promise<number> {
    const added = await this.index.addDocuments(documents, { signal: options.signal });
    if (added > 0) {
      await this.cache.clear();
    }
    return added;
  }

  async saveIndex(filePath: string): Promise<void> {
    await this.index.save(filePath);
  }

  /**
   * Restore a saved index. The loaded documents replace the current ones,
   * so cached answers are cleared.
   *
   * @returns Number of chunks loaded
   */
  async loadIndex(filePath: string): Promise<number> {
    const loaded = await this.index.load(filePath);
    await this.cache.clear();
    return loaded;
  }

  getStats(): RAGServiceStats {
    return {
      totalQueries: this.totalQueries,
      cacheHits: this.cacheHits,
      avgResponseMs: this.totalQueries === 0 ? 0 : this.totalResponseMs / this.totalQueries,
    };
  }

  getParams(): RetrievalParams {
    return { ...this.params };
  }

  async close(): Promise<void> {
    await this.cache.close();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private finish(response: RAGResponse, elapsedMs: number = response.processingMs): RAGResponse {
    this.totalResponseMs += elapsedMs;
    return response;
  }

  private errorResponse(message: string, processingMs: number): RAGResponse {
    return {
      answer: ERROR_ANSWER,
      sources: [],
      status: 'error',
      confidence: 0,
      retrievedChunks: 0,
      processingMs,
      error: message,
    };
  }
}

/**
 * Sources in retrieval order, each listed once.
 */
export function uniqueSources(passages: RetrievedPassage[]): string[] {
  return [...new Set(passages.map((passage) => passage.source))];
}
