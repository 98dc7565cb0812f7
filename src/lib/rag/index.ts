/**
 * RAG module exports and service wiring.
 */

import type { AppConfig } from '@/lib/config/env';
import { createRAGQueryCache, type CacheFactoryOptions } from '@/lib/cache/factory';
import { createOpenAIAdapter } from '@/lib/llm';
import { InMemoryVectorIndex } from './retrieval';
import { RAGService } from './service';

export * from './config';
export { chunkText, chunkDocument, type ChunkOptions, type DocumentChunk } from './chunker';
export {
  InMemoryVectorIndex,
  cosineSimilarity,
  INDEX_FILE_VERSION,
  type DocumentIndex,
  type Embedder,
  type Retriever,
  type RetrieveOptions,
} from './retrieval';
export {
  RAGService,
  uniqueSources,
  type GenerationOptions,
  type QueryOptions,
  type RAGServiceOptions,
  type RAGServiceStats,
} from './service';

/**
 * Build a RAGService from application configuration: OpenAI adapter,
 * in-memory index and the configured cache stack.
 */
export async function createRAGService(
  config: AppConfig,
  options: CacheFactoryOptions = {}
): Promise<RAGService> {
  const llm = createOpenAIAdapter(config.llm, config.retrieval.embeddingsModel);
  const index = new InMemoryVectorIndex({ embedder: llm, config: config.retrieval });
  const cache = await createRAGQueryCache(config.cache, options);

  return new RAGService({
    cache,
    index,
    llm,
    params: {
      embeddingsModel: config.retrieval.embeddingsModel,
      topK: config.retrieval.topK,
      similarityThreshold: config.retrieval.similarityThreshold,
    },
    generation: { model: config.llm.model },
    now: options.now,
    logger: options.logger,
  });
}
