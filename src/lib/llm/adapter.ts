/**
 * Base LLM adapter class.
 */

import type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
} from '@/types/llm';
import { DEFAULT_EMBEDDINGS_MODEL, DEFAULT_LLM_MODEL } from '@/lib/rag/config';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses implement complete() and embed(); embedBatch() falls back
 * to one embed() per text unless the provider batches natively.
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected defaultEmbeddingModel: string;
  protected baseUrl?: string;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? DEFAULT_LLM_MODEL;
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? DEFAULT_EMBEDDINGS_MODEL;
    this.baseUrl = config.baseUrl;
  }

  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse>;

  abstract embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse>;

  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse[]> {
    return Promise.all(texts.map(text => this.embed(text, options)));
  }
}

// Re-export types for convenience
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
};
