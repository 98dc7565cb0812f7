/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - gpt-4o-mini (default) or any chat model for completions
 * - text-embedding-3-small (default) or any embeddings model
 * - Batch embeddings (native support)
 */

import OpenAI from 'openai';
import { createLayerLogger } from '@/lib/logger';
import {
  BaseLLMAdapter,
  type LLMAdapterConfig,
  type LLMMessage,
  type LLMCompletionOptions,
  type LLMCompletionResponse,
  type LLMEmbeddingOptions,
  type LLMEmbeddingResponse,
  type FinishReason,
} from './adapter';
import { DEFAULT_RAG_MAX_TOKENS, DEFAULT_RAG_TEMPERATURE } from '@/lib/rag/config';

const log = createLayerLogger('llm', 'OpenAIAdapter');

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super(config);

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
    });
  }

  /**
   * Generate a text completion using OpenAI Chat API.
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMCompletionResponse> {
    const model = options?.model ?? this.defaultModel;
    const response = await this.client.chat.completions.create(
      {
        model,
        messages: messages.map(m => ({
          role: m.role,
          content: m.content,
        })),
        temperature: options?.temperature ?? DEFAULT_RAG_TEMPERATURE,
        max_tokens: options?.maxTokens ?? DEFAULT_RAG_MAX_TOKENS,
      },
      { signal: options?.signal }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new Error(`OpenAI returned no choices for model ${model}`);
    }

    const usage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    log.debug({ event: 'llm_completion', model, ...usage }, 'Completion received');

    return {
      content: choice.message.content ?? '',
      finishReason: this.mapFinishReason(choice.finish_reason),
      usage,
    };
  }

  /**
   * Generate an embedding for a single text.
   */
  async embed(
    text: string,
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse> {
    const [result] = await this.embedBatch([text], options);
    if (!result) {
      throw new Error('OpenAI returned no embedding');
    }
    return result;
  }

  /**
   * Generate embeddings for multiple texts (batch).
   * Uses OpenAI's native batch embedding support.
   */
  async embedBatch(
    texts: string[],
    options?: LLMEmbeddingOptions
  ): Promise<LLMEmbeddingResponse[]> {
    if (texts.length === 0) {
      return [];
    }

    const model = options?.model ?? this.defaultEmbeddingModel;
    const response = await this.client.embeddings.create(
      { model, input: texts },
      { signal: options?.signal }
    );

    // Per-text usage is an even split of the batch total
    const perTextPromptTokens = Math.floor(response.usage.prompt_tokens / texts.length);
    const perTextTotalTokens = Math.floor(response.usage.total_tokens / texts.length);

    log.debug(
      { event: 'llm_embeddings', model, count: texts.length, totalTokens: response.usage.total_tokens },
      'Embeddings received'
    );

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => ({
        embedding: item.embedding,
        usage: {
          promptTokens: perTextPromptTokens,
          totalTokens: perTextTotalTokens,
        },
      }));
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(
    reason: string | null | undefined
  ): FinishReason {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return null;
    }
  }
}
