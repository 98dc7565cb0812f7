/**
 * LLM module exports.
 */

import { ConfigurationError } from '@/lib/errors';
import type { LLMConfig } from '@/lib/config/env';
import { OpenAIAdapter } from './openai-adapter';

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMCompletionOptions,
  LLMCompletionResponse,
  LLMEmbeddingOptions,
  LLMEmbeddingResponse,
  FinishReason,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';

export { buildRAGSystemPrompt, buildRAGUserPrompt, formatPassage } from './prompts';

/**
 * Create the OpenAI adapter from application configuration.
 *
 * @throws ConfigurationError when OPENAI_API_KEY is not set
 */
export function createOpenAIAdapter(config: LLMConfig, embeddingsModel: string): OpenAIAdapter {
  if (!config.apiKey) {
    throw new ConfigurationError('Missing LLM credentials', ['OPENAI_API_KEY: required']);
  }

  return new OpenAIAdapter({
    apiKey: config.apiKey,
    defaultModel: config.model,
    defaultEmbeddingModel: embeddingsModel,
  });
}
