/**
 * LLM adapter interface types.
 *
 * The RAG pipeline talks to the model provider only through these types,
 * so tests and alternative providers can stand in for OpenAI.
 */

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for text completion.
 */
export interface LLMCompletionOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 1.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
  signal?: AbortSignal;     // Cancels the request
}

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Options for embedding generation.
 */
export interface LLMEmbeddingOptions {
  model?: string;  // Override default embedding model
  signal?: AbortSignal;
}

/**
 * Response from embedding generation.
 */
export interface LLMEmbeddingResponse {
  embedding: number[];
  usage: {
    promptTokens: number;
    totalTokens: number;
  };
}

/**
 * Core LLM adapter interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai') */
  readonly provider: string;

  complete(messages: LLMMessage[], options?: LLMCompletionOptions): Promise<LLMCompletionResponse>;

  embed(text: string, options?: LLMEmbeddingOptions): Promise<LLMEmbeddingResponse>;

  /**
   * Embed several texts; results are in input order.
   */
  embedBatch(texts: string[], options?: LLMEmbeddingOptions): Promise<LLMEmbeddingResponse[]>;
}

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  defaultModel?: string;
  defaultEmbeddingModel?: string;
  baseUrl?: string;  // For custom endpoints
}
