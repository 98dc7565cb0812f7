/**
 * RAG Configuration Constants
 *
 * Defaults for the retrieval and generation pipeline.
 * Environment variables override these through loadAppConfig().
 */

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Default number of passages to retrieve from the index.
 */
export const DEFAULT_TOP_K = 3;

/**
 * Minimum cosine similarity for a passage to be used as context.
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

/**
 * Embeddings model used by the index. Part of every cache key.
 */
export const DEFAULT_EMBEDDINGS_MODEL = 'text-embedding-3-small';

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size in characters for document splitting.
 */
export const DEFAULT_CHUNK_SIZE = 1000;

/**
 * Default overlap between chunks in characters.
 * Helps maintain context across chunk boundaries.
 */
export const DEFAULT_CHUNK_OVERLAP = 200;

// =============================================================================
// LLM Configuration
// =============================================================================

export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';

/**
 * Default max tokens for RAG response generation.
 */
export const DEFAULT_RAG_MAX_TOKENS = 1024;

/**
 * Default temperature for RAG response generation.
 * Lower values = more focused/deterministic responses.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.3;

// =============================================================================
// Fixed Answers
// =============================================================================

export const NO_RESULTS_ANSWER =
  "I couldn't find relevant information in the indexed documents to answer your question.";

export const ERROR_ANSWER = 'An error occurred while processing your question.';
