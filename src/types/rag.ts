/**
 * RAG pipeline types shared by the cache, retrieval and service layers.
 */

/**
 * Outcome of answering one question.
 */
export type RAGStatus = 'success' | 'no_results' | 'error';

export interface RAGResponse {
  answer: string;
  /** Source identifiers of the passages the answer was built from, in retrieval order */
  sources: string[];
  status: RAGStatus;
  confidence: number;
  retrievedChunks: number;
  processingMs: number;
  error?: string;
}

/**
 * Retrieval parameters that change the answer for a given question.
 * Every field here takes part in cache key derivation.
 */
export interface RetrievalParams {
  embeddingsModel: string;
  topK: number;
  similarityThreshold: number;
}

/**
 * Full retrieval configuration snapshot.
 */
export interface RetrievalConfig extends RetrievalParams {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * A passage returned by the similarity search.
 */
export interface RetrievedPassage {
  content: string;
  source: string;
  similarity: number;
}

/**
 * A document handed to the index.
 */
export interface SourceDocument {
  content: string;
  source?: string;
}
