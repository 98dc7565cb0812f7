/**
 * Retrieval Service
 *
 * In-memory vector index over document chunks. Documents are chunked,
 * embedded through the LLM adapter, and searched by cosine similarity.
 * The index can be saved to and restored from a JSON file, so documents
 * are not re-embedded on every start.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { createLayerLogger, describeError, type LogSink } from '@/lib/logger';
import { IndexFileError } from '@/lib/errors';
import type { LLMAdapter } from '@/types/llm';
import type { RetrievalConfig, RetrievedPassage, SourceDocument } from '@/types/rag';
import { chunkDocument } from './chunker';

// =============================================================================
// Types
// =============================================================================

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can return passages for a question.
 */
export interface Retriever {
  retrieve(question: string, options?: RetrieveOptions): Promise<RetrievedPassage[]>;
}

/**
 * A retriever whose contents can be changed.
 */
export interface DocumentIndex extends Retriever {
  /** @returns Number of chunks added */
  addDocuments(documents: SourceDocument[], options?: RetrieveOptions): Promise<number>;
  clear(): void;
  size(): number;
  save(filePath: string): Promise<void>;
  /** Replace the contents with a saved index. @returns Number of chunks loaded */
  load(filePath: string): Promise<number>;
}

export type Embedder = Pick<LLMAdapter, 'embed' | 'embedBatch'>;

export const INDEX_FILE_VERSION = 1;

const indexedChunkSchema = z.object({
  content: z.string(),
  source: z.string(),
  vector: z.array(z.number()),
});

type IndexedChunk = z.infer<typeof indexedChunkSchema>;

const indexFileSchema = z.object({
  version: z.literal(INDEX_FILE_VERSION),
  embeddingsModel: z.string().nullable(),
  documentCount: z.number().int().nonnegative(),
  chunks: z.array(indexedChunkSchema),
});

type IndexFile = z.infer<typeof indexFileSchema>;

export interface InMemoryVectorIndexOptions {
  embedder: Embedder;
  config: Omit<RetrievalConfig, 'embeddingsModel'> & Partial<Pick<RetrievalConfig, 'embeddingsModel'>>;
  logger?: LogSink;
}

// =============================================================================
// Similarity
// =============================================================================

/**
 * Cosine similarity of two equal-length vectors. A zero vector scores 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

// =============================================================================
// In-Memory Vector Index
// =============================================================================

export class InMemoryVectorIndex implements DocumentIndex {
  private readonly embedder: Embedder;
  private readonly config: InMemoryVectorIndexOptions['config'];
  private readonly log: LogSink;
  private chunks: IndexedChunk[] = [];
  private documentCount = 0;

  constructor(options: InMemoryVectorIndexOptions) {
    this.embedder = options.embedder;
    this.config = options.config;
    this.log = options.logger ?? createLayerLogger('rag', 'VectorIndex');
  }

  /**
   * Chunk, embed and index documents. Documents without a source are
   * labelled `document-N` in insertion order.
   */
  async addDocuments(documents: SourceDocument[], options?: RetrieveOptions): Promise<number> {
    let documentCount = this.documentCount;
    const pending = documents.flatMap((document) => {
      documentCount++;
      const source = document.source ?? `document-${documentCount}`;
      return chunkDocument(document.content, source, {
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
      });
    });

    if (pending.length === 0) {
      this.documentCount = documentCount;
      return 0;
    }

    const embeddings = await this.embedder.embedBatch(
      pending.map((chunk) => chunk.content),
      { model: this.config.embeddingsModel, signal: options?.signal }
    );

    if (embeddings.length !== pending.length) {
      throw new Error(`Expected ${pending.length} embeddings, received ${embeddings.length}`);
    }

    pending.forEach((chunk, i) => {
      this.chunks.push({
        content: chunk.content,
        source: chunk.source ?? 'unknown',
        vector: embeddings[i].embedding,
      });
    });
    this.documentCount = documentCount;

    this.log.info(
      { event: 'documents_indexed', documents: documents.length, chunks: pending.length, total: this.chunks.length },
      'Documents indexed'
    );

    return pending.length;
  }

  /**
   * Top-K passages scoring at or above the similarity threshold, best first.
   */
  async retrieve(question: string, options?: RetrieveOptions): Promise<RetrievedPassage[]> {
    if (this.chunks.length === 0) {
      this.log.debug({ event: 'retrieval_empty_index' }, 'Index is empty, skipping embedding');
      return [];
    }

    const { embedding } = await this.embedder.embed(question, {
      model: this.config.embeddingsModel,
      signal: options?.signal,
    });

    const passages = this.chunks
      .map((chunk) => ({
        content: chunk.content,
        source: chunk.source,
        similarity: cosineSimilarity(embedding, chunk.vector),
      }))
      .filter((passage) => passage.similarity >= this.config.similarityThreshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, this.config.topK);

    this.log.debug(
      {
        event: 'retrieval_complete',
        candidates: this.chunks.length,
        returned: passages.length,
        topSimilarity: passages[0]?.similarity,
      },
      'Retrieval complete'
    );

    return passages;
  }

  clear(): void {
    const count = this.chunks.length;
    this.chunks = [];
    this.documentCount = 0;
    this.log.info({ event: 'index_cleared', chunks: count }, 'Index cleared');
  }

  size(): number {
    return this.chunks.length;
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  /**
   * Write chunks and vectors to a JSON file, replacing it atomically.
   */
  async save(filePath: string): Promise<void> {
    const payload: IndexFile = {
      version: INDEX_FILE_VERSION,
      embeddingsModel: this.config.embeddingsModel ?? null,
      documentCount: this.documentCount,
      chunks: this.chunks,
    };

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(payload), 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.log.info({ event: 'index_saved', file: filePath, chunks: this.chunks.length }, 'Index saved');
  }

  /**
   * Replace the index with one saved by `save`. A file that cannot be used
   * leaves the current contents in place.
   */
  async load(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new IndexFileError(filePath, describeError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new IndexFileError(filePath, `not valid JSON (${describeError(error)})`);
    }

    const result = indexFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new IndexFileError(filePath, 'unexpected file shape');
    }

    const saved = result.data;
    const model = this.config.embeddingsModel;
    if (model !== undefined && saved.embeddingsModel !== null && saved.embeddingsModel !== model) {
      throw new IndexFileError(filePath, `built with ${saved.embeddingsModel}, expected ${model}`);
    }

    const dimensions = new Set(saved.chunks.map((chunk) => chunk.vector.length));
    if (dimensions.size > 1) {
      throw new IndexFileError(filePath, 'vectors have mixed dimensions');
    }

    this.chunks = saved.chunks;
    this.documentCount = saved.documentCount;
    this.log.info({ event: 'index_loaded', file: filePath, chunks: this.chunks.length }, 'Index loaded');
    return this.chunks.length;
  }
}
