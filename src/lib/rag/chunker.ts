/**
 * Document Chunker
 *
 * Splits documents into overlapping chunks for RAG retrieval.
 * Uses sentence-aware splitting to avoid cutting mid-sentence.
 */

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './config';

// =============================================================================
// Types
// =============================================================================

export interface DocumentChunk {
  content: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
  source?: string;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  preserveSentences: boolean;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
  preserveSentences: true,
};

// =============================================================================
// Chunking Functions
// =============================================================================

/**
 * Split text into overlapping chunks.
 * Optionally preserves sentence boundaries.
 */
export function chunkText(
  text: string,
  options: Partial<ChunkOptions> = {}
): DocumentChunk[] {
  const { chunkSize, chunkOverlap, preserveSentences } = { ...DEFAULT_CHUNK_OPTIONS, ...options };

  if (chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }

  const normalizedText = text.replace(/\s+/g, ' ').trim();

  if (!normalizedText) {
    return [];
  }

  if (normalizedText.length <= chunkSize) {
    return [
      {
        content: normalizedText,
        chunkIndex: 0,
        startOffset: 0,
        endOffset: normalizedText.length,
      },
    ];
  }

  const chunks: DocumentChunk[] = [];
  let currentPosition = 0;
  let chunkIndex = 0;

  while (currentPosition < normalizedText.length) {
    let endPosition = Math.min(currentPosition + chunkSize, normalizedText.length);

    if (preserveSentences && endPosition < normalizedText.length) {
      endPosition = findSentenceBoundary(normalizedText, currentPosition, endPosition);
    }

    const chunkContent = normalizedText.slice(currentPosition, endPosition).trim();

    if (chunkContent) {
      chunks.push({
        content: chunkContent,
        chunkIndex,
        startOffset: currentPosition,
        endOffset: endPosition,
      });
      chunkIndex++;
    }

    if (endPosition >= normalizedText.length) break;

    // Step back by the overlap, but always make progress
    currentPosition += Math.max(1, endPosition - currentPosition - chunkOverlap);
  }

  return chunks;
}

/**
 * Find a sentence boundary near the target position.
 * Looks for period, exclamation, or question mark followed by space,
 * then for clause punctuation, then for the last space.
 */
function findSentenceBoundary(
  text: string,
  startPosition: number,
  targetPosition: number
): number {
  const searchStart = Math.max(startPosition + 1, targetPosition - 100);
  const searchRegion = text.slice(searchStart, targetPosition);

  const sentenceEnd = lastMatchEnd(searchRegion, /[.!?]\s+/g);
  if (sentenceEnd !== null) {
    return searchStart + sentenceEnd;
  }

  const clauseEnd = lastMatchEnd(searchRegion, /[,;:]\s+/g);
  if (clauseEnd !== null) {
    return searchStart + clauseEnd;
  }

  const lastSpace = text.lastIndexOf(' ', targetPosition);
  if (lastSpace > startPosition) {
    return lastSpace + 1;
  }

  return targetPosition;
}

function lastMatchEnd(region: string, pattern: RegExp): number | null {
  let end: number | null = null;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(region)) !== null) {
    end = match.index + match[0].length;
  }
  return end;
}

/**
 * Chunk one document and tag every chunk with its source.
 */
export function chunkDocument(
  content: string,
  source: string,
  options: Partial<ChunkOptions> = {}
): DocumentChunk[] {
  return chunkText(content, options).map((chunk) => ({ ...chunk, source }));
}
