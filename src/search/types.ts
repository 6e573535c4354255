/**
 * Search Module Types
 */

import type { Chunk } from '../indexer/types.js';

/**
 * Limits applied to one retrieval, in this order:
 * minScore filter → top k → character budget.
 */
export interface RetrievalOptions {
  /** Maximum number of chunks (0 returns nothing) */
  k: number;
  /** Character budget across returned chunks; the top chunk is always kept */
  maxChars: number;
  /** Drop chunks scoring below this cosine similarity */
  minScore?: number;
}

export interface RetrievedChunk {
  /** Reference into the read-only index */
  chunk: Chunk;
  /** Cosine similarity to the query, in [-1, 1] */
  score: number;
}

/**
 * Descending by score; ties keep corpus order.
 */
export type RetrievalResult = readonly RetrievedChunk[];

/**
 * Where a vector-size disagreement was found.
 */
export type MismatchSource = 'index' | 'query' | 'provider' | 'model';

export interface EmbeddingMismatch {
  source: MismatchSource;
  expected: number | string;
  actual: number | string;
}
