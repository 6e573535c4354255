/**
 * Embedder Types
 */

import type { ChunkFailure, TextChunk } from '../types.js';

/**
 * A chunk with its computed embedding.
 */
export interface EmbeddedChunk extends TextChunk {
  embedding: number[];
}

/**
 * Options for the embedChunks orchestration function.
 */
export interface EmbedderOptions {
  /**
   * Number of chunks per embedBatch call.
   * @default 32
   */
  batchSize?: number;

  /**
   * Timeout in milliseconds for one embedBatch call.
   * Unset means no deadline.
   */
  timeout?: number;

  /**
   * Fired after each batch (or each chunk of a retried batch).
   */
  onProgress?: (processed: number, total: number) => void;

  /**
   * Fired when a chunk is left out; processing continues.
   */
  onError?: (error: Error, chunkIndex: number) => void;
}

export interface EmbedChunksResult {
  /** Successfully embedded chunks, in corpus order */
  embedded: EmbeddedChunk[];
  /** Chunks that were left out, in corpus order */
  failures: ChunkFailure[];
}
