/**
 * Embedder Module
 */

export { embedChunks, withTimeout, EmbeddingTimeoutError } from './embedder.js';
export type { EmbeddedChunk, EmbedderOptions, EmbedChunksResult } from './types.js';
