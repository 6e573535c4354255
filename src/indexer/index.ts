/**
 * Indexer Module
 *
 * Builds the read-only corpus index used for retrieval.
 */

export type { TextChunk, Chunk, ChunkFailure, CorpusIndex, ChunkingOptions } from './types.js';

export { chunkText, normalizeCorpus, validateChunkingOptions } from './chunker/index.js';

export {
  embedChunks,
  withTimeout,
  EmbeddingTimeoutError,
  type EmbeddedChunk,
  type EmbedderOptions,
  type EmbedChunksResult,
} from './embedder/index.js';

export {
  buildCorpusIndex,
  emptyCorpusIndex,
  freezeCorpusIndex,
  type BuildCorpusIndexOptions,
} from './corpus-index.js';

export {
  loadOrBuildCorpusIndex,
  readIndexCache,
  writeIndexCache,
  indexFingerprint,
  getIndexCachePath,
  type LoadCorpusIndexOptions,
  type LoadCorpusIndexResult,
  type FingerprintInput,
} from './cache.js';
