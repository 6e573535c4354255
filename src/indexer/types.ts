/**
 * Corpus Index Types
 *
 * A corpus index is built once, before any question is answered, and is
 * read-only afterwards. Offsets refer to the normalised corpus text.
 */

/**
 * A window of corpus text, before embedding.
 */
export interface TextChunk {
  /** Position in corpus order; also the retrieval tie-break key */
  index: number;
  /** Start offset (inclusive) in the normalised corpus */
  start: number;
  /** End offset (exclusive) in the normalised corpus */
  end: number;
  text: string;
}

/**
 * An embedded chunk owned by a CorpusIndex.
 */
export interface Chunk {
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly embedding: readonly number[];
}

/**
 * A chunk that was left out of the index.
 */
export interface ChunkFailure {
  index: number;
  start: number;
  end: number;
  error: string;
}

export interface CorpusIndex {
  /** Embedding model the vectors came from */
  readonly model: string;
  /** Vector size shared by every chunk (0 for an empty index) */
  readonly dimensions: number;
  readonly chunks: readonly Chunk[];
  readonly failures: readonly ChunkFailure[];
}

/**
 * Chunking parameters, in characters.
 */
export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}
