/**
 * Search Module
 *
 * Dense retrieval over the corpus index.
 *
 * @example
 * ```typescript
 * import { Retriever } from './search/index.js';
 *
 * const retriever = new Retriever(index, embeddingProvider, { k: 3, maxChars: 6000 });
 * const results = await retriever.retrieve('What does the Krebs cycle produce?');
 * ```
 */

export type {
  RetrievalOptions,
  RetrievedChunk,
  RetrievalResult,
  EmbeddingMismatch,
  MismatchSource,
} from './types.js';

export { cosineSimilarity } from './similarity.js';
export { Retriever, rankChunks, DEFAULT_RETRIEVAL_OPTIONS } from './retriever.js';
export { EmbeddingMismatchError } from './errors.js';
