/**
 * Retriever
 *
 * Dense retrieval over a read-only CorpusIndex. Embeds the query with the
 * same provider the index was built with, scores every chunk by cosine
 * similarity, then applies the minScore filter, top-k and the character
 * budget. Holds no mutable state, so concurrent queries are safe.
 */

import type { CorpusIndex } from '../indexer/types.js';
import type { Chunk } from '../indexer/types.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { EmbeddingMismatchError } from './errors.js';
import { cosineSimilarity } from './similarity.js';
import type { RetrievalOptions, RetrievalResult, RetrievedChunk } from './types.js';

/** Used when a caller does not pass its own limits */
export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  k: 3,
  maxChars: 6000,
  minScore: 0.3,
};

/**
 * Rank chunks against a query vector. Pure; exported for reuse and tests.
 *
 * 1. Score every chunk.
 * 2. Drop chunks below `minScore`.
 * 3. Sort by score descending; equal scores keep corpus order.
 * 4. Keep the first `k`.
 * 5. Stop before the chunk that would push the total text past
 *    `maxChars`. The first chunk is kept regardless.
 */
export function rankChunks(
  chunks: readonly Chunk[],
  queryVector: readonly number[],
  options: RetrievalOptions
): RetrievedChunk[] {
  const k = Math.max(0, Math.floor(options.k));
  if (chunks.length === 0 || k === 0) {
    return [];
  }

  const minScore = options.minScore ?? Number.NEGATIVE_INFINITY;
  const ranked = chunks
    .map((chunk) => ({ chunk, score: cosineSimilarity(chunk.embedding, queryVector) }))
    .filter((r) => r.score >= minScore)
    .sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index)
    .slice(0, k);

  const selected: RetrievedChunk[] = [];
  let total = 0;
  for (const r of ranked) {
    if (selected.length > 0 && total + r.chunk.text.length > options.maxChars) {
      break;
    }
    selected.push(r);
    total += r.chunk.text.length;
  }
  return selected;
}

/**
 * Retrieval bound to one index and one embedding provider.
 *
 * @example
 * ```typescript
 * const retriever = new Retriever(index, provider);
 * const results = await retriever.retrieve('Which organelle makes ATP?', { k: 3, maxChars: 4000 });
 * for (const { chunk, score } of results) {
 *   console.log(`[${chunk.index}] ${score.toFixed(3)} ${chunk.text.slice(0, 60)}`);
 * }
 * ```
 */
export class Retriever {
  private readonly index: CorpusIndex;
  private readonly provider: EmbeddingProvider;
  private readonly defaults: RetrievalOptions;

  /**
   * @throws EmbeddingMismatchError when the index is internally inconsistent
   *   or was built with a different model or vector size than `provider`
   */
  constructor(
    index: CorpusIndex,
    provider: EmbeddingProvider,
    defaults: Partial<RetrievalOptions> = {}
  ) {
    this.index = index;
    this.provider = provider;
    this.defaults = { ...DEFAULT_RETRIEVAL_OPTIONS, ...defaults };
    this.assertCompatible();
  }

  /** Number of searchable chunks */
  get size(): number {
    return this.index.chunks.length;
  }

  private assertCompatible(): void {
    const { chunks, dimensions, model } = this.index;
    if (chunks.length === 0) return;

    for (const chunk of chunks) {
      if (chunk.embedding.length !== dimensions) {
        throw new EmbeddingMismatchError({
          source: 'index',
          expected: dimensions,
          actual: chunk.embedding.length,
        });
      }
    }

    if (this.provider.model !== model) {
      throw new EmbeddingMismatchError({
        source: 'model',
        expected: model,
        actual: this.provider.model,
      });
    }

    if (this.provider.dimensions !== undefined && this.provider.dimensions !== dimensions) {
      throw new EmbeddingMismatchError({
        source: 'provider',
        expected: dimensions,
        actual: this.provider.dimensions,
      });
    }
  }

  /**
   * Return the chunks most similar to `query`.
   *
   * An empty index or a blank query returns [] without calling the provider.
   *
   * @throws EmbeddingMismatchError when the query vector has the wrong size
   */
  async retrieve(query: string, options: Partial<RetrievalOptions> = {}): Promise<RetrievalResult> {
    if (this.index.chunks.length === 0 || query.trim() === '') {
      return [];
    }

    const { embedding } = await this.provider.embed(query);
    if (embedding.length !== this.index.dimensions) {
      throw new EmbeddingMismatchError({
        source: 'query',
        expected: this.index.dimensions,
        actual: embedding.length,
      });
    }

    return rankChunks(this.index.chunks, embedding, { ...this.defaults, ...options });
  }
}
