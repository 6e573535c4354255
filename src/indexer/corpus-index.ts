/**
 * Corpus Index Builder
 *
 * normalise → chunk → embed → check dimensions → freeze
 *
 * The result is immutable: there is no update or delete. Rebuild to change it.
 */

import { IndexBuildError } from '../errors/index.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { chunkText, normalizeCorpus } from './chunker/index.js';
import { embedChunks } from './embedder/index.js';
import type { EmbeddedChunk } from './embedder/index.js';
import type { Chunk, ChunkFailure, ChunkingOptions, CorpusIndex } from './types.js';

export interface BuildCorpusIndexOptions extends ChunkingOptions {
  batchSize?: number;
  /** Timeout for one embedding batch, in milliseconds */
  timeout?: number;
  onProgress?: (processed: number, total: number) => void;
  logger?: Logger;
}

/**
 * Freeze an index and everything it owns.
 */
export function freezeCorpusIndex(index: CorpusIndex): CorpusIndex {
  const chunks = index.chunks.map((chunk) =>
    Object.freeze({ ...chunk, embedding: Object.freeze([...chunk.embedding]) })
  );
  const failures = index.failures.map((f) => Object.freeze({ ...f }));
  return Object.freeze({
    model: index.model,
    dimensions: index.dimensions,
    chunks: Object.freeze(chunks),
    failures: Object.freeze(failures),
  });
}

/**
 * An index with no chunks. Retrieval against it returns nothing.
 */
export function emptyCorpusIndex(model: string): CorpusIndex {
  return freezeCorpusIndex({ model, dimensions: 0, chunks: [], failures: [] });
}

/**
 * Keep only vectors of the expected size; the rest become failures.
 * Expected size is the provider's declared one, or else the first vector's.
 */
function splitByDimension(
  embedded: EmbeddedChunk[],
  declared: number | undefined
): { kept: Chunk[]; rejected: ChunkFailure[]; dimensions: number } {
  const dimensions = declared ?? embedded[0]?.embedding.length ?? 0;
  const kept: Chunk[] = [];
  const rejected: ChunkFailure[] = [];

  for (const chunk of embedded) {
    if (chunk.embedding.length === dimensions) {
      kept.push(chunk);
    } else {
      rejected.push({
        index: chunk.index,
        start: chunk.start,
        end: chunk.end,
        error: `Embedding has ${chunk.embedding.length} dimensions, expected ${dimensions}`,
      });
    }
  }

  return { kept, rejected, dimensions };
}

/**
 * Build a searchable index from raw corpus text.
 *
 * - An empty corpus gives an empty index.
 * - Chunks that fail to embed are left out and listed in `failures`.
 * - If no chunk at all could be embedded the build fails.
 *
 * @throws ValidationError for impossible chunking options
 * @throws IndexBuildError when the corpus has chunks but none embedded
 *
 * @example
 * ```ts
 * const index = await buildCorpusIndex(text, provider, { chunkSize: 3200, chunkOverlap: 200 });
 * console.log(`${index.chunks.length} chunks, ${index.failures.length} skipped`);
 * ```
 */
export async function buildCorpusIndex(
  corpusText: string,
  provider: EmbeddingProvider,
  options: BuildCorpusIndexOptions
): Promise<CorpusIndex> {
  const logger = options.logger ?? silentLogger;
  const textChunks = chunkText(normalizeCorpus(corpusText), options);

  if (textChunks.length === 0) {
    logger.debug?.('Corpus is empty; built an empty index');
    return emptyCorpusIndex(provider.model);
  }

  let lastError: Error | undefined;
  const { embedded, failures } = await embedChunks(textChunks, provider, {
    batchSize: options.batchSize,
    timeout: options.timeout,
    onProgress: options.onProgress,
    onError: (error, chunkIndex) => {
      lastError = error;
      logger.warn(`Skipping chunk ${chunkIndex}: ${error.message}`);
    },
  });

  const { kept, rejected, dimensions } = splitByDimension(embedded, provider.dimensions);
  for (const r of rejected) {
    logger.warn(`Skipping chunk ${r.index}: ${r.error}`);
  }

  if (kept.length === 0) {
    throw new IndexBuildError(
      `None of the ${textChunks.length} corpus chunks could be embedded`,
      lastError
    );
  }

  const allFailures = [...failures, ...rejected].sort((a, b) => a.index - b.index);
  logger.debug?.(
    `Indexed ${kept.length}/${textChunks.length} chunks (${dimensions} dimensions, model ${provider.model})`
  );

  return freezeCorpusIndex({
    model: provider.model,
    dimensions,
    chunks: kept,
    failures: allFailures,
  });
}
