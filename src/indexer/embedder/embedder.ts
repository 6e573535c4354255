/**
 * Embedder Orchestration
 *
 * Turns TextChunk[] into EmbeddedChunk[]:
 * 1. Batch chunks (default: 32 per embedBatch call)
 * 2. Retry a failed batch chunk by chunk so one bad chunk costs only itself
 * 3. Record every chunk left out, with the reason
 */

import type { EmbeddingProvider, EmbeddingResult } from '../../providers/types.js';
import type { ChunkFailure, TextChunk } from '../types.js';
import type { EmbeddedChunk, EmbedChunksResult, EmbedderOptions } from './types.js';

/** Default batch size */
const DEFAULT_BATCH_SIZE = 32;

/**
 * Error thrown when an embedding operation times out.
 */
export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(
      `Embedding operation timed out after ${timeoutMs}ms. ` +
        `Consider increasing embedding.timeout_ms in ~/.mcq/config.toml`
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Run a promise against a deadline. The timer is always cleared.
 *
 * `onTimeout` runs after the deadline error has settled the race.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeError: () => Error,
  onTimeout?: () => void
): Promise<T> {
  if (!timeoutMs) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(makeError());
      onTimeout?.();
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

async function embedTexts(
  provider: EmbeddingProvider,
  texts: string[],
  timeout?: number
): Promise<EmbeddingResult[]> {
  return withTimeout(
    provider.embedBatch(texts),
    timeout,
    () => new EmbeddingTimeoutError(timeout ?? 0)
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function failure(chunk: TextChunk, error: Error): ChunkFailure {
  return { index: chunk.index, start: chunk.start, end: chunk.end, error: error.message };
}

/**
 * Process chunks in batches and compute embeddings.
 *
 * @example
 * ```typescript
 * const chunks = chunkText(normalizeCorpus(text), { chunkSize: 3200, chunkOverlap: 200 });
 * const { embedded, failures } = await embedChunks(chunks, provider, {
 *   batchSize: 32,
 *   onProgress: (done, total) => console.log(`${done}/${total} chunks embedded`),
 * });
 * ```
 */
export async function embedChunks(
  chunks: TextChunk[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbedChunksResult> {
  const { batchSize = DEFAULT_BATCH_SIZE, timeout, onProgress, onError } = options;

  const embedded: EmbeddedChunk[] = [];
  const failures: ChunkFailure[] = [];
  let processed = 0;

  const reject = (chunk: TextChunk, error: Error): void => {
    failures.push(failure(chunk, error));
    onError?.(error, chunk.index);
  };

  const accept = (chunk: TextChunk, result: EmbeddingResult | undefined): void => {
    if (!result || result.embedding.length === 0) {
      reject(chunk, new Error('Empty embedding returned for chunk'));
      return;
    }
    embedded.push({ ...chunk, embedding: result.embedding });
  };

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);

    try {
      const results = await embedTexts(
        provider,
        batch.map((chunk) => chunk.text),
        timeout
      );
      batch.forEach((chunk, j) => accept(chunk, results[j]));

      processed += batch.length;
      onProgress?.(processed, chunks.length);
    } catch {
      // Batch failed: retry one by one so only the bad chunks drop out
      for (const chunk of batch) {
        try {
          const [result] = await embedTexts(provider, [chunk.text], timeout);
          accept(chunk, result);
        } catch (chunkError) {
          reject(chunk, toError(chunkError));
        }

        processed++;
        onProgress?.(processed, chunks.length);
      }
    }
  }

  return { embedded, failures };
}
