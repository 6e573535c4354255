/**
 * Vector similarity
 */

import { EmbeddingMismatchError } from './errors.js';

/**
 * Cosine similarity of two vectors of equal length.
 *
 * A zero vector on either side scores 0. The result is clamped to [-1, 1]
 * against floating-point drift; non-finite input scores 0.
 *
 * @throws EmbeddingMismatchError when the lengths differ
 *
 * @example
 * ```ts
 * cosineSimilarity([1, 0], [1, 0]); // 1
 * cosineSimilarity([1, 0], [0, 0]); // 0
 * ```
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingMismatchError({ source: 'query', expected: a.length, actual: b.length });
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(-1, score));
}
