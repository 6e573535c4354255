/**
 * Search Module Errors
 */

import { CLIError } from '../errors/index.js';
import type { EmbeddingMismatch } from './types.js';

const DESCRIPTIONS: Record<EmbeddingMismatch['source'], string> = {
  index: 'Corpus index holds vectors of different sizes',
  query: 'Query embedding size does not match the corpus index',
  provider: 'Embedding provider size does not match the corpus index',
  model: 'Embedding model does not match the one the corpus index was built with',
};

/**
 * Thrown when query and corpus vectors cannot be compared.
 *
 * This is a precondition violation, not a retrieval miss: the agent lets
 * it propagate instead of answering without context.
 *
 * Exit code 6
 *
 * @example
 * ```typescript
 * if (query.length !== index.dimensions) {
 *   throw new EmbeddingMismatchError({ source: 'query', expected: index.dimensions, actual: query.length });
 * }
 * ```
 */
export class EmbeddingMismatchError extends CLIError {
  public readonly mismatch: EmbeddingMismatch;

  constructor(mismatch: EmbeddingMismatch) {
    super(
      `${DESCRIPTIONS[mismatch.source]} (expected ${mismatch.expected}, got ${mismatch.actual})`,
      'Rebuild the index with the configured embedding model: mcq index --rebuild',
      6
    );
    this.name = 'EmbeddingMismatchError';
    this.mismatch = mismatch;
  }
}
