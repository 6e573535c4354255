/**
 * Embedding Provider Factory
 *
 * Creates an EmbeddingProvider over the OpenAI embeddings endpoint for
 * any of the configured back ends.
 */

import OpenAI from 'openai';

import type { ProviderType } from '../config/schema.js';
import type { EmbeddingProvider, EmbeddingResult } from './types.js';
import { getProviderCredentials } from './validation.js';

export interface EmbeddingProviderOptions {
  provider: ProviderType;
  model: string;
  /** Requested vector size, forwarded only when set */
  dimensions?: number;
  /** Client-side request timeout in milliseconds */
  timeout?: number;
  maxRetries?: number;
}

/**
 * Known output sizes, used to assert index/query compatibility before the
 * first call. Models not listed report their size from the first vector.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
};

/**
 * Dimensions for a model, or undefined when unknown.
 */
export function getModelDimensions(model: string): number | undefined {
  return MODEL_DIMENSIONS[model];
}

/**
 * Create an embedding provider from configuration.
 *
 * @throws APIKeyError if the provider's key is missing or malformed
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider({
 *   provider: config.embedding.provider,
 *   model: config.embedding.model,
 * });
 * const { embedding } = await provider.embed('mitochondria');
 * ```
 */
export function createEmbeddingProvider(options: EmbeddingProviderOptions): EmbeddingProvider {
  const { apiKey, baseURL } = getProviderCredentials(options.provider);
  const client = new OpenAI({
    apiKey,
    baseURL,
    timeout: options.timeout,
    maxRetries: options.maxRetries,
  });
  const model = options.model;

  async function embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const response = await client.embeddings.create({
      model,
      input: texts,
      ...(options.dimensions !== undefined && { dimensions: options.dimensions }),
    });

    // The API may return items out of order; `index` is authoritative
    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map((item) => ({ embedding: item.embedding, model: response.model }));
  }

  return {
    name: options.provider,
    model,
    dimensions: options.dimensions ?? getModelDimensions(model),

    embedBatch,

    async embed(text: string): Promise<EmbeddingResult> {
      const [result] = await embedBatch([text]);
      if (result === undefined) {
        throw new Error(`Embedding provider returned no vector for model ${model}`);
      }
      return result;
    },
  };
}
