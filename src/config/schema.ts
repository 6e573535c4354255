/**
 * Configuration Schema
 *
 * Defines the shape of ~/.mcq/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import {
  RAGConfigSchema,
  PromptConfigSchema,
  ExtractionConfigSchema,
} from '../agent/types.js';
import { EvalConfigSchema } from '../eval/types.js';

/**
 * Back ends reachable through the OpenAI-compatible client.
 * Used by both the generation and the embedding sections.
 */
export const ProviderTypeSchema = z.enum(['openai', 'ollama', 'openai-compatible']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

/**
 * Text-generation service configuration ([generation])
 */
export const GenerationConfigSchema = z.object({
  provider: ProviderTypeSchema.default('openai').describe('Generation back end'),
  model: z.string().min(1).default('gpt-4o-mini').describe('Chat model name'),
  temperature: z
    .number()
    .min(0)
    .max(2)
    .default(0)
    .describe('Sampling temperature (0 keeps answers repeatable)'),
  max_tokens: z
    .number()
    .int()
    .min(16)
    .max(16384)
    .default(1024)
    .describe('Upper bound on response tokens'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Deadline for one generation call in milliseconds'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .default(2)
    .describe('Transport-level retries the client performs inside one call'),
});

/**
 * Embedding provider configuration ([embedding])
 */
export const EmbeddingConfigSchema = z.object({
  provider: ProviderTypeSchema.default('openai').describe('Embedding back end'),
  model: z.string().min(1).default('text-embedding-3-small').describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Requested vector size (only for models that accept it)'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .default(32)
    .describe('Number of texts to embed per batch (default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout in milliseconds for one embedding batch'),
});

/**
 * Reference corpus configuration ([corpus])
 */
export const CorpusConfigSchema = z.object({
  path: z.string().min(1).describe('Plain-text corpus file (supports ~)'),
  chunk_size: z
    .number()
    .int()
    .min(100)
    .max(100000)
    .default(3200)
    .describe('Target chunk length in characters'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .max(50000)
    .default(200)
    .describe('Characters shared by consecutive chunks (must be < chunk_size)'),
  cache: z.boolean().default(true).describe('Reuse the on-disk index cache'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  generation: GenerationConfigSchema,
  embedding: EmbeddingConfigSchema,
  corpus: CorpusConfigSchema,
  rag: RAGConfigSchema,
  prompt: PromptConfigSchema,
  extraction: ExtractionConfigSchema,
  eval: EvalConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
