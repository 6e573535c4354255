/**
 * Agent Types
 *
 * Configuration schemas for the [rag], [prompt] and [extraction] sections,
 * plus the values that flow through one answered question.
 */

import { z } from 'zod';
import type { RetrievedChunk } from '../search/types.js';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

/**
 * Retrieval settings for config.toml [rag] section.
 *
 * @example config.toml
 * ```toml
 * [rag]
 * enabled = true
 * top_k = 3
 * max_chars = 6000
 * min_score = 0.3
 * ```
 */
export const RAGConfigSchema = z.object({
  /** Retrieve corpus context for each question */
  enabled: z.boolean().default(true),

  /** Chunks placed in the prompt at most */
  top_k: z.number().int().min(1).max(50).default(3),

  /** Character budget for all retrieved context */
  max_chars: z.number().int().min(100).max(200000).default(6000),

  /** Cosine similarity floor; weaker chunks are dropped */
  min_score: z.number().min(-1).max(1).default(0.3),
});

export type RAGConfig = z.infer<typeof RAGConfigSchema>;

/**
 * 'chain-of-thought' asks for reasoning before the final line;
 * 'direct' asks for the final line only.
 */
export const ReasoningModeSchema = z.enum(['chain-of-thought', 'direct'], {
  errorMap: () => ({ message: "reasoning must be 'chain-of-thought' or 'direct'" }),
});
export type ReasoningMode = z.infer<typeof ReasoningModeSchema>;

export const PromptConfigSchema = z.object({
  reasoning: ReasoningModeSchema.default('chain-of-thought'),
  /** Include worked examples before the question */
  few_shot: z.boolean().default(true),
  /** JSON file of exemplars replacing the built-in ones */
  exemplars_path: z.string().optional(),
});

export type PromptConfig = z.infer<typeof PromptConfigSchema>;

/**
 * How a bare integer in a response maps to a choice.
 * 'zero-based': "2" is the third choice. 'one-based': "2" is the second.
 */
export const NumberingSchema = z.enum(['zero-based', 'one-based'], {
  errorMap: () => ({ message: "numbering must be 'zero-based' or 'one-based'" }),
});
export type Numbering = z.infer<typeof NumberingSchema>;

export const ExtractionConfigSchema = z.object({
  numbering: NumberingSchema.default('zero-based'),
  /** Minimum normalised similarity for a fuzzy text match */
  fuzzy_threshold: z.number().min(0).max(1).default(0.8),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

// ============================================================================
// EXEMPLARS
// ============================================================================

export const ExemplarSchema = z
  .object({
    question: z.string().min(1),
    choices: z.array(z.string().min(1)).min(2).max(26),
    reasoning: z.string().optional(),
    /** Label of the correct choice, e.g. "B" */
    answer: z.string().regex(/^[A-Z]$/, 'answer must be a single capital letter'),
  })
  .refine((e) => e.answer.charCodeAt(0) - 65 < e.choices.length, {
    message: 'answer label is outside the choice list',
    path: ['answer'],
  });

export type Exemplar = z.infer<typeof ExemplarSchema>;

// ============================================================================
// PROMPT
// ============================================================================

/**
 * A composed prompt. `labels[i]` is the label shown for choice i.
 */
export interface Prompt {
  readonly system: string;
  readonly user: string;
  readonly labels: readonly string[];
}

// ============================================================================
// EXTRACTION
// ============================================================================

/** Sentinel index for "the response names no choice" */
export const NO_MATCH = -1;

export type ExtractionStrategy = 'label' | 'numeric' | 'fuzzy';

export type ExtractionResult =
  | {
      kind: 'choice';
      /** Index into the original choice order */
      index: number;
      strategy: ExtractionStrategy;
      /** Similarity for fuzzy matches */
      score?: number;
    }
  | { kind: 'no_match' };

// ============================================================================
// ANSWERS
// ============================================================================

/**
 * - answered: a choice was extracted
 * - no_match: the service replied but no choice could be extracted
 * - service_error: the generation call failed or timed out
 * - invalid_input: the question or choices were rejected before any call
 */
export type AnswerOutcome = 'answered' | 'no_match' | 'service_error' | 'invalid_input';

export interface AnswerTimings {
  retrievalMs: number;
  generationMs: number;
  totalMs: number;
}

/**
 * Everything known about one answered question.
 */
export interface AgentAnswer {
  /** Choice index, or NO_MATCH */
  index: number;
  outcome: AnswerOutcome;
  extraction: ExtractionResult;
  /** Raw service response ('' on service error) */
  responseText: string;
  /** Context placed in the prompt */
  sources: readonly RetrievedChunk[];
  /** Failure message for service_error / invalid_input */
  error?: string;
  timings: AnswerTimings;
}

/**
 * The public agent contract.
 *
 * `getResponse` resolves to an index in [0, choices.length - 1] or NO_MATCH.
 * `answer` is optional and exposes the detail behind that index.
 */
export interface MultipleChoiceResponder {
  getResponse(question: string, choices: readonly string[]): Promise<number>;
  answer?(question: string, choices: readonly string[]): Promise<AgentAnswer>;
}
