/**
 * Evaluation Types
 *
 * - Config schema (Zod) for the user-facing [eval] TOML section
 * - Question set file format
 * - Per-question, per-run and summary result shapes
 * - Error type with factory methods
 */

import { z } from 'zod';

import type { AnswerOutcome } from '../agent/types.js';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

/**
 * Evaluation configuration schema for config.toml [eval] section.
 *
 * @example config.toml
 * ```toml
 * [eval]
 * runs = 3
 * threshold = 0.7
 * concurrency = 4
 * ```
 */
export const EvalConfigSchema = z.object({
  /**
   * Independent passes over the question set. The median accuracy across
   * passes decides pass/fail, so one unlucky pass does not.
   */
  runs: z.number().int().min(1).max(100).default(3).describe('Passes over the question set (1-100)'),

  /** Minimum median accuracy for the evaluation to pass */
  threshold: z
    .number()
    .min(0)
    .max(1)
    .default(0.7)
    .describe('Pass threshold for median accuracy (0-1)'),

  /** Questions answered at the same time */
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(64)
    .default(4)
    .describe('Questions in flight at once (1-64)'),
});

export type EvalConfig = z.infer<typeof EvalConfigSchema>;

// ============================================================================
// QUESTION SETS
// ============================================================================

/**
 * One labelled question. `correct` is the index of the right choice, or
 * its exact text.
 */
export const QuestionEntrySchema = z.object({
  id: z.string().min(1).optional(),
  question: z.string().min(1),
  choices: z.array(z.string().min(1)).min(2).max(26),
  correct: z.union([z.number().int().min(0), z.string().min(1)]),
});

export const QuestionSetSchema = z.object({
  version: z.literal('1.0'),
  questions: z.array(QuestionEntrySchema),
});

export type QuestionEntry = z.infer<typeof QuestionEntrySchema>;
export type QuestionSet = z.infer<typeof QuestionSetSchema>;

/**
 * A question ready to evaluate: id assigned, correct answer resolved to an index.
 */
export interface EvalQuestion {
  id: string;
  question: string;
  choices: string[];
  correctIndex: number;
}

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Outcome of one question in one run.
 */
export interface QuestionResult {
  id: string;
  /** Predicted index, -1 for none */
  predicted: number;
  correctIndex: number;
  correct: boolean;
  outcome: AnswerOutcome;
  /** Failure message for service_error / invalid_input */
  error?: string;
  latencyMs: number;
}

export interface RunResult {
  /** 1-based run number */
  run: number;
  accuracy: number;
  correctCount: number;
  total: number;
  /** Responses with no extractable choice */
  noMatchCount: number;
  /** Failed or timed-out service calls */
  serviceErrorCount: number;
  invalidCount: number;
  durationMs: number;
  results: QuestionResult[];
}

export interface AccuracyStats {
  median: number;
  mean: number;
  min: number;
  max: number;
}

/**
 * Full evaluation report, also the shape written by `mcq eval --output`.
 */
export interface EvaluationSummary {
  timestamp: string;
  questionCount: number;
  runs: RunResult[];
  accuracy: AccuracyStats;
  threshold: number;
  /** median >= threshold */
  passed: boolean;
  config: {
    runs: number;
    concurrency: number;
    generationModel?: string;
    retrieval: boolean;
  };
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error codes for evaluation failures.
 */
export const EvalErrorCodes = {
  /** Question file not found */
  DATASET_NOT_FOUND: 'DATASET_NOT_FOUND',
  /** Question file has invalid format */
  DATASET_INVALID: 'DATASET_INVALID',
  /** Evaluation run aborted */
  EVAL_RUN_FAILED: 'EVAL_RUN_FAILED',
} as const;

export type EvalErrorCode = (typeof EvalErrorCodes)[keyof typeof EvalErrorCodes];

/**
 * Error thrown by the evaluation harness.
 *
 * Includes structured error codes and factory methods for common cases.
 */
export class EvalError extends Error {
  public readonly code: EvalErrorCode;
  public readonly cause?: Error;

  constructor(code: EvalErrorCode, message: string, cause?: Error) {
    super(message);
    this.name = 'EvalError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EvalError);
    }
  }

  /** Factory: question file not found */
  static datasetNotFound(filePath: string): EvalError {
    return new EvalError(EvalErrorCodes.DATASET_NOT_FOUND, `Question file not found: ${filePath}`);
  }

  /** Factory: question file has invalid schema or content */
  static datasetInvalid(reason: string): EvalError {
    return new EvalError(EvalErrorCodes.DATASET_INVALID, `Invalid question file: ${reason}`);
  }

  /** Factory: evaluation aborted */
  static evalRunFailed(reason: string, cause?: Error): EvalError {
    return new EvalError(EvalErrorCodes.EVAL_RUN_FAILED, `Evaluation run failed: ${reason}`, cause);
  }
}
