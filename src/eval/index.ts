/**
 * Evaluation Module
 *
 * Scores an agent against a labelled question set over several runs and
 * decides pass/fail on the median accuracy.
 */

export { evaluate, mapWithConcurrency, type EvaluateOptions, type EvalProgress } from './runner.js';
export { loadQuestionSet, parseQuestionSet, resolveQuestions } from './questions.js';
export { median, mean, accuracyStats } from './stats.js';
export {
  formatEvaluationReport,
  formatRunsTable,
  collectMisses,
  writeEvaluationReport,
} from './report.js';

export {
  EvalConfigSchema,
  QuestionEntrySchema,
  QuestionSetSchema,
  EvalError,
  EvalErrorCodes,
} from './types.js';

export type {
  EvalConfig,
  EvalErrorCode,
  QuestionEntry,
  QuestionSet,
  EvalQuestion,
  QuestionResult,
  RunResult,
  AccuracyStats,
  EvaluationSummary,
} from './types.js';
