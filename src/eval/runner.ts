/**
 * Evaluation Runner
 *
 * Scores an agent against labelled questions.
 *
 * Flow:
 * 1. Validate options and the question list
 * 2. For each run: answer every question with bounded concurrency
 * 3. Score each run (NoMatch counts as wrong)
 * 4. Summarise accuracy across runs; pass iff median >= threshold
 *
 * The agent is injected, so tests drive the runner with plain stubs.
 */

import { isFatalAgentError } from '../agent/agent.js';
import { NO_MATCH, type AnswerOutcome, type MultipleChoiceResponder } from '../agent/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { accuracyStats } from './stats.js';
import {
  EvalConfigSchema,
  EvalError,
  type EvalQuestion,
  type EvaluationSummary,
  type QuestionResult,
  type RunResult,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EvalProgress {
  /** 1-based run number */
  run: number;
  runs: number;
  completed: number;
  total: number;
}

export interface EvaluateOptions {
  /** @default 3 */
  runs?: number;
  /** @default 0.7 */
  threshold?: number;
  /** @default 4 */
  concurrency?: number;
  onProgress?: (progress: EvalProgress) => void;
  logger?: Logger;
  /** Recorded in the report only */
  generationModel?: string;
  /** Recorded in the report only */
  retrieval?: boolean;
}

// ============================================================================
// CONCURRENCY
// ============================================================================

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Each worker collects its own [index, result] pairs; they are merged into
 * input order once every worker has finished. The first rejection stops
 * workers from taking new items and is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  let stopped = false;

  const worker = async (): Promise<Array<[number, R]>> => {
    const own: Array<[number, R]> = [];
    for (let job = queue.shift(); job && !stopped; job = queue.shift()) {
      try {
        own.push([job.index, await fn(job.item, job.index)]);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
    return own;
  };

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  const slots = await Promise.all(Array.from({ length: workerCount }, worker));

  return slots
    .flat()
    .sort((a, b) => a[0] - b[0])
    .map(([, result]) => result);
}

// ============================================================================
// PRIVATE HELPERS
// ============================================================================

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function answerQuestion(
  agent: MultipleChoiceResponder,
  question: EvalQuestion,
  logger: Logger
): Promise<QuestionResult> {
  const start = performance.now();
  let predicted: number;
  let outcome: AnswerOutcome;
  let error: string | undefined;

  try {
    if (agent.answer) {
      const detail = await agent.answer(question.question, question.choices);
      predicted = detail.index;
      outcome = detail.outcome;
      error = detail.error;
    } else {
      predicted = await agent.getResponse(question.question, question.choices);
      outcome = predicted === NO_MATCH ? 'no_match' : 'answered';
    }
  } catch (err) {
    if (isFatalAgentError(err)) throw err;
    logger.warn(`Question ${question.id} failed: ${describe(err)}`);
    predicted = NO_MATCH;
    outcome = 'service_error';
    error = describe(err);
  }

  // An index outside the choice list names no choice
  if (!Number.isInteger(predicted) || predicted < 0 || predicted >= question.choices.length) {
    if (outcome === 'answered') outcome = 'no_match';
    predicted = NO_MATCH;
  }

  return {
    id: question.id,
    predicted,
    correctIndex: question.correctIndex,
    correct: predicted === question.correctIndex,
    outcome,
    ...(error !== undefined && { error }),
    latencyMs: Math.round(performance.now() - start),
  };
}

function scoreRun(run: number, results: QuestionResult[], durationMs: number): RunResult {
  const count = (outcome: AnswerOutcome): number =>
    results.filter((r) => r.outcome === outcome).length;
  const correctCount = results.filter((r) => r.correct).length;

  return {
    run,
    accuracy: results.length === 0 ? 0 : correctCount / results.length,
    correctCount,
    total: results.length,
    noMatchCount: count('no_match'),
    serviceErrorCount: count('service_error'),
    invalidCount: count('invalid_input'),
    durationMs: Math.round(durationMs),
    results,
  };
}

// ============================================================================
// MAIN FUNCTION
// ============================================================================

/**
 * Evaluate an agent over a question set.
 *
 * A question whose agent call throws is recorded as a service error and
 * the run continues. Setup errors (ConfigError, EmbeddingMismatchError,
 * APIKeyError) abort the evaluation and propagate unchanged.
 *
 * @throws EvalError DATASET_INVALID when there are no questions
 * @throws EvalError EVAL_RUN_FAILED for out-of-range options
 *
 * @example
 * ```typescript
 * const questions = loadQuestionSet('questions.json');
 * const summary = await evaluate(questions, agent, { runs: 3, threshold: 0.7 });
 * console.log(`median ${summary.accuracy.median}, passed: ${summary.passed}`);
 * ```
 */
export async function evaluate(
  questions: readonly EvalQuestion[],
  agent: MultipleChoiceResponder,
  options: EvaluateOptions = {}
): Promise<EvaluationSummary> {
  const logger = options.logger ?? silentLogger;

  const parsed = EvalConfigSchema.safeParse({
    runs: options.runs,
    threshold: options.threshold,
    concurrency: options.concurrency,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw EvalError.evalRunFailed(`invalid options (${issues.join('; ')})`);
  }
  const { runs, threshold, concurrency } = parsed.data;

  if (questions.length === 0) {
    throw EvalError.datasetInvalid('no questions to evaluate');
  }

  const runResults: RunResult[] = [];
  for (let run = 1; run <= runs; run++) {
    const runStart = performance.now();
    let completed = 0;

    const results = await mapWithConcurrency(questions, concurrency, async (question) => {
      const result = await answerQuestion(agent, question, logger);
      completed++;
      options.onProgress?.({ run, runs, completed, total: questions.length });
      return result;
    });

    const scored = scoreRun(run, results, performance.now() - runStart);
    logger.debug?.(
      `Run ${run}/${runs}: ${scored.correctCount}/${scored.total} correct ` +
        `(${scored.noMatchCount} no match, ${scored.serviceErrorCount} service errors)`
    );
    runResults.push(scored);
  }

  const accuracy = accuracyStats(runResults.map((r) => r.accuracy));

  return {
    timestamp: new Date().toISOString(),
    questionCount: questions.length,
    runs: runResults,
    accuracy,
    threshold,
    passed: accuracy.median >= threshold,
    config: {
      runs,
      concurrency,
      ...(options.generationModel !== undefined && { generationModel: options.generationModel }),
      retrieval: options.retrieval ?? false,
    },
  };
}
