/**
 * Eval Command
 *
 * Scores the agent against a labelled question set:
 *   mcq eval questions.json                   Default runs/threshold from config
 *   mcq eval questions.json --runs 5          Five passes, median decides
 *   mcq eval questions.json --threshold 0.8   Stricter pass mark
 *   mcq eval questions.json --no-rag          Answer without retrieval
 *   mcq eval questions.json --output out.json Write the full report
 *
 * Exits 1 when the median accuracy is below the threshold.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCorpusProgress, createProgressReporter } from '../utils/progress.js';
import { loadConfig } from '../../config/loader.js';
import { createAgentFromConfig, type CreatedAgent } from '../../agent/factory.js';
import { evaluate } from '../../eval/runner.js';
import { loadQuestionSet } from '../../eval/questions.js';
import { formatEvaluationReport, writeEvaluationReport } from '../../eval/report.js';
import { EvalError, EvalErrorCodes, type EvalQuestion, type EvaluationSummary } from '../../eval/types.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

interface EvalCommandOptions {
  runs?: string;
  threshold?: string;
  concurrency?: string;
  output?: string;
  /** false with --no-rag */
  rag: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse an integer option within bounds.
 *
 * @throws CLIError naming the flag
 */
export function parseIntOption(value: string, flag: string, min: number, max: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new CLIError(`Invalid ${flag} value: ${value}`, `Must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

/**
 * Parse a fraction in [0, 1].
 *
 * @throws CLIError naming the flag
 */
export function parseFractionOption(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new CLIError(`Invalid ${flag} value: ${value}`, 'Must be a number between 0 and 1, e.g. 0.7');
  }
  return parsed;
}

const EVAL_HINTS: Record<EvalError['code'], string> = {
  [EvalErrorCodes.DATASET_NOT_FOUND]: 'Check the path to the question set JSON file',
  [EvalErrorCodes.DATASET_INVALID]:
    'Expected {"version": "1.0", "questions": [{"question": "...", "choices": [...], "correct": 0}]}',
  [EvalErrorCodes.EVAL_RUN_FAILED]: 'Run with --verbose for details',
};

/**
 * Map harness errors onto CLI errors so the global handler prints a hint.
 * Anything else passes through unchanged.
 */
export function toCLIError(error: unknown): unknown {
  if (error instanceof EvalError) {
    return new CLIError(error.message, EVAL_HINTS[error.code]);
  }
  return error;
}

// ============================================================================
// Command
// ============================================================================

export function createEvalCommand(getContext: () => CommandContext): Command {
  return new Command('eval')
    .argument('<questions>', 'Question set JSON file')
    .description('Evaluate answer accuracy on a labelled question set')
    .option('-r, --runs <number>', 'Passes over the question set (default from config)')
    .option('-t, --threshold <number>', 'Pass mark for median accuracy, 0-1 (default from config)')
    .option('--concurrency <number>', 'Questions in flight at once (default from config)')
    .option('-o, --output <file>', 'Write the full JSON report to a file')
    .option('--no-rag', 'Answer without corpus retrieval')
    .action(async (questionsPath: string, cmdOptions: EvalCommandOptions) => {
      const ctx = getContext();

      // ── Step 1: Validate options and load questions ─────────────────────
      const config = loadConfig();
      const runs = cmdOptions.runs ? parseIntOption(cmdOptions.runs, '--runs', 1, 100) : config.eval.runs;
      const threshold = cmdOptions.threshold
        ? parseFractionOption(cmdOptions.threshold, '--threshold')
        : config.eval.threshold;
      const concurrency = cmdOptions.concurrency
        ? parseIntOption(cmdOptions.concurrency, '--concurrency', 1, 64)
        : config.eval.concurrency;

      let questions: EvalQuestion[];
      try {
        questions = loadQuestionSet(questionsPath);
      } catch (error) {
        throw toCLIError(error);
      }
      ctx.debug(`Loaded ${questions.length} questions from ${questionsPath}`);
      ctx.debug(`runs=${runs} threshold=${threshold} concurrency=${concurrency}`);

      // ── Step 2: Build the agent (index before any question) ─────────────
      const corpusProgress = createCorpusProgress(ctx.options);
      let created: CreatedAgent;
      try {
        created = await createAgentFromConfig(config, {
          rag: cmdOptions.rag ? undefined : false,
          logger: ctx,
          onProgress: corpusProgress.onProgress,
        });
      } catch (error) {
        corpusProgress.fail('Corpus indexing failed');
        throw error;
      }
      corpusProgress.finish();
      const { agent } = created;

      // ── Step 3: Run evaluation ──────────────────────────────────────────
      const reporter = createProgressReporter(ctx.options);
      let currentRun = 0;
      let runStart = performance.now();

      let summary: EvaluationSummary;
      try {
        summary = await evaluate(questions, agent, {
          runs,
          threshold,
          concurrency,
          logger: ctx,
          generationModel: config.generation.model,
          retrieval: agent.usesRetrieval,
          onProgress: ({ run, runs: total, completed }) => {
            if (run !== currentRun) {
              currentRun = run;
              runStart = performance.now();
              reporter.startStage('evaluating', questions.length, `run ${run}/${total}`);
            }
            reporter.updateProgress(completed);
            if (completed === questions.length) {
              reporter.completeStage(completed, performance.now() - runStart);
            }
          },
        });
      } catch (error) {
        reporter.failStage('Evaluation failed');
        throw toCLIError(error);
      }

      // ── Step 4: Report ──────────────────────────────────────────────────
      if (cmdOptions.output) {
        writeEvaluationReport(cmdOptions.output, summary);
        ctx.debug(`Report written to ${cmdOptions.output}`);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        ctx.log('');
        ctx.log(formatEvaluationReport(summary, ctx.options.verbose));
        if (cmdOptions.output) {
          ctx.log('');
          ctx.log(chalk.dim(`Full report: ${cmdOptions.output}`));
        }
      }

      if (!summary.passed) {
        process.exitCode = 1;
      }
    });
}
