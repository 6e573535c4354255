/**
 * Ask Command
 *
 * Answers one multiple-choice question:
 *
 *   mcq ask "Which gas do plants absorb?" -c Oxygen "Carbon dioxide" Nitrogen
 *   mcq ask "..." -c A B C D --no-rag
 *   mcq ask "..." -c A B C D --json
 *
 * Exits 1 when no choice could be determined.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCorpusProgress } from '../utils/progress.js';
import { loadConfig } from '../../config/loader.js';
import { createAgentFromConfig, type CreatedAgent } from '../../agent/factory.js';
import { labelForIndex } from '../../agent/labels.js';
import type { AgentAnswer } from '../../agent/types.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

interface AskCommandOptions {
  choice: string[];
  /** false with --no-rag */
  rag: boolean;
  /** Print the raw service response */
  showResponse?: boolean;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  choices: string[];
  /** Chosen index, -1 for none */
  answer: number;
  label: string | null;
  outcome: AgentAnswer['outcome'];
  strategy: string | null;
  response: string;
  error?: string;
  sources: Array<{ chunk: number; score: number; start: number; end: number }>;
  timings: AgentAnswer['timings'];
}

// ============================================================================
// Helpers
// ============================================================================

export function toAskJSON(question: string, choices: string[], result: AgentAnswer): AskOutputJSON {
  return {
    question,
    choices,
    answer: result.index,
    label: result.index >= 0 ? labelForIndex(result.index) : null,
    outcome: result.outcome,
    strategy: result.extraction.kind === 'choice' ? result.extraction.strategy : null,
    response: result.responseText,
    ...(result.error !== undefined && { error: result.error }),
    sources: result.sources.map((s) => ({
      chunk: s.chunk.index,
      score: Number(s.score.toFixed(4)),
      start: s.chunk.start,
      end: s.chunk.end,
    })),
    timings: result.timings,
  };
}

function displayAnswer(ctx: CommandContext, choices: string[], result: AgentAnswer, showResponse: boolean): void {
  if (showResponse && result.responseText) {
    ctx.log(chalk.dim(result.responseText.trim()));
    ctx.log('');
  }

  if (result.index >= 0) {
    const strategy = result.extraction.kind === 'choice' ? result.extraction.strategy : '';
    ctx.log(
      `${chalk.green('✓')} ${chalk.bold(`${labelForIndex(result.index)})`)} ${choices[result.index] ?? ''}` +
        chalk.dim(`  (matched by ${strategy})`)
    );
  } else if (result.outcome === 'service_error') {
    ctx.log(chalk.red(`✗ The generation service failed: ${result.error ?? 'unknown error'}`));
  } else {
    ctx.log(chalk.yellow('✗ No choice could be read from the response'));
    ctx.log(chalk.dim('  Run with --show-response to see what the model said'));
  }

  if (ctx.options.verbose) {
    ctx.log('');
    for (const s of result.sources) {
      ctx.log(chalk.dim(`  [context ${s.chunk.index}] score ${s.score.toFixed(3)}  chars ${s.chunk.start}-${s.chunk.end}`));
    }
    ctx.log(chalk.dim('─'.repeat(50)));
    ctx.log(chalk.dim(`Retrieval: ${result.timings.retrievalMs.toFixed(0)}ms`));
    ctx.log(chalk.dim(`Generation: ${result.timings.generationMs.toFixed(0)}ms`));
    ctx.log(chalk.dim(`Total: ${result.timings.totalMs.toFixed(0)}ms`));
  }
}

// ============================================================================
// Command
// ============================================================================

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'The question text')
    .description('Answer a multiple-choice question')
    .requiredOption('-c, --choice <choices...>', 'Answer choices, in order (2-26)')
    .option('--no-rag', 'Answer without corpus retrieval')
    .option('--show-response', 'Print the raw model response')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const choices = cmdOptions.choice;

      if (!question.trim()) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: mcq ask "Which gas do plants absorb?" -c Oxygen "Carbon dioxide"'
        );
      }
      if (choices.length < 2) {
        throw new CLIError('At least two choices are required', 'Pass them after -c, e.g.: -c Oxygen "Carbon dioxide"');
      }

      const config = loadConfig();
      ctx.debug(`Generation: ${config.generation.model} (${config.generation.provider})`);
      ctx.debug(`Retrieval: ${cmdOptions.rag ? config.rag.enabled : false}`);

      const progress = createCorpusProgress(ctx.options);
      let created: CreatedAgent;
      try {
        created = await createAgentFromConfig(config, {
          rag: cmdOptions.rag ? undefined : false,
          logger: ctx,
          onProgress: progress.onProgress,
        });
      } catch (error) {
        progress.fail('Corpus indexing failed');
        throw error;
      }
      progress.finish();
      const { agent, corpus } = created;
      if (corpus) {
        ctx.debug(
          `Corpus index: ${corpus.index.chunks.length} chunks${corpus.fromCache ? ' (cached)' : ''}`
        );
      }

      const result = await agent.answer(question, choices);

      if (ctx.options.json) {
        console.log(JSON.stringify(toAskJSON(question, choices, result), null, 2));
      } else {
        displayAnswer(ctx, choices, result, cmdOptions.showResponse ?? false);
      }

      if (result.index < 0) {
        process.exitCode = 1;
      }
    });
}
