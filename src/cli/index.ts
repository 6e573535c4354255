#!/usr/bin/env node
/**
 * mcq CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createEvalCommand } from './commands/eval.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';
import { loadEnv } from '../config/env.js';
import { safeJsonParse } from '../utils/json.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
function readVersion(): string {
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const pkg = safeJsonParse<{ version?: unknown }>(readFileSync(pkgPath, 'utf-8'), {});
    return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('mcq')
  .description('Multiple-choice question answering with optional corpus retrieval')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('mcq index ./notes.txt')}                         Embed a reference corpus
  ${chalk.cyan('mcq ask "Largest planet?" -c Mars Jupiter Venus')}  Answer one question
  ${chalk.cyan('mcq eval questions.json --runs 5')}              Measure accuracy
  ${chalk.cyan('mcq config set rag.top_k 5')}                    Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createEvalCommand(getContext));
program.addCommand(createIndexCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: mcq --help  to see available commands');
});

// Check API keys before commands that call a provider
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const rag = actionCommand.opts<{ rag?: boolean }>().rag !== false;
  const validationOptions = getValidationOptionsForCommand(actionCommand.name(), rag);

  if (validationOptions.skipGeneration && validationOptions.skipEmbedding) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  loadEnv();

  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
