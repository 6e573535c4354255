/**
 * Error formatting and process exit handling for the mcq CLI
 *
 * - Colored output for terminals
 * - JSON output when --json is set
 * - Stack traces with --verbose
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

function withStack(lines: string[], stack: string | undefined): void {
  lines.push('');
  lines.push(chalk.dim('Stack trace:'));
  lines.push(chalk.dim(stack ?? ''));
}

/**
 * Format an error for display without exiting.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (verbose && error.stack) {
      withStack(lines, error.stack);
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (verbose && error.stack) {
      withStack(lines, error.stack);
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }
    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }
  return chalk.red('Error: ') + String(error);
}

/**
 * CLIError carries its own exit code, everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Build a handler for `uncaughtException` / `unhandledRejection`.
 *
 * @example
 * ```ts
 * const handler = createGlobalErrorHandler({ verbose: true });
 * process.on('uncaughtException', handler);
 * process.on('unhandledRejection', handler);
 * ```
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
