/**
 * Startup Configuration Validation
 *
 * Checks provider credentials before a command that needs them runs, so a
 * missing key fails fast instead of after the corpus has been indexed.
 *
 * Commands that call no provider (config) skip validation entirely.
 */

import chalk from 'chalk';

import { validateProviderKey } from '../providers/validation.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { loadConfig } from './loader.js';
import type { Config, ProviderType } from './schema.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether all required credentials are present and well-formed */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Issues that stop the command */
  errors: string[];
  /** Setup instructions for each error */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the generation provider (commands that never generate) */
  skipGeneration?: boolean;
  /** Skip the embedding provider (no retrieval) */
  skipEmbedding?: boolean;
  /** Config to check; loaded from disk when omitted */
  config?: Config;
}

// ============================================================================
// Validation Functions
// ============================================================================

function label(provider: ProviderType): string {
  return provider === 'openai-compatible'
    ? 'OpenAI-compatible'
    : provider.charAt(0).toUpperCase() + provider.slice(1);
}

/**
 * Validate provider credentials for the configured back ends.
 *
 * When generation and embedding use the same provider it is checked once.
 *
 * @example
 * const result = validateStartupConfig({ skipEmbedding: true });
 * if (!result.valid) {
 *   printStartupValidation(result);
 * }
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipGeneration = false, skipEmbedding = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config = options.config;
  if (!config) {
    try {
      config = loadConfig(false);
    } catch (error) {
      // The command itself reports the config error with its hint
      warnings.push(
        `Could not read config, checking default providers: ${error instanceof Error ? error.message : String(error)}`
      );
      config = DEFAULT_CONFIG;
    }
  }

  const providers = new Set<ProviderType>();
  if (!skipGeneration) providers.add(config.generation.provider);
  if (!skipEmbedding) providers.add(config.embedding.provider);

  for (const provider of providers) {
    const validation = validateProviderKey(provider);
    if (!validation.valid) {
      errors.push(`${label(provider)} provider issue: ${validation.error}`);
      hints.push(validation.setupInstructions);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation errors (and, in verbose mode, warnings).
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/** Commands that call the generation service */
export const COMMANDS_REQUIRING_GENERATION = ['ask', 'eval'];

/** Commands that call the embedding provider (unless run with --no-rag) */
export const COMMANDS_REQUIRING_EMBEDDING = ['ask', 'eval', 'index'];

/**
 * Validation options for a command.
 *
 * @param command - Command name (e.g., 'ask', 'config')
 * @param rag - false when the command was given --no-rag
 */
export function getValidationOptionsForCommand(
  command: string,
  rag = true
): StartupValidationOptions {
  return {
    skipGeneration: !COMMANDS_REQUIRING_GENERATION.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command) || !rag,
  };
}
