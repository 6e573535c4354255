/**
 * Error type definitions for the mcq CLI
 *
 * Every error the CLI can surface carries a recovery hint and an exit code,
 * so scripts driving `mcq eval` can branch on the code alone.
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user how to fix the problem
 * - code: exit code (1-255, 0 is reserved for success)
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors: invalid TOML, unknown keys,
 * RAG enabled without a usable corpus.
 *
 * Exit code 2. The agent and the evaluation harness treat this as fatal.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: mcq config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or invalid.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when a corpus produced chunks but none of them could be embedded.
 *
 * Exit code 5
 */
export class IndexBuildError extends CLIError {
  /** The last embedding failure, for --verbose output */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check the embedding provider settings: mcq config get embedding', 5);
    this.name = 'IndexBuildError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
