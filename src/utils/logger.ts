/**
 * Logger Interface for Library Code
 *
 * This provides a generic logging interface that library code can accept
 * via dependency injection. The CLI layer can pass CommandContext-backed
 * implementations, while tests can pass mock loggers.
 *
 * - Indexer, agent, evaluation: take a Logger
 * - CLI: passes its CommandContext (which satisfies Logger)
 * - Tests: pass silentLogger or vi.fn() spies
 */

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Plain console logger for scripts that run without a CommandContext.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
