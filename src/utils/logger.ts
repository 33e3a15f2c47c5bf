/**
 * Logger Interface for Library Code
 *
 * The walker, signature engine and pipeline accept a Logger instead of
 * writing to the console themselves. The CLI passes its CommandContext
 * (which satisfies this interface), tests pass mocks or silentLogger.
 */

/**
 * Generic logger interface for library code
 *
 * Shaped so a CommandContext can be passed directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (only shown in verbose mode by the CLI) */
  debug?: (message: string) => void;
}

/**
 * Console logger used when nothing is injected.
 * Writes to stderr so it never mixes with a document written to stdout.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.error(message),
};

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
