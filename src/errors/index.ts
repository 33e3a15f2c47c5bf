/**
 * Error classes and the CLI error handler
 *
 * @example
 * ```ts
 * import { ConfigError, handleError } from './errors/index.js';
 *
 * throw new ConfigError('Invalid max_file_size: "lots"', 'Use a size such as 512KB or 1MB');
 * ```
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  GitError,
  WalkerError,
  FormatterError,
  ValidationError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
