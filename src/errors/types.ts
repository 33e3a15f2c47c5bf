/**
 * Error type definitions for the repodigest CLI
 *
 * Every error the tool raises on purpose is a CLIError carrying:
 * - a message saying what failed
 * - a hint saying how to recover
 * - an exit code scripts can branch on
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation to older targets
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
 * Thrown for configuration problems: unreadable TOML, values that fail
 * schema validation, malformed glob patterns.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: repodigest init  to write a fresh config file', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when cloning or inspecting a Git repository fails.
 *
 * Exit code 6
 */
export class GitError extends CLIError {
  /** The underlying failure, if there was one */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error, hint?: string) {
    super(message, hint ?? 'Check that git is installed and the repository is reachable', 6);
    this.name = 'GitError';
    this.cause = cause;
  }
}

/**
 * Thrown when the directory walk cannot start or a directory cannot be read.
 *
 * Exit code 7
 */
export class WalkerError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the directory exists and is readable', 7);
    this.name = 'WalkerError';
    this.cause = cause;
  }
}

/**
 * Thrown when the document cannot be rendered or written.
 *
 * Exit code 8
 */
export class FormatterError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check the output path and its permissions', 8);
    this.name = 'FormatterError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to report field-level problems.
 *
 * Exit code 1 (user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
