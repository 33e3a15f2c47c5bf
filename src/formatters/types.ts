/**
 * Formatter Types
 */

import type { OutputFormat } from '../config/index.js';
import type { RepoStats } from '../stats/index.js';

/**
 * One file of the digest.
 */
export interface FileUnit {
  /** Path relative to the repository root, forward slashes */
  path: string;
  /** Text to show, or null for binary and unreadable files */
  content: string | null;
}

/**
 * Everything a formatter needs to render the document.
 */
export interface FormatInput {
  /** Directory name shown at the top of the tree */
  rootName: string;
  /** All collected files, in path order */
  files: FileUnit[];
  /** Raw README text, shown in its own section */
  readme: string | null;
  stats: RepoStats | null;
  /** Whether file contents are signature views */
  signatures: boolean;
  generatedAt: Date;
}

export interface Formatter {
  readonly name: OutputFormat;
  /** File extension for output, with the dot */
  readonly extension: string;
  format(input: FormatInput): string;
}
