/**
 * Gitignore Pattern Handling
 *
 * Utilities for loading and applying gitignore-style patterns.
 * Uses the 'ignore' package which implements the full gitignore matching rules.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_IGNORE_PATTERNS, type PatternSet } from './types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Options for creating an ignore filter.
 */
export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (applied after .gitignore) */
  additionalPatterns?: readonly string[];

  /** Whether to use default ignore patterns */
  useDefaults?: boolean;

  logger?: Logger;
}

/**
 * A predicate over paths relative to the walk root.
 */
export type PathFilter = (filePath: string) => boolean;

/**
 * Parse gitignore file content into an array of patterns.
 * Drops comments and empty lines; keeps `!` negations.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Load gitignore patterns from a file.
 * Returns an empty array if the file doesn't exist or cannot be read.
 */
export function loadGitignoreFile(gitignorePath: string, logger?: Logger): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }

  try {
    return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`Could not read ${gitignorePath}: ${message}`);
    return [];
  }
}

/**
 * Flatten a file/dir pattern set into one list.
 */
export function flattenPatterns(patterns: PatternSet | undefined): string[] {
  if (!patterns) return [];
  return [...patterns.files, ...patterns.dirs];
}

function toPosixRelative(rootPath: string, filePath: string): string {
  let relativePath = filePath;
  if (filePath.startsWith(rootPath)) {
    relativePath = relative(rootPath, filePath);
  }
  // The ignore library wants forward slashes
  if (sep === '\\') {
    relativePath = relativePath.split(sep).join('/');
  }
  return relativePath;
}

/**
 * Create an ignore filter for the given root directory.
 *
 * Patterns are loaded in order:
 * 1. DEFAULT_IGNORE_PATTERNS (if useDefaults is true)
 * 2. .gitignore in the root directory
 * 3. Additional patterns passed in options
 *
 * @returns A filter that returns true if a path should be IGNORED
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({
 *   rootPath: '/path/to/project',
 *   additionalPatterns: ['*.log'],
 * });
 *
 * shouldIgnore('node_modules/package/index.js'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): PathFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true, logger } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add([...DEFAULT_IGNORE_PATTERNS]);
  }

  const gitignorePatterns = loadGitignoreFile(join(rootPath, '.gitignore'), logger);
  if (gitignorePatterns.length > 0) {
    ig.add(gitignorePatterns);
  }

  if (additionalPatterns.length > 0) {
    ig.add([...additionalPatterns]);
  }

  return (filePath: string): boolean => {
    const relativePath = toPosixRelative(rootPath, filePath);

    // The root itself is never ignored
    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}

/**
 * Create an include filter: a path passes if it matches at least one
 * pattern. With no patterns every path passes.
 *
 * Patterns use gitignore matching, so `src/` keeps everything under src
 * and `*.ts` keeps TypeScript files at any depth.
 */
export function createIncludeFilter(rootPath: string, patterns: readonly string[]): PathFilter {
  if (patterns.length === 0) {
    return () => true;
  }

  const ig = ignore().add([...patterns]);
  return (filePath: string): boolean => {
    const relativePath = toPosixRelative(rootPath, filePath);
    return relativePath !== '' && ig.ignores(relativePath);
  };
}
