/**
 * File Scanner
 *
 * Discovers the files of a repository with fast-glob, then filters them
 * through the ignore rules (defaults, `.gitignore`, exclude patterns) and
 * the include patterns.
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';

import { WalkerError } from '../errors/index.js';
import { createIgnoreFilter, createIncludeFilter, flattenPatterns } from './ignore.js';
import type { WalkOptions } from './types.js';

const DEFAULT_MAX_DEPTH = 10;

/**
 * Directories fast-glob should not descend into at all when the default
 * ignore list is active.
 */
const PRUNED_DIRECTORIES = ['**/.git/**', '**/node_modules/**'];

function assertDirectory(absoluteRoot: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(absoluteRoot).isDirectory();
  } catch (error) {
    throw new WalkerError(
      `Directory does not exist: ${absoluteRoot}`,
      error instanceof Error ? error : undefined
    );
  }
  if (!isDirectory) {
    throw new WalkerError(`Not a directory: ${absoluteRoot}`);
  }
}

/**
 * Collect the files of a directory tree.
 *
 * @param rootPath - Directory to walk (absolute or relative)
 * @returns Paths relative to the root, with forward slashes, sorted
 * @throws WalkerError if the root is missing or not a directory
 *
 * @example
 * ```ts
 * const files = await collectFiles('/path/to/project', {
 *   maxDepth: 3,
 *   exclude: { files: ['*.min.js'], dirs: ['fixtures/'] },
 * });
 * // ['README.md', 'src/index.ts', ...]
 * ```
 */
export async function collectFiles(rootPath: string, options: WalkOptions = {}): Promise<string[]> {
  const absoluteRoot = resolve(rootPath);
  assertDirectory(absoluteRoot);

  const useDefaults = options.useDefaults ?? true;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const isIgnored = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: [...flattenPatterns(options.exclude), ...(options.extraIgnores ?? [])],
    useDefaults,
    logger: options.logger,
  });
  const isIncluded = createIncludeFilter(absoluteRoot, flattenPatterns(options.include));

  let entries: string[];
  try {
    entries = await fg('**/*', {
      cwd: absoluteRoot,
      absolute: false,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: options.followSymlinks ?? false,
      // fast-glob counts the file's own segment; root files are depth 0 here
      deep: maxDepth + 1,
      suppressErrors: true,
      ignore: useDefaults ? PRUNED_DIRECTORIES : [],
    });
  } catch (error) {
    throw new WalkerError(
      `Error collecting files: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  const files = entries.filter((entry) => !isIgnored(entry) && isIncluded(entry));
  options.logger?.debug?.(`Collected ${files.length} of ${entries.length} files`);

  return files.sort();
}
