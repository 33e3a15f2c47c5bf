/**
 * Walker Module
 *
 * Repository traversal and text file reading.
 */

export { collectFiles } from './scanner.js';
export { readTextFile, isBinaryContent, isBinaryExtension } from './reader.js';
export {
  createIgnoreFilter,
  createIncludeFilter,
  parseGitignoreContent,
  loadGitignoreFile,
  flattenPatterns,
} from './ignore.js';
export type { IgnoreFilterOptions, PathFilter } from './ignore.js';
export { DEFAULT_IGNORE_PATTERNS, BINARY_EXTENSIONS } from './types.js';
export type { WalkOptions, PatternSet } from './types.js';
