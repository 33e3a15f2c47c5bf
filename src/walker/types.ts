/**
 * Walker Types
 *
 * Options for repository traversal and the built-in ignore and binary
 * extension lists.
 */

import type { Logger } from '../utils/logger.js';

/**
 * Gitignore-style patterns for files and directories
 */
export interface PatternSet {
  files: readonly string[];
  dirs: readonly string[];
}

/**
 * Options for collecting files.
 */
export interface WalkOptions {
  /**
   * Deepest directory level to enter. Files directly in the root are at
   * depth 0, so `maxDepth: 1` also takes files one directory down.
   * @default 10
   */
  maxDepth?: number;

  /** When any pattern is given, only matching paths are kept */
  include?: PatternSet;

  /** Paths to drop in addition to the defaults and `.gitignore` */
  exclude?: PatternSet;

  /** Paths relative to the root to drop, such as the output file */
  extraIgnores?: readonly string[];

  /**
   * Apply DEFAULT_IGNORE_PATTERNS
   * @default true
   */
  useDefaults?: boolean;

  /** @default false */
  followSymlinks?: boolean;

  logger?: Logger;
}

/**
 * Patterns that are always ignored. Applied first, so `.gitignore`
 * negations can bring entries back.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies
  'node_modules',
  'venv',
  '.venv',
  '__pycache__',
  '.tox',
  'bower_components',

  // Build outputs and caches
  '.next',
  '.nuxt',
  '.cache',
  '.pytest_cache',
  '.mypy_cache',

  // IDE/Editor
  '.idea',
  '.vscode',
  '*.swp',
  '*.swo',
  '*~',

  // OS files
  '.DS_Store',
  'Thumbs.db',

  // Test coverage
  '.nyc_output',
];

/**
 * Extensions that are never read as text. Matched against the last
 * extension, lower-cased.
 */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  // Compiled
  'pyc',
  'pyo',
  'pyd',
  'class',
  'jar',
  'war',
  'ear',
  'o',
  'obj',
  'so',
  'dll',
  'dylib',
  'exe',
  'bin',
  'wasm',
  'mo',
  'pkl',

  // Images
  'png',
  'jpg',
  'jpeg',
  'gif',
  'bmp',
  'ico',
  'webp',
  'tiff',
  'psd',

  // Audio and video
  'mp3',
  'wav',
  'ogg',
  'flac',
  'mp4',
  'mov',
  'avi',
  'mkv',
  'webm',

  // Archives
  'zip',
  'tar',
  'gz',
  'bz2',
  'xz',
  '7z',
  'rar',

  // Fonts
  'woff',
  'woff2',
  'ttf',
  'otf',
  'eot',

  // Documents and databases
  'pdf',
  'doc',
  'docx',
  'xls',
  'xlsx',
  'ppt',
  'pptx',
  'db',
  'sqlite',
  'sqlite3',
]);
