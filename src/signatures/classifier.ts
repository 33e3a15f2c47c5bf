/**
 * Extension Classifier
 *
 * Maps a file path to the processing category the signature engine applies.
 * The lookup tables are module-level constants; classification is a pure
 * function of the lower-cased extension.
 */

import { extname } from 'node:path';

import { PATTERN_TABLES } from './patterns.js';
import type { Classification, SignatureLanguage } from './types.js';

/**
 * Flat data and config formats whose signature is just their line count.
 */
export const LINE_COUNT_ONLY_EXTENSIONS: ReadonlySet<string> = new Set([
  'yml',
  'yaml',
  'json',
  'jsonc',
  'json5',
  'toml',
  'ini',
  'cfg',
  'conf',
  'config',
  'txt',
  'log',
  'csv',
  'tsv',
  'xml',
  'properties',
  'env',
  'lock',
]);

export const MARKDOWN_EXTENSIONS: ReadonlySet<string> = new Set(['md', 'markdown']);

/**
 * Extensions that have a pattern table, keyed to the table's language.
 */
export const CODE_EXTENSIONS: Readonly<Record<string, SignatureLanguage>> = Object.freeze({
  py: 'python',
  pyw: 'python',
  pyi: 'python',

  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',

  ts: 'typescript',
  tsx: 'typescript',
  mts: 'typescript',
  cts: 'typescript',

  go: 'go',
  rs: 'rust',
  java: 'java',
  kt: 'kotlin',
  kts: 'kotlin',
  scala: 'scala',
  sc: 'scala',
  swift: 'swift',

  c: 'c',
  h: 'c',
  cpp: 'cpp',
  cc: 'cpp',
  cxx: 'cpp',
  hpp: 'cpp',
  hh: 'cpp',
  hxx: 'cpp',

  cs: 'csharp',
  rb: 'ruby',
  rake: 'ruby',
  php: 'php',
});

/**
 * Get the lower-cased extension of a path, without the leading dot.
 * Dotfiles such as `.gitignore` have no extension.
 */
export function getExtension(filePath: string): string {
  const ext = extname(filePath);
  return ext.startsWith('.') ? ext.slice(1).toLowerCase() : '';
}

/**
 * Classify a file by its extension.
 *
 * @example
 * ```ts
 * classifyFile('src/app.ts').category;   // 'code'
 * classifyFile('config.yml').category;   // 'line-count-only'
 * classifyFile('data.xyz').category;     // 'passthrough'
 * ```
 */
export function classifyFile(filePath: string): Classification {
  const extension = getExtension(filePath);

  if (extension === '') {
    return { category: 'passthrough', extension };
  }

  if (LINE_COUNT_ONLY_EXTENSIONS.has(extension)) {
    return { category: 'line-count-only', extension };
  }

  if (MARKDOWN_EXTENSIONS.has(extension)) {
    return { category: 'markdown', extension };
  }

  const language = CODE_EXTENSIONS[extension];
  if (language !== undefined) {
    return { category: 'code', extension, table: PATTERN_TABLES[language] };
  }

  return { category: 'passthrough', extension };
}
