/**
 * Signature Engine
 *
 * Heuristic, line-based code summarizer: declarations only, each annotated
 * with the number of lines it spans.
 */

export {
  processFile,
  summarizeFile,
  extractCodeSignatures,
  extractMarkdownHeaders,
  measureSpan,
  renderEntry,
  formatLineCount,
  EMPTY_CODE_MARKER,
} from './processor.js';

export {
  classifyFile,
  getExtension,
  LINE_COUNT_ONLY_EXTENSIONS,
  MARKDOWN_EXTENSIONS,
  CODE_EXTENSIONS,
} from './classifier.js';

export {
  countLinesByBraces,
  countLinesByIndent,
  countLinesByEnd,
  getIndent,
  splitLines,
} from './spans.js';

export { PATTERN_TABLES, isDeclarationLine, isIgnoredLine } from './patterns.js';

export type {
  FileCategory,
  SpanStrategy,
  SignatureLanguage,
  PatternTable,
  Classification,
  SignatureEntry,
} from './types.js';
