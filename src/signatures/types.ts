/**
 * Signature Engine Types
 *
 * Type definitions for the signature engine. The engine turns the text of
 * one file into a condensed outline: declarations only, each annotated with
 * the number of source lines it spans.
 */

/**
 * Processing category derived from a file's extension.
 * - line-count-only: config/data formats, summarized as their line count
 * - markdown: ATX headers with section lengths
 * - code: declarations matched by a language pattern table
 * - passthrough: content returned verbatim
 */
export type FileCategory = 'line-count-only' | 'markdown' | 'code' | 'passthrough';

/**
 * How the length of a declaration's body is measured.
 * - brace: `{` / `}` depth counting (C family)
 * - indent: leading-whitespace counting (Python)
 * - end: indentation counting that also takes the closing `end` line (Ruby)
 */
export type SpanStrategy = 'brace' | 'indent' | 'end';

/**
 * Languages that have a pattern table.
 */
export type SignatureLanguage =
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'go'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'scala'
  | 'swift'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'ruby'
  | 'php';

/**
 * Line-shape patterns for one language.
 *
 * Patterns are tested against the trimmed line, so they anchor on the first
 * significant character rather than on column 0.
 */
export interface PatternTable {
  language: SignatureLanguage;
  strategy: SpanStrategy;
  /** Function, method, class and type declarations */
  declarations: readonly RegExp[];
  /** Lines that are never candidates (imports, comments, directives) */
  ignore: readonly RegExp[];
}

/**
 * Result of classifying a path.
 */
export type Classification =
  | {
      category: 'code';
      /** Lower-cased extension without the dot */
      extension: string;
      table: PatternTable;
    }
  | {
      category: Exclude<FileCategory, 'code'>;
      extension: string;
    };

/**
 * One line of signature output before rendering.
 */
export interface SignatureEntry {
  /** The declaration or header line, trailing whitespace removed */
  header: string;
  /** Number of lines the declaration spans (always >= 1) */
  span: number;
  /** Zero-based index of the declaration line in the source */
  lineIndex: number;
}
