/**
 * Signature Processor
 *
 * Turns the text of one file into its signature view:
 *
 * | Category         | Output                                          |
 * |------------------|-------------------------------------------------|
 * | line-count-only  | `[lines:N]`                                     |
 * | markdown         | one `<header> [lines:N]` per ATX header         |
 * | code             | one `<declaration> [lines:N]` per declaration   |
 * | passthrough      | the content, unchanged                          |
 *
 * Empty input always yields `""`. A code file with no declarations yields
 * `"empty"`. Everything here is a pure function of `(path, content)`.
 */

import type { Logger } from '../utils/logger.js';
import { consoleLogger } from '../utils/logger.js';
import { classifyFile } from './classifier.js';
import {
  MARKDOWN_FENCE,
  MARKDOWN_HEADER,
  isDeclarationLine,
  isIgnoredLine,
} from './patterns.js';
import {
  countLinesByBraces,
  countLinesByEnd,
  countLinesByIndent,
  getIndent,
  splitLines,
} from './spans.js';
import type { PatternTable, SignatureEntry } from './types.js';

/** Returned for code files that contain no declarations */
export const EMPTY_CODE_MARKER = 'empty';

/**
 * Render a line count marker: `[lines:N]`.
 */
export function formatLineCount(count: number): string {
  return `[lines:${count}]`;
}

/**
 * Render one entry: `<header> [lines:N]`.
 */
export function renderEntry(entry: SignatureEntry): string {
  return `${entry.header} ${formatLineCount(entry.span)}`;
}

/**
 * Find ATX headers and the length of the section under each one.
 *
 * A section's length is the number of lines after its header up to the
 * next header or end of file, with a minimum of 1. Lines inside fenced
 * code blocks are never headers.
 */
export function extractMarkdownHeaders(lines: readonly string[]): SignatureEntry[] {
  const headerIndexes: number[] = [];
  // Marker run of the open fence; only a bare run of the same character,
  // at least as long, closes it
  let openFence: string | null = null;

  lines.forEach((line, index) => {
    const fence = MARKDOWN_FENCE.exec(line);
    if (openFence !== null) {
      if (
        fence &&
        fence[1][0] === openFence[0] &&
        fence[1].length >= openFence.length &&
        fence[2].trim() === ''
      ) {
        openFence = null;
      }
      return;
    }
    if (fence && !(fence[1][0] === '`' && fence[2].includes('`'))) {
      openFence = fence[1];
      return;
    }
    if (MARKDOWN_HEADER.test(line)) {
      headerIndexes.push(index);
    }
  });

  return headerIndexes.map((lineIndex, i) => {
    const sectionEnd = i + 1 < headerIndexes.length ? headerIndexes[i + 1] : lines.length;
    return {
      header: lines[lineIndex].trimEnd(),
      span: Math.max(1, sectionEnd - lineIndex - 1),
      lineIndex,
    };
  });
}

/**
 * Measure the span of the declaration at `lineIndex` with the table's strategy.
 */
export function measureSpan(
  lines: readonly string[],
  lineIndex: number,
  table: PatternTable
): number {
  switch (table.strategy) {
    case 'brace':
      return countLinesByBraces(lines, lineIndex);
    case 'indent':
      return countLinesByIndent(lines, lineIndex, getIndent(lines[lineIndex]));
    case 'end':
      return countLinesByEnd(lines, lineIndex, getIndent(lines[lineIndex]));
  }
}

/**
 * Find declaration lines and measure each one's span.
 * Entries come back in source order, nested declarations included.
 */
export function extractCodeSignatures(
  lines: readonly string[],
  table: PatternTable
): SignatureEntry[] {
  const entries: SignatureEntry[] = [];

  lines.forEach((line, lineIndex) => {
    const trimmed = line.trim();
    if (isIgnoredLine(trimmed, table) || !isDeclarationLine(trimmed, table)) {
      return;
    }
    entries.push({
      header: line.trimEnd(),
      span: measureSpan(lines, lineIndex, table),
      lineIndex,
    });
  });

  return entries;
}

/**
 * Produce the signature view of a file.
 *
 * @param filePath - Path used only for its extension
 * @param content - Decoded text of the file
 * @returns The condensed view (see module docs for the shape per category)
 *
 * @example
 * ```ts
 * processFile('app.py', 'def test(): pass');  // 'def test(): pass [lines:1]'
 * processFile('config.yml', 'a: 1\nb: 2');    // '[lines:2]'
 * processFile('notes.xyz', 'hello');          // 'hello'
 * ```
 */
export function processFile(filePath: string, content: string): string {
  if (content === '') {
    return '';
  }

  const classification = classifyFile(filePath);

  switch (classification.category) {
    case 'line-count-only':
      return formatLineCount(splitLines(content).length);

    case 'markdown':
      return extractMarkdownHeaders(splitLines(content)).map(renderEntry).join('\n');

    case 'code': {
      const entries = extractCodeSignatures(splitLines(content), classification.table);
      if (entries.length === 0) {
        return EMPTY_CODE_MARKER;
      }
      return entries.map(renderEntry).join('\n');
    }

    case 'passthrough':
      return content;
  }
}

/**
 * {@link processFile} for batch callers: a fault while summarizing one
 * file is logged and the original content is returned in its place.
 */
export function summarizeFile(
  filePath: string,
  content: string,
  logger: Logger = consoleLogger
): string {
  try {
    return processFile(filePath, content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not extract signatures from ${filePath}: ${message}`);
    return content;
  }
}
