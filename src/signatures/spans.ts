/**
 * Block Span Calculators
 *
 * Given the index of a declaration line, work out how many physical lines
 * the declaration occupies. Two measures cover every supported language:
 * brace depth for C-family syntax and indentation for offside-rule syntax.
 *
 * Both functions are total: malformed input shortens or lengthens a span
 * but never throws, and neither reads past the end of `lines`.
 */

/** Columns a tab counts for when measuring indentation */
const TAB_WIDTH = 4;

/**
 * How many lines a signature may wrap over before its opening brace.
 * Beyond this the declaration is treated as bodiless.
 */
const MAX_SIGNATURE_LINES = 12;

/**
 * Line endings that mean the declaration continues on the next line
 * (open parameter list, trailing comma, `=>`, generic bracket, union).
 */
const CONTINUATION_SUFFIX = /[,(<=|&>]$/;

/**
 * Split file content into lines.
 *
 * Accepts `\n` and `\r\n`. A single trailing newline terminates the last
 * line rather than starting an empty one, so `"a\nb\n"` is two lines.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Width of a line's leading whitespace.
 */
export function getIndent(line: string): number {
  let width = 0;
  for (const char of line) {
    if (char === ' ') {
      width += 1;
    } else if (char === '\t') {
      width += TAB_WIDTH;
    } else {
      break;
    }
  }
  return width;
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

/**
 * Net change in brace depth on one line.
 *
 * Skips double-quoted and backtick strings and anything after `//`.
 * Single quotes are left alone since they are also Rust lifetimes and
 * English apostrophes. A `}` seen before any `{` has opened does not count
 * when `ignoreLeadingClose` is set.
 */
function braceDelta(
  line: string,
  ignoreLeadingClose: boolean
): { delta: number; opened: boolean } {
  let delta = 0;
  let opened = false;
  let quote: string | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quote !== null) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === '"' || char === '`') {
      quote = char;
    } else if (char === '/' && line[i + 1] === '/') {
      break;
    } else if (char === '{') {
      delta++;
      opened = true;
    } else if (char === '}') {
      if (ignoreLeadingClose && !opened && delta <= 0) continue;
      delta--;
    }
  }

  return { delta, opened };
}

/**
 * Count the lines of a brace-delimited block.
 *
 * Scans from `startIndex` accumulating brace depth. The span ends on the
 * first line where depth returns to zero after it has been above zero.
 *
 * - A block opened and closed on the start line spans 1 line.
 * - A declaration with no body (`foo(): void;`, `type A = B`) spans 1 line.
 * - A block that never closes runs to the end of `lines`.
 *
 * The opening brace may sit on a later line when the signature wraps
 * (the line ends in `,`, `(`, `=>` and similar, or the next line closes the
 * parameter list) or in Allman style (the next line starts with `{`).
 *
 * @example
 * ```ts
 * countLinesByBraces(['function test() {', '  let x = 1;', '  return x;', '}'], 0); // 4
 * ```
 */
export function countLinesByBraces(lines: readonly string[], startIndex: number): number {
  if (startIndex < 0 || startIndex >= lines.length) {
    return 1;
  }

  let depth = 0;
  let opened = false;

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i];
    const { delta, opened: openedHere } = braceDelta(line, !opened);
    depth += delta;
    opened = opened || openedHere;

    if (opened) {
      if (depth <= 0) {
        return i - startIndex + 1;
      }
      continue;
    }

    // Still looking for the opening brace
    const next = i + 1 < lines.length ? lines[i + 1].trim() : '';
    const wraps =
      CONTINUATION_SUFFIX.test(line.trimEnd()) || next.startsWith('{') || next.startsWith(')');
    if (!wraps || i - startIndex + 1 >= MAX_SIGNATURE_LINES) {
      return 1;
    }
  }

  return opened ? lines.length - startIndex : 1;
}

/**
 * Count the lines of an indentation-delimited block.
 *
 * A line belongs to the block if it is blank or indented deeper than
 * `baseIndent`. The block ends before the first non-blank line at or left
 * of `baseIndent`. Blank lines before that line, and blank lines at the end
 * of the file, are part of the block.
 *
 * @example
 * ```ts
 * countLinesByIndent(['def test():', '    x = 1', '    return x', '', 'def next_function():'], 0, 0); // 4
 * ```
 */
export function countLinesByIndent(
  lines: readonly string[],
  startIndex: number,
  baseIndent: number
): number {
  if (startIndex < 0 || startIndex >= lines.length) {
    return 1;
  }

  let count = 1;
  for (let i = startIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    if (!isBlank(line) && getIndent(line) <= baseIndent) {
      break;
    }
    count++;
  }
  return count;
}

/**
 * Count the lines of a block closed by an `end` keyword (Ruby).
 *
 * Same as {@link countLinesByIndent}, plus the terminating line when it is
 * `end` at the declaration's own indentation.
 */
export function countLinesByEnd(
  lines: readonly string[],
  startIndex: number,
  baseIndent: number
): number {
  const count = countLinesByIndent(lines, startIndex, baseIndent);
  const terminator = startIndex + count;

  if (
    terminator < lines.length &&
    getIndent(lines[terminator]) === baseIndent &&
    /^end\b/.test(lines[terminator].trim())
  ) {
    return count + 1;
  }
  return count;
}
