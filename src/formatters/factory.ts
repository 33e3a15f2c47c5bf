/**
 * Formatter lookup by output format.
 */

import type { OutputFormat } from '../config/index.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import type { Formatter } from './types.js';
import { YamlFormatter } from './yaml.js';

export function getFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case 'markdown':
      return new MarkdownFormatter();
    case 'json':
      return new JsonFormatter();
    case 'yaml':
      return new YamlFormatter();
  }
}

/**
 * Default output file name for a format, e.g. `project_summary.json`.
 */
export function defaultOutputFile(format: OutputFormat): string {
  return `project_summary${getFormatter(format).extension}`;
}
