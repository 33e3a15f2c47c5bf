/**
 * JSON Formatter
 */

import { buildDocument } from './document.js';
import type { FormatInput, Formatter } from './types.js';

export class JsonFormatter implements Formatter {
  readonly name = 'json' as const;
  readonly extension = '.json';

  format(input: FormatInput): string {
    return JSON.stringify(buildDocument(input), null, 2);
  }
}
