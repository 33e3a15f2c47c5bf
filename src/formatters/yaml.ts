/**
 * YAML Formatter
 *
 * Same document as the JSON output. Multi-line strings come out as block
 * literals, so file contents stay readable.
 */

import yaml from 'js-yaml';

import { buildDocument } from './document.js';
import type { FormatInput, Formatter } from './types.js';

export class YamlFormatter implements Formatter {
  readonly name = 'yaml' as const;
  readonly extension = '.yaml';

  format(input: FormatInput): string {
    return yaml.dump(buildDocument(input), {
      lineWidth: -1,
      noRefs: true,
    });
  }
}
