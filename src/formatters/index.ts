/**
 * Output Formatters
 *
 * Render a collected repository as Markdown, JSON or YAML.
 */

export { getFormatter, defaultOutputFile } from './factory.js';
export { MarkdownFormatter, SIGNATURES_BANNER, formatStatsSection } from './markdown.js';
export { JsonFormatter } from './json.js';
export { YamlFormatter } from './yaml.js';
export { buildTree } from './tree.js';
export {
  buildDocument,
  statisticsRecord,
  fenceLanguage,
  formatTimestamp,
  findReadme,
  GENERATOR_NAME,
} from './document.js';
export { writeOutput } from './write.js';
export type { FileUnit, FormatInput, Formatter } from './types.js';
export type { DigestDocument } from './document.js';
