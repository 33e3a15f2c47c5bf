/**
 * repodigest - Library Entry Point
 *
 * The CLI (`repodigest`) covers most uses. These exports let other tools
 * run a digest, render one of the formats, or call the signature engine
 * directly.
 *
 * @example Run a digest
 * ```typescript
 * import { loadConfig, runDigest } from 'repodigest';
 *
 * const result = await runDigest({
 *   path: './my-project',
 *   config: loadConfig({ targetDir: './my-project' }),
 * });
 * console.log(result.outputPath);
 * ```
 *
 * @example Summarize one file
 * ```typescript
 * import { processFile } from 'repodigest';
 *
 * processFile('app.py', 'def main():\n    pass\n'); // 'def main(): [lines:2]'
 * ```
 *
 * @packageDocumentation
 */

export { runDigest } from './pipeline.js';
export type { DigestOptions, DigestResult } from './pipeline.js';

export * from './signatures/index.js';

export {
  loadConfig,
  parseConfig,
  mergeCliOptions,
  parseSize,
  writeConfigTemplate,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from './config/index.js';
export type { Config, OutputFormat, CliOverrides } from './config/index.js';

export { collectFiles, readTextFile, isBinaryContent } from './walker/index.js';
export type { WalkOptions } from './walker/index.js';

export { prepareRepository, getRepoInfo, repoNameFromUrl } from './git/index.js';
export type { GitRunner, RepoInfo } from './git/index.js';

export { StatsCollector, formatSize } from './stats/index.js';
export type { RepoStats } from './stats/index.js';

export { getFormatter, buildTree, writeOutput } from './formatters/index.js';
export type { FileUnit, FormatInput, Formatter } from './formatters/index.js';

export {
  CLIError,
  ConfigError,
  GitError,
  WalkerError,
  FormatterError,
  ValidationError,
  FileNotFoundError,
} from './errors/index.js';

export type { Logger } from './utils/logger.js';
export { consoleLogger, silentLogger } from './utils/logger.js';

export type { GlobalOptions, CommandContext } from './cli/types.js';
