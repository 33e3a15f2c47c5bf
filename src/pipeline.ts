/**
 * Digest Pipeline
 *
 * Orchestrates one run: Prepare → Scan → Read → Write.
 *
 * The pipeline knows nothing about display. It fires callbacks at each
 * stage and collects non-fatal problems as warnings; only failures that
 * leave nothing to write (clone, missing root, output) are thrown.
 */

import { stat } from 'node:fs/promises';
import { basename, isAbsolute, join, relative, resolve, sep } from 'node:path';

import type { Config } from './config/index.js';
import { parseSize } from './config/index.js';
import {
  defaultOutputFile,
  findReadme,
  getFormatter,
  writeOutput,
  type FileUnit,
} from './formatters/index.js';
import {
  defaultGitRunner,
  getRepoInfo,
  prepareRepository,
  repoNameFromUrl,
  type GitRunner,
} from './git/index.js';
import { summarizeFile } from './signatures/index.js';
import { StatsCollector, type RepoStats } from './stats/index.js';
import { collectFiles, readTextFile } from './walker/index.js';
import type { Logger } from './utils/logger.js';
import type { DigestStage, StageStats, DigestPipelineResult } from './cli/utils/progress.js';

export interface DigestOptions {
  /** Local directory to digest; defaults to the current directory */
  path?: string;

  /** Remote repository to clone and digest instead of `path` */
  repoUrl?: string;

  /** Branch to check out when cloning */
  branch?: string;

  /** Clone destination; defaults to `./<repository name>` */
  targetDir?: string;

  /** Output file; defaults to `project_summary.<ext>` in the current directory */
  outputPath?: string;

  /** Fully merged configuration */
  config: Config;

  /** Digest a local directory that is not a Git work tree */
  force?: boolean;

  gitRunner?: GitRunner;

  /** Clock used for the document timestamp */
  now?: () => Date;

  // Progress callbacks
  onStageStart?: (stage: DigestStage, total: number) => void;
  onProgress?: (stage: DigestStage, processed: number, total: number, currentFile?: string) => void;
  onStageComplete?: (stage: DigestStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
}

export interface DigestResult extends DigestPipelineResult {
  stats: RepoStats;
  /** Branch reported by git, or "unknown" */
  branch: string;
}

/**
 * Path of the output file relative to the root as an anchored ignore
 * pattern, or null when the output lies outside the root.
 */
function outputIgnorePattern(rootPath: string, outputPath: string): string | null {
  const rel = relative(rootPath, outputPath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return '/' + rel.split(sep).join('/');
}

/**
 * Run a complete digest and write the document.
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 * const config = loadConfig({ targetDir: '/path/to/repo' });
 *
 * const result = await runDigest({
 *   path: '/path/to/repo',
 *   config,
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, file) => reporter.updateProgress(processed, file),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 *   onWarning: (msg, ctx) => reporter.warn(msg, ctx),
 * });
 *
 * reporter.showSummary(result);
 * ```
 */
export async function runDigest(options: DigestOptions): Promise<DigestResult> {
  const { config, onStageStart, onProgress, onStageComplete, onWarning } = options;
  const runner = options.gitRunner ?? defaultGitRunner;
  const now = options.now ?? (() => new Date());

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<DigestStage, number>> = {};
  const warnings: string[] = [];

  const logger: Logger = {
    warn: (message) => {
      warnings.push(message);
      onWarning?.(message);
    },
  };

  // =========================================================================
  // STAGE 1: PREPARING
  // =========================================================================
  const prepareStartTime = performance.now();
  onStageStart?.('preparing', 1);

  const targetDir = options.repoUrl
    ? (options.targetDir ?? join(process.cwd(), repoNameFromUrl(options.repoUrl)))
    : resolve(options.path ?? process.cwd());

  const rootPath = prepareRepository(
    {
      repoUrl: options.repoUrl,
      targetDir,
      branch: options.branch,
      force: options.force,
    },
    runner
  );
  const repoInfo = getRepoInfo(rootPath, runner);
  const maxBytes = parseSize(config.general.max_file_size);

  stageDurations.preparing = Math.round(performance.now() - prepareStartTime);
  onStageComplete?.('preparing', {
    stage: 'preparing',
    processed: 1,
    total: 1,
    durationMs: stageDurations.preparing,
    details: { rootPath, branch: repoInfo.branch, isGitRepo: repoInfo.isGitRepo },
  });

  // =========================================================================
  // STAGE 2: SCANNING
  // =========================================================================
  const scanStartTime = performance.now();
  onStageStart?.('scanning', 0);

  const format = config.output.format;
  const outputPath = resolve(options.outputPath ?? defaultOutputFile(format));
  const outputPattern = outputIgnorePattern(rootPath, outputPath);

  const paths = await collectFiles(rootPath, {
    maxDepth: config.general.max_depth,
    include: config.include,
    exclude: config.exclude,
    extraIgnores: outputPattern ? [outputPattern] : [],
    logger,
  });

  stageDurations.scanning = Math.round(performance.now() - scanStartTime);
  onStageComplete?.('scanning', {
    stage: 'scanning',
    processed: paths.length,
    total: paths.length,
    durationMs: stageDurations.scanning,
  });

  // =========================================================================
  // STAGE 3: READING
  // =========================================================================
  const readStartTime = performance.now();
  onStageStart?.('reading', paths.length);

  const collector = new StatsCollector();
  const rawFiles: FileUnit[] = [];
  const files: FileUnit[] = [];

  for (const [index, relPath] of paths.entries()) {
    const absolutePath = join(rootPath, relPath);

    let content: string | null = null;
    let sizeBytes = 0;
    try {
      sizeBytes = (await stat(absolutePath)).size;
      content = await readTextFile(absolutePath, maxBytes, logger);
    } catch (error) {
      logger.warn(
        `Could not read ${relPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    collector.processFile(relPath, content, sizeBytes);
    rawFiles.push({ path: relPath, content });
    files.push({
      path: relPath,
      content:
        content !== null && config.output.signatures
          ? summarizeFile(relPath, content, logger)
          : content,
    });

    onProgress?.('reading', index + 1, paths.length, relPath);
  }

  const stats = collector.getStats(repoInfo.branch);
  const textFiles = files.filter((file) => file.content !== null).length;

  stageDurations.reading = Math.round(performance.now() - readStartTime);
  onStageComplete?.('reading', {
    stage: 'reading',
    processed: paths.length,
    total: paths.length,
    durationMs: stageDurations.reading,
    details: { textFiles, binaryFiles: paths.length - textFiles },
  });

  // =========================================================================
  // STAGE 4: WRITING
  // =========================================================================
  const writeStartTime = performance.now();
  onStageStart?.('writing', 1);

  const includeStats = config.output.stats && config.general.stats_in_output;
  const document = getFormatter(format).format({
    rootName: basename(rootPath),
    files,
    readme: findReadme(rawFiles)?.content ?? null,
    stats: includeStats ? stats : null,
    signatures: config.output.signatures,
    generatedAt: now(),
  });
  await writeOutput(outputPath, document);

  stageDurations.writing = Math.round(performance.now() - writeStartTime);
  onStageComplete?.('writing', {
    stage: 'writing',
    processed: 1,
    total: 1,
    durationMs: stageDurations.writing,
    details: { outputPath, format, bytes: Buffer.byteLength(document, 'utf8') },
  });

  return {
    outputPath,
    rootPath,
    filesProcessed: paths.length,
    textFiles,
    durationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    stats,
    branch: repoInfo.branch,
  };
}
