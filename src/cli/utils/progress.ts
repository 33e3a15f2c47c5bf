/**
 * Progress Reporter
 *
 * Shows progress while a digest runs. Three output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: one line per stage for non-TTY environments
 *
 * Spinner updates are throttled to 100ms and long paths are shortened from
 * the left. NO_COLOR turns colors off.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Stages of the digest pipeline, in the order they run.
 */
export type DigestStage = 'preparing' | 'scanning' | 'reading' | 'writing';

const STAGE_LABELS: Record<DigestStage, string> = {
  preparing: 'Preparing',
  scanning: 'Scanning',
  reading: 'Reading',
  writing: 'Writing',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-file output and warnings */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: DigestStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Final result of a digest run.
 */
export interface DigestPipelineResult {
  /** Absolute path of the written document */
  outputPath: string;

  /** Directory that was digested */
  rootPath: string;

  /** Number of files listed in the document */
  filesProcessed: number;

  /** Files whose content was included */
  textFiles: number;

  /** Total time in milliseconds */
  durationMs: number;

  /** Time breakdown by stage */
  stageDurations: Partial<Record<DigestStage, number>>;

  warnings: string[];
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: DigestStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter drives all progress display during a digest.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: false });
 *
 * reporter.startStage('reading', 120);
 * reporter.updateProgress(10, 'src/main.py');
 * reporter.completeStage({ stage: 'reading', processed: 120, total: 120, durationMs: 300 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: DigestStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = Number.NEGATIVE_INFINITY;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates */
  private static readonly UPDATE_THROTTLE_MS = 100;

  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a stage.
   *
   * @param total - Expected total items (0 if unknown, like during scanning)
   */
  startStage(stage: DigestStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.lastUpdateTime = Number.NEGATIVE_INFINITY;
    this.verboseLines = [];

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();

      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: {
          processed,
          total: this.currentTotal,
          currentFile,
        },
      });
      return;
    }

    let progressText: string;
    if (this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
    } else {
      progressText = `Found ${processed} files`;
    }

    const truncatedPath = currentFile ? this.truncatePath(currentFile) : '';

    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = truncatedPath
        ? `${progressText.padEnd(25)} ${chalk.dim(truncatedPath)}`
        : progressText;
    }

    if (this.options.verbose && currentFile) {
      this.verboseLines.push(`  → ${currentFile}`);
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(
        `${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );

      if (this.options.verbose && this.verboseLines.length > 0) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Display a warning. On a TTY, only shown in verbose mode.
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Stop the current spinner, marking the stage as failed.
   */
  fail(): void {
    this.spinner?.fail();
    this.spinner = null;
    this.currentStage = null;
  }

  /**
   * Display the final summary after the document is written.
   */
  showSummary(result: DigestPipelineResult): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result },
      });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Digest Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Output:')}           ${result.outputPath}`);
    console.log(`  ${chalk.dim('Files listed:')}     ${result.filesProcessed.toLocaleString()}`);
    console.log(`  ${chalk.dim('With content:')}     ${result.textFiles.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.durationMs)}`);

    if (this.options.verbose) {
      const stages = Object.keys(STAGE_LABELS).filter(isDigestStage);
      const timed = stages.filter((stage) => result.stageDurations[stage] !== undefined);
      if (timed.length > 0) {
        console.log('');
        console.log(chalk.dim('  Breakdown:'));
        for (const stage of timed) {
          const label = STAGE_LABELS[stage];
          const duration = formatDuration(result.stageDurations[stage] ?? 0);
          console.log(`    ${chalk.dim(label + ':')}${' '.repeat(12 - label.length)}${duration}`);
        }
      }
    }

    if (result.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${result.warnings.length} warning(s) during digest`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  private getStageUnit(stage: DigestStage): string {
    switch (stage) {
      case 'preparing':
        return 'repository ready';
      case 'scanning':
        return 'files found';
      case 'reading':
        return 'files read';
      case 'writing':
        return 'document written';
    }
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

function isDigestStage(value: string): value is DigestStage {
  return value in STAGE_LABELS;
}

/**
 * Format milliseconds as a short duration: `850ms`, `2.5s`, `1m 5s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter, filling in options from the environment.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
