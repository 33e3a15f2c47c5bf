/**
 * ProgressReporter Tests
 *
 * Covers the JSON and plain-text modes; spinners need a TTY.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressReporter,
  createProgressReporter,
  formatDuration,
  type ProgressReporterOptions,
  type StageStats,
  type DigestPipelineResult,
} from '../progress.js';

const sampleResult: DigestPipelineResult = {
  outputPath: '/work/project_summary.md',
  rootPath: '/work/repo',
  filesProcessed: 42,
  textFiles: 40,
  durationMs: 1500,
  stageDurations: { scanning: 100, reading: 1200 },
  warnings: ['Skipping /work/repo/big.log: exceeds size limit'],
};

describe('ProgressReporter', () => {
  let consoleOutput: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  beforeEach(() => {
    consoleOutput = [];
    console.log = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
    console.error = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
    console.warn = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
    vi.restoreAllMocks();
  });

  describe('JSON mode', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: false,
      isInteractive: false,
    };

    it('emits stage_start', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('reading', 100);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0]);
      expect(event.type).toBe('stage_start');
      expect(event.stage).toBe('reading');
      expect(event.data.total).toBe(100);
      expect(event.timestamp).toBeDefined();
    });

    it('emits stage_progress with the current file', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('reading', 50);
      reporter.updateProgress(25, 'src/file.ts');

      expect(consoleOutput).toHaveLength(2);
      const event = JSON.parse(consoleOutput[1]);
      expect(event.type).toBe('stage_progress');
      expect(event.data).toEqual({ processed: 25, total: 50, currentFile: 'src/file.ts' });
    });

    it('ignores progress outside a stage', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.updateProgress(1);

      expect(consoleOutput).toHaveLength(0);
    });

    it('emits stage_complete', () => {
      const reporter = new ProgressReporter(jsonOptions);
      const stats: StageStats = {
        stage: 'scanning',
        processed: 12,
        total: 12,
        durationMs: 80,
        details: { root: '/work/repo' },
      };

      reporter.completeStage(stats);

      const event = JSON.parse(consoleOutput[0]);
      expect(event.type).toBe('stage_complete');
      expect(event.stage).toBe('scanning');
      expect(event.data.durationMs).toBe(80);
      expect(event.data.details.root).toBe('/work/repo');
    });

    it('emits warning events', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.warn('File too large', 'big.log');

      const event = JSON.parse(consoleOutput[0]);
      expect(event.type).toBe('warning');
      expect(event.data).toEqual({ message: 'File too large', context: 'big.log' });
    });

    it('emits the result on summary', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.showSummary(sampleResult);

      const event = JSON.parse(consoleOutput[0]);
      expect(event.type).toBe('complete');
      expect(event.data.result.filesProcessed).toBe(42);
      expect(event.data.result.outputPath).toBe('/work/project_summary.md');
    });
  });

  describe('Non-interactive mode', () => {
    const textOptions: ProgressReporterOptions = {
      json: false,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('prints the stage label on start', () => {
      new ProgressReporter(textOptions).startStage('scanning', 0);

      expect(consoleOutput).toEqual(['Scanning...']);
    });

    it('prints the count on completion', () => {
      new ProgressReporter(textOptions).completeStage({
        stage: 'reading',
        processed: 100,
        total: 100,
        durationMs: 1000,
      });

      expect(consoleOutput).toEqual(['Reading complete: 100 files read']);
    });

    it('shows warnings without a TTY', () => {
      new ProgressReporter(textOptions).warn('not valid UTF-8', 'data.txt');

      expect(consoleOutput).toEqual(['Warning: not valid UTF-8 (data.txt)']);
    });

    it('summarizes the result', () => {
      new ProgressReporter(textOptions).showSummary(sampleResult);

      expect(consoleOutput).toContain('Digest Complete ✓');
      expect(consoleOutput).toContain('  Output:           /work/project_summary.md');
      expect(consoleOutput).toContain('  1 warning(s) during digest');
    });

    it('lists stage durations in verbose mode', () => {
      new ProgressReporter({ ...textOptions, verbose: true }).showSummary(sampleResult);

      expect(consoleOutput).toContain('    Scanning:    100ms');
      expect(consoleOutput).toContain('    Reading:     1.2s');
    });
  });

  describe('update throttling', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: false,
      isInteractive: false,
    };

    it('drops rapid updates', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('reading', 100);

      reporter.updateProgress(1);
      reporter.updateProgress(2);
      reporter.updateProgress(3);

      expect(consoleOutput).toHaveLength(2);
    });

    it('emits again after the throttle delay', async () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('reading', 100);
      reporter.updateProgress(5);

      await new Promise((resolve) => setTimeout(resolve, 150));
      reporter.updateProgress(10);

      expect(consoleOutput).toHaveLength(3);
    });
  });

  it('creates a reporter with defaults', () => {
    expect(createProgressReporter()).toBeInstanceOf(ProgressReporter);
  });
});

describe('formatDuration', () => {
  it.each([
    [850, '850ms'],
    [2500, '2.5s'],
    [65000, '1m 5s'],
  ])('formats %d', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
