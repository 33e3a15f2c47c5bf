/**
 * Tests for the generate command
 *
 * The pipeline is mocked; these tests cover option handling and the
 * config handed to it.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { join } from 'node:path';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { createGenerateCommand } from '../generate.js';
import type { CommandContext } from '../../types.js';
import { runDigest } from '../../../pipeline.js';
import { StatsCollector } from '../../../stats/index.js';
import { ConfigError, GitError, ValidationError } from '../../../errors/index.js';

vi.mock('../../../pipeline.js', () => ({
  runDigest: vi.fn(),
}));

describe('createGenerateCommand', () => {
  let tempDir: string;
  let mockContext: CommandContext;

  function createProgram(): Command {
    const program = new Command();
    program.addCommand(createGenerateCommand(() => mockContext));
    program.exitOverride();
    return program;
  }

  function lastDigestOptions() {
    const calls = vi.mocked(runDigest).mock.calls;
    return calls[calls.length - 1][0];
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'repodigest-generate-'));
    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    vi.mocked(runDigest).mockResolvedValue({
      outputPath: join(tempDir, 'project_summary.md'),
      rootPath: tempDir,
      filesProcessed: 0,
      textFiles: 0,
      durationMs: 5,
      stageDurations: {},
      warnings: [],
      stats: new StatsCollector().getStats(),
      branch: 'unknown',
    });

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(runDigest).mockReset();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('command structure', () => {
    it('is named generate', () => {
      expect(createGenerateCommand(() => mockContext).name()).toBe('generate');
    });

    it('takes an optional path', () => {
      const cmd = createGenerateCommand(() => mockContext);
      expect(cmd.registeredArguments).toHaveLength(1);
      expect(cmd.registeredArguments[0].required).toBe(false);
    });

    it.each(['--repo', '--branch', '--target', '--output', '--config', '--format', '--include', '--exclude', '--signatures', '--force'])(
      'has the %s option',
      (flag) => {
        const cmd = createGenerateCommand(() => mockContext);
        expect(cmd.options.find((opt) => opt.long === flag)).toBeDefined();
      }
    );
  });

  describe('running a digest', () => {
    it('uses the default config for a directory without one', async () => {
      await createProgram().parseAsync(['node', 'test', 'generate', tempDir, '--force']);

      const options = lastDigestOptions();
      expect(options.path).toBe(tempDir);
      expect(options.force).toBe(true);
      expect(options.repoUrl).toBeUndefined();
      expect(options.config.output.format).toBe('markdown');
      expect(options.config.output.signatures).toBe(false);
    });

    it('applies command-line overrides', async () => {
      await createProgram().parseAsync([
        'node',
        'test',
        'generate',
        tempDir,
        '-f',
        'yaml',
        '--signatures',
        '--exclude',
        '*.log',
        'tmp/',
        '-o',
        'out.yaml',
      ]);

      const options = lastDigestOptions();
      expect(options.config.output.format).toBe('yaml');
      expect(options.config.output.signatures).toBe(true);
      expect(options.config.exclude.files).toEqual(['*.log', 'tmp/']);
      expect(options.outputPath).toBe('out.yaml');
    });

    it('reads the config file in the repository', async () => {
      writeFileSync(join(tempDir, '.repodigest.toml'), '[output]\nformat = "json"\n');

      await createProgram().parseAsync(['node', 'test', 'generate', tempDir]);

      expect(lastDigestOptions().config.output.format).toBe('json');
    });

    it('passes clone options through', async () => {
      await createProgram().parseAsync([
        'node',
        'test',
        'generate',
        '--repo',
        'https://example.com/acme/widget.git',
        '--branch',
        'develop',
        '--target',
        join(tempDir, 'widget'),
      ]);

      const options = lastDigestOptions();
      expect(options.repoUrl).toBe('https://example.com/acme/widget.git');
      expect(options.branch).toBe('develop');
      expect(options.targetDir).toBe(join(tempDir, 'widget'));
    });
  });

  describe('validation', () => {
    it('rejects an unknown format', async () => {
      await expect(
        createProgram().parseAsync(['node', 'test', 'generate', tempDir, '-f', 'xml'])
      ).rejects.toThrow(ValidationError);
      expect(runDigest).not.toHaveBeenCalled();
    });

    it('rejects --branch without --repo', async () => {
      await expect(
        createProgram().parseAsync(['node', 'test', 'generate', tempDir, '--branch', 'main'])
      ).rejects.toThrow(ValidationError);
    });

    it('rejects a malformed pattern', async () => {
      await expect(
        createProgram().parseAsync(['node', 'test', 'generate', tempDir, '--include', 'src/[abc'])
      ).rejects.toThrow(ConfigError);
    });

    it('rejects a missing explicit config file', async () => {
      await expect(
        createProgram().parseAsync([
          'node',
          'test',
          'generate',
          tempDir,
          '-c',
          join(tempDir, 'missing.toml'),
        ])
      ).rejects.toThrow(`Config file not found: ${join(tempDir, 'missing.toml')}`);
    });
  });

  describe('errors from the pipeline', () => {
    it('passes CLI errors through unchanged', async () => {
      vi.mocked(runDigest).mockRejectedValue(new GitError('Git clone failed: timeout'));

      await expect(
        createProgram().parseAsync(['node', 'test', 'generate', tempDir])
      ).rejects.toThrow(GitError);
    });

    it('wraps other errors', async () => {
      vi.mocked(runDigest).mockRejectedValue(new Error('disk on fire'));

      await expect(
        createProgram().parseAsync(['node', 'test', 'generate', tempDir])
      ).rejects.toThrow('Digest failed: disk on fire');
    });
  });
});
