/**
 * Generate Command
 *
 * Digests a repository into a single document:
 *   repodigest [path]                      Digest a local Git repository
 *   repodigest --repo <url> -b develop     Clone, then digest
 *   repodigest . -f json -o digest.json    Choose format and output file
 *   repodigest . --signatures              Declarations only, with line spans
 *
 * The digest pipeline:
 * 1. Preparing - Clone or validate the repository
 * 2. Scanning - Collect files, applying ignore and include rules
 * 3. Reading - Read text files, gather statistics, summarize code
 * 4. Writing - Render the document and write it
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { GenerateOptionsSchema, validateInput } from '../validation.js';
import { loadConfig, mergeCliOptions } from '../../config/index.js';
import { CLIError, ValidationError } from '../../errors/index.js';
import { runDigest } from '../../pipeline.js';

/**
 * Options as Commander hands them over, before validation.
 */
interface GenerateCommandOptions {
  repo?: string;
  branch?: string;
  target?: string;
  output?: string;
  config?: string;
  format?: string;
  include?: string[];
  exclude?: string[];
  signatures?: boolean;
  force?: boolean;
}

/**
 * Create the generate command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createGenerateCommand(getContext: () => CommandContext): Command {
  return new Command('generate')
    .argument('[path]', 'Local repository to digest', '.')
    .description('Write a digest of a repository')
    .option('--repo <url>', 'Clone this repository and digest it')
    .option('-b, --branch <name>', 'Branch to check out when cloning')
    .option('--target <dir>', 'Where to clone (defaults to ./<repository name>)')
    .option('-o, --output <file>', 'Output file (defaults to project_summary.<ext>)')
    .option('-c, --config <file>', 'Config file (defaults to .repodigest.toml in the repository)')
    .option('-f, --format <format>', 'Output format: markdown, json or yaml')
    .option('--include <pattern...>', 'Only digest paths matching these patterns')
    .option('--exclude <pattern...>', 'Skip paths matching these patterns')
    .option('-s, --signatures', 'Show declarations with line spans instead of full code')
    .option('--force', 'Digest a directory that is not a Git repository', false)
    .action(async (path: string, cmdOptions: GenerateCommandOptions) => {
      const ctx = getContext();

      const validation = validateInput(GenerateOptionsSchema, cmdOptions);
      if (!validation.success) {
        throw new ValidationError('Invalid options for generate', validation.issues);
      }
      const options = validation.data;

      const localPath = resolve(path);
      ctx.debug(options.repo ? `Repository: ${options.repo}` : `Directory: ${localPath}`);

      // A clone has no config of its own yet; look in the working directory
      const config = mergeCliOptions(
        loadConfig({
          configPath: options.config,
          targetDir: options.repo ? process.cwd() : localPath,
        }),
        {
          format: options.format,
          include: options.include,
          exclude: options.exclude,
          signatures: options.signatures,
        }
      );
      ctx.debug(`Format: ${config.output.format}, signatures: ${config.output.signatures}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: process.stdout.isTTY ?? false,
      });

      try {
        const result = await runDigest({
          path: localPath,
          repoUrl: options.repo,
          branch: options.branch,
          targetDir: options.target ? resolve(options.target) : undefined,
          outputPath: options.output,
          config,
          force: options.force,

          onStageStart: (stage, total) => {
            reporter.startStage(stage, total);
          },
          onProgress: (_stage, processed, _total, currentFile) => {
            reporter.updateProgress(processed, currentFile);
          },
          onStageComplete: (_stage, stats) => {
            reporter.completeStage(stats);
          },
          onWarning: (message, context) => {
            reporter.warn(message, context);
          },
        });

        reporter.showSummary(result);
      } catch (error) {
        reporter.fail();
        if (error instanceof CLIError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new CLIError(`Digest failed: ${message}`, 'Run with --verbose for details');
      }
    });
}
