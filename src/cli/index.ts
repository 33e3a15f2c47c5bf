#!/usr/bin/env node
/**
 * repodigest CLI Entry Point
 *
 * Sets up Commander with global options and registers the subcommands.
 * `generate` is the default, so `repodigest .` digests the current directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createGenerateCommand } from './commands/generate.js';
import { createInitCommand } from './commands/init.js';
import { createSignaturesCommand } from './commands/signatures.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

// Version injected at build time through the environment
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('repodigest')
  .description('Turn a repository into a single Markdown, JSON or YAML document')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output progress and results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('repodigest .')}                                 Digest the current repository
  ${chalk.cyan('repodigest --repo https://example.com/a/b.git')}  Clone and digest
  ${chalk.cyan('repodigest . -f yaml -o digest.yaml')}          Write YAML instead of Markdown
  ${chalk.cyan('repodigest . --signatures')}                    Declarations only, with line spans
  ${chalk.cyan('repodigest signatures src/main.py')}            Signature view of one file
  ${chalk.cyan('repodigest init')}                              Write a default .repodigest.toml
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createGenerateCommand(getContext), { isDefault: true });
program.addCommand(createInitCommand(getContext));
program.addCommand(createSignaturesCommand(getContext));

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

await main();
