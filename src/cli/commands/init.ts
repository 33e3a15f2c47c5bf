/**
 * Init Command
 *
 * Writes a commented `.repodigest.toml` with the default settings:
 *   repodigest init            In the current directory
 *   repodigest init ../app     In another directory
 *   repodigest init --force    Overwrite an existing file
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { writeConfigTemplate } from '../../config/index.js';

interface InitOptions {
  force?: boolean;
}

export function createInitCommand(getContext: () => CommandContext): Command {
  return new Command('init')
    .argument('[path]', 'Directory to write the config file into', '.')
    .description('Create a .repodigest.toml with default settings')
    .option('-f, --force', 'Overwrite an existing config file')
    .action((path: string, options: InitOptions) => {
      const ctx = getContext();
      const configPath = writeConfigTemplate(resolve(path), options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: configPath }));
        return;
      }

      ctx.log(`${chalk.green('✓')} Created ${chalk.cyan(configPath)}`);
      ctx.log(chalk.dim('  Edit it to set formats, size limits and include/exclude patterns.'));
    });
}
