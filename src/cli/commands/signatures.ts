/**
 * Signatures Command
 *
 * Prints the signature view of a single file, the same text a digest with
 * --signatures shows for it:
 *   repodigest signatures src/server.ts
 *   repodigest signatures README.md --json
 */

import { Command } from 'commander';
import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { classifyFile, summarizeFile } from '../../signatures/index.js';

export function createSignaturesCommand(getContext: () => CommandContext): Command {
  return new Command('signatures')
    .argument('<file>', 'File to summarize')
    .description('Print the declarations of one file with their line spans')
    .action((file: string) => {
      const ctx = getContext();
      const filePath = resolve(file);

      if (!existsSync(filePath)) {
        throw new FileNotFoundError(filePath);
      }
      if (!statSync(filePath).isFile()) {
        throw new CLIError(`Not a file: ${filePath}`, 'Pass a single file, not a directory');
      }

      const content = readFileSync(filePath, 'utf-8');
      const { category } = classifyFile(filePath);
      ctx.debug(`Category: ${category}`);

      const signatures = summarizeFile(filePath, content, ctx);

      if (ctx.options.json) {
        console.log(JSON.stringify({ file: filePath, category, signatures }));
        return;
      }

      ctx.log(signatures);
    });
}
