/**
 * Output writing.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { FormatterError } from '../errors/index.js';

/**
 * Write the rendered document, creating parent directories as needed.
 *
 * @throws FormatterError if the directory or file cannot be written
 */
export async function writeOutput(outputPath: string, text: string): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, text, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FormatterError(
      `Failed to write output to ${outputPath}: ${message}`,
      error instanceof Error ? error : undefined
    );
  }
}
