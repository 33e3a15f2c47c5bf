import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { writeOutput } from '../write.js';
import { FormatterError } from '../../errors/index.js';

describe('writeOutput', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'repodigest-write-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const outputPath = join(tempDir, 'out', 'nested', 'summary.md');

    await writeOutput(outputPath, '# Project Overview\n');

    expect(readFileSync(outputPath, 'utf8')).toBe('# Project Overview\n');
  });

  it('wraps failures in FormatterError', async () => {
    const blocker = join(tempDir, 'blocker');
    writeFileSync(blocker, 'a file, not a directory');

    await expect(writeOutput(join(blocker, 'summary.md'), 'x')).rejects.toThrow(FormatterError);
  });
});
