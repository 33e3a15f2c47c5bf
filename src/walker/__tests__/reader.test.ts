/**
 * Tests for text file reading and binary detection
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { isBinaryContent, isBinaryExtension, readTextFile } from '../reader.js';

describe('isBinaryExtension', () => {
  it.each(['logo.png', 'lib.so', 'Module.class', 'ARCHIVE.ZIP'])('flags %s', (name) => {
    expect(isBinaryExtension(name)).toBe(true);
  });

  it.each(['main.py', 'README', 'data.json'])('does not flag %s', (name) => {
    expect(isBinaryExtension(name)).toBe(false);
  });
});

describe('isBinaryContent', () => {
  it('accepts plain ASCII', () => {
    expect(isBinaryContent(Buffer.from('hello world\n'))).toBe(false);
  });

  it('accepts non-ASCII UTF-8 text', () => {
    expect(isBinaryContent(Buffer.from('héllo wörld, ünïcödé ✓ 日本語', 'utf8'))).toBe(false);
  });

  it('treats an empty buffer as text', () => {
    expect(isBinaryContent(new Uint8Array(0))).toBe(false);
  });

  it('detects a leading NUL byte', () => {
    expect(isBinaryContent(Uint8Array.of(0x00, 0x41, 0x42))).toBe(true);
  });

  it('detects image and archive signatures', () => {
    expect(isBinaryContent(Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01))).toBe(true);
    expect(isBinaryContent(Buffer.from('GIF89a....'))).toBe(true);
    expect(isBinaryContent(Buffer.from('%PDF-1.7'))).toBe(true);
    expect(isBinaryContent(Uint8Array.of(0x50, 0x4b, 0x03, 0x04, 0x14))).toBe(true);
  });

  it('detects undecodable content dense with high bytes', () => {
    expect(isBinaryContent(Uint8Array.of(0xe9, 0xe8, 0xe0, 0x41))).toBe(true);
  });

  it('does not flag undecodable content that is mostly ASCII', () => {
    expect(isBinaryContent(Buffer.from('caf\xe9 and some more plain text', 'latin1'))).toBe(false);
  });

  it('flags NUL bytes past the start when they are dense enough', () => {
    expect(isBinaryContent(Uint8Array.of(0x41, 0x00, 0x00, 0x42))).toBe(true);
  });
});

describe('readTextFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'repodigest-read-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(name: string, content: string | Uint8Array): string {
    const fullPath = join(tempDir, name);
    writeFileSync(fullPath, content);
    return fullPath;
  }

  it('reads UTF-8 text', async () => {
    const file = createFile('notes.txt', 'line one\nline two\n');
    expect(await readTextFile(file, 1024)).toBe('line one\nline two\n');
  });

  it('returns null for binary extensions without reading', async () => {
    const file = createFile('image.png', 'not really an image');
    expect(await readTextFile(file, 1024)).toBeNull();
  });

  it('returns null for empty files', async () => {
    const file = createFile('empty.py', '');
    expect(await readTextFile(file, 1024)).toBeNull();
  });

  it('returns null and warns for files above the size limit', async () => {
    const file = createFile('big.txt', 'x'.repeat(100));
    const logger = { warn: vi.fn() };

    expect(await readTextFile(file, 50, logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`Skipping ${file}: exceeds size limit`);
  });

  it('reads a file exactly at the size limit', async () => {
    const file = createFile('edge.txt', 'x'.repeat(50));
    expect(await readTextFile(file, 50)).toBe('x'.repeat(50));
  });

  it('returns null for binary content with a text extension', async () => {
    const file = createFile('data.txt', Uint8Array.of(0x00, 0x01, 0x02, 0x03));
    expect(await readTextFile(file, 1024)).toBeNull();
  });

  it('returns null and warns for invalid UTF-8', async () => {
    const file = createFile('legacy.txt', Buffer.from('caf\xe9 and some more plain text', 'latin1'));
    const logger = { warn: vi.fn() };

    expect(await readTextFile(file, 1024, logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`Skipping ${file}: not valid UTF-8`);
  });

  it('returns null and warns when the file is missing', async () => {
    const logger = { warn: vi.fn() };
    const missing = join(tempDir, 'gone.txt');

    expect(await readTextFile(missing, 1024, logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
