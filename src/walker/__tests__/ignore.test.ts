/**
 * Tests for gitignore pattern handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import {
  loadGitignoreFile,
  parseGitignoreContent,
  createIgnoreFilter,
  createIncludeFilter,
  flattenPatterns,
} from '../ignore.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('parseGitignoreContent', () => {
  it('skips comments and empty lines', () => {
    const content = ['# build output', 'dist', '', '*.log', '   ', '# end'].join('\n');
    expect(parseGitignoreContent(content)).toEqual(['dist', '*.log']);
  });

  it('keeps negation patterns', () => {
    expect(parseGitignoreContent('*.log\n!keep.log')).toEqual(['*.log', '!keep.log']);
  });

  it('handles CRLF line endings', () => {
    expect(parseGitignoreContent('tmp/\r\ncache/\r\n')).toEqual(['tmp/', 'cache/']);
  });
});

describe('loadGitignoreFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns empty array if file does not exist', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(loadGitignoreFile('/repo/.gitignore')).toEqual([]);
    expect(readFileSync).not.toHaveBeenCalled();
  });

  it('reads and parses the file', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('coverage\nbuild/\n');

    expect(loadGitignoreFile('/repo/.gitignore')).toEqual(['coverage', 'build/']);
    expect(readFileSync).toHaveBeenCalledWith('/repo/.gitignore', 'utf-8');
  });

  it('warns and returns empty array on read error', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('Permission denied');
    });
    const logger = { warn: vi.fn() };

    expect(loadGitignoreFile('/repo/.gitignore', logger)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Could not read /repo/.gitignore: Permission denied');
  });
});

describe('createIgnoreFilter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(existsSync).mockReturnValue(false);
  });

  it('ignores default patterns', () => {
    const isIgnored = createIgnoreFilter({ rootPath: '/repo' });

    expect(isIgnored('node_modules/pkg/index.js')).toBe(true);
    expect(isIgnored('.git/HEAD')).toBe(true);
    expect(isIgnored('lib/__pycache__/mod.cpython-311.pyc')).toBe(true);
    expect(isIgnored('src/main.py')).toBe(false);
  });

  it('respects useDefaults: false', () => {
    const isIgnored = createIgnoreFilter({ rootPath: '/repo', useDefaults: false });

    expect(isIgnored('node_modules/pkg/index.js')).toBe(false);
  });

  it('applies additional patterns for files and directories', () => {
    const isIgnored = createIgnoreFilter({
      rootPath: '/repo',
      additionalPatterns: ['*.min.js', 'fixtures/'],
      useDefaults: false,
    });

    expect(isIgnored('static/app.min.js')).toBe(true);
    expect(isIgnored('fixtures/sample.json')).toBe(true);
    expect(isIgnored('static/app.js')).toBe(false);
  });

  it('loads patterns from .gitignore with negations', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('*.log\n!keep.log');

    const isIgnored = createIgnoreFilter({ rootPath: '/repo', useDefaults: false });

    expect(isIgnored('debug.log')).toBe(true);
    expect(isIgnored('keep.log')).toBe(false);
    expect(readFileSync).toHaveBeenCalledWith('/repo/.gitignore', 'utf-8');
  });

  it('converts absolute paths under the root', () => {
    const isIgnored = createIgnoreFilter({ rootPath: '/repo' });

    expect(isIgnored('/repo/node_modules/a.js')).toBe(true);
    expect(isIgnored('/repo/src/a.js')).toBe(false);
  });

  it('never ignores the root itself', () => {
    const isIgnored = createIgnoreFilter({ rootPath: '/repo' });

    expect(isIgnored('')).toBe(false);
    expect(isIgnored('/repo')).toBe(false);
  });
});

describe('createIncludeFilter', () => {
  it('passes everything when there are no patterns', () => {
    const isIncluded = createIncludeFilter('/repo', []);
    expect(isIncluded('anything/at/all.bin')).toBe(true);
  });

  it('keeps only paths matching a pattern', () => {
    const isIncluded = createIncludeFilter('/repo', ['*.py', 'docs/']);

    expect(isIncluded('pkg/module.py')).toBe(true);
    expect(isIncluded('docs/guide.txt')).toBe(true);
    expect(isIncluded('pkg/data.json')).toBe(false);
  });
});

describe('flattenPatterns', () => {
  it('joins file and directory patterns', () => {
    expect(flattenPatterns({ files: ['*.ts'], dirs: ['src/'] })).toEqual(['*.ts', 'src/']);
  });

  it('returns an empty list for undefined', () => {
    expect(flattenPatterns(undefined)).toEqual([]);
  });
});
