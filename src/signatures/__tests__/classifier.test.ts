/**
 * Tests for extension classification and pattern tables
 */

import { describe, it, expect } from 'vitest';
import { classifyFile, getExtension } from '../classifier.js';
import { PATTERN_TABLES, isDeclarationLine, isIgnoredLine } from '../patterns.js';

describe('getExtension', () => {
  it('returns the lower-cased extension without a dot', () => {
    expect(getExtension('src/App.TSX')).toBe('tsx');
  });

  it('uses only the last extension', () => {
    expect(getExtension('archive.tar.gz')).toBe('gz');
  });

  it('returns an empty string for dotfiles and bare names', () => {
    expect(getExtension('.env')).toBe('');
    expect(getExtension('Dockerfile')).toBe('');
  });
});

describe('classifyFile', () => {
  it.each([
    ['config.yml', 'line-count-only'],
    ['data.json', 'line-count-only'],
    ['Cargo.lock', 'line-count-only'],
    ['README.md', 'markdown'],
    ['guide.markdown', 'markdown'],
    ['main.py', 'code'],
    ['index.ts', 'code'],
    ['Main.java', 'code'],
    ['image.xyz', 'passthrough'],
    ['Makefile', 'passthrough'],
  ])('classifies %s as %s', (path, category) => {
    expect(classifyFile(path).category).toBe(category);
  });

  it('attaches the pattern table for code files', () => {
    const result = classifyFile('lib/server.go');
    expect(result.category).toBe('code');
    if (result.category === 'code') {
      expect(result.table).toBe(PATTERN_TABLES.go);
    }
  });

  it('maps header files to the C family', () => {
    const c = classifyFile('util.h');
    const cpp = classifyFile('util.hpp');
    expect(c.category === 'code' && c.table.language).toBe('c');
    expect(cpp.category === 'code' && cpp.table.language).toBe('cpp');
  });

  it('records the extension', () => {
    expect(classifyFile('notes.TXT').extension).toBe('txt');
  });
});

describe('pattern tables', () => {
  it('uses indentation for Python and end keywords for Ruby', () => {
    expect(PATTERN_TABLES.python.strategy).toBe('indent');
    expect(PATTERN_TABLES.ruby.strategy).toBe('end');
    expect(PATTERN_TABLES.rust.strategy).toBe('brace');
  });

  it('treats blank lines as ignored', () => {
    expect(isIgnoredLine('', PATTERN_TABLES.typescript)).toBe(true);
  });

  it.each([
    ['typescript', 'export default async function handler(req) {'],
    ['typescript', 'export const load = async (id: string): Promise<void> => {'],
    ['typescript', 'private async fetchAll(): Promise<Item[]> {'],
    ['typescript', 'export abstract class Repository<T> {'],
    ['kotlin', 'override fun onCreate(state: Bundle?) {'],
    ['kotlin', 'data class Point(val x: Int, val y: Int)'],
    ['swift', 'public func render() -> View {'],
    ['scala', 'case class User(name: String)'],
    ['php', 'public static function create(array $data) {'],
    ['cpp', 'std::string Parser::next(int count) {'],
  ] as const)('recognises a %s declaration: %s', (language, line) => {
    expect(isDeclarationLine(line, PATTERN_TABLES[language])).toBe(true);
  });

  it.each([
    ['typescript', 'if (ready) {'],
    ['typescript', 'return compute(x);'],
    ['typescript', 'for (const item of items) {'],
    ['java', 'while (running) {'],
    ['c', 'printf("done\\n");'],
    ['python', 'self.value = compute(x)'],
  ] as const)('rejects a %s statement: %s', (language, line) => {
    expect(isDeclarationLine(line, PATTERN_TABLES[language])).toBe(false);
  });
});
