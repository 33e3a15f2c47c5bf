import { describe, it, expect } from 'vitest';
import { buildTree } from '../tree.js';

describe('buildTree', () => {
  it('renders only the root for no files', () => {
    expect(buildTree('repo', [])).toBe('repo');
  });

  it('puts files before directories and sorts by name', () => {
    const tree = buildTree('repo', ['src/lib/a.ts', 'src/config.yaml', 'README.md', 'src/config.json']);

    expect(tree).toBe(
      [
        'repo',
        '├── README.md',
        '└── src',
        '    ├── config.json',
        '    ├── config.yaml',
        '    └── lib',
        '        └── a.ts',
      ].join('\n')
    );
  });

  it('continues the vertical rule past a non-final directory', () => {
    const tree = buildTree('proj', ['docs/guide.md', 'src/main.go']);

    expect(tree).toBe(
      ['proj', '├── docs', '│   └── guide.md', '└── src', '    └── main.go'].join('\n')
    );
  });

  it('merges repeated paths', () => {
    expect(buildTree('r', ['a.txt', 'a.txt'])).toBe('r\n└── a.txt');
  });
});
