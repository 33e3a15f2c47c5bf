/**
 * Directory tree rendering with box-drawing characters.
 */

interface TreeNode {
  name: string;
  isFile: boolean;
  children: Map<string, TreeNode>;
}

function compareNodes(a: TreeNode, b: TreeNode): number {
  if (a.isFile !== b.isFile) {
    return a.isFile ? -1 : 1;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function renderChildren(node: TreeNode, prefix: string, lines: string[]): void {
  const children = [...node.children.values()].sort(compareNodes);

  children.forEach((child, index) => {
    const isLast = index === children.length - 1;
    lines.push(`${prefix}${isLast ? '└── ' : '├── '}${child.name}`);
    if (!child.isFile) {
      renderChildren(child, prefix + (isLast ? '    ' : '│   '), lines);
    }
  });
}

/**
 * Render relative file paths as a tree under `rootName`.
 * Within a directory, files come before subdirectories and both are sorted
 * by name.
 *
 * @example
 * ```ts
 * buildTree('repo', ['src/main.ts', 'README.md']);
 * // repo
 * // ├── README.md
 * // └── src
 * //     └── main.ts
 * ```
 */
export function buildTree(rootName: string, paths: readonly string[]): string {
  const root: TreeNode = { name: rootName, isFile: false, children: new Map() };

  for (const path of paths) {
    const parts = path.split('/').filter((part) => part !== '');
    let current = root;
    parts.forEach((part, index) => {
      const isFile = index === parts.length - 1;
      let child = current.children.get(part);
      if (!child) {
        child = { name: part, isFile, children: new Map() };
        current.children.set(part, child);
      }
      current = child;
    });
  }

  const lines = [rootName];
  renderChildren(root, '', lines);
  return lines.join('\n');
}
