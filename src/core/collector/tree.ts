/**
 * ASCII tree rendering of collected file paths.
 */

/** Folder name → subtree; files map to null. */
export type FileTree = Map<string, FileTree | null>;

/**
 * Nest forward-slash relative paths into a tree.
 */
export function buildFileTree(paths: readonly string[]): FileTree {
  const tree: FileTree = new Map();

  for (const filePath of paths) {
    const parts = filePath.split('/').filter(Boolean);
    let subtree = tree;
    parts.forEach((part, index) => {
      if (index === parts.length - 1) {
        if (!subtree.has(part)) subtree.set(part, null);
        return;
      }
      const existing = subtree.get(part);
      if (existing) {
        subtree = existing;
      } else {
        const created: FileTree = new Map();
        subtree.set(part, created);
        subtree = created;
      }
    });
  }

  return tree;
}

/**
 * Render a tree: folders before files, names compared case-insensitively.
 */
export function renderFileTree(tree: FileTree, rootName: string): string[] {
  const lines = [rootName];
  renderInner(tree, '', lines);
  return lines;
}

function renderInner(tree: FileTree, prefix: string, lines: string[]): void {
  const entries = [...tree.entries()].sort(([nameA, subA], [nameB, subB]) => {
    const fileA = subA === null ? 1 : 0;
    const fileB = subB === null ? 1 : 0;
    if (fileA !== fileB) return fileA - fileB;
    const a = nameA.toLowerCase();
    const b = nameB.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  });

  entries.forEach(([name, subtree], index) => {
    const isLast = index === entries.length - 1;
    lines.push(`${prefix}${isLast ? '└── ' : '├── '}${name}`);
    if (subtree) {
      renderInner(subtree, prefix + (isLast ? '    ' : '│   '), lines);
    }
  });
}
