import { basename } from 'node:path';
import type { FileTreeNode, Index } from './types.js';

/**
 * Hierarchy of the indexed files. Directories come before files at each
 * level, both sorted by name.
 */
export function buildFileTree(index: Index): FileTreeNode {
  const root: FileTreeNode = { name: basename(index.root), path: '', type: 'directory', children: [] };
  const directories = new Map<string, FileTreeNode>([['', root]]);

  const ensureDirectory = (path: string): FileTreeNode => {
    const existing = directories.get(path);
    if (existing) return existing;
    const slash = path.lastIndexOf('/');
    const parent = ensureDirectory(slash === -1 ? '' : path.slice(0, slash));
    const node: FileTreeNode = { name: path.slice(slash + 1), path, type: 'directory', children: [] };
    parent.children?.push(node);
    directories.set(path, node);
    return node;
  };

  for (const [path, entry] of Object.entries(index.files)) {
    const slash = path.lastIndexOf('/');
    const parent = ensureDirectory(slash === -1 ? '' : path.slice(0, slash));
    parent.children?.push({ name: path.slice(slash + 1), path, type: 'file', size: entry.size });
  }

  sortTree(root);
  return root;
}

function sortTree(node: FileTreeNode): void {
  if (!node.children) return;
  node.children.sort((a, b) => {
    if (a.type !== b.type) return a.type === 'directory' ? -1 : 1;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
  node.children.forEach(sortTree);
}

export function renderFileTree(tree: FileTreeNode): string {
  const lines = [tree.name];
  const walk = (children: FileTreeNode[], prefix: string): void => {
    children.forEach((child, i) => {
      const last = i === children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${child.name}${child.type === 'directory' ? '/' : ''}`);
      if (child.children && child.children.length > 0) {
        walk(child.children, prefix + (last ? '    ' : '│   '));
      }
    });
  };
  walk(tree.children ?? [], '');
  return lines.join('\n');
}
