import type { DirectoryNode, FileEntry, TreeNode } from '../types/index.js';
import {
  EMPTY_TREE_PLACEHOLDER,
  GLYPH_CHILD,
  GLYPH_LAST,
  GLYPH_PIPE,
  GLYPH_SPACE,
} from '../constants/defaults.js';
import { compareNames, joinRelative } from '../core/paths.js';

export function buildTree(entries: readonly FileEntry[]): DirectoryNode {
  const root: DirectoryNode = { kind: 'directory', name: '', children: new Map() };

  for (const entry of entries) {
    const parts = entry.relativePath.split('/').filter((part) => part !== '');
    let current = root;

    parts.forEach((part, index) => {
      const isLast = index === parts.length - 1;
      const existing = current.children.get(part);

      if (isLast) {
        if (!existing) {
          current.children.set(part, { kind: 'file', name: part });
        }
        return;
      }

      // A path passing through a node makes it a directory, even if it was first seen as a file.
      if (existing?.kind === 'directory') {
        current = existing;
        return;
      }
      const directory: DirectoryNode = { kind: 'directory', name: part, children: new Map() };
      current.children.set(part, directory);
      current = directory;
    });
  }

  return root;
}

export function sortedChildren(node: DirectoryNode): TreeNode[] {
  return [...node.children.values()].sort((a, b) => {
    if (a.kind !== b.kind) return a.kind === 'directory' ? -1 : 1;
    return compareNames(a.name, b.name);
  });
}

/**
 * Entries in the order the tree shows them: depth-first, directories
 * before files at each level.
 */
export function orderEntries(entries: readonly FileEntry[]): FileEntry[] {
  const byPath = new Map(entries.map((entry) => [entry.relativePath, entry]));
  const ordered: FileEntry[] = [];

  const visit = (node: DirectoryNode, prefix: string): void => {
    for (const child of sortedChildren(node)) {
      const path = joinRelative(prefix, child.name);
      if (child.kind === 'directory') {
        visit(child, path);
        continue;
      }
      const entry = byPath.get(path);
      if (entry) ordered.push(entry);
    }
  };

  visit(buildTree(entries), '');
  return ordered;
}

function renderChildren(node: DirectoryNode, prefix: string): string[] {
  const lines: string[] = [];
  const children = sortedChildren(node);

  children.forEach((child, index) => {
    const isLast = index === children.length - 1;
    const connector = isLast ? GLYPH_LAST : GLYPH_CHILD;
    const label = child.kind === 'directory' ? `${child.name}/` : child.name;
    lines.push(`${prefix}${connector} ${label}`);

    if (child.kind === 'directory') {
      lines.push(...renderChildren(child, prefix + (isLast ? GLYPH_SPACE : GLYPH_PIPE)));
    }
  });

  return lines;
}

export function renderTree(rootName: string, entries: readonly FileEntry[], isDirectory: boolean): string[] {
  if (!isDirectory) {
    return [rootName];
  }
  if (entries.length === 0) {
    return [EMPTY_TREE_PLACEHOLDER];
  }
  return [`${rootName}/`, ...renderChildren(buildTree(entries), '')];
}
