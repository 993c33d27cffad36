/**
 * Structural comparison of two namespace trees.
 */
import { countFiles } from './path-resolver.js';
import type { DiffCounts, DiffReport } from './types/diff-report.js';
import type { DirectoryNode, FileNode, PackNode } from './types/node.js';

interface MutableCounts {
  removed: number;
  added: number;
  changed: number;
}

function sameContent(before: FileNode, after: FileNode): boolean {
  return before.uncompressedSize === after.uncompressedSize && before.hash === after.hash;
}

/** Names of both maps: those of `before` in order, then those only in `after`. */
function unionNames(before: ReadonlyMap<string, PackNode>, after: ReadonlyMap<string, PackNode>): string[] {
  const names: string[] = [...before.keys()];
  for (const name of after.keys()) {
    if (!before.has(name)) {
      names.push(name);
    }
  }
  return names;
}

function compare(before: PackNode | undefined, after: PackNode | undefined, counts: MutableCounts): void {
  if (!before) {
    counts.added += after ? countFiles(after) : 0;
    return;
  }
  if (!after) {
    counts.removed += countFiles(before);
    return;
  }
  if (before.kind === 'file' && after.kind === 'file') {
    if (!sameContent(before, after)) {
      counts.changed += 1;
    }
    return;
  }
  if (before.kind === 'directory' && after.kind === 'directory') {
    for (const name of unionNames(before.children, after.children)) {
      compare(before.children.get(name), after.children.get(name), counts);
    }
    return;
  }
  // Directory replaced by a file or the reverse.
  counts.removed += 1;
  counts.added += 1;
}

const EMPTY_CHILDREN: ReadonlyMap<string, PackNode> = new Map();

/**
 * Compares two trees and counts removed, added and changed files under each
 * top-level name. A file is changed when its uncompressed size or hash differs.
 * A missing root is treated as an empty directory.
 *
 * @param before - Root of the older tree
 * @param after - Root of the newer tree
 * @returns Counts keyed by top-level name; unchanged names report all zeros
 */
export function diffNamespaces(before: DirectoryNode | null, after: DirectoryNode | null): DiffReport {
  const beforeChildren: ReadonlyMap<string, PackNode> = before?.children ?? EMPTY_CHILDREN;
  const afterChildren: ReadonlyMap<string, PackNode> = after?.children ?? EMPTY_CHILDREN;
  const report = new Map<string, DiffCounts>();

  for (const name of unionNames(beforeChildren, afterChildren)) {
    const counts: MutableCounts = { removed: 0, added: 0, changed: 0 };
    compare(beforeChildren.get(name), afterChildren.get(name), counts);
    report.set(name, counts);
  }
  return report;
}

/** True when no top-level name reports a difference. */
export function isEmptyDiff(report: DiffReport): boolean {
  for (const counts of report.values()) {
    if (counts.removed !== 0 || counts.added !== 0 || counts.changed !== 0) {
      return false;
    }
  }
  return true;
}
