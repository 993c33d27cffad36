/**
 * Path lookups and traversals over a namespace tree.
 */
import { PATH_SEPARATOR } from './namespace.js';
import type { DirectoryNode, PackNode } from './types/node.js';

export interface MatchOptions {
  /** Compare names and paths exactly (default) or after lower-casing both sides. */
  readonly caseSensitive?: boolean;
}

export interface ListOptions {
  readonly recursive?: boolean;
}

export function splitPath(path: string): string[] {
  return path.split(PATH_SEPARATOR).filter((segment) => segment !== '');
}

function childNamed(directory: DirectoryNode, name: string, caseSensitive: boolean): PackNode | undefined {
  if (caseSensitive) {
    return directory.children.get(name);
  }
  const wanted: string = name.toLowerCase();
  for (const child of directory.children.values()) {
    if (child.name.toLowerCase() === wanted) {
      return child;
    }
  }
  return undefined;
}

/**
 * Walks from `root` to the node at `path`. Empty segments are ignored, so
 * `"UI/FloatText"` and `"/UI/FloatText/"` resolve identically and `""` is the root.
 *
 * @returns The node, or null when a segment is missing or a non-final segment is a file
 */
export function resolvePath(root: DirectoryNode, path: string, options: MatchOptions = {}): PackNode | null {
  const caseSensitive: boolean = options.caseSensitive ?? true;
  let current: PackNode = root;
  for (const segment of splitPath(path)) {
    if (current.kind !== 'directory') {
      return null;
    }
    const next: PackNode | undefined = childNamed(current, segment, caseSensitive);
    if (!next) {
      return null;
    }
    current = next;
  }
  return current;
}

/**
 * Pre-order traversal of every descendant of `directory`: children in declared
 * order, each subdirectory's subtree before its next sibling.
 */
export function* walkNodes(directory: DirectoryNode): Generator<PackNode> {
  for (const child of directory.children.values()) {
    yield child;
    if (child.kind === 'directory') {
      yield* walkNodes(child);
    }
  }
}

/**
 * Lazily yields every descendant whose full path contains `substring`.
 * Each call starts a fresh traversal.
 */
export function* findNodes(root: DirectoryNode, substring: string, options: MatchOptions = {}): Generator<PackNode> {
  const caseSensitive: boolean = options.caseSensitive ?? true;
  const needle: string = caseSensitive ? substring : substring.toLowerCase();
  for (const node of walkNodes(root)) {
    const haystack: string = caseSensitive ? node.path : node.path.toLowerCase();
    if (haystack.includes(needle)) {
      yield node;
    }
  }
}

/**
 * Lists a node: immediate children of a directory, or its whole pre-order subtree
 * when `recursive` is set. A file lists as itself.
 */
export function listNodes(node: PackNode, options: ListOptions = {}): PackNode[] {
  if (node.kind === 'file') {
    return [node];
  }
  return options.recursive ? [...walkNodes(node)] : [...node.children.values()];
}

/** Number of files at or below `node`. */
export function countFiles(node: PackNode): number {
  if (node.kind === 'file') {
    return 1;
  }
  let total = 0;
  for (const child of node.children.values()) {
    total += countFiles(child);
  }
  return total;
}
