/**
 * Assembles the flat index entry table into a rooted directory tree.
 */
import { CorruptIndexError } from './errors.js';
import type { IndexEntry } from './types/index-entry.js';
import type { DirectoryNode, PackNode } from './types/node.js';

export const PATH_SEPARATOR = '/';

function ensureUsableName(entry: IndexEntry): void {
  if (entry.name === '' || entry.name === '.' || entry.name === '..' || entry.name.includes(PATH_SEPARATOR)) {
    throw new CorruptIndexError(`Entry ${entry.id} has unusable name "${entry.name}"`);
  }
}

function joinPath(parentPath: string, name: string): string {
  return parentPath === '' ? name : `${parentPath}${PATH_SEPARATOR}${name}`;
}

/**
 * Computes the cached path of every entry, following parent links through a memo
 * so that entries may appear before their parents.
 */
function computePaths(entries: readonly IndexEntry[], byId: ReadonlyMap<number, IndexEntry>): Map<number, string> {
  const paths = new Map<number, string>();

  for (const start of entries) {
    const chain: IndexEntry[] = [];
    const onChain = new Set<number>();
    let current: IndexEntry | undefined = start;
    let basePath = '';

    while (current) {
      const known: string | undefined = paths.get(current.id);
      if (known !== undefined) {
        basePath = known;
        break;
      }
      if (onChain.has(current.id)) {
        throw new CorruptIndexError(`Entry ${current.id} ("${current.name}") is its own ancestor`);
      }
      onChain.add(current.id);
      chain.push(current);
      if (current.parentId === null) {
        break;
      }
      const parent: IndexEntry | undefined = byId.get(current.parentId);
      if (!parent) {
        throw new CorruptIndexError(`Entry ${current.id} ("${current.name}") references missing parent ${current.parentId}`);
      }
      current = parent;
    }

    for (let i = chain.length - 1; i >= 0; i--) {
      const entry: IndexEntry = chain[i];
      basePath = joinPath(basePath, entry.name);
      paths.set(entry.id, basePath);
    }
  }

  return paths;
}

/**
 * Builds the namespace tree from decoded entries.
 * Children keep declaration order; every node receives its full path once.
 *
 * @param entries - Flat entry table from the index decoder
 * @returns Synthetic root directory with an empty name and path
 * @throws {CorruptIndexError} On duplicate ids or child names, missing or file parents, cycles or unusable names
 */
export function buildNamespace(entries: readonly IndexEntry[]): DirectoryNode {
  const byId = new Map<number, IndexEntry>();
  for (const entry of entries) {
    if (byId.has(entry.id)) {
      throw new CorruptIndexError(`Duplicate entry id ${entry.id}`);
    }
    ensureUsableName(entry);
    byId.set(entry.id, entry);
  }

  const paths: Map<number, string> = computePaths(entries, byId);

  const rootChildren = new Map<string, PackNode>();
  const root: DirectoryNode = { kind: 'directory', name: '', path: '', blockIndex: null, children: rootChildren };

  const childMaps = new Map<number, Map<string, PackNode>>();
  const built: { readonly entry: IndexEntry; readonly node: PackNode }[] = [];
  for (const entry of entries) {
    const path: string | undefined = paths.get(entry.id);
    if (path === undefined) {
      throw new CorruptIndexError(`No path computed for entry ${entry.id} ("${entry.name}")`);
    }
    if (entry.kind === 'directory') {
      const children = new Map<string, PackNode>();
      childMaps.set(entry.id, children);
      built.push({ entry, node: { kind: 'directory', name: entry.name, path, blockIndex: entry.blockIndex, children } });
    } else {
      const node: PackNode = {
        kind: 'file',
        name: entry.name,
        path,
        compression: entry.compression,
        fileTime: entry.fileTime,
        uncompressedSize: entry.uncompressedSize,
        compressedSize: entry.compressedSize,
        hash: entry.hash,
      };
      built.push({ entry, node });
    }
  }

  for (const { entry, node } of built) {
    let siblings: Map<string, PackNode> | undefined;
    if (entry.parentId === null) {
      siblings = rootChildren;
    } else {
      siblings = childMaps.get(entry.parentId);
      if (!siblings) {
        throw new CorruptIndexError(`Entry ${entry.id} ("${entry.name}") has file ${entry.parentId} as its parent`);
      }
    }
    if (siblings.has(entry.name)) {
      throw new CorruptIndexError(`Duplicate name "${node.path}" in index`);
    }
    siblings.set(entry.name, node);
  }

  return root;
}
