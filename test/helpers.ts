/**
 * Shared lookups for tests that work on decoded trees.
 */
import { readFile } from 'node:fs/promises';
import assert from 'node:assert/strict';
import { decodeIndex } from '../src/index-decoder.js';
import { buildNamespace } from '../src/namespace.js';
import { resolvePath } from '../src/path-resolver.js';
import type { DirectoryNode, FileNode } from '../src/types/node.js';
import { buildIndex } from './fixtures/pack-writer.js';
import type { FixtureDirectory } from './fixtures/pack-writer.js';

export function treeOf(fixture: FixtureDirectory): DirectoryNode {
  return buildNamespace(decodeIndex(buildIndex(fixture), 'fixture.index').entries);
}

export async function treeFromFile(indexPath: string): Promise<DirectoryNode> {
  return buildNamespace(decodeIndex(await readFile(indexPath), indexPath).entries);
}

export function fileAt(root: DirectoryNode, path: string): FileNode {
  const node = resolvePath(root, path);
  assert.ok(node, `${path} should exist`);
  assert.equal(node.kind, 'file', `${path} should be a file`);
  if (node.kind !== 'file') {
    throw new Error(`${path} is a directory`);
  }
  return node;
}

export function directoryAt(root: DirectoryNode, path: string): DirectoryNode {
  const node = resolvePath(root, path);
  assert.ok(node, `${path} should exist`);
  if (node.kind !== 'directory') {
    throw new Error(`${path} is a file`);
  }
  return node;
}
