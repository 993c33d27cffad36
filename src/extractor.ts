/**
 * Writes a namespace subtree onto the local filesystem.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describeError, IoFailureError } from './errors.js';
import { splitPath, walkNodes } from './path-resolver.js';
import type { FileNode, PackNode } from './types/node.js';

export interface PayloadSource {
  read(file: FileNode): Promise<Buffer>;
}

export interface ExtractSummary {
  readonly directories: number;
  readonly files: number;
  readonly bytes: number;
}

/**
 * Maps a node below `base` to its destination path. The base node's own name is
 * kept as the top-level folder; the root (empty name) maps onto the destination itself.
 */
function destinationFor(node: PackNode, base: PackNode, destinationRoot: string): string {
  const baseDepth: number = splitPath(base.path).length;
  const relative: string[] = splitPath(node.path).slice(Math.max(baseDepth - 1, 0));
  return join(destinationRoot, ...relative);
}

async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw new IoFailureError(`Failed to create directory ${path}: ${describeError(error)}`, error);
  }
}

/**
 * Extracts `node` and everything beneath it under `destinationRoot`, in pre-order.
 * Directory creation is idempotent. A failure part way leaves what was already written.
 *
 * @param node - Directory or file to extract
 * @param destinationRoot - Existing or new directory to write into
 * @param source - Supplies decoded payloads
 * @returns Counts of directories, files and bytes written
 * @throws {IoFailureError} If a directory or file cannot be written
 */
export async function extractNode(node: PackNode, destinationRoot: string, source: PayloadSource): Promise<ExtractSummary> {
  let directories = 0;
  let files = 0;
  let bytes = 0;

  await ensureDirectory(destinationRoot);
  const nodes: Iterable<PackNode> = node.kind === 'directory' ? [node, ...walkNodes(node)] : [node];

  for (const current of nodes) {
    const target: string = destinationFor(current, node, destinationRoot);
    if (current.kind === 'directory') {
      await ensureDirectory(target);
      directories += 1;
      continue;
    }
    const data: Buffer = await source.read(current);
    try {
      await writeFile(target, data);
    } catch (error) {
      throw new IoFailureError(`Failed to write ${current.path} to ${target}: ${describeError(error)}`, error);
    }
    files += 1;
    bytes += data.length;
  }

  return { directories, files, bytes };
}
