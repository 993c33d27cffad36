/**
 * Tree form of a pack namespace.
 */

export interface DirectoryNode {
  readonly kind: 'directory';
  readonly name: string;
  /** Slash-joined path from the root; the root's path is empty. */
  readonly path: string;
  /** Index block the directory was decoded from, or null for the synthetic root. */
  readonly blockIndex: number | null;
  /** Children keyed by name, in declaration order. */
  readonly children: ReadonlyMap<string, PackNode>;
}

export interface FileNode {
  readonly kind: 'file';
  readonly name: string;
  readonly path: string;
  readonly compression: number;
  readonly fileTime: bigint;
  readonly uncompressedSize: number;
  readonly compressedSize: number;
  readonly hash: string;
}

export type PackNode = DirectoryNode | FileNode;
