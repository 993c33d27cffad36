/**
 * Flat records produced by the index decoder, before tree assembly.
 */

interface IndexEntryBase {
  /** Position of the entry in the decoded table. */
  readonly id: number;
  readonly name: string;
  /** Containing directory entry, or null for entries of the root directory. */
  readonly parentId: number | null;
}

export interface DirectoryEntry extends IndexEntryBase {
  readonly kind: 'directory';
  readonly blockIndex: number;
}

export interface FileEntry extends IndexEntryBase {
  readonly kind: 'file';
  readonly compression: number;
  /** Raw 64-bit timestamp field from the file record. */
  readonly fileTime: bigint;
  readonly uncompressedSize: number;
  readonly compressedSize: number;
  /** Lower-case hex SHA-1 of the payload. */
  readonly hash: string;
}

export type IndexEntry = DirectoryEntry | FileEntry;
