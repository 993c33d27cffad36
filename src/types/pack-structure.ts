/**
 * Container framing shared by index and archive files.
 */

export interface PackHeader {
  readonly magic: string;
  readonly version: number;
  readonly declaredFileSize: number;
  readonly blockTableOffset: number;
  readonly blockCount: number;
  readonly rootBlockIndex: number;
  /** Fields with no known meaning, kept for debug output. */
  readonly unknowns: readonly [bigint, number];
}

export interface BlockDescriptor {
  readonly offset: number;
  readonly size: number;
}

export interface RootBlock {
  readonly magic: string;
  readonly version: number;
  readonly first: number;
  readonly second: number;
}

/** Where an archive keeps the payload for one content hash. */
export interface ArchiveEntry {
  readonly blockIndex: number;
  readonly hash: string;
  readonly size: number;
}
