/**
 * Container framing helpers shared by the index decoder and the archive reader.
 */
import { BinaryCursor } from './utils/binary-cursor.js';
import {
  BLOCK_DESCRIPTOR_SIZE,
  HEADER_RESERVED_SIZE,
  PACK_HEADER_SIZE,
  PACK_MAGIC,
  PACK_VERSION,
  ROOT_BLOCK_SIZE,
} from './constants/pack-format.js';
import { CorruptArchiveError, CorruptIndexError, PackError, TruncatedDataError, UnrecognizedFormatError } from './errors.js';
import type { BlockDescriptor, PackHeader, RootBlock } from './types/pack-structure.js';

export type PackKind = 'index' | 'archive';

/**
 * Builds the structural error matching the file being decoded.
 */
export function corruptPack(kind: PackKind, message: string, cause?: unknown): PackError {
  return kind === 'index' ? new CorruptIndexError(message, cause) : new CorruptArchiveError(message, cause);
}

/**
 * Narrows a 64-bit field to a JavaScript number.
 * @throws {CorruptIndexError | CorruptArchiveError} If the value cannot be represented exactly
 */
export function toSafeNumber(value: bigint, label: string, kind: PackKind): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw corruptPack(kind, `${label} ${value} is too large`);
  }
  return Number(value);
}

/**
 * Parses and validates the 556-byte header at the start of a pack file.
 *
 * @param buffer - Bytes starting at file offset 0
 * @param source - File path for error messages
 * @throws {TruncatedDataError} If the buffer is shorter than the header
 * @throws {UnrecognizedFormatError} If magic or version do not match
 */
export function parsePackHeader(buffer: Buffer, source: string, kind: PackKind): PackHeader {
  if (buffer.length < PACK_HEADER_SIZE) {
    throw new TruncatedDataError(`File too small to be a pack (${buffer.length} bytes): ${source}`);
  }
  const cursor = new BinaryCursor(buffer);
  const magic: string = cursor.readFixedString(4);
  if (magic !== PACK_MAGIC) {
    throw new UnrecognizedFormatError(`Invalid pack magic "${magic}" in ${source}`);
  }
  const version: number = cursor.readUInt32();
  if (version !== PACK_VERSION) {
    throw new UnrecognizedFormatError(`Unsupported pack version ${version} in ${source}, expected ${PACK_VERSION}`);
  }
  cursor.skip(HEADER_RESERVED_SIZE);
  const declaredFileSize: number = toSafeNumber(cursor.readUInt64(), 'Declared file size', kind);
  const firstUnknown: bigint = cursor.readUInt64();
  const blockTableOffset: number = toSafeNumber(cursor.readUInt64(), 'Block table offset', kind);
  const blockCount: number = cursor.readUInt32();
  const secondUnknown: number = cursor.readUInt32();
  const rootBlockIndex: number = cursor.readUInt32();

  return {
    magic,
    version,
    declaredFileSize,
    blockTableOffset,
    blockCount,
    rootBlockIndex,
    unknowns: [firstUnknown, secondUnknown],
  };
}

/** Byte length of the block table a header describes. */
export function blockTableSize(header: PackHeader): number {
  return header.blockCount * BLOCK_DESCRIPTOR_SIZE;
}

/**
 * Checks that the block table and root block index described by the header fit the file.
 */
export function validateHeaderBounds(header: PackHeader, fileSize: number, source: string, kind: PackKind): void {
  if (header.declaredFileSize !== fileSize) {
    console.warn(`Declared size ${header.declaredFileSize} differs from actual size ${fileSize}: ${source}`);
  }
  if (header.blockTableOffset + blockTableSize(header) > fileSize) {
    throw corruptPack(kind, `Block table (${header.blockCount} blocks at ${header.blockTableOffset}) extends beyond ${source}`);
  }
  if (header.rootBlockIndex >= header.blockCount) {
    throw corruptPack(kind, `Root block ${header.rootBlockIndex} is outside the block table of ${source}`);
  }
}

/**
 * Parses the block table.
 *
 * @param buffer - Bytes of the block table alone
 * @param fileSize - Actual size of the file, used to bounds-check every block
 */
export function parseBlockTable(buffer: Buffer, header: PackHeader, fileSize: number, source: string, kind: PackKind): BlockDescriptor[] {
  const cursor = new BinaryCursor(buffer);
  const blocks: BlockDescriptor[] = [];
  for (let index = 0; index < header.blockCount; index++) {
    const offset: number = toSafeNumber(cursor.readUInt64(), `Block ${index} offset`, kind);
    const size: number = toSafeNumber(cursor.readUInt64(), `Block ${index} size`, kind);
    if (offset + size > fileSize) {
      throw corruptPack(kind, `Block ${index} extends beyond file bounds: offset=${offset}, size=${size}, fileSize=${fileSize} in ${source}`);
    }
    blocks.push({ offset, size });
  }
  return blocks;
}

/**
 * Looks up a block, failing with the structural error of the file kind.
 */
export function blockAt(blocks: readonly BlockDescriptor[], index: number, kind: PackKind): BlockDescriptor {
  const block: BlockDescriptor | undefined = blocks[index];
  if (!block) {
    throw corruptPack(kind, `Block index ${index} is outside the block table (${blocks.length} blocks)`);
  }
  return block;
}

/**
 * Parses the 16-byte root block and checks its magic.
 * @throws {UnrecognizedFormatError} If the magic is not `expectedMagic`
 */
export function parseRootBlock(buffer: Buffer, expectedMagic: string, source: string, kind: PackKind): RootBlock {
  if (buffer.length < ROOT_BLOCK_SIZE) {
    throw corruptPack(kind, `Root block holds ${buffer.length} bytes, expected ${ROOT_BLOCK_SIZE}: ${source}`);
  }
  const cursor = new BinaryCursor(buffer);
  const magic: string = cursor.readFixedString(4);
  if (magic !== expectedMagic) {
    throw new UnrecognizedFormatError(`Invalid root block magic "${magic}" in ${source}, expected "${expectedMagic}"`);
  }
  const version: number = cursor.readUInt32();
  const first: number = cursor.readUInt32();
  const second: number = cursor.readUInt32();
  return { magic, version, first, second };
}
