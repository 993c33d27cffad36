/**
 * Decodes an `.index` file into a flat table of directory and file entries.
 */
import { BinaryCursor } from './utils/binary-cursor.js';
import { DIRECTORY_RECORD_SIZE, FILE_RECORD_SIZE, HASH_SIZE, INDEX_ROOT_MAGIC } from './constants/pack-format.js';
import { CorruptIndexError } from './errors.js';
import { blockAt, blockTableSize, parseBlockTable, parsePackHeader, parseRootBlock, toSafeNumber, validateHeaderBounds } from './pack-file.js';
import type { BlockDescriptor, PackHeader, RootBlock } from './types/pack-structure.js';
import type { IndexEntry } from './types/index-entry.js';

export interface DecodedIndex {
  readonly filePath: string;
  readonly header: PackHeader;
  readonly rootBlock: RootBlock;
  readonly blocks: readonly BlockDescriptor[];
  readonly rootDirectoryBlock: number;
  /** Block count declared by the file header. */
  readonly declaredEntryCount: number;
  /** Entries in pre-order; a parent always precedes its children. */
  readonly entries: readonly IndexEntry[];
}

interface DirectoryRecord {
  readonly name: string;
  readonly blockIndex: number;
}

interface FileRecord {
  readonly name: string;
  readonly compression: number;
  readonly fileTime: bigint;
  readonly uncompressedSize: number;
  readonly compressedSize: number;
  readonly hash: string;
}

interface DirectoryBlock {
  readonly directories: readonly DirectoryRecord[];
  readonly files: readonly FileRecord[];
}

function readName(names: Buffer, nameOffset: number, blockIndex: number): string {
  if (nameOffset >= names.length) {
    throw new CorruptIndexError(`Name offset ${nameOffset} is outside the name table of block ${blockIndex}`);
  }
  const end: number = names.indexOf(0, nameOffset);
  if (end === -1) {
    throw new CorruptIndexError(`Unterminated name at offset ${nameOffset} in block ${blockIndex}`);
  }
  for (let i = nameOffset; i < end; i++) {
    if (names[i] > 0x7f) {
      throw new CorruptIndexError(
        `Name at offset ${nameOffset} in block ${blockIndex} contains non-ASCII byte 0x${names[i].toString(16)}`
      );
    }
  }
  return names.toString('ascii', nameOffset, end);
}

/**
 * Parses one directory block: record counts, subdirectory records, file records,
 * then the NUL-terminated name table filling the rest of the block.
 *
 * @throws {CorruptIndexError} If the block is too small for its records or a name cannot be read
 */
function readDirectoryBlock(buffer: Buffer, block: BlockDescriptor, blockIndex: number): DirectoryBlock {
  const data: Buffer = buffer.subarray(block.offset, block.offset + block.size);
  if (data.length < 8) {
    throw new CorruptIndexError(`Directory block ${blockIndex} holds ${data.length} bytes, too small for its counts`);
  }
  const cursor = new BinaryCursor(data);
  const directoryCount: number = cursor.readUInt32();
  const fileCount: number = cursor.readUInt32();
  const recordsSize: number = directoryCount * DIRECTORY_RECORD_SIZE + fileCount * FILE_RECORD_SIZE;
  if (recordsSize > cursor.remaining()) {
    throw new CorruptIndexError(
      `Directory block ${blockIndex} declares ${directoryCount} directories and ${fileCount} files but holds ${data.length} bytes`
    );
  }

  const rawDirectories: { nameOffset: number; blockIndex: number }[] = [];
  for (let i = 0; i < directoryCount; i++) {
    rawDirectories.push({ nameOffset: cursor.readUInt32(), blockIndex: cursor.readUInt32() });
  }

  const rawFiles: (Omit<FileRecord, 'name'> & { nameOffset: number })[] = [];
  for (let i = 0; i < fileCount; i++) {
    const nameOffset: number = cursor.readUInt32();
    const compression: number = cursor.readUInt32();
    const fileTime: bigint = cursor.readUInt64();
    const uncompressedSize: number = toSafeNumber(cursor.readUInt64(), 'Uncompressed size', 'index');
    const compressedSize: number = toSafeNumber(cursor.readUInt64(), 'Compressed size', 'index');
    const hash: string = cursor.readBytes(HASH_SIZE).toString('hex');
    cursor.skip(4);
    rawFiles.push({ nameOffset, compression, fileTime, uncompressedSize, compressedSize, hash });
  }

  const names: Buffer = cursor.readBytes(cursor.remaining());
  return {
    directories: rawDirectories.map((record) => ({
      name: readName(names, record.nameOffset, blockIndex),
      blockIndex: record.blockIndex,
    })),
    files: rawFiles.map(({ nameOffset, ...record }) => ({
      name: readName(names, nameOffset, blockIndex),
      ...record,
    })),
  };
}

/**
 * Decodes an index file.
 * Walks directory blocks from the root directory and emits entries in pre-order,
 * subdirectories of a block before its files.
 *
 * @param buffer - Complete index file contents
 * @param filePath - Index path for error messages
 * @returns Header details and the flat entry table
 * @throws {UnrecognizedFormatError} If the header or root block magic does not match
 * @throws {TruncatedDataError} If the buffer ends inside the header
 * @throws {CorruptIndexError} On out-of-range blocks, directory cycles or unreadable names
 */
export function decodeIndex(buffer: Buffer, filePath: string): DecodedIndex {
  const header: PackHeader = parsePackHeader(buffer, filePath, 'index');
  validateHeaderBounds(header, buffer.length, filePath, 'index');
  const tableBytes: Buffer = buffer.subarray(header.blockTableOffset, header.blockTableOffset + blockTableSize(header));
  const blocks: BlockDescriptor[] = parseBlockTable(tableBytes, header, buffer.length, filePath, 'index');

  const root: BlockDescriptor = blockAt(blocks, header.rootBlockIndex, 'index');
  const rootBlock: RootBlock = parseRootBlock(buffer.subarray(root.offset, root.offset + root.size), INDEX_ROOT_MAGIC, filePath, 'index');
  const rootDirectoryBlock: number = rootBlock.second;

  const entries: IndexEntry[] = [];
  const visited = new Set<number>();

  const walk = (blockIndex: number, parentId: number | null): void => {
    if (visited.has(blockIndex)) {
      throw new CorruptIndexError(`Directory block ${blockIndex} is referenced more than once in ${filePath}`);
    }
    visited.add(blockIndex);
    const directory: DirectoryBlock = readDirectoryBlock(buffer, blockAt(blocks, blockIndex, 'index'), blockIndex);

    for (const record of directory.directories) {
      const id: number = entries.length;
      entries.push({ kind: 'directory', id, parentId, name: record.name, blockIndex: record.blockIndex });
      walk(record.blockIndex, id);
    }
    for (const record of directory.files) {
      entries.push({ kind: 'file', id: entries.length, parentId, ...record });
    }
  };

  walk(rootDirectoryBlock, null);

  return {
    filePath,
    header,
    rootBlock,
    blocks,
    rootDirectoryBlock,
    declaredEntryCount: header.blockCount,
    entries,
  };
}
