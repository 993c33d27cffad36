/**
 * Reads file payloads out of an `.archive` file.
 *
 * Only the header, block table and entry table are loaded when the archive is
 * opened; payload bytes are read from disk on demand.
 */
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { promisify } from 'node:util';
import { inflate } from 'node:zlib';
import { BinaryCursor } from './utils/binary-cursor.js';
import { decodeLzma, LzmaDataError } from './utils/lzma.js';
import { ARCHIVE_ENTRY_SIZE, ARCHIVE_ROOT_MAGIC, Compression, HASH_SIZE, PACK_HEADER_SIZE, ROOT_BLOCK_SIZE } from './constants/pack-format.js';
import { CorruptArchiveError, describeError, IoFailureError, TruncatedDataError } from './errors.js';
import { blockAt, blockTableSize, parseBlockTable, parsePackHeader, parseRootBlock, toSafeNumber, validateHeaderBounds } from './pack-file.js';
import type { ArchiveEntry, BlockDescriptor, PackHeader, RootBlock } from './types/pack-structure.js';
import type { FileNode } from './types/node.js';

const inflateAsync = promisify(inflate);

/**
 * Reads exactly `length` bytes at `offset`.
 * @throws {IoFailureError} If the handle fails or the file ends first
 */
async function readRange(handle: FileHandle, offset: number, length: number, source: string): Promise<Buffer> {
  const buffer: Buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, filled, length - filled, offset + filled));
    } catch (error) {
      throw new IoFailureError(`Failed to read ${length} bytes at offset ${offset} of ${source}: ${describeError(error)}`, error);
    }
    if (bytesRead === 0) {
      throw new IoFailureError(`Unexpected end of ${source}: needed ${length} bytes at offset ${offset}, got ${filled}`);
    }
    filled += bytesRead;
  }
  return buffer;
}

function parseEntryTable(buffer: Buffer, entryCount: number): Map<string, ArchiveEntry> {
  const cursor = new BinaryCursor(buffer);
  const entries = new Map<string, ArchiveEntry>();
  for (let i = 0; i < entryCount; i++) {
    const blockIndex: number = cursor.readUInt32();
    const hash: string = cursor.readBytes(HASH_SIZE).toString('hex');
    const size: number = toSafeNumber(cursor.readUInt64(), `Archive entry ${i} size`, 'archive');
    if (!entries.has(hash)) {
      entries.set(hash, { blockIndex, hash, size });
    }
  }
  return entries;
}

/**
 * Decodes a stored payload to the file's uncompressed size.
 * @throws {CorruptArchiveError} On an unknown compression code, a decoding failure or a length mismatch
 */
async function decodePayload(raw: Buffer, file: FileNode): Promise<Buffer> {
  let data: Buffer;
  switch (file.compression) {
    case Compression.Stored:
      data = raw;
      break;
    case Compression.Zlib:
      try {
        // One byte over the declared size still reaches the length check below.
        data = await inflateAsync(raw, { maxOutputLength: file.uncompressedSize + 1 });
      } catch (error) {
        throw new CorruptArchiveError(`Failed to inflate ${file.path}: ${describeError(error)}`, error);
      }
      break;
    case Compression.Lzma:
      try {
        data = decodeLzma(raw, file.uncompressedSize);
      } catch (error) {
        if (error instanceof LzmaDataError) {
          throw new CorruptArchiveError(`Failed to decode LZMA payload of ${file.path}: ${error.message}`, error);
        }
        throw error;
      }
      break;
    default:
      throw new CorruptArchiveError(`Unsupported compression type ${file.compression} for ${file.path}`);
  }

  if (data.length !== file.uncompressedSize) {
    throw new CorruptArchiveError(`Decoded ${data.length} bytes for ${file.path}, expected ${file.uncompressedSize}`);
  }
  return data;
}

/**
 * Random-access reader over an open archive file.
 */
export class ArchiveReader {
  private constructor(
    readonly filePath: string,
    readonly fileSize: number,
    readonly header: PackHeader,
    readonly rootBlock: RootBlock,
    private readonly handle: FileHandle,
    private readonly blocks: readonly BlockDescriptor[],
    private readonly entries: ReadonlyMap<string, ArchiveEntry>
  ) {}

  /**
   * Opens an archive and loads its tables. The handle is closed again if the
   * tables cannot be decoded.
   *
   * @param filePath - Path to the `.archive` file
   * @throws {IoFailureError} If the file cannot be opened or read
   * @throws {UnrecognizedFormatError} If the header or root block magic does not match
   * @throws {TruncatedDataError} If the file is shorter than a pack header
   * @throws {CorruptArchiveError} If the tables reference bytes outside the file
   */
  static async open({ filePath }: { readonly filePath: string }): Promise<ArchiveReader> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw new IoFailureError(`Failed to open archive ${filePath}: ${describeError(error)}`, error);
    }

    try {
      const { size: fileSize } = await handle.stat();
      if (fileSize < PACK_HEADER_SIZE) {
        throw new TruncatedDataError(`File too small to be a pack (${fileSize} bytes): ${filePath}`);
      }
      const header: PackHeader = parsePackHeader(await readRange(handle, 0, PACK_HEADER_SIZE, filePath), filePath, 'archive');
      validateHeaderBounds(header, fileSize, filePath, 'archive');
      const tableBytes: Buffer = await readRange(handle, header.blockTableOffset, blockTableSize(header), filePath);
      const blocks: BlockDescriptor[] = parseBlockTable(tableBytes, header, fileSize, filePath, 'archive');

      const root: BlockDescriptor = blockAt(blocks, header.rootBlockIndex, 'archive');
      const rootBytes: Buffer = await readRange(handle, root.offset, Math.min(root.size, ROOT_BLOCK_SIZE), filePath);
      const rootBlock: RootBlock = parseRootBlock(rootBytes, ARCHIVE_ROOT_MAGIC, filePath, 'archive');

      const entryCount: number = rootBlock.first;
      const tableBlock: BlockDescriptor = blockAt(blocks, rootBlock.second, 'archive');
      const entryTableSize: number = entryCount * ARCHIVE_ENTRY_SIZE;
      if (entryTableSize > tableBlock.size) {
        throw new CorruptArchiveError(
          `Entry table block ${rootBlock.second} holds ${tableBlock.size} bytes, too small for ${entryCount} entries in ${filePath}`
        );
      }
      const entries = parseEntryTable(await readRange(handle, tableBlock.offset, entryTableSize, filePath), entryCount);

      return new ArchiveReader(filePath, fileSize, header, rootBlock, handle, blocks, entries);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  get entryCount(): number {
    return this.entries.size;
  }

  /**
   * Reads and decodes the payload of a file entry.
   * Stored hashes are not checked here; see {@link ArchiveReader.verify}.
   *
   * @throws {IoFailureError} If the archive has no payload for the file's hash or cannot supply its bytes
   * @throws {CorruptArchiveError} If the payload does not decode to the declared size
   */
  async read(file: FileNode): Promise<Buffer> {
    const entry: ArchiveEntry | undefined = this.entries.get(file.hash);
    if (!entry) {
      throw new IoFailureError(`Archive ${this.filePath} has no payload for ${file.path} (hash ${file.hash})`);
    }
    const block: BlockDescriptor = blockAt(this.blocks, entry.blockIndex, 'archive');
    const length: number = file.compression === Compression.Stored ? file.uncompressedSize : file.compressedSize;
    if (block.size < length) {
      throw new IoFailureError(
        `Archive block ${entry.blockIndex} holds ${block.size} bytes but ${file.path} needs ${length} at offset ${block.offset}`
      );
    }
    const raw: Buffer = await readRange(this.handle, block.offset, length, this.filePath);
    return decodePayload(raw, file);
  }

  /**
   * Reads a file and compares the SHA-1 of its decoded bytes with the stored hash.
   */
  async verify(file: FileNode): Promise<boolean> {
    const data: Buffer = await this.read(file);
    return createHash('sha1').update(data).digest('hex') === file.hash;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
