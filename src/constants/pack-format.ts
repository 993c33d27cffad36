/**
 * Layout constants shared by `.index` and `.archive` files.
 */

/** File header magic as stored on disk. */
export const PACK_MAGIC = 'KCAP';
export const PACK_VERSION = 11;
export const PACK_HEADER_SIZE = 556;

export const HEADER_FILE_SIZE_OFFSET = 520;
export const HEADER_BLOCK_TABLE_OFFSET = 536;
export const HEADER_RESERVED_SIZE = 512;

export const BLOCK_DESCRIPTOR_SIZE = 16;
export const ROOT_BLOCK_SIZE = 16;

/** Root block magic of an index file. */
export const INDEX_ROOT_MAGIC = 'XDIA';
/** Root block magic of an archive file. */
export const ARCHIVE_ROOT_MAGIC = 'CRAA';

export const DIRECTORY_RECORD_SIZE = 8;
export const FILE_RECORD_SIZE = 56;
export const ARCHIVE_ENTRY_SIZE = 32;
export const HASH_SIZE = 20;

export const INDEX_EXTENSION = '.index';
export const ARCHIVE_EXTENSION = '.archive';

/** Payload compression codes carried by index file records. */
export const Compression = {
  Stored: 1,
  Zlib: 3,
  Lzma: 5,
} as const;

export type CompressionCode = (typeof Compression)[keyof typeof Compression];
