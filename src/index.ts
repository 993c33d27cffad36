/**
 * WildStar Pack Tools - Main entry point
 *
 * Read-only access to `.index` / `.archive` pack pairs: decoding, path lookup,
 * payload extraction and namespace diffs.
 */

export { Filesystem, stripPackExtension } from './filesystem.js';
export type { OpenOptions, FilesystemDetails, PackFileDetails } from './filesystem.js';

export { decodeIndex } from './index-decoder.js';
export type { DecodedIndex } from './index-decoder.js';
export { buildNamespace, PATH_SEPARATOR } from './namespace.js';
export { resolvePath, findNodes, walkNodes, listNodes, countFiles, splitPath } from './path-resolver.js';
export type { MatchOptions, ListOptions } from './path-resolver.js';
export { ArchiveReader } from './archive-reader.js';
export { extractNode } from './extractor.js';
export type { ExtractSummary, PayloadSource } from './extractor.js';
export { diffNamespaces, isEmptyDiff } from './diff.js';
export { BinaryCursor } from './utils/binary-cursor.js';
export { decodeLzma, LzmaDataError } from './utils/lzma.js';

export {
  PackError,
  MissingPairError,
  UnrecognizedFormatError,
  TruncatedDataError,
  CorruptIndexError,
  CorruptArchiveError,
  NotFoundError,
  IoFailureError,
} from './errors.js';

export { Compression } from './constants/pack-format.js';
export type { CompressionCode } from './constants/pack-format.js';
export type { DirectoryNode, FileNode, PackNode } from './types/node.js';
export type { IndexEntry, DirectoryEntry, FileEntry } from './types/index-entry.js';
export type { DiffCounts, DiffReport } from './types/diff-report.js';
export type { PackHeader, BlockDescriptor, RootBlock, ArchiveEntry } from './types/pack-structure.js';
