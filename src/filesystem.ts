/**
 * Read-only view over an `.index` / `.archive` pair.
 */
import { access, readFile } from 'node:fs/promises';
import { ArchiveReader } from './archive-reader.js';
import { decodeIndex } from './index-decoder.js';
import type { DecodedIndex } from './index-decoder.js';
import { buildNamespace } from './namespace.js';
import { findNodes, listNodes, resolvePath } from './path-resolver.js';
import type { ListOptions } from './path-resolver.js';
import { extractNode } from './extractor.js';
import type { ExtractSummary } from './extractor.js';
import { diffNamespaces } from './diff.js';
import { ARCHIVE_EXTENSION, INDEX_EXTENSION } from './constants/pack-format.js';
import { describeError, IoFailureError, MissingPairError, NotFoundError } from './errors.js';
import type { DiffReport } from './types/diff-report.js';
import type { DirectoryNode, FileNode, PackNode } from './types/node.js';
import type { PackHeader, RootBlock } from './types/pack-structure.js';

export interface OpenOptions {
  /** Path of the pair, with or without the `.index` / `.archive` extension. */
  readonly basePath: string;
  /** Whether path lookups and searches match case exactly. Defaults to true. */
  readonly caseSensitive?: boolean;
}

export interface PackFileDetails {
  readonly filePath: string;
  readonly fileSize: number;
  readonly header: PackHeader;
  readonly rootBlock: RootBlock;
}

export interface FilesystemDetails {
  readonly index: PackFileDetails & { readonly entryCount: number; readonly rootDirectoryBlock: number };
  readonly archive: PackFileDetails & { readonly entryCount: number };
}

/**
 * Removes a trailing `.index` or `.archive` extension.
 */
export function stripPackExtension(path: string): string {
  for (const extension of [INDEX_EXTENSION, ARCHIVE_EXTENSION]) {
    if (path.endsWith(extension)) {
      return path.slice(0, -extension.length);
    }
  }
  return path;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * An opened pack: the decoded namespace plus an open archive for payload reads.
 * The tree never changes after {@link Filesystem.open}; call {@link Filesystem.close}
 * to release the archive handle.
 */
export class Filesystem {
  private constructor(
    readonly basePath: string,
    readonly root: DirectoryNode,
    private readonly index: DecodedIndex,
    private readonly indexSize: number,
    private readonly archive: ArchiveReader,
    private readonly caseSensitive: boolean
  ) {}

  /**
   * Opens a pack pair.
   *
   * @param options - Base path and matching options
   * @returns The opened filesystem
   * @throws {MissingPairError} If either file is absent; checked before any parsing
   * @throws {UnrecognizedFormatError | TruncatedDataError | CorruptIndexError} If the index cannot be decoded
   * @throws {CorruptArchiveError | IoFailureError} If the archive tables cannot be loaded
   */
  static async open({ basePath, caseSensitive = true }: OpenOptions): Promise<Filesystem> {
    const base: string = stripPackExtension(basePath);
    const indexPath = `${base}${INDEX_EXTENSION}`;
    const archivePath = `${base}${ARCHIVE_EXTENSION}`;

    const missing: string[] = [];
    for (const path of [indexPath, archivePath]) {
      if (!(await exists(path))) {
        missing.push(path);
      }
    }
    if (missing.length > 0) {
      throw new MissingPairError(`Incomplete pack pair for ${base}: missing ${missing.join(', ')}`, missing);
    }

    let buffer: Buffer;
    try {
      buffer = await readFile(indexPath);
    } catch (error) {
      throw new IoFailureError(`Failed to read index ${indexPath}: ${describeError(error)}`, error);
    }
    const index: DecodedIndex = decodeIndex(buffer, indexPath);
    const root: DirectoryNode = buildNamespace(index.entries);
    const archive: ArchiveReader = await ArchiveReader.open({ filePath: archivePath });

    return new Filesystem(base, root, index, buffer.length, archive, caseSensitive);
  }

  /** Resolves a slash-separated path; `""` is the root. */
  resolve(path: string): PackNode | null {
    return resolvePath(this.root, path, { caseSensitive: this.caseSensitive });
  }

  /**
   * Resolves a path, failing when it does not exist.
   * @throws {NotFoundError} If no node lives at `path`
   */
  get(path: string): PackNode {
    const node: PackNode | null = this.resolve(path);
    if (!node) {
      throw new NotFoundError(`Could not find ${path} in ${this.basePath}`, path);
    }
    return node;
  }

  find(substring: string): Generator<PackNode> {
    return findNodes(this.root, substring, { caseSensitive: this.caseSensitive });
  }

  list(node: PackNode = this.root, options: ListOptions = {}): PackNode[] {
    return listNodes(node, options);
  }

  read(file: FileNode): Promise<Buffer> {
    return this.archive.read(file);
  }

  verify(file: FileNode): Promise<boolean> {
    return this.archive.verify(file);
  }

  extract(node: PackNode, destination: string): Promise<ExtractSummary> {
    return extractNode(node, destination, this.archive);
  }

  /**
   * Compares this pack (as the older side) with `other` below `path`.
   * A side where `path` is missing or names a file counts as empty.
   *
   * @throws {NotFoundError} If `path` is a directory in neither pack
   */
  diff(other: Filesystem, path: string = ''): DiffReport {
    const before: PackNode | null = this.resolve(path);
    const after: PackNode | null = other.resolve(path);
    const beforeDirectory: DirectoryNode | null = before?.kind === 'directory' ? before : null;
    const afterDirectory: DirectoryNode | null = after?.kind === 'directory' ? after : null;
    if (!beforeDirectory && !afterDirectory) {
      throw new NotFoundError(`Could not find directory ${path} in ${this.basePath} or ${other.basePath}`, path);
    }
    return diffNamespaces(beforeDirectory, afterDirectory);
  }

  /** Header details of both files, for debug output. */
  describe(): FilesystemDetails {
    return {
      index: {
        filePath: this.index.filePath,
        fileSize: this.indexSize,
        header: this.index.header,
        rootBlock: this.index.rootBlock,
        entryCount: this.index.entries.length,
        rootDirectoryBlock: this.index.rootDirectoryBlock,
      },
      archive: {
        filePath: this.archive.filePath,
        fileSize: this.archive.fileSize,
        header: this.archive.header,
        rootBlock: this.archive.rootBlock,
        entryCount: this.archive.entryCount,
      },
    };
  }

  async close(): Promise<void> {
    await this.archive.close();
  }
}
