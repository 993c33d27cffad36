/**
 * Text rendering of nodes, listings, diffs and header details for the CLI.
 */
import type { ExtractSummary } from './extractor.js';
import type { FilesystemDetails, PackFileDetails } from './filesystem.js';
import type { DiffReport } from './types/diff-report.js';
import type { DirectoryNode, PackNode } from './types/node.js';

const COMPRESSION_NAMES: Readonly<Record<number, string>> = {
  1: 'stored',
  3: 'zlib',
  5: 'lzma',
};

export function compressionName(code: number): string {
  return COMPRESSION_NAMES[code] ?? `unknown (${code})`;
}

function displayPath(node: PackNode): string {
  return node.path === '' ? '/' : node.path;
}

/**
 * One node. Without `debug` this is just the path; with it, the decoded record fields.
 */
export function formatNode(node: PackNode, debug: boolean = false): string {
  if (!debug) {
    return displayPath(node);
  }
  if (node.kind === 'directory') {
    const block: string = node.blockIndex === null ? 'root' : String(node.blockIndex);
    return [
      `Directory ${displayPath(node)}:`,
      `\tBlock: ${block}`,
      `\tChildren: ${node.children.size}`,
    ].join('\n');
  }
  return [
    `File ${node.path}:`,
    `\tCompression type: ${compressionName(node.compression)}`,
    `\tUncompressed size: ${node.uncompressedSize} bytes`,
    `\tCompressed size: ${node.compressedSize} bytes`,
    `\tSHA1 hash: ${node.hash}`,
    `\tFile time: 0x${node.fileTime.toString(16).padStart(16, '0')}`,
  ].join('\n');
}

/**
 * A directory path followed by its immediate children, one per tab-indented line.
 * Subdirectories carry a trailing slash.
 */
export function formatListing(directory: DirectoryNode): string {
  const lines: string[] = [displayPath(directory)];
  for (const child of directory.children.values()) {
    lines.push(`\t${child.name}${child.kind === 'directory' ? '/' : ''}`);
  }
  return lines.join('\n');
}

export function formatDiffReport(report: DiffReport): string {
  const lines: string[] = [];
  for (const [name, counts] of report) {
    lines.push(`${name}: ${counts.removed} removed, ${counts.added} added, ${counts.changed} changed`);
  }
  return lines.join('\n');
}

function formatPackFile(label: string, details: PackFileDetails, extra: readonly string[]): string[] {
  const [firstUnknown, secondUnknown] = details.header.unknowns;
  return [
    `${label} ${details.filePath}:`,
    `\tMagic: ${details.header.magic}`,
    `\tVersion: ${details.header.version}`,
    `\tFilesize: ${details.fileSize} bytes`,
    `\tNumber of blocks: ${details.header.blockCount}`,
    `\tRoot block: ${details.header.rootBlockIndex} (${details.rootBlock.magic} v${details.rootBlock.version})`,
    ...extra,
    `\tUnknowns: ${firstUnknown}, ${secondUnknown}`,
  ];
}

export function formatDetails(details: FilesystemDetails): string {
  return [
    ...formatPackFile('Index', details.index, [
      `\tEntries: ${details.index.entryCount}`,
      `\tRoot directory block: ${details.index.rootDirectoryBlock}`,
    ]),
    ...formatPackFile('Archive', details.archive, [`\tPayloads: ${details.archive.entryCount}`]),
  ].join('\n');
}

export function formatExtractSummary(summary: ExtractSummary, destination: string): string {
  return `Extracted ${summary.files} files (${summary.bytes} bytes) in ${summary.directories} directories to ${destination}`;
}
