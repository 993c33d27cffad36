#!/usr/bin/env node
/**
 * WildStar Pack Tools - CLI Interface
 *
 * Command-line interface for exploring, extracting and comparing `.index` / `.archive` packs.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { Filesystem } from './filesystem.js';
import { describeError } from './errors.js';
import { walkNodes } from './path-resolver.js';
import { formatDetails, formatDiffReport, formatExtractSummary, formatListing, formatNode } from './report.js';
import type { PackNode } from './types/node.js';

interface GlobalOptions {
  readonly recursive?: boolean;
  readonly debug?: boolean;
  readonly ignoreCase?: boolean;
}

const program = new Command();

const version = '0.1.0';

program
  .name('wspack')
  .description('Explore and extract directories and files inside WildStar pack files')
  .version(version)
  .option('-r, --recursive', 'List subdirectories recursively')
  .option('-d, --debug', 'Print decoded record fields for each node')
  .option('-i, --ignore-case', 'Match paths without regard to case');

async function openPack(archive: string): Promise<Filesystem> {
  const { ignoreCase } = program.opts<GlobalOptions>();
  return Filesystem.open({ basePath: resolve(archive), caseSensitive: !ignoreCase });
}

/**
 * Runs a command against an opened pack and turns any failure into exit status 1.
 */
async function withPack(archive: string, label: string, action: (fs: Filesystem) => Promise<void>): Promise<void> {
  try {
    const fs: Filesystem = await openPack(archive);
    try {
      await action(fs);
    } finally {
      await fs.close();
    }
  } catch (error) {
    console.error(`❌ ${label} failed:`, describeError(error));
    process.exit(1);
  }
}

program
  .command('find')
  .description('Print every file and directory whose path contains <name>')
  .argument('<archive>', 'Pack path, with or without the .index/.archive extension')
  .argument('<name>', 'Substring to search for')
  .action(async (archive: string, name: string) => {
    const { debug } = program.opts<GlobalOptions>();
    await withPack(archive, 'Find', async (fs) => {
      for (const node of fs.find(name)) {
        console.log(formatNode(node, debug));
      }
    });
  });

program
  .command('list')
  .description('List a directory (the root by default)')
  .argument('<archive>', 'Pack path, with or without the .index/.archive extension')
  .argument('[path]', 'Directory or file inside the pack', '')
  .action(async (archive: string, path: string) => {
    const { debug, recursive } = program.opts<GlobalOptions>();
    await withPack(archive, 'List', async (fs) => {
      const node: PackNode = fs.get(path);
      if (recursive || node.kind === 'file') {
        for (const item of fs.list(node, { recursive: true })) {
          console.log(formatNode(item, debug));
        }
      } else if (debug) {
        console.log(formatNode(node, true));
        for (const child of fs.list(node)) {
          console.log(formatNode(child, true));
        }
      } else {
        console.log(formatListing(node));
      }
    });
  });

program
  .command('extract')
  .description('Extract a directory or file, keeping its name as the top-level folder')
  .argument('<archive>', 'Pack path, with or without the .index/.archive extension')
  .argument('[path]', 'Directory or file inside the pack', '')
  .argument('[dest]', 'Destination directory', '.')
  .action(async (archive: string, path: string, dest: string) => {
    await withPack(archive, 'Extract', async (fs) => {
      const destination: string = resolve(dest);
      console.log(`Extracting ${path || '/'} to: ${destination}`);
      const summary = await fs.extract(fs.get(path), destination);
      console.log(formatExtractSummary(summary, destination));
    });
  });

program
  .command('diff')
  .description('Count removed, added and changed files per top-level directory')
  .argument('<archive>', 'Older pack')
  .argument('<other-archive>', 'Newer pack')
  .argument('[path]', 'Directory to compare below', '')
  .action(async (archive: string, otherArchive: string, path: string) => {
    await withPack(archive, 'Diff', async (fs) => {
      const other: Filesystem = await openPack(otherArchive);
      try {
        console.log(formatDiffReport(fs.diff(other, path)));
      } finally {
        await other.close();
      }
    });
  });

program
  .command('info')
  .description('Print header details of the index and archive files')
  .argument('<archive>', 'Pack path, with or without the .index/.archive extension')
  .action(async (archive: string) => {
    await withPack(archive, 'Info', async (fs) => {
      console.log(formatDetails(fs.describe()));
    });
  });

program
  .command('verify')
  .description('Check stored SHA-1 hashes of every file below a path')
  .argument('<archive>', 'Pack path, with or without the .index/.archive extension')
  .argument('[path]', 'Directory or file inside the pack', '')
  .action(async (archive: string, path: string) => {
    let mismatches = 0;
    await withPack(archive, 'Verify', async (fs) => {
      const node: PackNode = fs.get(path);
      const nodes: Iterable<PackNode> = node.kind === 'directory' ? walkNodes(node) : [node];
      let checked = 0;
      for (const item of nodes) {
        if (item.kind !== 'file') {
          continue;
        }
        checked += 1;
        if (!(await fs.verify(item))) {
          mismatches += 1;
          console.error(`Hash mismatch: ${item.path}`);
        }
      }
      console.log(`Verified ${checked} files, ${mismatches} mismatches`);
    });
    if (mismatches > 0) {
      process.exit(1);
    }
  });

await program.parseAsync();
