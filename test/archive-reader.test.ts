import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArchiveReader } from '../src/archive-reader.js';
import { CorruptArchiveError, IoFailureError, TruncatedDataError, UnrecognizedFormatError } from '../src/errors.js';
import type { DirectoryNode, FileNode } from '../src/types/node.js';
import { FLOAT_TEXT_TOC, buildArchive, sampleTree, sha1, writePack, zeroLzmaPayload } from './fixtures/pack-writer.js';
import type { FixtureDirectory } from './fixtures/pack-writer.js';
import { fileAt, treeFromFile } from './helpers.js';

const BROKEN_TREE: FixtureDirectory = {
  name: '',
  files: [
    { name: 'Wrong.txt', data: Buffer.from('abc'), hash: sha1(Buffer.from('xyz')) },
    { name: 'Oversize.txt', data: Buffer.from('short'), uncompressedSize: 100 },
    { name: 'BadSize.xml', data: Buffer.from('hello world'), compression: 3, uncompressedSize: 99 },
    { name: 'Garbage.bin', data: Buffer.from('garbage-source'), compression: 3, payload: Buffer.from('not zlib data') },
    { name: 'Odd.bin', data: Buffer.from('odd'), compression: 7 },
    { name: 'Bomb.bin', data: Buffer.alloc(1_000_000, 0x41), compression: 3, uncompressedSize: 16 },
    { name: 'BadLzma.bin', data: Buffer.alloc(64), compression: 5, payload: zeroLzmaPayload(5) },
  ],
};

describe('ArchiveReader', () => {
  let workDir: string;
  let sample: { root: DirectoryNode; reader: ArchiveReader };
  let broken: { root: DirectoryNode; reader: ArchiveReader };
  let sampleBase: string;

  before(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'archive-reader-'));
    sampleBase = await writePack(workDir, 'sample', sampleTree());
    sample = {
      root: await treeFromFile(`${sampleBase}.index`),
      reader: await ArchiveReader.open({ filePath: `${sampleBase}.archive` }),
    };
    const brokenBase: string = await writePack(workDir, 'broken', BROKEN_TREE);
    broken = {
      root: await treeFromFile(`${brokenBase}.index`),
      reader: await ArchiveReader.open({ filePath: `${brokenBase}.archive` }),
    };
  });

  after(async () => {
    await sample.reader.close();
    await broken.reader.close();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should load one entry per distinct payload', () => {
    assert.equal(sample.reader.entryCount, 9);
    assert.equal(sample.reader.rootBlock.magic, 'CRAA');
    assert.equal(sample.reader.rootBlock.first, 9);
  });

  it('should read a stored payload', async () => {
    assert.deepEqual(await sample.reader.read(fileAt(sample.root, 'Readme.txt')), Buffer.from('patch notes\n'));
  });

  it('should inflate a zlib payload', async () => {
    assert.deepEqual(await sample.reader.read(fileAt(sample.root, 'UI/FloatText/toc.xml')), FLOAT_TEXT_TOC);
  });

  it('should decode an lzma payload', async () => {
    assert.deepEqual(await sample.reader.read(fileAt(sample.root, 'DB/Spells.tbl')), Buffer.alloc(16));
  });

  it('should verify stored hashes', async () => {
    assert.equal(await sample.reader.verify(fileAt(sample.root, 'UI/FloatText/FloatTextPanel.xml')), true);
    assert.equal(await sample.reader.verify(fileAt(sample.root, 'DB/Spells.tbl')), true);
    assert.equal(await broken.reader.verify(fileAt(broken.root, 'Wrong.txt')), false);
  });

  it('should fail with IoFailureError when the archive has no payload for a hash', async () => {
    const readme: FileNode = fileAt(sample.root, 'Readme.txt');
    const orphan: FileNode = { ...readme, hash: sha1(Buffer.from('not in the archive')) };
    await assert.rejects(sample.reader.read(orphan), IoFailureError);
  });

  it('should fail with IoFailureError when a block is shorter than the declared size', async () => {
    await assert.rejects(broken.reader.read(fileAt(broken.root, 'Oversize.txt')), IoFailureError);
  });

  it('should reject a payload that decodes to the wrong size', async () => {
    await assert.rejects(
      broken.reader.read(fileAt(broken.root, 'BadSize.xml')),
      (error: unknown) => error instanceof CorruptArchiveError && error.message === 'Decoded 11 bytes for BadSize.xml, expected 99'
    );
  });

  it('should reject a payload that does not inflate', async () => {
    await assert.rejects(broken.reader.read(fileAt(broken.root, 'Garbage.bin')), CorruptArchiveError);
  });

  it('should stop inflating once the output passes the declared size', async () => {
    await assert.rejects(
      broken.reader.read(fileAt(broken.root, 'Bomb.bin')),
      (error: unknown) => error instanceof CorruptArchiveError && error.message.startsWith('Failed to inflate Bomb.bin:')
    );
  });

  it('should reject an unknown compression code', async () => {
    await assert.rejects(broken.reader.read(fileAt(broken.root, 'Odd.bin')), /Unsupported compression type 7 for Odd.bin/);
  });

  it('should reject a truncated lzma payload', async () => {
    await assert.rejects(broken.reader.read(fileAt(broken.root, 'BadLzma.bin')), CorruptArchiveError);
  });

  it('should keep serving reads after a failed read', async () => {
    await assert.rejects(broken.reader.read(fileAt(broken.root, 'Odd.bin')), CorruptArchiveError);
    assert.deepEqual(await sample.reader.read(fileAt(sample.root, 'DB/Items.tbl')), Buffer.from('ITEMS-TABLE-V1'));
    assert.deepEqual(await broken.reader.read(fileAt(broken.root, 'Wrong.txt')), Buffer.from('abc'));
  });

  it('should refuse to open an index file', async () => {
    await assert.rejects(ArchiveReader.open({ filePath: `${sampleBase}.index` }), UnrecognizedFormatError);
  });

  it('should fail with IoFailureError for a missing file', async () => {
    await assert.rejects(ArchiveReader.open({ filePath: join(workDir, 'missing.archive') }), IoFailureError);
  });

  it('should fail with TruncatedDataError for a file shorter than the header', async () => {
    const path: string = join(workDir, 'short.archive');
    await writeFile(path, buildArchive(sampleTree()).subarray(0, 100));
    await assert.rejects(ArchiveReader.open({ filePath: path }), TruncatedDataError);
  });
});
