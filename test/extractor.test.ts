import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArchiveReader } from '../src/archive-reader.js';
import { extractNode } from '../src/extractor.js';
import type { PayloadSource } from '../src/extractor.js';
import { IoFailureError } from '../src/errors.js';
import { walkNodes } from '../src/path-resolver.js';
import type { DirectoryNode, PackNode } from '../src/types/node.js';
import { FLOAT_TEXT_TOC, sampleTree, writePack } from './fixtures/pack-writer.js';
import { directoryAt, fileAt, treeFromFile } from './helpers.js';

function bytesBelow(node: PackNode): number {
  if (node.kind === 'file') {
    return node.uncompressedSize;
  }
  let total = 0;
  for (const child of walkNodes(node)) {
    total += child.kind === 'file' ? child.uncompressedSize : 0;
  }
  return total;
}

describe('extractNode', () => {
  let workDir: string;
  let root: DirectoryNode;
  let reader: ArchiveReader;

  before(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'extractor-'));
    const basePath: string = await writePack(join(workDir, 'pack'), 'sample', sampleTree());
    root = await treeFromFile(`${basePath}.index`);
    reader = await ArchiveReader.open({ filePath: `${basePath}.archive` });
  });

  after(async () => {
    await reader.close();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should keep the directory name as the top-level folder', async () => {
    const dest: string = join(workDir, 'floattext');
    const floatText: DirectoryNode = directoryAt(root, 'UI/FloatText');
    const summary = await extractNode(floatText, dest, reader);

    assert.deepEqual(summary, { directories: 1, files: 5, bytes: bytesBelow(floatText) });
    assert.deepEqual((await readdir(dest)).sort(), ['FloatText']);
    assert.deepEqual(await readFile(join(dest, 'FloatText', 'toc.xml')), FLOAT_TEXT_TOC);
    assert.deepEqual((await readdir(join(dest, 'FloatText'))).sort(), [
      'FloatText.lua',
      'FloatTextPanel.lua',
      'FloatTextPanel.xml',
      'TestFloatTextForms.xml',
      'toc.xml',
    ]);
  });

  it('should overwrite an earlier extraction', async () => {
    const dest: string = join(workDir, 'twice');
    const chat: DirectoryNode = directoryAt(root, 'UI/Chat');
    await extractNode(chat, dest, reader);
    const summary = await extractNode(chat, dest, reader);

    assert.deepEqual(summary, { directories: 1, files: 1, bytes: 16 });
    assert.equal(await readFile(join(dest, 'Chat', 'Chat.lua'), 'utf8'), 'local Chat = {}\n');
  });

  it('should extract the root onto the destination itself, empty directories included', async () => {
    const dest: string = join(workDir, 'everything');
    const summary = await extractNode(root, dest, reader);

    assert.deepEqual(summary, { directories: 6, files: 9, bytes: bytesBelow(root) });
    assert.deepEqual((await readdir(dest)).sort(), ['DB', 'Readme.txt', 'UI']);
    assert.ok((await stat(join(dest, 'UI', 'Empty'))).isDirectory());
    assert.deepEqual(await readFile(join(dest, 'DB', 'Spells.tbl')), Buffer.alloc(16));
  });

  it('should extract a single file by its name', async () => {
    const dest: string = join(workDir, 'single');
    const summary = await extractNode(fileAt(root, 'UI/Chat/Chat.lua'), dest, reader);

    assert.deepEqual(summary, { directories: 0, files: 1, bytes: 16 });
    assert.deepEqual(await readdir(dest), ['Chat.lua']);
  });

  it('should fail with IoFailureError when the destination cannot be created', async () => {
    const blocker: string = join(workDir, 'blocker');
    await writeFile(blocker, 'not a directory');
    await assert.rejects(extractNode(directoryAt(root, 'DB'), join(blocker, 'sub'), reader), IoFailureError);
  });

  it('should propagate payload read failures', async () => {
    const failing: PayloadSource = {
      read: async () => {
        throw new IoFailureError('disk went away');
      },
    };
    await assert.rejects(extractNode(directoryAt(root, 'DB'), join(workDir, 'failing'), failing), /disk went away/);
  });
});
