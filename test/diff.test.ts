import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { diffNamespaces, isEmptyDiff } from '../src/diff.js';
import type { DiffCounts } from '../src/types/diff-report.js';
import { sampleTree, updateDirectory } from './fixtures/pack-writer.js';
import type { FixtureDirectory } from './fixtures/pack-writer.js';
import { treeOf } from './helpers.js';

const NONE: DiffCounts = { removed: 0, added: 0, changed: 0 };

function withFile(directory: FixtureDirectory, name: string, data: Buffer): FixtureDirectory {
  return {
    ...directory,
    files: (directory.files ?? []).map((file) => (file.name === name ? { name, data } : file)),
  };
}

describe('diffNamespaces', () => {
  it('should report zeros for every top-level name of identical trees', () => {
    const report = diffNamespaces(treeOf(sampleTree()), treeOf(sampleTree()));
    assert.deepEqual([...report.keys()], ['UI', 'DB', 'Readme.txt']);
    for (const counts of report.values()) {
      assert.deepEqual(counts, NONE);
    }
    assert.equal(isEmptyDiff(report), true);
  });

  it('should count a file whose size changed', () => {
    const after = updateDirectory(sampleTree(), ['UI', 'Chat'], (chat) =>
      withFile(chat, 'Chat.lua', Buffer.from('local Chat = {}\nreturn Chat\n'))
    );
    const report = diffNamespaces(treeOf(sampleTree()), treeOf(after));
    assert.deepEqual(report.get('UI'), { removed: 0, added: 0, changed: 1 });
    assert.deepEqual(report.get('DB'), NONE);
    assert.equal(isEmptyDiff(report), false);
  });

  it('should count a file whose hash changed at the same size', () => {
    const after = updateDirectory(sampleTree(), ['DB'], (db) => withFile(db, 'Items.tbl', Buffer.from('ITEMS-TABLE-V2')));
    assert.deepEqual(diffNamespaces(treeOf(sampleTree()), treeOf(after)).get('DB'), { removed: 0, added: 0, changed: 1 });
  });

  it('should count every file of an added directory', () => {
    const after = updateDirectory(sampleTree(), [], (root) => ({
      ...root,
      directories: [
        ...(root.directories ?? []),
        {
          name: 'Audio',
          files: [
            { name: 'Theme.wem', data: Buffer.from('theme') },
            { name: 'Click.wem', data: Buffer.from('click') },
          ],
        },
      ],
    }));
    const report = diffNamespaces(treeOf(sampleTree()), treeOf(after));
    assert.deepEqual([...report.keys()], ['UI', 'DB', 'Readme.txt', 'Audio']);
    assert.deepEqual(report.get('Audio'), { removed: 0, added: 2, changed: 0 });
  });

  it('should count the files of a removed directory', () => {
    const after = updateDirectory(sampleTree(), ['UI'], (ui) => ({
      ...ui,
      directories: (ui.directories ?? []).filter((child) => child.name !== 'Chat'),
    }));
    assert.deepEqual(diffNamespaces(treeOf(sampleTree()), treeOf(after)).get('UI'), { removed: 1, added: 0, changed: 0 });
  });

  it('should count a directory replaced by a file as one removal and one addition', () => {
    const after = updateDirectory(sampleTree(), [], (root) => ({
      ...root,
      directories: (root.directories ?? []).filter((child) => child.name !== 'DB'),
      files: [...(root.files ?? []), { name: 'DB', data: Buffer.from('flattened') }],
    }));
    assert.deepEqual(diffNamespaces(treeOf(sampleTree()), treeOf(after)).get('DB'), { removed: 1, added: 1, changed: 0 });
  });

  it('should treat a missing tree as empty', () => {
    const report = diffNamespaces(null, treeOf(sampleTree()));
    assert.deepEqual(report.get('UI'), { removed: 0, added: 6, changed: 0 });
    assert.deepEqual(report.get('DB'), { removed: 0, added: 2, changed: 0 });
    assert.deepEqual(report.get('Readme.txt'), { removed: 0, added: 1, changed: 0 });

    const reverse = diffNamespaces(treeOf(sampleTree()), null);
    assert.deepEqual(reverse.get('UI'), { removed: 6, added: 0, changed: 0 });
  });

  it('should report nothing for two missing trees', () => {
    const report = diffNamespaces(null, null);
    assert.equal(report.size, 0);
    assert.equal(isEmptyDiff(report), true);
  });
});
