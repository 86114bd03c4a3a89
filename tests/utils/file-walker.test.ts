import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { symlink } from 'node:fs/promises';
import path from 'node:path';

import { createExcludeFilter, walkFiles } from '../../src/utils/file-walker.js';
import { makeTempDir, removeDir, writeTree } from '../test-helpers.js';

describe('walkFiles', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('walk');
    await writeTree(root, {
      'Cargo.toml': '',
      'crates/a/Cargo.toml': '',
      'vendor/dep/Cargo.toml': '',
      '.cargo/config.toml': ''
    });
    await symlink(path.join(root, 'crates'), path.join(root, 'linked'), 'dir');
  });

  after(async () => {
    await removeDir(root);
  });

  async function collect(filter?: ReturnType<typeof createExcludeFilter>): Promise<string[]> {
    const found: string[] = [];
    for await (const filePath of walkFiles(root, { filter })) {
      found.push(path.relative(root, filePath).split(path.sep).join('/'));
    }
    return found.sort();
  }

  it('yields every file, dot directories included, without following symlinks', async () => {
    assert.deepEqual(await collect(), [
      '.cargo/config.toml',
      'Cargo.toml',
      'crates/a/Cargo.toml',
      'vendor/dep/Cargo.toml'
    ]);
  });

  it('prunes directories matched by an exclude glob', async () => {
    assert.deepEqual(await collect(createExcludeFilter(root, ['vendor/**', '.cargo'])), [
      'Cargo.toml',
      'crates/a/Cargo.toml'
    ]);
  });

  it('has no filter when there is nothing to exclude', () => {
    assert.equal(createExcludeFilter(root, []), undefined);
  });
});
