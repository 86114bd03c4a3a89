import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { access, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { acquireSourceTree, type ArchiveExtractor } from '../../../src/core/source/source-tree.js';
import { ExtractionError, InputNotFoundError } from '../../../src/utils/errors.js';
import { makeTempDir, removeDir, writeTree } from '../../test-helpers.js';

async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

/** Writes a fixed tree instead of unpacking anything. */
class FakeExtractor implements ArchiveExtractor {
  destinations: string[] = [];

  constructor(private readonly files: Record<string, string>, private readonly failWith?: Error) {}

  async extract(_archivePath: string, destination: string): Promise<void> {
    this.destinations.push(destination);
    await writeTree(destination, this.files);
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

describe('acquireSourceTree', () => {
  let dir: string;
  let archive: string;

  beforeEach(async () => {
    dir = await makeTempDir('source');
    archive = path.join(dir, 'demo-1.2.3.tar.zstd');
    await writeFile(archive, 'placeholder', 'utf8');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('uses a source directory as-is', async () => {
    const tree = await acquireSourceTree({ sourceDir: dir });
    assert.equal(tree.root, dir);
    assert.equal(tree.tempDir, undefined);
    await tree.release();
    assert.equal(await pathExists(dir), true);
  });

  it('rejects a missing source directory', async () => {
    await assert.rejects(
      acquireSourceTree({ sourceDir: path.join(dir, 'nope') }),
      InputNotFoundError
    );
  });

  it('rejects a missing archive', async () => {
    await assert.rejects(
      acquireSourceTree({ archive: path.join(dir, 'nope.tar.gz') }),
      (error: unknown) => error instanceof InputNotFoundError
        && error.message === `Archive not found: ${path.join(dir, 'nope.tar.gz')}`
    );
  });

  it('roots the tree at a single wrapping directory and removes it on release', async () => {
    const extractor = new FakeExtractor({ 'demo-1.2.3/Cargo.toml': '[dependencies]\n' });
    const tree = await acquireSourceTree({ archive, extractor });

    assert.equal(tree.tempDir, extractor.destinations[0]);
    assert.equal(tree.root, path.join(extractor.destinations[0], 'demo-1.2.3'));

    await tree.release();
    assert.equal(await pathExists(extractor.destinations[0]), false);
    // Releasing twice is harmless
    await tree.release();
  });

  it('roots the tree at the temp directory when the archive has several top-level entries', async () => {
    const extractor = new FakeExtractor({ 'Cargo.toml': '[dependencies]\n', 'src/main.rs': '' });
    const tree = await acquireSourceTree({ archive, extractor });
    try {
      assert.equal(tree.root, tree.tempDir);
    } finally {
      await tree.release();
    }
  });

  it('keeps the extraction when asked to', async () => {
    const extractor = new FakeExtractor({ 'Cargo.toml': '' });
    const tree = await acquireSourceTree({ archive, extractor, keep: true });
    await tree.release();
    try {
      assert.equal(await pathExists(extractor.destinations[0]), true);
    } finally {
      await removeDir(extractor.destinations[0]);
    }
  });

  it('removes the temp directory when extraction fails', async () => {
    const extractor = new FakeExtractor(
      { 'partial/Cargo.toml': '' },
      new ExtractionError(archive, 'unexpected end of archive')
    );

    await assert.rejects(acquireSourceTree({ archive, extractor }), ExtractionError);
    assert.equal(await pathExists(extractor.destinations[0]), false);
  });

  it('registers cleanup for the lifetime of the extraction', async () => {
    const registered: Array<() => Promise<void>> = [];
    let unregistered = 0;
    const registerCleanup = (cleanup: () => Promise<void>): (() => void) => {
      registered.push(cleanup);
      return () => {
        unregistered++;
      };
    };

    const extractor = new FakeExtractor({ 'Cargo.toml': '' });
    const tree = await acquireSourceTree({ archive, extractor, registerCleanup });
    assert.equal(registered.length, 1);
    assert.equal(unregistered, 0);

    // An interrupt would run the registered cleanup
    await registered[0]();
    assert.equal(await pathExists(extractor.destinations[0]), false);
    assert.equal(unregistered, 1);

    await tree.release();
    assert.equal(unregistered, 1);
  });
});
