import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { cacheInfoCommand, clearCacheCommand } from '../../src/commands/cache.js';
import { FileSystemError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir, writeTree } from '../test-helpers.js';

describe('cache commands', () => {
  let dir: string;
  let cacheFile: string;
  let printed: string[];

  beforeEach(async () => {
    dir = await makeTempDir('cache-command');
    cacheFile = path.join(dir, 'verdicts.json');
    const timestamp = Date.now() / 1000;
    await writeTree(dir, {
      'verdicts.json': JSON.stringify({
        entries: {
          serde: { exists: true, message: '✓ rust-serde-devel', packages: ['rust-serde-devel'], timestamp },
          tokio: { exists: false, message: 'Not found in repositories', packages: [], timestamp }
        }
      })
    });
    printed = [];
    mock.method(console, 'log', (line: string) => {
      printed.push(line);
    });
  });

  afterEach(async () => {
    mock.restoreAll();
    await removeDir(dir);
  });

  it('info prints the cache location and entry count', async () => {
    const result = await cacheInfoCommand({ cacheFile });

    assert.deepEqual(result, { success: true, data: { path: cacheFile, entries: 2 } });
    assert.deepEqual(printed, [`Cache file: ${cacheFile}`, 'Entries:    2']);
  });

  it('clear empties the cache file', async () => {
    const result = await clearCacheCommand({ cacheFile });

    assert.equal(result.success, true);
    assert.deepEqual(printed, [`✓ Cache cleared: ${cacheFile}`]);
    assert.deepEqual(JSON.parse(await readFile(cacheFile, 'utf8')), { entries: {} });
  });

  it('clear fails when the cache file cannot be written', async () => {
    // A directory cannot be overwritten with the empty cache
    await assert.rejects(
      clearCacheCommand({ cacheFile: dir }),
      (error: unknown) => error instanceof FileSystemError
        && error.message === `File system error: Could not clear cache: ${dir}`
    );
    assert.deepEqual(printed, []);
  });
});
