import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import { ExistenceCache } from '../../../src/core/cache/existence-cache.js';
import { ManualClock, makeTempDir, removeDir } from '../../test-helpers.js';

const FOUND = { exists: true, message: '✓ rust-serde-devel', packages: ['rust-serde-devel'] };

let dir: string;
let cacheFile: string;

beforeEach(async () => {
  dir = await makeTempDir('cache');
  cacheFile = path.join(dir, '.cache', 'verdicts.json');
});

afterEach(async () => {
  await removeDir(dir);
});

describe('ExistenceCache', () => {
  it('starts empty when no file exists', async () => {
    const cache = await ExistenceCache.load(cacheFile);
    assert.equal(cache.size, 0);
    assert.equal(cache.get('serde'), undefined);
  });

  it('honours the TTL boundary', async () => {
    const clock = new ManualClock(1_000_000);
    const cache = await ExistenceCache.load(cacheFile, { ttlSeconds: 100, now: clock.now });
    cache.put('serde', FOUND);

    clock.current = 1_000_000 + 99;
    assert.deepEqual(cache.get('serde'), FOUND);

    clock.current = 1_000_000 + 101;
    assert.equal(cache.get('serde'), undefined);
    // Expired entries are kept until overwritten
    assert.equal(cache.size, 1);
  });

  it('round-trips entries through flush and load', async () => {
    const clock = new ManualClock(1_700_000_000);
    const cache = await ExistenceCache.load(cacheFile, { now: clock.now });
    cache.put('serde', FOUND);
    cache.put('tokio', { exists: false, message: 'Not found in repositories', packages: [] });
    assert.equal(await cache.flush(), true);

    const persisted = JSON.parse(await readFile(cacheFile, 'utf8'));
    assert.deepEqual(persisted, {
      entries: {
        serde: { ...FOUND, timestamp: 1_700_000_000 },
        tokio: { exists: false, message: 'Not found in repositories', packages: [], timestamp: 1_700_000_000 }
      }
    });

    const reloaded = await ExistenceCache.load(cacheFile, { now: clock.now });
    assert.deepEqual(reloaded.get('tokio'), { exists: false, message: 'Not found in repositories', packages: [] });
  });

  it('treats malformed or legacy documents as empty', async () => {
    await mkdir(path.dirname(cacheFile), { recursive: true });

    await writeFile(cacheFile, '{ not json', 'utf8');
    assert.equal((await ExistenceCache.load(cacheFile)).size, 0);

    await writeFile(cacheFile, JSON.stringify({ serde: { exists: true } }), 'utf8');
    assert.equal((await ExistenceCache.load(cacheFile)).size, 0);

    await writeFile(cacheFile, JSON.stringify([1, 2, 3]), 'utf8');
    assert.equal((await ExistenceCache.load(cacheFile)).size, 0);
  });

  it('ignores individual entries with the wrong shape', async () => {
    await mkdir(path.dirname(cacheFile), { recursive: true });
    const now = Date.now() / 1000;
    await writeFile(cacheFile, JSON.stringify({
      entries: {
        serde: { ...FOUND, timestamp: now },
        broken: { exists: 'yes', message: 1, packages: 'none', timestamp: now }
      }
    }), 'utf8');

    const cache = await ExistenceCache.load(cacheFile);
    assert.equal(cache.size, 1);
    assert.deepEqual(cache.get('serde'), FOUND);
    assert.equal(cache.get('broken'), undefined);
  });

  it('clear discards entries and persists the empty store', async () => {
    const cache = await ExistenceCache.load(cacheFile);
    cache.put('serde', FOUND);
    await cache.flush();

    assert.equal(await cache.clear(), true);
    assert.equal(cache.size, 0);
    assert.deepEqual(JSON.parse(await readFile(cacheFile, 'utf8')), { entries: {} });
  });

  it('reports a failed write without throwing', async () => {
    // The cache path is a directory, so writing the file fails
    await mkdir(cacheFile, { recursive: true });
    const cache = await ExistenceCache.load(path.join(dir, '.cache'));
    cache.put('serde', FOUND);
    assert.equal(await cache.flush(), false);
  });
});
