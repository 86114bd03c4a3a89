import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { ExistenceCache } from '../../../src/core/cache/existence-cache.js';
import {
  ExistenceOracle,
  NOT_FOUND_MESSAGE,
  capabilitiesFor
} from '../../../src/core/oracle/existence-oracle.js';
import { FakeRepoQueryRunner, ManualClock, makeTempDir, provides, removeDir } from '../../test-helpers.js';

describe('capabilitiesFor', () => {
  it('tries the virtual provide before the devel package', () => {
    assert.deepEqual(capabilitiesFor('serde'), ['rust(serde)', 'rust-serde-devel']);
    assert.deepEqual(capabilitiesFor('serde', 'golang'), ['golang(serde)', 'golang-serde-devel']);
  });
});

describe('ExistenceOracle', () => {
  it('reports the first providing package and keeps every output line', async () => {
    const runner = new FakeRepoQueryRunner({
      'rust(serde)': provides('rust-serde-devel', 'rust-serde+derive-devel')
    });
    const oracle = new ExistenceOracle({ runner });

    const verdict = await oracle.check('serde');

    assert.deepEqual(verdict, {
      exists: true,
      message: '✓ rust-serde-devel',
      packages: ['rust-serde-devel', 'rust-serde+derive-devel']
    });
    assert.deepEqual(runner.calls, ['rust(serde)']);
  });

  it('falls back to the devel package name when the provide matches nothing', async () => {
    const runner = new FakeRepoQueryRunner({
      'rust(anyhow)': { kind: 'completed', exitCode: 0, stdout: '\n' },
      'rust-anyhow-devel': provides('rust-anyhow-devel')
    });
    const oracle = new ExistenceOracle({ runner });

    const verdict = await oracle.check('anyhow');

    assert.equal(verdict.exists, true);
    assert.deepEqual(runner.calls, ['rust(anyhow)', 'rust-anyhow-devel']);
  });

  it('reports not found after every capability misses', async () => {
    const runner = new FakeRepoQueryRunner();
    const oracle = new ExistenceOracle({ runner });

    assert.deepEqual(await oracle.check('left-pad'), {
      exists: false,
      message: NOT_FOUND_MESSAGE,
      packages: []
    });
    assert.deepEqual(runner.calls, ['rust(left-pad)', 'rust-left-pad-devel']);
  });

  it('stops at a timeout without trying further capabilities', async () => {
    const runner = new FakeRepoQueryRunner({
      'rust(slow)': { kind: 'timeout', timeoutMs: 250 }
    });
    const oracle = new ExistenceOracle({ runner, timeoutMs: 250 });

    const verdict = await oracle.check('slow');

    assert.deepEqual(verdict, {
      exists: false,
      message: 'Timeout while querying repositories (rust(slow) after 250ms)',
      packages: []
    });
    assert.deepEqual(runner.calls, ['rust(slow)']);
  });

  it('reports a failed query as an error verdict', async () => {
    const runner = new FakeRepoQueryRunner({
      'rust(serde)': { kind: 'failed', reason: 'spawn dnf ENOENT' }
    });
    const oracle = new ExistenceOracle({ runner });

    assert.deepEqual(await oracle.check('serde'), {
      exists: false,
      message: 'Error: spawn dnf ENOENT',
      packages: []
    });
  });

  it('memoises verdicts within a run', async () => {
    const runner = new FakeRepoQueryRunner({ 'rust(serde)': provides('rust-serde-devel') });
    const oracle = new ExistenceOracle({ runner });

    await oracle.check('serde');
    await oracle.check('serde');

    assert.deepEqual(runner.calls, ['rust(serde)']);
  });

  describe('with a persistent cache', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir('oracle');
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('reuses a cached timeout on the next run within the TTL', async () => {
      const cacheFile = path.join(dir, 'cache.json');
      const clock = new ManualClock(5_000);

      const firstRunner = new FakeRepoQueryRunner({
        'rust(slow)': { kind: 'timeout', timeoutMs: 10_000 }
      });
      const firstCache = await ExistenceCache.load(cacheFile, { ttlSeconds: 60, now: clock.now });
      await new ExistenceOracle({ runner: firstRunner, cache: firstCache }).check('slow');
      await firstCache.flush();

      clock.current = 5_030;
      const secondRunner = new FakeRepoQueryRunner();
      const secondCache = await ExistenceCache.load(cacheFile, { ttlSeconds: 60, now: clock.now });
      const verdict = await new ExistenceOracle({ runner: secondRunner, cache: secondCache }).check('slow');

      assert.equal(verdict.message, 'Timeout while querying repositories (rust(slow) after 10000ms)');
      assert.deepEqual(secondRunner.calls, []);
    });

    it('queries again once the cached verdict expires', async () => {
      const clock = new ManualClock(5_000);
      const cache = await ExistenceCache.load(path.join(dir, 'cache.json'), { ttlSeconds: 60, now: clock.now });
      cache.put('serde', { exists: false, message: NOT_FOUND_MESSAGE, packages: [] });

      clock.current = 5_061;
      const runner = new FakeRepoQueryRunner({ 'rust(serde)': provides('rust-serde-devel') });
      const verdict = await new ExistenceOracle({ runner, cache }).check('serde');

      assert.equal(verdict.exists, true);
      assert.deepEqual(runner.calls, ['rust(serde)']);
      assert.deepEqual(cache.get('serde'), verdict);
    });
  });
});
