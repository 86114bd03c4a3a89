import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { formatProgressLine, resolveScope } from '../../src/commands/check.js';

describe('resolveScope', () => {
  it('defaults to the root manifest', () => {
    assert.equal(resolveScope({}), 'root');
  });

  it('maps --all-deps to the lockfile', () => {
    assert.equal(resolveScope({ allDeps: true }), 'lockfile');
  });

  it('lets --all-crates win over --all-deps', () => {
    assert.equal(resolveScope({ allCrates: true }), 'workspace');
    assert.equal(resolveScope({ allCrates: true, allDeps: true }), 'workspace');
  });
});

describe('formatProgressLine', () => {
  it('shows the providing package for a packaged crate', () => {
    const line = formatProgressLine({
      index: 3,
      total: 12,
      name: 'serde',
      version: '1.0.210',
      verdict: { exists: true, message: '✓ rust-serde-devel', packages: ['rust-serde-devel'] }
    });
    assert.equal(line, `[3/12] Checking ${'serde'.padEnd(40)} ✓ rust-serde-devel`);
  });

  it('marks timeouts and misses alike as missing', () => {
    const line = formatProgressLine({
      index: 1,
      total: 1,
      name: 'slow',
      version: 'unknown',
      verdict: { exists: false, message: 'Timeout while querying repositories (rust(slow) after 10000ms)', packages: [] }
    });
    assert.equal(line, `[1/1] Checking ${'slow'.padEnd(40)} ✗ MISSING`);
  });
});
