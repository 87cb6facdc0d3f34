import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  compareVersions,
  formatVersion,
  isValidVersion,
  nextMajor,
  nextMinor,
  nextPatch,
  nextPost,
  nextPrerelease,
  normalizeVersion,
  parseVersion
} from '../../src/utils/pep440.js';
import { InvalidVersionError } from '../../src/utils/errors.js';

function bump(rule: typeof nextMajor, version: string): string {
  return formatVersion(rule(parseVersion(version)));
}

describe('pep440 parsing', () => {
  it('normalizes spelled out segments', () => {
    assert.equal(normalizeVersion('1.0.0-alpha.1'), '1.0.0a1');
    assert.equal(normalizeVersion('v2.1.0.RC2'), '2.1.0rc2');
    assert.equal(normalizeVersion('1.0-post'), '1.0.post0');
    assert.equal(normalizeVersion('1.0.0-3'), '1.0.0.post3');
    assert.equal(normalizeVersion('1.0.dev'), '1.0.dev0');
    assert.equal(normalizeVersion('1!2.0+Ubuntu-1'), '1!2.0+ubuntu.1');
  });

  it('rejects garbage', () => {
    assert.equal(isValidVersion('not-a-version'), false);
    assert.throws(() => parseVersion('1.0.0.x'), InvalidVersionError);
  });
});

describe('pep440 ordering', () => {
  const ordered = ['1.0.dev0', '1.0a1', '1.0b2', '1.0rc1', '1.0', '1.0.post1', '1.1', '1!0.1'];

  it('orders pre, post and dev releases', () => {
    for (let i = 0; i < ordered.length - 1; i++) {
      const result = compareVersions(parseVersion(ordered[i]), parseVersion(ordered[i + 1]));
      assert.equal(result, -1, `${ordered[i]} < ${ordered[i + 1]}`);
    }
  });

  it('ignores trailing zeros', () => {
    assert.equal(compareVersions(parseVersion('1.0'), parseVersion('1.0.0')), 0);
  });
});

describe('pep440 increments', () => {
  it('bumps final releases', () => {
    assert.equal(bump(nextMajor, '1.2.3'), '2.0.0');
    assert.equal(bump(nextMinor, '1.2.3'), '1.3.0');
    assert.equal(bump(nextPatch, '1.2.3'), '1.2.4');
  });

  it('finalizes matching pre-releases', () => {
    assert.equal(bump(nextMajor, '2.0.0a1'), '2.0.0');
    assert.equal(bump(nextMinor, '1.3.0rc1'), '1.3.0');
    assert.equal(bump(nextPatch, '1.2.4b1'), '1.2.4');
    assert.equal(bump(nextMinor, '1.3.1a1'), '1.4.0');
  });

  it('starts and continues pre-releases', () => {
    assert.equal(bump(nextPrerelease, '1.2.3'), '1.2.4a0');
    assert.equal(bump(nextPrerelease, '1.2.4a0'), '1.2.4a1');
    assert.equal(bump(nextPrerelease, '1.2.4rc1'), '1.2.4rc2');
    assert.equal(bump(nextPrerelease, '1.2.4.dev3'), '1.2.4a0');
  });

  it('counts post releases', () => {
    assert.equal(bump(nextPost, '1.2.3'), '1.2.3.post0');
    assert.equal(bump(nextPost, '1.2.3.post0'), '1.2.3.post1');
  });
});
