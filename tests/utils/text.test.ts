import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { escapeRegExp, splitLinesKeepEnds, substituteRanges } from '../../src/utils/text.js';
import { InvalidRangeError, OverlapError } from '../../src/utils/errors.js';
import type { SubstRange } from '../../src/types/index.js';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

describe('substituteRanges', () => {
  it('replaces each range', () => {
    const ranges: SubstRange[] = [[1, 4, 'SPAM'], [10, 11, 'EGGS']];
    assert.equal(substituteRanges(ALPHABET, ranges), 'aSPAMefghijEGGSlmnopqrstuvwxyz');
  });

  it('sorts unsorted ranges first', () => {
    const ranges: SubstRange[] = [[10, 11, 'EGGS'], [1, 4, 'SPAM']];
    assert.equal(substituteRanges(ALPHABET, ranges), 'aSPAMefghijEGGSlmnopqrstuvwxyz');
  });

  it('does not mutate the given ranges', () => {
    const ranges: SubstRange[] = [[10, 11, 'EGGS'], [1, 4, 'SPAM']];
    substituteRanges(ALPHABET, ranges);
    assert.deepEqual(ranges, [[10, 11, 'EGGS'], [1, 4, 'SPAM']]);
  });

  it('accepts adjacent ranges', () => {
    assert.equal(substituteRanges('abcdef', [[1, 3, 'X'], [3, 5, 'Y']]), 'aXYf');
  });

  it('inserts for empty ranges', () => {
    assert.equal(substituteRanges('ab', [[0, 0, '>']]), '>ab');
  });

  it('returns the text unchanged without ranges', () => {
    assert.equal(substituteRanges('abc', []), 'abc');
  });

  it('rejects overlapping ranges with the index of the later one', () => {
    assert.throws(
      () => substituteRanges(ALPHABET, [[1, 4, 'x'], [3, 5, 'y']]),
      (error: unknown) => error instanceof OverlapError && error.index === 1
    );
  });

  it('rejects ranges that end before they start', () => {
    assert.throws(
      () => substituteRanges(ALPHABET, [[5, 2, 'x']]),
      (error: unknown) => error instanceof InvalidRangeError && error.index === 0
    );
  });
});

describe('escapeRegExp', () => {
  it('escapes regular expression syntax', () => {
    const name = 'my.package-name+1';
    assert.ok(new RegExp(`^${escapeRegExp(name)}$`).test(name));
    assert.ok(!new RegExp(`^${escapeRegExp(name)}$`).test('myXpackage-name+1'));
  });
});

describe('splitLinesKeepEnds', () => {
  it('keeps terminators attached', () => {
    assert.deepEqual(splitLinesKeepEnds('a\nb\r\nc'), ['a\n', 'b\r\n', 'c']);
  });

  it('returns no lines for empty text', () => {
    assert.deepEqual(splitLinesKeepEnds(''), []);
  });
});
