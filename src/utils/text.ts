import type { SubstRange } from '../types/index.js';
import { InvalidRangeError, OverlapError } from './errors.js';

/**
 * Replace the `[start, end)` spans of `text` with the given replacements.
 *
 * Ranges must not overlap once sorted by start offset; a range starting
 * exactly where the previous one ended is allowed, and `start === end`
 * inserts without removing anything. The input is never mutated.
 */
export function substituteRanges(text: string, ranges: readonly SubstRange[], isSorted: boolean = false): string {
  // Array.prototype.sort is stable, so equal starts keep their input order
  const ordered = isSorted ? ranges : [...ranges].sort((a, b) => a[0] - b[0]);

  let result = '';
  let cursor = 0;
  ordered.forEach((range, index) => {
    const [start, end, replacement] = range;
    if (end < start || start < 0) {
      throw new InvalidRangeError(index, range);
    }
    if (start < cursor) {
      throw new OverlapError(index, ordered[index - 1], range);
    }
    result += text.slice(cursor, start) + replacement;
    cursor = end;
  });

  return result + text.slice(cursor);
}

/**
 * Escape a string for literal use inside a regular expression
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\\-]/g, '\\$&');
}

/**
 * Split text into lines while keeping each line's terminator attached.
 */
export function splitLinesKeepEnds(text: string): string[] {
  const lines = text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g);
  return lines ?? [];
}
