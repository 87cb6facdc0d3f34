/**
 * Types for version reference scanning and rewriting.
 */

/**
 * `'self'` refs declare the project's own version; `'interdependency'` refs pin
 * the version of a sibling project in the same repository.
 */
export type VersionRefKind = 'self' | 'interdependency';

/**
 * A located occurrence of a version string inside a file.
 *
 * Offsets are half-open and relative to the file content at scan time. They
 * become invalid as soon as the file is written.
 */
export interface VersionRef {
  file: string;
  start: number;
  end: number;
  value: string;
  content: string;
  kind: VersionRefKind;
}

/** `[start, end, replacement]` */
export type SubstRange = readonly [start: number, end: number, replacement: string];
