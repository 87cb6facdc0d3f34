import type { VersionRef, VersionRefKind } from '../../types/index.js';
import { InvalidPatternError, VersionRefNotFoundError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { splitLinesKeepEnds } from '../../utils/text.js';

export type { VersionRef, VersionRefKind } from '../../types/index.js';

function compile(pattern: string, file: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new InvalidPatternError(pattern, error instanceof Error ? error.message : String(error), file);
  }
}

/**
 * Number of capture groups in a compiled pattern. An alternation with the
 * empty string always matches, and every group shows up in the result.
 */
function countGroups(regex: RegExp): number {
  const probe = new RegExp(`${regex.source}|`, regex.flags.replace('g', ''));
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

function hasNamedGroup(regex: RegExp, name: string): boolean {
  const probe = new RegExp(`${regex.source}|`, regex.flags.replace('g', ''));
  const groups = probe.exec('')?.groups;
  return groups !== undefined && name in groups;
}

/**
 * Find the first match of `pattern` in `file`. The ref spans the first capture
 * group; `content` holds the whole match.
 *
 * Without a fallback a missing match raises {@link VersionRefNotFoundError};
 * with one, the fallback is returned instead.
 */
export async function matchVersionRefPattern(file: string, pattern: string): Promise<VersionRef>;
export async function matchVersionRefPattern<F>(file: string, pattern: string, fallback: F): Promise<VersionRef | F>;
export async function matchVersionRefPattern<F>(file: string, pattern: string, ...fallback: [] | [F]): Promise<VersionRef | F> {
  const regex = compile(pattern, file, 'msd');
  if (countGroups(regex) === 0) {
    throw new InvalidPatternError(pattern, 'pattern must contain at least one capturing group', file);
  }

  const text = await readTextFile(file);
  const match = regex.exec(text);
  const span = match?.indices?.[1];
  if (match && span && match[1] !== undefined) {
    return {
      file,
      start: span[0],
      end: span[1],
      value: match[1],
      content: match[0],
      kind: 'self'
    };
  }

  if (fallback.length === 1) {
    return fallback[0];
  }
  throw new VersionRefNotFoundError(pattern, file);
}

/**
 * Find every match of `pattern` in `file`, one line at a time. The pattern must
 * define a `version` group, which the refs span. Offsets are absolute: the
 * lengths of all preceding lines, terminators included, plus the offset within
 * the line.
 */
export async function matchVersionRefPatternOnLines(
  file: string,
  pattern: string,
  kind: VersionRefKind = 'self'
): Promise<VersionRef[]> {
  const regex = compile(pattern, file, 'msdg');
  if (!hasNamedGroup(regex, 'version')) {
    throw new InvalidPatternError(pattern, 'pattern must contain a named group "version"', file);
  }

  const text = await readTextFile(file);
  return scanLines(file, text, regex, kind);
}

/**
 * Line scan over already loaded text. `regex` must carry the `g` and `d` flags.
 */
export function scanLines(file: string, text: string, regex: RegExp, kind: VersionRefKind): VersionRef[] {
  const refs: VersionRef[] = [];
  let offset = 0;
  for (const line of splitLinesKeepEnds(text)) {
    const content = line.replace(/(\r\n|\r|\n)$/, '');
    for (const match of line.matchAll(regex)) {
      const span = match.indices?.groups?.version;
      const value = match.groups?.version;
      if (!span || value === undefined) {
        continue;
      }
      refs.push({ file, start: offset + span[0], end: offset + span[1], value, content, kind });
    }
    offset += line.length;
  }
  return refs;
}
