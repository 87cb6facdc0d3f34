import { InvalidVersionError } from './errors.js';

/**
 * PEP 440 version parsing, normalization and ordering.
 */

export type PrePhase = 'a' | 'b' | 'rc';

export interface Pep440Version {
  epoch: number;
  release: number[];
  pre?: { phase: PrePhase; number: number };
  post?: number;
  dev?: number;
  local?: string;
}

const VERSION_PATTERN = new RegExp(
  '^\\s*v?' +
  '(?:(?<epoch>[0-9]+)!)?' +
  '(?<release>[0-9]+(?:\\.[0-9]+)*)' +
  '(?:[-_.]?(?<prePhase>alpha|beta|preview|pre|rc|a|b|c)[-_.]?(?<preNumber>[0-9]+)?)?' +
  '(?:-(?<postImplicit>[0-9]+)|[-_.]?(?:post|rev|r)[-_.]?(?<postNumber>[0-9]+)?(?<postMarker>))?' +
  '(?:[-_.]?(?<devMarker>dev)[-_.]?(?<devNumber>[0-9]+)?)?' +
  '(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?' +
  '\\s*$',
  'i'
);

// `(?<postMarker>)` is an empty group; it participates only when the spelled-out post
// alternative matched, which distinguishes `1.0.post` from `1.0`.

function normalizePhase(phase: string): PrePhase {
  switch (phase.toLowerCase()) {
    case 'a':
    case 'alpha':
      return 'a';
    case 'b':
    case 'beta':
      return 'b';
    default:
      return 'rc';
  }
}

export function tryParseVersion(value: string): Pep440Version | null {
  const match = VERSION_PATTERN.exec(value);
  const groups = match?.groups;
  if (!groups) {
    return null;
  }

  const version: Pep440Version = {
    epoch: groups.epoch ? parseInt(groups.epoch, 10) : 0,
    release: groups.release.split('.').map(part => parseInt(part, 10))
  };
  if (groups.prePhase) {
    version.pre = { phase: normalizePhase(groups.prePhase), number: parseInt(groups.preNumber ?? '0', 10) };
  }
  if (groups.postImplicit !== undefined) {
    version.post = parseInt(groups.postImplicit, 10);
  } else if (groups.postMarker !== undefined) {
    version.post = parseInt(groups.postNumber ?? '0', 10);
  }
  if (groups.devMarker) {
    version.dev = parseInt(groups.devNumber ?? '0', 10);
  }
  if (groups.local) {
    version.local = groups.local.toLowerCase().replace(/[-_]/g, '.');
  }
  return version;
}

export function parseVersion(value: string): Pep440Version {
  const version = tryParseVersion(value);
  if (!version) {
    throw new InvalidVersionError(value);
  }
  return version;
}

export function isValidVersion(value: string): boolean {
  return tryParseVersion(value) !== null;
}

/**
 * Render a version in its normalized form, e.g. `1.0.0-alpha.1` → `1.0.0a1`.
 */
export function formatVersion(version: Pep440Version): string {
  let result = version.epoch ? `${version.epoch}!` : '';
  result += version.release.join('.');
  if (version.pre) {
    result += `${version.pre.phase}${version.pre.number}`;
  }
  if (version.post !== undefined) {
    result += `.post${version.post}`;
  }
  if (version.dev !== undefined) {
    result += `.dev${version.dev}`;
  }
  if (version.local) {
    result += `+${version.local}`;
  }
  return result;
}

export function normalizeVersion(value: string): string {
  return formatVersion(parseVersion(value));
}

/**
 * The public version without pre, post, dev and local segments.
 */
export function baseVersion(version: Pep440Version): Pep440Version {
  return { epoch: version.epoch, release: [...version.release] };
}

export function isPrerelease(version: Pep440Version): boolean {
  return version.pre !== undefined || version.dev !== undefined;
}

const PHASE_ORDER: Record<PrePhase, number> = { a: 0, b: 1, rc: 2 };

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareRelease(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareNumbers(a[i] ?? 0, b[i] ?? 0);
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

function preKey(version: Pep440Version): number[] {
  if (version.pre) {
    return [PHASE_ORDER[version.pre.phase], version.pre.number];
  }
  // A dev release without a pre segment sorts before every pre-release
  if (version.dev !== undefined && version.post === undefined) {
    return [-1, 0];
  }
  return [3, 0];
}

function compareLocal(a: string | undefined, b: string | undefined): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined) {
    return -1;
  }
  if (b === undefined) {
    return 1;
  }
  const left = a.split('.');
  const right = b.split('.');
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    if (left[i] === undefined) {
      return -1;
    }
    if (right[i] === undefined) {
      return 1;
    }
    const leftNumeric = /^\d+$/.test(left[i]);
    const rightNumeric = /^\d+$/.test(right[i]);
    let result: number;
    if (leftNumeric && rightNumeric) {
      result = compareNumbers(parseInt(left[i], 10), parseInt(right[i], 10));
    } else if (leftNumeric !== rightNumeric) {
      result = leftNumeric ? 1 : -1;
    } else {
      result = left[i] < right[i] ? -1 : left[i] > right[i] ? 1 : 0;
    }
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

export function compareVersions(a: Pep440Version, b: Pep440Version): number {
  const checks = [
    () => compareNumbers(a.epoch, b.epoch),
    () => compareRelease(a.release, b.release),
    () => compareRelease(preKey(a), preKey(b)),
    () => compareNumbers(a.post ?? -1, b.post ?? -1),
    () => compareNumbers(a.dev ?? Number.POSITIVE_INFINITY, b.dev ?? Number.POSITIVE_INFINITY),
    () => compareLocal(a.local, b.local)
  ];
  for (const check of checks) {
    const result = check();
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

// --- Increment helpers -------------------------------------------------------

function releaseTriple(version: Pep440Version): [number, number, number] {
  const [major = 0, minor = 0, patch = 0] = version.release;
  return [major, minor, patch];
}

function withRelease(version: Pep440Version, release: number[]): Pep440Version {
  return { epoch: version.epoch, release };
}

export function nextMajor(version: Pep440Version): Pep440Version {
  const [major, minor, patch] = releaseTriple(version);
  // 2.0.0a1 -> 2.0.0
  if (isPrerelease(version) && minor === 0 && patch === 0) {
    return withRelease(version, [major, 0, 0]);
  }
  return withRelease(version, [major + 1, 0, 0]);
}

export function nextMinor(version: Pep440Version): Pep440Version {
  const [major, minor, patch] = releaseTriple(version);
  if (isPrerelease(version) && patch === 0) {
    return withRelease(version, [major, minor, 0]);
  }
  return withRelease(version, [major, minor + 1, 0]);
}

export function nextPatch(version: Pep440Version): Pep440Version {
  const [major, minor, patch] = releaseTriple(version);
  if (isPrerelease(version)) {
    return withRelease(version, [major, minor, patch]);
  }
  return withRelease(version, [major, minor, patch + 1]);
}

export function firstPrerelease(version: Pep440Version): Pep440Version {
  return { epoch: version.epoch, release: [...version.release], pre: { phase: 'a', number: 0 } };
}

export function nextPrerelease(version: Pep440Version): Pep440Version {
  if (version.pre) {
    return {
      epoch: version.epoch,
      release: [...version.release],
      pre: { phase: version.pre.phase, number: version.pre.number + 1 }
    };
  }
  if (version.dev !== undefined) {
    return firstPrerelease(version);
  }
  return firstPrerelease(nextPatch(version));
}

export function nextPost(version: Pep440Version): Pep440Version {
  return {
    epoch: version.epoch,
    release: [...version.release],
    pre: version.pre ? { ...version.pre } : undefined,
    post: version.post === undefined ? 0 : version.post + 1
  };
}
