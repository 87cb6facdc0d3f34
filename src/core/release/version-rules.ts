import { InvalidVersionError, VcsError } from '../../utils/errors.js';
import type { Vcs } from '../../utils/git.js';
import {
  Pep440Version,
  firstPrerelease,
  formatVersion,
  nextMajor,
  nextMinor,
  nextPatch,
  nextPost,
  nextPrerelease,
  parseVersion
} from '../../utils/pep440.js';
import { getCiVersion } from './ci-version.js';

export interface VersionRuleContext {
  vcs: Vcs | null;
  tagFormat: string;
}

export type VersionRule = (version: Pep440Version, context: VersionRuleContext) => Pep440Version | Promise<Pep440Version>;

/**
 * Rules accepted in place of an explicit version, in the order they are listed
 * in help output.
 */
export const VERSION_RULES: ReadonlyMap<string, VersionRule> = new Map<string, VersionRule>([
  ['major', version => nextMajor(version)],
  ['premajor', version => firstPrerelease(nextMajor(version))],
  ['minor', version => nextMinor(version)],
  ['preminor', version => firstPrerelease(nextMinor(version))],
  ['patch', version => nextPatch(version)],
  ['prepatch', version => firstPrerelease(nextPatch(version))],
  ['prerelease', version => nextPrerelease(version)],
  ['post', version => nextPost(version)],
  ['git', (version, context) => {
    if (!context.vcs) {
      throw new VcsError('The "git" version rule requires a Git repository');
    }
    return getCiVersion(version, context.vcs, context.tagFormat);
  }]
]);

export function isVersionRule(name: string): boolean {
  return VERSION_RULES.has(name);
}

/**
 * Apply the rule `name` to `current` and return the normalized result.
 */
export async function applyVersionRule(name: string, current: string, context: VersionRuleContext): Promise<string> {
  const rule = VERSION_RULES.get(name);
  if (!rule) {
    throw new InvalidVersionError(name, `not a valid version incrementing rule (expected one of ${[...VERSION_RULES.keys()].join(', ')})`);
  }
  return formatVersion(await rule(parseVersion(current), context));
}
