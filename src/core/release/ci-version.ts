import type { Vcs } from '../../utils/git.js';
import { Pep440Version, baseVersion, formatVersion } from '../../utils/pep440.js';

export function formatTagName(tagFormat: string, version: string): string {
  return tagFormat.replaceAll('{version}', version);
}

/**
 * Describe the commit distance from the tag of the current version to HEAD:
 * `<base>.postN` when that tag exists, `<base>.post0.devN` counting every
 * commit otherwise.
 */
export async function getCiVersion(version: Pep440Version, vcs: Vcs, tagFormat: string): Promise<Pep440Version> {
  const base = baseVersion(version);
  const tag = formatTagName(tagFormat, formatVersion(base));
  if (await vcs.revParse(tag)) {
    const distance = (await vcs.revList(`${tag}..HEAD`)).length;
    return { ...base, post: distance };
  }
  const distance = (await vcs.revList('HEAD')).length;
  return { ...base, post: 0, dev: distance };
}
