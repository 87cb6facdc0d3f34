import { basename } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import type { VersionRef } from '../../types/index.js';
import { escapeRegExp } from '../../utils/text.js';
import { matchVersionRefPatternOnLines } from './version-ref.js';

/**
 * Pins of sibling projects inside a project's requirement files. In a
 * mono-repository all projects share one version, so releasing must bump
 * these pins together with the projects' own versions.
 */

const SELECTOR = `([\\^<>=!~*]*)(?<version>\\d+\\.[\\w.\\-]+)`;

export function tomlInterdependencyPatterns(name: string): string[] {
  const escaped = escapeRegExp(name);
  return [
    // `name = "^1.0.0"` or `"name" = "1.0.0"`
    `(?<![\\w.\\-])(['"])?${escaped}\\1\\s*=\\s*(['"])${SELECTOR}\\2`,
    // `"name>=1.0.0",` inside an array
    `(['"])${escaped}(?![\\w.\\-])\\s*${SELECTOR}\\1\\s*($|,|\\]|\\})`
  ];
}

export function setupCfgInterdependencyPatterns(name: string): string[] {
  const escaped = escapeRegExp(name);
  return [
    `^\\s+${escaped}\\s*(?:==|>=|<=|~=|>|<)\\s*(?<version>[^\\s;,]+)`,
    `^\\w+_requires?\\s*=\\s*${escaped}\\s*(?:==|>=|<=|~=|>|<)\\s*(?<version>[^\\s;,]+)`
  ];
}

/**
 * Scan `files` for pins of `siblings`. Refs found by more than one expression
 * are reported once, ordered by file and offset.
 */
export async function findInterdependencyRefs(files: string[], siblings: string[]): Promise<VersionRef[]> {
  const refs: VersionRef[] = [];
  for (const file of files) {
    const patterns = basename(file) === FILE_PATTERNS.SETUP_CFG
      ? siblings.flatMap(setupCfgInterdependencyPatterns)
      : siblings.flatMap(tomlInterdependencyPatterns);
    const found = new Map<string, VersionRef>();
    for (const pattern of patterns) {
      for (const ref of await matchVersionRefPatternOnLines(file, pattern, 'interdependency')) {
        const span = `${ref.start}:${ref.end}`;
        if (!found.has(span)) {
          found.set(span, ref);
        }
      }
    }
    refs.push(...[...found.values()].sort((a, b) => a.start - b.start));
  }
  return refs;
}

export interface InterdependencyProject {
  id: string;
  distName: string | null;
  isPythonProject: boolean;
  getRequirementFiles(): Promise<string[]>;
}

/**
 * Interdependency refs of `project` against every other Python project in
 * `projects` that has a distribution name.
 */
export async function getInterdependencyRefs(
  project: InterdependencyProject,
  projects: InterdependencyProject[]
): Promise<VersionRef[]> {
  const siblings = projects
    .filter(other => other !== project && other.isPythonProject)
    .map(other => other.distName)
    .filter((name): name is string => typeof name === 'string' && name.length > 0);
  if (siblings.length === 0) {
    return [];
  }
  return findInterdependencyRefs(await project.getRequirementFiles(), siblings);
}
