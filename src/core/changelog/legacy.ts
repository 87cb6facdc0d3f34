import * as yaml from 'js-yaml';
import { basename, extname } from 'path';
import { ValidationError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { isTable } from '../toml-file.js';
import type { Changelog, ChangelogEntry, ChangelogManager, ManagedChangelog } from './changelog.js';

/**
 * Conversion of the older YAML changelogs (`changes: [{type, component,
 * description, fixes}]` plus `release_date`) to TOML changelogs.
 */

const TYPE_MAPPING: Record<string, string> = {
  change: 'improvement',
  break: 'breaking change',
  breaking_change: 'breaking change',
  refactor: 'hygiene'
};

export const LEGACY_CHANGELOG_EXTENSIONS = ['.yaml', '.yml'];

/**
 * Split a trailing `(@user)` off a description.
 */
export function matchAuthorInDescription(description: string): { author: string | null; description: string } {
  const match = /(.*)\((@[\w\-_ ]+)\)$/s.exec(description);
  return match ? { author: match[2], description: match[1].trim() } : { author: null, description };
}

function legacyString(entry: Record<string, unknown>, key: string, source: string): string {
  const value = entry[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${source}: change "${key}" must be a string`);
  }
  return value;
}

function convertEntry(manager: ChangelogManager, raw: unknown, defaultAuthor: string, source: string): ChangelogEntry {
  if (!isTable(raw)) {
    throw new ValidationError(`${source}: each change must be a mapping`);
  }
  const component = legacyString(raw, 'component', source);
  let type: string;
  let prefix = '';
  if (component === 'docs') {
    type = 'docs';
  } else if (component === 'test' || component === 'tests') {
    type = 'tests';
  } else {
    type = legacyString(raw, 'type', source);
    prefix = component !== 'general' ? `${component}: ` : '';
  }

  const { author, description } = matchAuthorInDescription(legacyString(raw, 'description', source));
  const fixes = raw.fixes;
  const issues = Array.isArray(fixes) ? fixes.map(item => String(item)) : undefined;
  return manager.makeEntry(TYPE_MAPPING[type] ?? type, prefix + description, author ?? defaultAuthor, undefined, issues);
}

function formatLegacyDate(value: unknown, source: string): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return value;
  }
  throw new ValidationError(`${source}: "release_date" must be a YYYY-MM-DD date`);
}

export interface ConvertedChangelog {
  target: ManagedChangelog;
  changelog: Changelog;
}

/**
 * Read a YAML changelog and build its TOML replacement. `_unreleased.yml`
 * maps to the unreleased changelog, `<version>.yml` to that version.
 */
export async function convertLegacyChangelog(
  manager: ChangelogManager,
  source: string,
  defaultAuthor: string
): Promise<ConvertedChangelog> {
  const data: unknown = yaml.load(await readTextFile(source));
  if (!isTable(data) || !Array.isArray(data.changes)) {
    throw new ValidationError(`${source}: expected a mapping with a "changes" list`);
  }

  const entries = data.changes.map((change: unknown) => convertEntry(manager, change, defaultAuthor, source));
  const stem = basename(source, extname(source));
  const target = stem === '_unreleased' ? manager.unreleased() : manager.version(stem);
  const changelog: Changelog = { entries };
  const releaseDate = formatLegacyDate(data.release_date, source);
  if (releaseDate !== undefined) {
    changelog.releaseDate = releaseDate;
  }
  return { target, changelog };
}
