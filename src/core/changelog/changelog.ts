import { randomUUID } from 'crypto';
import { basename, extname, join } from 'path';
import * as TOML from 'smol-toml';
import { TomlDate } from 'smol-toml';
import { CHANGELOG_DEFAULTS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { ensureDir, exists, listFiles, readTextFile, remove, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { Pep440Version, compareVersions, tryParseVersion } from '../../utils/pep440.js';
import type { RepositoryHost } from '../repository/host.js';
import { TomlTable, isTable, parseToml } from '../toml-file.js';

export interface ChangelogEntry {
  id: string;
  type: string;
  description: string;
  author?: string;
  authors?: string[];
  pr?: string;
  issues?: string[];
}

export interface Changelog {
  entries: ChangelogEntry[];
  /** `YYYY-MM-DD`; only released changelogs carry one. */
  releaseDate?: string;
}

export function getAuthors(entry: ChangelogEntry): string[] {
  return [...(entry.author !== undefined ? [entry.author] : []), ...(entry.authors ?? [])];
}

export function formatDate(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

// --- (De)serialization ---------------------------------------------------------

function readString(table: TomlTable, key: string, where: string): string | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function readStringList(table: TomlTable, key: string, where: string): string[] | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${where}: "${key}" must be a list of strings`);
  }
  return value;
}

function parseEntry(value: unknown, where: string): ChangelogEntry {
  if (!isTable(value)) {
    throw new ValidationError(`${where}: entry must be a table`);
  }
  const id = readString(value, 'id', where);
  const type = readString(value, 'type', where);
  const description = readString(value, 'description', where);
  if (id === undefined || type === undefined || description === undefined) {
    throw new ValidationError(`${where}: entry requires "id", "type" and "description"`);
  }
  const entry: ChangelogEntry = { id, type, description };
  const author = readString(value, 'author', where);
  const authors = readStringList(value, 'authors', where);
  const pr = readString(value, 'pr', where);
  const issues = readStringList(value, 'issues', where);
  if (author !== undefined) {
    entry.author = author;
  }
  if (authors !== undefined) {
    entry.authors = authors;
  }
  if (pr !== undefined) {
    entry.pr = pr;
  }
  if (issues !== undefined) {
    entry.issues = issues;
  }
  return entry;
}

function parseReleaseDate(value: unknown, source: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value instanceof TomlDate) {
    return value.toISOString().slice(0, 10);
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return value;
  }
  throw new ValidationError(`${source}: "release-date" must be a date`);
}

export function parseChangelog(data: TomlTable, source: string): Changelog {
  const rawEntries = data.entries ?? [];
  if (!Array.isArray(rawEntries)) {
    throw new ValidationError(`${source}: "entries" must be an array of tables`);
  }
  const changelog: Changelog = {
    entries: rawEntries.map((item: unknown, index: number) => parseEntry(item, `${source} entries[${index}]`))
  };
  const releaseDate = parseReleaseDate(data['release-date'], source);
  if (releaseDate !== undefined) {
    changelog.releaseDate = releaseDate;
  }
  return changelog;
}

function entryToToml(entry: ChangelogEntry): TomlTable {
  const table: TomlTable = { id: entry.id, type: entry.type, description: entry.description };
  if (entry.author !== undefined) {
    table.author = entry.author;
  }
  if (entry.authors !== undefined) {
    table.authors = entry.authors;
  }
  if (entry.pr !== undefined) {
    table.pr = entry.pr;
  }
  if (entry.issues !== undefined) {
    table.issues = entry.issues;
  }
  return table;
}

export function dumpChangelog(changelog: Changelog): string {
  const data: TomlTable = {};
  if (changelog.releaseDate !== undefined) {
    data['release-date'] = new TomlDate(changelog.releaseDate);
  }
  data.entries = changelog.entries.map(entryToToml);
  return TOML.stringify(data) + '\n';
}

export function dumpEntry(entry: ChangelogEntry): string {
  return TOML.stringify(entryToToml(entry)) + '\n';
}

// --- Managed files ---------------------------------------------------------------

/**
 * One changelog file. The unreleased changelog has no version and must not
 * carry a release date; versioned changelogs must.
 */
export class ManagedChangelog {
  private content: Changelog | null = null;

  constructor(
    private readonly manager: ChangelogManager,
    readonly path: string,
    readonly version: string | null
  ) {}

  async exists(): Promise<boolean> {
    return exists(this.path);
  }

  async load(reload: boolean = false): Promise<Changelog> {
    if (this.content === null || reload) {
      this.content = parseChangelog(parseToml(await readTextFile(this.path), this.path), this.path);
    }
    return this.content;
  }

  async save(changelog?: Changelog): Promise<void> {
    const content = changelog ?? this.content;
    if (!content) {
      throw new ValidationError(`changelog ${this.path} was not loaded and no content was given`);
    }
    const isUnreleased = basename(this.path) === this.manager.unreleasedFileName;
    if (content.releaseDate === undefined && !isUnreleased) {
      throw new ValidationError(`changelog without release date must be the unreleased changelog (but is ${basename(this.path)})`);
    }
    if (content.releaseDate !== undefined && isUnreleased) {
      throw new ValidationError(`changelog with release date must be a version (but is ${basename(this.path)})`);
    }
    await this.manager.write(this.path, content);
    this.content = content;
  }

  /**
   * Move the content to the changelog of `version`, stamped with `date`, and
   * delete this file.
   */
  async release(version: string, date: Date = new Date()): Promise<ManagedChangelog> {
    if (this.version !== null) {
      throw new ValidationError(`cannot release already released changelog ${this.path}`);
    }
    const content = await this.load();
    const target = this.manager.version(version);
    await target.save({ entries: content.entries.map(entry => ({ ...entry })), releaseDate: formatDate(date) });
    await remove(this.path);
    return target;
  }
}

export interface ChangelogManagerOptions {
  directory: string;
  repositoryHost?: RepositoryHost | null;
  unreleasedFileName?: string;
  versionFileTemplate?: string;
  /** `null` accepts any type. */
  validTypes?: readonly string[] | null;
  readonly?: boolean;
}

/**
 * A directory of TOML changelogs: `_unreleased.toml` plus one file per
 * released version.
 */
export class ChangelogManager {
  readonly directory: string;
  readonly repositoryHost: RepositoryHost | null;
  readonly unreleasedFileName: string;
  readonly versionFileTemplate: string;
  readonly validTypes: readonly string[] | null;
  readonly readonly: boolean;

  constructor(options: ChangelogManagerOptions) {
    this.directory = options.directory;
    this.repositoryHost = options.repositoryHost ?? null;
    this.unreleasedFileName = options.unreleasedFileName ?? CHANGELOG_DEFAULTS.UNRELEASED_FILE;
    this.versionFileTemplate = options.versionFileTemplate ?? CHANGELOG_DEFAULTS.VERSION_FILE_TEMPLATE;
    this.validTypes = options.validTypes === undefined ? CHANGELOG_DEFAULTS.VALID_TYPES : options.validTypes;
    this.readonly = options.readonly ?? false;
  }

  /** @internal Used by {@link ManagedChangelog.save}. */
  async write(path: string, changelog: Changelog): Promise<void> {
    if (this.readonly) {
      throw new ValidationError(`"${this.directory}" is readonly, enable the changelog feature to write to it`);
    }
    await ensureDir(this.directory);
    await writeTextFileAtomic(path, dumpChangelog(changelog));
  }

  unreleased(): ManagedChangelog {
    return new ManagedChangelog(this, join(this.directory, this.unreleasedFileName), null);
  }

  version(version: string): ManagedChangelog {
    return new ManagedChangelog(this, join(this.directory, this.versionFileTemplate.replaceAll('{version}', version)), version);
  }

  /**
   * The unreleased changelog (when it exists) followed by every released
   * changelog, newest version first.
   */
  async all(): Promise<ManagedChangelog[]> {
    if (!(await exists(this.directory))) {
      return [];
    }
    const released: Array<{ changelog: ManagedChangelog; version: Pep440Version }> = [];
    for (const name of await listFiles(this.directory)) {
      if (extname(name) !== '.toml' || name === this.unreleasedFileName) {
        continue;
      }
      const stem = name.slice(0, -'.toml'.length);
      const version = tryParseVersion(stem);
      if (!version) {
        logger.warn(`Ignoring changelog file with a non-version name: ${join(this.directory, name)}`);
        continue;
      }
      released.push({ changelog: new ManagedChangelog(this, join(this.directory, name), stem), version });
    }
    released.sort((a, b) => compareVersions(b.version, a.version));

    const unreleased = this.unreleased();
    const result = released.map(item => item.changelog);
    return (await unreleased.exists()) ? [unreleased, ...result] : result;
  }

  private checkType(type: string): void {
    if (this.validTypes !== null && !this.validTypes.includes(type)) {
      throw new ValidationError(`invalid change type: ${type} (expected one of ${this.validTypes.join(', ')})`);
    }
  }

  /**
   * A new entry with a random id. PR and issue references are expanded to
   * URLs when a repository host is known.
   */
  makeEntry(type: string, description: string, author: string, pr?: string, issues?: string[]): ChangelogEntry {
    this.checkType(type);
    const entry: ChangelogEntry = { id: randomUUID(), type, description, author };
    if (pr !== undefined) {
      entry.pr = this.repositoryHost ? this.repositoryHost.getPullRequestByReference(pr).url : pr;
    }
    if (issues !== undefined && issues.length > 0) {
      entry.issues = issues.map(issue => (this.repositoryHost ? this.repositoryHost.getIssueByReference(issue).url : issue));
    }
    return entry;
  }

  /**
   * Throw a {@link ValidationError} for an invalid entry, otherwise return it
   * with normalized references.
   */
  validateEntry(entry: ChangelogEntry): ChangelogEntry {
    this.checkType(entry.type);
    if (entry.author !== undefined && entry.authors !== undefined) {
      throw new ValidationError('entry has "author" and "authors", only one should be present');
    }
    const authors = getAuthors(entry);
    if (authors.length === 0) {
      throw new ValidationError('entry has no "author" or "authors"');
    }
    if (authors.some(author => author.length === 0)) {
      throw new ValidationError('empty string in author(s)');
    }
    if (!this.repositoryHost) {
      return entry;
    }
    const host = this.repositoryHost;
    return {
      ...entry,
      ...(entry.pr !== undefined ? { pr: host.getPullRequestByReference(entry.pr).url } : {}),
      ...(entry.issues !== undefined ? { issues: entry.issues.map(issue => host.getIssueByReference(issue).url) } : {})
    };
  }
}
