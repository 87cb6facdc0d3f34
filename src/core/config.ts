import { join } from 'path';
import { CHANGELOG_DEFAULTS, CHECK_DEFAULTS, CONFIG_SECTION, FILE_PATTERNS, RELEASE_DEFAULTS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { TomlFile, TomlTable, getTable, isTable } from './toml-file.js';

/**
 * Configuration for slipway, read from `slipway.toml` or the `[tool.slipway]`
 * table of `pyproject.toml`. Raw tables are turned into typed objects by the
 * `loadXConfig()` functions below, which reject values of the wrong shape.
 */

export interface ProjectConfig {
  handler?: string;
  sourceDirectory?: string;
  typed?: boolean;
}

export interface ReferenceConfig {
  file: string;
  pattern: string;
}

export interface ReleaseConfig {
  branch: string;
  commitMessage: string;
  tagFormat: string;
  references: ReferenceConfig[];
  plugins: string[];
  interdependencies: boolean;
}

export interface CheckConfig {
  plugins: string[];
}

export interface ChangelogConfig {
  /** Unset means "enabled when the directory holds a Python project". */
  enabled?: boolean;
  directory: string;
  validTypes: string[];
}

export interface InstallConfig {
  /** Extra name to requirement strings, installable with `--extras`. */
  extras: Record<string, string[]>;
  /** Extras installed unless `--no-dev`; unset means all of them. */
  devExtras?: string[];
}

export interface RepositoryConfig {
  include?: string[];
  repositoryHost?: string;
}

// --- Shape helpers -------------------------------------------------------------

function optionalString(table: TomlTable, key: string, section: string): string | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${section}.${key} must be a string`, { key: `${section}.${key}`, value });
  }
  return value;
}

function optionalBoolean(table: TomlTable, key: string, section: string): boolean | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${section}.${key} must be a boolean`, { key: `${section}.${key}`, value });
  }
  return value;
}

function optionalStringList(table: TomlTable, key: string, section: string): string[] | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${section}.${key} must be a list of strings`, { key: `${section}.${key}`, value });
  }
  return value;
}

function section(raw: TomlTable, name: string): TomlTable {
  const value = raw[name];
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new ConfigError(`${name} must be a table`, { key: name, value });
  }
  return value;
}

// --- Typed loaders ---------------------------------------------------------------

export function loadProjectConfig(raw: TomlTable): ProjectConfig {
  return {
    handler: optionalString(raw, 'handler', CONFIG_SECTION),
    sourceDirectory: optionalString(raw, 'source-directory', CONFIG_SECTION),
    typed: optionalBoolean(raw, 'typed', CONFIG_SECTION)
  };
}

export function loadReleaseConfig(raw: TomlTable): ReleaseConfig {
  const table = section(raw, 'release');
  const references: ReferenceConfig[] = [];
  const rawReferences = table.references ?? [];
  if (!Array.isArray(rawReferences)) {
    throw new ConfigError('release.references must be a list of tables', { key: 'release.references' });
  }
  rawReferences.forEach((item: unknown, index: number) => {
    const key = `release.references[${index}]`;
    if (!isTable(item)) {
      throw new ConfigError(`${key} must be a table`, { key });
    }
    const file = optionalString(item, 'file', key);
    const pattern = optionalString(item, 'pattern', key);
    if (!file || !pattern) {
      throw new ConfigError(`${key} requires "file" and "pattern"`, { key });
    }
    references.push({ file, pattern });
  });

  return {
    branch: optionalString(table, 'branch', 'release') ?? RELEASE_DEFAULTS.BRANCH,
    commitMessage: optionalString(table, 'commit-message', 'release') ?? RELEASE_DEFAULTS.COMMIT_MESSAGE,
    tagFormat: optionalString(table, 'tag-format', 'release') ?? RELEASE_DEFAULTS.TAG_FORMAT,
    references,
    plugins: optionalStringList(table, 'plugins', 'release') ?? [...RELEASE_DEFAULTS.PLUGINS],
    interdependencies: optionalBoolean(table, 'interdependencies', 'release') ?? true
  };
}

export function loadCheckConfig(raw: TomlTable): CheckConfig {
  const table = section(raw, 'check');
  return {
    plugins: optionalStringList(table, 'plugins', 'check') ?? [...CHECK_DEFAULTS.PLUGINS]
  };
}

export function loadChangelogConfig(raw: TomlTable): ChangelogConfig {
  const table = section(raw, 'changelog');
  return {
    enabled: optionalBoolean(table, 'enabled', 'changelog'),
    directory: optionalString(table, 'directory', 'changelog') ?? CHANGELOG_DEFAULTS.DIRECTORY,
    validTypes: optionalStringList(table, 'valid-types', 'changelog') ?? [...CHANGELOG_DEFAULTS.VALID_TYPES]
  };
}

export function loadInstallConfig(raw: TomlTable): InstallConfig {
  const table = section(raw, 'install');
  const extrasTable = section(table, 'extras');
  const extras: Record<string, string[]> = {};
  for (const name of Object.keys(extrasTable)) {
    extras[name] = optionalStringList(extrasTable, name, 'install.extras') ?? [];
  }
  return {
    extras,
    devExtras: optionalStringList(table, 'dev-extras', 'install')
  };
}

export function loadRepositoryConfig(raw: TomlTable): RepositoryConfig {
  const table = section(raw, 'repository');
  return {
    include: optionalStringList(table, 'include', 'repository'),
    repositoryHost: optionalString(table, 'repository-host', 'repository')
  };
}

/**
 * A directory that can carry slipway configuration. Both projects and the
 * repository root are configuration sources.
 */
export class ConfigurationSource {
  readonly pyprojectToml: TomlFile;
  readonly slipwayToml: TomlFile;
  private rawConfig: TomlTable | null = null;

  constructor(public readonly directory: string) {
    this.pyprojectToml = new TomlFile(join(directory, FILE_PATTERNS.PYPROJECT_TOML));
    this.slipwayToml = new TomlFile(join(directory, FILE_PATTERNS.SLIPWAY_TOML));
  }

  /**
   * The raw configuration table; `slipway.toml` wins over `pyproject.toml`.
   */
  async raw(): Promise<TomlTable> {
    if (this.rawConfig) {
      return this.rawConfig;
    }
    if (await this.slipwayToml.exists()) {
      logger.debug(`Reading configuration from ${this.slipwayToml.path}`);
      this.rawConfig = await this.slipwayToml.load();
    } else if (await this.pyprojectToml.exists()) {
      logger.debug(`Reading configuration from ${this.pyprojectToml.path}`);
      this.rawConfig = getTable(await this.pyprojectToml.load(), ['tool', CONFIG_SECTION]) ?? {};
    } else {
      this.rawConfig = {};
    }
    return this.rawConfig;
  }
}
