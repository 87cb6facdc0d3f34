import * as TOML from 'smol-toml';
import { exists, readTextFile, writeTextFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type TomlTable = Record<string, unknown>;

export function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Walk a dotted path of tables, e.g. `['tool', 'poetry']`. Missing or non-table
 * steps yield `undefined`.
 */
export function getTable(data: TomlTable, path: readonly string[]): TomlTable | undefined {
  let current: unknown = data;
  for (const key of path) {
    if (!isTable(current)) {
      return undefined;
    }
    current = current[key];
  }
  return isTable(current) ? current : undefined;
}

export function parseToml(content: string, source: string): TomlTable {
  try {
    return TOML.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse TOML file ${source}: ${error instanceof Error ? error.message : String(error)}`, { source });
  }
}

/**
 * Lazily loaded TOML document. The parsed value is cached until `reload()`
 * or `save()`; a missing file reads as an empty table.
 */
export class TomlFile {
  private data: TomlTable | null = null;

  constructor(public readonly path: string) {}

  async exists(): Promise<boolean> {
    return exists(this.path);
  }

  async load(): Promise<TomlTable> {
    if (this.data) {
      return this.data;
    }
    if (!(await exists(this.path))) {
      logger.debug(`TOML file does not exist, using empty table: ${this.path}`);
      this.data = {};
      return this.data;
    }
    this.data = parseToml(await readTextFile(this.path), this.path);
    return this.data;
  }

  async reload(): Promise<TomlTable> {
    this.data = null;
    return this.load();
  }

  async save(data: TomlTable): Promise<void> {
    await writeTextFile(this.path, TOML.stringify(data) + '\n');
    this.data = data;
  }
}
