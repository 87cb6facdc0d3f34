import { homedir } from 'os';
import { join } from 'path';
import { CACHE } from '../../constants/index.js';
import { exists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface CacheEntry<T> {
  value: T;
  /** Milliseconds since the epoch. */
  timestamp: number;
}

export function getCacheDirectory(): string {
  return process.env[CACHE.DIR_ENV] || join(homedir(), ...CACHE.DEFAULT_SUBDIR);
}

/**
 * Key/value cache with per-lookup expiry. Entries stay in the cache when they
 * go stale so callers can fall back to them when a refresh fails.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly file: string | null = null,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    return this.entries.get(key)?.value;
  }

  getEntry(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  put(key: string, value: T, timestamp: number = this.now()): void {
    this.entries.set(key, { value, timestamp });
  }

  isStale(entry: CacheEntry<T>, ttlMs: number): boolean {
    return this.now() - entry.timestamp > ttlMs;
  }

  /**
   * Read persisted entries. Entries whose value fails `isValue` are dropped; a
   * file that cannot be read leaves the cache empty.
   */
  async load(isValue: (value: unknown) => value is T): Promise<void> {
    if (!this.file || !(await exists(this.file))) {
      return;
    }
    let data: unknown;
    try {
      data = await readJsonFile(this.file);
    } catch (error) {
      logger.warn(`Ignoring unreadable cache file ${this.file}`, error);
      return;
    }
    if (typeof data !== 'object' || data === null) {
      return;
    }
    for (const [key, entry] of Object.entries(data)) {
      if (
        typeof entry === 'object' && entry !== null &&
        'timestamp' in entry && typeof entry.timestamp === 'number' &&
        'value' in entry && isValue(entry.value)
      ) {
        this.entries.set(key, { value: entry.value, timestamp: entry.timestamp });
      }
    }
  }

  async save(): Promise<void> {
    if (!this.file) {
      return;
    }
    await writeJsonFile(this.file, Object.fromEntries(this.entries));
  }
}
