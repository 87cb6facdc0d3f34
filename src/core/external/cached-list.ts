import type { TtlCache } from '../cache/ttl-cache.js';
import type { Fetcher } from '../repository/host.js';
import { logger } from '../../utils/logger.js';

export interface CachedListSource {
  key: string;
  url: string;
  ttlMs: number;
  parse(response: Response): Promise<string[]>;
}

/**
 * A list downloaded from `source.url`, served from `cache` while it is fresh.
 * When the download fails, a stale cached copy is returned instead; without
 * one the error propagates.
 */
export async function fetchCachedList(
  source: CachedListSource,
  cache: TtlCache<string[]>,
  fetcher: Fetcher = fetch
): Promise<string[]> {
  const entry = cache.getEntry(source.key);
  if (entry && !cache.isStale(entry, source.ttlMs)) {
    return entry.value;
  }

  try {
    const response = await fetcher(source.url);
    if (!response.ok) {
      throw new Error(`GET ${source.url} returned HTTP ${response.status}`);
    }
    const value = await source.parse(response);
    cache.put(source.key, value);
    return value;
  } catch (error) {
    if (entry) {
      logger.warn(`Using stale ${source.key} list, refresh failed`, error);
      return entry.value;
    }
    throw error;
  }
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
