import { CACHE, EXTERNAL_URLS } from '../../constants/index.js';
import type { TtlCache } from '../cache/ttl-cache.js';
import type { Fetcher } from '../repository/host.js';
import { CachedListSource, fetchCachedList } from './cached-list.js';

export const PYPI_CLASSIFIERS: CachedListSource = {
  key: 'pypi-classifiers',
  url: EXTERNAL_URLS.PYPI_CLASSIFIERS,
  ttlMs: CACHE.CLASSIFIERS_TTL_MS,
  async parse(response: Response): Promise<string[]> {
    return (await response.text())
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }
};

/**
 * The trove classifiers PyPI accepts.
 */
export function getClassifiers(cache: TtlCache<string[]>, fetcher?: Fetcher): Promise<string[]> {
  return fetchCachedList(PYPI_CLASSIFIERS, cache, fetcher);
}
