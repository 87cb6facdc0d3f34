import { CACHE, EXTERNAL_URLS } from '../../constants/index.js';
import type { TtlCache } from '../cache/ttl-cache.js';
import type { Fetcher } from '../repository/host.js';
import { CachedListSource, fetchCachedList } from './cached-list.js';

function extractLicenseIds(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('licenses' in body) || !Array.isArray(body.licenses)) {
    throw new Error('SPDX license list has no "licenses" array');
  }
  const ids: string[] = [];
  for (const license of body.licenses) {
    if (typeof license === 'object' && license !== null && 'licenseId' in license && typeof license.licenseId === 'string') {
      ids.push(license.licenseId);
    }
  }
  return ids;
}

export const SPDX_LICENSES: CachedListSource = {
  key: 'spdx-licenses',
  url: EXTERNAL_URLS.SPDX_LICENSES,
  ttlMs: CACHE.LICENSES_TTL_MS,
  async parse(response: Response): Promise<string[]> {
    return extractLicenseIds(await response.json());
  }
};

/**
 * SPDX license identifiers.
 */
export function getSpdxLicenseIds(cache: TtlCache<string[]>, fetcher?: Fetcher): Promise<string[]> {
  return fetchCachedList(SPDX_LICENSES, cache, fetcher);
}
