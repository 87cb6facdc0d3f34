import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * The version in package.json, which sits two levels above both `src/utils`
 * and `dist/utils`.
 */
export function getVersion(): string {
  try {
    const data: unknown = JSON.parse(readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf8'));
    if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
      return data.version;
    }
  } catch (error) {
    return `unknown (${error instanceof Error ? error.message : String(error)})`;
  }
  return 'unknown';
}
