import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import type { Package, VersionRef } from '../../types/index.js';
import { exists, isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { matchVersionRefPattern } from './version-ref.js';

export const SOURCE_CODE_VERSION_PATTERN = `^__version__\\s*=\\s*['"]([^'"]+)['"]`;

export interface PackageVersion {
  package: Package;
  ref: VersionRef | null;
}

/**
 * The `__version__` assignment of a package. A single-module package is
 * scanned directly, otherwise the first of `__init__.py`, `__about__.py` and
 * `_version.py` that exists and matches wins.
 */
export async function findSourceCodeVersionRef(pkg: Package): Promise<VersionRef | null> {
  const candidates = (await isFile(pkg.path))
    ? [pkg.path]
    : FILE_PATTERNS.VERSION_SOURCE_FILES.map(name => join(pkg.path, name));

  for (const file of candidates) {
    if (!(await exists(file))) {
      continue;
    }
    const ref = await matchVersionRefPattern(file, SOURCE_CODE_VERSION_PATTERN, null);
    if (ref) {
      return ref;
    }
  }
  return null;
}

export async function findSourceCodeVersions(packages: Package[]): Promise<PackageVersion[]> {
  const result: PackageVersion[] = [];
  for (const pkg of packages) {
    result.push({ package: pkg, ref: await findSourceCodeVersionRef(pkg) });
  }
  return result;
}

/**
 * All `__version__` refs of a project's packages. Packages without one are
 * logged, never fatal.
 */
export async function getSourceCodeVersionRefs(projectId: string, packages: Package[]): Promise<VersionRef[]> {
  const versions = await findSourceCodeVersions(packages);
  const missing = versions.filter(item => item.ref === null).map(item => item.package.name);
  if (missing.length > 0) {
    logger.warn(`Unable to detect __version__ in the following packages of project ${projectId}: ${missing.join(', ')}`);
  }
  return versions.flatMap(item => (item.ref ? [item.ref] : []));
}
