import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, findFileByStem, readTextFile } from '../../utils/fs.js';
import { getClassifiers } from '../external/pypi-classifiers.js';
import { getSpdxLicenseIds } from '../external/spdx-licenses.js';
import type { Project } from '../project/project.js';
import { parseSetupCfg } from '../project/setup-cfg.js';
import { TomlTable, getTable, isTable } from '../toml-file.js';
import { Check, CheckContext, CheckPlugin, CheckResult, check } from './check.js';

export interface PackageMetadata {
  /** The readme file the build backend is told about. */
  readme?: string;
  homepage?: string;
  urls: Record<string, string>;
  classifiers?: string[];
  license?: string;
}

function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : undefined;
}

function stringTable(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (isTable(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === 'string') {
        result[key] = item;
      }
    }
  }
  return result;
}

function fromPoetry(poetry: TomlTable): PackageMetadata {
  const readme = poetry.readme;
  return {
    readme: stringValue(readme) ?? stringList(readme)?.[0],
    homepage: stringValue(poetry.homepage),
    urls: stringTable(poetry.urls),
    classifiers: stringList(poetry.classifiers),
    license: stringValue(poetry.license)
  };
}

function fromPep621(table: TomlTable): PackageMetadata {
  const readme = table.readme;
  const license = table.license;
  return {
    readme: stringValue(readme) ?? (isTable(readme) ? stringValue(readme.file) : undefined),
    urls: stringTable(table.urls),
    classifiers: stringList(table.classifiers),
    license: stringValue(license) ?? (isTable(license) ? stringValue(license.text) : undefined)
  };
}

function lines(value: string | undefined): string[] {
  return (value ?? '').split('\n').map(line => line.trim()).filter(line => line.length > 0);
}

async function fromSetupCfg(directory: string): Promise<PackageMetadata> {
  const path = join(directory, FILE_PATTERNS.SETUP_CFG);
  const metadata = (await exists(path)) ? parseSetupCfg(await readTextFile(path)).metadata ?? {} : {};
  const urls: Record<string, string> = {};
  for (const line of lines(metadata.project_urls)) {
    const index = line.indexOf('=');
    if (index > 0) {
      urls[line.slice(0, index).trim()] = line.slice(index + 1).trim();
    }
  }
  const longDescription = (metadata.long_description ?? '').trim();
  const classifiers = lines(metadata.classifiers);
  return {
    readme: longDescription.startsWith('file:') ? longDescription.slice('file:'.length).split(',')[0].trim() : undefined,
    homepage: metadata.url,
    urls,
    classifiers: classifiers.length > 0 ? classifiers : undefined,
    license: metadata.license
  };
}

/**
 * Package metadata as declared for the project's build backend.
 */
export async function readPackageMetadata(project: Project): Promise<PackageMetadata> {
  const pyproject = await project.pyprojectToml.load();
  const poetry = getTable(pyproject, ['tool', 'poetry']);
  if (project.handler?.id === 'poetry' && poetry && poetry.name !== undefined) {
    return fromPoetry(poetry);
  }
  if (project.handler?.id === 'setuptools') {
    return fromSetupCfg(project.directory);
  }
  const table = getTable(pyproject, ['project']);
  return table ? fromPep621(table) : { urls: {} };
}

async function checkReadme(project: Project, metadata: PackageMetadata): Promise<Check> {
  const detectedPath = await findFileByStem(project.directory, FILE_PATTERNS.README, { caseSensitive: false });
  const detected = detectedPath ? detectedPath.slice(project.directory.length + 1) : undefined;

  if (metadata.readme !== undefined) {
    if (!(await exists(join(project.directory, metadata.readme)))) {
      return check('readme', CheckResult.ERROR, `Configured readme ${metadata.readme} does not exist`);
    }
    return check('readme', CheckResult.OK, `Readme is configured correctly (path: ${metadata.readme})`);
  }
  if (detected === undefined) {
    return check('readme', CheckResult.WARNING, 'No readme found');
  }
  if (project.handler?.id === 'poetry' && (detected === 'README.md' || detected === 'README.rst')) {
    return check('readme', CheckResult.OK, `Poetry will autodetect your readme (${detected})`);
  }
  return check('readme', CheckResult.WARNING, `Readme ${detected} is not configured in the project metadata`);
}

function checkUrls(metadata: PackageMetadata): Check {
  const keys = new Set(Object.keys(metadata.urls).map(key => key.toLowerCase()));
  const present: Record<string, boolean> = {
    Homepage: metadata.homepage !== undefined || keys.has('homepage'),
    Repository: keys.has('repository') || keys.has('source'),
    Documentation: keys.has('documentation'),
    'Bug Tracker': keys.has('bug tracker') || keys.has('issues')
  };
  const missing = Object.keys(present).filter(key => !present[key]);
  if (missing.length === 0) {
    return check('urls', CheckResult.OK, 'Your project URLs are in top condition.');
  }
  return check(
    'urls',
    present.Homepage ? CheckResult.RECOMMENDATION : CheckResult.WARNING,
    `Please configure the following URLs: ${missing.map(key => `"${key}"`).join(', ')}`
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function checkClassifiers(metadata: PackageMetadata, context: CheckContext): Promise<Check> {
  if (!metadata.classifiers || metadata.classifiers.length === 0) {
    return check('classifiers', CheckResult.RECOMMENDATION, 'Please configure classifiers.');
  }
  let known: string[];
  try {
    known = await getClassifiers(context.cache, context.fetcher);
  } catch (error) {
    return check('classifiers', CheckResult.WARNING, `Could not validate classifiers because list could not be fetched (${describe(error)})`);
  }
  const knownSet = new Set(known);
  const bad = metadata.classifiers.filter(classifier => !knownSet.has(classifier));
  if (bad.length > 0) {
    return check('classifiers', CheckResult.ERROR, `Found bad classifiers: ${bad.map(item => `"${item}"`).join(', ')}`);
  }
  return check('classifiers', CheckResult.OK, 'All classifiers are valid.');
}

async function checkLicense(metadata: PackageMetadata, context: CheckContext): Promise<Check> {
  if (!metadata.license) {
    return check('license', CheckResult.ERROR, 'Missing license');
  }
  let known: string[];
  try {
    known = await getSpdxLicenseIds(context.cache, context.fetcher);
  } catch (error) {
    return check('license', CheckResult.WARNING, `Could not validate license because the SPDX list could not be fetched (${describe(error)})`);
  }
  if (!known.includes(metadata.license)) {
    return check('license', CheckResult.WARNING, `License "${metadata.license}" is not a known SPDX license identifier.`);
  }
  return check('license', CheckResult.OK, `License "${metadata.license}" is a valid SPDX identifier.`);
}

/**
 * Validates the package metadata that ends up on PyPI.
 */
export const metadataChecks: CheckPlugin = {
  id: 'metadata',

  async getProjectChecks(project: Project, context: CheckContext): Promise<Check[]> {
    const metadata = await readPackageMetadata(project);
    return [
      await checkReadme(project, metadata),
      checkUrls(metadata),
      await checkClassifiers(metadata, context),
      await checkLicense(metadata, context)
    ];
  }
};
