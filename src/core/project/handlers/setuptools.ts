import { join } from 'path';
import type { Dependencies, Dependency, Package, VersionRef } from '../../../types/index.js';
import { FILE_PATTERNS } from '../../../constants/index.js';
import { exists, readTextFile } from '../../../utils/fs.js';
import { matchVersionRefPattern } from '../../release/version-ref.js';
import { parseListSemi, parseRequirementList } from '../dependency.js';
import { SetupCfg, parseSetupCfg } from '../setup-cfg.js';
import { BaseProjectHandler, ProjectContext, getBuildBackend, getBuildRequirements } from './base.js';

export const SETUP_CFG_VERSION_PATTERN = '^version\\s*=\\s*(.*?)$';

/**
 * Projects built with setuptools and configured declaratively in `setup.cfg`.
 */
export class SetuptoolsProjectHandler extends BaseProjectHandler {
  readonly id = 'setuptools';

  private async setupCfg(project: ProjectContext): Promise<SetupCfg> {
    const path = join(project.directory, FILE_PATTERNS.SETUP_CFG);
    if (!(await exists(path))) {
      return {};
    }
    return parseSetupCfg(await readTextFile(path));
  }

  async matchesProject(project: ProjectContext): Promise<boolean> {
    const backend = getBuildBackend(project);
    if (backend !== undefined) {
      return backend.startsWith('setuptools');
    }
    return (await exists(join(project.directory, FILE_PATTERNS.SETUP_CFG)))
      || (await exists(join(project.directory, FILE_PATTERNS.SETUP_PY)));
  }

  async getDistName(project: ProjectContext): Promise<string | null> {
    return (await this.setupCfg(project)).metadata?.name ?? null;
  }

  async getVersion(project: ProjectContext): Promise<string | null> {
    const version = (await this.setupCfg(project)).metadata?.version;
    // `attr:` and `file:` directives point elsewhere
    if (!version || /^(attr|file):/.test(version)) {
      return null;
    }
    return version;
  }

  async getReadme(project: ProjectContext): Promise<string | null> {
    const longDescription = ((await this.setupCfg(project)).metadata?.long_description ?? '').trim();
    if (longDescription.startsWith('file:')) {
      // May be a comma separated list of files
      return longDescription.slice('file:'.length).split(',')[0].trim() || null;
    }
    return super.getReadme(project);
  }

  async getPackages(project: ProjectContext): Promise<Package[]> {
    const options = (await this.setupCfg(project)).options ?? {};
    const packages = options.packages;
    if (packages === undefined || packages.trim() === 'find:' || packages.trim() === 'find_namespace:') {
      return super.getPackages(project);
    }
    const packageDir = join(project.directory, (options.package_dir ?? '').replace(/^=/, '').trim());
    return parseListSemi(packages).map(name => ({
      name,
      path: join(packageDir, ...name.split('.')),
      root: packageDir
    }));
  }

  async getDependencies(project: ProjectContext): Promise<Dependencies> {
    const cfg = await this.setupCfg(project);
    const options = cfg.options ?? {};
    const extra: Record<string, Dependency[]> = {};
    for (const [name, value] of Object.entries(cfg['options.extras_require'] ?? {})) {
      extra[name] = parseRequirementList(parseListSemi(value));
    }
    return {
      python: options.python_requires || undefined,
      run: parseRequirementList(parseListSemi(options.install_requires)),
      dev: parseRequirementList([...parseListSemi(options.tests_require)]),
      build: [
        ...getBuildRequirements(project),
        ...parseRequirementList(parseListSemi(options.setup_requires))
      ],
      extra
    };
  }

  async getVersionRefs(project: ProjectContext): Promise<VersionRef[]> {
    const file = join(project.directory, FILE_PATTERNS.SETUP_CFG);
    if (!(await exists(file))) {
      return [];
    }
    const ref = await matchVersionRefPattern(file, SETUP_CFG_VERSION_PATTERN, null);
    return ref ? [ref] : [];
  }

  async getRequirementFiles(project: ProjectContext): Promise<string[]> {
    const files = await super.getRequirementFiles(project);
    const setupCfg = join(project.directory, FILE_PATTERNS.SETUP_CFG);
    if (await exists(setupCfg)) {
      files.push(setupCfg);
    }
    return files;
  }
}
