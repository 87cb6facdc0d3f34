import type { Dependencies, Dependency } from '../../../types/index.js';
import { getTable, isTable } from '../../toml-file.js';
import { parseRequirementList } from '../dependency.js';
import { logger } from '../../../utils/logger.js';
import { BaseProjectHandler, ProjectContext, emptyDependencies, getBuildBackend, getBuildRequirements } from './base.js';

function splitOptional(table: unknown): { dev: Dependency[]; extra: Record<string, Dependency[]> } {
  const extra: Record<string, Dependency[]> = {};
  let dev: Dependency[] = [];
  if (isTable(table)) {
    for (const [name, requirements] of Object.entries(table)) {
      if (name === 'dev') {
        dev = parseRequirementList(requirements);
      } else {
        extra[name] = parseRequirementList(requirements);
      }
    }
  }
  return { dev, extra };
}

/**
 * Projects built with Flit, and any project declaring PEP 621 metadata in a
 * `[project]` table. The `dev` optional-dependency group is treated as the
 * development requirements.
 */
export class FlitProjectHandler extends BaseProjectHandler {
  readonly id = 'flit';

  async matchesProject(project: ProjectContext): Promise<boolean> {
    if (!project.hasPyproject) {
      return false;
    }
    if (getBuildBackend(project)?.startsWith('flit_core')) {
      return true;
    }
    return getTable(project.pyproject, ['project']) !== undefined;
  }

  async getDistName(project: ProjectContext): Promise<string | null> {
    const name = getTable(project.pyproject, ['project'])?.name;
    if (typeof name === 'string') {
      return name;
    }
    const module = getTable(project.pyproject, ['tool', 'flit', 'metadata'])?.module;
    return typeof module === 'string' ? module : null;
  }

  async getVersion(project: ProjectContext): Promise<string | null> {
    const version = getTable(project.pyproject, ['project'])?.version;
    return typeof version === 'string' ? version : null;
  }

  async getReadme(project: ProjectContext): Promise<string | null> {
    const readme = getTable(project.pyproject, ['project'])?.readme;
    if (typeof readme === 'string') {
      return readme;
    }
    if (isTable(readme) && typeof readme.file === 'string') {
      return readme.file;
    }
    const descriptionFile = getTable(project.pyproject, ['tool', 'flit', 'metadata'])?.['description-file'];
    if (typeof descriptionFile === 'string') {
      return descriptionFile;
    }
    return super.getReadme(project);
  }

  async getDependencies(project: ProjectContext): Promise<Dependencies> {
    const build = getBuildRequirements(project);
    const pep621 = getTable(project.pyproject, ['project']);
    if (pep621) {
      const { dev, extra } = splitOptional(pep621['optional-dependencies']);
      const python = typeof pep621['requires-python'] === 'string' ? pep621['requires-python'] : undefined;
      return { python, run: parseRequirementList(pep621.dependencies), dev, build, extra };
    }

    const metadata = getTable(project.pyproject, ['tool', 'flit', 'metadata']);
    if (metadata) {
      const { dev, extra } = splitOptional(metadata['requires-extra']);
      const python = typeof metadata['requires-python'] === 'string' ? metadata['requires-python'] : undefined;
      return { python, run: parseRequirementList(metadata.requires), dev, build, extra };
    }

    logger.warn(`Unable to read dependencies for project ${project.directory}`);
    return { ...emptyDependencies(), build };
  }
}
