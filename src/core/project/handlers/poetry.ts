import { join } from 'path';
import type { Dependencies, Dependency, Package } from '../../../types/index.js';
import { TomlTable, getTable, isTable } from '../../toml-file.js';
import { parsePoetryDependencies } from '../dependency.js';
import { BaseProjectHandler, ProjectContext, getBuildBackend, getBuildRequirements } from './base.js';

/**
 * Projects built with Poetry (`[tool.poetry]`).
 */
export class PoetryProjectHandler extends BaseProjectHandler {
  readonly id = 'poetry';

  private poetry(project: ProjectContext): TomlTable {
    return getTable(project.pyproject, ['tool', 'poetry']) ?? {};
  }

  async matchesProject(project: ProjectContext): Promise<boolean> {
    if (!project.hasPyproject) {
      return false;
    }
    const backend = getBuildBackend(project);
    if (backend !== undefined) {
      return backend.startsWith('poetry.');
    }
    return getTable(project.pyproject, ['tool', 'poetry']) !== undefined;
  }

  async getDistName(project: ProjectContext): Promise<string | null> {
    // Poetry 2 reads PEP 621 metadata as well
    const name = this.poetry(project).name ?? getTable(project.pyproject, ['project'])?.name;
    return typeof name === 'string' ? name : null;
  }

  async getVersion(project: ProjectContext): Promise<string | null> {
    const version = this.poetry(project).version ?? getTable(project.pyproject, ['project'])?.version;
    return typeof version === 'string' ? version : null;
  }

  async getReadme(project: ProjectContext): Promise<string | null> {
    const readme = this.poetry(project).readme;
    return typeof readme === 'string' ? readme : super.getReadme(project);
  }

  async getPackages(project: ProjectContext): Promise<Package[]> {
    const packages = this.poetry(project).packages;
    if (!Array.isArray(packages)) {
      return super.getPackages(project);
    }
    const result: Package[] = [];
    for (const entry of packages) {
      if (!isTable(entry) || typeof entry.include !== 'string') {
        continue;
      }
      const from = typeof entry.from === 'string' ? entry.from : '';
      result.push({
        name: entry.include.replace(/\//g, '.'),
        path: join(project.directory, from, entry.include),
        root: join(project.directory, from)
      });
    }
    return result;
  }

  async getDependencies(project: ProjectContext): Promise<Dependencies> {
    const poetry = this.poetry(project);
    const { python, dependencies: run } = parsePoetryDependencies(poetry.dependencies);

    const dev = [...parsePoetryDependencies(poetry['dev-dependencies']).dependencies];
    const groups = getTable(poetry, ['group']) ?? {};
    for (const group of Object.values(groups)) {
      if (isTable(group)) {
        dev.push(...parsePoetryDependencies(group.dependencies).dependencies);
      }
    }

    // Extras list names of optional run dependencies
    const extra: Record<string, Dependency[]> = {};
    const extras = getTable(poetry, ['extras']) ?? {};
    for (const [name, members] of Object.entries(extras)) {
      if (!Array.isArray(members)) {
        continue;
      }
      extra[name] = members
        .filter((member): member is string => typeof member === 'string')
        .map(member => run.find(dep => dep.name === member) ?? { name: member, spec: '' });
    }

    return { python, run, dev, build: getBuildRequirements(project), extra };
  }
}
