import { basename, join } from 'path';
import type { Dependencies, Dependency, Package, VersionRef } from '../../../types/index.js';
import type { ProjectConfig } from '../../config.js';
import type { TomlTable } from '../../toml-file.js';
import { getTable } from '../../toml-file.js';
import { FILE_PATTERNS } from '../../../constants/index.js';
import { exists, findFileByStem } from '../../../utils/fs.js';
import { matchVersionRefPattern } from '../../release/version-ref.js';
import { detectPackages } from '../package-detection.js';
import { parseRequirementList } from '../dependency.js';

/**
 * What a project handler gets to see of a project.
 */
export interface ProjectContext {
  directory: string;
  /** Parsed `pyproject.toml`; an empty table when the file is missing. */
  pyproject: TomlTable;
  hasPyproject: boolean;
  config: ProjectConfig;
}

/**
 * A project handler understands one way of declaring Python project metadata
 * (a build system). Handlers are tried in registration order; the first that
 * matches a project owns it.
 */
export interface ProjectHandler {
  readonly id: string;
  matchesProject(project: ProjectContext): Promise<boolean>;
  getDistName(project: ProjectContext): Promise<string | null>;
  getVersion(project: ProjectContext): Promise<string | null>;
  getReadme(project: ProjectContext): Promise<string | null>;
  getPackages(project: ProjectContext): Promise<Package[]>;
  getDependencies(project: ProjectContext): Promise<Dependencies>;
  /** The reference to the version declared in the build manifest, if any. */
  getVersionRefs(project: ProjectContext): Promise<VersionRef[]>;
  /** Files that declare requirements and may pin sibling projects. */
  getRequirementFiles(project: ProjectContext): Promise<string[]>;
}

export const PYPROJECT_VERSION_PATTERN = `^version\\s*=\\s*['"]?(.*?)['"]`;

export function emptyDependencies(): Dependencies {
  return { run: [], dev: [], build: [], extra: {} };
}

export function getBuildBackend(project: ProjectContext): string | undefined {
  const backend = getTable(project.pyproject, ['build-system'])?.['build-backend'];
  return typeof backend === 'string' ? backend : undefined;
}

export function getBuildRequirements(project: ProjectContext): Dependency[] {
  return parseRequirementList(getTable(project.pyproject, ['build-system'])?.requires);
}

export abstract class BaseProjectHandler implements ProjectHandler {
  abstract readonly id: string;
  protected readonly packageDirs: readonly string[] = ['src', '.'];

  abstract matchesProject(project: ProjectContext): Promise<boolean>;
  abstract getDistName(project: ProjectContext): Promise<string | null>;
  abstract getVersion(project: ProjectContext): Promise<string | null>;
  abstract getDependencies(project: ProjectContext): Promise<Dependencies>;

  async getReadme(project: ProjectContext): Promise<string | null> {
    const path = await findFileByStem(project.directory, FILE_PATTERNS.README);
    return path ? basename(path) : null;
  }

  async getPackages(project: ProjectContext): Promise<Package[]> {
    if (project.config.sourceDirectory) {
      return detectPackages(join(project.directory, project.config.sourceDirectory));
    }
    for (const sourceDir of this.packageDirs) {
      const packages = await detectPackages(join(project.directory, sourceDir));
      if (packages.length > 0) {
        return packages;
      }
    }
    return [];
  }

  async getVersionRefs(project: ProjectContext): Promise<VersionRef[]> {
    const file = join(project.directory, FILE_PATTERNS.PYPROJECT_TOML);
    if (!(await exists(file))) {
      return [];
    }
    const ref = await matchVersionRefPattern(file, PYPROJECT_VERSION_PATTERN, null);
    return ref ? [ref] : [];
  }

  async getRequirementFiles(project: ProjectContext): Promise<string[]> {
    return project.hasPyproject ? [join(project.directory, FILE_PATTERNS.PYPROJECT_TOML)] : [];
  }

  toString(): string {
    return this.id;
  }
}
