import { relative } from 'path';
import type { VersionRef } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { getChangelogManager } from '../changelog/project-changelog.js';
import type { OutputPort } from '../ports/output.js';
import type { Project } from '../project/project.js';
import type { Repository } from '../repository/repository.js';
import { getSourceCodeVersionRefs } from './source-code-version.js';

export interface ReleasePluginContext {
  repository: Repository;
  output: OutputPort;
  /** Paths are shown relative to this directory. */
  cwd: string;
}

/**
 * Release plugins contribute version references and perform extra work when a
 * release is created. They are selected per project with `release.plugins`.
 */
export interface ReleasePlugin {
  readonly id: string;
  getVersionRefs(project: Project, context: ReleasePluginContext): Promise<VersionRef[]>;
  /**
   * Called after all version references were rewritten. Returns the files
   * that were (or, when `dry`, would be) changed.
   */
  createRelease(project: Project, version: string, dry: boolean, context: ReleasePluginContext): Promise<string[]>;
}

/**
 * Renames `_unreleased.toml` to the file of the new version.
 */
export const changelogReleasePlugin: ReleasePlugin = {
  id: 'changelog_release',

  async getVersionRefs(): Promise<VersionRef[]> {
    return [];
  },

  async createRelease(project, version, dry, context): Promise<string[]> {
    const manager = await getChangelogManager(context.repository, project);
    const unreleased = manager.unreleased();
    if (!(await unreleased.exists())) {
      return [];
    }
    const target = manager.version(version);
    context.output.info(`releasing changelog\n  ${relative(context.cwd, unreleased.path)} → ${relative(context.cwd, target.path)}`);
    if (!dry) {
      await unreleased.release(version);
    }
    return [unreleased.path, target.path];
  }
};

/**
 * Finds `__version__` in the project's packages.
 */
export const sourceCodeVersionPlugin: ReleasePlugin = {
  id: 'source_code_version',

  async getVersionRefs(project): Promise<VersionRef[]> {
    return getSourceCodeVersionRefs(project.id, project.packages);
  },

  async createRelease(): Promise<string[]> {
    return [];
  }
};

export const RELEASE_PLUGINS: ReadonlyMap<string, ReleasePlugin> = new Map(
  [changelogReleasePlugin, sourceCodeVersionPlugin].map((plugin): [string, ReleasePlugin] => [plugin.id, plugin])
);

export function getReleasePlugin(id: string): ReleasePlugin {
  const plugin = RELEASE_PLUGINS.get(id);
  if (!plugin) {
    throw new ConfigError(`Unknown release plugin "${id}" (available: ${[...RELEASE_PLUGINS.keys()].join(', ')})`, {
      key: 'release.plugins',
      value: id
    });
  }
  return plugin;
}
