import { join } from 'path';
import { loadChangelogConfig } from '../config.js';
import type { Project } from '../project/project.js';
import type { Repository } from '../repository/repository.js';
import { ChangelogManager } from './changelog.js';

/**
 * The changelog manager for `project`, or for the repository root when
 * `project` is null. Unless `changelog.enabled` says otherwise, changelogs are
 * writable for Python projects only, which keeps a monorepo root from growing
 * a changelog directory by accident.
 */
export async function getChangelogManager(repository: Repository, project: Project | null): Promise<ChangelogManager> {
  const source = project ?? repository;
  const config = loadChangelogConfig(await source.raw());
  const enabled = config.enabled ?? (project ? project.isPythonProject : false);
  return new ChangelogManager({
    directory: join(source.directory, config.directory),
    repositoryHost: repository.host,
    validTypes: config.validTypes,
    readonly: !enabled
  });
}
