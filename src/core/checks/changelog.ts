import { basename } from 'path';
import type { ChangelogEntry } from '../changelog/changelog.js';
import { getChangelogManager } from '../changelog/project-changelog.js';
import type { Project } from '../project/project.js';
import { Check, CheckContext, CheckPlugin, CheckResult, check } from './check.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validates the structured changelog files of a project, if any.
 */
export const changelogChecks: CheckPlugin = {
  id: 'changelog',

  async getProjectChecks(project: Project, context: CheckContext): Promise<Check[]> {
    const manager = await getChangelogManager(context.repository, project);
    const changelogs = await manager.all();
    if (changelogs.length === 0) {
      return [check('validate', CheckResult.SKIPPED)];
    }

    const badFiles: string[] = [];
    const badEntries: string[] = [];
    for (const changelog of changelogs) {
      const name = basename(changelog.path);
      let entries: ChangelogEntry[];
      try {
        entries = (await changelog.load()).entries;
      } catch (error) {
        badFiles.push(`${name}: ${describe(error)}`);
        continue;
      }
      for (const entry of entries) {
        try {
          manager.validateEntry(entry);
        } catch (error) {
          badEntries.push(`${name}: id="${entry.id}": ${describe(error)}`);
        }
      }
    }

    if (badFiles.length > 0 || badEntries.length > 0) {
      return [check('validate', CheckResult.ERROR, 'Broken or invalid changelogs', [...badFiles, ...badEntries].join('\n'))];
    }
    return [check('validate', CheckResult.OK, `All ${changelogs.length} changelogs are valid.`)];
  }
};
