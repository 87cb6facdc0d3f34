import { Command } from 'commander';
import { loadApplication } from '../cli/context.js';
import type { Application } from '../core/application.js';
import type { ChangelogManager } from '../core/changelog/changelog.js';
import {
  AddEntryOptions,
  ConvertOptions,
  FormatOptions,
  addChangelogEntry,
  convertChangelogs,
  formatChangelogs
} from '../core/changelog/changelog-pipeline.js';
import { getChangelogManager } from '../core/changelog/project-changelog.js';
import { CHANGELOG_DEFAULTS } from '../constants/index.js';
import { ExitCodeError, withErrorHandling } from '../utils/errors.js';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function loadManager(command: Command): Promise<{ app: Application; manager: ChangelogManager }> {
  const app = await loadApplication(command);
  const manager = await getChangelogManager(app.repository, app.mainProject() ?? null);
  return { app, manager };
}

export function setupChangelogCommand(program: Command): void {
  const changelog = program
    .command('changelog')
    .description('Manage structured changelogs');

  changelog
    .command('add')
    .description('Add an entry to the unreleased changelog')
    .option('-t, --type <type>', `the type of the change, one of ${CHANGELOG_DEFAULTS.VALID_TYPES.join(', ')} unless configured`)
    .option('-d, --description <text>', 'a Markdown description of the change')
    .option('-a, --author <name>', 'your username or email, defaults to the Git author')
    .option('--pr <ref>', 'the pull request that introduces the change')
    .option('-i, --issues <ref>', 'an issue the change relates to (repeatable)', collect)
    .option('-c, --commit', 'commit the staged changes together with the changelog')
    .action(
      withErrorHandling(async (options: AddEntryOptions, command: Command) => {
        const { app, manager } = await loadManager(command);
        await addChangelogEntry(app, manager, options);
      })
    );

  changelog
    .command('format')
    .argument('[version]', 'the changelog version to format')
    .description('Render changelogs in the terminal or as Markdown')
    .option('-m, --markdown', 'render Markdown')
    .option('-a, --all', 'render all changelogs, newest first')
    .action(
      withErrorHandling(async (version: string | undefined, options: Omit<FormatOptions, 'version'>, command: Command) => {
        const { app, manager } = await loadManager(command);
        const lines = await formatChangelogs(manager, { ...options, version }, app.output);
        app.output.message(lines.join('\n'));
      })
    );

  changelog
    .command('convert')
    .description('Convert YAML changelogs to TOML changelogs')
    .option('-a, --author <name>', 'the author for entries that name none')
    .option('--directory <dir>', 'where the YAML changelogs are, defaults to the changelog directory')
    .option('--dry', 'print the converted changelogs instead of writing them')
    .option('-x, --fail-fast', 'stop at the first file that cannot be converted')
    .action(
      withErrorHandling(async (options: ConvertOptions, command: Command) => {
        const { app, manager } = await loadManager(command);
        const code = await convertChangelogs(app, manager, options);
        if (code !== 0) {
          throw new ExitCodeError(code);
        }
      })
    );
}
