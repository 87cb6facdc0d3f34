import { Command } from 'commander';
import { join } from 'path';
import { loadApplication } from '../cli/context.js';
import { TtlCache, getCacheDirectory } from '../core/cache/ttl-cache.js';
import { formatChecks, formatSummary, runChecks } from '../core/checks/index.js';
import { isStringList } from '../core/external/cached-list.js';
import { ExitCodeError, withErrorHandling } from '../utils/errors.js';

interface CheckCommandOptions {
  showSkipped?: boolean;
  warningsAsErrors?: boolean;
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Run sanity checks on your Python projects')
    .option('--show-skipped', 'show skipped checks')
    .option('-w, --warnings-as-errors', 'treat warnings as errors')
    .action(
      withErrorHandling(async (options: CheckCommandOptions, command: Command) => {
        const app = await loadApplication(command);
        const cache = new TtlCache<string[]>(join(getCacheDirectory(), 'lists.json'));
        await cache.load(isStringList);

        const result = await runChecks(
          { repository: app.repository, output: app.output, cwd: app.cwd, cache },
          { showSkipped: options.showSkipped, warningsAsErrors: options.warningsAsErrors }
        );
        await cache.save();

        for (const section of result.sections) {
          const lines = formatChecks(section.checks, options.showSkipped);
          if (lines.length === 0) {
            continue;
          }
          const title = section.project === null
            ? 'Global checks:'
            : app.repository.isMonorepo ? `Checks for project ${section.project.id}` : undefined;
          app.output.message([...(title ? [title] : []), ...lines, ''].join('\n'));
        }
        app.output.message(formatSummary(result));
        if (result.exitCode !== 0) {
          throw new ExitCodeError(result.exitCode);
        }
      })
    );
}
