import { Command } from 'commander';
import { loadApplication } from '../cli/context.js';
import { ReleaseOptions, runReleasePipeline } from '../core/release/release-pipeline.js';
import { VERSION_RULES } from '../core/release/version-rules.js';
import { ExitCodeError, withErrorHandling } from '../utils/errors.js';

export function setupReleaseCommand(program: Command): void {
  program
    .command('release')
    .argument('[version]', `target version, or one of the rules ${[...VERSION_RULES.keys()].join(', ')}`)
    .description('Bump the version across all version references, optionally commit, tag and push')
    .option('-t, --tag', 'create a commit and a Git tag after the version numbers were updated')
    .option('-p, --push', 'push the commit and the tag to the Git remote')
    .option('-r, --remote <name>', 'the Git remote to push to (only with --push)')
    .option('-d, --dry', 'do not write changes to disk')
    .option('-f, --force', 'release a lower version, force tag creation and push')
    .option('--validate', 'check that all version references are consistent (and match [version], if given)')
    .option('--no-branch-check', 'do not require the configured release branch')
    .option('--no-worktree-check', 'do not check the state of the Git worktree')
    .action(
      withErrorHandling(async (version: string | undefined, options: ReleaseOptions, command: Command) => {
        const app = await loadApplication(command);
        const code = await runReleasePipeline(app, version, options);
        if (code !== 0) {
          throw new ExitCodeError(code);
        }
      })
    );
}
