import { Command } from 'commander';
import { loadApplication } from '../cli/context.js';
import { PublishOptions, runPublishPipeline } from '../core/publish/publish-pipeline.js';
import { ExitCodeError, withErrorHandling } from '../utils/errors.js';

export function setupPublishCommand(program: Command): void {
  program
    .command('publish')
    .description('Build the projects and upload them with twine')
    .option('-r, --repository <name>', 'the repository to upload to, as named in ~/.pypirc')
    .option('--python <exe>', 'the Python executable that runs build and twine')
    .option('-b, --build-directory <dir>', 'keep the distributions in this directory')
    .option('-d, --dry', 'build, but do not upload')
    .action(
      withErrorHandling(async (options: PublishOptions, command: Command) => {
        const app = await loadApplication(command);
        const code = await runPublishPipeline(app, options);
        if (code !== 0) {
          throw new ExitCodeError(code);
        }
      })
    );
}
