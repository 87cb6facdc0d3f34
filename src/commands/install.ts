import { Command } from 'commander';
import { loadApplication } from '../cli/context.js';
import { InstallOptions, runInstallPipeline } from '../core/install/install-pipeline.js';
import { ExitCodeError, withErrorHandling } from '../utils/errors.js';

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install the projects and their dependencies with pip')
    .option('--only <dir>', 'install only this project and the projects it requires')
    .option('--no-dev', 'do not install development dependencies')
    .option('--no-root', 'install the dependencies but not the projects themselves')
    .option('--extras <names>', 'comma separated extras to install as well ("dev" is valid)')
    .option('--only-extras <names>', 'install only these extras')
    .option('--python <exe>', 'the Python executable to install with (default: $PYTHON or python)')
    .option('--dry', 'print the pip command without running it')
    .action(
      withErrorHandling(async (options: InstallOptions, command: Command) => {
        const app = await loadApplication(command);
        const code = await runInstallPipeline(app, options);
        if (code !== 0) {
          throw new ExitCodeError(code);
        }
      })
    );
}
