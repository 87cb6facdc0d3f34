import { Command } from 'commander';
import { loadApplication } from '../cli/context.js';
import { describeRepository } from '../core/info/info-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';

export function setupInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the repository and its projects')
    .action(
      withErrorHandling(async (_options: Record<string, never>, command: Command) => {
        const app = await loadApplication(command);
        app.output.message(describeRepository(app).join('\n'));
      })
    );
}
