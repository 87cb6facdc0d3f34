#!/usr/bin/env node

import { Command } from 'commander';
import { stat } from 'fs/promises';
import * as path from 'path';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/version.js';

import { setupChangelogCommand } from './commands/changelog.js';
import { setupCheckCommand } from './commands/check.js';
import { setupInfoCommand } from './commands/info.js';
import { setupInstallCommand } from './commands/install.js';
import { setupPublishCommand } from './commands/publish.js';
import { setupReleaseCommand } from './commands/release.js';

/**
 * slipway CLI - Main entry point
 *
 * Release lifecycle tooling for Python projects and monorepos.
 */

const program = new Command();

program
  .name('slipway')
  .description('slipway - release lifecycle tooling for Python projects')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

setupInfoCommand(program);
setupCheckCommand(program);
setupReleaseCommand(program);
setupChangelogCommand(program);
setupInstallCommand(program);
setupPublishCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();
  if (typeof opts.cwd !== 'string') {
    logger.debug(`Working directory: ${process.cwd()}`);
    return;
  }
  const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
  try {
    if (!(await stat(resolvedCwd)).isDirectory()) {
      throw new Error(`'${opts.cwd}' is not a directory`);
    }
    logger.debug(`Working directory will be: ${resolvedCwd}`);
  } catch (err) {
    const errMsg = err instanceof Error ? err.message : String(err);
    logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
    console.error(`error: invalid --cwd '${opts.cwd}': ${errMsg}`);
    process.exit(1);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error(error.stack ?? error.message);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error(reason instanceof Error ? reason.stack ?? reason.message : String(reason));
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('slipway')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { program };
