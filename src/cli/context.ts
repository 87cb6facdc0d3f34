/**
 * CLI Output Factory
 *
 * Picks the OutputPort for the CLI process: Clack on an interactive
 * terminal, plain console output in CI or when piped.
 */

import type { Command } from 'commander';
import { resolve } from 'path';
import { Application } from '../core/application.js';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true && process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function createCliOutput(options: { interactive?: boolean } = {}): OutputPort {
  if (detectInteractive(options.interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}

/**
 * Load the {@link Application} for a command, honouring the global `--cwd`.
 */
export async function loadApplication(command: Command): Promise<Application> {
  const globals: { cwd?: unknown } = command.optsWithGlobals();
  const cwd = typeof globals.cwd === 'string' ? resolve(process.cwd(), globals.cwd) : process.cwd();
  return Application.load({ cwd, output: createCliOutput() });
}
