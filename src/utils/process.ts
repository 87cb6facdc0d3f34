import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandFailure {
  message: string;
  exitCode?: number;
}

/**
 * Best-effort description of a failed child process: its stderr when there is
 * one, the error message otherwise.
 */
export function describeFailure(error: unknown): CommandFailure {
  if (error instanceof Error) {
    const stderr = 'stderr' in error && (typeof error.stderr === 'string' || Buffer.isBuffer(error.stderr))
      ? error.stderr.toString().trim()
      : '';
    const exitCode = 'code' in error && typeof error.code === 'number' ? error.code : undefined;
    return { message: stderr || error.message, exitCode };
  }
  return { message: String(error) };
}

/**
 * Run a command and capture its stdout.
 */
export async function captureCommand(command: string, args: string[], cwd?: string): Promise<string> {
  logger.debug(`$ ${command} ${args.join(' ')}`, { cwd });
  const { stdout } = await execFileAsync(command, args, { cwd, maxBuffer: 64 * 1024 * 1024 });
  return stdout;
}

/**
 * Run a command with inherited stdio and resolve to its exit code.
 */
export function runCommand(command: string, args: string[], cwd?: string): Promise<number> {
  logger.debug(`$ ${command} ${args.join(' ')}`, { cwd });
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', code => resolve(code ?? 1));
  });
}
