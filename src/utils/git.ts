import { isAbsolute, join, resolve } from 'path';
import { VcsError } from './errors.js';
import { logger } from './logger.js';
import { captureCommand, describeFailure } from './process.js';

export interface Remote {
  name: string;
  fetchUrl: string;
  pushUrl: string;
}

export interface Author {
  name?: string;
  email?: string;
}

/**
 * One line of `git status --porcelain`: a two character mode (index, worktree)
 * and the path relative to the repository root.
 */
export interface FileStatus {
  mode: string;
  path: string;
}

/**
 * Version control operations used by the release workflow and repository
 * host detection.
 */
export interface Vcs {
  getToplevel(): Promise<string | null>;
  revParse(ref: string): Promise<string | null>;
  revList(range: string): Promise<string[]>;
  getRemotes(): Promise<Remote[]>;
  getAuthor(): Promise<Author>;
  getCurrentBranch(): Promise<string | null>;
  /** Absolute paths of all tracked files. */
  getTrackedFiles(): Promise<string[]>;
  getStatus(): Promise<FileStatus[]>;
  add(files: string[]): Promise<void>;
  commit(message: string, options?: { allowEmpty?: boolean }): Promise<void>;
  tag(name: string, options?: { force?: boolean }): Promise<void>;
  push(remote: string, refs: string[], options?: { force?: boolean }): Promise<void>;
}

/**
 * {@link Vcs} backed by the `git` executable.
 */
export class Git implements Vcs {
  constructor(private readonly cwd: string) {}

  private async run(args: string[]): Promise<string> {
    try {
      return await captureCommand('git', args, this.cwd);
    } catch (error) {
      const failure = describeFailure(error);
      throw new VcsError(`Git command failed (git ${args.join(' ')}): ${failure.message}`, { args, exitCode: failure.exitCode });
    }
  }

  private async tryRun(args: string[]): Promise<string | null> {
    try {
      return await captureCommand('git', args, this.cwd);
    } catch (error) {
      logger.debug(`git ${args.join(' ')} failed`, describeFailure(error));
      return null;
    }
  }

  async getToplevel(): Promise<string | null> {
    const output = await this.tryRun(['rev-parse', '--show-toplevel']);
    return output === null ? null : output.trim();
  }

  async revParse(ref: string): Promise<string | null> {
    const output = await this.tryRun(['rev-parse', '--verify', '--quiet', ref]);
    return output === null || output.trim() === '' ? null : output.trim();
  }

  async revList(range: string): Promise<string[]> {
    return splitLines(await this.run(['rev-list', range]));
  }

  async getRemotes(): Promise<Remote[]> {
    const remotes = new Map<string, Remote>();
    for (const line of splitLines(await this.run(['remote', '-v']))) {
      const match = /^(\S+)\s+(\S+)\s+\((fetch|push)\)$/.exec(line);
      if (!match) {
        continue;
      }
      const [, name, url, kind] = match;
      const remote = remotes.get(name) ?? { name, fetchUrl: url, pushUrl: url };
      if (kind === 'fetch') {
        remote.fetchUrl = url;
      } else {
        remote.pushUrl = url;
      }
      remotes.set(name, remote);
    }
    return [...remotes.values()];
  }

  async getAuthor(): Promise<Author> {
    const name = (await this.tryRun(['config', 'user.name']))?.trim();
    const email = (await this.tryRun(['config', 'user.email']))?.trim();
    return { name: name || undefined, email: email || undefined };
  }

  async getCurrentBranch(): Promise<string | null> {
    const output = await this.tryRun(['symbolic-ref', '--short', '-q', 'HEAD']);
    return output === null || output.trim() === '' ? null : output.trim();
  }

  async getTrackedFiles(): Promise<string[]> {
    const toplevel = (await this.getToplevel()) ?? this.cwd;
    const output = await this.run(['ls-files', '--full-name']);
    return splitLines(output).map(file => resolve(toplevel, file));
  }

  async getStatus(): Promise<FileStatus[]> {
    const output = await this.run(['status', '--porcelain']);
    return output
      .split('\n')
      .filter(line => line.length > 3)
      .map(line => ({ mode: line.slice(0, 2), path: line.slice(3) }));
  }

  async add(files: string[]): Promise<void> {
    if (files.length === 0) {
      return;
    }
    await this.run(['add', '--', ...files.map(file => (isAbsolute(file) ? file : join(this.cwd, file)))]);
  }

  async commit(message: string, options: { allowEmpty?: boolean } = {}): Promise<void> {
    await this.run(['commit', '-m', message, ...(options.allowEmpty ? ['--allow-empty'] : [])]);
  }

  async tag(name: string, options: { force?: boolean } = {}): Promise<void> {
    await this.run(['tag', name, ...(options.force ? ['-f'] : [])]);
  }

  async push(remote: string, refs: string[], options: { force?: boolean } = {}): Promise<void> {
    await this.run(['push', remote, ...refs, ...(options.force ? ['--force'] : [])]);
  }
}

function splitLines(output: string): string[] {
  return output.split('\n').map(line => line.trim()).filter(line => line.length > 0);
}

/**
 * A {@link Git} for `directory`, or `null` outside of a work tree.
 */
export async function detectVcs(directory: string): Promise<Vcs | null> {
  const git = new Git(directory);
  return (await git.getToplevel()) === null ? null : git;
}
