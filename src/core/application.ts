import { dirname, join, relative, resolve } from 'path';
import { FILE_PATTERNS } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';
import { isFile } from '../utils/fs.js';
import { Vcs, detectVcs } from '../utils/git.js';
import { logger } from '../utils/logger.js';
import type { ConfigurationSource } from './config.js';
import type { OutputPort } from './ports/output.js';
import type { Project } from './project/project.js';
import type { RepositoryHost } from './repository/host.js';
import { Repository } from './repository/repository.js';

export interface ApplicationOptions {
  cwd: string;
  output: OutputPort;
  /** Defaults to the Git work tree around `cwd`, if any. */
  vcs?: Vcs | null;
  host?: RepositoryHost | null;
}

/**
 * The repository root for `directory`: the closest parent holding a
 * `slipway.toml`, searched up to the root of the Git work tree. Without one,
 * `directory` itself is the root.
 */
export async function findRepositoryRoot(directory: string, vcs: Vcs | null): Promise<string> {
  const start = resolve(directory);
  const toplevel = vcs ? await vcs.getToplevel() : null;
  if (toplevel === null || resolve(toplevel) === start) {
    return start;
  }
  const root = resolve(toplevel);
  if (relative(root, start).startsWith('..')) {
    return start;
  }

  let current = start;
  for (;;) {
    if (await isFile(join(current, FILE_PATTERNS.SLIPWAY_TOML))) {
      return current;
    }
    if (current === root) {
      break;
    }
    current = dirname(current);
  }
  logger.warn(`No ${FILE_PATTERNS.SLIPWAY_TOML} found between ${start} and ${root}, using ${start} as the repository root`);
  return start;
}

/**
 * Everything a command works with: the repository around the working
 * directory and the output port to talk to the user.
 */
export class Application {
  private constructor(
    readonly cwd: string,
    readonly repository: Repository,
    readonly output: OutputPort
  ) {}

  static async load(options: ApplicationOptions): Promise<Application> {
    const cwd = resolve(options.cwd);
    const vcs = options.vcs !== undefined ? options.vcs : await detectVcs(cwd);
    const root = await findRepositoryRoot(cwd, vcs);
    const repository = await Repository.load(root, { vcs, host: options.host });
    return new Application(cwd, repository, options.output);
  }

  /**
   * The project in the working directory, if there is one.
   */
  mainProject(): Project | undefined {
    return this.repository.projectAt(this.cwd);
  }

  /**
   * The repository followed by every project, leaving out the repository
   * when a project lives in its root.
   */
  configurations(): ConfigurationSource[] {
    const projects = this.repository.projects();
    return projects.some(project => project.directory === this.repository.directory)
      ? projects
      : [this.repository, ...projects];
  }

  /**
   * The projects a command acts on. `only` lists project directories relative
   * to the working directory; otherwise it is the main project, or every
   * project when running from the repository root.
   */
  targetProjects(only?: string[]): Project[] {
    if (only !== undefined) {
      return only.map(item => {
        const project = this.repository.projectAt(resolve(this.cwd, item));
        if (!project) {
          throw new ValidationError(`"${item}" does not point to a project`);
        }
        return project;
      });
    }
    const main = this.mainProject();
    if (main) {
      return [main];
    }
    return this.cwd === this.repository.directory ? this.repository.projects() : [];
  }
}
