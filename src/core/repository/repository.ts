import { join, relative, resolve, sep } from 'path';
import { minimatch } from 'minimatch';
import { FILE_PATTERNS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { exists, findFileByStem, isDirectory, listDirectories } from '../../utils/fs.js';
import { Vcs, detectVcs } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';
import { ConfigurationSource, RepositoryConfig, loadRepositoryConfig } from '../config.js';
import { sortProjects } from '../graph/dependency-graph.js';
import { Project } from '../project/project.js';
import type { RepositoryHost } from './host.js';
import { GithubRepositoryHost } from './hosts/github.js';

const MAX_INCLUDE_DEPTH = 4;

export interface RepositoryLoadOptions {
  /** Use this VCS instead of detecting one; `null` disables VCS support. */
  vcs?: Vcs | null;
  /** Use this host instead of detecting one; `null` disables host support. */
  host?: RepositoryHost | null;
}

function hasGlobMagic(pattern: string): boolean {
  return /[*?[\]{}!]/.test(pattern);
}

async function hasProjectFile(directory: string): Promise<boolean> {
  for (const file of [FILE_PATTERNS.PYPROJECT_TOML, FILE_PATTERNS.SETUP_CFG, FILE_PATTERNS.SETUP_PY]) {
    if (await exists(join(directory, file))) {
      return true;
    }
  }
  return false;
}

async function collectDirectories(root: string, directory: string, depth: number, out: string[]): Promise<void> {
  if (depth > MAX_INCLUDE_DEPTH) {
    return;
  }
  for (const name of await listDirectories(directory)) {
    if (name.startsWith('.') || name === 'node_modules' || name === '__pycache__') {
      continue;
    }
    const path = join(directory, name);
    out.push(relative(root, path).split(sep).join('/'));
    await collectDirectories(root, path, depth + 1, out);
  }
}

/**
 * Directories of the projects in a repository: the root when it has a
 * `pyproject.toml`, plus either the configured `include` entries (globs are
 * matched against subdirectories that look like Python projects) or every
 * immediate subdirectory with a `pyproject.toml`.
 */
export async function discoverProjectDirectories(directory: string, config: RepositoryConfig): Promise<string[]> {
  const result: string[] = [];
  const hasRootProject = await exists(join(directory, FILE_PATTERNS.PYPROJECT_TOML));
  if (hasRootProject) {
    result.push(directory);
  }

  if (config.include === undefined || !hasRootProject) {
    for (const name of await listDirectories(directory)) {
      if (!name.startsWith('.') && (await exists(join(directory, name, FILE_PATTERNS.PYPROJECT_TOML)))) {
        result.push(join(directory, name));
      }
    }
    return result;
  }

  let candidates: string[] | null = null;
  for (const pattern of config.include) {
    if (!hasGlobMagic(pattern)) {
      const path = resolve(directory, pattern);
      if (!(await isDirectory(path))) {
        throw new ConfigError(`repository.include entry "${pattern}" is not a directory`, { key: 'repository.include', value: pattern });
      }
      result.push(path);
      continue;
    }
    if (candidates === null) {
      candidates = [];
      await collectDirectories(directory, directory, 0, candidates);
    }
    for (const candidate of candidates) {
      const path = join(directory, candidate);
      if (minimatch(candidate, pattern) && !result.includes(path) && (await hasProjectFile(path))) {
        result.push(path);
      }
    }
  }
  return result;
}

/**
 * Parse `repository-host`, written as `<host>:<repo>` (e.g. `github:owner/name`).
 */
export function parseRepositoryHost(value: string): RepositoryHost {
  const [kind, repo] = value.split(/:(.*)/s, 2);
  if (kind === 'github' && repo) {
    return new GithubRepositoryHost(repo);
  }
  throw new ConfigError(`Unsupported repository-host "${value}" (expected "github:<owner>/<repo>")`, { key: 'repository.repository-host', value });
}

/**
 * A directory with one or more projects, usually a single VCS checkout.
 */
export class Repository extends ConfigurationSource {
  private constructor(
    directory: string,
    readonly config: RepositoryConfig,
    private readonly orderedProjects: Project[],
    readonly vcs: Vcs | null,
    readonly host: RepositoryHost | null
  ) {
    super(directory);
  }

  static async load(directory: string, options: RepositoryLoadOptions = {}): Promise<Repository> {
    const source = new ConfigurationSource(resolve(directory));
    const config = loadRepositoryConfig(await source.raw());

    const projects: Project[] = [];
    for (const path of await discoverProjectDirectories(source.directory, config)) {
      projects.push(await Project.load(path));
    }
    const seen = new Map<string, Project>();
    for (const project of projects) {
      const other = seen.get(project.id);
      if (other) {
        throw new ConfigError(`Duplicate project id "${project.id}" (${other.directory} and ${project.directory})`);
      }
      seen.set(project.id, project);
    }

    const vcs = options.vcs !== undefined ? options.vcs : await detectVcs(source.directory);
    let host: RepositoryHost | null = null;
    if (options.host !== undefined) {
      host = options.host;
    } else if (config.repositoryHost) {
      host = parseRepositoryHost(config.repositoryHost);
    } else if (vcs) {
      host = GithubRepositoryHost.fromRemotes(await vcs.getRemotes());
    }

    const ordered = sortProjects([...projects].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)));
    logger.debug(`Loaded repository ${source.directory}`, { projects: ordered.map(project => project.id) });
    return new Repository(source.directory, config, ordered, vcs, host);
  }

  /**
   * Projects ordered by their run requirements, ties by id.
   */
  projects(): Project[] {
    return [...this.orderedProjects];
  }

  get isMonorepo(): boolean {
    const projects = this.orderedProjects;
    return projects.length > 1 || (projects.length === 1 && projects[0].directory !== this.directory);
  }

  /**
   * The project living in `directory`, if any.
   */
  projectAt(directory: string): Project | undefined {
    const wanted = resolve(directory);
    return this.orderedProjects.find(project => project.directory === wanted);
  }

  /**
   * Whether the directory looks like a repository root at all.
   */
  async isRecognized(): Promise<boolean> {
    if ((await this.pyprojectToml.exists()) || (await this.slipwayToml.exists())) {
      return true;
    }
    return (await findFileByStem(this.directory, 'readme', { caseSensitive: false })) !== null
      || (await findFileByStem(this.directory, 'license', { caseSensitive: false })) !== null
      || this.orderedProjects.length > 0;
  }
}
