import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { runCommand } from '../../utils/process.js';
import type { Application } from '../application.js';
import { InstallConfig, loadInstallConfig } from '../config.js';
import { buildDependencyGraph, sortProjects } from '../graph/dependency-graph.js';
import { normalizeDistName, parseRequirement, toPipRequirement } from '../project/dependency.js';
import type { Project } from '../project/project.js';

export interface InstallOptions {
  /** Directory of the single project to install, with the projects it requires. */
  only?: string;
  /** `--no-dev` sets this to false. */
  dev?: boolean;
  /** `--no-root` sets this to false. */
  root?: boolean;
  /** Comma separated extras to install in addition. */
  extras?: string;
  /** Comma separated extras to install instead of the projects. */
  onlyExtras?: string;
  python?: string;
  dry?: boolean;
}

export interface InstallPlan {
  /** Local project directories, in dependency order. */
  projects: string[];
  /** External requirements in pip syntax. */
  requirements: string[];
  command: string[];
}

function splitCommas(value: string | undefined): string[] {
  return (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Every project `project` requires at run time, transitively, in repository
 * order.
 */
export function getRequiredProjects(project: Project, projects: Project[]): Project[] {
  const graph = buildDependencyGraph(projects);
  const required = new Set<string>();
  const pending = [project.id];
  for (let id = pending.pop(); id !== undefined; id = pending.pop()) {
    for (const predecessor of graph.predecessors(id)) {
      if (!required.has(predecessor)) {
        required.add(predecessor);
        pending.push(predecessor);
      }
    }
  }
  return projects.filter(item => required.has(item.id));
}

/**
 * Work out what `pip install` has to be given: the local projects first, in
 * dependency order, then the external requirements of the selected
 * dependency groups and extras.
 */
export async function buildInstallPlan(app: Application, options: InstallOptions): Promise<InstallPlan> {
  if (options.extras !== undefined && options.onlyExtras !== undefined) {
    throw new ValidationError('conflicting options --only-extras and --extras');
  }
  const dev = options.dev ?? true;
  const root = options.root ?? true;
  const onlyExtras = options.onlyExtras !== undefined;
  const repository = app.repository;
  // Development requirements have to be installed first as well
  const all = sortProjects(repository.projects(), { dev: true });

  let targets: Project[];
  let required: Project[] = [];
  if (options.only !== undefined) {
    targets = app.targetProjects([options.only]);
    required = getRequiredProjects(targets[0], all).filter(item => !targets.includes(item));
  } else {
    targets = all;
  }

  const configs = new Map<string, InstallConfig>();
  for (const source of app.configurations()) {
    configs.set(source.directory, loadInstallConfig(await source.raw()));
  }

  const extras = new Set(splitCommas(options.extras ?? options.onlyExtras));
  const found = new Set(['dev']);
  const repositoryConfig = configs.get(repository.directory);
  if (dev && repositoryConfig?.devExtras) {
    repositoryConfig.devExtras.forEach(extra => extras.add(extra));
  }

  const localDirs: string[] = [];
  const localNames = new Set<string>();
  const requirements: string[] = [];
  const ordered = all.filter(project => targets.includes(project) || required.includes(project));

  for (const project of ordered) {
    if (!project.isPythonProject) {
      continue;
    }
    if (root && !onlyExtras && project.packages.length > 0) {
      localDirs.push(project.directory);
      if (project.distName) {
        localNames.add(normalizeDistName(project.distName));
      }
    } else if (!onlyExtras) {
      requirements.push(...project.dependencies.run.map(toPipRequirement));
    }
  }

  for (const project of targets) {
    if (!project.isPythonProject) {
      continue;
    }
    if ((dev && !onlyExtras) || extras.has('dev')) {
      requirements.push(...project.dependencies.dev.map(toPipRequirement));
    }
    const config = configs.get(project.directory);
    const projectExtras = new Set(extras);
    if (dev) {
      if (config?.devExtras === undefined) {
        Object.keys(project.dependencies.extra).forEach(extra => projectExtras.add(extra));
        Object.keys(config?.extras ?? {}).forEach(extra => projectExtras.add(extra));
      } else {
        config.devExtras.forEach(extra => projectExtras.add(extra));
      }
    }
    for (const extra of projectExtras) {
      const deps = project.dependencies.extra[extra];
      if (extra !== 'dev' && deps !== undefined) {
        found.add(extra);
        requirements.push(...deps.map(toPipRequirement));
      }
    }
  }

  for (const config of configs.values()) {
    for (const extra of extras) {
      const deps = config.extras[extra];
      if (deps !== undefined) {
        found.add(extra);
        requirements.push(...deps);
      }
    }
  }

  const missing = [...extras].filter(extra => !found.has(extra));
  if (missing.length > 0) {
    throw new ValidationError(`extras that do not exist: ${missing.join(', ')}`);
  }

  // Requirements on projects installed from their directories stay local
  const external = [...new Set(requirements)].filter(requirement => {
    const parsed = parseRequirement(requirement);
    return !parsed || !localNames.has(normalizeDistName(parsed.name));
  });

  const python = options.python ?? process.env.PYTHON ?? 'python';
  return {
    projects: localDirs,
    requirements: external,
    command: [python, '-m', 'pip', 'install', ...localDirs, ...external]
  };
}

/**
 * `slipway install`. Resolves to pip's exit code.
 */
export async function runInstallPipeline(app: Application, options: InstallOptions): Promise<number> {
  const plan = await buildInstallPlan(app, options);
  if (plan.projects.length === 0 && plan.requirements.length === 0) {
    app.output.info('nothing to install');
    return 0;
  }
  const [command, ...args] = plan.command;
  app.output.step(`$ ${plan.command.join(' ')}`);
  if (options.dry) {
    return 0;
  }
  logger.debug('Installing with pip', plan);
  return runCommand(command, args, app.cwd);
}
