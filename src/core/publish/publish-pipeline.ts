import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { listFiles, remove } from '../../utils/fs.js';
import { runCommand } from '../../utils/process.js';
import type { Application } from '../application.js';
import { sortProjects } from '../graph/dependency-graph.js';

export interface PublishOptions {
  python?: string;
  /** Twine repository name from `~/.pypirc`. */
  repository?: string;
  /** Keep the distributions here instead of a temporary directory. */
  buildDirectory?: string;
  dry?: boolean;
}

/**
 * The commands `slipway publish` runs, in order: one `python -m build` per
 * project, then a single `twine upload` of everything that was built.
 */
export function buildCommands(projectDirs: string[], outdir: string, python: string): string[][] {
  return projectDirs.map(directory => [python, '-m', 'build', '--sdist', '--wheel', '--outdir', outdir, directory]);
}

export function uploadCommand(distributions: string[], python: string, repository?: string): string[] {
  return [python, '-m', 'twine', 'upload', ...(repository ? ['--repository', repository] : []), ...distributions];
}

/**
 * Build the target projects in dependency order and upload them with twine.
 * `dry` builds without uploading. Resolves to the exit code.
 */
export async function runPublishPipeline(app: Application, options: PublishOptions): Promise<number> {
  const output = app.output;
  const python = options.python ?? process.env.PYTHON ?? 'python';
  const projects = sortProjects(app.targetProjects().filter(project => project.isPythonProject), { dev: true, build: true });
  if (projects.length === 0) {
    output.info('no projects to publish');
    return 0;
  }

  const temporary = options.buildDirectory === undefined;
  const outdir = options.buildDirectory !== undefined
    ? resolve(app.cwd, options.buildDirectory)
    : await mkdtemp(join(tmpdir(), 'slipway-publish-'));

  try {
    const commands = buildCommands(projects.map(project => project.directory), outdir, python);
    for (const [index, [command, ...args]] of commands.entries()) {
      output.step(`Build ${projects[index].distName ?? projects[index].id}`);
      const code = await runCommand(command, args, app.cwd);
      if (code !== 0) {
        output.error(`building ${projects[index].id} failed with exit code ${code}`);
        return code;
      }
    }

    const distributions = (await listFiles(outdir))
      .filter(name => name.endsWith('.whl') || name.endsWith('.tar.gz'))
      .map(name => join(outdir, name));
    for (const file of distributions) {
      output.message(`  ${file}`);
    }
    if (options.dry) {
      return 0;
    }

    output.step('Publishing');
    const [command, ...args] = uploadCommand(distributions, python, options.repository);
    return await runCommand(command, args, app.cwd);
  } finally {
    if (temporary) {
      await remove(outdir);
    }
  }
}
