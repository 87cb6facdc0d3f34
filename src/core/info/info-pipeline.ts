import { relative } from 'path';
import pico from 'picocolors';
import type { Dependency } from '../../types/index.js';
import type { Application } from '../application.js';
import { toPipRequirement } from '../project/dependency.js';
import { getRequiredProjects } from '../install/install-pipeline.js';

function dependencyLines(group: string, dependencies: Dependency[]): string[] {
  if (dependencies.length === 0) {
    return [`    ${group}: ${pico.italic('none')}`];
  }
  const sorted = dependencies.map(toPipRequirement).sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
  return [`    ${group}:`, ...sorted.map(item => `      - ${item}`)];
}

/**
 * `slipway info`: the repository and each of its Python projects, in
 * dependency order.
 */
export function describeRepository(app: Application): string[] {
  const repository = app.repository;
  const projects = repository.projects();
  const lines = [
    `Repository ${pico.bold(`"${repository.directory}"`)}`,
    `  vcs: ${repository.vcs ? 'git' : 'none'}`,
    `  host: ${repository.host ? repository.host.id : 'none'}`,
    `  projects: ${projects.map(project => project.id).join(', ') || 'none'}`
  ];

  for (const project of projects) {
    if (!project.isPythonProject) {
      continue;
    }
    const packages = project.packages.length === 0
      ? '[]'
      : project.packages.map(pkg => `${pkg.name} (${relative(project.directory, pkg.root) || '.'})`).join(', ');
    lines.push(
      `Project ${pico.bold(`"${relative(app.cwd, project.directory) || '.'}"`)} (id: ${project.id})`,
      `  version: ${project.version ?? 'none'}`,
      `  dist-name: ${project.distName ?? 'none'}`,
      `  packages: ${packages}`,
      `  readme: ${project.readme ?? 'none'}`,
      `  handler: ${project.handler?.id ?? 'none'}`
    );
    const required = getRequiredProjects(project, projects);
    if (required.length > 0) {
      lines.push(`  depends on: ${required.map(item => item.distName ?? item.id).join(', ')}`);
    }
    lines.push('  dependencies:');
    lines.push(...dependencyLines('run', project.dependencies.run));
    lines.push(...dependencyLines('dev', project.dependencies.dev));
    for (const [extra, dependencies] of Object.entries(project.dependencies.extra)) {
      lines.push(...dependencyLines(`extra.${extra}`, dependencies));
    }
  }
  return lines;
}
