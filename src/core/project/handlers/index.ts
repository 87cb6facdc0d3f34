import { ConfigError } from '../../../utils/errors.js';
import type { ProjectContext, ProjectHandler } from './base.js';
import { FlitProjectHandler } from './flit.js';
import { PoetryProjectHandler } from './poetry.js';
import { SetuptoolsProjectHandler } from './setuptools.js';

export type { ProjectContext, ProjectHandler } from './base.js';

/**
 * Registered project handlers. Order is match order.
 */
export const PROJECT_HANDLERS: readonly ProjectHandler[] = [
  new PoetryProjectHandler(),
  new FlitProjectHandler(),
  new SetuptoolsProjectHandler()
];

export function getProjectHandler(id: string): ProjectHandler {
  const handler = PROJECT_HANDLERS.find(candidate => candidate.id === id);
  if (!handler) {
    throw new ConfigError(`Unknown project handler "${id}" (known: ${PROJECT_HANDLERS.map(h => h.id).join(', ')})`, { key: 'handler', value: id });
  }
  return handler;
}

/**
 * The handler for a project: the configured one, or the first registered
 * handler that recognizes it. `null` when nothing matches.
 */
export async function resolveProjectHandler(project: ProjectContext): Promise<ProjectHandler | null> {
  if (project.config.handler) {
    const handler = getProjectHandler(project.config.handler);
    if (!(await handler.matchesProject(project))) {
      throw new ConfigError(`Project handler "${handler.id}" does not match the project in ${project.directory}`, { key: 'handler' });
    }
    return handler;
  }
  for (const handler of PROJECT_HANDLERS) {
    if (await handler.matchesProject(project)) {
      return handler;
    }
  }
  return null;
}
