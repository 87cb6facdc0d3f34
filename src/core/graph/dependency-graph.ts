import type { Dependencies, Dependency } from '../../types/index.js';
import { normalizeDistName } from '../project/dependency.js';
import { logger } from '../../utils/logger.js';
import { DiGraph } from './digraph.js';
import { topologicalSort } from './topological-sort.js';

/**
 * Requirement groups an edge can stem from: `run`, `dev`, `build` or `extra:<name>`.
 */
export type EdgeGroup = 'run' | 'dev' | 'build' | `extra:${string}`;

export interface DependencyGraphOptions {
  /** Include `dev` requirements. */
  dev?: boolean;
  /** Include `build` requirements. */
  build?: boolean;
  /** Include extras: `true` for all, or a list of extra names. */
  extras?: boolean | string[];
}

/**
 * What the graph needs to know about a project. `Project` satisfies it.
 */
export interface GraphProject {
  readonly id: string;
  readonly distName: string | null;
  readonly dependencies: Dependencies;
}

export type DependencyGraph<P extends GraphProject = GraphProject> = DiGraph<P, Set<EdgeGroup>>;

function selectedRequirements(project: GraphProject, options: DependencyGraphOptions): Array<[EdgeGroup, Dependency]> {
  const { dependencies } = project;
  const result: Array<[EdgeGroup, Dependency]> = dependencies.run.map((dep): [EdgeGroup, Dependency] => ['run', dep]);
  if (options.dev) {
    result.push(...dependencies.dev.map((dep): [EdgeGroup, Dependency] => ['dev', dep]));
  }
  if (options.build) {
    result.push(...dependencies.build.map((dep): [EdgeGroup, Dependency] => ['build', dep]));
  }
  for (const [extra, deps] of Object.entries(dependencies.extra)) {
    const wanted = options.extras === true || (Array.isArray(options.extras) && options.extras.includes(extra));
    if (wanted) {
      result.push(...deps.map((dep): [EdgeGroup, Dependency] => [`extra:${extra}`, dep]));
    }
  }
  return result;
}

/**
 * Build the graph of projects where an edge `A → B` means B requires A, so A
 * has to be installed, built or released first. Run requirements always count;
 * other groups only when selected. Requirements naming no known project are
 * dropped, and so are self references.
 */
export function buildDependencyGraph<P extends GraphProject>(
  projects: readonly P[],
  options: DependencyGraphOptions = {}
): DependencyGraph<P> {
  const graph: DependencyGraph<P> = new DiGraph();
  const byName = new Map<string, P>();
  for (const project of projects) {
    graph.addNode(project.id, project);
    if (project.distName) {
      byName.set(normalizeDistName(project.distName), project);
    }
  }

  for (const project of projects) {
    for (const [group, dependency] of selectedRequirements(project, options)) {
      const target = byName.get(normalizeDistName(dependency.name));
      if (!target || target === project) {
        continue;
      }
      const groups = graph.getEdge(target.id, project.id) ?? new Set<EdgeGroup>();
      groups.add(group);
      graph.addEdge(target.id, project.id, groups);
      logger.debug(`Dependency edge ${target.id} -> ${project.id} (${group})`);
    }
  }

  return graph;
}

/**
 * Projects ordered so that every project comes after the projects it
 * requires. Ties resolve by project id.
 */
export function sortProjects<P extends GraphProject>(projects: readonly P[], options: DependencyGraphOptions = {}): P[] {
  const graph = buildDependencyGraph(projects, options);
  return topologicalSort(graph, (_id, project) => project.id).flatMap(id => {
    const project = graph.getNode(id);
    return project ? [project] : [];
  });
}
