/**
 * Project model types shared by project handlers, the repository and the graph builder.
 */

/**
 * A Python package (or top-level module) that belongs to a project.
 */
export interface Package {
  /** Dotted module name; contains periods for namespace packages. */
  name: string;
  /** Package directory, or the module file for a top-level module. */
  path: string;
  /** Directory that contains the package (e.g. `<project>/src`). */
  root: string;
}

/**
 * A single requirement declared by a project.
 */
export interface Dependency {
  /** Distribution name as written in the manifest. */
  name: string;
  /** Version selector and markers, verbatim (may be empty). */
  spec: string;
}

export type DependencyGroup = 'run' | 'dev' | 'build' | 'extra';

export interface Dependencies {
  /** Python interpreter constraint, when the manifest declares one. */
  python?: string;
  run: Dependency[];
  dev: Dependency[];
  build: Dependency[];
  extra: Record<string, Dependency[]>;
}
