import { basename, resolve } from 'path';
import type { Dependencies, Package, VersionRef } from '../../types/index.js';
import { ConfigurationSource, ProjectConfig, loadProjectConfig } from '../config.js';
import { logger } from '../../utils/logger.js';
import { emptyDependencies } from './handlers/base.js';
import { ProjectContext, ProjectHandler, resolveProjectHandler } from './handlers/index.js';

interface ProjectMetadata {
  handler: ProjectHandler | null;
  config: ProjectConfig;
  context: ProjectContext;
  distName: string | null;
  version: string | null;
  readme: string | null;
  packages: Package[];
  dependencies: Dependencies;
}

/**
 * One Python project, with its own configuration in `slipway.toml` or
 * `pyproject.toml`. Metadata is read once by {@link Project.load}; version
 * references are scanned fresh on every call.
 */
export class Project extends ConfigurationSource {
  readonly handler: ProjectHandler | null;
  readonly config: ProjectConfig;
  readonly distName: string | null;
  readonly version: string | null;
  readonly readme: string | null;
  readonly packages: Package[];
  readonly dependencies: Dependencies;
  private readonly context: ProjectContext;

  private constructor(directory: string, metadata: ProjectMetadata) {
    super(directory);
    this.handler = metadata.handler;
    this.config = metadata.config;
    this.context = metadata.context;
    this.distName = metadata.distName;
    this.version = metadata.version;
    this.readme = metadata.readme;
    this.packages = metadata.packages;
    this.dependencies = metadata.dependencies;
  }

  static async load(directory: string): Promise<Project> {
    const source = new ConfigurationSource(resolve(directory));
    const hasPyproject = await source.pyprojectToml.exists();
    const config = loadProjectConfig(await source.raw());
    const context: ProjectContext = {
      directory: source.directory,
      pyproject: hasPyproject ? await source.pyprojectToml.load() : {},
      hasPyproject,
      config
    };

    const handler = await resolveProjectHandler(context);
    if (!handler) {
      logger.debug(`No project handler matches ${source.directory}`);
      return new Project(source.directory, {
        handler: null,
        config,
        context,
        distName: null,
        version: null,
        readme: null,
        packages: [],
        dependencies: emptyDependencies()
      });
    }

    const packages = await handler.getPackages(context);
    if (packages.length > 0) {
      logger.debug(`Detected packages for ${source.directory} with handler ${handler.id}`, packages.map(p => p.name));
    } else {
      logger.warn(`No packages detected for project ${source.directory} by handler ${handler.id}`);
    }

    return new Project(source.directory, {
      handler,
      config,
      context,
      distName: await handler.getDistName(context),
      version: await handler.getVersion(context),
      readme: await handler.getReadme(context),
      packages,
      dependencies: await handler.getDependencies(context)
    });
  }

  /**
   * Distribution name, or the directory name for projects without one.
   */
  get id(): string {
    return this.distName ?? basename(this.directory);
  }

  get isPythonProject(): boolean {
    return this.handler !== null;
  }

  /**
   * The version reference in the build manifest.
   */
  async getVersionRefs(): Promise<VersionRef[]> {
    return this.handler ? this.handler.getVersionRefs(this.context) : [];
  }

  async getRequirementFiles(): Promise<string[]> {
    return this.handler ? this.handler.getRequirementFiles(this.context) : [];
  }

  toString(): string {
    return `Project(${this.id})`;
  }
}
