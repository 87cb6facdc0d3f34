import { resolve } from 'path';
import type { SubstRange, VersionRef } from '../../types/index.js';
import { ConfigError, InconsistentVersionError, InvalidPatternError, ValidationError } from '../../utils/errors.js';
import { readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { compareVersions, formatVersion, parseVersion, tryParseVersion } from '../../utils/pep440.js';
import { substituteRanges } from '../../utils/text.js';
import { ConfigurationSource, ReleaseConfig, loadReleaseConfig } from '../config.js';
import type { OutputPort } from '../ports/output.js';
import type { Project } from '../project/project.js';
import type { Repository } from '../repository/repository.js';
import { getInterdependencyRefs } from './interdependencies.js';
import { ReleasePlugin, ReleasePluginContext, getReleasePlugin } from './plugins.js';
import { isVersionRule, applyVersionRule } from './version-rules.js';
import { matchVersionRefPattern } from './version-ref.js';

export interface CollectedVersionRefs {
  refs: VersionRef[];
  warnings: string[];
}

export type VersionValidation =
  | { status: 'ok'; version: string }
  | { status: 'none' }
  | { status: 'inconsistent'; values: Record<string, string[]> }
  | { status: 'mismatch'; expected: string; actual: string };

export interface TargetVersion {
  version: string;
  /** The single current version, when there is one. */
  current: string | null;
  /** The target equals the current version; nothing to rewrite. */
  noop: boolean;
}

/**
 * Distinct values of the `'self'` refs, each with the files it occurs in.
 */
export function groupSelfVersions(refs: VersionRef[]): Record<string, string[]> {
  const values: Record<string, string[]> = {};
  for (const ref of refs) {
    if (ref.kind !== 'self') {
      continue;
    }
    const files = (values[ref.value] ??= []);
    if (!files.includes(ref.file)) {
      files.push(ref.file);
    }
  }
  return values;
}

export function validateVersionRefs(refs: VersionRef[], expected?: string): VersionValidation {
  const values = groupSelfVersions(refs);
  const distinct = Object.keys(values);
  if (distinct.length === 0) {
    return { status: 'none' };
  }
  if (distinct.length > 1) {
    return { status: 'inconsistent', values };
  }
  const [version] = distinct;
  if (expected !== undefined && expected !== version) {
    return { status: 'mismatch', expected, actual: version };
  }
  return { status: 'ok', version };
}

/**
 * The version all `'self'` refs agree on.
 */
export function getCurrentVersion(refs: VersionRef[]): string {
  const values = groupSelfVersions(refs);
  const distinct = Object.keys(values);
  if (distinct.length > 1) {
    throw new InconsistentVersionError(values);
  }
  if (distinct.length === 0) {
    throw new ValidationError('could not determine current version number, no version references found');
  }
  return distinct[0];
}

/**
 * Group refs by file, preserving first-seen order of the files.
 */
function groupByFile(refs: VersionRef[]): Map<string, VersionRef[]> {
  const groups = new Map<string, VersionRef[]>();
  for (const ref of refs) {
    const group = groups.get(ref.file);
    if (group) {
      group.push(ref);
    } else {
      groups.set(ref.file, [ref]);
    }
  }
  return groups;
}

/**
 * Collects, validates and rewrites the version references of every project in
 * a repository.
 *
 * The rewrite reads every affected file first and computes all substitutions
 * before the first write, so overlapping or stale refs abort the release
 * without touching any file. Each file is then replaced atomically; there is
 * no transaction across files.
 */
export class ReleaseOrchestrator {
  private readonly context: ReleasePluginContext;

  constructor(
    private readonly repository: Repository,
    output: OutputPort,
    cwd: string = process.cwd()
  ) {
    this.context = { repository, output, cwd };
  }

  async repositoryReleaseConfig(): Promise<ReleaseConfig> {
    return loadReleaseConfig(await this.repository.raw());
  }

  /**
   * The repository itself, unless a project lives in its root, followed by
   * every project.
   */
  configurations(): ConfigurationSource[] {
    const projects = this.repository.projects();
    const hasRootProject = projects.some(project => project.directory === this.repository.directory);
    return hasRootProject ? projects : [this.repository, ...projects];
  }

  async loadPlugins(project: Project): Promise<ReleasePlugin[]> {
    const config = loadReleaseConfig(await project.raw());
    return config.plugins.map(getReleasePlugin);
  }

  private async collectUserReferences(source: ConfigurationSource, warnings: string[]): Promise<VersionRef[]> {
    const refs: VersionRef[] = [];
    for (const reference of loadReleaseConfig(await source.raw()).references) {
      const pattern = reference.pattern.replaceAll('{version}', '(.*?)');
      let ref: VersionRef;
      try {
        ref = await matchVersionRefPattern(resolve(source.directory, reference.file), pattern);
      } catch (error) {
        if (error instanceof InvalidPatternError) {
          throw new ConfigError(`invalid release.references entry ${JSON.stringify(reference)}: ${error.message}`, { reference });
        }
        throw error;
      }
      if (ref.value === '') {
        warnings.push(
          `custom reference ${JSON.stringify(reference)} matches an empty string, make sure there is at least one ` +
          'character after {version} (e.g. "version: {version}$")'
        );
      }
      refs.push(ref);
    }
    return refs;
  }

  /**
   * Every version reference in the repository, sorted by file. The same span
   * found by more than one source is kept once.
   */
  async collectVersionRefs(): Promise<CollectedVersionRefs> {
    const warnings: string[] = [];
    const collected: VersionRef[] = [];
    const projects = this.repository.projects();
    const interdependencies = (await this.repositoryReleaseConfig()).interdependencies;

    for (const source of this.configurations()) {
      const project = projects.find(item => item === source);
      if (project) {
        collected.push(...(await project.getVersionRefs()));
        for (const plugin of await this.loadPlugins(project)) {
          collected.push(...(await plugin.getVersionRefs(project, this.context)));
        }
      }
      collected.push(...(await this.collectUserReferences(source, warnings)));
      if (project && interdependencies) {
        collected.push(...(await getInterdependencyRefs(project, projects)));
      }
    }

    const seen = new Set<string>();
    const refs = collected.filter(ref => {
      const key = `${ref.file}\0${ref.start}\0${ref.end}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
    refs.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
    logger.debug(`Collected ${refs.length} version reference(s)`, { warnings });
    return { refs, warnings };
  }

  /**
   * Turn an explicit version or a rule name into the version to release.
   * Moving backwards requires `force`. Inconsistent versions are never
   * released, whatever the target.
   */
  async resolveTargetVersion(refs: VersionRef[], versionOrRule: string, force: boolean = false): Promise<TargetVersion> {
    const values = groupSelfVersions(refs);
    if (Object.keys(values).length > 1) {
      throw new InconsistentVersionError(values);
    }
    const explicit = tryParseVersion(versionOrRule);
    let current: string | null;
    let version: string;

    if (explicit) {
      version = formatVersion(explicit);
      current = Object.keys(values)[0] ?? null;
    } else if (isVersionRule(versionOrRule)) {
      current = getCurrentVersion(refs);
      const config = await this.repositoryReleaseConfig();
      version = await applyVersionRule(versionOrRule, current, { vcs: this.repository.vcs, tagFormat: config.tagFormat });
    } else {
      throw new ValidationError(`"${versionOrRule}" is not a valid version or version incrementing rule`);
    }

    const currentParsed = current === null ? null : tryParseVersion(current);
    if (currentParsed) {
      const order = compareVersions(parseVersion(version), currentParsed);
      if (order < 0 && !force) {
        throw new ValidationError(`target version ${version} is lower than the current version ${current}, use --force to release it anyway`);
      }
      if (order === 0) {
        return { version, current, noop: true };
      }
    }
    return { version, current, noop: false };
  }

  /**
   * Replace every ref with `version`. Returns the files that were (or, when
   * `dry`, would be) written.
   */
  async rewrite(refs: VersionRef[], version: string, dry: boolean): Promise<string[]> {
    const updates: Array<{ file: string; content: string }> = [];
    for (const [file, fileRefs] of groupByFile(refs)) {
      const text = await readTextFile(file);
      for (const ref of fileRefs) {
        if (text.slice(ref.start, ref.end) !== ref.value) {
          throw new ValidationError(`${file} changed since its version references were collected`);
        }
      }
      const ranges: SubstRange[] = fileRefs.map(ref => [ref.start, ref.end, version]);
      updates.push({ file, content: substituteRanges(text, ranges) });
    }

    if (!dry) {
      for (const update of updates) {
        await writeTextFileAtomic(update.file, update.content);
      }
    }
    return updates.map(update => update.file);
  }

  /**
   * Run `createRelease` of every project's release plugins.
   */
  async createReleases(version: string, dry: boolean): Promise<string[]> {
    const changed: string[] = [];
    for (const project of this.repository.projects()) {
      for (const plugin of await this.loadPlugins(project)) {
        try {
          changed.push(...(await plugin.createRelease(project, version, dry, this.context)));
        } catch (error) {
          this.context.output.error(`error in release plugin ${plugin.id} for project ${project.id}`);
          throw error;
        }
      }
    }
    return changed;
  }
}
