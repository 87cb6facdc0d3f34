import pico from 'picocolors';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { loadCheckConfig } from '../config.js';
import type { Project } from '../project/project.js';
import { changelogChecks } from './changelog.js';
import { CHECK_RESULTS, Check, CheckContext, CheckPlugin, CheckResult, colorResult } from './check.js';
import { generalChecks } from './general.js';
import { metadataChecks } from './metadata.js';
import { releaseChecks } from './release.js';

export * from './check.js';

export const CHECK_PLUGINS: ReadonlyMap<string, CheckPlugin> = new Map(
  [changelogChecks, generalChecks, metadataChecks, releaseChecks].map((plugin): [string, CheckPlugin] => [plugin.id, plugin])
);

export function getCheckPlugin(id: string): CheckPlugin {
  const plugin = CHECK_PLUGINS.get(id);
  if (!plugin) {
    throw new ConfigError(`Unknown check plugin "${id}" (available: ${[...CHECK_PLUGINS.keys()].join(', ')})`, { key: 'check.plugins' });
  }
  return plugin;
}

export interface CheckRunOptions {
  showSkipped?: boolean;
  warningsAsErrors?: boolean;
}

export interface CheckSection {
  /** `null` for the repository-wide section. */
  project: Project | null;
  checks: Check[];
}

export interface CheckRunResult {
  sections: CheckSection[];
  counts: Map<CheckResult, number>;
  exitCode: number;
}

type CheckSource = (plugin: CheckPlugin) => Promise<Check[]> | undefined;

/**
 * Run one kind of check of a plugin. Names get the plugin id as prefix; an
 * exception turns into a single ERROR check named after the plugin.
 */
async function runPluginChecks(pluginId: string, plugin: CheckPlugin, source: CheckSource, where: string): Promise<Check[]> {
  try {
    const checks = (await source(plugin)) ?? [];
    return [...checks]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(item => ({ ...item, name: `${pluginId}:${item.name}` }));
  } catch (error) {
    logger.error(`Uncaught exception in ${where} checks for plugin ${pluginId}`, error);
    return [{ name: pluginId, result: CheckResult.ERROR, description: error instanceof Error ? error.message : String(error) }];
  }
}

async function projectPluginIds(project: Project): Promise<string[]> {
  return loadCheckConfig(await project.raw()).plugins;
}

/**
 * Run every configured check plugin. Monorepos get one section of
 * repository-wide checks over the union of all projects' plugins; otherwise
 * those checks run together with the project checks.
 */
export async function runChecks(context: CheckContext, options: CheckRunOptions = {}): Promise<CheckRunResult> {
  const repository = context.repository;
  const sections: CheckSection[] = [];

  if (repository.isMonorepo) {
    const ids = new Set<string>();
    for (const project of repository.projects()) {
      for (const id of await projectPluginIds(project)) {
        ids.add(id);
      }
    }
    const checks: Check[] = [];
    for (const id of [...ids].sort()) {
      checks.push(...(await runPluginChecks(id, getCheckPlugin(id), plugin => plugin.getApplicationChecks?.(context), 'application')));
    }
    sections.push({ project: null, checks });
  }

  for (const project of repository.projects()) {
    if (!project.isPythonProject) {
      continue;
    }
    const checks: Check[] = [];
    for (const id of [...(await projectPluginIds(project))].sort()) {
      const plugin = getCheckPlugin(id);
      checks.push(...(await runPluginChecks(id, plugin, item => item.getProjectChecks?.(project, context), 'project')));
      if (!repository.isMonorepo) {
        checks.push(...(await runPluginChecks(id, plugin, item => item.getApplicationChecks?.(context), 'application')));
      }
    }
    sections.push({ project, checks });
  }

  const counts = new Map<CheckResult, number>();
  for (const section of sections) {
    for (const item of section.checks) {
      counts.set(item.result, (counts.get(item.result) ?? 0) + 1);
    }
  }
  let exitCode = 0;
  if ((counts.get(CheckResult.ERROR) ?? 0) > 0) {
    exitCode = 1;
  } else if (options.warningsAsErrors && (counts.get(CheckResult.WARNING) ?? 0) > 0) {
    exitCode = 1;
  }
  return { sections, counts, exitCode };
}

/**
 * Render checks as aligned lines: name, result and description, followed by
 * indented details.
 */
export function formatChecks(checks: Check[], showSkipped: boolean = false): string[] {
  const visible = checks.filter(item => showSkipped || item.result !== CheckResult.SKIPPED);
  if (visible.length === 0) {
    return [];
  }
  const width = Math.max(...visible.map(item => item.name.length));
  const lines: string[] = [];
  for (const item of visible) {
    let line = `  ${pico.bold(item.name.padEnd(width))}  ${colorResult(item.result, item.result.padEnd(14))}`;
    if (item.description) {
      line += ` - ${item.description}`;
    }
    lines.push(line.trimEnd());
    for (const detail of item.details?.split('\n') ?? []) {
      lines.push(`    ${detail}`);
    }
  }
  return lines;
}

export function formatSummary(result: CheckRunResult): string {
  const parts = CHECK_RESULTS
    .filter(kind => (result.counts.get(kind) ?? 0) > 0)
    .map(kind => `${result.counts.get(kind) ?? 0} ${colorResult(kind)}`);
  return `Summary: ${[...parts, `exit code: ${result.exitCode}`].join(', ')}`;
}
