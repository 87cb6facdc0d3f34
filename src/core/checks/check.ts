import pico from 'picocolors';
import type { TtlCache } from '../cache/ttl-cache.js';
import type { OutputPort } from '../ports/output.js';
import type { Project } from '../project/project.js';
import type { Fetcher } from '../repository/host.js';
import type { Repository } from '../repository/repository.js';

export enum CheckResult {
  OK = 'OK',
  RECOMMENDATION = 'RECOMMENDATION',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  SKIPPED = 'SKIPPED'
}

/** Severity order, used for the summary line. */
export const CHECK_RESULTS: readonly CheckResult[] = [
  CheckResult.OK,
  CheckResult.RECOMMENDATION,
  CheckResult.WARNING,
  CheckResult.ERROR,
  CheckResult.SKIPPED
];

export interface Check {
  name: string;
  result: CheckResult;
  description?: string;
  details?: string;
}

export interface CheckContext {
  repository: Repository;
  output: OutputPort;
  cwd: string;
  /** Downloaded lists (classifiers, licenses) shared by all checks of a run. */
  cache: TtlCache<string[]>;
  fetcher?: Fetcher;
}

/**
 * A group of checks enabled with `check.plugins`. Project checks run for each
 * Python project; application checks run once for a monorepo, or together
 * with the project checks otherwise.
 */
export interface CheckPlugin {
  readonly id: string;
  getProjectChecks?(project: Project, context: CheckContext): Promise<Check[]>;
  getApplicationChecks?(context: CheckContext): Promise<Check[]>;
}

export function check(name: string, result: CheckResult, description?: string, details?: string): Check {
  return { name, result, ...(description !== undefined ? { description } : {}), ...(details ? { details } : {}) };
}

export function colorResult(result: CheckResult, text: string = result): string {
  switch (result) {
    case CheckResult.OK:
      return pico.bold(pico.green(text));
    case CheckResult.RECOMMENDATION:
      return pico.bold(pico.magenta(text));
    case CheckResult.WARNING:
      return pico.bold(pico.yellow(text));
    case CheckResult.ERROR:
      return pico.bold(pico.red(text));
    case CheckResult.SKIPPED:
      return pico.gray(text);
  }
}
