import type { Dependency } from '../../types/index.js';
import { isTable } from '../toml-file.js';

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;

/**
 * PEP 503 name normalization: lowercase, runs of `-`, `_` and `.` become `-`.
 */
export function normalizeDistName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Split a PEP 508 requirement string into its name and the remainder
 * (extras, version selector and markers, trimmed).
 */
export function parseRequirement(requirement: string): Dependency | null {
  const match = NAME_PATTERN.exec(requirement);
  if (!match) {
    return null;
  }
  return { name: match[1], spec: requirement.slice(match[0].length).trim() };
}

export function parseRequirementList(requirements: unknown): Dependency[] {
  if (!Array.isArray(requirements)) {
    return [];
  }
  const result: Dependency[] = [];
  for (const item of requirements) {
    if (typeof item !== 'string') {
      continue;
    }
    const dependency = parseRequirement(item);
    if (dependency) {
      result.push(dependency);
    }
  }
  return result;
}

/**
 * Parse a setuptools `list-semi` value: entries separated by newlines or `;`.
 */
export function parseListSemi(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/\r?\n/)
    .flatMap(line => line.split(';'))
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Read a Poetry dependency table (`name = "^1.0"` or `name = { version = "^1.0", ... }`).
 * The `python` entry is returned separately.
 */
export function parsePoetryDependencies(table: unknown): { python?: string; dependencies: Dependency[] } {
  const dependencies: Dependency[] = [];
  let python: string | undefined;
  if (!isTable(table)) {
    return { dependencies };
  }

  for (const [name, value] of Object.entries(table)) {
    let spec = '';
    if (typeof value === 'string') {
      spec = value;
    } else if (isTable(value)) {
      if (typeof value.version === 'string') {
        spec = value.version;
      } else if (typeof value.git === 'string') {
        spec = `@ git+${value.git}`;
      } else if (typeof value.path === 'string') {
        spec = `@ ${value.path}`;
      } else if (typeof value.url === 'string') {
        spec = `@ ${value.url}`;
      }
    } else if (Array.isArray(value)) {
      // Multiple constraints; take the first version spelled out
      const first: unknown = value.find(item => isTable(item) && typeof item.version === 'string');
      if (isTable(first) && typeof first.version === 'string') {
        spec = first.version;
      }
    }

    if (name === 'python') {
      python = spec;
    } else {
      dependencies.push({ name, spec });
    }
  }
  return { python, dependencies };
}

/**
 * Render a dependency the way pip takes it on the command line. Poetry's
 * caret and tilde selectors have no pip equivalent and are dropped.
 */
export function toPipRequirement(dependency: Dependency): string {
  const spec = dependency.spec.trim();
  if (!spec || spec === '*' || spec.startsWith('^') || /^~[^=]/.test(spec)) {
    return dependency.name;
  }
  if (/^[0-9]/.test(spec)) {
    return `${dependency.name}==${spec}`;
  }
  return `${dependency.name}${spec.startsWith('@') || spec.startsWith(';') ? ' ' : ''}${spec}`;
}
