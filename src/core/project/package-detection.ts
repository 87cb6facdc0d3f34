import { join } from 'path';
import type { Package } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, isFile, listDirectories, listFiles } from '../../utils/fs.js';

const IGNORED_MODULES = ['test', 'tests', 'docs', 'build'];
const MAX_DEPTH = 8;

function isSkippedDirectory(name: string): boolean {
  return name.startsWith('.') || name === '__pycache__' || name === 'node_modules' || name.endsWith('.egg-info');
}

async function collectPackages(directory: string, prefix: string[], depth: number, out: string[]): Promise<void> {
  if (depth > MAX_DEPTH) {
    return;
  }
  for (const name of await listDirectories(directory)) {
    if (isSkippedDirectory(name) || !/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      continue;
    }
    const path = join(directory, name);
    const dotted = [...prefix, name];
    if (await isFile(join(path, '__init__.py'))) {
      out.push(dotted.join('.'));
    }
    // Namespace packages have no __init__.py, so keep descending regardless
    await collectPackages(path, dotted, depth + 1, out);
  }
}

function commonPrefix(lists: string[][]): string[] {
  if (lists.length === 0) {
    return [];
  }
  const result: string[] = [];
  for (let i = 0; i < lists[0].length; i++) {
    const part = lists[0][i];
    if (!lists.every(list => list[i] === part)) {
      break;
    }
    result.push(part);
  }
  return result;
}

/**
 * Detect the Python packages in `directory`. Regular and namespace packages
 * are found as well as top-level modules. Test and documentation packages
 * are ignored, as are subdirectories that are Python projects of their own.
 * When several candidates remain, their longest common dotted prefix is
 * the package; no common prefix means no package.
 */
export async function detectPackages(directory: string): Promise<Package[]> {
  if (!(await isDirectory(directory))) {
    return [];
  }

  const modules: string[] = [];
  await collectPackages(directory, [], 0, modules);
  for (const file of await listFiles(directory)) {
    if (file.endsWith('.py') && file !== FILE_PATTERNS.SETUP_PY) {
      const stem = file.slice(0, -3);
      if (!modules.includes(stem)) {
        modules.push(stem);
      }
    }
  }

  const candidates: string[] = [];
  for (const module of modules) {
    const top = module.split('.')[0];
    if (await isFile(join(directory, top, FILE_PATTERNS.PYPROJECT_TOML))) {
      continue;
    }
    if (IGNORED_MODULES.includes(module) || IGNORED_MODULES.includes(top)) {
      continue;
    }
    candidates.push(module);
  }

  if (candidates.length === 0) {
    return [];
  }

  let chosen = candidates[0];
  if (candidates.length > 1) {
    const common = commonPrefix(candidates.map(module => module.split('.')));
    if (common.length === 0) {
      return [];
    }
    chosen = common.join('.');
  }

  const moduleFile = join(directory, `${chosen}.py`);
  const path = (await isFile(moduleFile)) ? moduleFile : join(directory, ...chosen.split('.'));
  return [{ name: chosen, path, root: directory }];
}
