import { join, relative } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, isFile } from '../../utils/fs.js';
import type { Project } from '../project/project.js';
import { Check, CheckPlugin, CheckResult, check } from './check.js';

async function checkPackages(project: Project): Promise<Check> {
  if (project.packages.length === 0) {
    return check('packages', CheckResult.ERROR, 'No packages detected');
  }
  const names = project.packages.map(pkg => {
    const root = relative(project.directory, pkg.root).split('\\').join('/');
    return root ? `${root}/${pkg.name}` : pkg.name;
  });
  return check('packages', CheckResult.OK, `Detected ${names.join(', ')}`);
}

async function checkTyped(project: Project): Promise<Check> {
  const expectTyped = project.config.typed;
  if (expectTyped === undefined) {
    return check('typed', CheckResult.WARNING, 'tool.slipway.typed is not set');
  }

  const typed: string[] = [];
  const untyped: string[] = [];
  for (const pkg of project.packages) {
    const hasMarker = (await isDirectory(pkg.path)) && (await isFile(join(pkg.path, FILE_PATTERNS.PY_TYPED)));
    (hasMarker ? typed : untyped).push(pkg.name);
  }

  if (expectTyped && untyped.length > 0) {
    return check('typed', CheckResult.ERROR, `py.typed missing in package(s) ${untyped.join(', ')}`);
  }
  if (!expectTyped && typed.length > 0) {
    return check('typed', CheckResult.ERROR, `py.typed in package(s) should not exist ${typed.join(', ')}`);
  }
  return check('typed', CheckResult.OK, expectTyped ? 'py.typed exists as expected' : 'py.typed does not exist as expected');
}

/**
 * Checks that apply to every kind of project.
 */
export const generalChecks: CheckPlugin = {
  id: 'general',

  async getProjectChecks(project: Project): Promise<Check[]> {
    return [await checkPackages(project), await checkTyped(project)];
  }
};
