import { relative } from 'path';
import { ReleaseOrchestrator, groupSelfVersions } from '../release/release-orchestrator.js';
import { findSourceCodeVersions } from '../release/source-code-version.js';
import type { Project } from '../project/project.js';
import { Check, CheckContext, CheckPlugin, CheckResult, check } from './check.js';

/**
 * Checks relevant to `slipway release`.
 */
export const releaseChecks: CheckPlugin = {
  id: 'release',

  async getProjectChecks(project: Project): Promise<Check[]> {
    if (project.packages.length === 0) {
      return [check('source-code-version', CheckResult.WARNING, 'No packages detected')];
    }
    const versions = await findSourceCodeVersions(project.packages);
    const missing = versions.filter(item => item.ref === null).map(item => item.package.name);
    if (missing.length > 0) {
      return [check('source-code-version', CheckResult.ERROR, `The following packages have no __version__: ${missing.join(', ')}`)];
    }
    return [
      check('source-code-version', CheckResult.OK, `Found __version__ in ${project.packages.map(pkg => pkg.name).join(', ')}`)
    ];
  },

  async getApplicationChecks(context: CheckContext): Promise<Check[]> {
    const orchestrator = new ReleaseOrchestrator(context.repository, context.output, context.cwd);
    const { refs } = await orchestrator.collectVersionRefs();
    const values = groupSelfVersions(refs);
    const cardinality = Object.keys(values).length;
    if (cardinality === 0) {
      return [check('consistent-versions', CheckResult.WARNING, 'No version references found')];
    }
    if (cardinality === 1) {
      return [check('consistent-versions', CheckResult.OK, 'All version references are equal')];
    }
    const details = Object.entries(values)
      .map(([value, files]) => `${value}: ${files.map(file => relative(context.cwd, file)).join(', ')}`)
      .join('\n');
    return [check('consistent-versions', CheckResult.ERROR, `Found ${cardinality} differing version references`, details)];
  }
};
