import { relative, resolve } from 'path';
import pico from 'picocolors';
import type { VersionRef } from '../../types/index.js';
import { ValidationError, VcsError } from '../../utils/errors.js';
import type { Vcs } from '../../utils/git.js';
import { formatVersion, parseVersion } from '../../utils/pep440.js';
import type { Application } from '../application.js';
import type { ReleaseConfig } from '../config.js';
import type { OutputPort } from '../ports/output.js';
import { formatTagName } from './ci-version.js';
import { ReleaseOrchestrator, validateVersionRefs } from './release-orchestrator.js';

export interface ReleaseOptions {
  validate?: boolean;
  dry?: boolean;
  tag?: boolean;
  push?: boolean;
  remote?: string;
  force?: boolean;
  /** `--no-branch-check` sets this to false. */
  branchCheck?: boolean;
  /** `--no-worktree-check` sets this to false. */
  worktreeCheck?: boolean;
}

/**
 * Reject option combinations that make no sense together.
 */
export function validateReleaseOptions(options: ReleaseOptions): void {
  if (options.dry && options.validate) {
    throw new ValidationError('--dry cannot be combined with --validate');
  }
  if (options.tag && options.validate) {
    throw new ValidationError('--tag cannot be combined with --validate');
  }
  if (options.push && !options.tag) {
    throw new ValidationError('--push can only be combined with --tag');
  }
  if (options.force && !options.tag) {
    throw new ValidationError('--force can only be combined with --tag and --push');
  }
  if (options.remote !== undefined && !options.push) {
    throw new ValidationError('--remote can only be combined with --push');
  }
}

/**
 * One line per ref: the file (only on its first ref), the value, the new
 * version when bumping and the matched line.
 */
export function formatVersionRefs(refs: VersionRef[], cwd: string, target?: string): string[] {
  if (refs.length === 0) {
    return [];
  }
  const files = refs.map(ref => relative(cwd, ref.file) || ref.file);
  const fileWidth = Math.max(...files.map(file => file.length)) + 1;
  const valueWidth = Math.max(...refs.map(ref => ref.value.length));
  return refs.map((ref, index) => {
    const label = index === 0 || refs[index - 1].file !== ref.file ? `${files[index]}:` : '';
    let line = `  ${pico.cyan(label.padEnd(fileWidth))} ${ref.value.padEnd(valueWidth)}`;
    if (target !== undefined) {
      line += ` → ${pico.bold(target)}`;
    }
    return `${line} ${pico.gray(`# ${JSON.stringify(ref.content)}`)}`;
  });
}

function requireVcs(vcs: Vcs | null, option: string): Vcs {
  if (!vcs) {
    throw new VcsError(`not in a git repository, cannot use ${option}`);
  }
  return vcs;
}

async function checkOnReleaseBranch(vcs: Vcs, config: ReleaseConfig, output: OutputPort): Promise<boolean> {
  const branch = await vcs.getCurrentBranch();
  if (branch === null) {
    output.error('not currently on a Git branch');
    return false;
  }
  if (branch !== config.branch) {
    output.error(`current branch is ${branch} but must be on the release branch (${config.branch})`);
    return false;
  }
  return true;
}

/**
 * Files with version references must be tracked, the worktree must have no
 * unstaged changes, and staged changes (which would end up in the release
 * commit) need confirmation.
 */
async function checkCleanWorktree(vcs: Vcs, files: string[], output: OutputPort): Promise<boolean> {
  const tracked = new Set((await vcs.getTrackedFiles()).map(file => resolve(file)));
  const untracked = [...new Set(files.map(file => resolve(file)))].filter(file => !tracked.has(file));
  if (untracked.length > 0) {
    output.error(['some of the files with version references are not tracked by Git', ...untracked.map(file => `  · ${file}`)].join('\n'));
    return false;
  }
  const status = await vcs.getStatus();
  if (status.some(file => file.mode[1] !== ' ')) {
    output.error('found untracked changes in worktree');
    return false;
  }
  if (status.some(file => file.mode[0] !== ' ' && file.mode[0] !== '?')) {
    output.warn('found modified files in the staging area. these files will be committed into the release tag.');
    return output.confirm('continue?', { initial: false });
  }
  return true;
}

function validate(refs: VersionRef[], version: string | undefined, app: Application): number {
  const output = app.output;
  const expected = version === undefined ? undefined : formatVersion(parseVersion(version));
  const result = validateVersionRefs(refs, expected);
  switch (result.status) {
    case 'none':
      output.info('no version numbers detected');
      return 1;
    case 'inconsistent':
      output.error('versions are inconsistent');
      output.message(formatVersionRefs(refs, app.cwd).join('\n'));
      return 1;
    case 'mismatch':
      output.error(`version mismatch, expected ${result.expected}, got ${result.actual}`);
      return 1;
    case 'ok':
      output.success('versions are ok');
      output.message(formatVersionRefs(refs, app.cwd).join('\n'));
      return 0;
  }
}

/**
 * `slipway release`: validate or bump every version reference, then
 * optionally commit, tag and push. Resolves to the exit code.
 */
export async function runReleasePipeline(app: Application, version: string | undefined, options: ReleaseOptions): Promise<number> {
  validateReleaseOptions(options);
  const output = app.output;
  const repository = app.repository;
  const remote = options.remote ?? 'origin';
  const vcs = repository.vcs;

  if (options.tag) {
    requireVcs(vcs, '--tag');
  }
  if (options.push) {
    const remotes = await requireVcs(vcs, '--push').getRemotes();
    if (!remotes.some(item => item.name === remote)) {
      throw new VcsError(`git remote "${remote}" does not exist`);
    }
  }

  const orchestrator = new ReleaseOrchestrator(repository, output, app.cwd);
  const config = await orchestrator.repositoryReleaseConfig();
  const { refs, warnings } = await orchestrator.collectVersionRefs();
  for (const warning of warnings) {
    output.warn(warning);
  }

  if (options.validate) {
    return validate(refs, version, app);
  }
  if (version === undefined) {
    throw new ValidationError('no action implied, specify a version argument or the --validate option');
  }

  if (options.tag && vcs) {
    if (options.branchCheck !== false && !(await checkOnReleaseBranch(vcs, config, output))) {
      return 1;
    }
    if (options.worktreeCheck !== false && !(await checkCleanWorktree(vcs, refs.map(ref => ref.file), output))) {
      return 1;
    }
  }

  const dry = options.dry ?? false;
  if (dry) {
    output.info('dry mode enabled, no changes will be committed to disk');
  }

  const target = await orchestrator.resolveTargetVersion(refs, version, options.force);
  if (target.noop) {
    output.warn(`version is already ${target.version}, nothing to do`);
    return 0;
  }

  output.info(`bumping ${refs.length} version reference${refs.length === 1 ? '' : 's'} to ${target.version}`);
  output.message(formatVersionRefs(refs, app.cwd, target.version).join('\n'));
  const changed = await orchestrator.rewrite(refs, target.version, dry);
  for (const file of await orchestrator.createReleases(target.version, dry)) {
    if (!changed.includes(file)) {
      changed.push(file);
    }
  }

  if (options.tag && vcs) {
    if (!config.tagFormat.includes('{version}')) {
      throw new ValidationError('release.tag-format must contain {version}');
    }
    const tagName = formatTagName(config.tagFormat, target.version);
    output.step(`tagging ${tagName}`);
    if (!dry) {
      await vcs.add(changed);
      await vcs.commit(config.commitMessage.replaceAll('{version}', target.version), { allowEmpty: true });
      await vcs.tag(tagName, { force: options.force });
    }
    if (options.push) {
      const branch = await vcs.getCurrentBranch();
      if (branch === null) {
        throw new VcsError('not currently on a Git branch');
      }
      output.step(`pushing ${branch}, ${tagName} to ${remote}`);
      if (!dry) {
        await vcs.push(remote, [branch, tagName], { force: options.force });
      }
    }
  }
  return 0;
}
