import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { writeFile } from 'fs/promises';
import { Repository } from '../../../src/core/repository/repository.js';
import {
  ReleaseOrchestrator,
  getCurrentVersion,
  validateVersionRefs
} from '../../../src/core/release/release-orchestrator.js';
import { createRecordingOutput } from '../../../src/core/ports/recording-output.js';
import type { VersionRef } from '../../../src/types/index.js';
import { ConfigError, InconsistentVersionError, ValidationError } from '../../../src/utils/errors.js';
import { createWorkspace, pathExists, poetryProject, readText, removeWorkspace } from '../../helpers/workspace.js';

function selfRef(file: string, value: string): VersionRef {
  return { file, start: 0, end: value.length, value, content: value, kind: 'self' };
}

describe('validateVersionRefs', () => {
  it('reports a single version', () => {
    assert.deepEqual(validateVersionRefs([selfRef('a', '1.2.0'), selfRef('b', '1.2.0')]), { status: 'ok', version: '1.2.0' });
  });

  it('groups differing versions by file', () => {
    const refs = [selfRef('a', '1.2.0'), selfRef('b', '1.2.0'), selfRef('c', '1.3.0')];
    assert.deepEqual(validateVersionRefs(refs), { status: 'inconsistent', values: { '1.2.0': ['a', 'b'], '1.3.0': ['c'] } });
    assert.throws(() => getCurrentVersion(refs), InconsistentVersionError);
  });

  it('compares with the expected version', () => {
    assert.deepEqual(validateVersionRefs([selfRef('a', '1.2.0')], '1.3.0'), { status: 'mismatch', expected: '1.3.0', actual: '1.2.0' });
  });

  it('ignores interdependency refs', () => {
    const refs: VersionRef[] = [{ ...selfRef('a', '0.9.0'), kind: 'interdependency' }];
    assert.deepEqual(validateVersionRefs(refs), { status: 'none' });
    assert.throws(() => getCurrentVersion(refs), ValidationError);
  });
});

describe('ReleaseOrchestrator', () => {
  let root: string;
  let orchestrator: ReleaseOrchestrator;
  let repository: Repository;
  const output = createRecordingOutput();

  beforeEach(async () => {
    root = await createWorkspace({
      'slipway.toml': '[[release.references]]\nfile = "VERSION"\npattern = "^{version}$"\n',
      'VERSION': '1.2.0\n',
      ...Object.fromEntries(Object.entries(poetryProject('core-lib', '1.2.0')).map(([path, text]) => [`core/${path}`, text])),
      ...Object.fromEntries(
        Object.entries(poetryProject('app', '1.2.0', 'core-lib = "^1.2.0"')).map(([path, text]) => [`app/${path}`, text])
      ),
      'core/.changelog/_unreleased.toml': '[[entries]]\nid = "1"\ntype = "fix"\ndescription = "Fix it"\nauthor = "someone"\n'
    });
    repository = await Repository.load(root, { vcs: null, host: null });
    orchestrator = new ReleaseOrchestrator(repository, output, root);
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('collects project, source code, custom and interdependency refs', async () => {
    const { refs, warnings } = await orchestrator.collectVersionRefs();
    assert.deepEqual(warnings, []);
    assert.deepEqual(
      refs.map(ref => [ref.file.slice(root.length + 1), ref.value, ref.kind]),
      [
        ['VERSION', '1.2.0', 'self'],
        ['app/pyproject.toml', '1.2.0', 'self'],
        ['app/pyproject.toml', '1.2.0', 'interdependency'],
        ['app/src/app/__init__.py', '1.2.0', 'self'],
        ['core/pyproject.toml', '1.2.0', 'self'],
        ['core/src/core_lib/__init__.py', '1.2.0', 'self']
      ]
    );
  });

  it('resolves rules and explicit versions', async () => {
    const { refs } = await orchestrator.collectVersionRefs();
    assert.deepEqual(await orchestrator.resolveTargetVersion(refs, 'minor'), { version: '1.3.0', current: '1.2.0', noop: false });
    assert.deepEqual(await orchestrator.resolveTargetVersion(refs, 'v1.2.0'), { version: '1.2.0', current: '1.2.0', noop: true });
    await assert.rejects(orchestrator.resolveTargetVersion(refs, '1.0.0'), /lower than the current version 1\.2\.0/);
    assert.deepEqual(await orchestrator.resolveTargetVersion(refs, '1.0.0', true), { version: '1.0.0', current: '1.2.0', noop: false });
    await assert.rejects(orchestrator.resolveTargetVersion(refs, 'sideways'), /not a valid version or version incrementing rule/);
  });

  it('refuses any target over inconsistent versions', async () => {
    await writeFile(join(root, 'VERSION'), '1.3.0\n', 'utf8');
    const { refs } = await orchestrator.collectVersionRefs();
    await assert.rejects(orchestrator.resolveTargetVersion(refs, '2.0.0'), InconsistentVersionError);
    await assert.rejects(orchestrator.resolveTargetVersion(refs, 'minor'), InconsistentVersionError);
    assert.equal(await readText(root, 'core/pyproject.toml'), poetryProject('core-lib', '1.2.0')['pyproject.toml']);
  });

  it('rewrites every ref', async () => {
    const { refs } = await orchestrator.collectVersionRefs();
    const files = await orchestrator.rewrite(refs, '1.3.0', false);
    assert.equal(files.length, 5);
    assert.equal(await readText(root, 'VERSION'), '1.3.0\n');
    assert.equal(await readText(root, 'app/src/app/__init__.py'), '__version__ = "1.3.0"\n');
    const pyproject = await readText(root, 'app/pyproject.toml');
    assert.ok(pyproject.includes('\nversion = "1.3.0"\n'));
    assert.ok(pyproject.includes('\ncore-lib = "^1.3.0"\n'));
  });

  it('leaves files alone in dry mode', async () => {
    const { refs } = await orchestrator.collectVersionRefs();
    await orchestrator.rewrite(refs, '1.3.0', true);
    assert.equal(await readText(root, 'VERSION'), '1.2.0\n');
  });

  it('refuses to rewrite files that changed after collecting', async () => {
    const { refs } = await orchestrator.collectVersionRefs();
    await writeFile(join(root, 'core/src/core_lib/__init__.py'), '\n__version__ = "1.2.0"\n', 'utf8');
    await assert.rejects(orchestrator.rewrite(refs, '1.3.0', false), /changed since its version references were collected/);
    assert.equal(await readText(root, 'VERSION'), '1.2.0\n');
  });

  it('releases the unreleased changelog', async () => {
    const changed = await orchestrator.createReleases('1.3.0', false);
    assert.deepEqual(changed, [join(root, 'core/.changelog/_unreleased.toml'), join(root, 'core/.changelog/1.3.0.toml')]);
    assert.equal(await pathExists(join(root, 'core/.changelog/_unreleased.toml')), false);
    const released = await readText(root, 'core/.changelog/1.3.0.toml');
    assert.match(released, /^release-date = \d{4}-\d{2}-\d{2}$/m);
    assert.ok(released.includes('description = "Fix it"'));
  });
});

describe('ReleaseOrchestrator custom references', () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace({
      'slipway.toml': '[[release.references]]\nfile = "VERSION"\npattern = "^{version}"\n',
      'VERSION': '1.2.0\n'
    });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('warns about patterns that match an empty string', async () => {
    const repository = await Repository.load(root, { vcs: null, host: null });
    const { refs, warnings } = await new ReleaseOrchestrator(repository, createRecordingOutput(), root).collectVersionRefs();
    assert.equal(refs[0].value, '');
    assert.equal(warnings.length, 1);
    assert.match(warnings[0], /matches an empty string/);
  });

  it('reports patterns that do not compile as configuration errors', async () => {
    await writeFile(join(root, 'slipway.toml'), '[[release.references]]\nfile = "VERSION"\npattern = "^({version}"\n', 'utf8');
    const repository = await Repository.load(root, { vcs: null, host: null });
    const orchestrator = new ReleaseOrchestrator(repository, createRecordingOutput(), root);
    await assert.rejects(orchestrator.collectVersionRefs(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^invalid release\.references entry .*Invalid version pattern "\^\(\(\.\*\?\)"/);
      return true;
    });
  });
});
