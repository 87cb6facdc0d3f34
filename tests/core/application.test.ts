import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { Application, findRepositoryRoot } from '../../src/core/application.js';
import { createRecordingOutput } from '../../src/core/ports/recording-output.js';
import { ValidationError } from '../../src/utils/errors.js';
import { FakeVcs } from '../helpers/fake-vcs.js';
import { createWorkspace, removeWorkspace, twoProjectMonorepo } from '../helpers/workspace.js';

describe('findRepositoryRoot', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeWorkspace(root);
      root = undefined;
    }
  });

  it('uses the directory itself outside of a work tree', async () => {
    root = await createWorkspace({ 'slipway.toml': '' });
    assert.equal(await findRepositoryRoot(join(root, 'sub'), null), join(root, 'sub'));
  });

  it('finds the closest slipway.toml below the work tree root', async () => {
    root = await createWorkspace({ 'slipway.toml': '', 'group/slipway.toml': '', 'group/pkg/README.md': '' });
    const vcs = new FakeVcs(root);
    assert.equal(await findRepositoryRoot(join(root, 'group', 'pkg'), vcs), join(root, 'group'));
    assert.equal(await findRepositoryRoot(join(root, 'other'), vcs), root);
  });

  it('falls back to the directory without a slipway.toml', async () => {
    root = await createWorkspace({ 'pkg/README.md': '' });
    assert.equal(await findRepositoryRoot(join(root, 'pkg'), new FakeVcs(root)), join(root, 'pkg'));
  });
});

describe('Application', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeWorkspace(root);
      root = undefined;
    }
  });

  async function load(cwd: string): Promise<Application> {
    return Application.load({ cwd, output: createRecordingOutput(), vcs: null, host: null });
  }

  it('targets every project from the repository root', async () => {
    root = await createWorkspace(twoProjectMonorepo());
    const app = await load(root);

    assert.equal(app.mainProject(), undefined);
    assert.deepEqual(app.targetProjects().map(project => project.id), ['core-lib', 'app']);
    assert.deepEqual(app.configurations().map(source => source.directory), [root, join(root, 'core'), join(root, 'app')]);
  });

  it('targets the project in the working directory', async () => {
    root = await createWorkspace({ ...twoProjectMonorepo(), 'slipway.toml': '' });
    const app = await Application.load({ cwd: join(root, 'app'), output: createRecordingOutput(), vcs: new FakeVcs(root), host: null });

    assert.equal(app.repository.directory, root);
    assert.equal(app.mainProject()?.id, 'app');
    assert.deepEqual(app.targetProjects().map(project => project.id), ['app']);
  });

  it('resolves projects named on the command line', async () => {
    root = await createWorkspace(twoProjectMonorepo());
    const app = await load(root);

    assert.deepEqual(app.targetProjects(['core']).map(project => project.id), ['core-lib']);
    assert.throws(() => app.targetProjects(['missing']), ValidationError);
  });
});
