import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { Application } from '../../../src/core/application.js';
import { buildInstallPlan, getRequiredProjects, runInstallPipeline } from '../../../src/core/install/install-pipeline.js';
import { createRecordingOutput } from '../../../src/core/ports/recording-output.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createWorkspace, inDirectory, poetryProject, removeWorkspace, twoProjectMonorepo } from '../../helpers/workspace.js';

describe('install pipeline', () => {
  let root: string;
  let app: Application;
  const output = createRecordingOutput();

  before(async () => {
    root = await createWorkspace({
      ...twoProjectMonorepo(),
      'slipway.toml': '[install.extras]\ndocs = ["sphinx>=7"]\n'
    });
    app = await Application.load({ cwd: root, output, vcs: null, host: null });
  });

  after(async () => {
    await removeWorkspace(root);
  });

  it('finds the projects a project requires', () => {
    const [core, application] = app.repository.projects();
    assert.deepEqual(getRequiredProjects(application, app.repository.projects()), [core]);
    assert.deepEqual(getRequiredProjects(core, app.repository.projects()), []);
  });

  it('installs every project with development requirements', async () => {
    const plan = await buildInstallPlan(app, { python: 'python3' });
    assert.deepEqual(plan.projects, [join(root, 'core'), join(root, 'app')]);
    assert.deepEqual(plan.requirements, ['pytest>=7']);
    assert.deepEqual(plan.command, ['python3', '-m', 'pip', 'install', join(root, 'core'), join(root, 'app'), 'pytest>=7']);
  });

  it('installs only the requirements without the projects', async () => {
    const plan = await buildInstallPlan(app, { python: 'python3', root: false, dev: false });
    assert.deepEqual(plan.projects, []);
    assert.deepEqual(plan.requirements, ['requests', 'core-lib']);
  });

  it('installs a single project with the projects it requires', async () => {
    const plan = await buildInstallPlan(app, { python: 'python3', only: 'app', dev: false });
    assert.deepEqual(plan.projects, [join(root, 'core'), join(root, 'app')]);
    assert.deepEqual(plan.requirements, []);
  });

  it('installs repository extras', async () => {
    const plan = await buildInstallPlan(app, { python: 'python3', dev: false, extras: 'docs' });
    assert.deepEqual(plan.requirements, ['sphinx>=7']);

    const only = await buildInstallPlan(app, { python: 'python3', dev: false, onlyExtras: 'docs' });
    assert.deepEqual(only.projects, []);
    assert.deepEqual(only.requirements, ['sphinx>=7']);
  });

  it('rejects unknown and conflicting extras', async () => {
    await assert.rejects(buildInstallPlan(app, { extras: 'nope' }), /extras that do not exist: nope/);
    await assert.rejects(buildInstallPlan(app, { extras: 'docs', onlyExtras: 'docs' }), ValidationError);
  });

  it('prints the pip command on a dry run', async () => {
    const code = await runInstallPipeline(app, { python: 'python3', only: 'core', dev: false, dry: true });
    assert.equal(code, 0);
    assert.deepEqual(output.texts('step'), [`$ python3 -m pip install ${join(root, 'core')}`]);
  });
});

describe('install order', () => {
  let root: string;

  before(async () => {
    root = await createWorkspace({
      ...inDirectory('alpha', poetryProject('alpha', '1.0.0', '\n[tool.poetry.group.dev.dependencies]\nzeta-tool = "^1.0"')),
      ...inDirectory('zeta', poetryProject('zeta-tool', '1.0.0'))
    });
  });

  after(async () => {
    await removeWorkspace(root);
  });

  it('installs development requirements of sibling projects first', async () => {
    const app = await Application.load({ cwd: root, output: createRecordingOutput(), vcs: null, host: null });
    assert.deepEqual(app.repository.projects().map(project => project.id), ['alpha', 'zeta-tool']);

    const plan = await buildInstallPlan(app, { python: 'python3' });
    assert.deepEqual(plan.projects, [join(root, 'zeta'), join(root, 'alpha')]);
    assert.deepEqual(plan.requirements, []);
  });
});
