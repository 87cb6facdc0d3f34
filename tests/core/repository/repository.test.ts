import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { Repository, parseRepositoryHost } from '../../../src/core/repository/repository.js';
import { GithubRepositoryHost } from '../../../src/core/repository/hosts/github.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { FakeVcs, remote } from '../../helpers/fake-vcs.js';
import { createWorkspace, inDirectory, poetryProject, removeWorkspace } from '../../helpers/workspace.js';

describe('parseRepositoryHost', () => {
  it('accepts github hosts', () => {
    const host = parseRepositoryHost('github:owner/repo');
    assert.ok(host instanceof GithubRepositoryHost);
    assert.equal(host.repo, 'owner/repo');
  });

  it('rejects other hosts', () => {
    assert.throws(() => parseRepositoryHost('gitlab:owner/repo'), ConfigError);
    assert.throws(() => parseRepositoryHost('github'), ConfigError);
  });
});

describe('Repository', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeWorkspace(root);
      root = undefined;
    }
  });

  it('loads a single project living in the root', async () => {
    root = await createWorkspace(poetryProject('solo', '0.3.0'));
    const repository = await Repository.load(root, { vcs: null, host: null });

    assert.deepEqual(repository.projects().map(project => project.id), ['solo']);
    assert.equal(repository.isMonorepo, false);
    assert.equal(repository.projectAt(root)?.version, '0.3.0');
    assert.equal(repository.host, null);
  });

  it('orders the projects of a monorepo by their requirements', async () => {
    root = await createWorkspace({
      'slipway.toml': '[repository]\nrepository-host = "github:owner/repo"\n',
      'docs/index.md': '# Docs\n',
      ...inDirectory('core', poetryProject('core-lib', '1.0.0')),
      ...inDirectory('app', poetryProject('app', '1.0.0', 'core-lib = "^1.0.0"'))
    });
    const repository = await Repository.load(root, { vcs: null });

    assert.deepEqual(repository.projects().map(project => project.id), ['core-lib', 'app']);
    assert.equal(repository.isMonorepo, true);
    assert.equal(repository.projectAt(join(root, 'app'))?.id, 'app');
    assert.equal(repository.projectAt(join(root, 'docs')), undefined);
    assert.ok(repository.host instanceof GithubRepositoryHost);
    assert.equal(repository.host.repo, 'owner/repo');
  });

  it('restricts discovery to the included directories', async () => {
    const rootProject = poetryProject('root-app', '2.0.0');
    root = await createWorkspace({
      ...rootProject,
      'pyproject.toml': rootProject['pyproject.toml'] + '\n[tool.slipway.repository]\ninclude = ["libs/*"]\n',
      ...inDirectory('libs/b', poetryProject('b', '2.0.0')),
      ...inDirectory('libs/a', poetryProject('a', '2.0.0')),
      'libs/notes/todo.txt': 'nothing here\n',
      ...inDirectory('tools/x', poetryProject('x', '2.0.0'))
    });
    const repository = await Repository.load(root, { vcs: null, host: null });

    assert.deepEqual(repository.projects().map(project => project.id), ['a', 'b', 'root-app']);
  });

  it('rejects included paths that are not directories', async () => {
    const rootProject = poetryProject('root-app', '2.0.0');
    root = await createWorkspace({
      ...rootProject,
      'pyproject.toml': rootProject['pyproject.toml'] + '\n[tool.slipway.repository]\ninclude = ["missing"]\n'
    });
    await assert.rejects(Repository.load(root, { vcs: null, host: null }), ConfigError);
  });

  it('rejects projects sharing an id', async () => {
    root = await createWorkspace({
      ...inDirectory('one', poetryProject('same', '1.0.0')),
      ...inDirectory('two', poetryProject('same', '1.0.0'))
    });
    await assert.rejects(Repository.load(root, { vcs: null, host: null }), /Duplicate project id "same"/);
  });

  it('detects the host from the origin remote', async () => {
    root = await createWorkspace(poetryProject('solo', '0.3.0'));
    const vcs = new FakeVcs(root);
    vcs.remotes = [remote('origin', 'git@github.com:owner/solo.git')];
    const repository = await Repository.load(root, { vcs });

    assert.equal(repository.vcs, vcs);
    assert.ok(repository.host instanceof GithubRepositoryHost);
    assert.equal(repository.host.repo, 'owner/solo');
  });

  it('recognizes directories with a readme', async () => {
    root = await createWorkspace({ 'README.md': '# Hello\n' });
    const repository = await Repository.load(root, { vcs: null, host: null });
    assert.equal(await repository.isRecognized(), true);

    const empty = await createWorkspace();
    try {
      const bare = await Repository.load(empty, { vcs: null, host: null });
      assert.equal(await bare.isRecognized(), false);
    } finally {
      await removeWorkspace(empty);
    }
  });
});
