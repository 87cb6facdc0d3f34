import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import {
  ChangelogManager,
  dumpChangelog,
  dumpEntry,
  parseChangelog
} from '../../../src/core/changelog/changelog.js';
import { GithubRepositoryHost } from '../../../src/core/repository/hosts/github.js';
import { parseToml } from '../../../src/core/toml-file.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createWorkspace, pathExists, readText, removeWorkspace } from '../../helpers/workspace.js';

describe('changelog serialization', () => {
  it('parses entries and the release date', () => {
    const data = parseToml(
      'release-date = 2024-03-01\n\n[[entries]]\nid = "a1"\ntype = "fix"\ndescription = "Fix the thing"\nauthor = "@someone"\nissues = ["#3"]\n',
      'test.toml'
    );
    assert.deepEqual(parseChangelog(data, 'test.toml'), {
      entries: [{ id: 'a1', type: 'fix', description: 'Fix the thing', author: '@someone', issues: ['#3'] }],
      releaseDate: '2024-03-01'
    });
  });

  it('rejects entries without required keys', () => {
    assert.throws(
      () => parseChangelog({ entries: [{ id: 'a1', type: 'fix' }] }, 'test.toml'),
      { message: 'Validation error: test.toml entries[0]: entry requires "id", "type" and "description"' }
    );
  });

  it('reads back what it writes', () => {
    const changelog = {
      entries: [{ id: 'a1', type: 'feature', description: 'Add `x`', authors: ['@a', '@b'], pr: 'https://example.com/pull/1' }],
      releaseDate: '2024-03-01'
    };
    assert.deepEqual(parseChangelog(parseToml(dumpChangelog(changelog), 'x'), 'x'), changelog);
  });

  it('dumps a single entry as a table', () => {
    const text = dumpEntry({ id: 'a1', type: 'fix', description: 'Fix it' });
    assert.ok(text.endsWith('\n'));
    const table = parseToml(text, 'entry');
    assert.deepEqual([table.id, table.type, table.description], ['a1', 'fix', 'Fix it']);
  });
});

describe('ChangelogManager', () => {
  let root: string;
  let manager: ChangelogManager;

  beforeEach(async () => {
    root = await createWorkspace({
      '.changelog/_unreleased.toml': '[[entries]]\nid = "u1"\ntype = "fix"\ndescription = "Pending"\nauthor = "@dev"\n',
      '.changelog/1.0.0.toml': 'release-date = 2024-01-01\n\n[[entries]]\nid = "r1"\ntype = "feature"\ndescription = "First"\nauthor = "@dev"\n',
      '.changelog/1.10.0.toml': 'release-date = 2024-02-01\nentries = []\n',
      '.changelog/1.9.0.toml': 'release-date = 2024-01-15\nentries = []\n',
      '.changelog/notes.toml': 'entries = []\n'
    });
    manager = new ChangelogManager({
      directory: join(root, '.changelog'),
      repositoryHost: new GithubRepositoryHost('owner/repo', { token: 'test-secret' })
    });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('lists the unreleased changelog first, then newest versions', async () => {
    const names = (await manager.all()).map(changelog => changelog.version);
    assert.deepEqual(names, [null, '1.10.0', '1.9.0', '1.0.0']);
  });

  it('expands references through the repository host', () => {
    const entry = manager.makeEntry('fix', 'Fix it', '@dev', '7', ['#3']);
    assert.equal(entry.pr, 'https://github.com/owner/repo/issues/7');
    assert.deepEqual(entry.issues, ['https://github.com/owner/repo/issues/3']);
    assert.match(entry.id, /^[0-9a-f-]{36}$/);
  });

  it('rejects unknown change types', () => {
    assert.throws(() => manager.makeEntry('party', 'x', '@dev'), /invalid change type: party/);
  });

  it('validates entries', () => {
    assert.throws(() => manager.validateEntry({ id: '1', type: 'fix', description: 'x' }), /no "author" or "authors"/);
    assert.throws(
      () => manager.validateEntry({ id: '1', type: 'fix', description: 'x', author: '@a', authors: ['@b'] }),
      /only one should be present/
    );
    assert.throws(() => manager.validateEntry({ id: '1', type: 'fix', description: 'x', authors: [''] }), /empty string/);
    assert.deepEqual(manager.validateEntry({ id: '1', type: 'fix', description: 'x', author: '@a', issues: ['5'] }), {
      id: '1',
      type: 'fix',
      description: 'x',
      author: '@a',
      issues: ['https://github.com/owner/repo/issues/5']
    });
  });

  it('moves the unreleased changelog to the released version', async () => {
    const released = await manager.unreleased().release('1.1.0', new Date(2024, 4, 2));
    assert.equal(released.path, join(root, '.changelog/1.1.0.toml'));
    assert.equal(await pathExists(join(root, '.changelog/_unreleased.toml')), false);
    const content = await released.load(true);
    assert.equal(content.releaseDate, '2024-05-02');
    assert.deepEqual(content.entries.map(entry => entry.id), ['u1']);
  });

  it('does not release twice', async () => {
    await assert.rejects(manager.version('1.0.0').release('1.1.0'), ValidationError);
  });

  it('keeps release dates off the unreleased changelog', async () => {
    await assert.rejects(manager.unreleased().save({ entries: [], releaseDate: '2024-01-01' }), /must be a version/);
    await assert.rejects(manager.version('2.0.0').save({ entries: [] }), /must be the unreleased changelog/);
  });

  it('refuses to write when readonly', async () => {
    const readonly = new ChangelogManager({ directory: join(root, 'other'), readonly: true });
    await assert.rejects(readonly.unreleased().save({ entries: [] }), /is readonly/);
    assert.equal(await pathExists(join(root, 'other')), false);
  });

  it('writes TOML changelogs', async () => {
    await manager.unreleased().save({ entries: [{ id: 'n1', type: 'docs', description: 'Docs', author: '@dev' }] });
    const written = parseChangelog(parseToml(await readText(root, '.changelog/_unreleased.toml'), 'unreleased'), 'unreleased');
    assert.deepEqual(written, { entries: [{ id: 'n1', type: 'docs', description: 'Docs', author: '@dev' }] });
  });
});
