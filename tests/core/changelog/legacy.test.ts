import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { YAMLException } from 'js-yaml';
import { ChangelogManager } from '../../../src/core/changelog/changelog.js';
import { convertLegacyChangelog, matchAuthorInDescription } from '../../../src/core/changelog/legacy.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createWorkspace, removeWorkspace } from '../../helpers/workspace.js';

const RELEASED = `release_date: 2023-05-01
changes:
- type: change
  component: general
  description: Better output (@alice)
  fixes: ['#12']
- type: fix
  component: cli
  description: Crash on start
- type: feature
  component: docs
  description: Explain things
`;

let root: string;
let manager: ChangelogManager;

before(async () => {
  root = await createWorkspace({
    'legacy/1.0.0.yml': RELEASED,
    'legacy/_unreleased.yml': 'changes:\n- type: refactor\n  component: tests\n  description: Faster tests\n',
    'legacy/broken.yml': 'changes: [\n',
    'legacy/list.yml': '- a\n- b\n'
  });
  manager = new ChangelogManager({ directory: join(root, '.changelog') });
});

after(async () => {
  await removeWorkspace(root);
});

describe('matchAuthorInDescription', () => {
  it('splits off a trailing author', () => {
    assert.deepEqual(matchAuthorInDescription('Fix (@bob)'), { author: '@bob', description: 'Fix' });
    assert.deepEqual(matchAuthorInDescription('Fix (see #1)'), { author: null, description: 'Fix (see #1)' });
  });
});

describe('convertLegacyChangelog', () => {
  it('converts a released changelog', async () => {
    const { target, changelog } = await convertLegacyChangelog(manager, join(root, 'legacy/1.0.0.yml'), '@fallback');
    assert.equal(target.path, join(root, '.changelog/1.0.0.toml'));
    assert.equal(changelog.releaseDate, '2023-05-01');
    assert.deepEqual(
      changelog.entries.map(entry => [entry.type, entry.description, entry.author, entry.issues]),
      [
        ['improvement', 'Better output', '@alice', ['#12']],
        ['fix', 'cli: Crash on start', '@fallback', undefined],
        ['docs', 'Explain things', '@fallback', undefined]
      ]
    );
  });

  it('maps _unreleased to the unreleased changelog', async () => {
    const { target, changelog } = await convertLegacyChangelog(manager, join(root, 'legacy/_unreleased.yml'), '@fallback');
    assert.equal(target.version, null);
    assert.equal(changelog.releaseDate, undefined);
    assert.deepEqual(changelog.entries.map(entry => [entry.type, entry.description]), [['tests', 'Faster tests']]);
  });

  it('surfaces YAML syntax errors', async () => {
    await assert.rejects(convertLegacyChangelog(manager, join(root, 'legacy/broken.yml'), '@fallback'), YAMLException);
  });

  it('rejects documents without a changes list', async () => {
    await assert.rejects(convertLegacyChangelog(manager, join(root, 'legacy/list.yml'), '@fallback'), ValidationError);
  });
});
