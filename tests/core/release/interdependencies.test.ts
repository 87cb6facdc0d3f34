import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import {
  InterdependencyProject,
  findInterdependencyRefs,
  getInterdependencyRefs
} from '../../../src/core/release/interdependencies.js';
import { createWorkspace, readText, removeWorkspace } from '../../helpers/workspace.js';

const PYPROJECT = [
  '[project]',
  'name = "app"',
  'version = "1.0.0"',
  'dependencies = [',
  '    "core-lib>=1.0.0",',
  '    "core-lib-extra>=9.9.9",',
  '    "requests>=2.0",',
  ']',
  '',
  '[tool.poetry.dependencies]',
  'core-lib = "^1.0.0"',
  '"helpers" = "1.0.0"',
  'helpers-cli = "1.0.0"',
  ''
].join('\n');

const SETUP_CFG = [
  '[options]',
  'install_requires =',
  '    core-lib>=1.0.0',
  '    requests',
  'setup_requires = helpers==1.0.0',
  ''
].join('\n');

let root: string;

before(async () => {
  root = await createWorkspace({
    'app/pyproject.toml': PYPROJECT,
    'app/setup.cfg': SETUP_CFG,
    'other/pyproject.toml': '[tool.poetry.dependencies]\nmy-core-lib = "^2.0.0"\n"my-core-lib" = "2.0.0"\ncore-lib = "^1.0.0"\n'
  });
});

after(async () => {
  await removeWorkspace(root);
});

function stubProject(id: string, files: string[], isPythonProject: boolean = true): InterdependencyProject {
  return {
    id,
    distName: id,
    isPythonProject,
    async getRequirementFiles(): Promise<string[]> {
      return files;
    }
  };
}

describe('findInterdependencyRefs', () => {
  it('finds pins in TOML keys and requirement strings', async () => {
    const file = join(root, 'app/pyproject.toml');
    const refs = await findInterdependencyRefs([file], ['core-lib', 'helpers']);
    assert.deepEqual(
      refs.map(ref => ref.content),
      ['    "core-lib>=1.0.0",', 'core-lib = "^1.0.0"', '"helpers" = "1.0.0"']
    );
    for (const ref of refs) {
      assert.equal(ref.kind, 'interdependency');
      assert.equal(ref.value, '1.0.0');
      assert.equal(PYPROJECT.slice(ref.start, ref.end), '1.0.0');
    }
  });

  it('does not match names that only share a prefix', async () => {
    const refs = await findInterdependencyRefs([join(root, 'app/pyproject.toml')], ['core']);
    assert.deepEqual(refs, []);
  });

  it('does not match keys that only end with the name', async () => {
    const refs = await findInterdependencyRefs([join(root, 'other/pyproject.toml')], ['core-lib']);
    assert.deepEqual(refs.map(ref => [ref.content, ref.value]), [['core-lib = "^1.0.0"', '1.0.0']]);
  });

  it('finds pins in setup.cfg requirement lists', async () => {
    const file = join(root, 'app/setup.cfg');
    const refs = await findInterdependencyRefs([file], ['core-lib', 'helpers']);
    assert.deepEqual(refs.map(ref => ref.content), ['    core-lib>=1.0.0', 'setup_requires = helpers==1.0.0']);
    const text = await readText(root, 'app/setup.cfg');
    assert.deepEqual(refs.map(ref => text.slice(ref.start, ref.end)), ['1.0.0', '1.0.0']);
  });
});

describe('getInterdependencyRefs', () => {
  it('scans for Python siblings only', async () => {
    const files = [join(root, 'app/pyproject.toml')];
    const app = stubProject('app', files);
    const refs = await getInterdependencyRefs(app, [app, stubProject('core-lib', []), stubProject('helpers', [], false)]);
    assert.deepEqual(refs.map(ref => ref.content), ['    "core-lib>=1.0.0",', 'core-lib = "^1.0.0"']);
  });

  it('returns nothing without siblings', async () => {
    const app = stubProject('app', [join(root, 'app/pyproject.toml')]);
    assert.deepEqual(await getInterdependencyRefs(app, [app]), []);
  });
});
