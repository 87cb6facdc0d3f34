import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseSetupCfg } from '../../../src/core/project/setup-cfg.js';

describe('parseSetupCfg', () => {
  it('reads sections, options and continuation lines', () => {
    const text = [
      '[metadata]',
      'name = demo',
      'Version: 1.0.0',
      '# a comment',
      '[options]',
      'install_requires =',
      '    requests>=2',
      '',
      '    click',
      'python_requires = >=3.8',
      ''
    ].join('\n');

    assert.deepEqual(parseSetupCfg(text), {
      metadata: { name: 'demo', version: '1.0.0' },
      options: { install_requires: 'requests>=2\nclick', python_requires: '>=3.8' }
    });
  });

  it('ignores options outside of a section', () => {
    assert.deepEqual(parseSetupCfg('name = stray\n[metadata]\nname = kept\n'), { metadata: { name: 'kept' } });
  });

  it('merges repeated sections', () => {
    assert.deepEqual(parseSetupCfg('[a]\nx = 1\n[b]\ny = 2\n[a]\nz = 3\r\n'), { a: { x: '1', z: '3' }, b: { y: '2' } });
  });
});
