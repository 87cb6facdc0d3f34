import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { TtlCache } from '../../../src/core/cache/ttl-cache.js';
import { CheckContext, CheckResult, formatChecks, formatSummary, getCheckPlugin, runChecks } from '../../../src/core/checks/index.js';
import { createRecordingOutput } from '../../../src/core/ports/recording-output.js';
import type { Fetcher } from '../../../src/core/repository/host.js';
import { Repository } from '../../../src/core/repository/repository.js';
import { releaseChecks } from '../../../src/core/checks/release.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { createWorkspace, poetryProject, removeWorkspace, stripAnsi } from '../../helpers/workspace.js';

const PYPROJECT = `[tool.poetry]
name = "demo"
version = "1.0.0"
readme = "README.md"
homepage = "https://example.com"
license = "MIT"
classifiers = ["Programming Language :: Python", "Bogus :: Classifier"]

[tool.poetry.urls]
Repository = "https://example.com/repo"
"Bug Tracker" = "https://example.com/issues"

[tool.slipway]
typed = true
`;

const listFetcher: Fetcher = async (url: string) => {
  if (url.includes('pypi')) {
    return new Response('Programming Language :: Python\nLicense :: OSI Approved :: MIT License\n');
  }
  return new Response(JSON.stringify({ licenses: [{ licenseId: 'MIT' }, { licenseId: 'Apache-2.0' }] }));
};

const offlineFetcher: Fetcher = async () => {
  throw new Error('offline');
};

let root: string;
let repository: Repository;

function context(fetcher: Fetcher): CheckContext {
  return { repository, output: createRecordingOutput(), cwd: root, cache: new TtlCache<string[]>(), fetcher };
}

before(async () => {
  root = await createWorkspace({
    'pyproject.toml': PYPROJECT,
    'README.md': '# demo\n',
    'src/demo/__init__.py': '__version__ = "1.0.0"\n',
    'src/demo/py.typed': ''
  });
  repository = await Repository.load(root, { vcs: null, host: null });
});

after(async () => {
  await removeWorkspace(root);
});

describe('runChecks', () => {
  it('runs every plugin for the project', async () => {
    const result = await runChecks(context(listFetcher));
    assert.equal(result.sections.length, 1);
    assert.deepEqual(
      result.sections[0].checks.map(item => [item.name, item.result, item.description]),
      [
        ['changelog:validate', CheckResult.SKIPPED, undefined],
        ['general:packages', CheckResult.OK, 'Detected src/demo'],
        ['general:typed', CheckResult.OK, 'py.typed exists as expected'],
        ['metadata:classifiers', CheckResult.ERROR, 'Found bad classifiers: "Bogus :: Classifier"'],
        ['metadata:license', CheckResult.OK, 'License "MIT" is a valid SPDX identifier.'],
        ['metadata:readme', CheckResult.OK, 'Readme is configured correctly (path: README.md)'],
        ['metadata:urls', CheckResult.RECOMMENDATION, 'Please configure the following URLs: "Documentation"'],
        ['release:source-code-version', CheckResult.OK, 'Found __version__ in demo'],
        ['release:consistent-versions', CheckResult.OK, 'All version references are equal']
      ]
    );
    assert.equal(result.exitCode, 1);
    assert.equal(stripAnsi(formatSummary(result)), 'Summary: 6 OK, 1 RECOMMENDATION, 1 ERROR, 1 SKIPPED, exit code: 1');
  });

  it('downgrades list validation to a warning when offline', async () => {
    const result = await runChecks(context(offlineFetcher));
    const byName = new Map(result.sections[0].checks.map(item => [item.name, item]));
    assert.equal(byName.get('metadata:classifiers')?.result, CheckResult.WARNING);
    assert.equal(
      byName.get('metadata:license')?.description,
      'Could not validate license because the SPDX list could not be fetched (offline)'
    );
    assert.equal(result.exitCode, 0);
    assert.equal((await runChecks(context(offlineFetcher), { warningsAsErrors: true })).exitCode, 1);
  });
});

describe('releaseChecks', () => {
  let inconsistent: string;

  before(async () => {
    inconsistent = await createWorkspace({
      ...poetryProject('demo', '1.0.0'),
      'src/demo/__init__.py': '__version__ = "1.1.0"\n'
    });
  });

  after(async () => {
    await removeWorkspace(inconsistent);
  });

  it('lists every differing version with its files', async () => {
    const checks = await releaseChecks.getApplicationChecks?.({
      repository: await Repository.load(inconsistent, { vcs: null, host: null }),
      output: createRecordingOutput(),
      cwd: inconsistent,
      cache: new TtlCache<string[]>(),
      fetcher: offlineFetcher
    });
    assert.deepEqual(checks, [
      {
        name: 'consistent-versions',
        result: CheckResult.ERROR,
        description: 'Found 2 differing version references',
        details: '1.0.0: pyproject.toml\n1.1.0: src/demo/__init__.py'
      }
    ]);
  });
});

describe('getCheckPlugin', () => {
  it('rejects unknown plugins', () => {
    assert.throws(() => getCheckPlugin('spelling'), ConfigError);
  });
});

describe('formatChecks', () => {
  const checks = [
    { name: 'a:x', result: CheckResult.OK, description: 'fine' },
    { name: 'a:long', result: CheckResult.ERROR, description: 'bad', details: 'one\ntwo' },
    { name: 'a:skip', result: CheckResult.SKIPPED }
  ];

  it('aligns names and results', () => {
    assert.deepEqual(formatChecks(checks).map(line => stripAnsi(line)), [
      '  a:x     OK             - fine',
      '  a:long  ERROR          - bad',
      '    one',
      '    two'
    ]);
  });

  it('shows skipped checks on request', () => {
    assert.equal(stripAnsi(formatChecks(checks, true)[4]).trimEnd(), '  a:skip  SKIPPED');
  });
});
