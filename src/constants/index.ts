/**
 * Shared constants for the slipway CLI application
 * This file provides a single source of truth for file names, configuration
 * defaults and other constants used throughout the application.
 */

export const FILE_PATTERNS = {
  PYPROJECT_TOML: 'pyproject.toml',
  SLIPWAY_TOML: 'slipway.toml',
  SETUP_CFG: 'setup.cfg',
  SETUP_PY: 'setup.py',
  PY_TYPED: 'py.typed',
  README: 'README',
  // Files searched for a `__version__` assignment, in order
  VERSION_SOURCE_FILES: ['__init__.py', '__about__.py', '_version.py'],
} as const;

export const CONFIG_SECTION = 'slipway' as const;

export const RELEASE_DEFAULTS = {
  BRANCH: 'develop',
  COMMIT_MESSAGE: 'release {version}',
  TAG_FORMAT: '{version}',
  PLUGINS: ['changelog_release', 'source_code_version'],
  REMOTE: 'origin',
} as const;

export const CHECK_DEFAULTS = {
  PLUGINS: ['changelog', 'general', 'metadata', 'release'],
} as const;

export const CHANGELOG_DEFAULTS = {
  DIRECTORY: '.changelog',
  UNRELEASED_FILE: '_unreleased.toml',
  VERSION_FILE_TEMPLATE: '{version}.toml',
  VALID_TYPES: [
    'breaking change',
    'deprecation',
    'feature',
    'fix',
    'hygiene',
    'docs',
    'security',
    'tests',
    'improvement',
  ],
} as const;

export const CACHE = {
  DIR_ENV: 'SLIPWAY_CACHE_DIR',
  DEFAULT_SUBDIR: ['.cache', 'slipway'],
  // 7 days
  CLASSIFIERS_TTL_MS: 7 * 24 * 60 * 60 * 1000,
  LICENSES_TTL_MS: 7 * 24 * 60 * 60 * 1000,
} as const;

export const EXTERNAL_URLS = {
  PYPI_CLASSIFIERS: 'https://pypi.org/pypi?%3Aaction=list_classifiers',
  SPDX_LICENSES: 'https://raw.githubusercontent.com/spdx/license-list-data/main/json/licenses.json',
  GITHUB_API: 'https://api.github.com',
} as const;
