import { extname, join, relative } from 'path';
import pico from 'picocolors';
import { YAMLException } from 'js-yaml';
import { ValidationError, VcsError } from '../../utils/errors.js';
import { isDirectory, listFiles } from '../../utils/fs.js';
import type { Application } from '../application.js';
import type { OutputPort } from '../ports/output.js';
import { Changelog, ChangelogManager, ManagedChangelog, dumpChangelog, dumpEntry, getAuthors } from './changelog.js';
import { LEGACY_CHANGELOG_EXTENSIONS, convertLegacyChangelog } from './legacy.js';

/**
 * The author of new entries when none is given: the GitHub user behind the
 * Git email when the host can resolve it, the email otherwise.
 */
export async function getDefaultAuthor(app: Application): Promise<string | null> {
  const vcs = app.repository.vcs;
  const email = vcs ? (await vcs.getAuthor()).email : undefined;
  if (!email) {
    return null;
  }
  return app.repository.host ? app.repository.host.getUsername(email) : email;
}

export interface AddEntryOptions {
  type?: string;
  description?: string;
  author?: string;
  pr?: string;
  issues?: string[];
  commit?: boolean;
}

export async function addChangelogEntry(app: Application, manager: ChangelogManager, options: AddEntryOptions): Promise<void> {
  if (manager.readonly) {
    throw new ValidationError('cannot add changelog because the feature must be enabled in the config');
  }
  const vcs = app.repository.vcs;
  if (options.commit && !vcs) {
    throw new VcsError('no VCS detected, but --commit was used');
  }
  if (!options.type) {
    throw new ValidationError('missing --type, -t');
  }
  if (!options.description) {
    throw new ValidationError('missing --description, -d');
  }
  const author = options.author ?? (await getDefaultAuthor(app));
  if (!author) {
    throw new ValidationError('missing --author, -a');
  }

  const entry = manager.makeEntry(options.type, options.description, author, options.pr, options.issues);
  const unreleased = manager.unreleased();
  const changelog: Changelog = (await unreleased.exists()) ? await unreleased.load() : { entries: [] };
  await unreleased.save({ ...changelog, entries: [...changelog.entries, entry] });
  app.output.message(dumpEntry(entry).trimEnd());

  if (options.commit && vcs) {
    let message = `${options.type}: ${options.description}`;
    const main = app.mainProject();
    const prefix = main ? relative(app.repository.directory, main.directory).replaceAll('\\', '/') : '';
    if (prefix !== '') {
      message = `${prefix}/: ${message}`;
    }
    await vcs.add([unreleased.path]);
    await vcs.commit(message);
  }
}

export interface FormatOptions {
  version?: string;
  all?: boolean;
  markdown?: boolean;
}

function htmlAnchor(manager: ChangelogManager, kind: 'pr' | 'issue', reference: string, output: OutputPort): string {
  const host = manager.repositoryHost;
  if (!host) {
    return `<a href="${reference}">Link</a>`;
  }
  try {
    const item = kind === 'pr' ? host.getPullRequestByReference(reference) : host.getIssueByReference(reference);
    return `<a href="${item.url}">${item.id}</a>`;
  } catch (error) {
    output.warn(error instanceof Error ? error.message : String(error));
    return `<a href="${reference}">Link</a>`;
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export async function renderMarkdown(manager: ChangelogManager, changelog: ManagedChangelog, output: OutputPort): Promise<string[]> {
  if (changelog.version === null && !(await changelog.exists())) {
    return ['## Unreleased'];
  }
  const content = await changelog.load();
  const lines = [
    changelog.version === null ? '## Unreleased' : `## ${changelog.version} (${content.releaseDate ?? 'unknown'})`,
    '',
    '<table><tr><th>Type</th><th>Description</th><th>PR</th><th>Issues</th><th>Author</th></tr>'
  ];
  for (const entry of content.entries) {
    const pr = entry.pr ? htmlAnchor(manager, 'pr', entry.pr, output) : '';
    const issues = (entry.issues ?? []).map(issue => htmlAnchor(manager, 'issue', issue, output)).join(', ');
    lines.push(
      `  <tr><td>${capitalize(entry.type)}</td><td>\n\n${entry.description}</td>` +
      `<td>${pr}</td><td>${issues}</td><td>${getAuthors(entry).join(', ')}</td></tr>`
    );
  }
  lines.push('</table>');
  return lines;
}

export async function renderTerminal(changelog: ManagedChangelog): Promise<string[]> {
  if (changelog.version === null && !(await changelog.exists())) {
    return [pico.bold('Unreleased')];
  }
  const content = await changelog.load();
  const lines = [
    changelog.version === null
      ? pico.bold('Unreleased')
      : `${pico.bold(changelog.version)} (${pico.underline(content.releaseDate ?? 'unknown')})`
  ];
  for (const entry of content.entries) {
    const description = entry.description.replace(/`([^`]+)`/g, (_match, code: string) => pico.gray(code));
    lines.push(`  ${pico.italic(pico.cyan(entry.type))} - ${description} (${pico.yellow(getAuthors(entry).join(', '))})`);
  }
  return lines;
}

export async function formatChangelogs(manager: ChangelogManager, options: FormatOptions, output: OutputPort): Promise<string[]> {
  if (options.all && options.version !== undefined) {
    throw new ValidationError('--all is incompatible with the version argument');
  }
  let changelogs: ManagedChangelog[];
  if (options.all) {
    changelogs = await manager.all();
  } else if (options.version !== undefined) {
    const changelog = manager.version(options.version);
    if (!(await changelog.exists())) {
      throw new ValidationError(`Changelog for version "${options.version}" does not exist.`);
    }
    changelogs = [changelog];
  } else {
    changelogs = [manager.unreleased()];
  }

  const lines: string[] = [];
  for (const changelog of changelogs) {
    lines.push(...(options.markdown ? await renderMarkdown(manager, changelog, output) : await renderTerminal(changelog)), '');
  }
  return lines;
}

export interface ConvertOptions {
  author?: string;
  directory?: string;
  dry?: boolean;
  failFast?: boolean;
}

/**
 * Convert every YAML changelog in the directory. Files that fail are
 * reported and skipped; resolves to the exit code.
 */
export async function convertChangelogs(app: Application, manager: ChangelogManager, options: ConvertOptions): Promise<number> {
  const output = app.output;
  const author = options.author ?? (await getDefaultAuthor(app));
  if (!author) {
    throw new ValidationError('missing --author, -a');
  }
  const directory = options.directory !== undefined ? join(app.cwd, options.directory) : manager.directory;
  if (!(await isDirectory(directory))) {
    throw new ValidationError(`"${directory}" is not a directory`);
  }

  let failed = false;
  for (const name of await listFiles(directory)) {
    if (failed && options.failFast) {
      break;
    }
    if (!LEGACY_CHANGELOG_EXTENSIONS.includes(extname(name))) {
      continue;
    }
    const source = join(directory, name);
    try {
      const { target, changelog } = await convertLegacyChangelog(manager, source, author);
      if (options.dry) {
        output.message(`${pico.underline(pico.cyan(`# ${target.path}`))}\n${dumpChangelog(changelog).trimEnd()}`);
      } else {
        await target.save(changelog);
      }
    } catch (error) {
      failed = true;
      const message = error instanceof Error ? error.message : String(error);
      output.warn(error instanceof YAMLException ? `cannot parse "${source}": ${message}` : `could not convert "${source}": ${message}`);
    }
  }
  return failed ? 1 : 0;
}
