import { EXTERNAL_URLS } from '../../../constants/index.js';
import { ValidationError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';
import type { Remote } from '../../../utils/git.js';
import { Fetcher, IssueRef, PullRequestRef, RepositoryHost, isUrl } from '../host.js';

const ISSUE_URL_PATTERN = /https?:\/\/([\w\-.]+)\/(?:|.+\/)([\w\-.]+)\/([\w\-.]+)\/(?:pulls?|issues)\/(\d+)/;

export interface GithubHostOptions {
  fetcher?: Fetcher;
  token?: string;
}

/**
 * GitHub and GitHub Enterprise. `repo` is `owner/name`, or `domain/owner/name`
 * for an Enterprise instance.
 */
export class GithubRepositoryHost implements RepositoryHost {
  readonly id = 'github';
  private readonly fetcher: Fetcher;
  private readonly token?: string;
  private readonly usernames = new Map<string, string>();

  constructor(public readonly repo: string, options: GithubHostOptions = {}) {
    this.fetcher = options.fetcher ?? fetch;
    this.token = options.token ?? process.env.GITHUB_TOKEN;
  }

  /**
   * Detect the host from the `origin` remote.
   */
  static fromRemotes(remotes: Remote[], options: GithubHostOptions = {}): GithubRepositoryHost | null {
    const origin = remotes.find(remote => remote.name === 'origin');
    if (!origin || !origin.fetchUrl.includes('github')) {
      return null;
    }
    const match = /github\.com[:/]([^/]+\/[^/]+)/.exec(origin.fetchUrl);
    if (!match) {
      return null;
    }
    return new GithubRepositoryHost(match[1].replace(/\.git$/, ''), options);
  }

  private get baseUrl(): string {
    const parts = this.repo.split('/');
    return parts.length === 3 ? `https://${parts[0]}` : 'https://github.com';
  }

  private get apiUrl(): string {
    return this.baseUrl === 'https://github.com' ? EXTERNAL_URLS.GITHUB_API : this.baseUrl.replace('https://', 'https://api.');
  }

  private get repoUrl(): string {
    const parts = this.repo.split('/');
    return `${this.baseUrl}/${parts.slice(-2).join('/')}`;
  }

  private issueShortform(url: string): string {
    const match = ISSUE_URL_PATTERN.exec(url);
    if (!match) {
      throw new ValidationError(`invalid issue URL: ${url}`);
    }
    const [, domain, owner, repo, issueId] = match;
    if ((domain === 'github.com' && this.repo === `${owner}/${repo}`) || this.repo === `${domain}/${owner}/${repo}`) {
      return issueId;
    }
    const result = `${owner}/${repo}#${issueId}`;
    return domain === 'github.com' ? result : `${domain}/${result}`;
  }

  getIssueByReference(reference: string): IssueRef {
    const stripped = reference.replace(/^#+/, '');
    if (/^\d+$/.test(stripped)) {
      return { id: stripped, url: `${this.repoUrl}/issues/${stripped}`, shortform: `#${stripped}` };
    }
    if (isUrl(stripped)) {
      const shortform = this.issueShortform(stripped);
      if (/^\d+$/.test(shortform)) {
        return { id: shortform, url: stripped, shortform: `#${shortform}` };
      }
      return { id: shortform, url: stripped, shortform };
    }
    throw new ValidationError(`bad issue/pull request reference for GitHub: ${reference}`);
  }

  getPullRequestByReference(reference: string): PullRequestRef {
    return this.getIssueByReference(reference);
  }

  async getUsername(email: string): Promise<string> {
    const cached = this.usernames.get(email);
    if (cached) {
      return cached;
    }

    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let result = email;
    try {
      const response = await this.fetcher(`${this.apiUrl}/search/users?q=${encodeURIComponent(email)}`, { headers });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      const login = extractFirstLogin(await response.json());
      if (login) {
        result = `@${login}`;
      }
    } catch (error) {
      logger.warn(`Could not look up GitHub username for ${email}`, error);
    }

    this.usernames.set(email, result);
    return result;
  }
}

function extractFirstLogin(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('items' in body) || !Array.isArray(body.items)) {
    return undefined;
  }
  const first: unknown = body.items[0];
  if (typeof first === 'object' && first !== null && 'login' in first && typeof first.login === 'string') {
    return first.login;
  }
  return undefined;
}
