/**
 * Repository hosting services resolve issue and pull request references and
 * map commit author emails to user names.
 */

export interface IssueRef {
  id: string;
  url: string;
  shortform: string;
}

export type PullRequestRef = IssueRef;

export interface RepositoryHost {
  readonly id: string;
  /** `@username` for the email, or the email itself when it cannot be resolved. */
  getUsername(email: string): Promise<string>;
  getIssueByReference(reference: string): IssueRef;
  getPullRequestByReference(reference: string): PullRequestRef;
}

export type Fetcher = (input: string, init?: RequestInit) => Promise<Response>;

export function isUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}
