/**
 * GitHub implementation of the IssueTracker façade, on top of @octokit/rest.
 */

import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import {
  RemoteRejectedError,
  RemoteUnavailableError,
  UnauthorizedError,
} from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { IssueTracker, RemoteIssue, TicketingClientFactory } from './types.js';

type GitHubIssue = RestEndpointMethodTypes['issues']['get']['response']['data'];

export interface GitHubTicketingClientOptions {
  /** REST API root; GitHub Enterprise uses `https://<host>/api/v3` */
  baseUrl?: string;
  userAgent?: string;
  /** Pre-built client; takes precedence over `baseUrl` and `userAgent` */
  octokit?: Octokit;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

interface HttpErrorShape {
  status: number;
  message: string;
}

function isHttpError(error: unknown): error is HttpErrorShape {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function toRemoteIssue(issue: Pick<GitHubIssue, 'number' | 'title' | 'body' | 'state' | 'pull_request' | 'html_url'>): RemoteIssue {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    state: issue.state === 'open' ? 'open' : 'closed',
    hasLinkedChangeRequest: Boolean(issue.pull_request),
    url: issue.html_url,
  };
}

export class GitHubTicketingClient implements IssueTracker {
  private readonly octokit: Octokit;
  private logger = getComponentLogger('github-ticketing-client');

  constructor(
    private readonly token: string,
    options: GitHubTicketingClientOptions = {}
  ) {
    this.octokit =
      options.octokit ??
      new Octokit({
        ...(token && { auth: token }),
        baseUrl: options.baseUrl ?? DEFAULT_GITHUB_API_URL,
        userAgent: options.userAgent ?? 'issue-request-operator',
      });
  }

  async findIssue(
    owner: string,
    repo: string,
    title: string,
    knownNumber: number
  ): Promise<RemoteIssue | undefined> {
    this.ensureToken();

    try {
      const issues = await this.listIssues(owner, repo);
      const match =
        (knownNumber > 0 ? issues.find((issue) => issue.number === knownNumber) : undefined) ??
        issues.find((issue) => issue.title === title);

      this.logger.debug('Looked up issue', {
        repository: `${owner}/${repo}`,
        knownNumber,
        candidates: issues.length,
        found: match?.number,
      });

      return match ? toRemoteIssue(match) : undefined;
    } catch (error) {
      throw this.translateError(error, 'list issues');
    }
  }

  async createIssue(owner: string, repo: string, title: string, body: string): Promise<RemoteIssue> {
    this.ensureToken();

    try {
      const { data } = await this.octokit.rest.issues.create({ owner, repo, title, body });
      this.logger.info('Created issue', { repository: `${owner}/${repo}`, number: data.number });
      return toRemoteIssue(data);
    } catch (error) {
      throw this.translateError(error, 'create issue');
    }
  }

  async updateIssue(
    owner: string,
    repo: string,
    issue: RemoteIssue,
    body: string,
    title: string
  ): Promise<RemoteIssue> {
    this.ensureToken();

    try {
      const { data } = await this.octokit.rest.issues.update({
        owner,
        repo,
        issue_number: issue.number,
        title,
        body,
      });
      this.logger.debug('Updated issue', { repository: `${owner}/${repo}`, number: data.number });
      return toRemoteIssue(data);
    } catch (error) {
      throw this.translateError(error, 'update issue');
    }
  }

  async closeIssue(owner: string, repo: string, issue: RemoteIssue): Promise<void> {
    this.ensureToken();

    try {
      await this.octokit.rest.issues.update({
        owner,
        repo,
        issue_number: issue.number,
        state: 'closed',
      });
      this.logger.info('Closed issue', { repository: `${owner}/${repo}`, number: issue.number });
    } catch (error) {
      // GitHub answers 422 when the transition is a no-op
      if (isHttpError(error) && error.status === 422) {
        this.logger.warn('Close rejected as a no-op, treating issue as closed', {
          repository: `${owner}/${repo}`,
          number: issue.number,
          reason: error.message,
        });
        return;
      }
      throw this.translateError(error, 'close issue');
    }
  }

  private listIssues(owner: string, repo: string) {
    return this.octokit.paginate(this.octokit.rest.issues.listForRepo, {
      owner,
      repo,
      state: 'all',
      per_page: 100,
    });
  }

  private ensureToken(): void {
    if (!this.token) {
      throw new UnauthorizedError('No access token configured for the issue tracker');
    }
  }

  private translateError(error: unknown, operation: string): Error {
    if (!isHttpError(error)) {
      return new RemoteUnavailableError(operation, undefined, { cause: error });
    }

    if (error.status === 401) {
      return new UnauthorizedError(`Issue tracker rejected the access token during ${operation}`, {
        cause: error,
      });
    }

    if (error.status >= 500) {
      return new RemoteUnavailableError(operation, error.status, { cause: error });
    }

    return new RemoteRejectedError(operation, error.status, error.message, { cause: error });
  }
}

export function createGitHubTicketingClient(
  token: string,
  options: GitHubTicketingClientOptions = {}
): GitHubTicketingClient {
  return new GitHubTicketingClient(token, options);
}

/**
 * Factory handed to the reconciler: one fresh client per pass, so a rotated
 * token takes effect on the next pass.
 */
export function createGitHubTicketingClientFactory(
  options: Omit<GitHubTicketingClientOptions, 'octokit'> = {}
): TicketingClientFactory {
  return (token: string) => createGitHubTicketingClient(token, options);
}
