export { formatRepoRef, parseRepoRef, type RepoRef } from './repo-ref.js';
export {
  createGitHubTicketingClient,
  createGitHubTicketingClientFactory,
  DEFAULT_GITHUB_API_URL,
  GitHubTicketingClient,
  type GitHubTicketingClientOptions,
  toRemoteIssue,
} from './ticketing-client.js';
export type { IssueTracker, RemoteIssue, TicketingClientFactory } from './types.js';
