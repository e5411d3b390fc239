/**
 * Remote issue as seen by the reconciler
 */
export interface RemoteIssue {
  number: number;
  title: string;
  body: string;
  state: 'open' | 'closed';
  /** The tracker links a pull request to this item */
  hasLinkedChangeRequest: boolean;
  url?: string;
}

/**
 * Issue tracker operations the reconciler drives.
 *
 * Implementations throw `UnauthorizedError`, `RemoteRejectedError` or
 * `RemoteUnavailableError`.
 */
export interface IssueTracker {
  /**
   * Find the issue with `knownNumber` (when > 0), else the first issue titled
   * `title`. A number match always wins over a title match.
   */
  findIssue(
    owner: string,
    repo: string,
    title: string,
    knownNumber: number
  ): Promise<RemoteIssue | undefined>;

  createIssue(owner: string, repo: string, title: string, body: string): Promise<RemoteIssue>;

  /**
   * Set title and body. Calling it twice with the same arguments leaves the
   * same remote state.
   */
  updateIssue(
    owner: string,
    repo: string,
    issue: RemoteIssue,
    body: string,
    title: string
  ): Promise<RemoteIssue>;

  /**
   * Close the issue. Closing an already closed issue is not an error.
   */
  closeIssue(owner: string, repo: string, issue: RemoteIssue): Promise<void>;
}

/**
 * Builds a tracker client from the token of the current pass
 */
export type TicketingClientFactory = (token: string) => IssueTracker;
