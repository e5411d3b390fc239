/**
 * Derives the IssueRequest status from the remote issue.
 */

import type { IssueRequestStore } from '../core/store/types.js';
import {
  type Condition,
  type ConditionStatus,
  type IssueRequest,
  type IssueRequestStatus,
  toKubernetesTime,
} from '../core/types/issue-request.js';
import type { RemoteIssue } from '../github/types.js';

export const ISSUE_OPEN_CONDITION = 'IssueOpen';
export const HAS_PULL_REQUEST_CONDITION = 'HasPR';

/**
 * Upsert a condition by type. The existing transition time is kept while the
 * status value stays the same.
 */
export function setCondition(
  conditions: readonly Condition[],
  update: Omit<Condition, 'lastTransitionTime'>,
  now: Date
): Condition[] {
  const index = conditions.findIndex((condition) => condition.type === update.type);
  const existing = index >= 0 ? conditions[index] : undefined;
  const next: Condition = {
    ...update,
    lastTransitionTime:
      existing && existing.status === update.status && existing.lastTransitionTime
        ? existing.lastTransitionTime
        : toKubernetesTime(now),
  };

  if (index < 0) {
    return [...conditions, next];
  }
  return conditions.map((condition, i) => (i === index ? next : condition));
}

export function findCondition(status: IssueRequestStatus | undefined, type: string): Condition | undefined {
  return status?.conditions?.find((condition) => condition.type === type);
}

const asStatus = (value: boolean): ConditionStatus => (value ? 'True' : 'False');

export class StatusProjector {
  constructor(private readonly store: IssueRequestStore) {}

  project(record: IssueRequest, issue: RemoteIssue, now: Date): IssueRequestStatus {
    const isOpen = issue.state === 'open';
    const hasPullRequest = issue.hasLinkedChangeRequest;

    let conditions = setCondition(
      record.status?.conditions ?? [],
      {
        type: ISSUE_OPEN_CONDITION,
        status: asStatus(isOpen),
        reason: isOpen ? 'IssueIsOpen' : 'IssueIsClosed',
        message: isOpen ? `Issue #${issue.number} is currently open` : `Issue #${issue.number} is closed`,
      },
      now
    );
    conditions = setCondition(
      conditions,
      {
        type: HAS_PULL_REQUEST_CONDITION,
        status: asStatus(hasPullRequest),
        reason: hasPullRequest ? 'PullRequestExists' : 'NoPullRequest',
        message: hasPullRequest
          ? `Issue #${issue.number} has an associated pull request`
          : `Issue #${issue.number} does not have an associated pull request`,
      },
      now
    );

    return {
      conditions,
      issueNumber: issue.number,
      lastUpdated: toKubernetesTime(now),
      tokenRequired: record.status?.tokenRequired ?? false,
    };
  }

  /**
   * Write through the status subresource only
   */
  persist(record: IssueRequest, status: IssueRequestStatus): Promise<IssueRequest> {
    return this.store.updateStatus({ ...record, status });
  }
}
