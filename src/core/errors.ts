/**
 * Error taxonomy for the IssueRequest operator.
 *
 * Every failure the reconciler can meet is one of these classes, so the
 * scheduling decision (fatal, slow poll, short retry, backoff) is made from
 * the type rather than from message text.
 */

import type { ArkErrors } from 'arktype';

export class OperatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OperatorError';
  }
}

/**
 * The repository URL of a record cannot be split into owner and repo.
 * Retrying cannot fix it; only an edit of the record can.
 */
export class MalformedRepoRefError extends OperatorError {
  constructor(public readonly repoUrl: string) {
    super(`Invalid repository URL: '${repoUrl}'`, 'MALFORMED_REPO_REF', { repoUrl });
    this.name = 'MalformedRepoRefError';
  }
}

/**
 * The record already tracks an issue number, but the remote repository no
 * longer has that issue.
 */
export class IssueIdentityError extends OperatorError {
  constructor(
    public readonly owner: string,
    public readonly repo: string,
    public readonly expectedNumber: number,
    public readonly foundNumber?: number
  ) {
    super(
      foundNumber === undefined
        ? `Issue #${expectedNumber} was not found in ${owner}/${repo}`
        : `Issue #${expectedNumber} in ${owner}/${repo} resolved to #${foundNumber}`,
      'ISSUE_IDENTITY',
      { owner, repo, expectedNumber, foundNumber }
    );
    this.name = 'IssueIdentityError';
  }
}

export class UnauthorizedError extends OperatorError {
  constructor(message = 'The issue tracker rejected the access token', options?: { cause?: unknown }) {
    super(message, 'UNAUTHORIZED', undefined, options);
    this.name = 'UnauthorizedError';
  }
}

export class RemoteUnavailableError extends OperatorError {
  constructor(
    operation: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Issue tracker unavailable during ${operation}${status ? ` (HTTP ${status})` : ''}`,
      'REMOTE_UNAVAILABLE',
      { operation, status },
      options
    );
    this.name = 'RemoteUnavailableError';
  }
}

export class RemoteRejectedError extends OperatorError {
  constructor(
    operation: string,
    public readonly status: number,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Issue tracker rejected ${operation} (HTTP ${status})${detail ? `: ${detail}` : ''}`,
      'REMOTE_REJECTED',
      { operation, status },
      options
    );
    this.name = 'RemoteRejectedError';
  }
}

/**
 * Optimistic concurrency failure: the record changed since it was read.
 */
export class WriteConflictError extends OperatorError {
  constructor(resourceId: string, options?: { cause?: unknown }) {
    super(`Write conflict on ${resourceId}`, 'WRITE_CONFLICT', { resourceId }, options);
    this.name = 'WriteConflictError';
  }
}

export class RecordNotFoundError extends OperatorError {
  constructor(resourceId: string, options?: { cause?: unknown }) {
    super(`${resourceId} not found`, 'NOT_FOUND', { resourceId }, options);
    this.name = 'RecordNotFoundError';
  }
}

export class AlreadyExistsError extends OperatorError {
  constructor(resourceId: string, options?: { cause?: unknown }) {
    super(`${resourceId} already exists`, 'ALREADY_EXISTS', { resourceId }, options);
    this.name = 'AlreadyExistsError';
  }
}

export class StoreUnavailableError extends OperatorError {
  constructor(operation: string, resourceId: string, detail: string, options?: { cause?: unknown }) {
    super(
      `Store ${operation} failed for ${resourceId}: ${detail}`,
      'STORE_UNAVAILABLE',
      { operation, resourceId },
      options
    );
    this.name = 'StoreUnavailableError';
  }
}

export class ConfigurationError extends OperatorError {
  constructor(message: string, public readonly problems: string[]) {
    super(message, 'CONFIGURATION_ERROR', { problems });
    this.name = 'ConfigurationError';
  }
}

/**
 * Admission-time rejection of an IssueRequest spec
 */
export class SpecValidationError extends OperatorError {
  constructor(
    message: string,
    public readonly resourceName: string,
    public readonly fields: string[]
  ) {
    super(message, 'VALIDATION_ERROR', { resourceName, fields });
    this.name = 'SpecValidationError';
  }
}

/**
 * Format arktype validation errors for an IssueRequest spec
 */
export function formatSpecErrors(errors: ArkErrors, resourceName: string): SpecValidationError {
  const fields = errors.map((problem) => (problem.path.length > 0 ? problem.path.join('.') : 'spec'));

  let message = `Invalid IssueRequest '${resourceName}':`;
  errors.forEach((problem, index) => {
    message += `\n  ${index + 1}. ${problem.message}`;
  });

  return new SpecValidationError(message, resourceName, fields);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
