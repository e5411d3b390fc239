/**
 * ReconcileLoop: one pass of the IssueRequest state machine.
 *
 * Fetch -> DeletionCheck -> (Teardown | EnsureGuard -> TokenResolution ->
 * Sync -> StatusWrite). Each pass ends in a scheduling directive; nothing
 * throws out of `reconcile`.
 */

import {
  IssueIdentityError,
  MalformedRepoRefError,
  RecordNotFoundError,
  UnauthorizedError,
  WriteConflictError,
  toError,
} from '../core/errors.js';
import { getResourceLogger, type OperatorLogger } from '../core/logging/index.js';
import type { CredentialStore, IssueRequestStore } from '../core/store/types.js';
import {
  formatObjectKey,
  hasFinalizer,
  isMarkedForDeletion,
  type IssueRequest,
  type ObjectKey,
  objectKeyOf,
} from '../core/types/issue-request.js';
import {
  done,
  fatal,
  type ReconcileResult,
  requeue,
  requeueAfter,
  retryWithBackoff,
} from '../core/types/reconcile.js';
import { parseRepoRef, type RepoRef } from '../github/repo-ref.js';
import type { RemoteIssue, TicketingClientFactory } from '../github/types.js';
import { FinalizationGuard } from './finalizer.js';
import { SecretProvisioner } from './secret-provisioner.js';
import { StatusProjector } from './status-projector.js';

export const DEFAULT_TOKEN_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_CONFLICT_RETRY_DELAY_MS = 5_000;

export interface ReconcileLoopDependencies {
  store: IssueRequestStore;
  credentials: CredentialStore;
  ticketingClientFactory: TicketingClientFactory;
}

export interface ReconcileLoopOptions {
  /** Delay before re-checking a credential holder that has no usable token */
  tokenPollIntervalMs?: number;
  /** Delay before retrying after a stale status write */
  conflictRetryDelayMs?: number;
  finalizer?: string;
  now?: () => Date;
}

export class ReconcileLoop {
  private readonly store: IssueRequestStore;
  private readonly guard: FinalizationGuard;
  private readonly secrets: SecretProvisioner;
  private readonly projector: StatusProjector;
  private readonly createTicketingClient: TicketingClientFactory;
  private readonly tokenPollIntervalMs: number;
  private readonly conflictRetryDelayMs: number;
  private readonly now: () => Date;

  constructor(dependencies: ReconcileLoopDependencies, options: ReconcileLoopOptions = {}) {
    this.store = dependencies.store;
    this.guard = new FinalizationGuard(dependencies.store, {
      ...(options.finalizer && { finalizer: options.finalizer }),
    });
    this.secrets = new SecretProvisioner(dependencies.credentials);
    this.projector = new StatusProjector(dependencies.store);
    this.createTicketingClient = dependencies.ticketingClientFactory;
    this.tokenPollIntervalMs = options.tokenPollIntervalMs ?? DEFAULT_TOKEN_POLL_INTERVAL_MS;
    this.conflictRetryDelayMs = options.conflictRetryDelayMs ?? DEFAULT_CONFLICT_RETRY_DELAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  async reconcile(key: ObjectKey): Promise<ReconcileResult> {
    const logger = getResourceLogger(formatObjectKey(key));

    let record: IssueRequest | undefined;
    try {
      record = await this.store.get(key);
    } catch (error) {
      logger.warn('Failed to read IssueRequest', { error: toError(error).message });
      return retryWithBackoff(toError(error));
    }

    if (!record) {
      logger.debug('IssueRequest no longer exists');
      return done();
    }

    try {
      return isMarkedForDeletion(record)
        ? await this.teardown(record, logger)
        : await this.converge(record, logger);
    } catch (error) {
      return this.classify(toError(error), logger);
    }
  }

  private async converge(record: IssueRequest, logger: OperatorLogger): Promise<ReconcileResult> {
    let current: IssueRequest;
    try {
      current = await this.guard.ensure(record);
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        return done();
      }
      logger.warn('Failed to add finalizer', { error: toError(error).message });
      return requeue();
    }

    const token = await this.secrets.readToken(current);
    if (token.state === 'not-found') {
      const created = await this.secrets.ensureHolder(current);
      logger.info('Waiting for access token', { holderCreated: created });
      await this.writeTokenRequired(current, true);
      return requeue();
    }
    if (token.state === 'empty') {
      logger.debug('Credential holder has no token yet');
      await this.writeTokenRequired(current, true);
      return requeueAfter(this.tokenPollIntervalMs);
    }
    current = await this.writeTokenRequired(current, false);

    const ref = parseRepoRef(current.spec.repo);
    const client = this.createTicketingClient(token.token);
    const knownNumber = current.status?.issueNumber ?? 0;
    const { title, description } = current.spec;

    const found = await client.findIssue(ref.owner, ref.repo, title, knownNumber);
    if (knownNumber > 0 && found?.number !== knownNumber) {
      throw new IssueIdentityError(ref.owner, ref.repo, knownNumber, found?.number);
    }

    let issue: RemoteIssue;
    if (found) {
      issue = await client.updateIssue(ref.owner, ref.repo, found, description, title);
      logger.debug('Synchronized issue', { issueNumber: issue.number });
    } else {
      issue = await client.createIssue(ref.owner, ref.repo, title, description);
      logger.info('Created issue', { issueNumber: issue.number, repository: `${ref.owner}/${ref.repo}` });
    }

    await this.projector.persist(current, this.projector.project(current, issue, this.now()));
    return done();
  }

  private async teardown(record: IssueRequest, logger: OperatorLogger): Promise<ReconcileResult> {
    if (!hasFinalizer(record, this.guard.finalizer)) {
      return done();
    }

    try {
      const waiting = await this.closeRemoteIssue(record, logger);
      if (waiting) {
        return waiting;
      }
      await this.store.delete(objectKeyOf(record));
      await this.guard.remove(record);
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        return done();
      }
      logger.warn('Teardown failed, keeping finalizer', { error: toError(error).message });
      return retryWithBackoff(toError(error));
    }

    logger.info('Teardown complete, finalizer released');
    return done();
  }

  /**
   * Resolves to a directive when teardown has to wait, else undefined once
   * the remote side is settled.
   */
  private async closeRemoteIssue(
    record: IssueRequest,
    logger: OperatorLogger
  ): Promise<ReconcileResult | undefined> {
    const knownNumber = record.status?.issueNumber ?? 0;

    const token = await this.secrets.readToken(record);
    if (token.state !== 'present') {
      if (knownNumber === 0) {
        logger.info('No access token and no tracked issue, skipping remote cleanup');
        return undefined;
      }
      logger.info('Waiting for access token to close issue', { issueNumber: knownNumber });
      return requeueAfter(this.tokenPollIntervalMs);
    }

    let ref: RepoRef;
    try {
      ref = parseRepoRef(record.spec.repo);
    } catch (error) {
      if (error instanceof MalformedRepoRefError) {
        logger.warn('Repository URL is malformed, skipping remote cleanup', { repo: record.spec.repo });
        return undefined;
      }
      throw error;
    }

    const client = this.createTicketingClient(token.token);
    const issue = await client.findIssue(ref.owner, ref.repo, record.spec.title, knownNumber);

    if (!issue) {
      logger.debug('No remote issue to close');
      return undefined;
    }
    if (knownNumber > 0 && issue.number !== knownNumber) {
      logger.warn('Tracked issue not found, leaving other issues untouched', {
        issueNumber: knownNumber,
        foundNumber: issue.number,
      });
      return undefined;
    }
    if (issue.state === 'open') {
      await client.closeIssue(ref.owner, ref.repo, issue);
      logger.info('Closed issue', { issueNumber: issue.number });
    }
    return undefined;
  }

  /**
   * Write `status.tokenRequired` when it differs from the stored value
   */
  private async writeTokenRequired(record: IssueRequest, tokenRequired: boolean): Promise<IssueRequest> {
    if ((record.status?.tokenRequired ?? false) === tokenRequired) {
      return record;
    }
    return this.store.updateStatus({ ...record, status: { ...record.status, tokenRequired } });
  }

  private classify(error: Error, logger: OperatorLogger): ReconcileResult {
    if (error instanceof MalformedRepoRefError || error instanceof IssueIdentityError) {
      logger.error('Reconcile failed permanently', error);
      return fatal(error);
    }
    if (error instanceof UnauthorizedError) {
      logger.warn('Access token rejected, waiting for a new one', { error: error.message });
      return requeueAfter(this.tokenPollIntervalMs);
    }
    if (error instanceof WriteConflictError) {
      logger.debug('Status write conflicted, retrying shortly');
      return requeueAfter(this.conflictRetryDelayMs);
    }
    if (error instanceof RecordNotFoundError) {
      logger.debug('IssueRequest removed during reconcile');
      return done();
    }
    logger.warn('Reconcile failed, retrying with backoff', { error: error.message });
    return retryWithBackoff(error);
  }
}
