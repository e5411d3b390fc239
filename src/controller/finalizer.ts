/**
 * Finalization guard: keeps an IssueRequest from being erased until the
 * operator has closed its remote issue.
 */

import { RecordNotFoundError, WriteConflictError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { IssueRequestStore } from '../core/store/types.js';
import {
  formatObjectKey,
  hasFinalizer,
  ISSUE_REQUEST_FINALIZER,
  type IssueRequest,
  objectKeyOf,
} from '../core/types/issue-request.js';

export interface FinalizationGuardOptions {
  finalizer?: string;
  /** Compare-and-swap attempts before a write conflict is given up on */
  maxAttempts?: number;
}

export const DEFAULT_FINALIZER_ATTEMPTS = 5;

/**
 * Returns the record to write, or undefined when no write is needed
 */
type FinalizerChange = (record: IssueRequest) => IssueRequest | undefined;

export class FinalizationGuard {
  readonly finalizer: string;
  private readonly maxAttempts: number;
  private logger = getComponentLogger('finalization-guard');

  constructor(
    private readonly store: IssueRequestStore,
    options: FinalizationGuardOptions = {}
  ) {
    this.finalizer = options.finalizer ?? ISSUE_REQUEST_FINALIZER;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_FINALIZER_ATTEMPTS);
  }

  /**
   * Add the finalizer if absent. Throws `RecordNotFoundError` when the record
   * is gone.
   */
  async ensure(record: IssueRequest): Promise<IssueRequest> {
    const result = await this.apply(record, (current) =>
      hasFinalizer(current, this.finalizer)
        ? undefined
        : withFinalizers(current, [...(current.metadata.finalizers ?? []), this.finalizer])
    );
    if (!result) {
      throw new RecordNotFoundError(formatObjectKey(record.metadata));
    }
    return result;
  }

  /**
   * Remove the finalizer if present. Resolves to undefined once the record is
   * erased.
   */
  async remove(record: IssueRequest): Promise<IssueRequest | undefined> {
    return this.apply(record, (current) =>
      hasFinalizer(current, this.finalizer)
        ? withFinalizers(
            current,
            (current.metadata.finalizers ?? []).filter((finalizer) => finalizer !== this.finalizer)
          )
        : undefined
    );
  }

  private async apply(record: IssueRequest, change: FinalizerChange): Promise<IssueRequest | undefined> {
    const resourceId = formatObjectKey(record.metadata);
    let current = record;

    for (let attempt = 1; ; attempt++) {
      const next = change(current);
      if (!next) {
        return current;
      }

      try {
        const written = await this.store.update(next);
        this.logger.debug('Updated finalizers', {
          resourceId,
          finalizers: written.metadata.finalizers ?? [],
          attempt,
        });
        return written;
      } catch (error) {
        if (error instanceof RecordNotFoundError) {
          return undefined;
        }
        if (!(error instanceof WriteConflictError) || attempt >= this.maxAttempts) {
          throw error;
        }
      }

      this.logger.debug('Finalizer write conflicted, refetching', { resourceId, attempt });
      const latest = await this.store.get(objectKeyOf(record));
      if (!latest) {
        return undefined;
      }
      current = latest;
    }
  }
}

function withFinalizers(record: IssueRequest, finalizers: string[]): IssueRequest {
  return { ...record, metadata: { ...record.metadata, finalizers } };
}
