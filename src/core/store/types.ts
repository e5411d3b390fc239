import type { IssueRequest, ObjectKey } from '../types/issue-request.js';

/**
 * Record API over IssueRequest records.
 *
 * Writes are compare-and-swap on `metadata.resourceVersion` and throw
 * `WriteConflictError` when the stored version moved on. Reads and writes of
 * an erased record throw `RecordNotFoundError`, except `get`, which resolves
 * to `undefined`.
 */
export interface IssueRequestStore {
  get(key: ObjectKey): Promise<IssueRequest | undefined>;

  /** All records, in one namespace or (without one) cluster-wide */
  list(namespace?: string): Promise<IssueRequest[]>;

  /**
   * Replace metadata and spec. Status in the body is ignored.
   */
  update(record: IssueRequest): Promise<IssueRequest>;

  /**
   * Replace status through the status subresource. Spec in the body is ignored.
   */
  updateStatus(record: IssueRequest): Promise<IssueRequest>;

  /**
   * Request deletion. With finalizers present the store only sets
   * `deletionTimestamp`; the record is erased once the finalizers are gone.
   * Deleting an absent record is not an error.
   */
  delete(key: ObjectKey): Promise<void>;
}

/**
 * Credential holder of one IssueRequest
 */
export interface CredentialHolder {
  key: ObjectKey;
  /** Bearer token for the issue tracker; empty until an operator fills it in */
  token: string;
}

export interface CredentialStore {
  get(owner: IssueRequest): Promise<CredentialHolder | undefined>;

  /**
   * Create the empty-token holder owned by `owner`. Throws
   * `AlreadyExistsError` when one exists; an existing holder is never
   * overwritten.
   */
  createEmpty(owner: IssueRequest): Promise<CredentialHolder>;
}

export const CREDENTIAL_TOKEN_KEY = 'token';

export function credentialHolderKey(owner: ObjectKey): ObjectKey {
  return { namespace: owner.namespace, name: `${owner.name}-token-secret` };
}
