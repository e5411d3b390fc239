/**
 * IssueRequest record model.
 *
 * The record is a namespaced custom resource: `spec` is owned by whoever
 * creates the record, `status` is written by the operator through the status
 * subresource, and `metadata.finalizers` carries the deletion guard.
 */

export const ISSUE_REQUEST_GROUP = 'issues.reconciler.dev';
export const ISSUE_REQUEST_VERSION = 'v1';
export const ISSUE_REQUEST_KIND = 'IssueRequest';
export const ISSUE_REQUEST_PLURAL = 'issuerequests';
export const ISSUE_REQUEST_API_VERSION = `${ISSUE_REQUEST_GROUP}/${ISSUE_REQUEST_VERSION}`;

export const ISSUE_REQUEST_FINALIZER = `${ISSUE_REQUEST_PLURAL}.${ISSUE_REQUEST_GROUP}/finalizer`;

/** Upper bound on `spec.description`, enforced at admission */
export const MAX_DESCRIPTION_LENGTH = 256;

export interface ObjectKey {
  namespace: string;
  name: string;
}

export interface IssueRequestMetadata extends ObjectKey {
  uid?: string;
  resourceVersion?: string;
  generation?: number;
  /** Deletion intent; set once by the store, never cleared */
  deletionTimestamp?: string;
  finalizers?: string[];
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface IssueRequestSpec {
  /** `https://github.com/{owner}/{repo}` */
  repo: string;
  title: string;
  description: string;
}

export type ConditionStatus = 'True' | 'False' | 'Unknown';

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason: string;
  message: string;
  lastTransitionTime: string;
}

export interface IssueRequestStatus {
  conditions?: Condition[];
  /** Remote issue number; 0 or absent until the first successful sync */
  issueNumber?: number;
  lastUpdated?: string;
  tokenRequired?: boolean;
}

export interface IssueRequest {
  apiVersion: string;
  kind: string;
  metadata: IssueRequestMetadata;
  spec: IssueRequestSpec;
  status?: IssueRequestStatus;
}

export function objectKeyOf(record: { metadata: ObjectKey }): ObjectKey {
  return { namespace: record.metadata.namespace, name: record.metadata.name };
}

export function formatObjectKey(key: ObjectKey): string {
  return `${key.namespace}/${key.name}`;
}

export function parseObjectKey(value: string): ObjectKey {
  const separator = value.indexOf('/');
  if (separator <= 0 || separator === value.length - 1) {
    throw new Error(`Invalid object key '${value}', expected 'namespace/name'`);
  }
  return { namespace: value.slice(0, separator), name: value.slice(separator + 1) };
}

export function isMarkedForDeletion(record: IssueRequest): boolean {
  return Boolean(record.metadata.deletionTimestamp);
}

export function hasFinalizer(record: IssueRequest, finalizer: string = ISSUE_REQUEST_FINALIZER): boolean {
  return record.metadata.finalizers?.includes(finalizer) ?? false;
}

/**
 * Kubernetes serializes metav1.Time with second precision.
 */
export function toKubernetesTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
