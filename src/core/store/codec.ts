/**
 * Decoding of IssueRequest custom objects.
 *
 * The custom objects API is untyped; everything read from it passes through
 * this schema before the reconciler sees it.
 */

import { type } from 'arktype';
import { StoreUnavailableError } from '../errors.js';
import type { Condition, IssueRequest, IssueRequestStatus } from '../types/issue-request.js';

const conditionSchema = type({
  type: 'string',
  status: "'True' | 'False' | 'Unknown'",
  'reason?': 'string',
  'message?': 'string',
  'lastTransitionTime?': 'string',
});

export const issueRequestObjectSchema = type({
  apiVersion: 'string',
  kind: 'string',
  metadata: {
    name: 'string',
    namespace: 'string',
    'uid?': 'string',
    'resourceVersion?': 'string',
    'generation?': 'number',
    'deletionTimestamp?': 'string',
    'finalizers?': 'string[]',
    'labels?': 'Record<string, string>',
    'annotations?': 'Record<string, string>',
  },
  'spec?': {
    'repo?': 'string',
    'title?': 'string',
    'description?': 'string',
  },
  'status?': {
    'conditions?': conditionSchema.array(),
    'issueNumber?': 'number',
    'lastUpdated?': 'string',
    'tokenRequired?': 'boolean',
  },
});

export type IssueRequestObject = typeof issueRequestObjectSchema.infer;

const listSchema = type({ items: 'unknown[]' });

/**
 * Decode one custom object; throws `StoreUnavailableError` on a malformed payload.
 */
export function decodeIssueRequest(value: unknown, resourceId: string): IssueRequest {
  const decoded = issueRequestObjectSchema(value);
  if (decoded instanceof type.errors) {
    throw new StoreUnavailableError('decode', resourceId, decoded.summary);
  }
  return toIssueRequest(decoded);
}

export function decodeIssueRequestList(value: unknown, resourceId: string): IssueRequest[] {
  const decoded = listSchema(value);
  if (decoded instanceof type.errors) {
    throw new StoreUnavailableError('decode', resourceId, decoded.summary);
  }
  return decoded.items.map((item) => decodeIssueRequest(item, resourceId));
}

function toIssueRequest(object: IssueRequestObject): IssueRequest {
  const { metadata, spec, status } = object;

  return {
    apiVersion: object.apiVersion,
    kind: object.kind,
    metadata: { ...metadata },
    spec: {
      repo: spec?.repo ?? '',
      title: spec?.title ?? '',
      description: spec?.description ?? '',
    },
    ...(status && { status: toIssueRequestStatus(status) }),
  };
}

function toIssueRequestStatus(
  status: NonNullable<IssueRequestObject['status']>
): IssueRequestStatus {
  const result: IssueRequestStatus = {};

  if (status.conditions) {
    result.conditions = status.conditions.map(
      (condition): Condition => ({
        type: condition.type,
        status: condition.status,
        reason: condition.reason ?? '',
        message: condition.message ?? '',
        lastTransitionTime: condition.lastTransitionTime ?? '',
      })
    );
  }
  if (status.issueNumber !== undefined) {
    result.issueNumber = status.issueNumber;
  }
  if (status.lastUpdated !== undefined) {
    result.lastUpdated = status.lastUpdated;
  }
  if (status.tokenRequired !== undefined) {
    result.tokenRequired = status.tokenRequired;
  }

  return result;
}

/**
 * Wire body for a replace call
 */
export function encodeIssueRequest(record: IssueRequest): Record<string, unknown> {
  return {
    apiVersion: record.apiVersion,
    kind: record.kind,
    metadata: record.metadata,
    spec: record.spec,
    ...(record.status && { status: record.status }),
  };
}
