/**
 * IssueRequest CustomResourceDefinition and its installer
 */

import type * as k8s from '@kubernetes/client-node';
import { isConflictError } from './kubernetes/errors.js';
import { getComponentLogger } from './logging/index.js';
import {
  ISSUE_REQUEST_GROUP,
  ISSUE_REQUEST_KIND,
  ISSUE_REQUEST_PLURAL,
  ISSUE_REQUEST_VERSION,
  MAX_DESCRIPTION_LENGTH,
} from './types/issue-request.js';

export const ISSUE_REQUEST_CRD_NAME = `${ISSUE_REQUEST_PLURAL}.${ISSUE_REQUEST_GROUP}`;

const conditionSchema: k8s.V1JSONSchemaProps = {
  type: 'object',
  required: ['type', 'status'],
  properties: {
    type: { type: 'string' },
    status: { type: 'string', _enum: ['True', 'False', 'Unknown'] },
    reason: { type: 'string' },
    message: { type: 'string' },
    lastTransitionTime: { type: 'string', format: 'date-time' },
  },
};

export const issueRequestCustomResourceDefinition: k8s.V1CustomResourceDefinition = {
  apiVersion: 'apiextensions.k8s.io/v1',
  kind: 'CustomResourceDefinition',
  metadata: { name: ISSUE_REQUEST_CRD_NAME },
  spec: {
    group: ISSUE_REQUEST_GROUP,
    scope: 'Namespaced',
    names: {
      kind: ISSUE_REQUEST_KIND,
      listKind: `${ISSUE_REQUEST_KIND}List`,
      plural: ISSUE_REQUEST_PLURAL,
      singular: 'issuerequest',
      shortNames: ['ir'],
    },
    versions: [
      {
        name: ISSUE_REQUEST_VERSION,
        served: true,
        storage: true,
        subresources: { status: {} },
        additionalPrinterColumns: [
          { name: 'Repo', type: 'string', jsonPath: '.spec.repo' },
          { name: 'Issue', type: 'integer', jsonPath: '.status.issueNumber' },
          { name: 'Open', type: 'string', jsonPath: '.status.conditions[?(@.type=="IssueOpen")].status' },
          { name: 'Age', type: 'date', jsonPath: '.metadata.creationTimestamp' },
        ],
        schema: {
          openAPIV3Schema: {
            type: 'object',
            properties: {
              spec: {
                type: 'object',
                required: ['repo', 'title'],
                properties: {
                  repo: { type: 'string', pattern: '^https://github\\.com/[^/]+/[^/]+$' },
                  title: { type: 'string', minLength: 1 },
                  description: { type: 'string', maxLength: MAX_DESCRIPTION_LENGTH },
                },
              },
              status: {
                type: 'object',
                properties: {
                  conditions: { type: 'array', items: conditionSchema },
                  issueNumber: { type: 'integer', minimum: 0 },
                  lastUpdated: { type: 'string', format: 'date-time' },
                  tokenRequired: { type: 'boolean' },
                },
              },
            },
          },
        },
      },
    ],
  },
};

/**
 * Create the CRD unless it exists. Resolves to whether this call created it.
 */
export async function ensureIssueRequestCrd(api: k8s.ApiextensionsV1Api): Promise<boolean> {
  const logger = getComponentLogger('crd-installer');

  try {
    await api.createCustomResourceDefinition({ body: issueRequestCustomResourceDefinition });
  } catch (error) {
    if (isConflictError(error)) {
      logger.debug('CRD already installed', { name: ISSUE_REQUEST_CRD_NAME });
      return false;
    }
    throw error;
  }

  logger.info('Installed CRD', { name: ISSUE_REQUEST_CRD_NAME });
  return true;
}
