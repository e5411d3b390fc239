/**
 * Kubernetes-backed stores: IssueRequest records through the custom objects
 * API, credential holders as Secrets.
 */

import type * as k8s from '@kubernetes/client-node';
import { RecordNotFoundError } from '../errors.js';
import { toStoreError } from '../kubernetes/errors.js';
import { getComponentLogger } from '../logging/index.js';
import {
  formatObjectKey,
  ISSUE_REQUEST_GROUP,
  ISSUE_REQUEST_KIND,
  ISSUE_REQUEST_PLURAL,
  ISSUE_REQUEST_VERSION,
  type IssueRequest,
  type ObjectKey,
} from '../types/issue-request.js';
import { decodeIssueRequest, decodeIssueRequestList, encodeIssueRequest } from './codec.js';
import {
  CREDENTIAL_TOKEN_KEY,
  credentialHolderKey,
  type CredentialHolder,
  type CredentialStore,
  type IssueRequestStore,
} from './types.js';

const resource = {
  group: ISSUE_REQUEST_GROUP,
  version: ISSUE_REQUEST_VERSION,
  plural: ISSUE_REQUEST_PLURAL,
};

export class KubernetesIssueRequestStore implements IssueRequestStore {
  private logger = getComponentLogger('issue-request-store');

  constructor(private readonly api: k8s.CustomObjectsApi) {}

  async get(key: ObjectKey): Promise<IssueRequest | undefined> {
    const resourceId = formatObjectKey(key);
    let object: unknown;
    try {
      object = await this.api.getNamespacedCustomObject({ ...resource, ...key });
    } catch (error) {
      const storeError = toStoreError(error, 'get', resourceId);
      if (storeError instanceof RecordNotFoundError) {
        return undefined;
      }
      throw storeError;
    }
    return decodeIssueRequest(object, resourceId);
  }

  async list(namespace?: string): Promise<IssueRequest[]> {
    const scope = namespace ?? '*';
    let response: unknown;
    try {
      response = namespace
        ? await this.api.listNamespacedCustomObject({ ...resource, namespace })
        : await this.api.listClusterCustomObject(resource);
    } catch (error) {
      throw toStoreError(error, 'list', scope);
    }
    return decodeIssueRequestList(response, scope);
  }

  async update(record: IssueRequest): Promise<IssueRequest> {
    const resourceId = formatObjectKey(record.metadata);
    let object: unknown;
    try {
      object = await this.api.replaceNamespacedCustomObject({
        ...resource,
        namespace: record.metadata.namespace,
        name: record.metadata.name,
        body: encodeIssueRequest(record),
      });
    } catch (error) {
      throw toStoreError(error, 'update', resourceId);
    }
    this.logger.debug('Updated IssueRequest', { resourceId });
    return decodeIssueRequest(object, resourceId);
  }

  async updateStatus(record: IssueRequest): Promise<IssueRequest> {
    const resourceId = formatObjectKey(record.metadata);
    let object: unknown;
    try {
      object = await this.api.replaceNamespacedCustomObjectStatus({
        ...resource,
        namespace: record.metadata.namespace,
        name: record.metadata.name,
        body: encodeIssueRequest(record),
      });
    } catch (error) {
      throw toStoreError(error, 'updateStatus', resourceId);
    }
    this.logger.debug('Updated IssueRequest status', { resourceId });
    return decodeIssueRequest(object, resourceId);
  }

  async delete(key: ObjectKey): Promise<void> {
    const resourceId = formatObjectKey(key);
    try {
      await this.api.deleteNamespacedCustomObject({ ...resource, ...key });
    } catch (error) {
      const storeError = toStoreError(error, 'delete', resourceId);
      if (storeError instanceof RecordNotFoundError) {
        this.logger.debug('IssueRequest already gone', { resourceId });
        return;
      }
      throw storeError;
    }
  }
}

export class KubernetesCredentialStore implements CredentialStore {
  private logger = getComponentLogger('credential-store');

  constructor(private readonly api: k8s.CoreV1Api) {}

  async get(owner: IssueRequest): Promise<CredentialHolder | undefined> {
    const key = credentialHolderKey(owner.metadata);
    let secret: k8s.V1Secret;
    try {
      secret = await this.api.readNamespacedSecret(key);
    } catch (error) {
      const storeError = toStoreError(error, 'get', formatObjectKey(key));
      if (storeError instanceof RecordNotFoundError) {
        return undefined;
      }
      throw storeError;
    }

    // stringData is write-only; the API server folds it into base64 data
    const encoded = secret.data?.[CREDENTIAL_TOKEN_KEY];
    const token = encoded ? Buffer.from(encoded, 'base64').toString('utf8').trim() : '';
    return { key, token };
  }

  async createEmpty(owner: IssueRequest): Promise<CredentialHolder> {
    const key = credentialHolderKey(owner.metadata);
    const body: k8s.V1Secret = {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {
        name: key.name,
        namespace: key.namespace,
        labels: { 'app.kubernetes.io/managed-by': 'issue-request-operator' },
        ...(owner.metadata.uid && {
          ownerReferences: [
            {
              apiVersion: owner.apiVersion,
              kind: ISSUE_REQUEST_KIND,
              name: owner.metadata.name,
              uid: owner.metadata.uid,
              controller: true,
              blockOwnerDeletion: true,
            },
          ],
        }),
      },
      type: 'Opaque',
      stringData: { [CREDENTIAL_TOKEN_KEY]: '' },
    };

    try {
      await this.api.createNamespacedSecret({ namespace: key.namespace, body });
    } catch (error) {
      throw toStoreError(error, 'create', formatObjectKey(key));
    }

    this.logger.info('Created credential holder', {
      secret: formatObjectKey(key),
      owner: formatObjectKey(owner.metadata),
    });
    return { key, token: '' };
  }
}
