export { decodeIssueRequest, decodeIssueRequestList, encodeIssueRequest } from './codec.js';
export { KubernetesCredentialStore, KubernetesIssueRequestStore } from './kubernetes-store.js';
export { CREDENTIAL_TOKEN_KEY, credentialHolderKey } from './types.js';
export type { CredentialHolder, CredentialStore, IssueRequestStore } from './types.js';
