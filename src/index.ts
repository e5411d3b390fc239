/**
 * issue-request-operator - reconcile IssueRequest records into GitHub issues.
 */

// =============================================================================
// OPERATOR
// =============================================================================
export {
  createIssueRequestOperator,
  IssueRequestOperator,
  type IssueRequestOperatorOptions,
} from './operator.js';
export * from './controller/index.js';

// =============================================================================
// CORE
// =============================================================================
export {
  DEFAULT_OPERATOR_CONFIG,
  getOperatorConfigFromEnv,
  type OperatorConfig,
  validateOperatorConfig,
} from './core/config.js';
export { ensureIssueRequestCrd, ISSUE_REQUEST_CRD_NAME, issueRequestCustomResourceDefinition } from './core/crd.js';
export * from './core/errors.js';
export * from './core/kubernetes/index.js';
export * from './core/logging/index.js';
export * from './core/store/index.js';
export * from './core/types/issue-request.js';
export * from './core/types/reconcile.js';
export { isGitHubRepoUrl, issueRequestSpecSchema, validateIssueRequestSpec } from './core/validation/admission.js';

// =============================================================================
// GITHUB
// =============================================================================
export * from './github/index.js';
