/**
 * Admission-time validation of IssueRequest specs. The reconciler does not
 * rely on it; a record that slipped past it fails at reconcile time instead.
 */

import { type } from 'arktype';
import { formatSpecErrors } from '../errors.js';
import { type IssueRequestSpec, MAX_DESCRIPTION_LENGTH } from '../types/issue-request.js';

const REPO_PATH = /^\/[^/]+\/[^/]+$/;

export function isGitHubRepoUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  const url = new URL(value);
  return url.protocol === 'https:' && url.hostname === 'github.com' && REPO_PATH.test(url.pathname);
}

export const issueRequestSpecSchema = type({
  repo: type('string').narrow(
    (repo, ctx) =>
      isGitHubRepoUrl(repo) || ctx.mustBe('a GitHub repository URL (https://github.com/{owner}/{repo})')
  ),
  title: 'string > 0',
  description: type('string').atMostLength(MAX_DESCRIPTION_LENGTH).default(''),
});

/**
 * Validate a spec; throws `SpecValidationError` naming every offending field
 */
export function validateIssueRequestSpec(spec: unknown, resourceName = 'unknown'): IssueRequestSpec {
  const result = issueRequestSpecSchema(spec);
  if (result instanceof type.errors) {
    throw formatSpecErrors(result, resourceName);
  }
  return result;
}
