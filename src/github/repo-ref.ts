import { MalformedRepoRefError } from '../core/errors.js';

export interface RepoRef {
  owner: string;
  repo: string;
}

const GITHUB_PREFIX = 'https://github.com/';

/**
 * Split a repository URL into owner and repo.
 *
 * @example
 * ```typescript
 * parseRepoRef('https://github.com/acme/widgets'); // { owner: 'acme', repo: 'widgets' }
 * parseRepoRef('acme/widgets.git');                // { owner: 'acme', repo: 'widgets' }
 * ```
 */
export function parseRepoRef(url: string): RepoRef {
  const trimmed = url.trim();
  const path = trimmed.startsWith(GITHUB_PREFIX) ? trimmed.slice(GITHUB_PREFIX.length) : trimmed;
  const [owner, repo] = path.split('/').filter((segment) => segment.length > 0);

  const name = repo?.endsWith('.git') ? repo.slice(0, -'.git'.length) : repo;

  if (!owner || !name) {
    throw new MalformedRepoRefError(url);
  }

  return { owner, repo: name };
}

export function formatRepoRef(ref: RepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}
