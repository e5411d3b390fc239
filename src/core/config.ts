/**
 * Operator configuration from environment variables
 */

import { type } from 'arktype';
import { ConfigurationError } from './errors.js';

export interface OperatorConfig {
  /** Namespace to watch; all namespaces when empty */
  namespace: string;
  tokenPollIntervalMs: number;
  conflictRetryDelayMs: number;
  backoffBaseDelayMs: number;
  backoffMaxDelayMs: number;
  maxConcurrentReconciles: number;
  /** 0 disables periodic resync */
  resyncIntervalMs: number;
  githubApiUrl: string;
  /** Create the IssueRequest CRD on startup when missing */
  installCrd: boolean;
  kubeconfigPath?: string;
}

export const DEFAULT_OPERATOR_CONFIG: OperatorConfig = {
  namespace: '',
  tokenPollIntervalMs: 60_000,
  conflictRetryDelayMs: 5_000,
  backoffBaseDelayMs: 1_000,
  backoffMaxDelayMs: 300_000,
  maxConcurrentReconciles: 10,
  resyncIntervalMs: 600_000,
  githubApiUrl: 'https://api.github.com',
  installCrd: false,
};

const operatorConfigSchema = type({
  namespace: 'string',
  tokenPollIntervalMs: 'number.integer > 0',
  conflictRetryDelayMs: 'number.integer > 0',
  backoffBaseDelayMs: 'number.integer > 0',
  backoffMaxDelayMs: 'number.integer > 0',
  maxConcurrentReconciles: 'number.integer > 0',
  resyncIntervalMs: 'number.integer >= 0',
  githubApiUrl: 'string.url',
  installCrd: 'boolean',
  'kubeconfigPath?': 'string',
}).narrow(
  (config, ctx) =>
    config.backoffMaxDelayMs >= config.backoffBaseDelayMs ||
    ctx.mustBe('a configuration whose backoffMaxDelayMs is at least backoffBaseDelayMs')
);

/**
 * Validate a configuration; throws `ConfigurationError` listing every problem
 */
export function validateOperatorConfig(config: OperatorConfig): OperatorConfig {
  const result = operatorConfigSchema(config);
  if (result instanceof type.errors) {
    throw new ConfigurationError(
      `Invalid operator configuration: ${result.summary}`,
      result.map((problem) => problem.message)
    );
  }
  return result;
}

function readInteger(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value);
}

/**
 * Build the configuration from environment variables
 */
export function getOperatorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OperatorConfig {
  const defaults = DEFAULT_OPERATOR_CONFIG;

  return validateOperatorConfig({
    namespace: env.WATCH_NAMESPACE?.trim() ?? defaults.namespace,
    tokenPollIntervalMs: readInteger(env.TOKEN_POLL_INTERVAL_MS, defaults.tokenPollIntervalMs),
    conflictRetryDelayMs: readInteger(env.CONFLICT_RETRY_DELAY_MS, defaults.conflictRetryDelayMs),
    backoffBaseDelayMs: readInteger(env.BACKOFF_BASE_DELAY_MS, defaults.backoffBaseDelayMs),
    backoffMaxDelayMs: readInteger(env.BACKOFF_MAX_DELAY_MS, defaults.backoffMaxDelayMs),
    maxConcurrentReconciles: readInteger(
      env.MAX_CONCURRENT_RECONCILES,
      defaults.maxConcurrentReconciles
    ),
    resyncIntervalMs: readInteger(env.RESYNC_INTERVAL_MS, defaults.resyncIntervalMs),
    githubApiUrl: env.GITHUB_API_URL?.trim() || defaults.githubApiUrl,
    installCrd: env.INSTALL_CRD?.toLowerCase() === 'true',
    ...(env.KUBECONFIG && { kubeconfigPath: env.KUBECONFIG }),
  });
}
