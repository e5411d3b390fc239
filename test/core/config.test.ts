import { describe, expect, it } from 'vitest';
import {
  DEFAULT_OPERATOR_CONFIG,
  getOperatorConfigFromEnv,
  validateOperatorConfig,
} from '../../src/core/config.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('getOperatorConfigFromEnv', () => {
  it('falls back to defaults', () => {
    expect(getOperatorConfigFromEnv({})).toEqual(DEFAULT_OPERATOR_CONFIG);
  });

  it('reads every variable', () => {
    const config = getOperatorConfigFromEnv({
      WATCH_NAMESPACE: ' team-a ',
      TOKEN_POLL_INTERVAL_MS: '30000',
      CONFLICT_RETRY_DELAY_MS: '2000',
      BACKOFF_BASE_DELAY_MS: '500',
      BACKOFF_MAX_DELAY_MS: '60000',
      MAX_CONCURRENT_RECONCILES: '4',
      RESYNC_INTERVAL_MS: '0',
      GITHUB_API_URL: 'https://github.example.test/api/v3',
      INSTALL_CRD: 'TRUE',
      KUBECONFIG: '/etc/operator/kubeconfig',
    });

    expect(config).toEqual({
      namespace: 'team-a',
      tokenPollIntervalMs: 30000,
      conflictRetryDelayMs: 2000,
      backoffBaseDelayMs: 500,
      backoffMaxDelayMs: 60000,
      maxConcurrentReconciles: 4,
      resyncIntervalMs: 0,
      githubApiUrl: 'https://github.example.test/api/v3',
      installCrd: true,
      kubeconfigPath: '/etc/operator/kubeconfig',
    });
  });

  it('treats blank numbers as unset', () => {
    expect(getOperatorConfigFromEnv({ TOKEN_POLL_INTERVAL_MS: '  ' }).tokenPollIntervalMs).toBe(60_000);
  });

  it('rejects a non-numeric interval', () => {
    expect(() => getOperatorConfigFromEnv({ TOKEN_POLL_INTERVAL_MS: 'soon' })).toThrow(ConfigurationError);
  });
});

describe('validateOperatorConfig', () => {
  it('accepts the defaults', () => {
    expect(validateOperatorConfig(DEFAULT_OPERATOR_CONFIG)).toEqual(DEFAULT_OPERATOR_CONFIG);
  });

  it('rejects zero workers', () => {
    expect(() => validateOperatorConfig({ ...DEFAULT_OPERATOR_CONFIG, maxConcurrentReconciles: 0 })).toThrow(
      /^Invalid operator configuration: /
    );
  });

  it('rejects a backoff ceiling below its base', () => {
    try {
      validateOperatorConfig({ ...DEFAULT_OPERATOR_CONFIG, backoffBaseDelayMs: 5000, backoffMaxDelayMs: 1000 });
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.problems).toHaveLength(1);
        expect(error.problems[0]).toContain('backoffMaxDelayMs is at least backoffBaseDelayMs');
      }
    }
  });

  it('rejects an invalid API URL', () => {
    expect(() => validateOperatorConfig({ ...DEFAULT_OPERATOR_CONFIG, githubApiUrl: 'not a url' })).toThrow(
      ConfigurationError
    );
  });
});
