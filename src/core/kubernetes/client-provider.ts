/**
 * Kubernetes Client Provider
 *
 * Single source of truth for the operator's Kubernetes API access: loads the
 * KubeConfig once and hands out cached API clients built from it, so the
 * stores, the watcher and the CRD installer all talk to the same cluster with
 * the same credentials.
 */

import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   *
   * @default false
   */
  skipTLSVerify?: boolean;

  /**
   * Context to select from the loaded kubeconfig
   */
  context?: string;

  /**
   * Complete cluster configuration; used together with `user`
   */
  cluster?: {
    name: string;
    server: string;
    skipTLSVerify?: boolean;
    caData?: string;
    caFile?: string;
  };

  /**
   * Complete user configuration; used together with `cluster`
   */
  user?: {
    name: string;
    token?: string;
    certData?: string;
    keyData?: string;
  };

  /**
   * Custom kubeconfig file path. Without it the default loading rules apply
   * ($KUBECONFIG, in-cluster service account, ~/.kube/config).
   */
  kubeconfigPath?: string;
}

export class KubernetesClientProvider {
  private readonly kubeConfig: k8s.KubeConfig;
  private coreV1Api?: k8s.CoreV1Api;
  private customObjectsApi?: k8s.CustomObjectsApi;
  private apiExtensionsV1Api?: k8s.ApiextensionsV1Api;
  private logger = getComponentLogger('kubernetes-client-provider');

  private constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig;
  }

  /**
   * Create a provider from configuration
   */
  static create(config: KubernetesClientConfig = {}): KubernetesClientProvider {
    const provider = new KubernetesClientProvider(createKubeConfig(config));
    provider.logInitialized();
    return provider;
  }

  /**
   * Create a provider around an already loaded KubeConfig
   */
  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClientProvider {
    const provider = new KubernetesClientProvider(kubeConfig);
    provider.logInitialized();
    return provider;
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  /**
   * Secrets live here
   */
  getCoreV1Api(): k8s.CoreV1Api {
    if (!this.coreV1Api) {
      this.coreV1Api = this.kubeConfig.makeApiClient(k8s.CoreV1Api);
      this.logger.debug('Created API client', { clientType: 'CoreV1Api' });
    }
    return this.coreV1Api;
  }

  /**
   * IssueRequest records live here
   */
  getCustomObjectsApi(): k8s.CustomObjectsApi {
    if (!this.customObjectsApi) {
      this.customObjectsApi = this.kubeConfig.makeApiClient(k8s.CustomObjectsApi);
      this.logger.debug('Created API client', { clientType: 'CustomObjectsApi' });
    }
    return this.customObjectsApi;
  }

  getApiExtensionsV1Api(): k8s.ApiextensionsV1Api {
    if (!this.apiExtensionsV1Api) {
      this.apiExtensionsV1Api = this.kubeConfig.makeApiClient(k8s.ApiextensionsV1Api);
      this.logger.debug('Created API client', { clientType: 'ApiextensionsV1Api' });
    }
    return this.apiExtensionsV1Api;
  }

  /**
   * Create a watcher bound to this provider's KubeConfig
   */
  createWatch(): k8s.Watch {
    return new k8s.Watch(this.kubeConfig);
  }

  private logInitialized(): void {
    const cluster = this.kubeConfig.getCurrentCluster();

    if (cluster?.skipTLSVerify) {
      this.logger.warn('TLS verification disabled - only use this in development', {
        server: cluster.server,
      });
    }

    this.logger.info('Kubernetes client provider initialized', {
      currentContext: this.kubeConfig.getCurrentContext(),
      server: cluster?.server,
      userName: this.kubeConfig.getCurrentUser()?.name,
    });
  }
}

function createKubeConfig(config: KubernetesClientConfig): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  if (config.cluster && config.user) {
    const contextName = config.context || 'issue-operator-context';

    kc.loadFromOptions({
      clusters: [
        {
          name: config.cluster.name,
          server: config.cluster.server,
          skipTLSVerify: config.cluster.skipTLSVerify ?? config.skipTLSVerify ?? false,
          ...(config.cluster.caData && { caData: config.cluster.caData }),
          ...(config.cluster.caFile && { caFile: config.cluster.caFile }),
        },
      ],
      users: [
        {
          name: config.user.name,
          ...(config.user.token && { token: config.user.token }),
          ...(config.user.certData && { certData: config.user.certData }),
          ...(config.user.keyData && { keyData: config.user.keyData }),
        },
      ],
      contexts: [{ name: contextName, cluster: config.cluster.name, user: config.user.name }],
      currentContext: contextName,
    });

    return kc;
  }

  if (config.kubeconfigPath) {
    kc.loadFromFile(config.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  if (config.context) {
    if (!kc.getContexts().some((c) => c.name === config.context)) {
      throw new Error(`Context '${config.context}' not found in kubeconfig`);
    }
    kc.setCurrentContext(config.context);
  }

  if (config.skipTLSVerify !== undefined) {
    const current = kc.getCurrentCluster();
    if (current) {
      kc.clusters = kc.clusters.map((c) =>
        c === current ? { ...current, skipTLSVerify: config.skipTLSVerify ?? false } : c
      );
    }
  }

  return kc;
}
