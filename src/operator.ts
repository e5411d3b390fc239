/**
 * Operator assembly: Kubernetes clients, stores, reconciler and controller.
 */

import { type OperatorConfig, getOperatorConfigFromEnv } from './core/config.js';
import { ensureIssueRequestCrd } from './core/crd.js';
import { KubernetesClientProvider } from './core/kubernetes/client-provider.js';
import { getComponentLogger } from './core/logging/index.js';
import { KubernetesCredentialStore, KubernetesIssueRequestStore } from './core/store/kubernetes-store.js';
import { IssueRequestController } from './controller/controller.js';
import { ReconcileLoop } from './controller/reconciler.js';
import { IssueRequestWatcher, type WatchFactory } from './controller/watcher.js';
import { WorkQueue } from './controller/work-queue.js';
import { createGitHubTicketingClientFactory } from './github/ticketing-client.js';
import type { TicketingClientFactory } from './github/types.js';

export interface IssueRequestOperatorOptions {
  provider?: KubernetesClientProvider;
  ticketingClientFactory?: TicketingClientFactory;
  watchFactory?: WatchFactory;
}

export class IssueRequestOperator {
  private logger = getComponentLogger('issue-request-operator');

  constructor(
    readonly config: OperatorConfig,
    private readonly provider: KubernetesClientProvider,
    readonly controller: IssueRequestController
  ) {}

  async start(): Promise<void> {
    if (this.config.installCrd) {
      await ensureIssueRequestCrd(this.provider.getApiExtensionsV1Api());
    }
    await this.controller.start();
    this.logger.info('Operator started', { namespace: this.config.namespace || '*' });
  }

  async stop(): Promise<void> {
    await this.controller.stop();
    this.logger.info('Operator stopped');
  }
}

export function createIssueRequestOperator(
  config: OperatorConfig = getOperatorConfigFromEnv(),
  options: IssueRequestOperatorOptions = {}
): IssueRequestOperator {
  const provider =
    options.provider ??
    KubernetesClientProvider.create({
      ...(config.kubeconfigPath && { kubeconfigPath: config.kubeconfigPath }),
    });

  const store = new KubernetesIssueRequestStore(provider.getCustomObjectsApi());
  const reconciler = new ReconcileLoop(
    {
      store,
      credentials: new KubernetesCredentialStore(provider.getCoreV1Api()),
      ticketingClientFactory:
        options.ticketingClientFactory ??
        createGitHubTicketingClientFactory({ baseUrl: config.githubApiUrl }),
    },
    {
      tokenPollIntervalMs: config.tokenPollIntervalMs,
      conflictRetryDelayMs: config.conflictRetryDelayMs,
    }
  );

  const controller = new IssueRequestController(reconciler, store, {
    namespace: config.namespace,
    maxConcurrentReconciles: config.maxConcurrentReconciles,
    resyncIntervalMs: config.resyncIntervalMs,
    queue: new WorkQueue({
      baseDelayMs: config.backoffBaseDelayMs,
      maxDelayMs: config.backoffMaxDelayMs,
    }),
    keySource: (enqueue) =>
      new IssueRequestWatcher(
        provider.getKubeConfig(),
        enqueue,
        { namespace: config.namespace },
        options.watchFactory
      ),
  });

  return new IssueRequestOperator(config, provider, controller);
}
