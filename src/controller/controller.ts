import { toError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { IssueRequestStore } from '../core/store/types.js';
import { formatObjectKey, type ObjectKey, parseObjectKey } from '../core/types/issue-request.js';
import { type ReconcileResult, retryWithBackoff } from '../core/types/reconcile.js';
import { WorkQueue } from './work-queue.js';

export interface Reconciler {
  reconcile(key: ObjectKey): Promise<ReconcileResult>;
}

/**
 * Source of reconcile keys, typically an IssueRequestWatcher
 */
export interface KeySource {
  start(): Promise<void>;
  stop(): void;
}

export type KeySourceFactory = (enqueue: (key: string) => void) => KeySource;

export interface IssueRequestControllerOptions {
  /** Namespace to resync; all namespaces when empty */
  namespace?: string;
  /** @default 10 */
  maxConcurrentReconciles?: number;
  /** Full relist period; 0 disables it */
  resyncIntervalMs?: number;
  queue?: WorkQueue;
  keySource?: KeySourceFactory;
}

export const DEFAULT_MAX_CONCURRENT_RECONCILES = 10;

/**
 * Runs reconcile passes off the work queue and applies their scheduling
 * directives.
 */
export class IssueRequestController {
  readonly queue: WorkQueue;
  private readonly keySource: KeySource | undefined;
  private readonly maxConcurrentReconciles: number;
  private readonly resyncIntervalMs: number;
  private readonly namespace: string;
  private workers: Promise<void>[] = [];
  private resyncTimer: ReturnType<typeof setInterval> | undefined;
  private running = false;
  private logger = getComponentLogger('issue-request-controller');

  constructor(
    private readonly reconciler: Reconciler,
    private readonly store: IssueRequestStore,
    options: IssueRequestControllerOptions = {}
  ) {
    this.queue = options.queue ?? new WorkQueue();
    this.keySource = options.keySource?.((key) => this.enqueue(key));
    this.maxConcurrentReconciles = Math.max(
      1,
      options.maxConcurrentReconciles ?? DEFAULT_MAX_CONCURRENT_RECONCILES
    );
    this.resyncIntervalMs = options.resyncIntervalMs ?? 0;
    this.namespace = options.namespace ?? '';
  }

  get isRunning(): boolean {
    return this.running;
  }

  enqueue(key: string): void {
    this.queue.add(key);
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    for (let i = 0; i < this.maxConcurrentReconciles; i++) {
      this.workers.push(this.runWorker());
    }

    await this.keySource?.start();
    await this.resync();

    if (this.resyncIntervalMs > 0) {
      this.resyncTimer = setInterval(() => {
        void this.resync();
      }, this.resyncIntervalMs);
    }

    this.logger.info('IssueRequest controller started', {
      namespace: this.namespace || '*',
      workers: this.maxConcurrentReconciles,
      resyncIntervalMs: this.resyncIntervalMs,
    });
  }

  /**
   * Stop taking new work and wait for in-flight passes to finish
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = undefined;
    }
    this.keySource?.stop();
    this.queue.shutDown();

    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('IssueRequest controller stopped');
  }

  /**
   * Enqueue every record in scope. Never rejects.
   */
  async resync(): Promise<void> {
    try {
      const records = await this.store.list(this.namespace || undefined);
      for (const record of records) {
        this.enqueue(formatObjectKey(record.metadata));
      }
      this.logger.debug('Resynced IssueRequests', { count: records.length });
    } catch (error) {
      this.logger.error('Resync failed', toError(error), { namespace: this.namespace || '*' });
    }
  }

  private async runWorker(): Promise<void> {
    for (;;) {
      const key = await this.queue.get();
      if (key === undefined) {
        return;
      }
      try {
        this.applyResult(key, await this.process(key));
      } finally {
        this.queue.done(key);
      }
    }
  }

  private async process(key: string): Promise<ReconcileResult> {
    try {
      return await this.reconciler.reconcile(parseObjectKey(key));
    } catch (error) {
      return retryWithBackoff(toError(error));
    }
  }

  private applyResult(key: string, result: ReconcileResult): void {
    switch (result.type) {
      case 'done':
        this.queue.forget(key);
        break;
      case 'requeue':
        this.queue.forget(key);
        this.queue.add(key);
        break;
      case 'requeueAfter':
        this.queue.forget(key);
        this.queue.addAfter(key, result.delayMs);
        break;
      case 'error': {
        const delay = this.queue.addRateLimited(key);
        this.logger.warn('Reconcile failed, backing off', {
          key,
          delay,
          attempt: this.queue.numRequeues(key),
          error: result.error.message,
        });
        break;
      }
      case 'fatal':
        this.queue.forget(key);
        this.logger.error('Reconcile failed permanently, not retrying', result.error, { key });
        break;
    }
  }
}
