/**
 * IssueRequest watch: turns watch events into reconcile keys.
 *
 * Only events that can change what the reconciler does are forwarded: a new
 * record, a new `metadata.generation` (spec edit), or deletion intent showing
 * up. Status and finalizer writes, including the operator's own, are dropped.
 */

import * as k8s from '@kubernetes/client-node';
import { toError } from '../core/errors.js';
import { getErrorStatusCode } from '../core/kubernetes/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import { decodeIssueRequest } from '../core/store/codec.js';
import {
  formatObjectKey,
  ISSUE_REQUEST_GROUP,
  ISSUE_REQUEST_PLURAL,
  ISSUE_REQUEST_VERSION,
  isMarkedForDeletion,
} from '../core/types/issue-request.js';

export type WatchFactory = (config: k8s.KubeConfig) => k8s.Watch;

export interface IssueRequestWatcherOptions {
  /** Watch one namespace; all namespaces when empty */
  namespace?: string;
  /** @default 1000 */
  reconnectBaseDelay?: number;
  /** @default 30000 */
  reconnectMaxDelay?: number;
  /** Jitter factor for reconnection delay (0-1, e.g. 0.2 = ±20%) */
  reconnectJitter?: number;
  /** Server-side watch timeout; the watch reconnects after it */
  watchTimeoutSeconds?: number;
}

interface ObservedRecord {
  generation?: number;
  deleting: boolean;
}

type WatchQuery = Record<string, string | number | boolean | undefined>;

export function issueRequestWatchPath(namespace?: string): string {
  const base = `/apis/${ISSUE_REQUEST_GROUP}/${ISSUE_REQUEST_VERSION}`;
  return namespace
    ? `${base}/namespaces/${namespace}/${ISSUE_REQUEST_PLURAL}`
    : `${base}/${ISSUE_REQUEST_PLURAL}`;
}

export class IssueRequestWatcher {
  private readonly watcher: k8s.Watch;
  private readonly options: Required<Omit<IssueRequestWatcherOptions, 'namespace'>> & {
    namespace: string;
  };
  private observed = new Map<string, ObservedRecord>();
  private request: AbortController | undefined;
  private reconnectTimer: ReturnType<typeof setTimeout> | undefined;
  private reconnectAttempts = 0;
  private lastResourceVersion: string | undefined;
  private running = false;
  private logger = getComponentLogger('issue-request-watcher');

  constructor(
    kubeConfig: k8s.KubeConfig,
    private readonly onKey: (key: string) => void,
    options: IssueRequestWatcherOptions = {},
    watchFactory: WatchFactory = (config) => new k8s.Watch(config)
  ) {
    this.watcher = watchFactory(kubeConfig);
    this.options = {
      namespace: options.namespace ?? '',
      reconnectBaseDelay: options.reconnectBaseDelay ?? 1000,
      reconnectMaxDelay: options.reconnectMaxDelay ?? 30000,
      reconnectJitter: options.reconnectJitter ?? 0.2,
      watchTimeoutSeconds: options.watchTimeoutSeconds ?? 300,
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    await this.connect();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.request?.abort();
    this.request = undefined;
    this.observed.clear();
    this.reconnectAttempts = 0;
  }

  private async connect(): Promise<void> {
    const path = issueRequestWatchPath(this.options.namespace || undefined);
    const query: WatchQuery = {
      allowWatchBookmarks: true,
      timeoutSeconds: this.options.watchTimeoutSeconds,
    };
    if (this.lastResourceVersion) {
      query.resourceVersion = this.lastResourceVersion;
    }

    this.logger.debug('Starting watch', { path, resourceVersion: this.lastResourceVersion });
    this.request = await this.watcher.watch(
      path,
      query,
      (phase: string, apiObj: unknown) => this.handleEvent(phase, apiObj),
      (error: unknown) => this.handleDone(error)
    );
  }

  private handleEvent(phase: string, apiObj: unknown): void {
    if (phase === 'ERROR') {
      // 410 Gone: the resourceVersion fell out of the server's window
      if (getErrorStatusCode(apiObj) === 410) {
        this.lastResourceVersion = undefined;
      }
      this.logger.warn('Watch reported an error event', { status: getErrorStatusCode(apiObj) });
      return;
    }

    const resourceVersion = readResourceVersion(apiObj);
    if (resourceVersion) {
      this.lastResourceVersion = resourceVersion;
    }
    if (phase === 'BOOKMARK') {
      return;
    }

    let key: string;
    let observed: ObservedRecord;
    try {
      const record = decodeIssueRequest(apiObj, `watch ${phase}`);
      key = formatObjectKey(record.metadata);
      observed = {
        ...(record.metadata.generation !== undefined && { generation: record.metadata.generation }),
        deleting: isMarkedForDeletion(record),
      };
    } catch (error) {
      this.logger.warn('Dropping undecodable watch event', { phase, error: toError(error).message });
      return;
    }

    if (phase === 'DELETED') {
      this.observed.delete(key);
      return;
    }

    const previous = this.observed.get(key);
    this.observed.set(key, observed);

    if (
      !previous ||
      previous.generation !== observed.generation ||
      (observed.deleting && !previous.deleting)
    ) {
      this.logger.debug('Enqueueing IssueRequest', { key, phase, generation: observed.generation });
      this.onKey(key);
    }
  }

  private handleDone(error: unknown): void {
    this.request = undefined;
    if (!this.running) {
      return;
    }

    if (error) {
      if (getErrorStatusCode(error) === 410) {
        this.lastResourceVersion = undefined;
      }
      this.logger.warn('Watch connection failed', { error: toError(error).message });
    } else {
      // Server-side timeout; not a failure
      this.logger.debug('Watch connection closed by server');
      this.reconnectAttempts = 0;
    }
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }

    this.reconnectAttempts++;
    const delay = this.calculateReconnectDelay(this.reconnectAttempts);
    this.logger.info('Scheduling watch reconnection', { attempt: this.reconnectAttempts, delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (!this.running) {
        return;
      }
      this.connect().then(
        () => {
          this.reconnectAttempts = 0;
        },
        (error: unknown) => {
          this.logger.error('Watch reconnection failed', toError(error), {
            attempt: this.reconnectAttempts,
          });
          this.scheduleReconnect();
        }
      );
    }, delay);
  }

  /**
   * Exponential backoff with jitter: baseDelay * 2^(attempt-1), capped, ±jitter
   */
  calculateReconnectDelay(attempt: number): number {
    const { reconnectBaseDelay, reconnectMaxDelay, reconnectJitter } = this.options;
    const cappedDelay = Math.min(reconnectBaseDelay * 2 ** (attempt - 1), reconnectMaxDelay);
    const jitterRange = cappedDelay * reconnectJitter;
    const jitter = (Math.random() * 2 - 1) * jitterRange;
    return Math.max(0, Math.round(cappedDelay + jitter));
  }
}

function readResourceVersion(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('metadata' in value)) {
    return undefined;
  }
  const { metadata } = value;
  if (typeof metadata !== 'object' || metadata === null || !('resourceVersion' in metadata)) {
    return undefined;
  }
  return typeof metadata.resourceVersion === 'string' ? metadata.resourceVersion : undefined;
}
