/**
 * Keyed work queue for reconcile requests.
 *
 * - a key is queued at most once, however often it is added
 * - a key is never handed to two workers at once; a key added while in
 *   flight is queued again when its worker calls `done`
 * - `addAfter` keeps only the earliest pending timer per key
 * - `addRateLimited` backs off exponentially per key until `forget`
 */

export interface WorkQueueOptions {
  /** First rate-limited delay */
  baseDelayMs?: number;
  /** Cap for rate-limited delays */
  maxDelayMs?: number;
}

export const DEFAULT_BACKOFF_BASE_DELAY_MS = 1_000;
export const DEFAULT_BACKOFF_MAX_DELAY_MS = 300_000;

interface PendingTimer {
  dueAt: number;
  handle: ReturnType<typeof setTimeout>;
}

export class WorkQueue {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private queue: string[] = [];
  /** Keys waiting to be processed, queued or parked behind an in-flight pass */
  private dirty = new Set<string>();
  private processing = new Set<string>();
  private timers = new Map<string, PendingTimer>();
  private failures = new Map<string, number>();
  private waiters: Array<() => void> = [];
  private shuttingDown = false;

  constructor(options: WorkQueueOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_BACKOFF_MAX_DELAY_MS;
  }

  add(key: string): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }
    this.queue.push(key);
    this.waiters.shift()?.();
  }

  addAfter(key: string, delayMs: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delayMs <= 0) {
      this.add(key);
      return;
    }

    const dueAt = Date.now() + delayMs;
    const pending = this.timers.get(key);
    if (pending && pending.dueAt <= dueAt) {
      return;
    }
    if (pending) {
      clearTimeout(pending.handle);
    }

    const handle = setTimeout(() => {
      this.timers.delete(key);
      this.add(key);
    }, delayMs);
    this.timers.set(key, { dueAt, handle });
  }

  /**
   * Re-add after `baseDelay * 2^(failures - 1)`, capped at `maxDelay`.
   * Returns the delay used.
   */
  addRateLimited(key: string): number {
    const failures = (this.failures.get(key) ?? 0) + 1;
    this.failures.set(key, failures);
    const delay = Math.min(this.baseDelayMs * 2 ** (failures - 1), this.maxDelayMs);
    this.addAfter(key, delay);
    return delay;
  }

  /** Reset the backoff of `key` */
  forget(key: string): void {
    this.failures.delete(key);
  }

  numRequeues(key: string): number {
    return this.failures.get(key) ?? 0;
  }

  /**
   * Wait for the next key. Resolves to undefined once the queue shuts down.
   */
  async get(): Promise<string | undefined> {
    while (!this.shuttingDown) {
      const key = this.queue.shift();
      if (key !== undefined) {
        this.dirty.delete(key);
        this.processing.add(key);
        return key;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return undefined;
  }

  /**
   * Mark the pass over `key` finished
   */
  done(key: string): void {
    this.processing.delete(key);
    if (this.dirty.has(key) && !this.shuttingDown) {
      this.queue.push(key);
      this.waiters.shift()?.();
    }
  }

  /** Keys ready to be handed out */
  len(): number {
    return this.queue.length;
  }

  isProcessing(key: string): boolean {
    return this.processing.has(key);
  }

  hasPendingTimer(key: string): boolean {
    return this.timers.has(key);
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Stop handing out keys. Pending timers are dropped; passes already in
   * flight run to completion.
   */
  shutDown(): void {
    this.shuttingDown = true;
    for (const pending of this.timers.values()) {
      clearTimeout(pending.handle);
    }
    this.timers.clear();
    this.queue = [];
    this.dirty.clear();
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
