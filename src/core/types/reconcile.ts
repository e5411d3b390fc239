/**
 * Scheduling directive returned by one reconcile pass.
 *
 * - `done`: nothing to do until the next watch event
 * - `requeue`: run again right away
 * - `requeueAfter`: run again after a fixed delay
 * - `error`: transient failure, retry with the queue's exponential backoff
 * - `fatal`: static failure that retrying cannot fix; not requeued
 */
export type ReconcileResult =
  | { type: 'done' }
  | { type: 'requeue' }
  | { type: 'requeueAfter'; delayMs: number }
  | { type: 'error'; error: Error }
  | { type: 'fatal'; error: Error };

export const done = (): ReconcileResult => ({ type: 'done' });
export const requeue = (): ReconcileResult => ({ type: 'requeue' });
export const requeueAfter = (delayMs: number): ReconcileResult => ({ type: 'requeueAfter', delayMs });
export const retryWithBackoff = (error: Error): ReconcileResult => ({ type: 'error', error });
export const fatal = (error: Error): ReconcileResult => ({ type: 'fatal', error });
