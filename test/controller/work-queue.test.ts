import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WorkQueue } from '../../src/controller/work-queue.js';

describe('WorkQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('queues a key once however often it is added', async () => {
    const queue = new WorkQueue();
    queue.add('default/a');
    queue.add('default/a');
    queue.add('default/b');

    expect(queue.len()).toBe(2);
    expect(await queue.get()).toBe('default/a');
    expect(await queue.get()).toBe('default/b');
  });

  it('parks a key added while in flight until done', async () => {
    const queue = new WorkQueue();
    queue.add('default/a');
    const key = await queue.get();

    queue.add('default/a');
    expect(queue.len()).toBe(0);
    expect(queue.isProcessing('default/a')).toBe(true);

    queue.done('default/a');
    expect(key).toBe('default/a');
    expect(queue.len()).toBe(1);
  });

  it('wakes a waiting worker on add', async () => {
    const queue = new WorkQueue();
    const next = queue.get();

    queue.add('default/a');

    await expect(next).resolves.toBe('default/a');
  });

  it('keeps only the earliest delayed add per key', () => {
    const queue = new WorkQueue();
    queue.addAfter('default/a', 5_000);
    queue.addAfter('default/a', 1_000);
    queue.addAfter('default/a', 3_000);

    vi.advanceTimersByTime(999);
    expect(queue.len()).toBe(0);

    vi.advanceTimersByTime(1);
    expect(queue.len()).toBe(1);
    expect(queue.hasPendingTimer('default/a')).toBe(false);
  });

  it('adds immediately for a non-positive delay', () => {
    const queue = new WorkQueue();
    queue.addAfter('default/a', 0);
    expect(queue.len()).toBe(1);
  });

  it('backs off exponentially per key up to the cap', () => {
    const queue = new WorkQueue({ baseDelayMs: 100, maxDelayMs: 1_000 });

    const delays = Array.from({ length: 6 }, () => queue.addRateLimited('default/a'));

    expect(delays).toEqual([100, 200, 400, 800, 1_000, 1_000]);
    expect(queue.numRequeues('default/a')).toBe(6);
    expect(queue.addRateLimited('default/b')).toBe(100);
  });

  it('resets the backoff on forget', () => {
    const queue = new WorkQueue({ baseDelayMs: 100, maxDelayMs: 1_000 });
    queue.addRateLimited('default/a');
    queue.addRateLimited('default/a');

    queue.forget('default/a');

    expect(queue.numRequeues('default/a')).toBe(0);
    expect(queue.addRateLimited('default/a')).toBe(100);
  });

  it('drops timers and releases waiting workers on shutdown', async () => {
    const queue = new WorkQueue();
    const waiting = queue.get();
    queue.addAfter('default/a', 1_000);

    queue.shutDown();

    await expect(waiting).resolves.toBeUndefined();
    expect(queue.hasPendingTimer('default/a')).toBe(false);
    queue.add('default/b');
    expect(queue.len()).toBe(0);
    expect(await queue.get()).toBeUndefined();
  });
});
