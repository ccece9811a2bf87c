import { describe, it, expect } from 'vitest';
import { BoundedPool, TimeoutError, withTimeout } from '../../engine/bounded-pool.js';
import { sleep } from '../helpers/fakes.js';

describe('BoundedPool', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new BoundedPool(0)).toThrow('maxConcurrent must be a positive integer, got 0');
  });

  it('never runs more than the limit at once', async () => {
    const pool = new BoundedPool(2);
    let running = 0;
    let peak = 0;

    const task = (ms: number) =>
      pool.execute(async () => {
        running++;
        peak = Math.max(peak, running);
        await sleep(ms);
        running--;
        return ms;
      });

    const results = await Promise.all([task(20), task(5), task(10), task(5), task(1)]);

    expect(results).toEqual([20, 5, 10, 5, 1]);
    expect(peak).toBe(2);
    expect(pool.activeCount).toBe(0);
  });

  it('starts queued operations in arrival order', async () => {
    const pool = new BoundedPool(1);
    const started: string[] = [];
    const op = (label: string) =>
      pool.execute(async () => {
        started.push(label);
        await sleep(1);
      });

    await Promise.all([op('a'), op('b'), op('c')]);

    expect(started).toEqual(['a', 'b', 'c']);
  });

  it('frees the slot when an operation rejects', async () => {
    const pool = new BoundedPool(1);

    await expect(pool.execute(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(pool.execute(async () => 'next')).resolves.toBe('next');
    expect(pool.activeCount).toBe(0);
  });
});

describe('withTimeout', () => {
  it('resolves with the operation result when it finishes in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the operation is too slow', async () => {
    const slow = sleep(50).then(() => 'late');

    const err = await withTimeout(slow, 10).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ timeoutMs: 10, message: 'Operation timed out after 10ms' });
  });
});
