import { describe, expect, it } from 'vitest';
import { settleAll } from './pool.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('settleAll', () => {
  it('returns results in input order regardless of completion order', async () => {
    const delays = [30, 5, 15];
    const results = await settleAll(delays, 3, async (ms) => {
      await new Promise((r) => setTimeout(r, ms));
      return ms * 2;
    });

    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : null))).toEqual([60, 10, 30]);
    expect(results.map((r) => r.item)).toEqual([30, 5, 15]);
  });

  it('captures rejections without stopping other items', async () => {
    const results = await settleAll(['ok', 'bad', 'ok2'], 2, async (item) => {
      if (item === 'bad') throw new Error('boom');
      return item.toUpperCase();
    });

    expect(results[0]).toEqual({ item: 'ok', status: 'fulfilled', value: 'OK' });
    const second = results[1];
    expect(second?.status === 'rejected' ? second.reason : null).toBeInstanceOf(Error);
    expect(results[2]).toEqual({ item: 'ok2', status: 'fulfilled', value: 'OK2' });
  });

  it('captures synchronous throws from the worker', async () => {
    const results = await settleAll([1], 1, (): Promise<number> => {
      throw new Error('sync');
    });
    expect(results[0]?.status).toBe('rejected');
  });

  it('never runs more than `limit` workers at once', async () => {
    let active = 0;
    let peak = 0;
    await settleAll([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
    });
    expect(peak).toBe(2);
  });

  it('starts every worker before awaiting any when the limit allows', () => {
    const gate = deferred();
    const started: number[] = [];
    const done = settleAll([1, 2, 3], 8, async (n) => {
      started.push(n);
      await gate.promise;
    });

    expect(started).toEqual([1, 2, 3]);
    gate.resolve();
    return done;
  });

  it('resolves to an empty list for no items', async () => {
    await expect(settleAll([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects a limit below 1', async () => {
    await expect(settleAll([1], 0, async () => 1)).rejects.toThrow(RangeError);
  });
});
