import { describe, it, expect } from 'vitest';
import { mapPool } from './pool.js';

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('mapPool', () => {
  it('keys results by submission index, not completion order', async () => {
    const finished: number[] = [];
    const results = await mapPool(
      [30, 5, 15],
      async (ms, index) => {
        await sleep(ms);
        finished.push(index);
        return ms * 2;
      },
      { concurrency: 3 },
    );

    expect(finished).toEqual([1, 2, 0]);
    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 30 },
    ]);
  });

  it('never runs more than `concurrency` workers at once', async () => {
    let active = 0;
    let peak = 0;
    await mapPool(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
      },
      { concurrency: 2 },
    );
    expect(peak).toBe(2);
  });

  it('captures a failing item without failing the others', async () => {
    const results = await mapPool(
      ['a', 'b', 'c'],
      async (item) => {
        if (item === 'b') throw new Error('boom');
        return item.toUpperCase();
      },
      { concurrency: 2 },
    );

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1]?.status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('reports unstarted items as skipped once shouldStop turns true', async () => {
    let stop = false;
    const started: number[] = [];
    const results = await mapPool(
      [1, 2, 3],
      async (item, index) => {
        started.push(index);
        return item;
      },
      {
        concurrency: 1,
        shouldStop: () => stop,
        onSettled: () => { stop = true; },
      },
    );

    expect(started).toEqual([0]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'skipped', 'skipped']);
  });

  it('handles an empty list', async () => {
    expect(await mapPool([], async () => 1, { concurrency: 4 })).toEqual([]);
  });
});
