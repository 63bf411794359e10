import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { SUCCESS } from '../schema/index.js';
import { configureLogger, resetLogger } from '../utils/logger.js';
import { PoolInvariantError } from './errors.js';
import { PoolState, runPool } from './pool.js';
import type { PoolSnapshot, TaskExecutor } from './pool.js';
import { ProgressReporter } from './progress.js';

// ── Helpers ──────────────────────────────────────────────────

function later(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** Executor that succeeds after a short, index-dependent delay. */
const staggered: TaskExecutor = async (task) => {
  await later(task.index % 3);
  return { outcome: SUCCESS, attempts: 1 };
};

beforeEach(() => {
  configureLogger({ sink: () => {} });
});

afterEach(() => {
  resetLogger();
});

// ── PoolState ────────────────────────────────────────────────

describe('PoolState', () => {
  test('tracks dispatch and settle', () => {
    const state = new PoolState(3);
    state.dispatch();
    state.dispatch();
    state.settle(SUCCESS);

    expect(state.snapshot()).toEqual({
      count: 3,
      dispatched: 2,
      active: 1,
      completed: 1,
      failed: 0,
      maxActive: 2,
    });
  });

  test('rejects dispatching more than count', () => {
    const state = new PoolState(1);
    state.dispatch();
    expect(() => state.dispatch()).toThrow(PoolInvariantError);
  });

  test('rejects settling more than dispatched', () => {
    const state = new PoolState(1);
    expect(() => state.settle(SUCCESS)).toThrow(PoolInvariantError);
  });
});

// ── runPool ──────────────────────────────────────────────────

describe('runPool', () => {
  const grid: Array<[count: number, workers: number]> = [
    [1, 1],
    [1, 4],
    [5, 1],
    [7, 3],
    [10, 10],
    [12, 4],
  ];

  test.each(grid)('count %i on %i workers runs every task once', async (count, workers) => {
    const samples: PoolSnapshot[] = [];
    const summary = await runPool({
      count,
      workers,
      execute: staggered,
      onSample: (s) => samples.push(s),
    });

    expect(summary.succeeded).toBe(count);
    expect(summary.failed).toBe(0);
    expect(summary.total).toBe(count);
    expect(summary.results.map((r) => r.index).sort((a, b) => a - b)).toEqual(
      Array.from({ length: count }, (_, i) => i),
    );
    expect(summary.maxConcurrent).toBeLessThanOrEqual(Math.min(count, workers));
    expect(samples.every((s) => s.active <= workers)).toBe(true);
    expect(samples.every((s) => s.completed + s.failed + s.active === s.dispatched)).toBe(true);
  });

  test('count 0 never executes', async () => {
    let calls = 0;
    const summary = await runPool({
      count: 0,
      workers: 4,
      execute: async () => {
        calls += 1;
        return { outcome: SUCCESS, attempts: 1 };
      },
    });

    expect(calls).toBe(0);
    expect(summary).toEqual({
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      total: 0,
      maxConcurrent: 0,
      results: [],
    });
  });

  test('fills every worker slot when there is enough work', async () => {
    const summary = await runPool({
      count: 6,
      workers: 3,
      execute: async () => {
        await later(5);
        return { outcome: SUCCESS, attempts: 1 };
      },
    });

    expect(summary.maxConcurrent).toBe(3);
  });

  test('dispatches in FIFO order', async () => {
    const started: number[] = [];
    await runPool({
      count: 5,
      workers: 1,
      execute: async (task) => {
        started.push(task.index);
        return { outcome: SUCCESS, attempts: 1 };
      },
    });

    expect(started).toEqual([0, 1, 2, 3, 4]);
  });

  test('a throwing task fails alone', async () => {
    const summary = await runPool({
      count: 4,
      workers: 2,
      execute: async (task) => {
        if (task.index === 2) throw new Error('worker exploded');
        return { outcome: SUCCESS, attempts: 1 };
      },
    });

    expect(summary.succeeded).toBe(3);
    expect(summary.failed).toBe(1);
    expect(summary.results.find((r) => r.index === 2)).toMatchObject({
      attempts: 1,
      outcome: {
        status: 'failure',
        reason: 'UnexpectedError',
        recoverable: false,
        message: 'worker exploded',
      },
    });
  });

  test('tasks queued after an abort are cancelled without running', async () => {
    const controller = new AbortController();
    const executed: number[] = [];

    const summary = await runPool({
      count: 6,
      workers: 1,
      signal: controller.signal,
      execute: async (task) => {
        executed.push(task.index);
        if (task.index === 1) controller.abort();
        return { outcome: SUCCESS, attempts: 1 };
      },
    });

    expect(executed).toEqual([0, 1]);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(4);
    expect(summary.cancelled).toBe(4);
    expect(summary.results.filter((r) => r.attempts === 0).map((r) => r.index)).toEqual([2, 3, 4, 5]);
  });

  test('reports every outcome to the progress reporter', async () => {
    const completed: number[] = [];
    const reporter = new ProgressReporter(5, (s) => completed.push(s.completed));

    await runPool({ count: 5, workers: 2, execute: staggered, reporter });

    expect(completed).toEqual([1, 2, 3, 4, 5]);
  });

  test.each([
    [-1, 1],
    [1.5, 1],
    [3, 0],
    [3, 2.5],
  ])('rejects count %s with workers %s', async (count, workers) => {
    await expect(runPool({ count, workers, execute: staggered })).rejects.toThrow(RangeError);
  });
});
