import type { FailureOutcome, SubmissionOutcome, SubmissionTask, TaskResult } from '../schema/index.js';
import { isCancelled } from '../schema/index.js';
import { PoolInvariantError, cancelledOutcome } from './errors.js';
import type { ProgressReporter } from './progress.js';
import type { RetryResult } from './retry.js';

// ── Public types ─────────────────────────────────────────────

export type TaskExecutor = (
  task: SubmissionTask,
  signal?: AbortSignal,
) => Promise<RetryResult>;

export interface PoolSnapshot {
  count: number;
  dispatched: number;
  active: number;
  completed: number;
  failed: number;
  maxActive: number;
}

export interface PoolOptions {
  count: number;
  workers: number;
  execute: TaskExecutor;
  signal?: AbortSignal | undefined;
  reporter?: ProgressReporter | undefined;
  /** Called after every PoolState mutation. */
  onSample?: ((snapshot: PoolSnapshot) => void) | undefined;
}

export interface PoolSummary {
  succeeded: number;
  failed: number;
  cancelled: number;
  total: number;
  maxConcurrent: number;
  /** One entry per task, in completion order. */
  results: TaskResult[];
}

// ── PoolState ────────────────────────────────────────────────

/**
 * Counters for one pool run. Mutated only through `dispatch` and
 * `settle`; neither awaits, so on the event loop each call is atomic.
 * Invariants are checked after every mutation.
 */
export class PoolState {
  private dispatched = 0;
  private active = 0;
  private completed = 0;
  private failed = 0;
  private maxActive = 0;

  constructor(private readonly count: number) {}

  dispatch(): void {
    this.dispatched += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.check();
  }

  settle(outcome: SubmissionOutcome): void {
    this.active -= 1;
    if (outcome.status === 'success') {
      this.completed += 1;
    } else {
      this.failed += 1;
    }
    this.check();
  }

  snapshot(): PoolSnapshot {
    return {
      count: this.count,
      dispatched: this.dispatched,
      active: this.active,
      completed: this.completed,
      failed: this.failed,
      maxActive: this.maxActive,
    };
  }

  private check(): void {
    if (this.dispatched > this.count) {
      throw new PoolInvariantError(
        `dispatched ${String(this.dispatched)} of ${String(this.count)} tasks`,
      );
    }
    if (this.active < 0) {
      throw new PoolInvariantError('more tasks settled than dispatched');
    }
    if (this.completed + this.failed + this.active !== this.dispatched) {
      throw new PoolInvariantError(
        `completed ${String(this.completed)} + failed ${String(this.failed)} + active ${String(this.active)} != dispatched ${String(this.dispatched)}`,
      );
    }
  }
}

// ── Scheduler ────────────────────────────────────────────────

/**
 * Run `count` tasks on at most `workers` concurrent units.
 *
 * Units pull indices from one FIFO queue; completion order is not
 * defined. A unit turns anything `execute` throws into a failure, so one
 * task cannot take down its siblings. After `signal` aborts, queued
 * tasks are settled as cancelled without being executed.
 */
export async function runPool(options: PoolOptions): Promise<PoolSummary> {
  const { count, workers, execute, signal, reporter, onSample } = options;

  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${String(count)}`);
  }
  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError(`workers must be a positive integer, got ${String(workers)}`);
  }

  const state = new PoolState(count);
  const queue = Array.from({ length: count }, (_, i) => i);
  const results: TaskResult[] = [];

  const sample = (): void => {
    onSample?.(state.snapshot());
  };

  async function runTask(index: number): Promise<RetryResult> {
    if (signal?.aborted) {
      return { outcome: cancelledOutcome(), attempts: 0 };
    }
    try {
      return await execute({ index, attempt: 0 }, signal);
    } catch (err) {
      return { outcome: unexpectedFailure(err), attempts: 1 };
    }
  }

  async function unit(): Promise<void> {
    for (let index = queue.shift(); index !== undefined; index = queue.shift()) {
      state.dispatch();
      sample();

      const startedAt = Date.now();
      const { outcome, attempts } = await runTask(index);

      state.settle(outcome);
      sample();

      const result: TaskResult = {
        index,
        attempts,
        outcome,
        durationMs: Date.now() - startedAt,
      };
      results.push(result);
      reporter?.onOutcome(result);
    }
  }

  const parallelism = Math.min(workers, count);
  await Promise.all(Array.from({ length: parallelism }, () => unit()));

  const final = state.snapshot();
  return {
    succeeded: final.completed,
    failed: final.failed,
    cancelled: results.filter((r) => isCancelled(r.outcome)).length,
    total: count,
    maxConcurrent: final.maxActive,
    results,
  };
}

function unexpectedFailure(err: unknown): FailureOutcome {
  return {
    status: 'failure',
    reason: 'UnexpectedError',
    recoverable: false,
    message: err instanceof Error ? err.message : String(err),
  };
}
