import type { TaskResult, Tally } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { PoolInvariantError } from './errors.js';
import type { RetryEvent } from './retry.js';

// ── Public types ─────────────────────────────────────────────

export interface ProgressSnapshot {
  completed: number;
  succeeded: number;
  failed: number;
  retries: number;
  total: number;
}

export type ProgressObserver = (snapshot: ProgressSnapshot) => void;

// ── Reporter ─────────────────────────────────────────────────

/**
 * Cumulative progress over one run. Each update happens inside a single
 * synchronous call, so units finishing concurrently on the event loop
 * cannot interleave within it. Purely observational.
 */
export class ProgressReporter {
  private succeeded = 0;
  private failed = 0;
  private retries = 0;
  private readonly seen = new Set<number>();

  constructor(
    private readonly total: number,
    private readonly observer?: ProgressObserver,
  ) {}

  /** Record the terminal outcome of one task. Called once per task. */
  onOutcome(result: TaskResult): void {
    if (this.seen.has(result.index)) {
      throw new PoolInvariantError(`task ${String(result.index)} reported twice`);
    }
    this.seen.add(result.index);

    const { outcome } = result;
    if (outcome.status === 'success') {
      this.succeeded += 1;
    } else {
      this.failed += 1;
    }

    const completed = this.succeeded + this.failed;
    const description =
      outcome.status === 'success'
        ? `submitted (${plural(result.attempts, 'attempt')})`
        : `${outcome.reason} after ${plural(result.attempts, 'attempt')}: ${outcome.message}`;

    log.outcome(completed, this.total, result.index, outcome.status === 'success', description, {
      attempts: result.attempts,
      durationMs: result.durationMs,
      reason: outcome.status === 'failure' ? outcome.reason : null,
    });
    this.observer?.(this.snapshot());
  }

  onRetry(event: RetryEvent): void {
    this.retries += 1;
    log.retry(event.task.index, event.task.attempt + 1, event.delayMs, event.failure.reason);
    this.observer?.(this.snapshot());
  }

  snapshot(): ProgressSnapshot {
    return {
      completed: this.succeeded + this.failed,
      succeeded: this.succeeded,
      failed: this.failed,
      retries: this.retries,
      total: this.total,
    };
  }

  /** Render and return the final tally. */
  finish(): Tally {
    log.tally(this.succeeded, this.failed, this.total);
    return { succeeded: this.succeeded, failed: this.failed, total: this.total };
  }
}

function plural(n: number, word: string): string {
  return `${String(n)} ${word}${n === 1 ? '' : 's'}`;
}
