import type {
  BackoffConfig,
  FailureOutcome,
  SubmissionOutcome,
  SubmissionTask,
} from '../schema/index.js';
import { sleep } from '../utils/abort.js';
import { CancelledError, cancelledOutcome } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RetryPolicy {
  maxRetries: number;
  backoff: BackoffConfig;
}

export interface RetryEvent {
  task: SubmissionTask;
  /** The failure that triggered the retry. */
  failure: FailureOutcome;
  delayMs: number;
}

export interface RetryResult {
  outcome: SubmissionOutcome;
  /** Attempts made, first one included. */
  attempts: number;
}

export interface RetryOptions {
  signal?: AbortSignal | undefined;
  onRetry?: ((event: RetryEvent) => void) | undefined;
}

export type AttemptRunner = (
  task: SubmissionTask,
  signal?: AbortSignal,
) => Promise<SubmissionOutcome>;

// ── Backoff ──────────────────────────────────────────────────

/**
 * Wait before re-running after attempt number `attempt` (0-based).
 * fixed: always `delayMs`. exponential: `delayMs * 2^attempt`, capped.
 */
export function backoffDelay(backoff: BackoffConfig, attempt: number): number {
  switch (backoff.strategy) {
    case 'fixed':
      return backoff.delayMs;
    case 'exponential':
      return Math.min(backoff.delayMs * 2 ** attempt, backoff.maxDelayMs);
  }
}

// ── Policy ───────────────────────────────────────────────────

/**
 * Run `runAttempt` until it succeeds, fails permanently, or has been
 * retried `maxRetries` times. The only place that decides on re-attempts.
 */
export async function attemptWithRetry(
  task: SubmissionTask,
  runAttempt: AttemptRunner,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryResult> {
  let current = task;
  let attempts = 0;

  for (;;) {
    const outcome = await runAttempt(current, options.signal);
    attempts += 1;

    if (outcome.status === 'success') {
      return { outcome, attempts };
    }
    if (!outcome.recoverable || current.attempt >= policy.maxRetries) {
      return { outcome, attempts };
    }

    const delayMs = backoffDelay(policy.backoff, current.attempt);
    options.onRetry?.({ task: current, failure: outcome, delayMs });

    try {
      await sleep(delayMs, options.signal);
    } catch (err) {
      if (err instanceof CancelledError) {
        return { outcome: cancelledOutcome(), attempts };
      }
      throw err;
    }

    current = { ...current, attempt: current.attempt + 1 };
  }
}
