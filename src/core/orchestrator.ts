import { randomUUID } from 'node:crypto';

import type {
  AnswerSet,
  BackoffConfig,
  FormSchema,
  RunSummary,
  SessionTimeouts,
} from '../schema/index.js';
import type { DriverFactory } from '../browser/driver.js';
import * as log from '../utils/logger.js';
import { generateAnswers } from './generator.js';
import { runPool } from './pool.js';
import type { PoolSnapshot } from './pool.js';
import { ProgressReporter } from './progress.js';
import type { ProgressObserver } from './progress.js';
import { attemptWithRetry } from './retry.js';
import { runFormSession } from './session.js';
import type { FormSessionConfig } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface SubmissionRunConfig {
  url: string;
  form: FormSchema;
  count: number;
  workers: number;
  headless: boolean;
  autoScroll: boolean;
  maxRetries: number;
  backoff: BackoffConfig;
  timeouts: SessionTimeouts;
  screenshotDir?: string | undefined;
  signal?: AbortSignal | undefined;
  /** Answer source; defaults to generateAnswers with Math.random. */
  generate?: ((form: FormSchema) => AnswerSet) | undefined;
  onProgress?: ProgressObserver | undefined;
  onSample?: ((snapshot: PoolSnapshot) => void) | undefined;
}

// ── Main run ─────────────────────────────────────────────────

/**
 * Probe the browser once, then submit the form `count` times on
 * `workers` concurrent sessions. A failed probe throws StartupError
 * before any task is dispatched; task failures never abort the run.
 */
export async function runSubmissions<THandle>(
  factory: DriverFactory<THandle>,
  config: SubmissionRunConfig,
): Promise<RunSummary> {
  const runId = randomUUID();
  const startedAt = new Date();

  // ── 1. Pre-flight: can a browser start at all? ─────────────

  if (config.count > 0) {
    await factory.probe({ headless: config.headless });
  }

  // ── 2. Wire session → retry → pool ─────────────────────────

  const sessionConfig: FormSessionConfig<THandle> = {
    url: config.url,
    form: config.form,
    factory,
    generate: config.generate ?? ((form) => generateAnswers(form)),
    timeouts: config.timeouts,
    headless: config.headless,
    autoScroll: config.autoScroll,
    screenshotDir: config.screenshotDir,
  };

  const reporter = new ProgressReporter(config.count, config.onProgress);
  const policy = { maxRetries: config.maxRetries, backoff: config.backoff };

  log.section(`Submitting ${config.form.name} ×${String(config.count)} on ${String(config.workers)} workers`);
  log.detail(`URL:     ${config.url}`);
  log.detail(`Retries: ${String(config.maxRetries)} (${config.backoff.strategy}, ${String(config.backoff.delayMs)}ms)`);

  // ── 3. Run the pool ────────────────────────────────────────

  const pool = await runPool({
    count: config.count,
    workers: config.workers,
    signal: config.signal,
    reporter,
    onSample: config.onSample,
    execute: (task, signal) =>
      attemptWithRetry(
        task,
        (attempt, attemptSignal) => runFormSession(attempt, sessionConfig, attemptSignal),
        policy,
        { signal, onRetry: (event) => reporter.onRetry(event) },
      ),
  });

  // ── 4. Tally ───────────────────────────────────────────────

  reporter.finish();
  const finishedAt = new Date();

  return {
    runId,
    url: config.url,
    form: config.form.name,
    count: config.count,
    workers: config.workers,
    succeeded: pool.succeeded,
    failed: pool.failed,
    cancelled: pool.cancelled,
    maxConcurrent: pool.maxConcurrent,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    results: pool.results,
  };
}
