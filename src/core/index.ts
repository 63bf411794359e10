/**
 * Core orchestration module.
 * Coordinates generator → session → retry → pool → progress.
 * No CLI and no browser APIs: drivers come in through DriverFactory.
 */

export * from './errors.js';
export { generateAnswers, isAnswerInDomain, seededRandom } from './generator.js';
export type { RandomSource } from './generator.js';
export { runFormSession } from './session.js';
export type { FormSessionConfig } from './session.js';
export { attemptWithRetry, backoffDelay } from './retry.js';
export type { AttemptRunner, RetryEvent, RetryOptions, RetryPolicy, RetryResult } from './retry.js';
export { runPool, PoolState } from './pool.js';
export type { PoolOptions, PoolSnapshot, PoolSummary, TaskExecutor } from './pool.js';
export { ProgressReporter } from './progress.js';
export type { ProgressObserver, ProgressSnapshot } from './progress.js';
export { runSubmissions } from './orchestrator.js';
export type { SubmissionRunConfig } from './orchestrator.js';
