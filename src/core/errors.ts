import type { FailureOutcome, FailureReason, SessionState } from '../schema/index.js';

// ── Submission errors ────────────────────────────────────────
// Thrown by drivers and the session; converted to a FailureOutcome at
// the session boundary. `recoverable` decides whether the retry policy
// may re-attempt.

export abstract class SubmissionError extends Error {
  abstract readonly reason: FailureReason;
  abstract readonly recoverable: boolean;
}

export class ResourceAcquisitionError extends SubmissionError {
  readonly reason = 'ResourceAcquisitionError';
  readonly recoverable = true;

  constructor(message: string, options?: ErrorOptions) {
    super(`Browser acquisition failed: ${message}`, options);
    this.name = 'ResourceAcquisitionError';
  }
}

export class NavigationError extends SubmissionError {
  readonly reason = 'NavigationError';
  readonly recoverable = true;

  constructor(url: string, message: string, options?: ErrorOptions) {
    super(`Navigation to ${url} failed: ${message}`, options);
    this.name = 'NavigationError';
  }
}

export class FieldNotFoundError extends SubmissionError {
  readonly reason = 'FieldNotFoundError';
  readonly recoverable = true;
  readonly fieldId: string;

  constructor(fieldId: string, label: string) {
    super(`Field "${label}" (${fieldId}) not found`);
    this.name = 'FieldNotFoundError';
    this.fieldId = fieldId;
  }
}

export class SchemaAbsentError extends SubmissionError {
  readonly reason = 'SchemaAbsentError';
  readonly recoverable = false;

  constructor(message: string) {
    super(`Form not present: ${message}`);
    this.name = 'SchemaAbsentError';
  }
}

export class SubmissionUnconfirmedError extends SubmissionError {
  readonly reason = 'SubmissionUnconfirmedError';
  readonly recoverable = true;

  constructor(timeoutMs: number) {
    super(
      `No confirmation within ${String(timeoutMs)}ms (possible rate limiting)`,
    );
    this.name = 'SubmissionUnconfirmedError';
  }
}

export class CancelledError extends SubmissionError {
  readonly reason = 'CancelledError';
  readonly recoverable = false;

  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

// ── Process-level errors ─────────────────────────────────────

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StartupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export class PoolInvariantError extends Error {
  constructor(message: string) {
    super(`Pool invariant violated: ${message}`);
    this.name = 'PoolInvariantError';
  }
}

// ── Conversion ───────────────────────────────────────────────

/**
 * Map anything a session attempt threw to a failure outcome.
 * Errors outside the taxonomy are treated as transient driver faults.
 */
export function toFailure(err: unknown, state: SessionState): FailureOutcome {
  if (err instanceof SubmissionError) {
    return {
      status: 'failure',
      reason: err.reason,
      recoverable: err.recoverable,
      message: err.message,
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  return {
    status: 'failure',
    reason: 'UnexpectedError',
    recoverable: true,
    message: `${state}: ${message}`,
  };
}

export function cancelledOutcome(message = 'Run cancelled'): FailureOutcome {
  return {
    status: 'failure',
    reason: 'CancelledError',
    recoverable: false,
    message,
  };
}
