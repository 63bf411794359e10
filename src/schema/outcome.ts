import { z } from 'zod';

// ── SubmissionTask ────────────────────────────────────────────

export interface SubmissionTask {
  readonly index: number;
  readonly attempt: number;
}

// ── Failure reasons ───────────────────────────────────────────

export const failureReasonSchema = z.enum([
  'ResourceAcquisitionError',
  'NavigationError',
  'FieldNotFoundError',
  'SchemaAbsentError',
  'SubmissionUnconfirmedError',
  'CancelledError',
  'UnexpectedError',
]);

export type FailureReason = z.infer<typeof failureReasonSchema>;

// ── SubmissionOutcome ─────────────────────────────────────────

export const successOutcomeSchema = z.object({
  status: z.literal('success'),
});

export const failureOutcomeSchema = z.object({
  status: z.literal('failure'),
  reason: failureReasonSchema,
  recoverable: z.boolean(),
  message: z.string(),
});

export const submissionOutcomeSchema = z.discriminatedUnion('status', [
  successOutcomeSchema,
  failureOutcomeSchema,
]);

export type SuccessOutcome = z.infer<typeof successOutcomeSchema>;
export type FailureOutcome = z.infer<typeof failureOutcomeSchema>;
export type SubmissionOutcome = z.infer<typeof submissionOutcomeSchema>;

export const SUCCESS: SuccessOutcome = { status: 'success' };

// ── Session states ────────────────────────────────────────────
// FillSection<n> is numbered from 1 in form order.

export type SessionState =
  | 'Init'
  | 'Navigate'
  | `FillSection${number}`
  | 'Submit'
  | 'Done'
  | 'Failed';

// ── TaskResult ────────────────────────────────────────────────

export const taskResultSchema = z.object({
  index: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  outcome: submissionOutcomeSchema,
  durationMs: z.number().int().nonnegative(),
});

export type TaskResult = z.infer<typeof taskResultSchema>;

// ── Tally ─────────────────────────────────────────────────────

export interface Tally {
  succeeded: number;
  failed: number;
  total: number;
}

export function isCancelled(outcome: SubmissionOutcome): boolean {
  return outcome.status === 'failure' && outcome.reason === 'CancelledError';
}
