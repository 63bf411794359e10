import { z } from 'zod';

import { failureReasonSchema } from './outcome.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Task output ─────────────────────────────────────────────

export const jsonOutputTaskSchema = z.object({
  index: z.number().int().nonnegative(),
  status: z.enum(['success', 'failure']),
  attempts: z.number().int().nonnegative(),
  reason: failureReasonSchema.nullable(),
  recoverable: z.boolean().nullable(),
  message: z.string(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutputTask = z.infer<typeof jsonOutputTaskSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  url: z.string(),
  form: z.string(),
  count: z.number().int().nonnegative(),
  workers: z.number().int().positive(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  cancelled: z.number().int().nonnegative(),
  maxConcurrent: z.number().int().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  tasks: z.array(jsonOutputTaskSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
