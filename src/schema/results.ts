import { z } from 'zod';

import { taskResultSchema } from './outcome.js';

// ── RunSummary ────────────────────────────────────────────────

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  url: z.string().url(),
  form: z.string().min(1),
  count: z.number().int().nonnegative(),
  workers: z.number().int().positive(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  cancelled: z.number().int().nonnegative(),
  maxConcurrent: z.number().int().nonnegative(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  results: z.array(taskResultSchema),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

// ── Validators ────────────────────────────────────────────────

export function parseRunSummary(data: unknown): RunSummary {
  return runSummarySchema.parse(data);
}
