import { z } from 'zod';

// ── Backoff ─────────────────────────────────────────────────

export const backoffStrategySchema = z.enum(['fixed', 'exponential']);

export type BackoffStrategy = z.infer<typeof backoffStrategySchema>;

export const backoffConfigSchema = z.object({
  strategy: backoffStrategySchema,
  delayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
});

export type BackoffConfig = z.infer<typeof backoffConfigSchema>;

// ── Timeouts block ──────────────────────────────────────────

export const timeoutsConfigSchema = z.object({
  navigation: z.number().int().positive().optional(),
  field: z.number().int().positive().optional(),
  confirmation: z.number().int().positive().optional(),
  close: z.number().int().positive().optional(),
});

export type TimeoutsConfig = z.infer<typeof timeoutsConfigSchema>;

// ── Logging ─────────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const logFormatSchema = z.enum(['pretty', 'json']);

export type LogFormat = z.infer<typeof logFormatSchema>;

// ── Full config file ────────────────────────────────────────
// Every key is optional: CLI flags and defaults fill the gaps.

export const fileConfigSchema = z
  .object({
    url: z.string().url().optional(),
    count: z.number().int().nonnegative().optional(),
    workers: z.number().int().positive().optional(),
    form: z.string().min(1).optional(),
    headless: z.boolean().optional(),
    autoScroll: z.boolean().optional(),
    maxRetries: z.number().int().nonnegative().optional(),
    backoff: backoffConfigSchema.partial().optional(),
    timeouts: timeoutsConfigSchema.optional(),
    reportPath: z.string().min(1).optional(),
    screenshots: z.boolean().optional(),
    logLevel: logLevelSchema.optional(),
    logFormat: logFormatSchema.optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved run config ─────────────────────────────────────

export const runConfigSchema = z.object({
  url: z.string().url(),
  count: z.number().int().nonnegative(),
  workers: z.number().int().positive(),
  formPath: z.string().min(1),
  headless: z.boolean(),
  autoScroll: z.boolean(),
  maxRetries: z.number().int().nonnegative(),
  backoff: backoffConfigSchema,
  timeouts: z.object({
    navigation: z.number().int().positive(),
    field: z.number().int().positive(),
    confirmation: z.number().int().positive(),
    close: z.number().int().positive(),
  }),
  reportPath: z.string().min(1),
  screenshots: z.boolean(),
  dryRun: z.boolean(),
  json: z.boolean(),
  logLevel: logLevelSchema,
  logFormat: logFormatSchema,
  logFile: z.string().min(1).optional(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;
export type SessionTimeouts = RunConfig['timeouts'];
