import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { ZodError } from 'zod';

import { runConfigSchema } from '../schema/index.js';
import type { FileConfig, RunConfig } from '../schema/index.js';
import { ConfigError } from '../core/errors.js';
import { ENV_KEYS, LIMITS, RUN_DEFAULTS, TIMEOUTS } from './defaults.js';
import { formatZodError } from './loader.js';

// ── Bundled form ─────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const BUNDLED_FORM_PATH = path.join(THIS_DIR, '..', '..', 'forms', 'sample-form.yaml');

// ── CLI flag shape ───────────────────────────────────────────
// Commander hands every valued option over as a string.

export interface CliRunOptions {
  url?: string;
  count?: string;
  workers?: string;
  form?: string;
  maxRetries?: string;
  backoff?: string;
  backoffDelay?: string;
  headed?: true;
  scroll?: boolean;
  reportPath?: string;
  screenshots?: true;
  json?: true;
  dryRun?: true;
  logLevel?: string;
  logFormat?: string;
  logFile?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ── Merge ────────────────────────────────────────────────────

/**
 * Merge CLI flags > config file > environment > defaults and validate
 * the result. Throws ConfigError on any invalid or missing value.
 */
export function resolveRunConfig(
  opts: CliRunOptions,
  file: FileConfig,
  env: Env = process.env,
): RunConfig {
  const url = opts.url ?? file.url ?? env[ENV_KEYS.URL];
  if (url === undefined || url.trim() === '') {
    throw new ConfigError(
      `--url is required (or set "url" in the config file, or ${ENV_KEYS.URL})`,
    );
  }

  const count =
    parseInteger('--count', opts.count) ??
    file.count ??
    parseInteger(ENV_KEYS.COUNT, env[ENV_KEYS.COUNT]) ??
    LIMITS.DEFAULT_COUNT;
  const workers =
    parseInteger('--workers', opts.workers) ??
    file.workers ??
    parseInteger(ENV_KEYS.WORKERS, env[ENV_KEYS.WORKERS]) ??
    LIMITS.DEFAULT_WORKERS;

  const logFile = opts.logFile ?? file.logFile;

  const candidate = {
    url,
    count,
    workers,
    formPath: path.resolve(opts.form ?? file.form ?? env[ENV_KEYS.FORM] ?? BUNDLED_FORM_PATH),
    headless: opts.headed ? false : (file.headless ?? RUN_DEFAULTS.HEADLESS),
    autoScroll: opts.scroll === false ? false : (file.autoScroll ?? RUN_DEFAULTS.AUTO_SCROLL),
    maxRetries:
      parseInteger('--max-retries', opts.maxRetries) ??
      file.maxRetries ??
      LIMITS.MAX_TASK_RETRIES,
    backoff: {
      strategy: opts.backoff ?? file.backoff?.strategy ?? 'fixed',
      delayMs:
        parseInteger('--backoff-delay', opts.backoffDelay) ??
        file.backoff?.delayMs ??
        TIMEOUTS.RETRY_WAIT,
      maxDelayMs: file.backoff?.maxDelayMs ?? TIMEOUTS.MAX_RETRY_WAIT,
    },
    timeouts: {
      navigation: file.timeouts?.navigation ?? TIMEOUTS.NAVIGATION_TIMEOUT,
      field: file.timeouts?.field ?? TIMEOUTS.FIELD_TIMEOUT,
      confirmation: file.timeouts?.confirmation ?? TIMEOUTS.CONFIRMATION_TIMEOUT,
      close: file.timeouts?.close ?? TIMEOUTS.CLOSE_TIMEOUT,
    },
    reportPath: path.resolve(opts.reportPath ?? file.reportPath ?? RUN_DEFAULTS.REPORT_PATH),
    screenshots: opts.screenshots ?? file.screenshots ?? false,
    dryRun: opts.dryRun ?? false,
    json: opts.json ?? false,
    logLevel: opts.logLevel ?? file.logLevel ?? env[ENV_KEYS.LOG_LEVEL] ?? 'info',
    logFormat: opts.logFormat ?? file.logFormat ?? 'pretty',
    ...(logFile !== undefined ? { logFile: path.resolve(logFile) } : {}),
  };

  try {
    return runConfigSchema.parse(candidate);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(formatZodError(err));
    }
    throw err;
  }
}

// ── Helpers ──────────────────────────────────────────────────

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}
