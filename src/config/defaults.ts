/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  FIELD_TIMEOUT: 8_000,
  CONFIRMATION_TIMEOUT: 10_000,
  CLOSE_TIMEOUT: 5_000,
  RETRY_WAIT: 2_000,
  MAX_RETRY_WAIT: 30_000,
  DRY_RUN_LATENCY: 20,
} as const;

export const LIMITS = {
  DEFAULT_COUNT: 125,
  DEFAULT_WORKERS: 4,
  MAX_TASK_RETRIES: 2,
} as const;

export const RUN_DEFAULTS = {
  CONFIG_FILE: '.formsweep.yaml',
  REPORT_PATH: '.artifacts',
  HEADLESS: true,
  AUTO_SCROLL: true,
} as const;

export const EXIT_CODES = {
  OK: 0,
  CONFIG_ERROR: 4,
  STARTUP_ERROR: 5,
  INTERRUPTED: 130,
} as const;

/** Environment variables read as the lowest-precedence source. */
export const ENV_KEYS = {
  URL: 'FORMSWEEP_URL',
  COUNT: 'FORMSWEEP_COUNT',
  WORKERS: 'FORMSWEEP_WORKERS',
  FORM: 'FORMSWEEP_FORM',
  LOG_LEVEL: 'FORMSWEEP_LOG_LEVEL',
} as const;
