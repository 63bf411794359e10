/**
 * Configuration module.
 * Config file and form schema loading, plus the flag/file/env/default
 * merge into one validated RunConfig.
 */

export { TIMEOUTS, LIMITS, RUN_DEFAULTS, EXIT_CODES, ENV_KEYS } from './defaults.js';
export { loadConfigFile, loadFormSchema, formatZodError } from './loader.js';
export { resolveRunConfig, BUNDLED_FORM_PATH } from './resolve.js';
export type { CliRunOptions, Env } from './resolve.js';
