/**
 * Schema module.
 * Zod schemas for forms, answers, outcomes, config and reports, with the
 * TypeScript types inferred from them.
 */

export * from './form.js';
export * from './answers.js';
export * from './outcome.js';
export * from './results.js';
export * from './config.js';
export * from './jsonOutput.js';
