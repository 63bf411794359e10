/**
 * CLI module.
 * Commander commands for `run` and `validate-form`; maps errors to exit codes.
 */

export { registerRunCommand, registerValidateFormCommand } from './run.js';
