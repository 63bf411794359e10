#!/usr/bin/env node

/**
 * formsweep CLI entry point.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerValidateFormCommand } from './run.js';

const program = new Command();

program
  .name('formsweep')
  .description(
    'Concurrent form submission harness. Fills a multi-section web form with generated answers and submits it N times on a bounded pool of browsers.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerValidateFormCommand(program);

await program.parseAsync();
