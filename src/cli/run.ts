import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { FormSchema, RunConfig, RunSummary } from '../schema/index.js';
import {
  EXIT_CODES,
  LIMITS,
  RUN_DEFAULTS,
  TIMEOUTS,
  loadConfigFile,
  loadFormSchema,
  resolveRunConfig,
} from '../config/index.js';
import type { CliRunOptions } from '../config/index.js';
import { createPlaywrightFactory, createSimulatedFactory } from '../browser/index.js';
import {
  ConfigError,
  StartupError,
  generateAnswers,
  runSubmissions,
} from '../core/index.js';
import type { SubmissionRunConfig } from '../core/index.js';
import { generateJSON, serializeJSON, writeReports } from '../report/index.js';
import type { ReportPaths } from '../report/index.js';
import * as log from '../utils/logger.js';

// ── Stderr summary ───────────────────────────────────────────

function printSummary(summary: RunSummary, paths: ReportPaths): void {
  process.stderr.write(`\n--- formsweep Result ---\n`);
  process.stderr.write(`URL:       ${summary.url}\n`);
  process.stderr.write(`Form:      ${summary.form}\n`);
  process.stderr.write(
    `Tasks:     ${String(summary.succeeded)} succeeded, ${String(summary.failed)} failed, ${String(summary.count)} total\n`,
  );
  if (summary.cancelled > 0) {
    process.stderr.write(`Cancelled: ${String(summary.cancelled)}\n`);
  }
  process.stderr.write(
    `Workers:   ${String(summary.workers)} (max concurrent ${String(summary.maxConcurrent)})\n`,
  );
  process.stderr.write(
    `Time:      ${(summary.durationMs / 1000).toFixed(1)}s\n`,
  );
  process.stderr.write(`Report:    ${paths.markdown}\n`);
  process.stderr.write(`Run ID:    ${summary.runId}\n\n`);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Config loading ───────────────────────────────────────────

interface RunCommandOptions extends CliRunOptions {
  config?: string;
}

async function loadRun(
  opts: RunCommandOptions,
): Promise<{ config: RunConfig; form: FormSchema }> {
  const fileConfig = await loadConfigFile(
    opts.config ?? RUN_DEFAULTS.CONFIG_FILE,
    opts.config !== undefined,
  );
  const config = resolveRunConfig(opts, fileConfig);
  if (config.logFile !== undefined) {
    await prepareLogFile(config.logFile);
  }

  log.configureLogger({
    level: config.logLevel,
    format: config.logFormat,
    ...(config.logFile !== undefined ? { file: config.logFile } : {}),
  });

  const form = await loadFormSchema(config.formPath);
  return { config, form };
}

async function prepareLogFile(file: string): Promise<void> {
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await appendFile(file, '', 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot write log file ${file}: ${errorMessage(err)}`);
  }
}

function toSubmissionConfig(
  config: RunConfig,
  form: FormSchema,
  signal: AbortSignal,
): SubmissionRunConfig {
  return {
    url: config.url,
    form,
    count: config.count,
    workers: config.workers,
    headless: config.headless,
    autoScroll: config.autoScroll,
    maxRetries: config.maxRetries,
    backoff: config.backoff,
    timeouts: config.timeouts,
    screenshotDir: config.screenshots
      ? path.join(config.reportPath, 'screenshots')
      : undefined,
    signal,
  };
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Fill and submit a form repeatedly with generated answers')
    .option('--url <url>', 'Target form URL')
    .option('--count <n>', `Number of submissions (default ${String(LIMITS.DEFAULT_COUNT)})`)
    .option('--workers <n>', `Concurrent browser sessions (default ${String(LIMITS.DEFAULT_WORKERS)})`)
    .option('--form <path>', 'Form schema file (YAML or JSON)')
    .option('--config <path>', `Path to config file (default ${RUN_DEFAULTS.CONFIG_FILE})`)
    .option('--max-retries <n>', `Retries per submission (default ${String(LIMITS.MAX_TASK_RETRIES)})`)
    .option('--backoff <strategy>', 'Retry backoff: fixed or exponential (default fixed)')
    .option('--backoff-delay <ms>', `Base retry delay (default ${String(TIMEOUTS.RETRY_WAIT)})`)
    .option('--headed', 'Show the browser windows')
    .option('--no-scroll', 'Do not auto-scroll pages before filling')
    .option('--report-path <dir>', `Artifact directory (default ${RUN_DEFAULTS.REPORT_PATH})`)
    .option('--screenshots', 'Save a screenshot of every attempt\'s final state')
    .option('--json', 'Output JSON to stdout')
    .option('--dry-run', 'Use the simulated driver instead of a browser')
    .option('--log-level <level>', 'debug, info, warn or error')
    .option('--log-format <format>', 'pretty or json')
    .option('--log-file <path>', 'Also append log lines to this file')
    .action(async (opts: RunCommandOptions) => {
      // 1. Config: flags > file > env > defaults
      let loaded: { config: RunConfig; form: FormSchema };
      try {
        loaded = await loadRun(opts);
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
        return;
      }
      const { config, form } = loaded;

      // 2. Operator interrupt cancels the run
      const controller = new AbortController();
      const onSignal = (): void => {
        log.warn('Interrupt received, cancelling active submissions');
        controller.abort();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        // 3. Run against the chosen driver
        const runConfig = toSubmissionConfig(config, form, controller.signal);
        const summary = config.dryRun
          ? await runSubmissions(
              createSimulatedFactory({ latencyMs: TIMEOUTS.DRY_RUN_LATENCY }),
              runConfig,
            )
          : await runSubmissions(
              createPlaywrightFactory({ form, actionTimeout: config.timeouts.field }),
              runConfig,
            );

        const exitCode = controller.signal.aborted
          ? EXIT_CODES.INTERRUPTED
          : EXIT_CODES.OK;

        // 4. Reports
        const paths = await writeReports(config.reportPath, summary, exitCode);
        if (config.json) {
          process.stdout.write(serializeJSON(generateJSON(summary, exitCode)) + '\n');
        }
        printSummary(summary, paths);

        process.exitCode = exitCode;
      } catch (err) {
        if (err instanceof StartupError) {
          process.stderr.write(`Startup error: ${err.message}\n`);
          process.exitCode = EXIT_CODES.STARTUP_ERROR;
          return;
        }
        throw err;
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });
}

// ── Validate command ─────────────────────────────────────────

export function registerValidateFormCommand(program: Command): void {
  program
    .command('validate-form')
    .description('Check a form schema file and print a sample answer set')
    .argument('<path>', 'Form schema file (YAML or JSON)')
    .action(async (formPath: string) => {
      let form: FormSchema;
      try {
        form = await loadFormSchema(path.resolve(formPath));
      } catch (err) {
        const prefix = err instanceof ConfigError ? 'Config error' : 'Error';
        process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
        return;
      }

      process.stderr.write(`Form:     ${form.name}\n`);
      for (const [i, section] of form.sections.entries()) {
        process.stderr.write(
          `Section ${String(i + 1)}: ${section.title} (${String(section.fields.length)} fields)\n`,
        );
      }
      process.stdout.write(JSON.stringify(generateAnswers(form), null, 2) + '\n');
    });
}
