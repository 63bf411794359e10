import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import type { SimulatedDriverOptions } from '../browser/index.js';
import { jsonOutputSchema } from '../schema/jsonOutput.js';
import { configureLogger, resetLogger } from '../utils/logger.js';
import { registerRunCommand } from './run.js';

// Dry runs go through the real simulated driver, with faults chosen per test.
const sim = vi.hoisted(() => {
  const state: { fault: SimulatedDriverOptions['fault'] } = { fault: undefined };
  return state;
});

vi.mock('../browser/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../browser/index.js')>();
  return {
    ...actual,
    createSimulatedFactory: (options: SimulatedDriverOptions = {}) =>
      actual.createSimulatedFactory({
        ...options,
        latencyMs: 0,
        ...(sim.fault !== undefined ? { fault: sim.fault } : {}),
      }),
  };
});

const TARGET = 'https://forms.test/feedback';

let dir: string;
let configFile: string;
let reportPath: string;
let stderr: string[];

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'formsweep-cli-'));
  configFile = path.join(dir, '.formsweep.yaml');
  reportPath = path.join(dir, 'reports');
  await writeFile(configFile, '', 'utf-8');

  stderr = [];
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
  configureLogger({ sink: () => {} });
  sim.fault = undefined;
});

afterEach(async () => {
  vi.restoreAllMocks();
  resetLogger();
  process.exitCode = undefined;
  await rm(dir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<void> {
  const program = new Command().exitOverride();
  registerRunCommand(program);
  await program.parseAsync([
    'node',
    'formsweep',
    'run',
    '--dry-run',
    '--config',
    configFile,
    '--report-path',
    reportPath,
    '--max-retries',
    '0',
    ...args,
  ]);
}

async function readSummary() {
  const text = await readFile(path.join(reportPath, 'summary.json'), 'utf-8');
  return jsonOutputSchema.parse(JSON.parse(text));
}

// ── Completed runs ───────────────────────────────────────────

describe('run command', () => {
  test('a completed run exits 0 even when submissions fail', async () => {
    sim.fault = (call) => (call.operation === 'confirm' && call.browser === 1 ? 'miss' : undefined);

    await run('--url', TARGET, '--count', '3', '--workers', '2');

    expect(process.exitCode).toBe(0);
    const summary = await readSummary();
    expect(summary).toMatchObject({ count: 3, succeeded: 2, failed: 1, cancelled: 0, exitCode: 0 });
    expect(summary.tasks.filter((t) => t.reason === 'SubmissionUnconfirmedError')).toHaveLength(1);
  });

  test('an interrupt exits 130 and still writes the report', async () => {
    sim.fault = (call) => {
      if (call.operation === 'navigate' && call.browser === 1) {
        const handlers = process.listeners('SIGINT');
        handlers[handlers.length - 1]?.('SIGINT');
      }
      return undefined;
    };

    await run('--url', TARGET, '--count', '3', '--workers', '1');

    expect(process.exitCode).toBe(130);
    const summary = await readSummary();
    expect(summary.exitCode).toBe(130);
    expect(summary.cancelled).toBeGreaterThanOrEqual(2);
  });

  test('the signal handlers are removed after the run', async () => {
    const before = process.listenerCount('SIGINT');

    await run('--url', TARGET, '--count', '1');

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});

// ── Config and startup errors ────────────────────────────────

describe('run command errors', () => {
  test('a missing URL exits 4', async () => {
    await run('--count', '1');

    expect(process.exitCode).toBe(4);
    expect(stderr).toContain(
      'Config error: --url is required (or set "url" in the config file, or FORMSWEEP_URL)\n',
    );
  });

  test('zero workers exits 4', async () => {
    await run('--url', TARGET, '--workers', '0');

    expect(process.exitCode).toBe(4);
    expect(stderr.some((line) => line.startsWith('Config error: workers: '))).toBe(true);
  });

  test('a log file that cannot be created exits 4', async () => {
    await run('--url', TARGET, '--count', '1', '--log-file', path.join(configFile, 'run.log'));

    expect(process.exitCode).toBe(4);
    const prefix = `Config error: Cannot write log file ${path.join(configFile, 'run.log')}: `;
    expect(stderr.some((line) => line.startsWith(prefix))).toBe(true);
  });

  test('a log file in a new directory is created', async () => {
    const logFile = path.join(dir, 'logs', 'run.log');

    await run('--url', TARGET, '--count', '1', '--log-file', logFile);

    expect(process.exitCode).toBe(0);
    expect(await readFile(logFile, 'utf-8')).toContain('📊 1 succeeded, 0 failed, 1 total\n');
  });

  test('a failed browser probe exits 5 before any report', async () => {
    sim.fault = (call) => (call.operation === 'probe' ? new Error('no display') : undefined);

    await run('--url', TARGET, '--count', '2');

    expect(process.exitCode).toBe(5);
    expect(stderr).toContain('Startup error: Cannot launch browser: no display\n');
    await expect(readFile(path.join(reportPath, 'summary.json'), 'utf-8')).rejects.toThrow(/ENOENT/);
  });
});
