/**
 * Live execution logger for formsweep.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal; the `json`
 * format writes one object per line for log shippers instead.
 */

import { appendFileSync } from 'node:fs';

import type { LogFormat, LogLevel } from '../schema/index.js';

// ── Configuration ───────────────────────────────────────────

export type LogSink = (line: string) => void;

export type LogFields = Readonly<Record<string, string | number | boolean | null>>;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
  file?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

let level: LogLevel = 'info';
let format: LogFormat = 'pretty';
let sink: LogSink = stderrSink;
let file: string | undefined;

export function configureLogger(options: LoggerOptions): void {
  level = options.level ?? level;
  format = options.format ?? format;
  sink = options.sink ?? sink;
  file = options.file ?? file;
}

export function resetLogger(): void {
  level = 'info';
  format = 'pretty';
  sink = stderrSink;
  file = undefined;
}

export function currentFormat(): LogFormat {
  return format;
}

// ── Core write ──────────────────────────────────────────────

function write(
  at: LogLevel,
  icon: string,
  message: string,
  fields: LogFields = {},
): void {
  if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;

  const line = render(at, icon, message, fields);
  sink(line);
  if (file !== undefined) {
    appendToFile(file, line);
  }
}

function render(at: LogLevel, icon: string, message: string, fields: LogFields): string {
  return format === 'json'
    ? JSON.stringify({ ts: new Date().toISOString(), level: at, msg: message, ...fields })
    : `${icon} ${message}`;
}

// A log file that stops accepting writes is dropped after one warning;
// logging never fails the caller.
function appendToFile(target: string, line: string): void {
  try {
    appendFileSync(target, line + '\n', 'utf-8');
  } catch (err) {
    file = undefined;
    const reason = err instanceof Error ? err.message : String(err);
    sink(
      render('warn', '⚠️ ', `Log file ${target} is not writable, no longer writing to it: ${reason}`, {
        event: 'log-file',
      }),
    );
  }
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string, fields?: LogFields): void {
  write('info', 'ℹ️ ', message, fields);
}

export function detail(message: string, fields?: LogFields): void {
  write('info', '  ', message, fields);
}

export function debug(message: string, fields?: LogFields): void {
  write('debug', '🔎', message, fields);
}

export function section(title: string): void {
  if (format === 'json') {
    write('info', '', title, { event: 'section' });
    return;
  }
  write('info', '', `\n${'─'.repeat(50)}`);
  write('info', '▶ ', title);
  write('info', '', `${'─'.repeat(50)}`);
}

export function warn(message: string, fields?: LogFields): void {
  write('warn', '⚠️ ', message, fields);
}

export function error(message: string, fields?: LogFields): void {
  write('error', '💥', message, fields);
}

/** One line per session state change. */
export function transition(
  task: number,
  attempt: number,
  from: string,
  to: string,
): void {
  write('debug', '🔁', `[task ${String(task)} #${String(attempt)}] ${from} → ${to}`, {
    event: 'transition',
    task,
    attempt,
    from,
    to,
  });
}

/** One line per terminal task outcome, with a running counter. */
export function outcome(
  completed: number,
  total: number,
  task: number,
  success: boolean,
  description: string,
  fields: LogFields = {},
): void {
  const icon = success ? '✅' : '❌';
  write(
    success ? 'info' : 'warn',
    icon,
    `[${String(completed)}/${String(total)}] task ${String(task)}: ${description}`,
    { event: 'outcome', completed, total, task, success, ...fields },
  );
}

export function retry(task: number, attempt: number, delayMs: number, reason: string): void {
  write(
    'info',
    '🔄',
    `task ${String(task)}: retry ${String(attempt)} in ${String(delayMs)}ms after ${reason}`,
    { event: 'retry', task, attempt, delayMs, reason },
  );
}

export function tally(succeeded: number, failed: number, total: number): void {
  write(
    'info',
    '📊',
    `${String(succeeded)} succeeded, ${String(failed)} failed, ${String(total)} total`,
    { event: 'tally', succeeded, failed, total },
  );
}
