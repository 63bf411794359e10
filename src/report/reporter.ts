import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { FailureReason, RunSummary, TaskResult } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputTask } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputTask };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunSummary, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    url: run.url,
    form: run.form,
    count: run.count,
    workers: run.workers,
    succeeded: run.succeeded,
    failed: run.failed,
    cancelled: run.cancelled,
    maxConcurrent: run.maxConcurrent,
    durationMs: run.durationMs,
    exitCode,
    tasks: sortedByIndex(run.results).map(taskToJSON),
  };
}

function taskToJSON(result: TaskResult): JsonOutputTask {
  const { outcome } = result;
  return {
    index: result.index,
    status: outcome.status,
    attempts: result.attempts,
    reason: outcome.status === 'failure' ? outcome.reason : null,
    recoverable: outcome.status === 'failure' ? outcome.recoverable : null,
    message: outcome.status === 'failure' ? outcome.message : '',
    durationMs: result.durationMs,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainRecord(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# formsweep Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${run.url} |`);
  lines.push(`| **Form** | ${escapeMarkdownCell(run.form)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Workers** | ${String(run.workers)} (max concurrent ${String(run.maxConcurrent)}) |`);
  lines.push(
    `| **Result** | ${String(run.succeeded)} succeeded, ${String(run.failed)} failed of ${String(run.count)} |`,
  );
  lines.push('');

  // Failure breakdown
  const breakdown = failureBreakdown(run.results);
  if (breakdown.length > 0) {
    lines.push(`## Failures by reason`);
    lines.push('');
    lines.push(`| Reason | Tasks |`);
    lines.push(`|--------|-------|`);
    for (const [reason, tasks] of breakdown) {
      lines.push(`| ${reason} | ${String(tasks)} |`);
    }
    lines.push('');
  }

  // Per-task table
  lines.push(`## Tasks`);
  lines.push('');
  lines.push(`| # | Result | Attempts | Duration | Detail |`);
  lines.push(`|---|--------|----------|----------|--------|`);

  for (const result of sortedByIndex(run.results)) {
    const { outcome } = result;
    const status = outcome.status === 'success' ? '[OK]' : `[FAIL] ${outcome.reason}`;
    const detail = outcome.status === 'success' ? '' : escapeMarkdownCell(outcome.message);
    lines.push(
      `| ${String(result.index)} | ${status} | ${String(result.attempts)} | ${formatDuration(result.durationMs)} | ${detail} |`,
    );
  }

  lines.push('');
  return lines.join('\n');
}

// ── Files ────────────────────────────────────────────────────

export interface ReportPaths {
  json: string;
  markdown: string;
}

/** Write `summary.json` and `report.md` into `outputDir`. */
export async function writeReports(
  outputDir: string,
  run: RunSummary,
  exitCode: number,
): Promise<ReportPaths> {
  await mkdir(outputDir, { recursive: true });
  const paths: ReportPaths = {
    json: path.join(outputDir, 'summary.json'),
    markdown: path.join(outputDir, 'report.md'),
  };
  await writeFile(paths.json, serializeJSON(generateJSON(run, exitCode)) + '\n', 'utf-8');
  await writeFile(paths.markdown, generateMarkdown(run), 'utf-8');
  return paths;
}

// ── Helpers ──────────────────────────────────────────────────

function sortedByIndex(results: readonly TaskResult[]): TaskResult[] {
  return [...results].sort((a, b) => a.index - b.index);
}

/** Failure counts per reason, most frequent first. */
export function failureBreakdown(
  results: readonly TaskResult[],
): Array<[FailureReason, number]> {
  const counts = new Map<FailureReason, number>();
  for (const { outcome } of results) {
    if (outcome.status === 'failure') {
      counts.set(outcome.reason, (counts.get(outcome.reason) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
