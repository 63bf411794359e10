import path from 'node:path';

import type {
  AnswerSet,
  FieldAnswer,
  FormSchema,
  SectionSpec,
  SessionState,
  SessionTimeouts,
  SubmissionOutcome,
  SubmissionTask,
} from '../schema/index.js';
import { SUCCESS } from '../schema/index.js';
import type { DriverFactory, FormDriver } from '../browser/driver.js';
import { settlesWithin, untilAborted } from '../utils/abort.js';
import * as log from '../utils/logger.js';
import {
  CancelledError,
  FieldNotFoundError,
  SubmissionUnconfirmedError,
  cancelledOutcome,
  toFailure,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface FormSessionConfig<THandle> {
  url: string;
  form: FormSchema;
  factory: DriverFactory<THandle>;
  /** Called once per attempt, before the browser is acquired. */
  generate: (form: FormSchema) => AnswerSet;
  timeouts: SessionTimeouts;
  headless: boolean;
  autoScroll: boolean;
  screenshotDir?: string | undefined;
}

// ── State machine ────────────────────────────────────────────

/**
 * Run one fill-and-submit attempt:
 * Init → Navigate → FillSection1..N → Submit → Done, or Failed from any
 * state. Never throws; every error becomes a failure outcome. The browser
 * acquired in Init is closed exactly once on every path.
 */
export async function runFormSession<THandle>(
  task: SubmissionTask,
  config: FormSessionConfig<THandle>,
  signal?: AbortSignal,
): Promise<SubmissionOutcome> {
  const { form, timeouts } = config;
  let state: SessionState = 'Init';
  let driver: FormDriver<THandle> | undefined;
  let outcome: SubmissionOutcome;

  const enter = (next: SessionState): void => {
    log.transition(task.index, task.attempt, state, next);
    state = next;
  };
  const guard = <T>(op: Promise<T>): Promise<T> => untilAborted(op, signal);

  try {
    if (signal?.aborted) throw new CancelledError();

    const answers = config.generate(form);

    const launching = config.factory.launch({ headless: config.headless });
    try {
      driver = await guard(launching);
    } catch (err) {
      if (err instanceof CancelledError) {
        releaseWhenReady(task, launching, timeouts.close);
      }
      throw err;
    }

    enter('Navigate');
    await guard(driver.navigate(config.url, timeouts.navigation));
    if (config.autoScroll) {
      await guard(driver.autoScroll());
    }

    const last = form.sections.length - 1;
    for (const [i, section] of form.sections.entries()) {
      enter(`FillSection${i + 1}`);
      await fillSection(driver, section, answersFor(answers, section), timeouts, guard);

      if (i < last) {
        const moved = await guard(driver.advance());
        if (!moved) {
          log.debug(`task ${String(task.index)}: no "Next" control after ${section.id}, staying on page`);
        }
      }
    }

    enter('Submit');
    await guard(driver.submit());
    const confirmed = await guard(driver.awaitConfirmation(timeouts.confirmation));
    if (!confirmed) {
      throw new SubmissionUnconfirmedError(timeouts.confirmation);
    }

    enter('Done');
    outcome = SUCCESS;
  } catch (err) {
    outcome = signal?.aborted ? cancelledOutcome() : toFailure(err, state);
    log.debug(`task ${String(task.index)} attempt ${String(task.attempt)} failed in ${state}: ${outcome.message}`, {
      event: 'attempt_failed',
      task: task.index,
      attempt: task.attempt,
      state,
      reason: outcome.reason,
      recoverable: outcome.recoverable,
    });
    enter('Failed');
  } finally {
    if (driver !== undefined) {
      if (config.screenshotDir !== undefined) {
        await captureFinalState(driver, task, state, config.screenshotDir, timeouts.close);
      }
      await closeDriver(driver, task, timeouts.close);
    }
  }

  return outcome;
}

// ── Sections ─────────────────────────────────────────────────

async function fillSection<THandle>(
  driver: FormDriver<THandle>,
  section: SectionSpec,
  answers: readonly FieldAnswer[],
  timeouts: SessionTimeouts,
  guard: <T>(op: Promise<T>) => Promise<T>,
): Promise<void> {
  for (const field of section.fields) {
    const answer = answers.find((a) => a.fieldId === field.id);
    if (answer === undefined) {
      throw new Error(`No generated answer for field ${field.id}`);
    }

    const handle = await guard(driver.locateField(field, timeouts.field));
    if (handle === null) {
      throw new FieldNotFoundError(field.id, field.label);
    }
    await guard(driver.setFieldValue(handle, answer));
  }
}

function answersFor(set: AnswerSet, section: SectionSpec): readonly FieldAnswer[] {
  return set.sections.find((s) => s.sectionId === section.id)?.answers ?? [];
}

// ── Release ──────────────────────────────────────────────────

async function closeDriver<THandle>(
  driver: FormDriver<THandle>,
  task: SubmissionTask,
  timeoutMs: number,
): Promise<void> {
  try {
    const closed = await settlesWithin(driver.close(), timeoutMs);
    if (!closed) {
      log.warn(`task ${String(task.index)}: browser did not close within ${String(timeoutMs)}ms`);
    }
  } catch (err) {
    log.warn(`task ${String(task.index)}: closing browser failed: ${errorMessage(err)}`);
  }
}

/** A launch that finishes after cancellation still gets its browser closed. */
function releaseWhenReady<THandle>(
  task: SubmissionTask,
  launching: Promise<FormDriver<THandle>>,
  timeoutMs: number,
): void {
  void launching.then(
    (driver) => closeDriver(driver, task, timeoutMs),
    (err: unknown) => {
      log.debug(`task ${String(task.index)}: launch failed after cancellation: ${errorMessage(err)}`);
    },
  );
}

async function captureFinalState<THandle>(
  driver: FormDriver<THandle>,
  task: SubmissionTask,
  state: SessionState,
  dir: string,
  timeoutMs: number,
): Promise<void> {
  const name = `task-${String(task.index)}-attempt-${String(task.attempt)}-${state === 'Done' ? 'done' : 'failed'}.png`;
  try {
    await settlesWithin(driver.screenshot(path.join(dir, name)), timeoutMs);
  } catch (err) {
    log.warn(`task ${String(task.index)}: screenshot failed: ${errorMessage(err)}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
