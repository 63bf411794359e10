import type { FieldAnswer, FieldSpec } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface LaunchOptions {
  headless: boolean;
}

/**
 * One isolated browser instance driving one form attempt.
 *
 * Methods signal failures by throwing the submission error classes:
 * NavigationError / SchemaAbsentError from `navigate`, FieldNotFoundError
 * from `submit` when no submit control exists. `locateField` reports a
 * missing field as `null` after waiting up to `timeoutMs`.
 */
export interface FormDriver<THandle> {
  navigate(url: string, timeoutMs: number): Promise<void>;
  autoScroll(): Promise<void>;
  locateField(field: FieldSpec, timeoutMs: number): Promise<THandle | null>;
  setFieldValue(handle: THandle, answer: FieldAnswer): Promise<void>;
  /** Move to the next form page. `false` when there is no "Next" control. */
  advance(): Promise<boolean>;
  submit(): Promise<void>;
  awaitConfirmation(timeoutMs: number): Promise<boolean>;
  screenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface DriverFactory<THandle> {
  /** Acquire a fresh browser. Throws ResourceAcquisitionError. */
  launch(options: LaunchOptions): Promise<FormDriver<THandle>>;
  /** Launch and close once; used before any task is dispatched. */
  probe(options: LaunchOptions): Promise<void>;
}
