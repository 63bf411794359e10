import type { FieldAnswer, FieldSpec } from '../schema/index.js';
import { ResourceAcquisitionError, StartupError } from '../core/errors.js';
import type { DriverFactory, FormDriver, LaunchOptions } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export type SimulatedOperation =
  | 'probe'
  | 'launch'
  | 'navigate'
  | 'scroll'
  | 'locate'
  | 'fill'
  | 'advance'
  | 'submit'
  | 'confirm';

export interface SimulatedCall {
  /** 1-based ordinal of the browser this call belongs to; 0 for the probe. */
  browser: number;
  operation: SimulatedOperation;
  fieldId?: string;
}

/**
 * What to inject for a call: an Error is thrown, `'miss'` makes
 * `locate` return null, `confirm` and `advance` return false.
 */
export type SimulatedFault = Error | 'miss';

export interface SimulatedDriverOptions {
  /** Delay applied to every driver call. */
  latencyMs?: number;
  fault?: (call: SimulatedCall) => SimulatedFault | undefined;
}

export interface SimulatedStats {
  launches: number;
  closes: number;
  /** close() invocations, including repeated ones on the same driver. */
  closeCalls: number;
  open: number;
  maxOpen: number;
  /** Every answer handed to setFieldValue, in call order. */
  filled: FieldAnswer[];
  calls: SimulatedCall[];
}

export interface SimulatedDriverFactory extends DriverFactory<FieldSpec> {
  readonly stats: SimulatedStats;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * In-process stand-in for a browser. Backs `--dry-run` and the tests.
 * Closing a driver rejects whatever call it is still sleeping in, the
 * way a closed browser fails its pending commands.
 */
export function createSimulatedFactory(
  options: SimulatedDriverOptions = {},
): SimulatedDriverFactory {
  const latency = options.latencyMs ?? 0;
  const stats: SimulatedStats = {
    launches: 0,
    closes: 0,
    closeCalls: 0,
    open: 0,
    maxOpen: 0,
    filled: [],
    calls: [],
  };

  function inject(call: SimulatedCall): SimulatedFault | undefined {
    stats.calls.push(call);
    const fault = options.fault?.(call);
    if (fault instanceof Error) throw fault;
    return fault;
  }

  return {
    stats,

    async launch(_options: LaunchOptions): Promise<FormDriver<FieldSpec>> {
      const browser = stats.launches + 1;
      stats.launches = browser;
      await delay(latency);
      try {
        inject({ browser, operation: 'launch' });
      } catch (err) {
        if (err instanceof ResourceAcquisitionError) throw err;
        throw new ResourceAcquisitionError(
          err instanceof Error ? err.message : String(err),
          { cause: err },
        );
      }

      stats.open += 1;
      stats.maxOpen = Math.max(stats.maxOpen, stats.open);
      return createDriver(browser);
    },

    async probe(_options: LaunchOptions): Promise<void> {
      await delay(latency);
      try {
        inject({ browser: 0, operation: 'probe' });
      } catch (err) {
        throw new StartupError(
          `Cannot launch browser: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    },
  };

  function createDriver(browser: number): FormDriver<FieldSpec> {
    let closed = false;
    const pending = new Set<() => void>();

    async function step(operation: SimulatedOperation, fieldId?: string): Promise<SimulatedFault | undefined> {
      if (closed) throw new Error('Browser has been closed');
      if (latency > 0) {
        await new Promise<void>((resolve, reject) => {
          const abort = (): void => {
            clearTimeout(timer);
            reject(new Error('Browser has been closed'));
          };
          const timer = setTimeout(() => {
            pending.delete(abort);
            resolve();
          }, latency);
          pending.add(abort);
        });
      }
      return inject({ browser, operation, ...(fieldId !== undefined ? { fieldId } : {}) });
    }

    return {
      async navigate(): Promise<void> {
        await step('navigate');
      },

      async autoScroll(): Promise<void> {
        await step('scroll');
      },

      async locateField(field: FieldSpec): Promise<FieldSpec | null> {
        const fault = await step('locate', field.id);
        return fault === 'miss' ? null : field;
      },

      async setFieldValue(handle: FieldSpec, answer: FieldAnswer): Promise<void> {
        await step('fill', handle.id);
        stats.filled.push(answer);
      },

      async advance(): Promise<boolean> {
        const fault = await step('advance');
        return fault !== 'miss';
      },

      async submit(): Promise<void> {
        await step('submit');
      },

      async awaitConfirmation(): Promise<boolean> {
        const fault = await step('confirm');
        return fault !== 'miss';
      },

      async screenshot(): Promise<void> {
        // Nothing to capture without a page.
      },

      async close(): Promise<void> {
        stats.closeCalls += 1;
        if (closed) return;
        closed = true;
        stats.closes += 1;
        stats.open -= 1;
        for (const abort of pending) abort();
        pending.clear();
      },
    };
  }
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
