import { CancelledError } from '../core/errors.js';

// ── Abortable waits ─────────────────────────────────────────

/**
 * Settle with `op`, or reject with CancelledError as soon as `signal`
 * aborts. `op` keeps a handler attached either way, so a late rejection
 * (a closed browser failing its pending command) is never unhandled.
 */
export function untilAborted<T>(op: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal === undefined) return op;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancelledError());
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    op.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Sleep for `ms`; rejects with CancelledError if `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError());

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Resolve `true` when `op` settles within `ms`, `false` otherwise. */
export async function settlesWithin(op: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => {
      resolve(false);
    }, ms);
  });
  try {
    return await Promise.race([op.then(() => true as const), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
