import { describe, expect, test } from 'vitest';

import { CancelledError } from '../core/errors.js';
import { settlesWithin, sleep, untilAborted } from './abort.js';

function never(): Promise<never> {
  return new Promise(() => {});
}

describe('untilAborted', () => {
  test('passes the value through without a signal', async () => {
    await expect(untilAborted(Promise.resolve(3))).resolves.toBe(3);
  });

  test('passes the value through when not aborted', async () => {
    const controller = new AbortController();
    await expect(untilAborted(Promise.resolve('ok'), controller.signal)).resolves.toBe('ok');
  });

  test('rejects with CancelledError on abort', async () => {
    const controller = new AbortController();
    const pending = untilAborted(never(), controller.signal);

    controller.abort();

    await expect(pending).rejects.toThrow(CancelledError);
  });

  test('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(untilAborted(Promise.resolve(1), controller.signal)).rejects.toThrow(CancelledError);
  });

  test('propagates the operation error', async () => {
    const controller = new AbortController();
    await expect(
      untilAborted(Promise.reject(new Error('boom')), controller.signal),
    ).rejects.toThrow('boom');
  });
});

describe('sleep', () => {
  test('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  test('abort cuts the wait short', async () => {
    const controller = new AbortController();
    const waiting = sleep(60_000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow(CancelledError);
  });
});

describe('settlesWithin', () => {
  test('true when the operation settles in time', async () => {
    await expect(settlesWithin(Promise.resolve(), 50)).resolves.toBe(true);
  });

  test('false when it does not', async () => {
    await expect(settlesWithin(never(), 5)).resolves.toBe(false);
  });

  test('rejects when the operation rejects', async () => {
    await expect(settlesWithin(Promise.reject(new Error('close failed')), 50)).rejects.toThrow(
      'close failed',
    );
  });
});
