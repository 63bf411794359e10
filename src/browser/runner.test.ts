import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { TEST_FORM } from '../core/__fixtures__/form.js';
import { ResourceAcquisitionError, StartupError } from '../core/errors.js';
import { configureLogger, resetLogger } from '../utils/logger.js';
import { createPlaywrightFactory } from './runner.js';

const browser = vi.hoisted(() => ({
  launch: vi.fn(),
  newContext: vi.fn(),
  close: vi.fn(),
}));

vi.mock('playwright-core', () => ({
  chromium: { launch: browser.launch },
  errors: { TimeoutError: class TimeoutError extends Error {} },
}));

const factory = createPlaywrightFactory({ form: TEST_FORM, actionTimeout: 1000 });

let lines: string[];

beforeEach(() => {
  lines = [];
  configureLogger({ level: 'debug', sink: (line) => lines.push(line) });
  browser.launch.mockResolvedValue({ newContext: browser.newContext, close: browser.close });
});

afterEach(() => {
  resetLogger();
  vi.resetAllMocks();
});

// ── Launch ───────────────────────────────────────────────────

describe('launch', () => {
  test('a failing close keeps the acquisition error', async () => {
    browser.newContext.mockRejectedValue(new Error('context refused'));
    browser.close.mockRejectedValue(new Error('browser gone'));

    const launched = factory.launch({ headless: true });

    await expect(launched).rejects.toThrow(ResourceAcquisitionError);
    await expect(launched).rejects.toThrow('Browser acquisition failed: context refused');
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(['🔎 Browser close after failed launch: browser gone']);
  });

  test('a failing launch is an acquisition error without a close', async () => {
    browser.launch.mockRejectedValue(new Error('no sandbox'));

    await expect(factory.launch({ headless: true })).rejects.toThrow(
      'Browser acquisition failed: no sandbox',
    );
    expect(browser.close).not.toHaveBeenCalled();
  });
});

// ── Probe ────────────────────────────────────────────────────

describe('probe', () => {
  test('launch failure is a startup error', async () => {
    browser.launch.mockRejectedValue(new Error('no sandbox'));

    await expect(factory.probe({ headless: true })).rejects.toThrow(
      new StartupError('Cannot launch Chromium: no sandbox'),
    );
  });

  test('a failing close after a good launch still passes', async () => {
    browser.close.mockRejectedValue(new Error('browser gone'));

    await expect(factory.probe({ headless: true })).resolves.toBeUndefined();
  });
});
