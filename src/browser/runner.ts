import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium, errors } from 'playwright-core';
import type { Browser, Locator, Page } from 'playwright-core';

import type { FieldAnswer, FieldSpec, FormSchema } from '../schema/index.js';
import {
  FieldNotFoundError,
  NavigationError,
  ResourceAcquisitionError,
  SchemaAbsentError,
  StartupError,
} from '../core/errors.js';
import type { DriverFactory, FormDriver, LaunchOptions } from './driver.js';
import {
  anyPhrase,
  buttonNamed,
  questionContainer,
  resolveSelector,
} from './selectors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface PlaywrightDriverConfig {
  form: FormSchema;
  /** Upper bound for a single click or fill. */
  actionTimeout: number;
}

const LAUNCH_ARGS = ['--disable-notifications', '--disable-extensions'];

const TEXT_INPUTS =
  'input[type="text"], input[type="email"], input[type="number"], input:not([type]), textarea';

const SCROLL_STEP_PX = 500;
const SCROLL_PAUSE_MS = 100;

// ── Factory ──────────────────────────────────────────────────

export function createPlaywrightFactory(
  config: PlaywrightDriverConfig,
): DriverFactory<Locator> {
  return {
    async launch(options: LaunchOptions): Promise<FormDriver<Locator>> {
      let browser: Browser;
      try {
        browser = await chromium.launch({
          headless: options.headless,
          args: LAUNCH_ARGS,
        });
      } catch (err) {
        throw new ResourceAcquisitionError(errorMessage(err), { cause: err });
      }

      try {
        const context = await browser.newContext();
        const page = await context.newPage();
        return createDriver(browser, page, config);
      } catch (err) {
        await closeQuietly(browser);
        throw new ResourceAcquisitionError(errorMessage(err), { cause: err });
      }
    },

    async probe(options: LaunchOptions): Promise<void> {
      let browser: Browser;
      try {
        browser = await chromium.launch({
          headless: options.headless,
          args: LAUNCH_ARGS,
        });
      } catch (err) {
        throw new StartupError(
          `Cannot launch Chromium: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      await closeQuietly(browser);
    },
  };
}

// ── Driver ───────────────────────────────────────────────────

function createDriver(
  browser: Browser,
  page: Page,
  config: PlaywrightDriverConfig,
): FormDriver<Locator> {
  const { form, actionTimeout } = config;

  return {
    async navigate(url: string, timeoutMs: number): Promise<void> {
      let status: number | undefined;
      try {
        const response = await page.goto(url, {
          timeout: timeoutMs,
          waitUntil: 'domcontentloaded',
        });
        status = response?.status();
      } catch (err) {
        throw new NavigationError(url, errorMessage(err), { cause: err });
      }

      if (status === 404 || status === 410) {
        throw new SchemaAbsentError(`${url} answered ${String(status)}`);
      }

      try {
        await page
          .locator(form.marker)
          .first()
          .waitFor({ state: 'attached', timeout: timeoutMs });
      } catch (err) {
        if (err instanceof errors.TimeoutError) {
          throw new SchemaAbsentError(`no "${form.marker}" element at ${url}`);
        }
        throw err;
      }
    },

    async autoScroll(): Promise<void> {
      await page.evaluate(scrollThroughPage, {
        step: SCROLL_STEP_PX,
        pause: SCROLL_PAUSE_MS,
      });
    },

    async locateField(field: FieldSpec, timeoutMs: number): Promise<Locator | null> {
      const locator = field.selector
        ? resolveSelector(page, field.selector).first()
        : questionContainer(page, field.label);

      try {
        await locator.waitFor({ state: 'visible', timeout: timeoutMs });
      } catch (err) {
        if (err instanceof errors.TimeoutError) return null;
        throw err;
      }
      await locator.scrollIntoViewIfNeeded({ timeout: actionTimeout });
      return locator;
    },

    async setFieldValue(handle: Locator, answer: FieldAnswer): Promise<void> {
      try {
        await applyAnswer(handle, answer, actionTimeout);
      } catch (err) {
        if (err instanceof errors.TimeoutError) {
          throw new FieldNotFoundError(answer.fieldId, describeAnswer(answer));
        }
        throw err;
      }
    },

    async advance(): Promise<boolean> {
      const next = buttonNamed(page, form.navigation.next);
      if ((await next.count()) === 0) return false;

      await next.first().click({ timeout: actionTimeout });
      await page.waitForLoadState('domcontentloaded');
      return true;
    },

    async submit(): Promise<void> {
      const button = buttonNamed(page, form.navigation.submit);
      if ((await button.count()) === 0) {
        throw new FieldNotFoundError('submit', form.navigation.submit.join(' / '));
      }
      await button.first().click({ timeout: actionTimeout });
    },

    async awaitConfirmation(timeoutMs: number): Promise<boolean> {
      const signals: Promise<unknown>[] = [
        page
          .getByText(anyPhrase(form.confirmation.phrases))
          .first()
          .waitFor({ state: 'visible', timeout: timeoutMs }),
      ];

      const marker = form.confirmation.urlIncludes;
      if (marker !== undefined) {
        signals.push(
          page.waitForURL((u) => u.href.includes(marker), { timeout: timeoutMs }),
        );
      }

      try {
        await Promise.any(signals);
        return true;
      } catch (err) {
        if (err instanceof AggregateError) return false;
        throw err;
      }
    },

    async screenshot(filePath: string): Promise<void> {
      await mkdir(path.dirname(filePath), { recursive: true });
      await page.screenshot({ path: filePath, fullPage: true });
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Answer dispatch ──────────────────────────────────────────

async function applyAnswer(
  handle: Locator,
  answer: FieldAnswer,
  timeout: number,
): Promise<void> {
  switch (answer.kind) {
    case 'text': {
      const inputs = handle.locator(TEXT_INPUTS);
      const target = (await inputs.count()) > 0 ? inputs.first() : handle;
      await target.fill(answer.value, { timeout });
      break;
    }

    case 'choice': {
      const radio = handle.getByRole('radio', { name: answer.option, exact: true });
      const target =
        (await radio.count()) > 0
          ? radio.first()
          : handle.getByText(answer.option, { exact: true }).first();
      await target.click({ timeout });
      break;
    }

    case 'consent': {
      const boxes = handle.getByRole('checkbox');
      const target = (await boxes.count()) > 0 ? boxes.first() : handle;
      await target.check({ timeout });
      break;
    }
  }
}

function describeAnswer(answer: FieldAnswer): string {
  switch (answer.kind) {
    case 'text':
      return `input of ${answer.fieldId}`;
    case 'choice':
      return `option "${answer.option}"`;
    case 'consent':
      return `checkbox of ${answer.fieldId}`;
  }
}

// ── Browser-context scrolling ────────────────────────────────
// This function is serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

async function scrollThroughPage(opts: { step: number; pause: number }): Promise<void> {
  for (let y = 0; y < document.body.scrollHeight; y += opts.step) {
    window.scrollTo(0, y);
    await new Promise<void>((resolve) => {
      setTimeout(resolve, opts.pause);
    });
  }
  window.scrollTo(0, 0);
}

/** Close whose failure is logged, not raised. */
async function closeQuietly(browser: Browser): Promise<void> {
  try {
    await browser.close();
  } catch (err) {
    log.debug(`Browser close after failed launch: ${errorMessage(err)}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
