import type { Locator, Page } from 'playwright-core';

import type { SelectorHint } from '../schema/index.js';

// ── Field hints ───────────────────────────────────────────────

/** Locator for a field that carries an explicit selector hint. */
export function resolveSelector(page: Page, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'testid':
      return page.getByTestId(hint.value);
    case 'role':
      return hint.name === undefined
        ? page.getByRole(hint.role)
        : page.getByRole(hint.role, { name: hint.name, exact: true });
    case 'css':
      return page.locator(hint.value);
  }
}

// ── Question containers ───────────────────────────────────────
// Question-per-listitem layout: each question lives in a [role=listitem]
// whose text contains the question label.

export const QUESTION_CONTAINER = '[role="listitem"]';

export function questionContainer(page: Page, label: string): Locator {
  return page.locator(QUESTION_CONTAINER).filter({ hasText: label }).first();
}

/** Buttons whose accessible name is exactly one of `names`. */
export function buttonNamed(page: Page, names: readonly string[]): Locator {
  return page.getByRole('button', { name: exactAlternatives(names) });
}

export function exactAlternatives(names: readonly string[]): RegExp {
  return new RegExp(`^(?:${names.map(escapeRegExp).join('|')})$`);
}

export function anyPhrase(phrases: readonly string[]): RegExp {
  return new RegExp(phrases.map(escapeRegExp).join('|'));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
