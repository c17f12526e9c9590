import type { Locator, Page } from 'playwright';

import type { SelectorStrategy } from '../schema/index.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a selector and its strategy to a Playwright Locator.
 *
 *   css    → page.locator(value)
 *   xpath  → page.locator('xpath=' + value)
 *   id     → page.locator('[id="value"]')
 *   name   → page.locator('[name="value"]')
 *   text   → page.getByText(value)
 *   testid → page.getByTestId(value)
 *
 * No auto-fallback: a wrong strategy fails at action time.
 */
export function resolveSelector(
  page: Page,
  value: string,
  strategy: SelectorStrategy = 'css',
): Locator {
  switch (strategy) {
    case 'css':
      return page.locator(value);

    case 'xpath':
      return page.locator(`xpath=${value}`);

    case 'id':
    case 'name':
      return page.locator(attributeSelector(strategy, value));

    case 'text':
      return page.getByText(value);

    case 'testid':
      return page.getByTestId(value);
  }
}

/** CSS attribute selector with the value quoted and escaped. */
export function attributeSelector(attribute: 'id' | 'name', value: string): string {
  const escaped = value.replace(/["\\]/g, (ch) => `\\${ch}`);
  return `[${attribute}="${escaped}"]`;
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the selector for logs. */
export function describeSelector(
  value: string,
  strategy: SelectorStrategy = 'css',
): string {
  switch (strategy) {
    case 'css':
      return value;
    case 'xpath':
      return `xpath=${value}`;
    case 'id':
    case 'name':
      return attributeSelector(strategy, value);
    case 'text':
      return `text="${value}"`;
    case 'testid':
      return `[data-testid="${value}"]`;
  }
}
