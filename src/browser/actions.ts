/**
 * Action primitives
 *
 * Each primitive attempts one bounded interaction and reports a boolean.
 * Faults from the page (timeouts, detached or hidden elements, intercepted
 * clicks) never escape these functions.
 */

import { TIMEOUTS } from '../xserver/selectors.js';
import type { BrowserLocator, BrowserPage, SearchScope } from './types.js';

/**
 * Clicks the first match, then lets the UI settle
 */
export async function tryClick(
  scope: SearchScope,
  target: BrowserLocator,
  timeout: number
): Promise<boolean> {
  try {
    await target.first().click({ timeout });
    await scope.waitForTimeout(TIMEOUTS.CLICK_SETTLE);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fills the first match if at least one element matches
 */
export async function tryFill(target: BrowserLocator, value: string, timeout: number): Promise<boolean> {
  try {
    if ((await target.count()) === 0) {
      return false;
    }
    await target.first().fill(value, { timeout });
    return true;
  } catch {
    return false;
  }
}

export async function tryCheck(target: BrowserLocator, timeout: number): Promise<boolean> {
  try {
    await target.first().check({ timeout });
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether the first match is currently visible
 */
export async function isShown(target: BrowserLocator): Promise<boolean> {
  try {
    return await target.first().isVisible();
  } catch {
    return false;
  }
}

/**
 * Returns the first of the texts visible in the scope (case-insensitive substring)
 */
export async function hasVisibleText(scope: SearchScope, texts: readonly string[]): Promise<string | null> {
  for (const text of texts) {
    if (await isShown(scope.getByText(text, { exact: false }))) {
      return text;
    }
  }
  return null;
}

/**
 * Waits for network idle; a page that never goes quiet is not an error
 */
export async function waitForQuiet(page: BrowserPage, timeout: number): Promise<void> {
  try {
    await page.waitForLoadState('networkidle', { timeout });
  } catch {
    // Long-polling pages never reach idle, carry on
  }
}

export async function gotoAndSettle(page: BrowserPage, url: string, timeout: number): Promise<void> {
  await page.goto(url, { waitUntil: 'domcontentloaded' });
  await waitForQuiet(page, timeout);
  await page.waitForTimeout(TIMEOUTS.NAVIGATION_SETTLE);
}

export async function scrollToBottom(page: BrowserPage): Promise<void> {
  try {
    await page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
  } catch {
    // Scrolling only helps lazy sections render
  }
  await page.waitForTimeout(TIMEOUTS.SCROLL_SETTLE);
}
