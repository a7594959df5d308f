/**
 * Session establishment
 *
 * Two strategies produce an authenticated panel session: injecting a
 * cookie copied from a logged-in browser, and submitting the login form.
 * The cookie is always tried first. Neither counts until a login marker
 * is visible on the page.
 */

import type { Logger } from 'pino';
import { gotoAndSettle, hasVisibleText, tryFill, waitForQuiet } from '../browser/actions.js';
import { clickByText } from '../browser/locate.js';
import type { BrowserPage, BrowserSession } from '../browser/types.js';
import { buildSessionCookies, parseCookieString } from '../cookies.js';
import type { DiagnosticCapture } from '../diagnostics.js';
import type { Config } from '../types.js';
import { EMAIL_INPUT_SELECTORS, PASSWORD_INPUT_SELECTORS } from '../xserver/selectors.js';

export type LoginMethod = 'cookie' | 'credentials';

export interface SessionResult {
  authenticated: boolean;
  method: LoginMethod | null;
}

interface AuthContext {
  session: BrowserSession;
  config: Config;
  diagnostics: DiagnosticCapture;
  log: Logger;
}

/**
 * Checks for any of the logged-in markers in the main document
 */
export async function isLoggedIn(page: BrowserPage, markers: readonly string[]): Promise<boolean> {
  return (await hasVisibleText(page, markers)) !== null;
}

async function cookieLogin(ctx: AuthContext, cookieHeader: string): Promise<boolean> {
  const { session, config, diagnostics, log } = ctx;
  const pairs = parseCookieString(cookieHeader);
  const cookies = buildSessionCookies(pairs, config.cookieDomains);
  if (cookies.length === 0) {
    log.warn('Cookie string contained no usable name=value pairs');
    return false;
  }

  try {
    await session.context.addCookies(cookies);
  } catch (err) {
    log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Add cookies failed');
    return false;
  }
  log.info({ cookieNames: pairs.map((p) => p.name), domains: config.cookieDomains }, 'Injected cookies');

  await gotoAndSettle(session.page, config.indexUrl, config.defaultTimeoutMs);
  await diagnostics.screenshot('after_cookie_goto_game_index');
  if (await isLoggedIn(session.page, config.labels.loginMarkers)) {
    log.info('Logged in via cookie (game index)');
    return true;
  }

  await gotoAndSettle(session.page, config.loginUrl, config.defaultTimeoutMs);
  await diagnostics.screenshot('after_cookie_goto_login');
  if (await isLoggedIn(session.page, config.labels.loginMarkers)) {
    log.info('Logged in via cookie (login URL)');
    return true;
  }

  return false;
}

/**
 * Fills the first field found by label, then by attribute pattern
 */
async function fillField(
  page: BrowserPage,
  labels: readonly string[],
  selectors: readonly string[],
  value: string,
  timeout: number
): Promise<boolean> {
  for (const label of labels) {
    if (await tryFill(page.getByLabel(label, { exact: false }), value, timeout)) {
      return true;
    }
  }
  for (const selector of selectors) {
    if (await tryFill(page.locator(selector), value, timeout)) {
      return true;
    }
  }
  return false;
}

async function passwordLogin(ctx: AuthContext, email: string, password: string): Promise<boolean> {
  const { session, config, diagnostics, log } = ctx;
  const { page } = session;
  const { labels, shortTimeoutMs } = config;

  await gotoAndSettle(page, config.loginUrl, config.defaultTimeoutMs);
  await diagnostics.screenshot('login_form_loaded');

  const filledEmail = await fillField(page, labels.emailLabels, EMAIL_INPUT_SELECTORS, email, shortTimeoutMs);
  const filledPassword = await fillField(
    page,
    labels.passwordLabels,
    PASSWORD_INPUT_SELECTORS,
    password,
    shortTimeoutMs
  );
  log.debug({ filledEmail, filledPassword }, 'Login form filled');

  const clicked = await clickByText(page, labels.loginButton, { timeout: shortTimeoutMs });
  if (!clicked && filledPassword) {
    log.debug('No login button matched, submitting with Enter');
    try {
      await page.keyboard.press('Enter');
    } catch (err) {
      log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Enter key submit failed');
    }
  }

  await waitForQuiet(page, config.defaultTimeoutMs);
  await diagnostics.screenshot('after_login_submit');
  return isLoggedIn(page, labels.loginMarkers);
}

/**
 * Authenticates the session: cookie first, credentials only if the
 * cookie did not verify
 */
export async function establishSession(
  session: BrowserSession,
  config: Config,
  diagnostics: DiagnosticCapture,
  parentLog: Logger
): Promise<SessionResult> {
  const log = parentLog.child({ step: 'establish_session' });
  const ctx: AuthContext = { session, config, diagnostics, log };

  if (config.cookie) {
    try {
      if (await cookieLogin(ctx, config.cookie)) {
        return { authenticated: true, method: 'cookie' };
      }
    } catch (err) {
      log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Cookie login errored');
    }
    log.warn('Cookie login did not verify');
  }

  if (config.credentials) {
    try {
      if (await passwordLogin(ctx, config.credentials.email, config.credentials.password)) {
        log.info('Logged in via credentials');
        return { authenticated: true, method: 'credentials' };
      }
    } catch (err) {
      log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Credential login errored');
    }
    log.warn('Credential login did not verify');
  }

  await diagnostics.screenshot('login_failed');
  await diagnostics.dumpHtml('login_failed');
  return { authenticated: false, method: null };
}
