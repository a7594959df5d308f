/**
 * Cookie-header login material
 *
 * Turns a raw "name=value; name2=value2" string copied from a logged-in
 * browser into Playwright cookie entries for each panel domain.
 */

import { Cookie } from 'tough-cookie';
import type { SessionCookie } from './browser/types.js';

export interface CookiePair {
  name: string;
  value: string;
}

/**
 * Splits a cookie header into pairs.
 * Segments without a name or without a value are dropped; values keep any
 * "=" after the first one.
 */
export function parseCookieString(cookieHeader: string): CookiePair[] {
  const pairs: CookiePair[] = [];

  for (const segment of cookieHeader.split(';')) {
    const eqIndex = segment.indexOf('=');
    if (eqIndex === -1) continue;

    const name = segment.substring(0, eqIndex).trim();
    const value = segment.substring(eqIndex + 1).trim();
    if (!name || !value) continue;

    pairs.push({ name, value });
  }

  return pairs;
}

/**
 * Convert tough-cookie sameSite to Playwright sameSite.
 *
 * tough-cookie uses: 'strict' | 'lax' | 'none' | undefined
 * Playwright uses: 'Strict' | 'Lax' | 'None'
 */
function convertSameSite(sameSite: string | undefined): SessionCookie['sameSite'] {
  switch (sameSite?.toLowerCase()) {
    case 'strict':
      return 'Strict';
    case 'none':
      return 'None';
    default:
      return 'Lax';
  }
}

/**
 * Session cookies (no expiry) map to -1
 */
function convertExpires(expires: Date | 'Infinity' | null | undefined): number {
  if (expires instanceof Date) {
    return Math.floor(expires.getTime() / 1000);
  }
  return -1;
}

/**
 * Convert a tough-cookie Cookie to Playwright format, or null when it
 * lacks a name or a domain
 */
export function convertCookieToPlaywright(cookie: Cookie): SessionCookie | null {
  if (!cookie.key || !cookie.domain) {
    return null;
  }

  let domain = cookie.domain;
  // Domain-wide cookies carry a leading dot, host-only ones do not
  if (!domain.startsWith('.') && cookie.hostOnly === false) {
    domain = '.' + domain;
  }

  return {
    name: cookie.key,
    value: cookie.value,
    domain,
    path: cookie.path ?? '/',
    expires: convertExpires(cookie.expires),
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: convertSameSite(cookie.sameSite),
  };
}

/**
 * One host-only session cookie per pair per domain
 */
export function buildSessionCookies(
  pairs: readonly CookiePair[],
  domains: readonly string[]
): SessionCookie[] {
  const cookies: SessionCookie[] = [];

  for (const domain of domains) {
    for (const { name, value } of pairs) {
      const cookie = new Cookie({
        key: name,
        value,
        domain,
        path: '/',
        hostOnly: true,
        secure: true,
        httpOnly: false,
        sameSite: 'lax',
      });
      const converted = convertCookieToPlaywright(cookie);
      if (converted) {
        cookies.push(converted);
      }
    }
  }

  return cookies;
}
