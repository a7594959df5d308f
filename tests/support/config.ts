import type { Config } from '../../src/types.js';
import { DEFAULT_LABELS, URLS } from '../../src/xserver/selectors.js';

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    credentials: null,
    cookie: null,
    cookieDomains: ['secure.xserver.ne.jp', 'www.xserver.ne.jp'],
    targetGame: null,
    renewHours: 72,
    minIntervalHours: 24,
    forceRenew: false,
    outcomeLogPath: 'renew_result.md',
    logTimezone: 'Asia/Tokyo',
    headless: true,
    defaultTimeoutMs: 15000,
    shortTimeoutMs: 4000,
    screenshotDir: 'screenshots',
    pageDumpDir: 'pages',
    strictSuccessDetection: false,
    loginUrl: URLS.LOGIN,
    indexUrl: URLS.GAME_INDEX,
    labels: DEFAULT_LABELS,
    ...overrides,
  };
}
