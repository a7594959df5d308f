import { chromium } from 'playwright';
import { logger } from '../logger.js';
import type { Config } from '../types.js';
import type { BrowserSession } from './types.js';

/**
 * Launches Chromium with a fresh context for one run
 */
export async function launchBrowserSession(config: Config): Promise<BrowserSession> {
  const browser = await chromium.launch({ headless: config.headless });

  try {
    const context = await browser.newContext({
      locale: 'ja-JP',
      timezoneId: 'Asia/Tokyo',
      viewport: { width: 1280, height: 900 },
    });

    // Set default timeouts
    context.setDefaultTimeout(config.defaultTimeoutMs);
    context.setDefaultNavigationTimeout(config.defaultTimeoutMs);

    const page = await context.newPage();

    return {
      context,
      page,
      async close() {
        try {
          await context.close();
          await browser.close();
          logger.debug('Browser closed');
        } catch (err) {
          logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Browser close failed');
        }
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
