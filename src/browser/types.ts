/**
 * The slice of the browser engine the renewal bot relies on.
 *
 * Playwright's Page, Frame, Locator and BrowserContext satisfy these
 * interfaces structurally, so production code passes the real objects
 * while tests pass in-process fakes.
 */

export type InteractiveRole = 'button' | 'link' | 'radio';

export interface TimeoutOptions {
  timeout?: number;
}

export interface BrowserLocator {
  first(): BrowserLocator;
  nth(index: number): BrowserLocator;
  count(): Promise<number>;
  filter(options: { hasText?: string }): BrowserLocator;
  locator(selector: string): BrowserLocator;
  click(options?: TimeoutOptions): Promise<void>;
  fill(value: string, options?: TimeoutOptions): Promise<void>;
  check(options?: TimeoutOptions): Promise<void>;
  isVisible(): Promise<boolean>;
  isChecked(options?: TimeoutOptions): Promise<boolean>;
}

/**
 * A document that can be searched: the main page or one of its frames
 */
export interface SearchScope {
  getByRole(role: InteractiveRole, options?: { name?: string; exact?: boolean }): BrowserLocator;
  getByText(text: string, options?: { exact?: boolean }): BrowserLocator;
  getByLabel(text: string, options?: { exact?: boolean }): BrowserLocator;
  locator(selector: string): BrowserLocator;
  waitForTimeout(timeout: number): Promise<void>;
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface BrowserPage extends SearchScope {
  goto(url: string, options?: { waitUntil?: LoadState }): Promise<unknown>;
  waitForLoadState(state?: LoadState, options?: TimeoutOptions): Promise<void>;
  evaluate(script: string): Promise<unknown>;
  frames(): SearchScope[];
  mainFrame(): SearchScope;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
  keyboard: {
    press(key: string): Promise<void>;
  };
}

/**
 * Playwright cookie entry accepted by BrowserContext.addCookies
 */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface CookieStore {
  addCookies(cookies: SessionCookie[]): Promise<void>;
}

/**
 * One browsing session, owned by a single run
 */
export interface BrowserSession {
  context: CookieStore;
  page: BrowserPage;
  close(): Promise<void>;
}
