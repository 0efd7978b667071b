import { chromium, type Page } from 'playwright';
import { BROWSER_HEADERS } from '../engine/HttpSession.js';
import { errorMessage } from '../engine/errors.js';
import type { Logger } from '../monitoring/logger.js';

/** The part of a Playwright page the scripted backend drives. */
export type ScriptedPage = Pick<
  Page,
  | 'goto'
  | 'waitForLoadState'
  | 'locator'
  | 'url'
  | 'content'
  | 'evaluate'
  | 'waitForEvent'
  | 'context'
  | 'mainFrame'
>;

export interface BrowserSession {
  readonly page: ScriptedPage;
  close(): Promise<void>;
}

export interface BrowserSessionFactory {
  /** Rejects when no browser can be started. */
  open(): Promise<BrowserSession>;
}

export interface PlaywrightSessionOptions {
  headless: boolean;
  /** Default timeout for navigation and element actions */
  timeoutMs: number;
}

/**
 * One Chromium process and context per session. Closing the session closes
 * the browser, so nothing outlives the attempt.
 */
export class PlaywrightSessionFactory implements BrowserSessionFactory {
  constructor(private readonly opts: PlaywrightSessionOptions) {}

  async open(): Promise<BrowserSession> {
    const browser = await chromium.launch({ headless: this.opts.headless });
    try {
      const context = await browser.newContext({ userAgent: BROWSER_HEADERS['User-Agent'] });
      context.setDefaultTimeout(this.opts.timeoutMs);
      context.setDefaultNavigationTimeout(this.opts.timeoutMs);
      const page = await context.newPage();

      return {
        page,
        close: async () => {
          await context.close();
          await browser.close();
        },
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  }
}

/**
 * Run `fn` with an open session and close it on every exit path. A failing
 * close is logged; it never replaces the result or error of `fn`.
 */
export async function withBrowserSession<T>(
  session: BrowserSession,
  logger: Logger,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (err) {
      logger.warn('Browser session close failed', { error: errorMessage(err) });
    }
  }
}
