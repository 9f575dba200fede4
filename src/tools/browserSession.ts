import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';

import { FetchError, errorMessage } from '../errors';
import type { FetchedPage, PageSource } from '../types';

/**
 * A scriptable, rendered browsing context. It doubles as a `PageSource` so
 * extraction can run over rendered pages with no change to the extractor.
 */
export interface BrowserSession extends PageSource {
  navigate(url: string): Promise<void>;
  scrollToBottom(): Promise<void>;
  /** Click the first visible, enabled control matching one of `selectors`. */
  clickLoadMore(selectors: readonly string[]): Promise<boolean>;
  collectHrefs(): Promise<string[]>;
  close(): Promise<void>;
}

export type BrowserSessionFactory = () => Promise<BrowserSession>;

export const DEFAULT_LOAD_MORE_SELECTORS = [
  '#cff-load-more',
  'button.load-more',
  'a.load-more',
  '.load-more',
  'a:has-text("Load more")',
  'button:has-text("Load more")',
  'button:has-text("Show more")',
  'button:has-text("View more")',
] as const;

export type PlaywrightSessionOptions = {
  headless: boolean;
  userAgent: string;
  timeoutMs: number;
  /** Pause after scrolling or clicking so lazy content can render. */
  settleMs?: number;
};

async function openPage(
  browser: Browser,
  opts: PlaywrightSessionOptions
): Promise<{ context: BrowserContext; page: Page }> {
  const context = await browser.newContext({ locale: 'en-US', userAgent: opts.userAgent });
  const page = await context.newPage();

  await page.route('**/*', (route) => {
    const t = route.request().resourceType();
    if (['image', 'media', 'font'].includes(t)) return route.abort();
    return route.continue();
  });
  page.setDefaultNavigationTimeout(opts.timeoutMs);
  return { context, page };
}

/** Chromium session; the browser is closed again if context or page setup fails. */
export async function createPlaywrightSession(
  opts: PlaywrightSessionOptions
): Promise<BrowserSession> {
  const settleMs = opts.settleMs ?? 1500;
  const browser = await chromium.launch({ headless: opts.headless });
  const { context, page } = await openPage(browser, opts).catch(async (e: unknown) => {
    try {
      await browser.close();
    } catch (closeErr) {
      console.warn(`[browser] close after failed setup: ${errorMessage(closeErr)}`);
    }
    throw e;
  });

  const goto = async (url: string): Promise<number> => {
    try {
      const resp = await page.goto(url, { waitUntil: 'domcontentloaded' });
      return resp ? resp.status() : 200;
    } catch (e) {
      throw new FetchError(`Navigation failed for ${url}: ${errorMessage(e)}`, { url, cause: e });
    }
  };

  return {
    async navigate(url) {
      const status = await goto(url);
      if (status >= 400) {
        throw new FetchError(`HTTP ${status} navigating to ${url}`, { url, status });
      }
      await page.waitForTimeout(settleMs);
    },

    async scrollToBottom() {
      await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await page.waitForTimeout(settleMs);
    },

    async clickLoadMore(selectors) {
      for (const selector of selectors) {
        const control = page.locator(selector).first();
        try {
          if ((await control.count()) === 0) continue;
          if (!(await control.isVisible()) || !(await control.isEnabled())) continue;
          await control.scrollIntoViewIfNeeded();
          await control.click({ timeout: 5_000 });
        } catch (e) {
          console.warn(`[discover] load-more click failed for ${selector}: ${errorMessage(e)}`);
          continue;
        }
        await page.waitForTimeout(settleMs);
        return true;
      }
      return false;
    },

    async collectHrefs() {
      return page.$$eval('a[href]', (as) =>
        as.map((a) => (a instanceof HTMLAnchorElement ? a.href : '')).filter(Boolean)
      );
    },

    async fetchPage(url): Promise<FetchedPage> {
      try {
        const status = await goto(url);
        const body = await page.content();
        return { url: page.url(), status, body };
      } catch (e) {
        if (e instanceof FetchError) throw e;
        throw new FetchError(`Could not read ${url}: ${errorMessage(e)}`, { url, cause: e });
      }
    },

    async close() {
      try {
        await context.close();
      } finally {
        await browser.close();
      }
    },
  };
}
