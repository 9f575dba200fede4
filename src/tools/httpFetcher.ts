import fetch from 'node-fetch';

import { FetchError, errorMessage } from '../errors';
import type { FetchedPage, PageSource } from '../types';

export type HttpFetcherOptions = {
  userAgent: string;
  timeoutMs: number;
};

/**
 * Plain HTTP page source. Network failures and timeouts surface as
 * `FetchError`; HTTP error statuses are returned for the caller to judge.
 */
export function createHttpFetcher(options: HttpFetcherOptions): PageSource {
  return {
    async fetchPage(url: string): Promise<FetchedPage> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), options.timeoutMs);

      try {
        const res = await fetch(url, {
          method: 'GET',
          redirect: 'follow',
          signal: controller.signal,
          headers: {
            'user-agent': options.userAgent,
            accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            'accept-language': 'en-US,en;q=0.5',
          },
        });
        const body = await res.text();
        return { url: res.url || url, status: res.status, body };
      } catch (e) {
        const reason = controller.signal.aborted
          ? `timed out after ${options.timeoutMs}ms`
          : errorMessage(e);
        throw new FetchError(`Request failed for ${url}: ${reason}`, { url, cause: e });
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

export function isOk(page: FetchedPage): boolean {
  return page.status >= 200 && page.status < 300;
}
