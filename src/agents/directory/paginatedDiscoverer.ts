import { DiscoveryError, errorMessage } from '../../errors';
import { extractHrefs } from '../../tools/html';
import { isOk } from '../../tools/httpFetcher';
import type { FetchedPage, ListingIdentifier, PageSource, Sleep } from '../../types';
import { createLogger } from '../../ui';
import { canonicalizeUrl, collectListingLinks, type ListingFilter } from '../../url';

import { addIdentifiers, newDiscoveryResult } from './result';
import type { DiscoveryContext, DiscoveryResult, ListingDiscoverer } from './types';

export type PaginatedDiscovererOptions = {
  source: PageSource;
  /** Ceiling on pages visited, page 1 included. */
  maxPages: number;
  delayMs?: number;
  sleep?: Sleep;
  /** Once aborted, no further page is fetched. */
  signal?: AbortSignal;
  quiet?: boolean;
};

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Page 1 is the entry itself; page n is `<entry>/page/<n>/`. */
export function pageUrl(entryUrl: string, n: number): string {
  if (n <= 1) return entryUrl;
  const base = canonicalizeUrl(entryUrl) ?? entryUrl;
  return `${base.replace(/\/+$/, '')}/page/${n}/`;
}

export function createPaginatedDiscoverer(options: PaginatedDiscovererOptions): ListingDiscoverer {
  const log = createLogger('discover', options.quiet);
  const sleep = options.sleep ?? defaultSleep;
  const delayMs = options.delayMs ?? 0;

  const identity = { id: 'paginated', name: 'Paginated listing index' } as const;

  return {
    ...identity,

    supports() {
      return true;
    },

    async discover(ctx: DiscoveryContext): Promise<DiscoveryResult> {
      const result = newDiscoveryResult(identity, ctx);
      const filter: ListingFilter = { host: new URL(ctx.entryUrl).hostname, detailPath: ctx.detailPath };
      const seen = new Set<ListingIdentifier>();

      for (let n = 1; n <= options.maxPages; n += 1) {
        const url = pageUrl(ctx.entryUrl, n);
        if (n > 1 && delayMs > 0) await sleep(delayMs);
        if (options.signal?.aborted) {
          log.warn(`Interrupted before page ${n}`);
          break;
        }

        let page: FetchedPage;
        try {
          page = await options.source.fetchPage(url);
        } catch (e) {
          if (n === 1) {
            throw new DiscoveryError(`Entry page unreachable: ${errorMessage(e)}`, { url, cause: e });
          }
          log.warn(`Page ${n} failed: ${errorMessage(e)}`);
          result.errors.push({ stage: 'page', message: errorMessage(e), url });
          result.stats.iterations = n;
          continue;
        }
        result.stats.iterations = n;

        if (!isOk(page)) {
          if (n === 1) {
            throw new DiscoveryError(`Entry page returned HTTP ${page.status}`, { url });
          }
          if (page.status === 404) {
            log.info(`Page ${n} not found; pagination ends`);
            break;
          }
          result.errors.push({ stage: 'page', message: `HTTP ${page.status}`, url });
          continue;
        }
        result.stats.pagesVisited += 1;

        const links = collectListingLinks(extractHrefs(page.body, page.url || url), url, filter);
        const added = addIdentifiers(result, seen, links);
        log.info(`Page ${n}: ${links.length} listing links, ${added} new`);
        if (added === 0) break;
      }

      log.info(`Found ${result.identifiers.length} listing URLs over ${result.stats.pagesVisited} pages`);
      return result;
    },
  };
}
