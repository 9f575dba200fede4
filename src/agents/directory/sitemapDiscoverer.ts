import { DiscoveryError, errorMessage } from '../../errors';
import { parseSitemap, type SitemapEntries } from '../../tools/html';
import { isOk } from '../../tools/httpFetcher';
import type { ListingIdentifier, PageSource } from '../../types';
import { createLogger } from '../../ui';
import { canonicalizeUrl, isListingUrl, type ListingFilter } from '../../url';

import { addIdentifiers, newDiscoveryResult } from './result';
import type { DiscoveryContext, DiscoveryResult, ListingDiscoverer } from './types';

const MAX_CHILD_SITEMAPS = 25;

export type SitemapDiscovererOptions = {
  source: PageSource;
  signal?: AbortSignal;
  quiet?: boolean;
};

async function fetchSitemap(source: PageSource, url: string): Promise<SitemapEntries> {
  const page = await source.fetchPage(url);
  if (!isOk(page)) throw new Error(`HTTP ${page.status} fetching ${url}`);
  return parseSitemap(page.body, page.url || url);
}

function listingsIn(locs: string[], base: string, filter: ListingFilter): ListingIdentifier[] {
  return locs
    .map((loc) => canonicalizeUrl(loc, base))
    .filter((id): id is ListingIdentifier => id !== null && isListingUrl(id, filter));
}

/**
 * Static-index strategy: every listing named by the sitemap (or by the child
 * sitemaps of a sitemap index, one level deep). No iteration involved.
 */
export function createSitemapDiscoverer(options: SitemapDiscovererOptions): ListingDiscoverer {
  const log = createLogger('discover', options.quiet);

  const identity = { id: 'sitemap', name: 'Sitemap index' } as const;

  return {
    ...identity,

    supports(ctx) {
      return Boolean(ctx.sitemapUrl);
    },

    async discover(ctx: DiscoveryContext): Promise<DiscoveryResult> {
      const result = newDiscoveryResult(identity, ctx);
      const sitemapUrl = ctx.sitemapUrl;
      if (!sitemapUrl) {
        throw new DiscoveryError('Sitemap strategy needs a sitemap URL', { url: ctx.entryUrl });
      }

      log.info(`Fetching sitemap: ${sitemapUrl}`);
      let root: SitemapEntries;
      try {
        root = await fetchSitemap(options.source, sitemapUrl);
      } catch (e) {
        throw new DiscoveryError(`Sitemap unreachable: ${errorMessage(e)}`, {
          url: sitemapUrl,
          cause: e,
        });
      }
      result.stats.pagesVisited = 1;

      const filter: ListingFilter = { host: new URL(ctx.entryUrl).hostname, detailPath: ctx.detailPath };
      const seen = new Set<ListingIdentifier>();
      addIdentifiers(result, seen, listingsIn(root.urls, sitemapUrl, filter));

      for (const child of root.sitemaps.slice(0, MAX_CHILD_SITEMAPS)) {
        if (options.signal?.aborted) {
          log.warn('Interrupted while reading child sitemaps');
          break;
        }
        try {
          const entries = await fetchSitemap(options.source, child);
          result.stats.pagesVisited += 1;
          addIdentifiers(result, seen, listingsIn(entries.urls, child, filter));
        } catch (e) {
          const message = errorMessage(e);
          log.warn(`Skipping child sitemap ${child}: ${message}`);
          result.errors.push({ stage: 'index', message, url: child });
        }
      }

      log.info(`Found ${result.identifiers.length} listing URLs in sitemap`);
      return result;
    },
  };
}
