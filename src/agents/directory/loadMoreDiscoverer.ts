import { DiscoveryError, errorMessage } from '../../errors';
import { DEFAULT_LOAD_MORE_SELECTORS, type BrowserSession, type BrowserSessionFactory } from '../../tools/browserSession';
import type { ListingIdentifier } from '../../types';
import { createLogger } from '../../ui';
import { collectListingLinks, type ListingFilter } from '../../url';

import { addIdentifiers, newDiscoveryResult } from './result';
import type { DiscoveryContext, DiscoveryResult, ListingDiscoverer } from './types';

export type LoadMoreDiscovererOptions = {
  openSession: BrowserSessionFactory;
  /** Hard bound on scroll/click iterations. */
  maxIterations: number;
  /** Consecutive iterations without a new identifier before stopping. */
  noChangeThreshold: number;
  selectors?: readonly string[];
  signal?: AbortSignal;
  quiet?: boolean;
};

/**
 * Rendered-page strategy for directories that reveal listings on scroll or
 * behind a "load more" control. Runs until the set of discovered listings
 * stops growing.
 */
export function createLoadMoreDiscoverer(options: LoadMoreDiscovererOptions): ListingDiscoverer {
  const log = createLogger('discover', options.quiet);
  const selectors = options.selectors ?? DEFAULT_LOAD_MORE_SELECTORS;
  const identity = { id: 'interactive', name: 'Interactive load-more' } as const;

  return {
    ...identity,

    supports() {
      return true;
    },

    async discover(ctx: DiscoveryContext): Promise<DiscoveryResult> {
      const result = newDiscoveryResult(identity, ctx);
      const filter: ListingFilter = { host: new URL(ctx.entryUrl).hostname, detailPath: ctx.detailPath };
      const seen = new Set<ListingIdentifier>();

      let session: BrowserSession;
      try {
        session = await options.openSession();
      } catch (e) {
        throw new DiscoveryError(`Could not open a browser session: ${errorMessage(e)}`, {
          url: ctx.entryUrl,
          cause: e,
        });
      }

      try {
        try {
          await session.navigate(ctx.entryUrl);
        } catch (e) {
          throw new DiscoveryError(`Entry page unreachable: ${errorMessage(e)}`, {
            url: ctx.entryUrl,
            cause: e,
          });
        }
        result.stats.pagesVisited = 1;
        addIdentifiers(result, seen, collectListingLinks(await session.collectHrefs(), ctx.entryUrl, filter), false);
        log.info(`Initial load: ${result.identifiers.length} listing links`);

        let noChange = 0;
        while (result.stats.iterations < options.maxIterations && noChange < options.noChangeThreshold) {
          if (options.signal?.aborted) {
            log.warn(`Interrupted after ${result.stats.iterations} iterations`);
            break;
          }
          result.stats.iterations += 1;
          const iteration = result.stats.iterations;
          try {
            await session.scrollToBottom();
            const clicked = await session.clickLoadMore(selectors);
            const hrefs = await session.collectHrefs();
            const added = addIdentifiers(result, seen, collectListingLinks(hrefs, ctx.entryUrl, filter), false);
            if (added > 0) {
              noChange = 0;
              log.info(`Iteration ${iteration}: +${added} (total ${result.identifiers.length})`);
            } else {
              noChange += 1;
              log.info(
                `Iteration ${iteration}: no new listings${clicked ? '' : ', no load-more control'} (${noChange}/${options.noChangeThreshold})`
              );
            }
          } catch (e) {
            noChange += 1;
            const message = errorMessage(e);
            log.warn(`Iteration ${iteration} failed: ${message}`);
            result.errors.push({ stage: 'iteration', message, url: ctx.entryUrl });
          }
        }
      } finally {
        try {
          await session.close();
        } catch (e) {
          log.warn(`Closing browser session failed: ${errorMessage(e)}`);
        }
      }

      log.info(`Found ${result.identifiers.length} listing URLs after ${result.stats.iterations} iterations`);
      return result;
    },
  };
}
