import type { StrategyName } from '../../config';
import { DiscoveryError, HarvestInterruptedError, errorMessage } from '../../errors';
import { createLogger } from '../../ui';

import type { DiscoveryContext, DiscoveryResult, ListingDiscoverer } from './types';

export { createLoadMoreDiscoverer } from './loadMoreDiscoverer';
export { createPaginatedDiscoverer, pageUrl } from './paginatedDiscoverer';
export { createSitemapDiscoverer } from './sitemapDiscoverer';
export type { DiscoveryContext, DiscoveryResult, ListingDiscoverer, StrategyId } from './types';

export type DiscoveryOptions = {
  strategy: StrategyName;
  /** Tried in order under `auto`. */
  discoverers: ListingDiscoverer[];
  /** Checked between strategies; an abort rejects with `HarvestInterruptedError`. */
  signal?: AbortSignal;
  quiet?: boolean;
};

/**
 * Run the configured strategy. Under `auto`, each supporting discoverer is
 * tried in order and the first non-empty result wins.
 */
export async function runDiscovery(
  ctx: DiscoveryContext,
  opts: DiscoveryOptions
): Promise<DiscoveryResult> {
  const log = createLogger('discover', opts.quiet);
  const checkAborted = () => {
    if (opts.signal?.aborted) throw new HarvestInterruptedError('Interrupted during discovery');
  };
  const runOne = async (discoverer: ListingDiscoverer): Promise<DiscoveryResult> => {
    checkAborted();
    const result = await discoverer.discover(ctx);
    checkAborted();
    return result;
  };

  if (opts.strategy !== 'auto') {
    const discoverer = opts.discoverers.find((d) => d.id === opts.strategy);
    if (!discoverer) throw new DiscoveryError(`No discoverer registered for strategy=${opts.strategy}`);
    if (!discoverer.supports(ctx)) {
      throw new DiscoveryError(`Strategy ${opts.strategy} cannot run for ${ctx.entryUrl}`, {
        url: ctx.entryUrl,
      });
    }
    return runOne(discoverer);
  }

  let lastResult: DiscoveryResult | undefined;
  let lastError: unknown;
  for (const discoverer of opts.discoverers.filter((d) => d.supports(ctx))) {
    log.info(`Trying ${discoverer.name}`);
    try {
      const result = await runOne(discoverer);
      if (result.identifiers.length) return result;
      log.warn(`${discoverer.name} found no listings`);
      lastResult = result;
    } catch (e) {
      if (!(e instanceof DiscoveryError)) throw e;
      log.warn(`${discoverer.name} failed: ${errorMessage(e)}`);
      lastError = e;
    }
  }

  if (lastResult) return lastResult;
  if (lastError) throw lastError;
  throw new DiscoveryError(`No discovery strategy supports ${ctx.entryUrl}`, { url: ctx.entryUrl });
}
