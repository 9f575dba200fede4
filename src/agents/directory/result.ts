import type { ListingIdentifier } from '../../types';

import type { DiscoveryContext, DiscoveryResult, ListingDiscoverer } from './types';

export function newDiscoveryResult(
  discoverer: Pick<ListingDiscoverer, 'id' | 'name'>,
  ctx: DiscoveryContext
): DiscoveryResult {
  return {
    strategy: { id: discoverer.id, name: discoverer.name },
    generatedAt: new Date().toISOString(),
    input: ctx,
    identifiers: [],
    stats: {
      discovered: 0,
      duplicatesRemoved: 0,
      pagesVisited: 0,
      iterations: 0,
    },
    errors: [],
  };
}

/**
 * Appends unseen identifiers to `result.identifiers` and returns how many
 * were new. Re-seen identifiers count as removed duplicates unless the
 * caller rescans the same content on purpose.
 */
export function addIdentifiers(
  result: DiscoveryResult,
  seen: Set<ListingIdentifier>,
  ids: Iterable<ListingIdentifier>,
  countDuplicates = true
): number {
  let added = 0;
  for (const id of ids) {
    if (seen.has(id)) {
      if (countDuplicates) result.stats.duplicatesRemoved += 1;
      continue;
    }
    seen.add(id);
    result.identifiers.push(id);
    added += 1;
  }
  result.stats.discovered = result.identifiers.length;
  return added;
}
