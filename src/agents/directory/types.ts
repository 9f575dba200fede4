import type { ListingIdentifier } from '../../types';

export type StrategyId = 'sitemap' | 'paginated' | 'interactive';

export type DiscoveryContext = {
  entryUrl: string;
  sitemapUrl?: string;
  /** Path fragment every detail page contains, e.g. `/business/`. */
  detailPath: string;
};

export type DiscoveryResult = {
  strategy: { id: StrategyId; name: string };
  generatedAt: string;
  input: DiscoveryContext;
  identifiers: ListingIdentifier[];
  stats: {
    discovered: number;
    duplicatesRemoved: number;
    pagesVisited: number;
    iterations: number;
  };
  errors: Array<{
    stage: 'index' | 'page' | 'iteration';
    message: string;
    url?: string;
  }>;
};

export interface ListingDiscoverer {
  id: StrategyId;
  name: string;
  supports(ctx: DiscoveryContext): boolean;
  /** Throws `DiscoveryError` only when the entry point cannot be reached at all. */
  discover(ctx: DiscoveryContext): Promise<DiscoveryResult>;
}
