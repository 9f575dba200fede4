import { FetchError, ValidationError, errorMessage } from '../../errors';
import { isOk } from '../../tools/httpFetcher';
import {
  BusinessRecordSchema,
  type BusinessRecord,
  type FetchedPage,
  type ListingIdentifier,
  type PageSource,
} from '../../types';
import { createLogger } from '../../ui';

import { resolveFields, type RuleContext } from './fieldRules';
import { buildPageView, type PageView } from './pageView';

export interface ListingExtractor {
  /**
   * Fetch and extract one listing. Identifiers already in `processed` are
   * skipped without any I/O; every other identifier is added to it before
   * fetching, whatever the outcome.
   */
  extract(id: ListingIdentifier, processed: Set<ListingIdentifier>): Promise<BusinessRecord | null>;
}

export type ListingExtractorOptions = RuleContext & {
  source: PageSource;
  quiet?: boolean;
};

/** Turn a parsed page into a record; throws `ValidationError` when no usable name is found. */
export function extractRecord(
  page: PageView,
  sourceUrl: ListingIdentifier,
  ctx: RuleContext
): BusinessRecord {
  const { values } = resolveFields(page, ctx);
  const parsed = BusinessRecordSchema.safeParse({ ...values, sourceUrl });
  if (!parsed.success) {
    throw new ValidationError(`No usable business name on ${sourceUrl}`, {
      url: sourceUrl,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function createListingExtractor(options: ListingExtractorOptions): ListingExtractor {
  const log = createLogger('extract', options.quiet);
  const ctx: RuleContext = {
    categoryPath: options.categoryPath,
    selfDomains: options.selfDomains,
  };

  return {
    async extract(id, processed) {
      if (processed.has(id)) return null;
      processed.add(id);

      let fetched: FetchedPage;
      try {
        fetched = await options.source.fetchPage(id);
      } catch (e) {
        if (!(e instanceof FetchError)) throw e;
        log.warn(e.message);
        return null;
      }
      if (!isOk(fetched)) {
        log.warn(`HTTP ${fetched.status} fetching ${id}`);
        return null;
      }

      let page: PageView;
      try {
        page = buildPageView(fetched.body, fetched.url || id);
      } catch (e) {
        log.warn(`Could not parse ${id}: ${errorMessage(e)}`);
        return null;
      }

      try {
        return extractRecord(page, id, ctx);
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        log.warn(e.message);
        return null;
      }
    },
  };
}
