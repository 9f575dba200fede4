import 'dotenv/config';

import {
  createLoadMoreDiscoverer,
  createPaginatedDiscoverer,
  createSitemapDiscoverer,
  runDiscovery,
} from '../src/agents/directory';
import { createListingExtractor } from '../src/agents/extractor/listingExtractor';
import { openCheckpoint, restoreState } from '../src/checkpoint';
import { loadConfig, type HarvestConfig } from '../src/config';
import { errorMessage, HarvestInterruptedError } from '../src/errors';
import { createAggregator } from '../src/pipeline/aggregator';
import { createOutputWriter } from '../src/pipeline/exporter';
import { createPlaywrightSession, type BrowserSession } from '../src/tools/browserSession';
import { createHttpFetcher } from '../src/tools/httpFetcher';
import type { PageSource } from '../src/types';
import { printSummary, summarize } from '../src/ui';

const openBrowser = (config: HarvestConfig) => () =>
  createPlaywrightSession({
    headless: config.browser.headless,
    userAgent: config.http.userAgent,
    timeoutMs: config.http.timeoutMs,
  });

async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  const http = createHttpFetcher({ userAgent: config.http.userAgent, timeoutMs: config.http.timeoutMs });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n[harvest] Interrupt received; stopping after the current step...');
    controller.abort();
  });

  const discovery = await runDiscovery(
    { entryUrl: config.entryUrl, sitemapUrl: config.sitemapUrl, detailPath: config.detailPath },
    {
      strategy: config.strategy,
      signal: controller.signal,
      discoverers: [
        createSitemapDiscoverer({ source: http, signal: controller.signal }),
        createPaginatedDiscoverer({
          source: http,
          maxPages: config.discovery.maxPages,
          delayMs: config.http.delayMs,
          signal: controller.signal,
        }),
        createLoadMoreDiscoverer({
          openSession: openBrowser(config),
          maxIterations: config.discovery.maxIterations,
          noChangeThreshold: config.discovery.noChangeThreshold,
          signal: controller.signal,
        }),
      ],
    }
  );
  console.log(
    `[harvest] ${discovery.strategy.name}: ${discovery.identifiers.length} listings (${discovery.errors.length} errors)`
  );

  const checkpoint = await openCheckpoint(config.checkpoint.file);
  const saved = await checkpoint.load();
  if (saved.length) console.log(`[harvest] Resuming with ${saved.length} records from ${config.checkpoint.file}`);

  let browser: BrowserSession | undefined;
  try {
    let source: PageSource = http;
    if (config.transport === 'browser') {
      browser = await openBrowser(config)();
      source = browser;
    }

    const aggregator = createAggregator(
      {
        extractor: createListingExtractor({
          source,
          categoryPath: config.categoryPath,
          selfDomains: config.selfDomains,
        }),
        writeOutputs: createOutputWriter(config.output),
        checkpoint,
        checkpointInterval: config.checkpoint.interval,
        delayMs: config.http.delayMs,
        signal: controller.signal,
      },
      restoreState(saved)
    );

    const records = await aggregator.run(discovery.identifiers);
    const files = await aggregator.flush();
    printSummary(summarize(records), files);
  } finally {
    await browser?.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof HarvestInterruptedError) {
    console.error(`[harvest] ${err.message}`);
  } else {
    console.error(`[harvest] Fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
