import 'dotenv/config';

import {
  createLoadMoreDiscoverer,
  createPaginatedDiscoverer,
  createSitemapDiscoverer,
  runDiscovery,
} from '../src/agents/directory';
import { loadConfig } from '../src/config';
import { errorMessage } from '../src/errors';
import { createPlaywrightSession } from '../src/tools/browserSession';
import { createHttpFetcher } from '../src/tools/httpFetcher';

// Discovery only: the DiscoveryResult goes to stdout as JSON.
async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  const http = createHttpFetcher({ userAgent: config.http.userAgent, timeoutMs: config.http.timeoutMs });

  const result = await runDiscovery(
    { entryUrl: config.entryUrl, sitemapUrl: config.sitemapUrl, detailPath: config.detailPath },
    {
      strategy: config.strategy,
      quiet: true,
      discoverers: [
        createSitemapDiscoverer({ source: http, quiet: true }),
        createPaginatedDiscoverer({
          source: http,
          maxPages: config.discovery.maxPages,
          delayMs: config.http.delayMs,
          quiet: true,
        }),
        createLoadMoreDiscoverer({
          openSession: () =>
            createPlaywrightSession({
              headless: config.browser.headless,
              userAgent: config.http.userAgent,
              timeoutMs: config.http.timeoutMs,
            }),
          maxIterations: config.discovery.maxIterations,
          noChangeThreshold: config.discovery.noChangeThreshold,
          quiet: true,
        }),
      ],
    }
  );
  console.log(JSON.stringify(result, null, 2));
}

main().catch((err: unknown) => {
  console.error(`[discover] ${errorMessage(err)}`);
  process.exit(1);
});
