import 'dotenv/config';

import { openCheckpoint } from '../src/checkpoint';
import { loadConfig } from '../src/config';
import { errorMessage } from '../src/errors';
import { dedupeByName } from '../src/pipeline/aggregator';
import { printSummary, summarize } from '../src/ui';

async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  const checkpoint = await openCheckpoint(config.checkpoint.file);
  const records = dedupeByName(await checkpoint.load());
  if (!records.length) {
    console.log(`[summarize] No records in ${config.checkpoint.file}`);
    return;
  }
  printSummary(summarize(records));
}

main().catch((err: unknown) => {
  console.error(`[summarize] ${errorMessage(err)}`);
  process.exit(1);
});
