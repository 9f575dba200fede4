import type { ListingExtractor } from '../agents/extractor/listingExtractor';
import { createHarvestState, type CheckpointStore } from '../checkpoint';
import { HarvestInterruptedError, PersistenceError, errorMessage } from '../errors';
import type { BusinessRecord, HarvestState, ListingIdentifier, Sleep } from '../types';
import { createLogger, formatOutcome } from '../ui';

import type { OutputWriter } from './exporter';

export type AggregatorOptions = {
  extractor: ListingExtractor;
  writeOutputs: OutputWriter;
  checkpoint?: CheckpointStore;
  /** Save a checkpoint after this many successful extractions. */
  checkpointInterval: number;
  delayMs?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  quiet?: boolean;
};

export interface Aggregator {
  readonly state: HarvestState;
  /** Extract every unprocessed identifier; resolves to the deduplicated collection. */
  run(identifiers: Iterable<ListingIdentifier>): Promise<BusinessRecord[]>;
  /** Write all output views of the current collection. */
  flush(opts?: { partial?: boolean }): Promise<string[]>;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Keep the first record for each trimmed name. */
export function dedupeByName(records: readonly BusinessRecord[]): BusinessRecord[] {
  const seen = new Set<string>();
  const out: BusinessRecord[] = [];
  for (const r of records) {
    const key = r.name.trim();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}

export function createAggregator(
  options: AggregatorOptions,
  state: HarvestState = createHarvestState()
): Aggregator {
  const log = createLogger('harvest', options.quiet);
  const outputLog = createLogger('output', options.quiet);
  const sleep = options.sleep ?? defaultSleep;
  const delayMs = options.delayMs ?? 0;
  const interval = Math.max(1, options.checkpointInterval);

  const saveCheckpoint = async (): Promise<void> => {
    if (!options.checkpoint) return;
    try {
      const records = dedupeByName(state.records);
      await options.checkpoint.save(records);
      log.info(`Checkpoint saved (${records.length} records)`);
    } catch (e) {
      if (!(e instanceof PersistenceError)) throw e;
      log.error(e.message);
    }
  };

  const flush: Aggregator['flush'] = async (opts = {}) => {
    const records = dedupeByName(state.records);
    try {
      const files = await options.writeOutputs(records, opts);
      outputLog.info(`Wrote ${records.length} records to ${files.length} files${opts.partial ? ' (partial)' : ''}`);
      return files;
    } catch (e) {
      if (!(e instanceof PersistenceError)) throw e;
      outputLog.error(e.message);
      return [];
    }
  };

  const run: Aggregator['run'] = async (identifiers) => {
    const unique = Array.from(new Set(identifiers)).sort();
    const queue = unique.filter((id) => !state.processed.has(id));
    const skipped = unique.length - queue.length;
    log.info(`Extracting ${queue.length} listings${skipped ? ` (${skipped} already processed)` : ''}`);

    let successes = 0;
    try {
      const checkAborted = (done: number) => {
        if (options.signal?.aborted) {
          throw new HarvestInterruptedError(`Interrupted after ${done} of ${queue.length} listings`);
        }
      };
      for (const [i, id] of queue.entries()) {
        checkAborted(i);
        if (i > 0 && delayMs > 0) {
          await sleep(delayMs);
          checkAborted(i);
        }

        const record = await options.extractor.extract(id, state.processed);
        const progress = `[${i + 1}/${queue.length}]`;
        if (!record) {
          log.info(`${progress} no record for ${id}`);
          continue;
        }
        state.records.push(record);
        successes += 1;
        log.info(`${progress} ${formatOutcome(record)}`);

        if (successes % interval === 0) await saveCheckpoint();
      }
      checkAborted(queue.length);
    } catch (e) {
      log.error(`Harvest stopped: ${errorMessage(e)}`);
      await saveCheckpoint();
      await flush({ partial: true });
      throw e;
    }

    await saveCheckpoint();
    const records = dedupeByName(state.records);
    log.info(`Harvested ${records.length} unique businesses (${state.records.length - records.length} duplicates removed)`);
    return records;
  };

  return { state, run, flush };
}
