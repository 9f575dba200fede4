import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { z } from 'zod';

import { PersistenceError, errorMessage } from './errors';
import { BusinessRecordSchema, type BusinessRecord, type HarvestState } from './types';

export type CheckpointData = {
  updatedAt: string | null;
  records: BusinessRecord[];
};

export interface CheckpointStore {
  /** Records saved by a previous run, or an empty list. */
  load(): Promise<BusinessRecord[]>;
  /** Overwrite the checkpoint with `records`. */
  save(records: readonly BusinessRecord[]): Promise<void>;
}

const CheckpointRecordsSchema = z.array(BusinessRecordSchema);

const emptyCheckpoint = (): CheckpointData => ({ updatedAt: null, records: [] });

export function checkpointFromDb(db: Low<CheckpointData>, path?: string): CheckpointStore {
  return {
    async load() {
      try {
        await db.read();
      } catch (e) {
        throw new PersistenceError(`Could not read checkpoint: ${errorMessage(e)}`, { path, cause: e });
      }
      const parsed = CheckpointRecordsSchema.safeParse(db.data.records);
      if (!parsed.success) {
        throw new PersistenceError('Checkpoint contains malformed records', { path, cause: parsed.error });
      }
      return parsed.data;
    },

    async save(records) {
      db.data = { updatedAt: new Date().toISOString(), records: [...records] };
      try {
        await db.write();
      } catch (e) {
        throw new PersistenceError(`Could not write checkpoint: ${errorMessage(e)}`, { path, cause: e });
      }
    },
  };
}

export async function openCheckpoint(file: string): Promise<CheckpointStore> {
  try {
    // always on disk, whatever NODE_ENV says
    const db = new Low<CheckpointData>(new JSONFile<CheckpointData>(file), emptyCheckpoint());
    await db.read();
    return checkpointFromDb(db, file);
  } catch (e) {
    throw new PersistenceError(`Could not open checkpoint ${file}: ${errorMessage(e)}`, {
      path: file,
      cause: e,
    });
  }
}

export function createHarvestState(): HarvestState {
  return { records: [], processed: new Set() };
}

/** Resume from saved records: every saved record's source counts as processed. */
export function restoreState(records: readonly BusinessRecord[]): HarvestState {
  return {
    records: [...records],
    processed: new Set(records.map((r) => r.sourceUrl)),
  };
}
