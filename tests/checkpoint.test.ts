import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { Low, Memory } from 'lowdb';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { checkpointFromDb, openCheckpoint, restoreState, type CheckpointData } from '../src/checkpoint';
import { PersistenceError } from '../src/errors';

import { record } from './fakes';

describe('checkpoint store', () => {
  it('round-trips records through the database', async () => {
    const db = new Low<CheckpointData>(new Memory<CheckpointData>(), { updatedAt: null, records: [] });
    const store = checkpointFromDb(db);

    expect(await store.load()).toEqual([]);
    await store.save([record("Joe's Cafe", 'joes-cafe')]);

    expect(typeof db.data.updatedAt).toBe('string');
    expect(await store.load()).toEqual([record("Joe's Cafe", 'joes-cafe')]);
  });

  describe('on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'harvest-checkpoint-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('survives reopening', async () => {
      const file = path.join(dir, 'checkpoint.json');
      await (await openCheckpoint(file)).save([record('Maple Hardware', 'maple')]);

      const reopened = await openCheckpoint(file);
      expect(await reopened.load()).toEqual([record('Maple Hardware', 'maple')]);
    });

    it('writes the checkpoint file itself', async () => {
      const file = path.join(dir, 'checkpoint.json');
      await (await openCheckpoint(file)).save([record('Maple Hardware', 'maple')]);

      const saved: unknown = JSON.parse(await readFile(file, 'utf8'));
      expect(saved).toMatchObject({ records: [record('Maple Hardware', 'maple')] });
    });

    it('rejects malformed records', async () => {
      const file = path.join(dir, 'checkpoint.json');
      await writeFile(file, JSON.stringify({ updatedAt: null, records: [{ name: '' }] }));

      const store = await openCheckpoint(file);
      await expect(store.load()).rejects.toBeInstanceOf(PersistenceError);
    });
  });
});

describe('restoreState', () => {
  it('marks every saved source as processed', () => {
    const state = restoreState([record('Joe\'s Cafe', 'joes-cafe'), record('Maple Hardware', 'maple')]);
    expect(state.records).toHaveLength(2);
    expect(Array.from(state.processed)).toEqual([
      'https://dir.test/business/joes-cafe/',
      'https://dir.test/business/maple/',
    ]);
  });
});
