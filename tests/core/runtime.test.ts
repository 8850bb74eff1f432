import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/core/config.js';
import { Logger } from '../../src/core/logger.js';
import { Runtime } from '../../src/core/runtime.js';
import { closeDatabases } from '../../src/memory/db.js';
import {
  ALICE,
  BOB,
  buyLog,
  conditionId,
  FakeLogSource,
  MemoryCursorStore,
  MemoryEventStore,
  tokenRegisteredLog,
} from '../helpers/logs.js';

const config = parseConfig({ indexer: { startBlock: 100, batchSize: 50 } });
const logger = new Logger('error');

const logs = [
  tokenRegisteredLog({ block: 100, logIndex: 0, token0: 201, token1: 202, conditionId: conditionId(2) }),
  buyLog({ block: 104, logIndex: 1, maker: ALICE, taker: BOB, tokenId: 201, priceMicros: 250_000, shares: 8_000_000 }),
];

afterEach(() => {
  closeDatabases();
});

describe('Runtime', () => {
  it('wires the indexer into the read api', async () => {
    const runtime = new Runtime(config, { logger, cursorStore: new MemoryCursorStore(), eventStore: new MemoryEventStore() });
    expect(runtime.readApi.getIndexerStatus().indexer).toBeNull();

    const indexer = runtime.attachIndexer(new FakeLogSource(110, logs));
    await indexer.runOnce();

    const status = runtime.readApi.getIndexerStatus();
    expect(status.indexer?.cursor).toEqual({ blockNumber: 110, logIndex: -1 });
    expect(status.indexer?.lag).toBe(0);
    expect(status.markets).toBe(1);
    expect(runtime.readApi.getTraderProfile({ address: ALICE }).totalVolume).toBe(2);
  });

  it('restores analytics from the stored events', async () => {
    const cursorStore = new MemoryCursorStore();
    const eventStore = new MemoryEventStore();
    const live = new Runtime(config, { logger, cursorStore, eventStore });
    await live.attachIndexer(new FakeLogSource(110, logs)).runOnce();

    const restarted = new Runtime(config, { logger, cursorStore, eventStore });
    expect(restarted.restore()).toEqual({ applied: 2, duplicates: 0, skipped: 0, conflicts: 0, batches: 2, markets: 1 });
    expect(restarted.readApi.getTraderProfile({ address: BOB })).toEqual(live.readApi.getTraderProfile({ address: BOB }));

    const source = new FakeLogSource(110, logs);
    expect(await restarted.attachIndexer(source).runOnce()).toEqual({ kind: 'caughtUp', head: 110 });
    expect(source.calls).toEqual([]);
  });

  it('defaults to SQLite stores under the configured path', async () => {
    const dbPath = join(mkdtempSync(join(tmpdir(), 'ctflow-runtime-')), 'ctflow.sqlite');
    const sqliteConfig = parseConfig({ indexer: { startBlock: 100, batchSize: 50 }, memory: { dbPath } });

    const live = new Runtime(sqliteConfig, { logger });
    await live.attachIndexer(new FakeLogSource(110, logs)).runOnce();
    closeDatabases();

    const restarted = new Runtime(sqliteConfig, { logger });
    expect(restarted.restore()).toMatchObject({ applied: 2, markets: 1 });
    expect(restarted.cursorStore.load()).toEqual({ blockNumber: 110, logIndex: -1 });
    expect(restarted.readApi.getTraderProfile({ address: ALICE }).tradeCount).toBe(1);
  });
});
