import { z } from 'zod';

import { groupByBlock, toPersistenceError, type EventBatch, type EventStore } from '../indexer/stores.js';
import type { StoredEvent } from '../types/index.js';
import { openDatabase } from './db.js';

const positionShape = {
  txHash: z.string(),
  logIndex: z.number().int(),
  blockNumber: z.number().int(),
};

const TradeSchema = z.object({
  ...positionShape,
  timestamp: z.number(),
  exchange: z.string(),
  orderHash: z.string(),
  maker: z.string(),
  taker: z.string(),
  tokenId: z.string(),
  conditionId: z.string(),
  outcomeIndex: z.number().int(),
  side: z.enum(['BUY', 'SELL']),
  priceMicros: z.number().int(),
  price: z.number(),
  size: z.number(),
  feeRaw: z.string(),
});

const MarketSchema = z.object({
  conditionId: z.string(),
  slug: z.string(),
  outcomeTokenIds: z.array(z.string()),
  resolution: z.discriminatedUnion('status', [
    z.object({ status: z.literal('open') }),
    z.object({ status: z.literal('resolved'), outcomeIndex: z.number().int(), resolvedBlock: z.number().int() }),
  ]),
  createdBlock: z.number().int(),
});

const StoredEventSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('TradeFilled'), ...positionShape, trade: TradeSchema }),
  z.object({
    kind: z.literal('MarketCreated'),
    ...positionShape,
    market: MarketSchema,
    source: z.enum(['TokenRegistered', 'ConditionPreparation']),
  }),
  z.object({
    kind: z.literal('MarketResolved'),
    ...positionShape,
    conditionId: z.string(),
    outcomeIndex: z.number().int(),
    payouts: z.array(z.string()),
  }),
]);

function ensureEventsTable(dbPath?: string): void {
  const db = openDatabase(dbPath);
  db.exec(`
    CREATE TABLE IF NOT EXISTS chain_events (
      tx_hash TEXT NOT NULL,
      log_index INTEGER NOT NULL,
      block_number INTEGER NOT NULL,
      kind TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now')),
      PRIMARY KEY (tx_hash, log_index)
    );
    CREATE INDEX IF NOT EXISTS idx_chain_events_position ON chain_events(block_number, log_index);
  `);
}

export function parseStoredEvent(payload: string): StoredEvent {
  return StoredEventSchema.parse(JSON.parse(payload));
}

/** Decoded events in SQLite; one transaction per appended batch. */
export class SqliteEventStore implements EventStore {
  constructor(private dbPath?: string) {}

  appendBatch(events: StoredEvent[]): void {
    if (events.length === 0) return;
    try {
      ensureEventsTable(this.dbPath);
      const db = openDatabase(this.dbPath);
      const insert = db.prepare(
        `
          INSERT OR IGNORE INTO chain_events (tx_hash, log_index, block_number, kind, payload)
          VALUES (@txHash, @logIndex, @blockNumber, @kind, @payload)
        `
      );
      const insertAll = db.transaction((batch: StoredEvent[]) => {
        for (const event of batch) {
          insert.run({
            txHash: event.txHash,
            logIndex: event.logIndex,
            blockNumber: event.blockNumber,
            kind: event.kind,
            payload: JSON.stringify(event),
          });
        }
      });
      insertAll(events);
    } catch (error) {
      throw toPersistenceError(error, 'event append');
    }
  }

  loadBatches(): EventBatch[] {
    try {
      ensureEventsTable(this.dbPath);
      const db = openDatabase(this.dbPath);
      const rows = db
        .prepare(
          `
            SELECT payload
            FROM chain_events
            ORDER BY block_number ASC, log_index ASC
          `
        )
        .all() as Array<Record<string, unknown>>;
      return groupByBlock(rows.map((row) => parseStoredEvent(String(row.payload ?? ''))));
    } catch (error) {
      throw toPersistenceError(error, 'event load');
    }
  }

  count(): number {
    ensureEventsTable(this.dbPath);
    const db = openDatabase(this.dbPath);
    const row = db.prepare('SELECT COUNT(*) AS total FROM chain_events').get() as Record<string, unknown> | undefined;
    return Number(row?.total ?? 0);
  }
}
