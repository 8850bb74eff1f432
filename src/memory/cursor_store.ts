import type { CursorStore } from '../indexer/stores.js';
import { toPersistenceError } from '../indexer/stores.js';
import type { IndexCursor } from '../types/index.js';
import { openDatabase } from './db.js';

function ensureCursorTable(dbPath?: string): void {
  const db = openDatabase(dbPath);
  db.exec(`
    CREATE TABLE IF NOT EXISTS index_cursor (
      source TEXT PRIMARY KEY,
      block_number INTEGER NOT NULL,
      log_index INTEGER NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );
  `);
}

function rowToCursor(row: Record<string, unknown> | undefined): IndexCursor | null {
  if (!row) return null;
  const blockNumber = Number(row.block_number);
  const logIndex = Number(row.log_index);
  if (!Number.isInteger(blockNumber) || !Number.isInteger(logIndex)) return null;
  return { blockNumber, logIndex };
}

/** Cursor persisted per pipeline source name. */
export class SqliteCursorStore implements CursorStore {
  constructor(
    private source: string,
    private dbPath?: string
  ) {}

  load(): IndexCursor | null {
    try {
      ensureCursorTable(this.dbPath);
      const db = openDatabase(this.dbPath);
      const row = db
        .prepare(
          `
            SELECT block_number, log_index
            FROM index_cursor
            WHERE source = ?
          `
        )
        .get(this.source) as Record<string, unknown> | undefined;
      return rowToCursor(row);
    } catch (error) {
      throw toPersistenceError(error, 'cursor load');
    }
  }

  save(cursor: IndexCursor): void {
    try {
      ensureCursorTable(this.dbPath);
      const db = openDatabase(this.dbPath);
      db.prepare(
        `
          INSERT INTO index_cursor (source, block_number, log_index, updated_at)
          VALUES (@source, @blockNumber, @logIndex, datetime('now'))
          ON CONFLICT(source) DO UPDATE SET
            block_number = excluded.block_number,
            log_index = excluded.log_index,
            updated_at = datetime('now')
        `
      ).run({ source: this.source, blockNumber: cursor.blockNumber, logIndex: cursor.logIndex });
    } catch (error) {
      throw toPersistenceError(error, 'cursor save');
    }
  }
}
