import type { IndexCursor, StoredEvent } from '../types/index.js';

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/** Durable position of the pipeline. `save` throws PersistenceError on failure. */
export interface CursorStore {
  load(): IndexCursor | null;
  save(cursor: IndexCursor): void;
}

/** Decoded events grouped by block, in (blockNumber, logIndex) order. */
export interface EventBatch {
  blockNumber: number;
  events: StoredEvent[];
}

/**
 * Append-only log of decoded events. Appending an event whose
 * (txHash, logIndex) is already stored is a no-op.
 */
export interface EventStore {
  appendBatch(events: StoredEvent[]): void;
  loadBatches(): EventBatch[];
}

export function toPersistenceError(error: unknown, action: string): PersistenceError {
  if (error instanceof PersistenceError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`${action} failed: ${reason}`, error);
}

export function groupByBlock(events: StoredEvent[]): EventBatch[] {
  const batches: EventBatch[] = [];
  for (const event of events) {
    const last = batches[batches.length - 1];
    if (last && last.blockNumber === event.blockNumber) {
      last.events.push(event);
    } else {
      batches.push({ blockNumber: event.blockNumber, events: [event] });
    }
  }
  return batches;
}
