import { EventEmitter } from 'eventemitter3';

import type { AnalyticsEngine } from '../analytics/engine.js';
import { compareLogs, FetchError, withTimeout, type ChainLogSource } from '../chain/log_source.js';
import type { CtflowConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { DomainEvent, IndexCursor, RawLog, StoredEvent } from '../types/index.js';
import { decodeLog, type DecodeErrorKind, type DecodeOptions, type DecodeResult } from './decoder.js';
import { PersistenceError, toPersistenceError, type CursorStore, type EventStore } from './stores.js';
import type { TokenRegistry } from './token_registry.js';

export type IndexerState = 'idle' | 'fetching' | 'applying' | 'backoff' | 'stopped';

export interface BatchSummary {
  fromBlock: number;
  toBlock: number;
  logs: number;
  trades: number;
  marketsCreated: number;
  resolutions: number;
  unrecognized: number;
  decodeErrors: number;
  cursor: IndexCursor;
}

export interface BackoffInfo {
  attempt: number;
  delayMs: number;
  error: Error;
}

export type CycleOutcome =
  | { kind: 'applied'; batch: BatchSummary; behind: boolean }
  | { kind: 'caughtUp'; head: number }
  | ({ kind: 'backoff' } & BackoffInfo)
  | { kind: 'persistFailed'; error: PersistenceError }
  | { kind: 'fatal'; error: FetchError };

interface FetchedRange {
  kind: 'range';
  fromBlock: number;
  toBlock: number;
  head: number;
  logs: RawLog[];
}

export interface IndexerEvents {
  state: (state: IndexerState) => void;
  batch: (summary: BatchSummary) => void;
  caughtUp: (head: number) => void;
  backoff: (info: BackoffInfo) => void;
  persistFailed: (error: PersistenceError) => void;
  fatal: (error: FetchError) => void;
}

export interface IndexerCounters {
  batches: number;
  logs: number;
  trades: number;
  marketsCreated: number;
  registryConflicts: number;
  /** Prepared conditions moved onto the token ids the exchange registered. */
  marketsRelinked: number;
  resolutions: number;
  unrecognized: number;
  decodeErrors: Record<DecodeErrorKind, number>;
  fetchFailures: number;
  persistFailures: number;
  consecutiveFailures: number;
}

export interface IndexerStatus {
  state: IndexerState;
  cursor: IndexCursor | null;
  head: number | null;
  lag: number | null;
  counters: IndexerCounters;
}

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function emptyCounters(): IndexerCounters {
  return {
    batches: 0,
    logs: 0,
    trades: 0,
    marketsCreated: 0,
    registryConflicts: 0,
    marketsRelinked: 0,
    resolutions: 0,
    unrecognized: 0,
    decodeErrors: { InvalidPrice: 0, UnknownToken: 0, MalformedLog: 0 },
    fetchFailures: 0,
    persistFailures: 0,
    consecutiveFailures: 0,
  };
}

/**
 * Sequential driver: fetch a block range, decode, apply to the registry and
 * analytics engine, persist, then advance the cursor. The only writer of the
 * cursor, the registry and the engine while running.
 */
export class Indexer extends EventEmitter<IndexerEvents> {
  private logger: Logger;
  private decodeOptions: DecodeOptions;
  private state: IndexerState = 'idle';
  private cursor: IndexCursor | null = null;
  private cursorLoaded = false;
  private head: number | null = null;
  private counters = emptyCounters();
  private idlePolls = 0;
  private running = false;
  private halted = false;
  private fatalError: FetchError | null = null;
  private timer: NodeJS.Timeout | null = null;
  private stopWaiters: Array<() => void> = [];

  constructor(
    private params: {
      config: CtflowConfig;
      source: ChainLogSource;
      registry: TokenRegistry;
      engine: AnalyticsEngine;
      cursorStore: CursorStore;
      eventStore?: EventStore;
      logger?: Logger;
    }
  ) {
    super();
    this.logger = params.logger ?? new Logger('info');
    this.decodeOptions = { collateralToken: params.config.chain.collateralToken };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.running || this.fatalError) return;
    this.running = true;
    this.halted = false;
    this.scheduleNext(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.setState('stopped');
    this.halted = true;
    this.releaseWaiters();
  }

  /** Resolves once the loop has been stopped or has hit a fatal error. */
  whenStopped(): Promise<void> {
    if (this.halted) return Promise.resolve();
    return new Promise((resolve) => this.stopWaiters.push(resolve));
  }

  getStatus(): IndexerStatus {
    const cursor = this.cursor ? { ...this.cursor } : null;
    const lag = this.head !== null && cursor ? Math.max(0, this.head - cursor.blockNumber) : null;
    return {
      state: this.state,
      cursor,
      head: this.head,
      lag,
      counters: { ...this.counters, decodeErrors: { ...this.counters.decodeErrors } },
    };
  }

  // ==========================================================================
  // One cycle
  // ==========================================================================

  async runOnce(): Promise<CycleOutcome> {
    if (this.fatalError) {
      return { kind: 'fatal', error: this.fatalError };
    }
    if (!this.cursorLoaded) {
      try {
        this.cursor = this.params.cursorStore.load();
        this.cursorLoaded = true;
      } catch (error) {
        return this.persistFailed(toPersistenceError(error, 'cursor load'));
      }
    }

    this.setState('fetching');
    const fetched = await this.fetchNextRange();
    if (fetched.kind !== 'range') {
      return fetched;
    }
    const { fromBlock, toBlock, head, logs } = fetched;

    this.counters.consecutiveFailures = 0;
    this.idlePolls = 0;
    this.setState('applying');

    let batch: BatchSummary;
    try {
      batch = this.applyBatch(fromBlock, toBlock, logs);
    } catch (error) {
      if (error instanceof PersistenceError) {
        return this.persistFailed(error);
      }
      this.setState('idle');
      throw error;
    }

    this.setState('idle');
    this.emit('batch', batch);
    this.logger.debug(
      `Indexed blocks ${fromBlock}-${toBlock}: ${batch.logs} log(s), ${batch.trades} trade(s), ${batch.decodeErrors} decode error(s)`
    );
    return { kind: 'applied', batch, behind: toBlock < head };
  }

  private async fetchNextRange(): Promise<FetchedRange | CycleOutcome> {
    const indexer = this.params.config.indexer;
    const timeoutMs = this.params.config.chain.requestTimeoutMs;
    try {
      const head = await withTimeout(this.params.source.headBlock(), timeoutMs, 'headBlock');
      this.head = head;

      const fromBlock = this.cursor
        ? this.cursor.blockNumber + 1
        : indexer.startBlock ?? Math.max(0, head - indexer.initialLookbackBlocks);
      if (fromBlock > head) {
        return this.caughtUp(head);
      }
      const toBlock = Math.min(fromBlock + indexer.batchSize - 1, head);
      const logs = await withTimeout(this.params.source.fetchLogs(fromBlock, toBlock), timeoutMs, 'fetchLogs');
      return { kind: 'range', fromBlock, toBlock, head, logs };
    } catch (error) {
      return this.fetchFailed(error);
    }
  }

  // ==========================================================================
  // Apply
  // ==========================================================================

  private applyBatch(fromBlock: number, toBlock: number, logs: RawLog[]): BatchSummary {
    const { registry, engine } = this.params;
    const ordered = [...logs].sort(compareLogs);
    const previous = this.cursor;
    const pending = ordered.filter(
      (log) =>
        !previous ||
        log.blockNumber > previous.blockNumber ||
        (log.blockNumber === previous.blockNumber && log.logIndex > previous.logIndex)
    );

    const results: DecodeResult[] = pending.map((log) => decodeLog(log, registry, this.decodeOptions));

    let marketsCreated = 0;
    for (const result of results) {
      if (!result.ok || result.event.kind !== 'MarketCreated') continue;
      const { market, source } = result.event;
      const outcome = registry.register(market, source);
      if (outcome === 'conflict') {
        this.counters.registryConflicts += 1;
        this.logger.warn(`Market ${market.conditionId} reuses a registered token id; ignoring`);
      } else if (outcome === 'relinked') {
        this.counters.marketsRelinked += 1;
        this.logger.info(`Market ${market.conditionId} relinked to registered token ids`);
      } else if (outcome === 'registered') {
        marketsCreated += 1;
      }
      // The engine sees every MarketCreated, as it does on replay.
      engine.applyMarketCreated(market);
    }

    // Fills may reference markets registered later in the same batch.
    for (let i = 0; i < results.length; i += 1) {
      const result = results[i];
      if (!result.ok && result.error.kind === 'UnknownToken') {
        results[i] = decodeLog(pending[i], registry, this.decodeOptions);
      }
    }

    const events: DomainEvent[] = [];
    let decodeErrors = 0;
    for (let i = 0; i < results.length; i += 1) {
      const result = results[i];
      if (result.ok) {
        events.push(result.event);
        continue;
      }
      decodeErrors += 1;
      this.counters.decodeErrors[result.error.kind] += 1;
      const log = pending[i];
      this.logger.debug(`Skipping log ${log.transactionHash}:${log.logIndex}: ${result.error.message}`);
    }

    let resolutions = 0;
    for (const event of events) {
      if (event.kind !== 'MarketResolved') continue;
      engine.applyMarketResolved({
        conditionId: event.conditionId,
        outcomeIndex: event.outcomeIndex,
        blockNumber: event.blockNumber,
      });
      resolutions += 1;
    }

    let trades = 0;
    for (const event of events) {
      if (event.kind !== 'TradeFilled') continue;
      if (engine.applyTrade(event.trade) === 'applied') trades += 1;
    }

    const stored = events.filter((event): event is StoredEvent => event.kind !== 'Unrecognized');
    const unrecognized = events.length - stored.length;
    const next = this.nextCursor(toBlock, ordered);

    try {
      this.params.eventStore?.appendBatch(stored);
    } catch (error) {
      throw toPersistenceError(error, 'event append');
    }
    try {
      this.params.cursorStore.save(next);
    } catch (error) {
      throw toPersistenceError(error, 'cursor save');
    }
    this.cursor = next;

    this.counters.batches += 1;
    this.counters.logs += pending.length;
    this.counters.trades += trades;
    this.counters.marketsCreated += marketsCreated;
    this.counters.resolutions += resolutions;
    this.counters.unrecognized += unrecognized;

    return {
      fromBlock,
      toBlock,
      logs: pending.length,
      trades,
      marketsCreated,
      resolutions,
      unrecognized,
      decodeErrors,
      cursor: { ...next },
    };
  }

  private nextCursor(toBlock: number, ordered: RawLog[]): IndexCursor {
    const last = ordered[ordered.length - 1];
    const next: IndexCursor =
      last && last.blockNumber === toBlock
        ? { blockNumber: toBlock, logIndex: last.logIndex }
        : { blockNumber: toBlock, logIndex: -1 };
    const previous = this.cursor;
    if (previous && (next.blockNumber < previous.blockNumber ||
      (next.blockNumber === previous.blockNumber && next.logIndex < previous.logIndex))) {
      throw new Error(
        `cursor would move backwards from ${previous.blockNumber}:${previous.logIndex} to ${next.blockNumber}:${next.logIndex}`
      );
    }
    return next;
  }

  // ==========================================================================
  // Outcomes
  // ==========================================================================

  private caughtUp(head: number): CycleOutcome {
    this.idlePolls += 1;
    this.setState('idle');
    this.emit('caughtUp', head);
    return { kind: 'caughtUp', head };
  }

  private fetchFailed(error: unknown): CycleOutcome {
    this.counters.fetchFailures += 1;
    if (error instanceof FetchError && !error.retryable) {
      this.fatalError = error;
      this.running = false;
      this.logger.error(`Chain source rejected the request; stopping: ${error.message}`);
      this.setState('stopped');
      this.halted = true;
      this.emit('fatal', error);
      this.releaseWaiters();
      return { kind: 'fatal', error };
    }

    this.counters.consecutiveFailures += 1;
    const attempt = this.counters.consecutiveFailures;
    const { backoffBaseMs, backoffMaxMs } = this.params.config.indexer;
    const info: BackoffInfo = { attempt, delayMs: backoffDelay(attempt, backoffBaseMs, backoffMaxMs), error: toError(error) };
    this.logger.warn(`Fetch failed (attempt ${attempt}), retrying in ${info.delayMs}ms: ${info.error.message}`);
    this.setState('backoff');
    this.emit('backoff', info);
    return { kind: 'backoff', ...info };
  }

  private persistFailed(error: PersistenceError): CycleOutcome {
    this.counters.persistFailures += 1;
    this.logger.error(`Batch not committed: ${error.message}`);
    this.setState('idle');
    this.emit('persistFailed', error);
    return { kind: 'persistFailed', error };
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  /** Delay before the next cycle, or null when the loop must end. */
  delayAfter(outcome: CycleOutcome): number | null {
    const indexer = this.params.config.indexer;
    switch (outcome.kind) {
      case 'applied':
        return outcome.behind ? 0 : indexer.pollIntervalMs;
      case 'caughtUp':
        return Math.min(indexer.pollIntervalMs * 2 ** Math.max(0, this.idlePolls - 1), indexer.maxPollIntervalMs);
      case 'backoff':
        return outcome.delayMs;
      case 'persistFailed':
        return indexer.pollIntervalMs;
      case 'fatal':
        return null;
    }
  }

  private async cycle(): Promise<number | null> {
    try {
      const outcome = await this.runOnce();
      return this.delayAfter(outcome);
    } catch (error) {
      this.counters.consecutiveFailures += 1;
      const { backoffBaseMs, backoffMaxMs } = this.params.config.indexer;
      this.logger.error('Indexer cycle failed', error);
      return backoffDelay(this.counters.consecutiveFailures, backoffBaseMs, backoffMaxMs);
    }
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.cycle()
        .then((next) => {
          if (next !== null) this.scheduleNext(next);
        })
        .catch((err) => this.logger.error('Indexer scheduling failed', err));
    }, delayMs);
  }

  private setState(next: IndexerState): void {
    if (this.halted || this.state === next) return;
    this.state = next;
    this.emit('state', next);
  }

  private releaseWaiters(): void {
    const waiters = this.stopWaiters;
    this.stopWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
