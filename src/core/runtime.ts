import { AnalyticsEngine, type ReplayResult } from '../analytics/engine.js';
import { ReadApi } from '../api/read_api.js';
import type { ChainLogSource } from '../chain/log_source.js';
import { Indexer } from '../indexer/indexer.js';
import type { CursorStore, EventStore } from '../indexer/stores.js';
import { TokenRegistry } from '../indexer/token_registry.js';
import { SqliteCursorStore } from '../memory/cursor_store.js';
import { SqliteEventStore } from '../memory/event_store.js';
import type { CtflowConfig } from './config.js';
import { Logger } from './logger.js';

export interface RestoreSummary extends ReplayResult {
  batches: number;
  markets: number;
}

/**
 * Rebuilds registry and analytics from the event log: markets first, then
 * every stored event in (block, logIndex) order.
 */
export function restoreState(params: {
  registry: TokenRegistry;
  engine: AnalyticsEngine;
  eventStore: EventStore;
}): RestoreSummary {
  const { registry, engine, eventStore } = params;
  const batches = eventStore.loadBatches();

  registry.clear();
  engine.reset();
  for (const batch of batches) {
    for (const event of batch.events) {
      if (event.kind === 'MarketCreated') {
        registry.register(event.market, event.source);
      }
    }
  }

  const result = engine.replay(batches);
  return { ...result, batches: batches.length, markets: registry.size() };
}

export class Runtime {
  readonly logger: Logger;
  readonly registry = new TokenRegistry();
  readonly engine: AnalyticsEngine;
  readonly cursorStore: CursorStore;
  readonly eventStore: EventStore;
  readonly readApi: ReadApi;
  private indexer: Indexer | null = null;

  constructor(
    readonly config: CtflowConfig,
    options: { logger?: Logger; cursorStore?: CursorStore; eventStore?: EventStore } = {}
  ) {
    this.logger = options.logger ?? new Logger(config.log.level);
    this.engine = new AnalyticsEngine({
      registry: this.registry,
      config: config.analytics,
      logger: this.logger.child('analytics'),
    });
    this.cursorStore = options.cursorStore ?? new SqliteCursorStore(config.indexer.source, config.memory.dbPath);
    this.eventStore = options.eventStore ?? new SqliteEventStore(config.memory.dbPath);
    this.readApi = new ReadApi({
      registry: this.registry,
      engine: this.engine,
      indexerStatus: () => this.indexer?.getStatus() ?? null,
    });
  }

  restore(): RestoreSummary {
    const summary = restoreState({ registry: this.registry, engine: this.engine, eventStore: this.eventStore });
    this.logger.info(
      `Restored ${summary.markets} market(s) and ${summary.applied} event(s) from ${summary.batches} block(s)`
    );
    return summary;
  }

  attachIndexer(source: ChainLogSource): Indexer {
    this.indexer = new Indexer({
      config: this.config,
      source,
      registry: this.registry,
      engine: this.engine,
      cursorStore: this.cursorStore,
      eventStore: this.eventStore,
      logger: this.logger.child('indexer'),
    });
    return this.indexer;
  }
}
