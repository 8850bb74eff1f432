/**
 * ctflow - prediction-market exchange indexer and trader analytics
 *
 * Main entry point for the ctflow library.
 */

export * from './types/index.js';

export { loadConfig, parseConfig, type CtflowConfig, type AnalyticsConfig, type IndexerConfig } from './core/config.js';
export { Logger, resolveLogLevel, type LogLevel } from './core/logger.js';
export { Runtime, restoreState, type RestoreSummary } from './core/runtime.js';

export { FetchError, type ChainLogSource, type FetchErrorKind } from './chain/log_source.js';
export { RpcLogSource, classifyRpcError } from './chain/rpc_source.js';
export { deriveOutcomeTokenIds, collectionIdFor, positionIdFor } from './chain/token_ids.js';

export {
  decodeLog,
  decodePrice,
  encodePrice,
  DecodeError,
  type DecodeErrorKind,
  type DecodeResult,
} from './indexer/decoder.js';
export { TokenRegistry, type RegisterResult } from './indexer/token_registry.js';
export { Indexer, type IndexerStatus, type IndexerState, type CycleOutcome } from './indexer/indexer.js';
export { PersistenceError, type CursorStore, type EventStore, type EventBatch } from './indexer/stores.js';

export { AnalyticsEngine, type ApplyOutcome, type EngineStats } from './analytics/engine.js';
export {
  assessRisk,
  deriveLabels,
  deriveStyle,
  estimateWinRate,
  timingPattern,
  topMarkets,
  type WinRateEstimator,
} from './analytics/profile.js';
export { buildPositions, summarizePortfolio, rankPnl, type MarkPrice } from './analytics/pnl.js';
export { evaluateArbitrage } from './analytics/arbitrage.js';
export { rankSmartMoney } from './analytics/smart_money.js';

export { ReadApi, ReadApiError, type MarketView, type PipelineStatus } from './api/read_api.js';

export { openDatabase, closeDatabases } from './memory/db.js';
export { SqliteCursorStore } from './memory/cursor_store.js';
export { SqliteEventStore } from './memory/event_store.js';

// Version
export const VERSION = '0.1.0';
