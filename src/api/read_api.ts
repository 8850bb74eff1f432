import type { z } from 'zod';

import type { AnalyticsEngine, EngineStats } from '../analytics/engine.js';
import type { IndexerStatus } from '../indexer/indexer.js';
import type { TokenRegistry } from '../indexer/token_registry.js';
import type {
  ArbitrageOpportunity,
  HotMarket,
  Market,
  MarketStats,
  PnlLeaderboardEntry,
  PortfolioPnl,
  SmartMoneyEntry,
  Trade,
  TraderPosition,
  TraderProfile,
} from '../types/index.js';
import {
  ArbitrageSchema,
  GetTradeSchema,
  HotMarketsSchema,
  ListTradesSchema,
  MarketRefSchema,
  PnlLeaderboardSchema,
  PositionsSchema,
  SearchMarketsSchema,
  SmartMoneySchema,
  TraderSchema,
} from './schemas.js';

export type ReadApiErrorCode = 'invalid_params';

export class ReadApiError extends Error {
  constructor(
    public readonly code: ReadApiErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ReadApiError';
  }
}

export interface MarketView extends Market {
  lastPrices: Array<number | null>;
  stats: MarketStats | null;
}

export interface PipelineStatus {
  indexer: IndexerStatus | null;
  engine: EngineStats;
  markets: number;
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw new ReadApiError('invalid_params', `Invalid parameters: ${detail}`);
  }
  return parsed.data;
}

/**
 * Read-only query facade for front ends. Inputs are validated; results are
 * copies of engine and registry state.
 */
export class ReadApi {
  constructor(
    private params: {
      registry: TokenRegistry;
      engine: AnalyticsEngine;
      indexerStatus?: () => IndexerStatus | null;
    }
  ) {}

  getMarket(input: unknown): MarketView | null {
    const { market } = validate(MarketRefSchema, input);
    const found = this.lookupMarket(market);
    return found ? this.toView(found) : null;
  }

  searchMarkets(input: unknown = {}): MarketView[] {
    const { query, limit, offset } = validate(SearchMarketsSchema, input);
    const needle = query.toLowerCase();
    const views = this.params.registry
      .listMarkets()
      .filter((market) => !needle || market.slug.toLowerCase().includes(needle) || market.conditionId.includes(needle))
      .map((market) => this.toView(market));
    views.sort((a, b) => {
      const volume = (b.stats?.volume ?? 0) - (a.stats?.volume ?? 0);
      if (volume !== 0) return volume;
      return a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0;
    });
    return views.slice(offset, offset + limit);
  }

  listTrades(input: unknown = {}): Trade[] {
    const { market, address, limit, offset } = validate(ListTradesSchema, input);
    let conditionId: string | undefined;
    if (market) {
      const found = this.lookupMarket(market);
      if (!found) return [];
      conditionId = found.conditionId;
    }
    return this.params.engine.listTrades({ conditionId, address, limit, offset });
  }

  getTrade(input: unknown): Trade | null {
    const { txHash, logIndex } = validate(GetTradeSchema, input);
    return this.params.engine.getTrade(txHash, logIndex);
  }

  getTraderProfile(input: unknown): TraderProfile {
    const { address } = validate(TraderSchema, input);
    return this.params.engine.getTraderProfile(address);
  }

  getHotMarkets(input: unknown = {}): HotMarket[] {
    const { windowHours, limit, sortBy } = validate(HotMarketsSchema, input);
    return this.params.engine.getHotMarkets({ windowSeconds: windowHours * 3600, limit, sortBy });
  }

  listArbitrage(input: unknown = {}): ArbitrageOpportunity[] {
    const { limit, offset } = validate(ArbitrageSchema, input);
    return this.params.engine.listArbitrage({ limit, offset });
  }

  getSmartMoney(input: unknown = {}): SmartMoneyEntry[] {
    const { windowHours, limit, minTrades, market, minWinRate } = validate(SmartMoneySchema, input);
    let conditionId: string | undefined;
    if (market) {
      const found = this.lookupMarket(market);
      if (!found) return [];
      conditionId = found.conditionId;
    }
    return this.params.engine.getSmartMoney({
      windowSeconds: windowHours === undefined ? undefined : windowHours * 3600,
      limit,
      minTrades,
      conditionId,
      minWinRate,
    });
  }

  getTraderPositions(input: unknown): TraderPosition[] {
    const { address, includeClosed } = validate(PositionsSchema, input);
    return this.params.engine.getTraderPositions(address, { includeClosed });
  }

  getPortfolioPnl(input: unknown): PortfolioPnl {
    const { address } = validate(TraderSchema, input);
    return this.params.engine.getPortfolioPnl(address);
  }

  getPnlLeaderboard(input: unknown = {}): PnlLeaderboardEntry[] {
    const { market, limit } = validate(PnlLeaderboardSchema, input);
    let conditionId: string | undefined;
    if (market) {
      const found = this.lookupMarket(market);
      if (!found) return [];
      conditionId = found.conditionId;
    }
    return this.params.engine.getPnlLeaderboard({ conditionId, limit });
  }

  getIndexerStatus(): PipelineStatus {
    return {
      indexer: this.params.indexerStatus ? this.params.indexerStatus() : null,
      engine: this.params.engine.getStats(),
      markets: this.params.registry.size(),
    };
  }

  private lookupMarket(ref: string): Market | undefined {
    return this.params.registry.getMarket(ref) ?? this.params.registry.findBySlug(ref);
  }

  private toView(market: Market): MarketView {
    return {
      ...market,
      lastPrices: market.outcomeTokenIds.map((tokenId) => this.params.engine.getLastPrice(tokenId)),
      stats: this.params.engine.getMarketStats(market.conditionId),
    };
  }
}
