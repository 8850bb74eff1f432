import type { AnalyticsConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { EventBatch } from '../indexer/stores.js';
import type { TokenRegistry } from '../indexer/token_registry.js';
import type {
  ArbitrageOpportunity,
  HotMarket,
  Market,
  MarketStats,
  PnlLeaderboardEntry,
  PortfolioPnl,
  Side,
  SmartMoneyEntry,
  StoredEvent,
  Trade,
  TraderPosition,
  TraderProfile,
} from '../types/index.js';
import { evaluateArbitrage, thresholdToMicros } from './arbitrage.js';
import { buildPositions, rankPnl, summarizePortfolio } from './pnl.js';
import { emptyProfile, isWinningFill, oppositeSide, TraderAccumulator, type Fill } from './profile.js';
import { rankSmartMoney, type SmartMoneyCandidate } from './smart_money.js';

export type ApplyOutcome = 'applied' | 'duplicate' | 'skipped' | 'conflict';

export interface ResolutionInput {
  conditionId: string;
  outcomeIndex: number;
  blockNumber: number;
}

export interface TradeQuery {
  conditionId?: string;
  address?: string;
  limit?: number;
  offset?: number;
}

export interface WindowQuery {
  windowSeconds?: number;
  /** Anchor of the window in unix seconds; defaults to the latest applied trade. */
  now?: number;
  limit?: number;
}

export interface SmartMoneyQuery extends WindowQuery {
  minTrades?: number;
  /** Only trades in this market count towards window volume. */
  conditionId?: string;
  minWinRate?: number;
}

export interface PnlLeaderboardQuery {
  conditionId?: string;
  limit?: number;
}

export interface HotMarketsQuery extends WindowQuery {
  sortBy?: 'volume' | 'trades';
}

export interface PageQuery {
  limit?: number;
  offset?: number;
}

export interface EngineStats {
  markets: number;
  traders: number;
  trades: number;
  duplicates: number;
  skipped: number;
  conflicts: number;
  openFills: number;
  latestTradeAt: number | null;
}

export interface ReplayResult {
  applied: number;
  duplicates: number;
  skipped: number;
  conflicts: number;
}

interface PricePoint {
  micros: number;
  blockNumber: number;
  logIndex: number;
}

interface MarketState {
  tradeCount: number;
  volume: number;
  won: number;
  lost: number;
  lastTradeAt: number | null;
  lastTradeBlock: number | null;
  /** Maker-side fills awaiting resolution. */
  openFills: Array<{ side: Side; outcomeIndex: number }>;
}

const DEFAULT_PAGE_LIMIT = 50;
const DEFAULT_HOT_WINDOW_SECONDS = 24 * 3600;
const DEFAULT_LEADERBOARD_LIMIT = 20;

function tradeKey(txHash: string, logIndex: number): string {
  return `${txHash.toLowerCase()}:${logIndex}`;
}

function comparePosition(a: { blockNumber: number; logIndex: number }, b: { blockNumber: number; logIndex: number }): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}

function notionalOf(trade: Trade): number {
  return (trade.priceMicros * trade.size) / 1e6;
}

function page<T>(items: T[], query: PageQuery): T[] {
  const offset = Math.max(0, query.offset ?? 0);
  const limit = Math.max(0, query.limit ?? DEFAULT_PAGE_LIMIT);
  return items.slice(offset, offset + limit);
}

/**
 * Incremental analytics over the decoded event stream: trader profiles,
 * market price state, arbitrage and smart-money signals. Single writer (the
 * indexer); every read returns a copy.
 */
export class AnalyticsEngine {
  private logger: Logger;
  private ignored: Set<string>;
  private thresholdMicros: number;

  private tradesByKey = new Map<string, Trade>();
  private trades: Trade[] = [];
  private lastPrices = new Map<string, PricePoint>();
  private markets = new Map<string, MarketState>();
  private traders = new Map<string, TraderAccumulator>();
  private holders = new Map<string, Set<string>>();
  private duplicates = 0;
  private skipped = 0;
  private conflicts = 0;
  private latestTradeAt: number | null = null;

  constructor(
    private params: {
      registry: TokenRegistry;
      config: AnalyticsConfig;
      logger?: Logger;
    }
  ) {
    this.logger = params.logger ?? new Logger('info');
    this.ignored = new Set(params.config.ignoredAddresses.map((address) => address.toLowerCase()));
    this.thresholdMicros = thresholdToMicros(params.config.arbitrageThreshold);
  }

  // ==========================================================================
  // Apply
  // ==========================================================================

  applyMarketCreated(market: Market): ApplyOutcome {
    const conditionId = market.conditionId.toLowerCase();
    if (!this.params.registry.getMarket(conditionId)) {
      this.skipped += 1;
      this.logger.warn(`Market ${conditionId} is not registered; skipping`);
      return 'skipped';
    }
    if (this.markets.has(conditionId)) {
      return 'duplicate';
    }
    this.markets.set(conditionId, this.emptyMarketState());
    return 'applied';
  }

  applyTrade(trade: Trade): ApplyOutcome {
    const key = tradeKey(trade.txHash, trade.logIndex);
    if (this.tradesByKey.has(key)) {
      this.duplicates += 1;
      return 'duplicate';
    }

    const registry = this.params.registry;
    const market = registry.getMarket(trade.conditionId);
    const token = registry.resolve(trade.tokenId);
    if (!market || !token || token.conditionId !== market.conditionId || token.outcomeIndex !== trade.outcomeIndex) {
      this.skipped += 1;
      this.logger.warn(`Trade ${key} references unknown market or token ${trade.tokenId}; skipping`);
      return 'skipped';
    }

    const stored: Trade = { ...trade };
    this.tradesByKey.set(key, stored);
    this.insertTrade(stored);
    this.updateLastPrice(stored);
    this.latestTradeAt = this.latestTradeAt === null ? stored.timestamp : Math.max(this.latestTradeAt, stored.timestamp);

    const winner = market.resolution.status === 'resolved' ? market.resolution.outcomeIndex : null;
    const notional = notionalOf(stored);

    const state = this.marketState(market.conditionId);
    state.tradeCount += 1;
    state.volume += notional;
    state.lastTradeAt = state.lastTradeAt === null ? stored.timestamp : Math.max(state.lastTradeAt, stored.timestamp);
    state.lastTradeBlock =
      state.lastTradeBlock === null ? stored.blockNumber : Math.max(state.lastTradeBlock, stored.blockNumber);
    if (winner === null) {
      state.openFills.push({ side: stored.side, outcomeIndex: stored.outcomeIndex });
    } else if (isWinningFill(stored.side, stored.outcomeIndex, winner)) {
      state.won += 1;
    } else {
      state.lost += 1;
    }

    for (const { address, fill } of this.participantFills(stored)) {
      const trader = this.trader(address);
      trader.record(fill);
      if (winner === null) {
        trader.hold(fill);
        this.holderSet(stored.conditionId).add(address);
      } else {
        trader.attribute(fill, winner);
      }
    }

    return 'applied';
  }

  applyMarketResolved(resolution: ResolutionInput): ApplyOutcome {
    const conditionId = resolution.conditionId.toLowerCase();
    const registry = this.params.registry;
    const market = registry.getMarket(conditionId);
    if (!market) {
      this.skipped += 1;
      this.logger.warn(`Resolution for unknown market ${conditionId}; skipping`);
      return 'skipped';
    }

    if (market.resolution.status === 'resolved') {
      if (market.resolution.outcomeIndex === resolution.outcomeIndex) {
        return 'duplicate';
      }
      this.conflicts += 1;
      this.logger.warn(
        `Market ${conditionId} already resolved to outcome ${market.resolution.outcomeIndex}; ignoring outcome ${resolution.outcomeIndex}`
      );
      return 'conflict';
    }

    if (!registry.markResolved(conditionId, resolution.outcomeIndex, resolution.blockNumber)) {
      this.skipped += 1;
      this.logger.warn(`Market ${conditionId} has no outcome ${resolution.outcomeIndex}; skipping resolution`);
      return 'skipped';
    }

    const state = this.marketState(conditionId);
    for (const fill of state.openFills) {
      if (isWinningFill(fill.side, fill.outcomeIndex, resolution.outcomeIndex)) {
        state.won += 1;
      } else {
        state.lost += 1;
      }
    }
    state.openFills = [];

    const holders = this.holders.get(conditionId);
    if (holders) {
      for (const address of holders) {
        this.traders.get(address)?.settle(conditionId, resolution.outcomeIndex);
      }
      this.holders.delete(conditionId);
    }

    return 'applied';
  }

  /** Applies stored batches in order. Markets must already be registered. */
  replay(batches: EventBatch[]): ReplayResult {
    const result: ReplayResult = { applied: 0, duplicates: 0, skipped: 0, conflicts: 0 };
    for (const batch of batches) {
      for (const event of batch.events) {
        const outcome = this.applyEvent(event);
        if (outcome === 'applied') result.applied += 1;
        else if (outcome === 'duplicate') result.duplicates += 1;
        else if (outcome === 'skipped') result.skipped += 1;
        else result.conflicts += 1;
      }
    }
    return result;
  }

  applyEvent(event: StoredEvent): ApplyOutcome {
    switch (event.kind) {
      case 'MarketCreated':
        return this.applyMarketCreated(event.market);
      case 'MarketResolved':
        return this.applyMarketResolved({
          conditionId: event.conditionId,
          outcomeIndex: event.outcomeIndex,
          blockNumber: event.blockNumber,
        });
      case 'TradeFilled':
        return this.applyTrade(event.trade);
    }
  }

  /** Drops all derived state. Registry contents are left to the caller. */
  reset(): void {
    this.tradesByKey.clear();
    this.trades = [];
    this.lastPrices.clear();
    this.markets.clear();
    this.traders.clear();
    this.holders.clear();
    this.duplicates = 0;
    this.skipped = 0;
    this.conflicts = 0;
    this.latestTradeAt = null;
  }

  // ==========================================================================
  // Read
  // ==========================================================================

  getTraderProfile(address: string): TraderProfile {
    const key = address.toLowerCase();
    const trader = this.traders.get(key);
    if (!trader) {
      return emptyProfile(key);
    }
    return trader.snapshot({
      estimator: this.params.config.winRateEstimator,
      thresholds: this.params.config.labels,
      lastPriceMicros: (tokenId) => this.lastPrices.get(tokenId)?.micros,
    });
  }

  getLastPrice(tokenId: string): number | null {
    const point = this.lastPrices.get(tokenId);
    return point ? point.micros / 1e6 : null;
  }

  findArbitrage(conditionId: string): ArbitrageOpportunity | null {
    const market = this.params.registry.getMarket(conditionId);
    if (!market) return null;
    return this.evaluate(market);
  }

  listArbitrage(query: PageQuery = {}): ArbitrageOpportunity[] {
    const opportunities: ArbitrageOpportunity[] = [];
    for (const market of this.params.registry.listMarkets()) {
      const opportunity = this.evaluate(market);
      if (opportunity) opportunities.push(opportunity);
    }
    opportunities.sort(
      (a, b) => b.magnitude - a.magnitude || (a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0)
    );
    return page(opportunities, query);
  }

  getSmartMoney(query: SmartMoneyQuery = {}): SmartMoneyEntry[] {
    const settings = this.params.config.smartMoney;
    const now = query.now ?? this.latestTradeAt;
    if (now === null) return [];
    const windowSeconds = query.windowSeconds ?? settings.windowHours * 3600;
    const cutoff = now - windowSeconds;
    const conditionId = query.conditionId?.toLowerCase();

    const windowed = new Map<string, Omit<SmartMoneyCandidate, 'winRate'>>();
    for (const trade of this.trades) {
      if (trade.timestamp > now || trade.timestamp < cutoff) continue;
      if (conditionId && trade.conditionId !== conditionId) continue;
      const notional = notionalOf(trade);
      for (const { address } of this.participantFills(trade)) {
        const entry = windowed.get(address);
        if (entry) {
          entry.windowVolume += notional;
          entry.windowTrades += 1;
          entry.lastTradeAt = Math.max(entry.lastTradeAt, trade.timestamp);
        } else {
          windowed.set(address, { address, windowVolume: notional, windowTrades: 1, lastTradeAt: trade.timestamp });
        }
      }
    }

    const candidates: SmartMoneyCandidate[] = Array.from(windowed.values(), (entry) => ({
      ...entry,
      winRate: this.getTraderProfile(entry.address).winRate,
    }));

    return rankSmartMoney(candidates, {
      now,
      windowSeconds,
      weights: settings.weights,
      minTrades: query.minTrades ?? settings.minTrades,
      minWinRate: query.minWinRate,
      limit: query.limit ?? settings.limit,
    });
  }

  getTraderPositions(address: string, options: { includeClosed?: boolean } = {}): TraderPosition[] {
    const fills = this.fillsByAddress().get(address.toLowerCase()) ?? [];
    return buildPositions(fills, (tokenId) => this.markPrice(tokenId), options);
  }

  getPortfolioPnl(address: string): PortfolioPnl {
    const key = address.toLowerCase();
    return summarizePortfolio(key, this.getTraderPositions(key, { includeClosed: true }));
  }

  /** Restricted to one market's fills when `conditionId` is given. */
  getPnlLeaderboard(query: PnlLeaderboardQuery = {}): PnlLeaderboardEntry[] {
    const mark = (tokenId: string) => this.markPrice(tokenId);
    const portfolios: PortfolioPnl[] = [];
    for (const [address, fills] of this.fillsByAddress(query.conditionId?.toLowerCase())) {
      portfolios.push(summarizePortfolio(address, buildPositions(fills, mark, { includeClosed: true })));
    }
    return rankPnl(portfolios, query.limit ?? DEFAULT_LEADERBOARD_LIMIT);
  }

  getHotMarkets(query: HotMarketsQuery = {}): HotMarket[] {
    const now = query.now ?? this.latestTradeAt;
    if (now === null) return [];
    const cutoff = now - (query.windowSeconds ?? DEFAULT_HOT_WINDOW_SECONDS);

    const totals = new Map<string, { trades: number; volume: number }>();
    for (const trade of this.trades) {
      if (trade.timestamp > now || trade.timestamp < cutoff) continue;
      const entry = totals.get(trade.conditionId) ?? { trades: 0, volume: 0 };
      entry.trades += 1;
      entry.volume += notionalOf(trade);
      totals.set(trade.conditionId, entry);
    }

    const hot: HotMarket[] = [];
    for (const [conditionId, entry] of totals) {
      const market = this.params.registry.getMarket(conditionId);
      if (!market) continue;
      hot.push({
        conditionId,
        slug: market.slug,
        trades: entry.trades,
        volume: entry.volume,
        lastPrices: market.outcomeTokenIds.map((tokenId) => this.getLastPrice(tokenId)),
      });
    }

    const byTrades = query.sortBy === 'trades';
    hot.sort((a, b) => {
      const primary = byTrades ? b.trades - a.trades : b.volume - a.volume;
      if (primary !== 0) return primary;
      const secondary = byTrades ? b.volume - a.volume : b.trades - a.trades;
      if (secondary !== 0) return secondary;
      return a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0;
    });
    return hot.slice(0, query.limit ?? DEFAULT_PAGE_LIMIT);
  }

  getMarketStats(conditionId: string): MarketStats | null {
    const market = this.params.registry.getMarket(conditionId);
    if (!market) return null;
    const state = this.markets.get(market.conditionId) ?? this.emptyMarketState();
    return {
      conditionId: market.conditionId,
      slug: market.slug,
      tradeCount: state.tradeCount,
      volume: state.volume,
      won: state.won,
      lost: state.lost,
      lastTradeAt: state.lastTradeAt,
    };
  }

  /** Newest first. */
  listTrades(query: TradeQuery = {}): Trade[] {
    const conditionId = query.conditionId?.toLowerCase();
    const address = query.address?.toLowerCase();
    const matches: Trade[] = [];
    for (let i = this.trades.length - 1; i >= 0; i -= 1) {
      const trade = this.trades[i];
      if (conditionId && trade.conditionId !== conditionId) continue;
      if (address && trade.maker !== address && trade.taker !== address) continue;
      matches.push(trade);
    }
    return page(matches, query).map((trade) => ({ ...trade }));
  }

  getTrade(txHash: string, logIndex: number): Trade | null {
    const trade = this.tradesByKey.get(tradeKey(txHash, logIndex));
    return trade ? { ...trade } : null;
  }

  getStats(): EngineStats {
    let openFills = 0;
    for (const state of this.markets.values()) {
      openFills += state.openFills.length;
    }
    return {
      markets: this.markets.size,
      traders: this.traders.size,
      trades: this.trades.length,
      duplicates: this.duplicates,
      skipped: this.skipped,
      conflicts: this.conflicts,
      openFills,
      latestTradeAt: this.latestTradeAt,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private evaluate(market: Market): ArbitrageOpportunity | null {
    const prices = market.outcomeTokenIds.map((tokenId) => this.lastPrices.get(tokenId)?.micros);
    const state = this.markets.get(market.conditionId);
    const computedAtBlock = state?.lastTradeBlock ?? market.createdBlock;
    return evaluateArbitrage(market, prices, this.thresholdMicros, computedAtBlock);
  }

  /** One fill per distinct, non-ignored participant; a self-trade is a single fill. */
  private participantFills(trade: Trade): Array<{ address: string; fill: Fill }> {
    const participants: Array<[string, Side]> = [[trade.maker, trade.side]];
    if (trade.taker !== trade.maker) {
      participants.push([trade.taker, oppositeSide(trade.side)]);
    }
    const notional = notionalOf(trade);
    const fills: Array<{ address: string; fill: Fill }> = [];
    for (const [address, side] of participants) {
      if (this.ignored.has(address)) continue;
      fills.push({
        address,
        fill: {
          conditionId: trade.conditionId,
          tokenId: trade.tokenId,
          outcomeIndex: trade.outcomeIndex,
          side,
          priceMicros: trade.priceMicros,
          size: trade.size,
          notional,
          timestamp: trade.timestamp,
        },
      });
    }
    return fills;
  }

  private fillsByAddress(conditionId?: string): Map<string, Fill[]> {
    const byAddress = new Map<string, Fill[]>();
    for (const trade of this.trades) {
      if (conditionId && trade.conditionId !== conditionId) continue;
      for (const { address, fill } of this.participantFills(trade)) {
        const fills = byAddress.get(address);
        if (fills) {
          fills.push(fill);
        } else {
          byAddress.set(address, [fill]);
        }
      }
    }
    return byAddress;
  }

  /** Payout once the market resolved, else the last traded price. */
  private markPrice(tokenId: string): number | null {
    const token = this.params.registry.resolve(tokenId);
    if (!token) return this.getLastPrice(tokenId);
    const resolution = this.params.registry.getMarket(token.conditionId)?.resolution;
    if (resolution?.status === 'resolved') {
      return token.outcomeIndex === resolution.outcomeIndex ? 1 : 0;
    }
    return this.getLastPrice(tokenId);
  }

  private emptyMarketState(): MarketState {
    return { tradeCount: 0, volume: 0, won: 0, lost: 0, lastTradeAt: null, lastTradeBlock: null, openFills: [] };
  }

  private marketState(conditionId: string): MarketState {
    let state = this.markets.get(conditionId);
    if (!state) {
      state = this.emptyMarketState();
      this.markets.set(conditionId, state);
    }
    return state;
  }

  private trader(address: string): TraderAccumulator {
    let trader = this.traders.get(address);
    if (!trader) {
      trader = new TraderAccumulator(address);
      this.traders.set(address, trader);
    }
    return trader;
  }

  private holderSet(conditionId: string): Set<string> {
    let holders = this.holders.get(conditionId);
    if (!holders) {
      holders = new Set();
      this.holders.set(conditionId, holders);
    }
    return holders;
  }

  private insertTrade(trade: Trade): void {
    let index = this.trades.length;
    while (index > 0 && comparePosition(this.trades[index - 1], trade) > 0) {
      index -= 1;
    }
    this.trades.splice(index, 0, trade);
  }

  private updateLastPrice(trade: Trade): void {
    const current = this.lastPrices.get(trade.tokenId);
    if (current && comparePosition(current, trade) > 0) return;
    this.lastPrices.set(trade.tokenId, {
      micros: trade.priceMicros,
      blockNumber: trade.blockNumber,
      logIndex: trade.logIndex,
    });
  }
}
