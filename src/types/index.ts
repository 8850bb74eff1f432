/**
 * Core type definitions for ctflow
 */

// ============================================================================
// Chain Types
// ============================================================================

export interface RawLog {
  blockNumber: number;
  blockTimestamp: number; // unix seconds
  logIndex: number;
  transactionHash: string;
  address: string;
  topics: string[];
  data: string;
}

export interface IndexCursor {
  blockNumber: number;
  /** Highest log index seen in `blockNumber`, -1 when the block had no logs. */
  logIndex: number;
}

// ============================================================================
// Market Types
// ============================================================================

export type MarketResolution =
  | { status: 'open' }
  | { status: 'resolved'; outcomeIndex: number; resolvedBlock: number };

export interface Market {
  conditionId: string;
  slug: string;
  outcomeTokenIds: string[];
  resolution: MarketResolution;
  createdBlock: number;
}

export interface OutcomeToken {
  tokenId: string;
  conditionId: string;
  outcomeIndex: number;
}

// ============================================================================
// Trade Types
// ============================================================================

export type Side = 'BUY' | 'SELL';

export interface Trade {
  txHash: string;
  logIndex: number;
  blockNumber: number;
  timestamp: number; // unix seconds
  exchange: string;
  orderHash: string;
  maker: string;
  taker: string;
  tokenId: string;
  conditionId: string;
  outcomeIndex: number;
  /** Direction of the maker order. */
  side: Side;
  priceMicros: number;
  price: number;
  size: number;
  feeRaw: string;
}

// ============================================================================
// Domain Events
// ============================================================================

export type MarketCreatedSource = 'TokenRegistered' | 'ConditionPreparation';

export interface LogPosition {
  txHash: string;
  logIndex: number;
  blockNumber: number;
}

export type DomainEvent =
  | ({ kind: 'TradeFilled'; trade: Trade } & LogPosition)
  | ({ kind: 'MarketCreated'; market: Market; source: MarketCreatedSource } & LogPosition)
  | ({ kind: 'MarketResolved'; conditionId: string; outcomeIndex: number; payouts: string[] } & LogPosition)
  | ({ kind: 'Unrecognized'; topic: string | null } & LogPosition);

export type DomainEventKind = DomainEvent['kind'];

export type StoredEvent = Exclude<DomainEvent, { kind: 'Unrecognized' }>;

// ============================================================================
// Analytics Types
// ============================================================================

export type TraderLabel =
  | 'whale'
  | 'active'
  | 'sniper'
  | 'diversified'
  | 'high-frequency'
  | 'buy-biased'
  | 'sell-biased'
  | 'large-orders'
  | 'newcomer'
  | 'high-win-rate';

export type TradingStyle =
  | 'insufficient-data'
  | 'scalper'
  | 'value'
  | 'focused'
  | 'diversified'
  | 'balanced'
  | 'mixed';

export type RiskLevel = 'low' | 'medium' | 'medium-high' | 'high';

export interface MarketFocus {
  conditionId: string;
  trades: number;
}

export type TradingCadence = 'high-frequency' | 'regular' | 'long-horizon';

/** Hours and weekdays are UTC. */
export interface TimingPattern {
  peakHour: number | null;
  peakWeekday: string | null;
  /** Share of trades between 14:00 and 21:59 UTC. */
  usHoursShare: number;
  newsSensitive: boolean;
  avgIntervalSeconds: number | null;
  cadence: TradingCadence | null;
}

export interface WinRateBasis {
  resolvedWins: number;
  resolvedLosses: number;
  provisionalWins: number;
  provisionalLosses: number;
}

export interface TraderProfile {
  address: string;
  tradeCount: number;
  buyCount: number;
  sellCount: number;
  buyVolume: number;
  sellVolume: number;
  totalVolume: number;
  avgTradeSize: number;
  avgPrice: number;
  distinctMarkets: number;
  firstTradeAt: number | null;
  lastTradeAt: number | null;
  activeDays: number;
  /** Fraction in [0, 1], null without any basis. */
  winRate: number | null;
  winRateBasis: WinRateBasis;
  labels: TraderLabel[];
  style: TradingStyle;
  riskLevel: RiskLevel;
  /** Most traded markets, at most five. */
  marketFocus: MarketFocus[];
  timing: TimingPattern;
}

export type ArbitrageDirection = 'SELL_ALL' | 'BUY_ALL';

export interface ArbitrageOpportunity {
  conditionId: string;
  slug: string;
  prices: number[];
  sum: number;
  magnitude: number;
  direction: ArbitrageDirection;
  computedAtBlock: number;
}

export interface SmartMoneyEntry {
  address: string;
  score: number;
  winRate: number | null;
  windowVolume: number;
  windowTrades: number;
  lastTradeAt: number;
}

export interface MarketStats {
  conditionId: string;
  slug: string;
  tradeCount: number;
  volume: number;
  won: number;
  lost: number;
  lastTradeAt: number | null;
}

export interface HotMarket {
  conditionId: string;
  slug: string;
  trades: number;
  volume: number;
  lastPrices: Array<number | null>;
}

// ============================================================================
// PnL Types
// ============================================================================

export interface TraderPosition {
  conditionId: string;
  tokenId: string;
  outcomeIndex: number;
  trades: number;
  boughtSize: number;
  soldSize: number;
  netSize: number;
  totalCost: number;
  totalProceeds: number;
  avgCost: number;
  /** Last traded price, or the 1/0 payout once the market resolved; avgCost without either. */
  markPrice: number;
  currentValue: number;
  realizedPnl: number;
  unrealizedPnl: number;
}

export interface PortfolioPnl {
  address: string;
  /** Open positions, largest unrealized PnL first. */
  positions: TraderPosition[];
  totalCost: number;
  currentValue: number;
  unrealizedPnl: number;
  /** Includes positions that have since been closed. */
  realizedPnl: number;
  totalPnl: number;
  pnlPercent: number;
  winningPositions: number;
  losingPositions: number;
}

export interface PnlLeaderboardEntry {
  address: string;
  totalPnl: number;
  realizedPnl: number;
  unrealizedPnl: number;
  pnlPercent: number;
  openPositions: number;
}
