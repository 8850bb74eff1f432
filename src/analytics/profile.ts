import type { LabelThresholds } from '../core/config.js';
import type {
  MarketFocus,
  RiskLevel,
  Side,
  TimingPattern,
  TraderLabel,
  TraderProfile,
  TradingCadence,
  TradingStyle,
  WinRateBasis,
} from '../types/index.js';

export type WinRateEstimator = 'mark-to-last-price' | 'resolved-only';

/** One side of a trade as seen by a single participant. */
export interface Fill {
  conditionId: string;
  tokenId: string;
  outcomeIndex: number;
  side: Side;
  priceMicros: number;
  size: number;
  notional: number;
  timestamp: number;
}

/** Profile figures that labels and style are computed from. */
export type ProfileFigures = Pick<
  TraderProfile,
  | 'tradeCount'
  | 'buyCount'
  | 'sellCount'
  | 'totalVolume'
  | 'avgTradeSize'
  | 'avgPrice'
  | 'distinctMarkets'
  | 'activeDays'
  | 'winRate'
>;

export function isWinningFill(side: Side, outcomeIndex: number, winningIndex: number): boolean {
  const holdsWinner = outcomeIndex === winningIndex;
  return side === 'BUY' ? holdsWinner : !holdsWinner;
}

export function oppositeSide(side: Side): Side {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const US_SESSION_FIRST_HOUR = 14;
const US_SESSION_LAST_HOUR = 21;
const MARKET_FOCUS_LIMIT = 5;

function utcDay(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().slice(0, 10);
}

/** First index holding the largest count. */
function busiest(counts: number[]): number {
  let best = 0;
  for (let i = 1; i < counts.length; i += 1) {
    if (counts[i] > counts[best]) best = i;
  }
  return best;
}

export function estimateWinRate(basis: WinRateBasis, estimator: WinRateEstimator): number | null {
  const wins = basis.resolvedWins + (estimator === 'mark-to-last-price' ? basis.provisionalWins : 0);
  const losses = basis.resolvedLosses + (estimator === 'mark-to-last-price' ? basis.provisionalLosses : 0);
  const total = wins + losses;
  return total === 0 ? null : wins / total;
}

export function deriveLabels(figures: ProfileFigures, thresholds: LabelThresholds): TraderLabel[] {
  const labels: TraderLabel[] = [];
  if (figures.tradeCount === 0) return labels;

  if (figures.totalVolume >= thresholds.whaleVolume) labels.push('whale');
  if (figures.tradeCount >= thresholds.activeTrades) labels.push('active');
  if (figures.avgPrice < thresholds.sniperPrice || figures.avgPrice > 1 - thresholds.sniperPrice) {
    labels.push('sniper');
  }
  if (figures.distinctMarkets >= thresholds.diversifiedMarkets) labels.push('diversified');
  if (figures.activeDays > 0 && figures.tradeCount / figures.activeDays >= thresholds.highFrequencyPerDay) {
    labels.push('high-frequency');
  }
  if (figures.buyCount > figures.sellCount * 2) {
    labels.push('buy-biased');
  } else if (figures.sellCount > figures.buyCount * 2) {
    labels.push('sell-biased');
  }
  if (figures.avgTradeSize > thresholds.largeOrderSize) labels.push('large-orders');
  if (figures.tradeCount < thresholds.newcomerTrades) labels.push('newcomer');
  if (
    figures.winRate !== null &&
    figures.winRate > thresholds.highWinRate &&
    figures.tradeCount >= thresholds.minTradesForWinRate
  ) {
    labels.push('high-win-rate');
  }
  return labels;
}

export function deriveStyle(figures: ProfileFigures): TradingStyle {
  if (figures.tradeCount < 3) return 'insufficient-data';

  if (figures.activeDays > 0) {
    const perDay = figures.tradeCount / figures.activeDays;
    if (perDay > 5 && figures.avgTradeSize < 100) return 'scalper';
  }
  if (figures.avgTradeSize > 500 && figures.tradeCount < 20) return 'value';
  if (figures.distinctMarkets <= 3 && figures.winRate !== null && figures.winRate > 0.55) return 'focused';
  if (figures.distinctMarkets > 5) return 'diversified';

  const buyRatio = figures.buyCount / figures.tradeCount;
  if (buyRatio >= 0.4 && buyRatio <= 0.6) return 'balanced';
  return 'mixed';
}

export function assessRisk(figures: ProfileFigures): RiskLevel {
  if (figures.tradeCount === 0) return 'low';

  let score = 0;
  if (figures.avgTradeSize > 1000) score += 2;
  else if (figures.avgTradeSize > 500) score += 1;
  if (figures.distinctMarkets <= 2) score += 2;
  else if (figures.distinctMarkets <= 4) score += 1;
  if (figures.avgPrice < 0.1 || figures.avgPrice > 0.9) score += 2;
  if (figures.activeDays > 0 && figures.tradeCount / figures.activeDays > 10) score += 1;

  if (score >= 5) return 'high';
  if (score >= 3) return 'medium-high';
  if (score >= 1) return 'medium';
  return 'low';
}

export function topMarkets(tradesByMarket: ReadonlyMap<string, number>, limit = MARKET_FOCUS_LIMIT): MarketFocus[] {
  return Array.from(tradesByMarket, ([conditionId, trades]) => ({ conditionId, trades }))
    .sort((a, b) => b.trades - a.trades || (a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0))
    .slice(0, limit);
}

function cadenceOf(avgIntervalSeconds: number | null): TradingCadence | null {
  if (avgIntervalSeconds === null) return null;
  if (avgIntervalSeconds < 300) return 'high-frequency';
  if (avgIntervalSeconds > 86_400) return 'long-horizon';
  return 'regular';
}

/**
 * When an address trades, from its fill timestamps (unix seconds). The
 * average interval is taken over distinct timestamps, so fills sharing a
 * block time count once.
 */
export function timingPattern(timestamps: readonly number[]): TimingPattern {
  if (timestamps.length === 0) {
    return {
      peakHour: null,
      peakWeekday: null,
      usHoursShare: 0,
      newsSensitive: false,
      avgIntervalSeconds: null,
      cadence: null,
    };
  }

  const hours = new Array<number>(24).fill(0);
  const weekdays = new Array<number>(7).fill(0);
  let usHours = 0;
  for (const timestamp of timestamps) {
    const date = new Date(timestamp * 1000);
    const hour = date.getUTCHours();
    hours[hour] += 1;
    weekdays[date.getUTCDay()] += 1;
    if (hour >= US_SESSION_FIRST_HOUR && hour <= US_SESSION_LAST_HOUR) usHours += 1;
  }

  const distinct = Array.from(new Set(timestamps)).sort((a, b) => a - b);
  const avgIntervalSeconds =
    distinct.length > 1 ? (distinct[distinct.length - 1] - distinct[0]) / (distinct.length - 1) : null;
  const usHoursShare = usHours / timestamps.length;

  return {
    peakHour: busiest(hours),
    peakWeekday: WEEKDAYS[busiest(weekdays)],
    usHoursShare,
    newsSensitive: usHoursShare > 0.6,
    avgIntervalSeconds,
    cadence: cadenceOf(avgIntervalSeconds),
  };
}

export function emptyProfile(address: string): TraderProfile {
  return {
    address,
    tradeCount: 0,
    buyCount: 0,
    sellCount: 0,
    buyVolume: 0,
    sellVolume: 0,
    totalVolume: 0,
    avgTradeSize: 0,
    avgPrice: 0,
    distinctMarkets: 0,
    firstTradeAt: null,
    lastTradeAt: null,
    activeDays: 0,
    winRate: null,
    winRateBasis: { resolvedWins: 0, resolvedLosses: 0, provisionalWins: 0, provisionalLosses: 0 },
    labels: [],
    style: 'insufficient-data',
    riskLevel: 'low',
    marketFocus: [],
    timing: timingPattern([]),
  };
}

/**
 * Incremental fold of one address's fills. Fills in unresolved markets are
 * held until the market resolves, then attributed exactly once.
 */
export class TraderAccumulator {
  tradeCount = 0;
  buyCount = 0;
  sellCount = 0;
  buyVolume = 0;
  sellVolume = 0;
  priceMicrosSum = 0;
  firstTradeAt: number | null = null;
  lastTradeAt: number | null = null;
  resolvedWins = 0;
  resolvedLosses = 0;
  private markets = new Map<string, number>();
  private days = new Set<string>();
  private timestamps: number[] = [];
  private openFills = new Map<string, Fill[]>();

  constructor(readonly address: string) {}

  record(fill: Fill): void {
    this.tradeCount += 1;
    if (fill.side === 'BUY') {
      this.buyCount += 1;
      this.buyVolume += fill.notional;
    } else {
      this.sellCount += 1;
      this.sellVolume += fill.notional;
    }
    this.priceMicrosSum += fill.priceMicros;
    this.markets.set(fill.conditionId, (this.markets.get(fill.conditionId) ?? 0) + 1);
    this.days.add(utcDay(fill.timestamp));
    this.timestamps.push(fill.timestamp);
    this.firstTradeAt = this.firstTradeAt === null ? fill.timestamp : Math.min(this.firstTradeAt, fill.timestamp);
    this.lastTradeAt = this.lastTradeAt === null ? fill.timestamp : Math.max(this.lastTradeAt, fill.timestamp);
  }

  hold(fill: Fill): void {
    const held = this.openFills.get(fill.conditionId);
    if (held) {
      held.push(fill);
    } else {
      this.openFills.set(fill.conditionId, [fill]);
    }
  }

  attribute(fill: Fill, winningIndex: number): void {
    if (isWinningFill(fill.side, fill.outcomeIndex, winningIndex)) {
      this.resolvedWins += 1;
    } else {
      this.resolvedLosses += 1;
    }
  }

  /** Attributes every held fill of the market; returns how many were settled. */
  settle(conditionId: string, winningIndex: number): number {
    const held = this.openFills.get(conditionId);
    if (!held) return 0;
    for (const fill of held) {
      this.attribute(fill, winningIndex);
    }
    this.openFills.delete(conditionId);
    return held.length;
  }

  basis(estimator: WinRateEstimator, lastPriceMicros: (tokenId: string) => number | undefined): WinRateBasis {
    let provisionalWins = 0;
    let provisionalLosses = 0;
    if (estimator === 'mark-to-last-price') {
      for (const fills of this.openFills.values()) {
        for (const fill of fills) {
          const mark = lastPriceMicros(fill.tokenId);
          if (mark === undefined || mark === fill.priceMicros) continue;
          const markedUp = mark > fill.priceMicros;
          if (markedUp === (fill.side === 'BUY')) {
            provisionalWins += 1;
          } else {
            provisionalLosses += 1;
          }
        }
      }
    }
    return {
      resolvedWins: this.resolvedWins,
      resolvedLosses: this.resolvedLosses,
      provisionalWins,
      provisionalLosses,
    };
  }

  snapshot(params: {
    estimator: WinRateEstimator;
    thresholds: LabelThresholds;
    lastPriceMicros: (tokenId: string) => number | undefined;
  }): TraderProfile {
    const winRateBasis = this.basis(params.estimator, params.lastPriceMicros);
    const totalVolume = this.buyVolume + this.sellVolume;
    const figures: ProfileFigures = {
      tradeCount: this.tradeCount,
      buyCount: this.buyCount,
      sellCount: this.sellCount,
      totalVolume,
      avgTradeSize: this.tradeCount > 0 ? totalVolume / this.tradeCount : 0,
      avgPrice: this.tradeCount > 0 ? this.priceMicrosSum / this.tradeCount / 1e6 : 0,
      distinctMarkets: this.markets.size,
      activeDays: this.days.size,
      winRate: estimateWinRate(winRateBasis, params.estimator),
    };
    return {
      address: this.address,
      ...figures,
      buyVolume: this.buyVolume,
      sellVolume: this.sellVolume,
      firstTradeAt: this.firstTradeAt,
      lastTradeAt: this.lastTradeAt,
      winRateBasis,
      labels: deriveLabels(figures, params.thresholds),
      style: deriveStyle(figures),
      riskLevel: assessRisk(figures),
      marketFocus: topMarkets(this.markets),
      timing: timingPattern(this.timestamps),
    };
  }
}
