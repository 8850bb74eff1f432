import { describe, expect, it } from 'vitest';

import {
  assessRisk,
  deriveLabels,
  deriveStyle,
  estimateWinRate,
  isWinningFill,
  timingPattern,
  topMarkets,
  TraderAccumulator,
  type ProfileFigures,
} from '../../src/analytics/profile.js';
import { parseConfig } from '../../src/core/config.js';

const thresholds = parseConfig({}).analytics.labels;

function figures(overrides: Partial<ProfileFigures>): ProfileFigures {
  return {
    tradeCount: 20,
    buyCount: 10,
    sellCount: 10,
    totalVolume: 2_000,
    avgTradeSize: 100,
    avgPrice: 0.5,
    distinctMarkets: 4,
    activeDays: 10,
    winRate: null,
    ...overrides,
  };
}

describe('deriveLabels', () => {
  it('tags a heavy, concentrated buyer', () => {
    const labels = deriveLabels(
      figures({
        tradeCount: 60,
        buyCount: 50,
        sellCount: 10,
        totalVolume: 120_000,
        avgTradeSize: 2_000,
        avgPrice: 0.9,
        distinctMarkets: 6,
        activeDays: 3,
        winRate: 0.7,
      }),
      thresholds
    );
    expect(labels).toEqual([
      'whale',
      'active',
      'sniper',
      'diversified',
      'high-frequency',
      'buy-biased',
      'large-orders',
      'high-win-rate',
    ]);
  });

  it('tags newcomers and sellers', () => {
    const labels = deriveLabels(
      figures({ tradeCount: 3, buyCount: 0, sellCount: 3, totalVolume: 30, avgTradeSize: 10, distinctMarkets: 1, activeDays: 1 }),
      thresholds
    );
    expect(labels).toEqual(['sell-biased', 'newcomer']);
  });

  it('needs enough trades before trusting a win rate', () => {
    const labels = deriveLabels(figures({ tradeCount: 8, buyCount: 4, sellCount: 4, winRate: 0.9 }), thresholds);
    expect(labels).toEqual([]);
  });

  it('has no labels without trades', () => {
    expect(deriveLabels(figures({ tradeCount: 0, buyCount: 0, sellCount: 0 }), thresholds)).toEqual([]);
  });

  it('follows configured thresholds', () => {
    const custom = { ...thresholds, whaleVolume: 1_000 };
    expect(deriveLabels(figures({}), custom)).toEqual(['whale']);
  });
});

describe('deriveStyle', () => {
  it('needs three trades', () => {
    expect(deriveStyle(figures({ tradeCount: 2 }))).toBe('insufficient-data');
  });

  it('spots scalpers', () => {
    expect(deriveStyle(figures({ tradeCount: 30, activeDays: 2, avgTradeSize: 50 }))).toBe('scalper');
  });

  it('spots value traders', () => {
    expect(deriveStyle(figures({ tradeCount: 10, activeDays: 10, avgTradeSize: 800 }))).toBe('value');
  });

  it('spots focused traders', () => {
    expect(deriveStyle(figures({ tradeCount: 30, activeDays: 30, distinctMarkets: 2, winRate: 0.7 }))).toBe('focused');
  });

  it('spots diversified traders', () => {
    expect(deriveStyle(figures({ distinctMarkets: 8, winRate: 0.4 }))).toBe('diversified');
  });

  it('falls back to buy/sell balance', () => {
    expect(deriveStyle(figures({ tradeCount: 30, buyCount: 15, sellCount: 15, activeDays: 30 }))).toBe('balanced');
    expect(deriveStyle(figures({ tradeCount: 30, buyCount: 25, sellCount: 5, activeDays: 30 }))).toBe('mixed');
  });
});

describe('win rate', () => {
  it('wins by holding the winner or selling a loser', () => {
    expect(isWinningFill('BUY', 0, 0)).toBe(true);
    expect(isWinningFill('BUY', 1, 0)).toBe(false);
    expect(isWinningFill('SELL', 1, 0)).toBe(true);
    expect(isWinningFill('SELL', 0, 0)).toBe(false);
  });

  it('counts provisional results only when marking to market', () => {
    const basis = { resolvedWins: 2, resolvedLosses: 1, provisionalWins: 1, provisionalLosses: 0 };
    expect(estimateWinRate(basis, 'mark-to-last-price')).toBe(0.75);
    expect(estimateWinRate(basis, 'resolved-only')).toBe(2 / 3);
    expect(
      estimateWinRate({ resolvedWins: 0, resolvedLosses: 0, provisionalWins: 0, provisionalLosses: 0 }, 'resolved-only')
    ).toBeNull();
  });
});

describe('TraderAccumulator', () => {
  it('settles held fills once', () => {
    const trader = new TraderAccumulator('0x00000000000000000000000000000000000a11ce');
    const fill = {
      conditionId: '0xc1',
      tokenId: '1',
      outcomeIndex: 0,
      side: 'BUY' as const,
      priceMicros: 300_000,
      size: 10,
      notional: 3,
      timestamp: 86_400,
    };
    trader.record(fill);
    trader.hold(fill);
    trader.record({ ...fill, side: 'SELL', timestamp: 2 * 86_400 + 5 });
    trader.hold({ ...fill, side: 'SELL' });

    expect(trader.settle('0xc1', 0)).toBe(2);
    expect(trader.settle('0xc1', 0)).toBe(0);

    const profile = trader.snapshot({ estimator: 'resolved-only', thresholds, lastPriceMicros: () => undefined });
    expect(profile.winRateBasis.resolvedWins).toBe(1);
    expect(profile.winRateBasis.resolvedLosses).toBe(1);
    expect(profile.winRate).toBe(0.5);
    expect(profile.activeDays).toBe(2);
    expect(profile.firstTradeAt).toBe(86_400);
    expect(profile.lastTradeAt).toBe(2 * 86_400 + 5);
    expect(profile.totalVolume).toBe(6);
    expect(profile.avgTradeSize).toBe(3);
    expect(profile.style).toBe('insufficient-data');
    expect(profile.riskLevel).toBe('medium');
    expect(profile.marketFocus).toEqual([{ conditionId: '0xc1', trades: 2 }]);
    expect(profile.timing).toMatchObject({ peakHour: 0, peakWeekday: 'Friday', avgIntervalSeconds: 86_405, cadence: 'long-horizon' });
  });
});

describe('assessRisk', () => {
  it('scores size, concentration, extreme prices and pace', () => {
    expect(assessRisk(figures({}))).toBe('medium');
    expect(assessRisk(figures({ distinctMarkets: 8 }))).toBe('low');
    expect(assessRisk(figures({ avgTradeSize: 600, distinctMarkets: 2 }))).toBe('medium-high');
    expect(
      assessRisk(figures({ avgTradeSize: 1_500, distinctMarkets: 1, avgPrice: 0.95, tradeCount: 40, activeDays: 2 }))
    ).toBe('high');
  });

  it('rates an address without trades as low risk', () => {
    expect(assessRisk(figures({ tradeCount: 0, distinctMarkets: 0, avgPrice: 0 }))).toBe('low');
  });
});

describe('topMarkets', () => {
  it('keeps the five most traded markets', () => {
    const counts = new Map([
      ['0xb', 2],
      ['0xa', 2],
      ['0xc', 5],
      ['0xd', 1],
      ['0xe', 1],
      ['0xf', 1],
    ]);
    expect(topMarkets(counts).map((m) => m.conditionId)).toEqual(['0xc', '0xa', '0xb', '0xd', '0xe']);
  });
});

describe('timingPattern', () => {
  // 2024-01-01T00:00:00Z, a Monday.
  const monday = 1_704_067_200;

  it('finds the busiest hour and the US-session share', () => {
    const pattern = timingPattern([monday + 15 * 3600, monday + 15 * 3600 + 60, monday + 16 * 3600, monday + 3 * 3600]);
    expect(pattern).toEqual({
      peakHour: 15,
      peakWeekday: 'Monday',
      usHoursShare: 0.75,
      newsSensitive: true,
      avgIntervalSeconds: 15_600,
      cadence: 'regular',
    });
  });

  it('averages intervals over distinct timestamps', () => {
    const pattern = timingPattern([monday, monday, monday + 60, monday + 120]);
    expect(pattern.avgIntervalSeconds).toBe(60);
    expect(pattern.cadence).toBe('high-frequency');
    expect(pattern.newsSensitive).toBe(false);
  });

  it('is empty without trades', () => {
    expect(timingPattern([])).toEqual({
      peakHour: null,
      peakWeekday: null,
      usHoursShare: 0,
      newsSensitive: false,
      avgIntervalSeconds: null,
      cadence: null,
    });
  });
});
