import { beforeEach, describe, expect, it } from 'vitest';

import { AnalyticsEngine } from '../../src/analytics/engine.js';
import { parseConfig } from '../../src/core/config.js';
import { Logger } from '../../src/core/logger.js';
import { TokenRegistry } from '../../src/indexer/token_registry.js';
import type { Side, Trade } from '../../src/types/index.js';
import { ALICE, BOB, CAROL, conditionId, DAVE, EXCHANGE, txHash } from '../helpers/logs.js';

const MARKET = conditionId(1);
const OTHER = conditionId(2);
const YES = '101';
const NO = '102';

let sequence = 0;

function trade(params: {
  maker: string;
  taker: string;
  side: Side;
  tokenId: string;
  priceMicros: number;
  size?: number;
  block?: number;
  timestamp?: number;
  market?: string;
}): Trade {
  sequence += 1;
  const block = params.block ?? 100 + sequence;
  const market = params.market ?? MARKET;
  const outcomeIndex = params.tokenId === YES || params.tokenId === '201' ? 0 : 1;
  return {
    txHash: txHash(sequence),
    logIndex: 0,
    blockNumber: block,
    timestamp: params.timestamp ?? 1_700_000_000 + block,
    exchange: EXCHANGE,
    orderHash: txHash(50_000 + sequence),
    maker: params.maker,
    taker: params.taker,
    tokenId: params.tokenId,
    conditionId: market,
    outcomeIndex,
    side: params.side,
    priceMicros: params.priceMicros,
    price: params.priceMicros / 1e6,
    size: params.size ?? 10,
    feeRaw: '0',
  };
}

function setup(overrides: Record<string, unknown> = {}) {
  const registry = new TokenRegistry();
  const markets = [
    { conditionId: MARKET, slug: 'will-it-rain', outcomeTokenIds: [YES, NO], createdBlock: 1 },
    { conditionId: OTHER, slug: 'will-it-snow', outcomeTokenIds: ['201', '202'], createdBlock: 2 },
  ];
  const config = parseConfig({ analytics: overrides });
  const engine = new AnalyticsEngine({ registry, config: config.analytics, logger: new Logger('error') });
  for (const m of markets) {
    const market = { ...m, resolution: { status: 'open' as const } };
    registry.register(market);
    engine.applyMarketCreated(market);
  }
  return { registry, engine };
}

describe('AnalyticsEngine', () => {
  beforeEach(() => {
    sequence = 0;
  });

  it('ignores a trade applied twice', () => {
    const { engine } = setup();
    const fill = trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 });

    expect(engine.applyTrade(fill)).toBe('applied');
    const profile = engine.getTraderProfile(ALICE);
    const price = engine.getLastPrice(YES);
    const stats = engine.getMarketStats(MARKET);

    expect(engine.applyTrade({ ...fill })).toBe('duplicate');
    expect(engine.getTraderProfile(ALICE)).toEqual(profile);
    expect(engine.getLastPrice(YES)).toBe(price);
    expect(engine.getMarketStats(MARKET)).toEqual(stats);
    expect(engine.getStats().duplicates).toBe(1);
  });

  it('folds both sides of a fill', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000, size: 25 }));

    const alice = engine.getTraderProfile(ALICE);
    expect(alice.tradeCount).toBe(1);
    expect(alice.buyCount).toBe(1);
    expect(alice.buyVolume).toBe(10);
    expect(alice.avgPrice).toBe(0.4);
    expect(alice.distinctMarkets).toBe(1);

    const bob = engine.getTraderProfile(BOB);
    expect(bob.sellCount).toBe(1);
    expect(bob.sellVolume).toBe(10);
  });

  it('gives the exchange contract no profile', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: EXCHANGE, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));

    expect(engine.getStats().traders).toBe(1);
    expect(engine.getTraderProfile(EXCHANGE).tradeCount).toBe(0);
  });

  it('attributes wins and losses exactly once per fill', () => {
    const { engine } = setup({ winRateEstimator: 'resolved-only' });
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));

    expect(engine.getTraderProfile(ALICE).winRate).toBeNull();

    expect(engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 0, blockNumber: 200 })).toBe('applied');
    expect(engine.getTraderProfile(ALICE).winRateBasis.resolvedWins).toBe(1);
    expect(engine.getTraderProfile(BOB).winRateBasis.resolvedLosses).toBe(1);

    // Selling the losing outcome after resolution is a win for the seller.
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'SELL', tokenId: NO, priceMicros: 10_000, block: 300 }));

    expect(engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 0, blockNumber: 200 })).toBe('duplicate');
    expect(engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 1, blockNumber: 201 })).toBe('conflict');

    const alice = engine.getTraderProfile(ALICE);
    expect(alice.winRateBasis).toEqual({ resolvedWins: 2, resolvedLosses: 0, provisionalWins: 0, provisionalLosses: 0 });
    expect(alice.winRate).toBe(1);
    expect(engine.getTraderProfile(BOB).winRateBasis.resolvedLosses).toBe(2);

    const stats = engine.getMarketStats(MARKET);
    expect(stats?.tradeCount).toBe(2);
    expect(stats?.won).toBe(2);
    expect(stats?.lost).toBe(0);
    expect(engine.getStats().conflicts).toBe(1);
    expect(engine.getStats().openFills).toBe(0);
  });

  it('marks open fills against the last traded price', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));
    engine.applyTrade(trade({ maker: CAROL, taker: DAVE, side: 'BUY', tokenId: YES, priceMicros: 550_000 }));

    const alice = engine.getTraderProfile(ALICE);
    expect(alice.winRateBasis).toEqual({ resolvedWins: 0, resolvedLosses: 0, provisionalWins: 1, provisionalLosses: 0 });
    expect(alice.winRate).toBe(1);
    expect(engine.getTraderProfile(BOB).winRate).toBe(0);
    // Flat against the mark: no basis yet.
    expect(engine.getTraderProfile(CAROL).winRate).toBeNull();
  });

  it('skips trades on markets the registry does not know', () => {
    const { engine } = setup();
    const stray = trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000, market: conditionId(9) });

    expect(engine.applyTrade(stray)).toBe('skipped');
    expect(engine.applyMarketResolved({ conditionId: conditionId(9), outcomeIndex: 0, blockNumber: 5 })).toBe('skipped');
    expect(engine.getStats().skipped).toBe(2);
    expect(engine.getStats().trades).toBe(0);
  });

  it('skips trades whose token does not match the market', () => {
    const { engine } = setup();
    const mismatched = trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: '201', priceMicros: 400_000 });

    expect(engine.applyTrade(mismatched)).toBe('skipped');
  });

  it('lists trades newest first and returns copies', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));
    engine.applyTrade(trade({ maker: CAROL, taker: BOB, side: 'SELL', tokenId: NO, priceMicros: 300_000 }));
    engine.applyTrade(trade({ maker: ALICE, taker: DAVE, side: 'BUY', tokenId: '201', priceMicros: 700_000, market: OTHER }));

    expect(engine.listTrades().map((t) => t.txHash)).toEqual([txHash(3), txHash(2), txHash(1)]);
    expect(engine.listTrades({ address: ALICE }).map((t) => t.txHash)).toEqual([txHash(3), txHash(1)]);
    expect(engine.listTrades({ conditionId: MARKET, limit: 1, offset: 1 }).map((t) => t.txHash)).toEqual([txHash(1)]);

    const copy = engine.getTrade(txHash(1), 0);
    if (!copy) throw new Error('missing trade');
    copy.priceMicros = 1;
    expect(engine.getTrade(txHash(1), 0)?.priceMicros).toBe(400_000);
    expect(engine.getTrade(txHash(1), 7)).toBeNull();
  });

  it('looks a trade up by key regardless of hash case', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));
    engine.applyTrade(trade({ maker: CAROL, taker: BOB, side: 'SELL', tokenId: NO, priceMicros: 300_000 }));

    const found = engine.getTrade(txHash(2).toUpperCase().replace('0X', '0x'), 0);
    expect(found?.txHash).toBe(txHash(2));
    expect(found?.maker).toBe(CAROL);
    expect(engine.getTrade(txHash(3), 0)).toBeNull();
  });

  it('records a self-trade as a single fill', () => {
    const { engine } = setup({ smartMoney: { minTrades: 1 } });
    engine.applyTrade(trade({ maker: ALICE, taker: ALICE, side: 'BUY', tokenId: YES, priceMicros: 400_000, size: 10 }));
    engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 0, blockNumber: 500 });

    const alice = engine.getTraderProfile(ALICE);
    expect(alice.tradeCount).toBe(1);
    expect(alice.buyCount).toBe(1);
    expect(alice.sellCount).toBe(0);
    expect(alice.totalVolume).toBe(4);
    expect(alice.winRateBasis).toEqual({ resolvedWins: 1, resolvedLosses: 0, provisionalWins: 0, provisionalLosses: 0 });
    expect(engine.getSmartMoney().map((e) => [e.address, e.windowTrades, e.windowVolume])).toEqual([[ALICE, 1, 4]]);
    expect(engine.getTraderPositions(ALICE)).toMatchObject([{ tokenId: YES, boughtSize: 10, soldSize: 0, netSize: 10 }]);
  });

  it('keeps the latest price by chain position', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000, block: 50 }));
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 300_000, block: 40 }));

    expect(engine.getLastPrice(YES)).toBe(0.4);
    expect(engine.listTrades().map((t) => t.blockNumber)).toEqual([50, 40]);
  });

  describe('arbitrage', () => {
    it('flags outcome prices summing above one', () => {
      const { engine } = setup();
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 620_000, block: 10 }));
      engine.applyTrade(trade({ maker: CAROL, taker: DAVE, side: 'BUY', tokenId: NO, priceMicros: 450_000, block: 12 }));

      expect(engine.findArbitrage(MARKET)).toEqual({
        conditionId: MARKET,
        slug: 'will-it-rain',
        prices: [0.62, 0.45],
        sum: 1.07,
        magnitude: 0.07,
        direction: 'SELL_ALL',
        computedAtBlock: 12,
      });
      expect(engine.listArbitrage().map((o) => o.conditionId)).toEqual([MARKET]);
    });

    it('needs a price for every outcome', () => {
      const { engine } = setup();
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 900_000 }));
      expect(engine.findArbitrage(MARKET)).toBeNull();
    });

    it('drops opportunities once the market resolves', () => {
      const { engine } = setup();
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 620_000 }));
      engine.applyTrade(trade({ maker: CAROL, taker: DAVE, side: 'BUY', tokenId: NO, priceMicros: 450_000 }));
      engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 0, blockNumber: 500 });

      expect(engine.findArbitrage(MARKET)).toBeNull();
      expect(engine.listArbitrage()).toEqual([]);
    });

    it('orders opportunities by magnitude', () => {
      const { engine } = setup();
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 620_000 }));
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: NO, priceMicros: 450_000 }));
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: '201', priceMicros: 400_000, market: OTHER }));
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: '202', priceMicros: 450_000, market: OTHER }));

      const list = engine.listArbitrage();
      expect(list.map((o) => [o.conditionId, o.direction, o.magnitude])).toEqual([
        [OTHER, 'BUY_ALL', 0.15],
        [MARKET, 'SELL_ALL', 0.07],
      ]);
      expect(engine.listArbitrage({ limit: 1, offset: 1 }).map((o) => o.conditionId)).toEqual([MARKET]);
    });
  });

  describe('smart money', () => {
    function feed(engine: AnalyticsEngine) {
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000, size: 100, timestamp: 1_000 }));
      engine.applyTrade(trade({ maker: ALICE, taker: CAROL, side: 'BUY', tokenId: YES, priceMicros: 500_000, size: 100, timestamp: 2_000 }));
      engine.applyTrade(trade({ maker: DAVE, taker: BOB, side: 'SELL', tokenId: YES, priceMicros: 600_000, size: 50, timestamp: 3_000 }));
      engine.applyTrade(trade({ maker: ALICE, taker: DAVE, side: 'BUY', tokenId: YES, priceMicros: 650_000, size: 10, timestamp: 4_000 }));
    }

    it('ranks deterministically for the same trade set', () => {
      const a = setup({ smartMoney: { minTrades: 1 } });
      const b = setup({ smartMoney: { minTrades: 1 } });
      feed(a.engine);
      sequence = 0;
      feed(b.engine);

      const first = a.engine.getSmartMoney();
      expect(first.map((e) => e.address)).toEqual(b.engine.getSmartMoney().map((e) => e.address));
      expect(a.engine.getSmartMoney()).toEqual(first);
      expect(first[0].address).toBe(ALICE);
      expect(first.map((e) => e.address).sort()).toEqual([ALICE, BOB, CAROL, DAVE].sort());
    });

    it('honours the window and the minimum trade count', () => {
      const { engine } = setup({ smartMoney: { minTrades: 2 } });
      feed(engine);

      // Window [2_500, 4_000]: ALICE 1, BOB 1, DAVE 2.
      const ranked = engine.getSmartMoney({ windowSeconds: 1_500 });
      expect(ranked.map((e) => e.address)).toEqual([DAVE]);
      expect(ranked[0].windowTrades).toBe(2);
      expect(ranked[0].windowVolume).toBe(36.5);
      expect(ranked[0].lastTradeAt).toBe(4_000);
    });

    it('filters by minimum win rate', () => {
      const { engine } = setup({ smartMoney: { minTrades: 1 } });
      feed(engine);

      // Marked at 0.65: ALICE 2 wins, BOB 1-1, CAROL and DAVE 1 loss each.
      expect(engine.getSmartMoney({ minWinRate: 0.5 }).map((e) => [e.address, e.winRate])).toEqual([
        [ALICE, 1],
        [BOB, 0.5],
      ]);
      expect(engine.getSmartMoney({ minWinRate: 0.75 }).map((e) => e.address)).toEqual([ALICE]);
    });

    it('counts only the requested market towards window activity', () => {
      const { engine } = setup({ smartMoney: { minTrades: 1 } });
      feed(engine);
      engine.applyTrade(
        trade({ maker: CAROL, taker: DAVE, side: 'BUY', tokenId: '201', priceMicros: 500_000, size: 10, market: OTHER, timestamp: 4_000 })
      );

      const ranked = engine.getSmartMoney({ conditionId: OTHER.toUpperCase().replace('0X', '0x') });
      expect(ranked.map((e) => [e.address, e.windowTrades, e.windowVolume])).toEqual([
        [DAVE, 1, 5],
        [CAROL, 1, 5],
      ]);
    });

    it('is empty before any trade', () => {
      const { engine } = setup();
      expect(engine.getSmartMoney()).toEqual([]);
    });
  });

  describe('positions and PnL', () => {
    function feed(engine: AnalyticsEngine) {
      engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 500_000, size: 10 }));
      engine.applyTrade(trade({ maker: ALICE, taker: CAROL, side: 'SELL', tokenId: YES, priceMicros: 750_000, size: 4 }));
      engine.applyTrade(trade({ maker: DAVE, taker: CAROL, side: 'BUY', tokenId: '201', priceMicros: 500_000, size: 10, market: OTHER }));
    }

    it('marks open positions at the last price', () => {
      const { engine } = setup();
      feed(engine);

      expect(engine.getTraderPositions(ALICE)).toEqual([
        {
          conditionId: MARKET,
          tokenId: YES,
          outcomeIndex: 0,
          trades: 2,
          boughtSize: 10,
          soldSize: 4,
          netSize: 6,
          totalCost: 5,
          totalProceeds: 3,
          avgCost: 0.5,
          markPrice: 0.75,
          currentValue: 4.5,
          realizedPnl: 1,
          unrealizedPnl: 1.5,
        },
      ]);
      expect(engine.getPortfolioPnl(ALICE)).toMatchObject({
        totalCost: 5,
        currentValue: 4.5,
        unrealizedPnl: 1.5,
        realizedPnl: 1,
        totalPnl: 2.5,
        pnlPercent: 50,
        winningPositions: 1,
        losingPositions: 0,
      });
      expect(engine.getTraderPositions(EXCHANGE)).toEqual([]);
    });

    it('ranks traders by total PnL, overall and per market', () => {
      const { engine } = setup();
      feed(engine);

      expect(engine.getPnlLeaderboard().map((e) => [e.address, e.totalPnl])).toEqual([
        [BOB, 5],
        [CAROL, 5],
        [ALICE, 2.5],
        [DAVE, 0],
      ]);
      expect(engine.getPnlLeaderboard({ conditionId: MARKET }).map((e) => [e.address, e.totalPnl])).toEqual([
        [BOB, 5],
        [ALICE, 2.5],
        [CAROL, 0],
      ]);
    });

    it('marks resolved markets at the payout', () => {
      const { engine } = setup();
      feed(engine);
      engine.applyMarketResolved({ conditionId: MARKET, outcomeIndex: 0, blockNumber: 500 });

      expect(engine.getTraderPositions(ALICE)).toMatchObject([{ markPrice: 1, currentValue: 6, unrealizedPnl: 3 }]);
      expect(engine.getPortfolioPnl(ALICE).totalPnl).toBe(4);
      expect(engine.getPnlLeaderboard({ conditionId: MARKET, limit: 2 }).map((e) => [e.address, e.totalPnl])).toEqual([
        [BOB, 5],
        [ALICE, 4],
      ]);
    });
  });

  it('ranks hot markets in a trailing window', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 500_000, size: 10, timestamp: 1_000 }));
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 500_000, size: 10, timestamp: 1_100 }));
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: '201', priceMicros: 500_000, size: 100, market: OTHER, timestamp: 1_200 }));

    const byVolume = engine.getHotMarkets({ windowSeconds: 3_600 });
    expect(byVolume.map((m) => [m.slug, m.trades, m.volume])).toEqual([
      ['will-it-snow', 1, 50],
      ['will-it-rain', 2, 10],
    ]);
    expect(byVolume[1].lastPrices).toEqual([0.5, null]);

    const byTrades = engine.getHotMarkets({ windowSeconds: 3_600, sortBy: 'trades' });
    expect(byTrades.map((m) => m.slug)).toEqual(['will-it-rain', 'will-it-snow']);

    expect(engine.getHotMarkets({ windowSeconds: 150 }).map((m) => m.slug)).toEqual(['will-it-snow', 'will-it-rain']);
    expect(engine.getHotMarkets({ windowSeconds: 50 }).map((m) => m.slug)).toEqual(['will-it-snow']);
  });

  it('replays stored events into the same state', () => {
    const { engine } = setup();
    const first = trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 });
    const second = trade({ maker: CAROL, taker: ALICE, side: 'BUY', tokenId: NO, priceMicros: 350_000 });

    const result = engine.replay([
      { blockNumber: first.blockNumber, events: [{ kind: 'TradeFilled', txHash: first.txHash, logIndex: 0, blockNumber: first.blockNumber, trade: first }] },
      {
        blockNumber: second.blockNumber,
        events: [
          { kind: 'TradeFilled', txHash: second.txHash, logIndex: 0, blockNumber: second.blockNumber, trade: second },
          { kind: 'MarketResolved', txHash: txHash(900), logIndex: 1, blockNumber: second.blockNumber, conditionId: MARKET, outcomeIndex: 0, payouts: ['1', '0'] },
        ],
      },
    ]);

    expect(result).toEqual({ applied: 3, duplicates: 0, skipped: 0, conflicts: 0 });
    expect(engine.getTraderProfile(ALICE).winRateBasis.resolvedWins).toBe(2);
  });

  it('resets derived state', () => {
    const { engine } = setup();
    engine.applyTrade(trade({ maker: ALICE, taker: BOB, side: 'BUY', tokenId: YES, priceMicros: 400_000 }));
    engine.reset();

    expect(engine.getStats()).toEqual({
      markets: 0,
      traders: 0,
      trades: 0,
      duplicates: 0,
      skipped: 0,
      conflicts: 0,
      openFills: 0,
      latestTradeAt: null,
    });
    expect(engine.getLastPrice(YES)).toBeNull();
  });
});
