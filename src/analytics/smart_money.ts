import type { SmartMoneyEntry } from '../types/index.js';

export interface SmartMoneyWeights {
  winRate: number;
  volume: number;
  recency: number;
}

export interface SmartMoneyCandidate {
  address: string;
  winRate: number | null;
  windowVolume: number;
  windowTrades: number;
  lastTradeAt: number;
}

export interface RankOptions {
  now: number;
  windowSeconds: number;
  weights: SmartMoneyWeights;
  minTrades: number;
  /** Drops candidates below this win rate, and those without one. */
  minWinRate?: number;
  limit: number;
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Composite of win rate, log-scaled window volume (relative to the largest
 * in the window) and recency. Sorted by score, then volume, then address.
 */
export function rankSmartMoney(candidates: SmartMoneyCandidate[], options: RankOptions): SmartMoneyEntry[] {
  const minWinRate = options.minWinRate;
  const eligible = candidates.filter(
    (c) =>
      c.windowTrades > 0 &&
      c.windowTrades >= options.minTrades &&
      (minWinRate === undefined || (c.winRate !== null && c.winRate >= minWinRate))
  );
  const maxVolume = eligible.reduce((max, c) => Math.max(max, c.windowVolume), 0);
  const volumeDenominator = Math.log10(1 + maxVolume);

  const scored = eligible.map((candidate): SmartMoneyEntry => {
    const volumeScore = volumeDenominator > 0 ? Math.log10(1 + candidate.windowVolume) / volumeDenominator : 0;
    const age = Math.max(0, options.now - candidate.lastTradeAt);
    const recency = options.windowSeconds > 0 ? Math.max(0, 1 - age / options.windowSeconds) : 0;
    const score =
      options.weights.winRate * (candidate.winRate ?? 0) +
      options.weights.volume * volumeScore +
      options.weights.recency * recency;
    return {
      address: candidate.address,
      score: round6(score),
      winRate: candidate.winRate,
      windowVolume: candidate.windowVolume,
      windowTrades: candidate.windowTrades,
      lastTradeAt: candidate.lastTradeAt,
    };
  });

  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (b.windowVolume !== a.windowVolume) return b.windowVolume - a.windowVolume;
    return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
  });

  return scored.slice(0, options.limit);
}
