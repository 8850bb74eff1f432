import type { ArbitrageOpportunity, Market } from '../types/index.js';

const ONE_MICROS = 1_000_000;

export function thresholdToMicros(threshold: number): number {
  return Math.round(threshold * ONE_MICROS);
}

/**
 * Flags a market whose latest outcome prices do not sum to 1. Prices are
 * summed in micro-units so the comparison against the threshold is exact.
 * Returns null for resolved markets and while any outcome has no price.
 */
export function evaluateArbitrage(
  market: Market,
  outcomePriceMicros: Array<number | undefined>,
  thresholdMicros: number,
  computedAtBlock: number
): ArbitrageOpportunity | null {
  if (market.resolution.status === 'resolved') return null;
  if (market.outcomeTokenIds.length < 2) return null;

  const prices: number[] = [];
  for (const micros of outcomePriceMicros) {
    if (micros === undefined) return null;
    prices.push(micros);
  }

  const sumMicros = prices.reduce((total, micros) => total + micros, 0);
  const deviation = sumMicros - ONE_MICROS;
  if (Math.abs(deviation) <= thresholdMicros) return null;

  return {
    conditionId: market.conditionId,
    slug: market.slug,
    prices: prices.map((micros) => micros / ONE_MICROS),
    sum: sumMicros / ONE_MICROS,
    magnitude: Math.abs(deviation) / ONE_MICROS,
    direction: deviation > 0 ? 'SELL_ALL' : 'BUY_ALL',
    computedAtBlock,
  };
}
