import type { PnlLeaderboardEntry, PortfolioPnl, TraderPosition } from '../types/index.js';
import type { Fill } from './profile.js';

/** Price an open position is marked at, in [0, 1]; null when nothing is known. */
export type MarkPrice = (tokenId: string) => number | null;

/** Net sizes below this are treated as closed. */
export const CLOSED_POSITION_EPSILON = 0.001;

interface PositionTally {
  conditionId: string;
  tokenId: string;
  outcomeIndex: number;
  trades: number;
  bought: number;
  sold: number;
  cost: number;
  proceeds: number;
}

export function isOpenPosition(position: TraderPosition): boolean {
  return Math.abs(position.netSize) >= CLOSED_POSITION_EPSILON;
}

/**
 * Folds one address's fills into per-token positions, in first-fill order.
 * Realized PnL prices sold size at the average buy cost; unrealized PnL
 * marks the remaining long size.
 */
export function buildPositions(
  fills: readonly Fill[],
  mark: MarkPrice,
  options: { includeClosed?: boolean } = {}
): TraderPosition[] {
  const tallies = new Map<string, PositionTally>();
  for (const fill of fills) {
    let tally = tallies.get(fill.tokenId);
    if (!tally) {
      tally = {
        conditionId: fill.conditionId,
        tokenId: fill.tokenId,
        outcomeIndex: fill.outcomeIndex,
        trades: 0,
        bought: 0,
        sold: 0,
        cost: 0,
        proceeds: 0,
      };
      tallies.set(fill.tokenId, tally);
    }
    tally.trades += 1;
    if (fill.side === 'BUY') {
      tally.bought += fill.size;
      tally.cost += fill.notional;
    } else {
      tally.sold += fill.size;
      tally.proceeds += fill.notional;
    }
  }

  const positions: TraderPosition[] = [];
  for (const tally of tallies.values()) {
    const avgCost = tally.bought > 0 ? tally.cost / tally.bought : 0;
    const netSize = tally.bought - tally.sold;
    const markPrice = mark(tally.tokenId) ?? avgCost;
    const currentValue = netSize > 0 ? netSize * markPrice : 0;
    const position: TraderPosition = {
      conditionId: tally.conditionId,
      tokenId: tally.tokenId,
      outcomeIndex: tally.outcomeIndex,
      trades: tally.trades,
      boughtSize: tally.bought,
      soldSize: tally.sold,
      netSize,
      totalCost: tally.cost,
      totalProceeds: tally.proceeds,
      avgCost,
      markPrice,
      currentValue,
      realizedPnl: tally.proceeds - tally.sold * avgCost,
      unrealizedPnl: netSize > 0 ? currentValue - netSize * avgCost : 0,
    };
    if (options.includeClosed || isOpenPosition(position)) {
      positions.push(position);
    }
  }
  return positions;
}

/** `positions` must include closed ones so their realized PnL is counted. */
export function summarizePortfolio(address: string, positions: readonly TraderPosition[]): PortfolioPnl {
  const open = positions
    .filter(isOpenPosition)
    .sort((a, b) => b.unrealizedPnl - a.unrealizedPnl || (a.tokenId < b.tokenId ? -1 : a.tokenId > b.tokenId ? 1 : 0));

  let totalCost = 0;
  let realizedPnl = 0;
  for (const position of positions) {
    totalCost += position.totalCost;
    realizedPnl += position.realizedPnl;
  }

  let currentValue = 0;
  let unrealizedPnl = 0;
  let winningPositions = 0;
  for (const position of open) {
    currentValue += position.currentValue;
    unrealizedPnl += position.unrealizedPnl;
    if (position.unrealizedPnl >= 0) winningPositions += 1;
  }

  const totalPnl = realizedPnl + unrealizedPnl;
  return {
    address,
    positions: open,
    totalCost,
    currentValue,
    unrealizedPnl,
    realizedPnl,
    totalPnl,
    pnlPercent: totalCost > 0 ? (totalPnl / totalCost) * 100 : 0,
    winningPositions,
    losingPositions: open.length - winningPositions,
  };
}

/** Highest total PnL first; ties by address. */
export function rankPnl(portfolios: readonly PortfolioPnl[], limit: number): PnlLeaderboardEntry[] {
  return portfolios
    .map(
      (portfolio): PnlLeaderboardEntry => ({
        address: portfolio.address,
        totalPnl: portfolio.totalPnl,
        realizedPnl: portfolio.realizedPnl,
        unrealizedPnl: portfolio.unrealizedPnl,
        pnlPercent: portfolio.pnlPercent,
        openPositions: portfolio.positions.length,
      })
    )
    .sort((a, b) => b.totalPnl - a.totalPnl || (a.address < b.address ? -1 : a.address > b.address ? 1 : 0))
    .slice(0, limit);
}
