import type { Market, MarketCreatedSource, OutcomeToken } from '../types/index.js';
import type { TokenLookup } from './decoder.js';

export type RegisterResult = 'registered' | 'relinked' | 'exists' | 'conflict';

function cloneMarket(market: Market): Market {
  return {
    ...market,
    outcomeTokenIds: [...market.outcomeTokenIds],
    resolution: { ...market.resolution },
  };
}

/**
 * Outcome-token identity: token id -> (market, outcome index). Registration
 * is idempotent by condition id. Ids the exchange registers take precedence
 * over ids derived from a condition preparation: a `TokenRegistered` market
 * relinks a condition first seen through `ConditionPreparation`, and the
 * derived ids stay resolvable as aliases.
 */
export class TokenRegistry implements TokenLookup {
  private markets = new Map<string, Market>();
  private sources = new Map<string, MarketCreatedSource>();
  private tokens = new Map<string, OutcomeToken>();

  register(market: Market, source: MarketCreatedSource = 'TokenRegistered'): RegisterResult {
    if (market.outcomeTokenIds.length < 2) {
      throw new Error(`market ${market.conditionId} needs at least two outcomes`);
    }
    const existing = this.markets.get(market.conditionId);
    if (existing) {
      return this.relink(existing, market, source);
    }
    if (this.claimedElsewhere(market)) {
      return 'conflict';
    }

    const stored = cloneMarket(market);
    this.markets.set(stored.conditionId, stored);
    this.sources.set(stored.conditionId, source);
    this.mapTokens(stored);
    return 'registered';
  }

  resolve(tokenId: string): OutcomeToken | undefined {
    const token = this.tokens.get(tokenId);
    return token ? { ...token } : undefined;
  }

  getMarket(conditionId: string): Market | undefined {
    const market = this.markets.get(conditionId.toLowerCase());
    return market ? cloneMarket(market) : undefined;
  }

  findBySlug(slug: string): Market | undefined {
    for (const market of this.markets.values()) {
      if (market.slug === slug) return cloneMarket(market);
    }
    return undefined;
  }

  listMarkets(): Market[] {
    return Array.from(this.markets.values(), cloneMarket);
  }

  /**
   * Records a resolution. Returns false when the market is unknown or was
   * already resolved (resolved markets are immutable).
   */
  markResolved(conditionId: string, outcomeIndex: number, resolvedBlock: number): boolean {
    const market = this.markets.get(conditionId);
    if (!market || market.resolution.status === 'resolved') return false;
    if (outcomeIndex < 0 || outcomeIndex >= market.outcomeTokenIds.length) return false;
    market.resolution = { status: 'resolved', outcomeIndex, resolvedBlock };
    return true;
  }

  sourceOf(conditionId: string): MarketCreatedSource | undefined {
    return this.sources.get(conditionId.toLowerCase());
  }

  size(): number {
    return this.markets.size;
  }

  clear(): void {
    this.markets.clear();
    this.sources.clear();
    this.tokens.clear();
  }

  private relink(existing: Market, market: Market, source: MarketCreatedSource): RegisterResult {
    if (source !== 'TokenRegistered' || this.sources.get(existing.conditionId) !== 'ConditionPreparation') {
      return 'exists';
    }
    if (market.outcomeTokenIds.length !== existing.outcomeTokenIds.length) {
      return 'exists';
    }
    if (this.claimedElsewhere(market)) {
      return 'conflict';
    }

    this.sources.set(existing.conditionId, source);
    if (market.outcomeTokenIds.every((tokenId, index) => existing.outcomeTokenIds[index] === tokenId)) {
      return 'exists';
    }
    existing.outcomeTokenIds = [...market.outcomeTokenIds];
    this.mapTokens(existing);
    return 'relinked';
  }

  private claimedElsewhere(market: Market): boolean {
    return market.outcomeTokenIds.some((tokenId) => {
      const token = this.tokens.get(tokenId);
      return token !== undefined && token.conditionId !== market.conditionId;
    });
  }

  private mapTokens(market: Market): void {
    market.outcomeTokenIds.forEach((tokenId, outcomeIndex) => {
      this.tokens.set(tokenId, { tokenId, conditionId: market.conditionId, outcomeIndex });
    });
  }
}
