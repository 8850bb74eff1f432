import { ethers } from 'ethers';

import {
  CONDITION_PREPARATION_TOPIC,
  CONDITION_RESOLUTION_TOPIC,
  CONDITIONAL_TOKENS_INTERFACE,
  EXCHANGE_INTERFACE,
  ORDER_FILLED_TOPIC,
  TOKEN_REGISTERED_TOPIC,
} from '../chain/abi.js';
import { deriveOutcomeTokenIds, normalizeBytes32, normalizeTokenId } from '../chain/token_ids.js';
import type { DomainEvent, LogPosition, OutcomeToken, RawLog, Side } from '../types/index.js';

export const PRICE_DECIMALS = 6;
const PRICE_SCALE = 10n ** BigInt(PRICE_DECIMALS);
const PRICE_SCALE_NUMBER = Number(PRICE_SCALE);
const SHARE_SCALE_NUMBER = 1e6;

export type DecodeErrorKind = 'InvalidPrice' | 'UnknownToken' | 'MalformedLog';

export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
    public readonly tokenId?: string
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export type DecodeResult = { ok: true; event: DomainEvent } | { ok: false; error: DecodeError };

export interface TokenLookup {
  resolve(tokenId: string): OutcomeToken | undefined;
}

export interface DecodeOptions {
  collateralToken: string;
}

type KnownSignature = 'OrderFilled' | 'TokenRegistered' | 'ConditionPreparation' | 'ConditionResolution';

const SIGNATURES = new Map<string, KnownSignature>([
  [ORDER_FILLED_TOPIC, 'OrderFilled'],
  [TOKEN_REGISTERED_TOPIC, 'TokenRegistered'],
  [CONDITION_PREPARATION_TOPIC, 'ConditionPreparation'],
  [CONDITION_RESOLUTION_TOPIC, 'ConditionResolution'],
]);

// ============================================================================
// Fixed-point prices
// ============================================================================

/** Collateral per share in micro-units, truncated; null when no shares moved. */
export function computePriceMicros(collateralAmount: bigint, tokenAmount: bigint): bigint | null {
  if (tokenAmount <= 0n) return null;
  return (collateralAmount * PRICE_SCALE) / tokenAmount;
}

export function isValidPriceMicros(micros: bigint | number): boolean {
  const value = BigInt(micros);
  return value > 0n && value < PRICE_SCALE;
}

export function decodePrice(micros: number): number {
  return micros / PRICE_SCALE_NUMBER;
}

export function encodePrice(price: number): number {
  return Math.round(price * PRICE_SCALE_NUMBER);
}

// ============================================================================
// Argument helpers
// ============================================================================

function parseWith(iface: ethers.utils.Interface, log: RawLog): ethers.utils.LogDescription | DecodeError {
  try {
    return iface.parseLog({ topics: log.topics, data: log.data });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return new DecodeError('MalformedLog', `cannot parse log ${log.transactionHash}:${log.logIndex}: ${reason}`);
  }
}

function bigArg(parsed: ethers.utils.LogDescription, name: string): bigint {
  const value: unknown = parsed.args[name];
  if (ethers.BigNumber.isBigNumber(value)) {
    return value.toBigInt();
  }
  throw new DecodeError('MalformedLog', `argument ${name} is not an integer`);
}

function stringArg(parsed: ethers.utils.LogDescription, name: string): string {
  const value: unknown = parsed.args[name];
  if (typeof value === 'string') {
    return value;
  }
  throw new DecodeError('MalformedLog', `argument ${name} is not a string`);
}

function bigArrayArg(parsed: ethers.utils.LogDescription, name: string): bigint[] {
  const value: unknown = parsed.args[name];
  if (!Array.isArray(value)) {
    throw new DecodeError('MalformedLog', `argument ${name} is not an array`);
  }
  return value.map((item: unknown) => {
    if (ethers.BigNumber.isBigNumber(item)) return item.toBigInt();
    throw new DecodeError('MalformedLog', `argument ${name} holds a non-integer`);
  });
}

function positionOf(log: RawLog): LogPosition {
  return { txHash: log.transactionHash.toLowerCase(), logIndex: log.logIndex, blockNumber: log.blockNumber };
}

// ============================================================================
// Per-signature decoders
// ============================================================================

function decodeOrderFilled(log: RawLog, registry: TokenLookup): DecodeResult {
  const parsed = parseWith(EXCHANGE_INTERFACE, log);
  if (parsed instanceof DecodeError) return { ok: false, error: parsed };

  const makerAssetId = bigArg(parsed, 'makerAssetId');
  const takerAssetId = bigArg(parsed, 'takerAssetId');
  const makerAmount = bigArg(parsed, 'makerAmountFilled');
  const takerAmount = bigArg(parsed, 'takerAmountFilled');

  let side: Side;
  let tokenId: bigint;
  let collateral: bigint;
  let shares: bigint;
  if (makerAssetId === 0n && takerAssetId !== 0n) {
    side = 'BUY';
    tokenId = takerAssetId;
    collateral = makerAmount;
    shares = takerAmount;
  } else if (takerAssetId === 0n && makerAssetId !== 0n) {
    side = 'SELL';
    tokenId = makerAssetId;
    collateral = takerAmount;
    shares = makerAmount;
  } else {
    return {
      ok: false,
      error: new DecodeError('MalformedLog', `fill ${log.transactionHash}:${log.logIndex} has no single collateral leg`),
    };
  }

  const micros = computePriceMicros(collateral, shares);
  if (micros === null || !isValidPriceMicros(micros)) {
    return {
      ok: false,
      error: new DecodeError(
        'InvalidPrice',
        `fill ${log.transactionHash}:${log.logIndex} prices outside (0,1): ${collateral}/${shares}`
      ),
    };
  }

  const tokenKey = tokenId.toString();
  const token = registry.resolve(tokenKey);
  if (!token) {
    return { ok: false, error: new DecodeError('UnknownToken', `unknown outcome token ${tokenKey}`, tokenKey) };
  }

  const priceMicros = Number(micros);
  return {
    ok: true,
    event: {
      kind: 'TradeFilled',
      ...positionOf(log),
      trade: {
        ...positionOf(log),
        timestamp: log.blockTimestamp,
        exchange: log.address.toLowerCase(),
        orderHash: stringArg(parsed, 'orderHash').toLowerCase(),
        maker: stringArg(parsed, 'maker').toLowerCase(),
        taker: stringArg(parsed, 'taker').toLowerCase(),
        tokenId: tokenKey,
        conditionId: token.conditionId,
        outcomeIndex: token.outcomeIndex,
        side,
        priceMicros,
        price: decodePrice(priceMicros),
        size: Number(shares) / SHARE_SCALE_NUMBER,
        feeRaw: bigArg(parsed, 'fee').toString(),
      },
    },
  };
}

function decodeTokenRegistered(log: RawLog): DecodeResult {
  const parsed = parseWith(EXCHANGE_INTERFACE, log);
  if (parsed instanceof DecodeError) return { ok: false, error: parsed };

  const conditionId = normalizeBytes32(stringArg(parsed, 'conditionId'));
  const outcomeTokenIds = [normalizeTokenId(bigArg(parsed, 'token0')), normalizeTokenId(bigArg(parsed, 'token1'))];
  if (outcomeTokenIds[0] === outcomeTokenIds[1]) {
    return { ok: false, error: new DecodeError('MalformedLog', `token pair for ${conditionId} is not distinct`) };
  }

  return {
    ok: true,
    event: {
      kind: 'MarketCreated',
      source: 'TokenRegistered',
      ...positionOf(log),
      market: {
        conditionId,
        slug: conditionId,
        outcomeTokenIds,
        resolution: { status: 'open' },
        createdBlock: log.blockNumber,
      },
    },
  };
}

function decodeConditionPreparation(log: RawLog, options: DecodeOptions): DecodeResult {
  const parsed = parseWith(CONDITIONAL_TOKENS_INTERFACE, log);
  if (parsed instanceof DecodeError) return { ok: false, error: parsed };

  const conditionId = normalizeBytes32(stringArg(parsed, 'conditionId'));
  const slots = bigArg(parsed, 'outcomeSlotCount');
  if (slots < 2n || slots > 256n) {
    return { ok: false, error: new DecodeError('MalformedLog', `condition ${conditionId} has ${slots} outcome slot(s)`) };
  }

  return {
    ok: true,
    event: {
      kind: 'MarketCreated',
      source: 'ConditionPreparation',
      ...positionOf(log),
      market: {
        conditionId,
        slug: conditionId,
        outcomeTokenIds: deriveOutcomeTokenIds(conditionId, Number(slots), options.collateralToken),
        resolution: { status: 'open' },
        createdBlock: log.blockNumber,
      },
    },
  };
}

function decodeConditionResolution(log: RawLog): DecodeResult {
  const parsed = parseWith(CONDITIONAL_TOKENS_INTERFACE, log);
  if (parsed instanceof DecodeError) return { ok: false, error: parsed };

  const conditionId = normalizeBytes32(stringArg(parsed, 'conditionId'));
  const payouts = bigArrayArg(parsed, 'payoutNumerators');
  const winners = payouts.flatMap((payout, index) => (payout > 0n ? [index] : []));
  if (winners.length !== 1) {
    return {
      ok: false,
      error: new DecodeError(
        'MalformedLog',
        `condition ${conditionId} payout vector [${payouts.join(',')}] has no single winning outcome`
      ),
    };
  }

  return {
    ok: true,
    event: {
      kind: 'MarketResolved',
      ...positionOf(log),
      conditionId,
      outcomeIndex: winners[0],
      payouts: payouts.map((payout) => payout.toString()),
    },
  };
}

function assertNever(value: never): never {
  throw new Error(`unhandled event signature: ${String(value)}`);
}

/**
 * Decodes one raw log into a domain event. Reads the registry, never mutates
 * it.
 */
export function decodeLog(log: RawLog, registry: TokenLookup, options: DecodeOptions): DecodeResult {
  const topic = log.topics[0]?.toLowerCase() ?? null;
  const signature = topic ? SIGNATURES.get(topic) : undefined;
  if (!signature) {
    return { ok: true, event: { kind: 'Unrecognized', topic, ...positionOf(log) } };
  }

  try {
    switch (signature) {
      case 'OrderFilled':
        return decodeOrderFilled(log, registry);
      case 'TokenRegistered':
        return decodeTokenRegistered(log);
      case 'ConditionPreparation':
        return decodeConditionPreparation(log, options);
      case 'ConditionResolution':
        return decodeConditionResolution(log);
      default:
        return assertNever(signature);
    }
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new DecodeError('MalformedLog', reason) };
  }
}
