import { z } from 'zod';

const addressParam = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 20-byte hex address')
  .transform((value) => value.toLowerCase());

const limit = (fallback: number, max: number) => z.number().int().min(1).max(max).default(fallback);
const offset = z.number().int().min(0).default(0);

export const MarketRefSchema = z.object({
  market: z.string().trim().min(1),
});

export const SearchMarketsSchema = z.object({
  query: z.string().trim().default(''),
  limit: limit(20, 200),
  offset,
});

export const ListTradesSchema = z.object({
  market: z.string().trim().min(1).optional(),
  address: addressParam.optional(),
  limit: limit(50, 500),
  offset,
});

export const GetTradeSchema = z.object({
  txHash: z
    .string()
    .trim()
    .regex(/^0x[0-9a-fA-F]{64}$/, 'expected a 32-byte transaction hash')
    .transform((value) => value.toLowerCase()),
  logIndex: z.number().int().min(0),
});

export const TraderSchema = z.object({
  address: addressParam,
});

export const HotMarketsSchema = z.object({
  windowHours: z.number().positive().max(24 * 365).default(24),
  limit: limit(10, 100),
  sortBy: z.enum(['volume', 'trades']).default('volume'),
});

export const ArbitrageSchema = z.object({
  limit: limit(20, 200),
  offset,
});

export const SmartMoneySchema = z.object({
  windowHours: z.number().positive().max(24 * 365).optional(),
  limit: z.number().int().min(1).max(200).optional(),
  minTrades: z.number().int().min(0).optional(),
  market: z.string().trim().min(1).optional(),
  minWinRate: z.number().min(0).max(1).optional(),
});

export const PositionsSchema = z.object({
  address: addressParam,
  includeClosed: z.boolean().default(false),
});

export const PnlLeaderboardSchema = z.object({
  market: z.string().trim().min(1).optional(),
  limit: limit(20, 200),
});
