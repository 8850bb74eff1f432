import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

export const CTF_EXCHANGE_ADDRESS = '0x4bfb41d5b3570defd03c39a9a4d8de6bd8b8982e';
export const NEG_RISK_EXCHANGE_ADDRESS = '0xc5d563a36ae78145c45a50134d48a1215220f80a';
export const CONDITIONAL_TOKENS_ADDRESS = '0x4d97dcd97ec945f40cf65f87097ace5ea0476045';
export const USDC_E_ADDRESS = '0x2791bca1f2de4661ed88a30c99a7a9449aa84174';

const DEFAULT_CONFIG_PATH = join(homedir(), '.ctflow', 'config.yaml');

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const address = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 20-byte hex address')
  .transform((value) => value.toLowerCase());

const ConfigSchema = z.object({
  chain: z
    .object({
      rpcUrl: z.string().optional(),
      chainId: z.number().int().default(137),
      requestTimeoutMs: z.number().int().positive().default(15_000),
      exchangeAddresses: z.array(address).default([CTF_EXCHANGE_ADDRESS, NEG_RISK_EXCHANGE_ADDRESS]),
      conditionalTokensAddress: address.default(CONDITIONAL_TOKENS_ADDRESS),
      collateralToken: address.default(USDC_E_ADDRESS),
      blockTimestampCacheSize: z.number().int().positive().default(5_000),
    })
    .default({}),
  indexer: z
    .object({
      source: z.string().default('polygon-ctf'),
      startBlock: z.number().int().nonnegative().optional(),
      initialLookbackBlocks: z.number().int().nonnegative().default(1_000),
      batchSize: z.number().int().positive().default(1_000),
      pollIntervalMs: z.number().int().positive().default(2_000),
      maxPollIntervalMs: z.number().int().positive().default(30_000),
      backoffBaseMs: z.number().int().positive().default(1_000),
      backoffMaxMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  analytics: z
    .object({
      arbitrageThreshold: z.number().min(0).max(1).default(0.02),
      winRateEstimator: z.enum(['mark-to-last-price', 'resolved-only']).default('mark-to-last-price'),
      // Exchange contracts show up as takers on matched orders.
      ignoredAddresses: z.array(address).default([CTF_EXCHANGE_ADDRESS, NEG_RISK_EXCHANGE_ADDRESS]),
      smartMoney: z
        .object({
          windowHours: z.number().positive().default(168),
          minTrades: z.number().int().nonnegative().default(3),
          limit: z.number().int().positive().default(20),
          weights: z
            .object({
              winRate: z.number().min(0).default(0.5),
              volume: z.number().min(0).default(0.3),
              recency: z.number().min(0).default(0.2),
            })
            .default({}),
        })
        .default({}),
      labels: z
        .object({
          whaleVolume: z.number().default(10_000),
          activeTrades: z.number().default(50),
          sniperPrice: z.number().default(0.15),
          diversifiedMarkets: z.number().default(5),
          highFrequencyPerDay: z.number().default(10),
          largeOrderSize: z.number().default(1_000),
          newcomerTrades: z.number().default(5),
          highWinRate: z.number().default(0.6),
          minTradesForWinRate: z.number().default(10),
        })
        .default({}),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().default('~/.ctflow/ctflow.sqlite'),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type CtflowConfig = z.infer<typeof ConfigSchema>;
export type AnalyticsConfig = CtflowConfig['analytics'];
export type IndexerConfig = CtflowConfig['indexer'];
export type ChainConfig = CtflowConfig['chain'];
export type LabelThresholds = AnalyticsConfig['labels'];

export function parseConfig(raw: unknown): CtflowConfig {
  const cfg = ConfigSchema.parse(raw ?? {});
  cfg.memory.dbPath = expandHome(cfg.memory.dbPath);
  return cfg;
}

export function loadConfig(configPath?: string): CtflowConfig {
  const explicit = configPath ?? process.env.CTFLOW_CONFIG_PATH;
  const path = explicit ?? DEFAULT_CONFIG_PATH;

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  const cfg = parseConfig(parsed);

  const envRpc = process.env.CTFLOW_RPC_URL;
  if (envRpc) {
    cfg.chain.rpcUrl = envRpc;
  }
  const envDb = process.env.CTFLOW_DB_PATH;
  if (envDb) {
    cfg.memory.dbPath = expandHome(envDb);
  }
  const envLevel = process.env.CTFLOW_LOG_LEVEL?.toLowerCase();
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    cfg.log.level = envLevel;
  }

  return cfg;
}
