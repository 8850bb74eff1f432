import { ethers } from 'ethers';

import type { ChainConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import type { RawLog } from '../types/index.js';
import {
  CONDITION_PREPARATION_TOPIC,
  CONDITION_RESOLUTION_TOPIC,
  ORDER_FILLED_TOPIC,
  TOKEN_REGISTERED_TOPIC,
} from './abi.js';
import { compareLogs, FetchError, type ChainLogSource } from './log_source.js';

const RATE_LIMIT_RPC_CODES = new Set([-32005, 429]);
const INVALID_RPC_CODES = new Set([-32600, -32602]);

function prop(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function messageOf(error: unknown): string {
  const message = prop(error, 'message');
  if (typeof message === 'string') return message;
  return String(error);
}

/**
 * Maps an ethers / JSON-RPC failure onto the fetch error taxonomy. Anything
 * that cannot be recognised as a malformed request is treated as transient.
 */
export function classifyRpcError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  const message = messageOf(error);
  const lower = message.toLowerCase();
  const code = prop(error, 'code');
  const status = prop(error, 'status');
  const rpcCode = prop(prop(error, 'error'), 'code');

  if (code === 'TIMEOUT' || lower.includes('timeout') || lower.includes('timed out')) {
    return new FetchError('Timeout', message, error);
  }
  if (
    status === 429 ||
    (typeof rpcCode === 'number' && RATE_LIMIT_RPC_CODES.has(rpcCode)) ||
    lower.includes('rate limit') ||
    lower.includes('too many requests')
  ) {
    return new FetchError('RateLimited', message, error);
  }
  if (
    code === 'INVALID_ARGUMENT' ||
    (typeof rpcCode === 'number' && INVALID_RPC_CODES.has(rpcCode)) ||
    lower.includes('invalid block range') ||
    lower.includes('block range is too')
  ) {
    return new FetchError('Invalid', message, error);
  }
  return new FetchError('Timeout', `transient RPC failure: ${message}`, error);
}

interface LogFilterSpec {
  address: string;
  topics: string[];
}

export class RpcLogSource implements ChainLogSource {
  private provider: ethers.providers.JsonRpcProvider;
  private filters: LogFilterSpec[];
  private timestamps = new Map<number, number>();
  private cacheSize: number;
  private logger: Logger;

  constructor(params: {
    config: ChainConfig;
    provider?: ethers.providers.JsonRpcProvider;
    logger?: Logger;
  }) {
    const { config } = params;
    this.logger = params.logger ?? new Logger('info');
    if (params.provider) {
      this.provider = params.provider;
    } else {
      if (!config.rpcUrl) {
        throw new Error('chain.rpcUrl is not configured (set CTFLOW_RPC_URL or chain.rpcUrl).');
      }
      this.provider = new ethers.providers.StaticJsonRpcProvider(
        { url: config.rpcUrl, timeout: config.requestTimeoutMs },
        config.chainId
      );
    }
    this.cacheSize = config.blockTimestampCacheSize;
    this.filters = [
      ...config.exchangeAddresses.map((address) => ({
        address,
        topics: [ORDER_FILLED_TOPIC, TOKEN_REGISTERED_TOPIC],
      })),
      {
        address: config.conditionalTokensAddress,
        topics: [CONDITION_PREPARATION_TOPIC, CONDITION_RESOLUTION_TOPIC],
      },
    ];
  }

  async headBlock(): Promise<number> {
    try {
      return await this.provider.getBlockNumber();
    } catch (error) {
      throw classifyRpcError(error);
    }
  }

  async fetchLogs(fromBlock: number, toBlock: number): Promise<RawLog[]> {
    if (fromBlock > toBlock) {
      throw new FetchError('Invalid', `invalid block range ${fromBlock}-${toBlock}`);
    }

    const collected: ethers.providers.Log[] = [];
    try {
      for (const filter of this.filters) {
        const logs = await this.provider.getLogs({
          address: filter.address,
          topics: [filter.topics],
          fromBlock,
          toBlock,
        });
        collected.push(...logs);
      }
    } catch (error) {
      throw classifyRpcError(error);
    }

    const result: RawLog[] = [];
    for (const log of collected) {
      if (log.removed) continue;
      result.push({
        blockNumber: log.blockNumber,
        blockTimestamp: await this.blockTimestamp(log.blockNumber),
        logIndex: log.logIndex,
        transactionHash: log.transactionHash.toLowerCase(),
        address: log.address.toLowerCase(),
        topics: log.topics.map((topic) => topic.toLowerCase()),
        data: log.data,
      });
    }
    result.sort(compareLogs);
    this.logger.debug(`Fetched ${result.length} log(s) for blocks ${fromBlock}-${toBlock}`);
    return result;
  }

  private async blockTimestamp(blockNumber: number): Promise<number> {
    const cached = this.timestamps.get(blockNumber);
    if (cached !== undefined) return cached;

    let block: ethers.providers.Block | null;
    try {
      block = await this.provider.getBlock(blockNumber);
    } catch (error) {
      throw classifyRpcError(error);
    }
    if (!block) {
      throw new FetchError('Timeout', `block ${blockNumber} not available yet`);
    }

    this.timestamps.set(blockNumber, block.timestamp);
    if (this.timestamps.size > this.cacheSize) {
      const oldest = this.timestamps.keys().next();
      if (!oldest.done) this.timestamps.delete(oldest.value);
    }
    return block.timestamp;
  }
}
