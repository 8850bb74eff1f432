#!/usr/bin/env node
import 'dotenv/config';
/**
 * ctflow CLI
 *
 * Runs the indexer and queries the derived analytics.
 */

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { RpcLogSource } from '../chain/rpc_source.js';
import { deriveOutcomeTokenIds, normalizeBytes32 } from '../chain/token_ids.js';
import { loadConfig } from '../core/config.js';
import { Runtime } from '../core/runtime.js';
import { closeDatabases } from '../memory/db.js';

function formatPrice(price: number | null): string {
  return price === null ? '-' : price.toFixed(4);
}

function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', { maximumFractionDigits: 2 })}`;
}

function formatTime(unixSeconds: number | null): string {
  return unixSeconds === null ? '-' : new Date(unixSeconds * 1000).toISOString();
}

interface SmartMoneyOptions {
  window?: string;
  limit?: string;
  minTrades?: string;
  market?: string;
  minWinRate?: string;
}

function toInt(raw: string, name: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return value;
}

function toPositive(raw: string, name: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return value;
}

const program = new Command();
const config = loadConfig();

function openRuntime(): Runtime {
  const runtime = new Runtime(config);
  runtime.restore();
  return runtime;
}

program
  .name('ctflow')
  .description('Prediction-market exchange indexer and trader analytics')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file (overrides CTFLOW_CONFIG_PATH)')
  .hook('preAction', (command) => {
    const path: unknown = command.opts().config;
    if (typeof path === 'string') {
      Object.assign(config, loadConfig(path));
    }
  });

// ============================================================================
// Indexer
// ============================================================================

program
  .command('run')
  .description('Index exchange events from the configured RPC endpoint')
  .option('--once', 'Process a single block range and exit', false)
  .action(async (options: { once: boolean }) => {
    const runtime = openRuntime();
    const source = new RpcLogSource({ config: config.chain, logger: runtime.logger.child('rpc') });
    const indexer = runtime.attachIndexer(source);

    if (options.once) {
      const outcome = await indexer.runOnce();
      switch (outcome.kind) {
        case 'applied':
          console.log(
            `Indexed blocks ${outcome.batch.fromBlock}-${outcome.batch.toBlock}: ` +
              `${outcome.batch.trades} trade(s), ${outcome.batch.marketsCreated} new market(s), ` +
              `${outcome.batch.decodeErrors} skipped log(s)`
          );
          break;
        case 'caughtUp':
          console.log(`Already at head block ${outcome.head}.`);
          break;
        case 'backoff':
          console.log(`Fetch failed: ${outcome.error.message}`);
          process.exitCode = 1;
          break;
        case 'persistFailed':
        case 'fatal':
          console.log(`Indexer stopped: ${outcome.error.message}`);
          process.exitCode = 1;
          break;
      }
      closeDatabases();
      return;
    }

    indexer.on('batch', (batch) => {
      runtime.logger.info(
        `Blocks ${batch.fromBlock}-${batch.toBlock}: ${batch.trades} trade(s), cursor ${batch.cursor.blockNumber}:${batch.cursor.logIndex}`
      );
    });
    indexer.on('fatal', () => {
      process.exitCode = 1;
    });

    const shutdown = () => indexer.stop();
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    indexer.start();
    await indexer.whenStopped();
    closeDatabases();
  });

program
  .command('status')
  .description('Show cursor and stored state')
  .action(() => {
    const runtime = openRuntime();
    const cursor = runtime.cursorStore.load();
    const status = runtime.readApi.getIndexerStatus();
    console.log('Pipeline Status');
    console.log('─'.repeat(40));
    console.log(`Source: ${config.indexer.source}`);
    console.log(`Cursor: ${cursor ? `${cursor.blockNumber}:${cursor.logIndex}` : 'none'}`);
    console.log(`Markets: ${status.markets}`);
    console.log(`Traders: ${status.engine.traders}`);
    console.log(`Trades: ${status.engine.trades}`);
    console.log(`Open fills: ${status.engine.openFills}`);
    console.log(`Latest trade: ${formatTime(status.engine.latestTradeAt)}`);
  });

// ============================================================================
// Analytics
// ============================================================================

program
  .command('trader <address>')
  .description('Show a trader profile')
  .action((address: string) => {
    const profile = openRuntime().readApi.getTraderProfile({ address });
    console.log(`Trader: ${profile.address}`);
    console.log('─'.repeat(60));
    console.log(`Trades: ${profile.tradeCount} (${profile.buyCount} buy / ${profile.sellCount} sell)`);
    console.log(`Volume: ${formatUsd(profile.totalVolume)}`);
    console.log(`Markets: ${profile.distinctMarkets}`);
    console.log(`Avg price: ${formatPrice(profile.avgPrice)}`);
    console.log(`Win rate: ${profile.winRate === null ? '-' : `${(profile.winRate * 100).toFixed(1)}%`}`);
    console.log(`Style: ${profile.style}`);
    console.log(`Labels: ${profile.labels.length > 0 ? profile.labels.join(', ') : 'none'}`);
    console.log(`Active: ${formatTime(profile.firstTradeAt)} → ${formatTime(profile.lastTradeAt)}`);
    console.log(`Risk: ${profile.riskLevel}`);
    if (profile.marketFocus.length > 0) {
      console.log(`Focus: ${profile.marketFocus.map((m) => `${m.conditionId} (${m.trades})`).join(', ')}`);
    }
    const timing = profile.timing;
    if (timing.peakHour !== null) {
      console.log(
        `Timing: peak ${String(timing.peakHour).padStart(2, '0')}:00 UTC on ${timing.peakWeekday ?? '-'}, ` +
          `${(timing.usHoursShare * 100).toFixed(0)}% in US hours${timing.newsSensitive ? ' (news-sensitive)' : ''}, ` +
          `cadence ${timing.cadence ?? '-'}`
      );
    }
  });

program
  .command('positions <address>')
  .description('Show open positions and PnL for an address')
  .option('-a, --all', 'Include closed positions', false)
  .action((address: string, options: { all: boolean }) => {
    const api = openRuntime().readApi;
    const portfolio = api.getPortfolioPnl({ address });
    const positions = options.all ? api.getTraderPositions({ address, includeClosed: true }) : portfolio.positions;
    console.log(`Positions: ${portfolio.address}`);
    console.log('─'.repeat(60));
    if (positions.length === 0) {
      console.log('No positions.');
    }
    for (const position of positions) {
      console.log(
        `${position.conditionId} #${position.outcomeIndex} | net ${position.netSize.toFixed(2)} @ ${formatPrice(position.avgCost)} ` +
          `→ ${formatPrice(position.markPrice)} | unrealized ${formatUsd(position.unrealizedPnl)} | realized ${formatUsd(position.realizedPnl)}`
      );
    }
    console.log('─'.repeat(60));
    console.log(`Cost: ${formatUsd(portfolio.totalCost)} | Value: ${formatUsd(portfolio.currentValue)}`);
    console.log(
      `PnL: ${formatUsd(portfolio.totalPnl)} (${portfolio.pnlPercent.toFixed(1)}%) | ` +
        `${portfolio.winningPositions} winning / ${portfolio.losingPositions} losing`
    );
  });

program
  .command('pnl-leaderboard')
  .description('Rank addresses by total PnL')
  .option('--market <ref>', 'Restrict to one market (slug or condition id)')
  .option('-l, --limit <number>', 'Limit results', '20')
  .action((options: { market?: string; limit: string }) => {
    const entries = openRuntime().readApi.getPnlLeaderboard({
      market: options.market,
      limit: toInt(options.limit, 'limit'),
    });
    if (entries.length === 0) {
      console.log('No traders.');
      return;
    }
    entries.forEach((entry, index) => {
      console.log(
        `${index + 1}. ${entry.address} | PnL ${formatUsd(entry.totalPnl)} (${entry.pnlPercent.toFixed(1)}%) | ` +
          `realized ${formatUsd(entry.realizedPnl)} | ${entry.openPositions} open`
      );
    });
  });

program
  .command('market <ref>')
  .description('Show a market by condition id or slug')
  .action((ref: string) => {
    const market = openRuntime().readApi.getMarket({ market: ref });
    if (!market) {
      console.log(`Market not found: ${ref}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Market: ${market.slug}`);
    console.log('─'.repeat(60));
    console.log(`Condition: ${market.conditionId}`);
    console.log(
      `Status: ${market.resolution.status === 'resolved' ? `resolved (outcome ${market.resolution.outcomeIndex})` : 'open'}`
    );
    market.outcomeTokenIds.forEach((tokenId, index) => {
      console.log(`  [${index}] ${formatPrice(market.lastPrices[index] ?? null)}  ${tokenId}`);
    });
    if (market.stats) {
      console.log(`Trades: ${market.stats.tradeCount}  Volume: ${formatUsd(market.stats.volume)}`);
    }
  });

program
  .command('arbitrage')
  .description('List markets whose outcome prices do not sum to 1')
  .option('-l, --limit <number>', 'Limit results', '20')
  .action((options: { limit: string }) => {
    const list = openRuntime().readApi.listArbitrage({ limit: toInt(options.limit, 'limit') });
    if (list.length === 0) {
      console.log('No arbitrage opportunities.');
      return;
    }
    for (const item of list) {
      console.log(
        `${item.slug} | ${item.direction} | sum ${item.sum.toFixed(4)} | edge ${item.magnitude.toFixed(4)} | prices ${item.prices
          .map((price) => price.toFixed(4))
          .join(' / ')}`
      );
    }
  });

program
  .command('smart-money')
  .description('Rank addresses by win rate, volume and recency')
  .option('-w, --window <hours>', 'Window in hours')
  .option('-l, --limit <number>', 'Limit results')
  .option('-m, --min-trades <number>', 'Minimum trades in window')
  .option('--market <ref>', 'Only count activity in this market (slug or condition id)')
  .option('--min-win-rate <fraction>', 'Minimum win rate between 0 and 1')
  .action((options: SmartMoneyOptions) => {
    const list = openRuntime().readApi.getSmartMoney({
      windowHours: options.window === undefined ? undefined : toPositive(options.window, 'window'),
      limit: options.limit === undefined ? undefined : toInt(options.limit, 'limit'),
      minTrades: options.minTrades === undefined ? undefined : toInt(options.minTrades, 'min-trades'),
      market: options.market,
      minWinRate: options.minWinRate === undefined ? undefined : Number(options.minWinRate),
    });
    if (list.length === 0) {
      console.log('No addresses qualify.');
      return;
    }
    list.forEach((entry, index) => {
      const winRate = entry.winRate === null ? '-' : `${(entry.winRate * 100).toFixed(1)}%`;
      console.log(
        `${index + 1}. ${entry.address} | score ${entry.score.toFixed(3)} | win ${winRate} | ${formatUsd(entry.windowVolume)} over ${entry.windowTrades} trade(s)`
      );
    });
  });

program
  .command('hot')
  .description('Most traded markets in a trailing window')
  .option('-w, --window <hours>', 'Window in hours', '24')
  .option('-l, --limit <number>', 'Limit results', '10')
  .option('-s, --sort <field>', 'Sort by volume or trades', 'volume')
  .action((options: { window: string; limit: string; sort: string }) => {
    const list = openRuntime().readApi.getHotMarkets({
      windowHours: toPositive(options.window, 'window'),
      limit: toInt(options.limit, 'limit'),
      sortBy: options.sort,
    });
    for (const market of list) {
      console.log(
        `${market.slug} | ${market.trades} trade(s) | ${formatUsd(market.volume)} | ${market.lastPrices.map(formatPrice).join(' / ')}`
      );
    }
  });

// ============================================================================
// Utilities
// ============================================================================

program
  .command('token-ids <conditionId>')
  .description('Derive outcome token ids for a condition')
  .option('-n, --outcomes <number>', 'Outcome slot count', '2')
  .action((conditionId: string, options: { outcomes: string }) => {
    const normalized = normalizeBytes32(conditionId);
    const ids = deriveOutcomeTokenIds(normalized, toInt(options.outcomes, 'outcomes'), config.chain.collateralToken);
    console.log(`Condition: ${normalized}`);
    ids.forEach((tokenId, index) => {
      console.log(`  [${index}] ${tokenId}`);
    });
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
