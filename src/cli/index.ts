#!/usr/bin/env node
/**
 * sneaker-arb CLI
 *
 * Commands:
 * - sneaker-arb scan <query>        Search configured sources by name
 * - sneaker-arb lookup <styleCode>  Look up one style code
 * - sneaker-arb demo                Run against bundled sample data
 * - sneaker-arb status              Show which sources are configured
 * - sneaker-arb fees                Show the effective fee table
 *
 * Reports are written to stdout as JSON; logs go to stderr.
 */

import { loadEnvFiles, loadConfig } from '../utils/config';

loadEnvFiles();

import { Command, InvalidArgumentError } from 'commander';
import { logger, setLogLevel } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { formatMoney, parseMoney } from '../utils/money';
import type { Cents } from '../utils/money';
import { createFeeModel } from '../arbitrage/fees';
import { scanForArbitrage } from '../arbitrage/scanner';
import { createDemoSource, createSources } from '../sources';
import type { MarketplaceSource } from '../sources';
import type { ListingQuery } from '../types';
import type { Config } from '../utils/config';
import { serializeReport } from './serialize';

interface ScanCliOptions {
  size?: number;
  minProfit?: Cents;
  minSpread?: Cents;
  assumeNoFee?: boolean;
  includeUsed?: boolean;
  config?: string;
}

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

function parseSizeOption(value: string): number {
  const size = Number(value);
  if (!Number.isFinite(size) || !Number.isInteger(size * 2) || size <= 0) {
    throw new InvalidArgumentError('size must be a positive half size, e.g. 10 or 10.5');
  }
  return size;
}

function parseMoneyOption(value: string): Cents {
  const cents = parseMoney(value);
  if (cents === null || cents < 0) {
    throw new InvalidArgumentError('amount must be a non-negative dollar value, e.g. 25 or 12.50');
  }
  return cents;
}

function withScanOptions(command: Command): Command {
  return command
    .option('-s, --size <size>', 'US men\'s size filter', parseSizeOption)
    .option('--min-profit <amount>', 'Minimum net profit in dollars', parseMoneyOption)
    .option('--min-spread <amount>', 'Minimum gross spread in dollars', parseMoneyOption)
    .option('--assume-no-fee', 'Treat marketplaces without a fee schedule as fee-free')
    .option('--include-used', 'Match used listings too')
    .option('-c, --config <path>', 'Config file path');
}

function loadCliConfig(path?: string): Config {
  const config = loadConfig(path);
  setLogLevel(config.logLevel);
  return config;
}

async function runScan(
  config: Config,
  sources: MarketplaceSource[],
  query: ListingQuery,
  options: ScanCliOptions,
  defaults: { minGrossSpread?: Cents } = {},
): Promise<void> {
  const fees = createFeeModel(config.fees, {
    assumeNoFee: options.assumeNoFee ?? config.arbitrage.assumeNoFee,
  });
  const report = await scanForArbitrage(sources, query, {
    fees,
    minNetProfit: options.minProfit ?? config.arbitrage.minNetProfit,
    minGrossSpread: options.minSpread ?? defaults.minGrossSpread ?? config.arbitrage.minGrossSpread,
    includeUsed: options.includeUsed ?? config.arbitrage.includeUsed,
    sourceTimeoutMs: config.arbitrage.sourceTimeoutMs,
  });
  process.stdout.write(`${JSON.stringify(serializeReport(report), null, 2)}\n`);
}

program
  .name('sneaker-arb')
  .description('Find sneaker price gaps across marketplaces')
  .version('0.1.0');

// ============================================================================
// scan - search by name
// ============================================================================
withScanOptions(
  program
    .command('scan')
    .description('Search configured sources by sneaker name')
    .argument('<query...>', 'Search terms, e.g. "1 Retro High OG"'),
).action(async (terms: string[], options: ScanCliOptions) => {
  const config = loadCliConfig(options.config);
  const query: ListingQuery = { query: terms.join(' '), size: options.size };
  await runScan(config, createSources(config.sources), query, options);
});

// ============================================================================
// lookup - exact style code
// ============================================================================
withScanOptions(
  program
    .command('lookup')
    .description('Look up one style code, e.g. DZ5485-612')
    .argument('<styleCode>', 'Manufacturer style code'),
).action(async (styleCode: string, options: ScanCliOptions) => {
  const config = loadCliConfig(options.config);
  const query: ListingQuery = { query: styleCode, styleCode, size: options.size };
  await runScan(config, createSources(config.sources), query, options);
});

// ============================================================================
// demo - bundled sample data
// ============================================================================
withScanOptions(
  program
    .command('demo')
    .description('Run against bundled sample listings'),
).action(async (options: ScanCliOptions) => {
  const config = loadCliConfig(options.config);
  const query: ListingQuery = { query: '', size: options.size };
  await runScan(config, [createDemoSource()], query, options, { minGrossSpread: 500 });
});

// ============================================================================
// status - source configuration
// ============================================================================
program
  .command('status')
  .description('Show which marketplace sources are configured')
  .option('-c, --config <path>', 'Config file path')
  .action((options: { config?: string }) => {
    const config = loadCliConfig(options.config);
    const sources = createSources(config.sources);

    console.log('\n\x1b[1mMarketplace Sources\x1b[0m\n');
    if (sources.length === 0) {
      console.log('  No sources defined. Add "sources" to your config file.\n');
      return;
    }
    for (const source of sources) {
      const configured = source.isConfigured();
      console.log(`  ${configured ? '\x1b[32m✓' : '\x1b[90m○'}\x1b[0m ${source.id} (${source.name})`);
    }
    const active = sources.filter((source) => source.isConfigured()).length;
    console.log(`\n  ${active} of ${sources.length} source(s) active.\n`);
  });

// ============================================================================
// fees - fee table
// ============================================================================
program
  .command('fees')
  .description('Show the effective seller fee table')
  .option('-c, --config <path>', 'Config file path')
  .action((options: { config?: string }) => {
    const config = loadCliConfig(options.config);
    const fees = createFeeModel(config.fees);

    console.log('\n\x1b[1mSeller Fees\x1b[0m\n');
    for (const [marketplace, schedule] of fees.entries()) {
      const flat = schedule.flatFee > 0 ? ` + $${formatMoney(schedule.flatFee)}` : '';
      console.log(`  ${marketplace.padEnd(16)} ${schedule.ratePct}%${flat}`);
    }
    console.log('\n  Shipping and sales tax are not included.\n');
  });

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
