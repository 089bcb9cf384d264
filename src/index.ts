/**
 * sneaker-arb - cross-marketplace sneaker price comparison
 *
 * Library entry point. The CLI lives in ./cli.
 */

export type {
  Cents,
  Listing,
  ListingCondition,
  IdentityKey,
  RawListingRecord,
  ArbitrageOpportunity,
  SellPriceBasis,
  ListingQuery,
  SourceOutcome,
  SourceStatus,
  SkipReason,
  SkipSummary,
  ScanReport,
} from './types';

export { parseMoney, formatMoney } from './utils/money';
export {
  UnknownFeeScheduleError,
  SourceUnavailableError,
  NoSourcesConfiguredError,
  HttpError,
  ConfigError,
} from './utils/errors';
export { loadConfig, parseConfig } from './utils/config';
export type { Config } from './utils/config';

export { normalizeSize, convertToUsMen, parseSizeSystem, MIN_SIZE, MAX_SIZE } from './listing/sizes';
export type { SizeSystem } from './listing/sizes';
export { normalizeStyleCode, styleCodeMatchKey, formatIdentityKey } from './listing/identity';
export { normalizeListing, tryNormalizeListing } from './listing/normalizer';

export { createFeeModel, mergeFeeSchedules, DEFAULT_FEE_SCHEDULES } from './arbitrage/fees';
export { detectOpportunities, priceOpportunity, compareOpportunities } from './arbitrage/detector';
export { collectListings, groupListings } from './arbitrage/aggregator';
export { assembleReport } from './arbitrage/report';
export { scanForArbitrage } from './arbitrage/scanner';
export type { ScanOptions } from './arbitrage/scanner';
export type { FeeModel, FeeSchedule, FeeScheduleTable, DetectOptions, ListingGroup, AnalyzedGroup } from './arbitrage/types';

export { createSource, createSources, createHttpSource, createFileSource, createDemoSource } from './sources';
export type { MarketplaceSource, SourceConfig } from './sources';
export { serializeReport } from './cli/serialize';
