/**
 * Shared domain types
 */

import type { Cents } from './utils/money';

export type { Cents } from './utils/money';

export type ListingCondition = 'new' | 'used' | 'unknown';

/**
 * One marketplace's current offer for one shoe in one size.
 * Prices are integer cents; size is on the canonical US men's scale.
 */
export interface Listing {
  readonly marketplace: string;
  readonly styleCode: string;
  readonly size: number;
  readonly askPrice: Cents;
  readonly bidPrice: Cents | null;
  readonly currency: string;
  readonly fetchedAt: Date;
  readonly condition: ListingCondition;
  readonly name?: string;
  readonly url?: string;
  readonly imageUrl?: string;
  readonly retailPrice?: Cents;
  readonly lastSalePrice?: Cents;
}

/**
 * Join key across marketplaces.
 */
export interface IdentityKey {
  readonly styleCode: string;
  readonly size: number;
}

/**
 * A source record before normalization. Field names and value types are
 * whatever the marketplace client produced.
 */
export type RawListingRecord = Readonly<Record<string, unknown>>;

export type SellPriceBasis = 'bid' | 'ask';

export interface ArbitrageOpportunity {
  identityKey: IdentityKey;
  buyMarketplace: string;
  buyPrice: Cents;
  buyUrl?: string;
  sellMarketplace: string;
  sellPrice: Cents;
  sellUrl?: string;
  /** Which side of the sell listing the price came from */
  sellPriceBasis: SellPriceBasis;
  /** True when no bid existed and the ask was used as the sell estimate */
  estimated: boolean;
  fee: Cents;
  netProceeds: Cents;
  grossSpread: Cents;
  netProfit: Cents;
  /** netProfit / buyPrice as a percentage, 2 decimals */
  marginPct: number;
  currency: string;
}

export interface ListingQuery {
  /** Free-text search term, e.g. "1 Retro High OG" */
  query: string;
  /** Exact style code lookup; takes precedence over the search term */
  styleCode?: string;
  /** Canonical (US men's) size filter */
  size?: number;
}

export type SourceStatus = 'ok' | 'failed' | 'unconfigured';

export interface SourceOutcome {
  source: string;
  status: SourceStatus;
  /** Raw records returned by the source */
  received: number;
  /** Listings that survived normalization and filters */
  accepted: number;
  skipped: number;
  durationMs: number;
  error?: string;
}

export type SkipReason =
  | 'missing_style_code'
  | 'invalid_size'
  | 'invalid_price'
  | 'size_mismatch'
  | 'style_code_mismatch'
  | 'used_condition';

export interface SkipSummary {
  total: number;
  byReason: Partial<Record<SkipReason, number>>;
}

export interface ScanReport {
  query: ListingQuery;
  generatedAt: Date;
  listings: Listing[];
  opportunities: ArbitrageOpportunity[];
  sources: SourceOutcome[];
  skipped: SkipSummary;
  warnings: string[];
}
