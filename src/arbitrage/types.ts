/**
 * Arbitrage Engine Types
 */

import type { Cents } from '../utils/money';
import type { IdentityKey, Listing, ArbitrageOpportunity } from '../types';

export interface FeeSchedule {
  /** Seller fee as a percentage of the gross sale price, e.g. 9.5 */
  ratePct: number;
  /** Flat per-sale fee */
  flatFee: Cents;
}

/** Marketplace name -> schedule. Keys are matched case/punctuation-insensitively. */
export type FeeScheduleTable = Readonly<Record<string, FeeSchedule>>;

export interface FeeModelOptions {
  /** Treat marketplaces without a schedule as fee-free instead of failing */
  assumeNoFee?: boolean;
}

export interface FeeModel {
  readonly assumeNoFee: boolean;
  hasSchedule(marketplace: string): boolean;
  scheduleFor(marketplace: string): FeeSchedule;
  feeFor(marketplace: string, grossPrice: Cents): Cents;
  netProceeds(marketplace: string, grossPrice: Cents): Cents;
  /** Effective table, keyed by normalized marketplace name */
  entries(): Array<[string, FeeSchedule]>;
}

export interface DetectOptions {
  /** Opportunities must clear this net profit (exclusive). Default 0. */
  minNetProfit?: Cents;
  /** Opportunities must have at least this gross spread. Default 0. */
  minGrossSpread?: Cents;
}

export interface ListingGroup {
  key: IdentityKey;
  /** Sorted ascending by ask price */
  listings: Listing[];
}

export interface AnalyzedGroup extends ListingGroup {
  /** Sorted per the detector's ranking */
  opportunities: ArbitrageOpportunity[];
}
