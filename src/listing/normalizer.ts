/**
 * Listing Normalizer - raw source records -> canonical Listing
 *
 * Pure transform. Records that cannot be keyed (no style code, no
 * convertible size) or priced (no valid ask) are skipped, never thrown.
 */

import type { Listing, ListingCondition, RawListingRecord, SkipReason } from '../types';
import { parseMoney } from '../utils/money';
import type { Cents } from '../utils/money';
import { normalizeStyleCode } from './identity';
import { normalizeSize } from './sizes';

export const DEFAULT_CURRENCY = 'USD';

export interface NormalizationSkip {
  reason: SkipReason;
  marketplace: string;
}

export type NormalizationOutcome =
  | { ok: true; listing: Listing }
  | { ok: false; skip: NormalizationSkip };

/** First defined value among camelCase / snake_case aliases */
function pick(raw: RawListingRecord, ...names: string[]): unknown {
  for (const name of names) {
    const value = raw[name];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

function pickString(raw: RawListingRecord, ...names: string[]): string | undefined {
  const value = pick(raw, ...names);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

function pickPrice(raw: RawListingRecord, ...names: string[]): Cents | undefined {
  const cents = parseMoney(pick(raw, ...names));
  return cents !== null && cents >= 0 ? cents : undefined;
}

function parseCondition(value: unknown): ListingCondition {
  if (typeof value !== 'string') return 'new';
  const text = value.toLowerCase();
  if (text.includes('used') || text.includes('pre-owned') || text.includes('preowned')) return 'used';
  if (text.includes('new') || text === 'ds' || text.includes('deadstock')) return 'new';
  return 'unknown';
}

function parseFetchedAt(value: unknown, fallback: Date): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return fallback;
}

function parseCurrency(value: unknown): string {
  if (typeof value !== 'string') return DEFAULT_CURRENCY;
  const code = value.trim().toUpperCase();
  return /^[A-Z]{3}$/.test(code) ? code : DEFAULT_CURRENCY;
}

/**
 * Normalize one record, reporting why it was skipped when it is unusable.
 * A `marketplace` field on the record overrides `marketplaceId`, which
 * lets aggregator feeds carry offers from several merchants.
 */
export function tryNormalizeListing(
  raw: RawListingRecord,
  marketplaceId: string,
  fetchedAt: Date = new Date(),
): NormalizationOutcome {
  const marketplace = pickString(raw, 'marketplace') ?? marketplaceId;
  const skip = (reason: SkipReason): NormalizationOutcome => ({ ok: false, skip: { reason, marketplace } });

  const styleCode = normalizeStyleCode(pick(raw, 'styleCode', 'style_code'));
  if (!styleCode) return skip('missing_style_code');

  const size = normalizeSize(pick(raw, 'size'), pick(raw, 'sizeSystem', 'size_system'));
  if (size === null) return skip('invalid_size');

  const askPrice = pickPrice(raw, 'askPrice', 'ask_price');
  if (askPrice === undefined) return skip('invalid_price');

  const listing: Listing = {
    marketplace,
    styleCode,
    size,
    askPrice,
    bidPrice: pickPrice(raw, 'bidPrice', 'bid_price') ?? null,
    currency: parseCurrency(pick(raw, 'currency')),
    fetchedAt: parseFetchedAt(pick(raw, 'fetchedAt', 'fetched_at'), fetchedAt),
    condition: parseCondition(pick(raw, 'condition')),
    name: pickString(raw, 'name'),
    url: pickString(raw, 'url'),
    imageUrl: pickString(raw, 'imageUrl', 'image_url'),
    retailPrice: pickPrice(raw, 'retailPrice', 'retail_price'),
    lastSalePrice: pickPrice(raw, 'lastSalePrice', 'last_sale_price'),
  };

  return { ok: true, listing: Object.freeze(listing) };
}

/**
 * Normalize one record, or null when it cannot be matched.
 */
export function normalizeListing(
  raw: RawListingRecord,
  marketplaceId: string,
  fetchedAt?: Date,
): Listing | null {
  const outcome = tryNormalizeListing(raw, marketplaceId, fetchedAt);
  return outcome.ok ? outcome.listing : null;
}
