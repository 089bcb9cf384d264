/**
 * Aggregator - fans out to marketplace sources and groups listings by
 * identity key (style code + canonical size)
 */

import { createLogger } from '../utils/logger';
import { NoSourcesConfiguredError, SourceUnavailableError, errorMessage } from '../utils/errors';
import type {
  Listing,
  ListingQuery,
  RawListingRecord,
  SkipReason,
  SkipSummary,
  SourceOutcome,
} from '../types';
import { tryNormalizeListing } from '../listing/normalizer';
import {
  compareIdentityKeys,
  compareText,
  formatIdentityKey,
  identityKeyOf,
  normalizeStyleCode,
  styleCodeMatchKey,
} from '../listing/identity';
import type { MarketplaceSource } from '../sources/types';
import type { ListingGroup } from './types';

const logger = createLogger('aggregator');

export interface CollectOptions {
  /** Keep used listings; by default only new/unknown condition is matched */
  includeUsed?: boolean;
  /** Per-source timeout; 0 or undefined disables it */
  sourceTimeoutMs?: number;
  /** Timestamp attached to listings without their own */
  now?: Date;
}

type ConfigurationCheck =
  | { configured: boolean; error?: undefined }
  | { configured: false; error: string };

interface SourceCollection {
  outcome: SourceOutcome;
  listings: Listing[];
  skips: SkipReason[];
}

export interface CollectionResult {
  /** Identity key string -> group, ordered by style code then size */
  groups: Map<string, ListingGroup>;
  sources: SourceOutcome[];
  skipped: SkipSummary;
}

/** Ask ascending, then marketplace, then url */
export function compareListings(a: Listing, b: Listing): number {
  return (
    a.askPrice - b.askPrice ||
    compareText(a.marketplace, b.marketplace) ||
    compareText(a.url ?? '', b.url ?? '')
  );
}

/**
 * Group listings by identity key. Each group is sorted cheapest first;
 * groups are ordered by style code then size.
 */
export function groupListings(listings: readonly Listing[]): Map<string, ListingGroup> {
  const unordered = new Map<string, Listing[]>();
  for (const listing of listings) {
    const key = formatIdentityKey(identityKeyOf(listing));
    const bucket = unordered.get(key);
    if (bucket) {
      bucket.push(listing);
    } else {
      unordered.set(key, [listing]);
    }
  }

  const groups: ListingGroup[] = [];
  for (const bucket of unordered.values()) {
    const sorted = [...bucket].sort(compareListings);
    groups.push({ key: identityKeyOf(sorted[0]), listings: sorted });
  }
  groups.sort((a, b) => compareIdentityKeys(a.key, b.key));

  return new Map(groups.map((group) => [formatIdentityKey(group.key), group]));
}

async function withTimeout<T>(source: string, promise: Promise<T>, timeoutMs?: number): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new SourceUnavailableError(source, `timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function fetchRaw(source: MarketplaceSource, query: ListingQuery): Promise<RawListingRecord[]> {
  return query.styleCode
    ? source.getByStyleCode(query.styleCode, query.size)
    : source.search(query.query, query.size);
}

/** Post-normalization filters; returns the reason a listing is excluded */
function filterReason(listing: Listing, query: ListingQuery, options: CollectOptions): SkipReason | null {
  if (query.size !== undefined && listing.size !== query.size) return 'size_mismatch';
  if (query.styleCode) {
    const wanted = normalizeStyleCode(query.styleCode);
    if (!wanted || styleCodeMatchKey(wanted) !== styleCodeMatchKey(listing.styleCode)) {
      return 'style_code_mismatch';
    }
  }
  if (!options.includeUsed && listing.condition === 'used') return 'used_condition';
  return null;
}

/** Normalize and filter one record: the listing, or why it was dropped */
function admit(
  raw: RawListingRecord,
  source: MarketplaceSource,
  fetchedAt: Date,
  query: ListingQuery,
  options: CollectOptions,
): Listing | SkipReason {
  const outcome = tryNormalizeListing(raw, source.name, fetchedAt);
  if (!outcome.ok) return outcome.skip.reason;
  return filterReason(outcome.listing, query, options) ?? outcome.listing;
}

/** isConfigured() with a throw reported as a failure of that source */
function checkConfiguration(source: MarketplaceSource): ConfigurationCheck {
  try {
    return { configured: source.isConfigured() };
  } catch (err) {
    logger.warn({ source: source.id, err }, 'Source configuration check failed');
    return { configured: false, error: errorMessage(err) };
  }
}

function emptyOutcome(source: MarketplaceSource, status: SourceOutcome['status'], durationMs: number): SourceOutcome {
  return { source: source.id, status, received: 0, accepted: 0, skipped: 0, durationMs };
}

async function collectFromSource(
  source: MarketplaceSource,
  check: ConfigurationCheck,
  query: ListingQuery,
  fetchedAt: Date,
  options: CollectOptions,
): Promise<SourceCollection> {
  if (check.error !== undefined) {
    return { outcome: { ...emptyOutcome(source, 'failed', 0), error: check.error }, listings: [], skips: [] };
  }
  if (!check.configured) {
    return { outcome: emptyOutcome(source, 'unconfigured', 0), listings: [], skips: [] };
  }

  const started = Date.now();
  let raw: RawListingRecord[];
  try {
    raw = await withTimeout(source.id, fetchRaw(source, query), options.sourceTimeoutMs);
  } catch (err) {
    logger.warn({ source: source.id, err }, 'Source unavailable');
    const outcome = emptyOutcome(source, 'failed', Date.now() - started);
    return { outcome: { ...outcome, error: errorMessage(err) }, listings: [], skips: [] };
  }
  const durationMs = Date.now() - started;

  const listings: Listing[] = [];
  const skips: SkipReason[] = [];
  for (const record of raw) {
    const admitted = admit(record, source, fetchedAt, query, options);
    if (typeof admitted === 'string') {
      skips.push(admitted);
    } else {
      listings.push(admitted);
    }
  }

  return {
    outcome: {
      source: source.id,
      status: 'ok',
      received: raw.length,
      accepted: listings.length,
      skipped: skips.length,
      durationMs,
    },
    listings,
    skips,
  };
}

/**
 * Query every configured source concurrently and group what comes back.
 *
 * A failing source is recorded and the others still contribute. Outcomes
 * are reported in the order the sources were given. Throws
 * NoSourcesConfiguredError only when no source is configured at all.
 */
export async function collectListings(
  sources: readonly MarketplaceSource[],
  query: ListingQuery,
  options: CollectOptions = {},
): Promise<CollectionResult> {
  const checks = sources.map(checkConfiguration);
  const configured = sources.filter((_, index) => checks[index].configured);
  const checkFailed = checks.some((check) => check.error !== undefined);
  if (configured.length === 0 && !checkFailed) {
    throw new NoSourcesConfiguredError(sources.map((source) => source.id));
  }

  const fetchedAt = options.now ?? new Date();

  logger.info(
    { query, sources: configured.map((source) => source.id) },
    'Collecting listings',
  );

  const collected = await Promise.all(
    sources.map((source, index) => collectFromSource(source, checks[index], query, fetchedAt, options)),
  );

  const byReason: Partial<Record<SkipReason, number>> = {};
  let skippedTotal = 0;
  const accepted: Listing[] = [];
  for (const { listings, skips } of collected) {
    accepted.push(...listings);
    for (const reason of skips) {
      byReason[reason] = (byReason[reason] ?? 0) + 1;
      skippedTotal++;
    }
  }

  const groups = groupListings(accepted);
  logger.info(
    { listings: accepted.length, groups: groups.size, skipped: skippedTotal },
    'Listings collected',
  );

  return {
    groups,
    sources: collected.map(({ outcome }) => outcome),
    skipped: { total: skippedTotal, byReason },
  };
}
