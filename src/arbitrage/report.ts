/**
 * Result Assembler - flattens analyzed groups into one ScanReport
 */

import type {
  ArbitrageOpportunity,
  Listing,
  ListingQuery,
  ScanReport,
  SkipSummary,
  SourceOutcome,
} from '../types';
import { compareOpportunitiesGlobally } from './detector';
import type { AnalyzedGroup } from './types';

export interface ReportContext {
  query: ListingQuery;
  generatedAt: Date;
  sources: SourceOutcome[];
  skipped: SkipSummary;
  /** Marketplaces left out of pairing for lack of a fee schedule */
  unpricedMarketplaces?: string[];
}

function buildWarnings(context: ReportContext): string[] {
  const warnings: string[] = [];
  for (const outcome of context.sources) {
    if (outcome.status === 'failed') {
      warnings.push(`Source ${outcome.source} unavailable: ${outcome.error ?? 'unknown error'}`);
    }
  }
  for (const marketplace of context.unpricedMarketplaces ?? []) {
    warnings.push(`No fee schedule for ${marketplace}; its listings were not paired`);
  }
  return warnings;
}

/**
 * Pure aggregation: listings keep group order (each group cheapest first),
 * opportunities are merged and ranked globally by net profit.
 */
export function assembleReport(context: ReportContext, groups: Iterable<AnalyzedGroup>): ScanReport {
  const listings: Listing[] = [];
  const opportunities: ArbitrageOpportunity[] = [];

  for (const group of groups) {
    listings.push(...group.listings);
    opportunities.push(...group.opportunities);
  }
  opportunities.sort(compareOpportunitiesGlobally);

  return {
    query: context.query,
    generatedAt: context.generatedAt,
    listings,
    opportunities,
    sources: context.sources,
    skipped: context.skipped,
    warnings: buildWarnings(context),
  };
}
