/**
 * Arbitrage Scanner - collect, detect per identity key, assemble
 */

import { createLogger } from '../utils/logger';
import type { Cents } from '../utils/money';
import type { ListingQuery, ScanReport } from '../types';
import { formatIdentityKey } from '../listing/identity';
import type { MarketplaceSource } from '../sources/types';
import { collectListings } from './aggregator';
import { detectOpportunities, unpricedMarketplaces } from './detector';
import { assembleReport } from './report';
import type { AnalyzedGroup, FeeModel } from './types';

const logger = createLogger('scanner');

export interface ScanOptions {
  fees: FeeModel;
  minNetProfit?: Cents;
  minGrossSpread?: Cents;
  includeUsed?: boolean;
  sourceTimeoutMs?: number;
  now?: Date;
}

export async function scanForArbitrage(
  sources: readonly MarketplaceSource[],
  query: ListingQuery,
  options: ScanOptions,
): Promise<ScanReport> {
  const { fees, minNetProfit = 0, minGrossSpread = 0 } = options;
  const now = options.now ?? new Date();

  logger.info({ query, minNetProfit, minGrossSpread }, 'Starting arbitrage scan');

  const collection = await collectListings(sources, query, {
    includeUsed: options.includeUsed,
    sourceTimeoutMs: options.sourceTimeoutMs,
    now,
  });

  const analyzed: AnalyzedGroup[] = [];
  const unpriced = new Set<string>();
  for (const group of collection.groups.values()) {
    for (const marketplace of unpricedMarketplaces(group.listings, fees)) {
      unpriced.add(marketplace);
    }
    const opportunities = detectOpportunities(group.key, group.listings, fees, { minNetProfit, minGrossSpread });
    if (opportunities.length > 0) {
      logger.debug(
        { key: formatIdentityKey(group.key), count: opportunities.length },
        'Opportunities found',
      );
    }
    analyzed.push({ ...group, opportunities });
  }

  if (unpriced.size > 0) {
    logger.warn({ marketplaces: Array.from(unpriced) }, 'Marketplaces without fee schedule excluded from pairing');
  }

  const report = assembleReport(
    {
      query,
      generatedAt: now,
      sources: collection.sources,
      skipped: collection.skipped,
      unpricedMarketplaces: Array.from(unpriced).sort(),
    },
    analyzed,
  );

  logger.info(
    {
      listings: report.listings.length,
      opportunities: report.opportunities.length,
      warnings: report.warnings.length,
    },
    'Arbitrage scan complete',
  );
  return report;
}
