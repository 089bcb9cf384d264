/**
 * JSON rendering of scan reports: money as decimal strings, dates as ISO.
 */

import type { ArbitrageOpportunity, Listing, ScanReport } from '../types';
import { formatMoney } from '../utils/money';

function optionalMoney(cents: number | null | undefined): string | undefined {
  return cents === null || cents === undefined ? undefined : formatMoney(cents);
}

export function serializeListing(listing: Listing): Record<string, unknown> {
  return {
    marketplace: listing.marketplace,
    styleCode: listing.styleCode,
    size: listing.size,
    askPrice: formatMoney(listing.askPrice),
    bidPrice: optionalMoney(listing.bidPrice) ?? null,
    currency: listing.currency,
    condition: listing.condition,
    name: listing.name,
    url: listing.url,
    retailPrice: optionalMoney(listing.retailPrice),
    lastSalePrice: optionalMoney(listing.lastSalePrice),
    fetchedAt: listing.fetchedAt.toISOString(),
  };
}

export function serializeOpportunity(opp: ArbitrageOpportunity): Record<string, unknown> {
  return {
    styleCode: opp.identityKey.styleCode,
    size: opp.identityKey.size,
    buyMarketplace: opp.buyMarketplace,
    buyPrice: formatMoney(opp.buyPrice),
    buyUrl: opp.buyUrl,
    sellMarketplace: opp.sellMarketplace,
    sellPrice: formatMoney(opp.sellPrice),
    sellUrl: opp.sellUrl,
    sellPriceBasis: opp.sellPriceBasis,
    estimated: opp.estimated,
    fee: formatMoney(opp.fee),
    netProceeds: formatMoney(opp.netProceeds),
    grossSpread: formatMoney(opp.grossSpread),
    netProfit: formatMoney(opp.netProfit),
    marginPct: opp.marginPct,
    currency: opp.currency,
  };
}

export function serializeReport(report: ScanReport): Record<string, unknown> {
  return {
    query: report.query,
    generatedAt: report.generatedAt.toISOString(),
    listings: report.listings.map(serializeListing),
    opportunities: report.opportunities.map(serializeOpportunity),
    sources: report.sources,
    skipped: report.skipped,
    warnings: report.warnings,
  };
}
