/**
 * Arbitrage Detector - ranks buy/sell pairs within one identity key
 *
 * For each marketplace and currency in the group, the cheapest ask is the
 * buy candidate and the highest bid (or, failing that, the cheapest ask)
 * is the sell candidate. Every ordered pair of distinct marketplaces is
 * priced net of the sell side's fee; pairs that clear the thresholds are
 * returned best first. Pure and synchronous.
 */

import type { ArbitrageOpportunity, IdentityKey, Listing } from '../types';
import { ratioPct } from '../utils/money';
import { compareIdentityKeys, compareText, marketplaceKey, sameMarketplace } from '../listing/identity';
import type { DetectOptions, FeeModel } from './types';

interface MarketplaceCandidates {
  marketplace: string;
  buy: Listing;
  sell: Listing;
  sellHasBid: boolean;
}

/**
 * Marketplaces in the group that have no fee schedule. Their listings
 * are left out of pairing unless the fee model assumes no fee.
 */
export function unpricedMarketplaces(listings: readonly Listing[], fees: FeeModel): string[] {
  if (fees.assumeNoFee) return [];
  const seen = new Map<string, string>();
  for (const listing of listings) {
    const key = marketplaceKey(listing.marketplace);
    if (!seen.has(key) && !fees.hasSchedule(listing.marketplace)) {
      seen.set(key, listing.marketplace);
    }
  }
  return Array.from(seen.values()).sort(compareText);
}

function cheaper(a: Listing, b: Listing): boolean {
  return a.askPrice < b.askPrice || (a.askPrice === b.askPrice && compareText(a.url ?? '', b.url ?? '') < 0);
}

/** Candidates per (marketplace, currency); prices are only compared within one currency */
function selectCandidates(listings: readonly Listing[], fees: FeeModel): MarketplaceCandidates[] {
  const byMarketplace = new Map<string, MarketplaceCandidates>();

  for (const listing of listings) {
    if (!fees.assumeNoFee && !fees.hasSchedule(listing.marketplace)) continue;

    const key = `${marketplaceKey(listing.marketplace)}|${listing.currency}`;
    const current = byMarketplace.get(key);
    if (!current) {
      byMarketplace.set(key, {
        marketplace: listing.marketplace,
        buy: listing,
        sell: listing,
        sellHasBid: listing.bidPrice !== null,
      });
      continue;
    }

    if (cheaper(listing, current.buy)) {
      current.buy = listing;
    }

    if (listing.bidPrice !== null) {
      if (!current.sellHasBid || current.sell.bidPrice === null || listing.bidPrice > current.sell.bidPrice) {
        current.sell = listing;
        current.sellHasBid = true;
      }
    } else if (!current.sellHasBid && cheaper(listing, current.sell)) {
      current.sell = listing;
    }
  }

  return Array.from(byMarketplace.values());
}

/**
 * Ranking: net profit desc, margin desc, then buy/sell marketplace name.
 */
export function compareOpportunities(a: ArbitrageOpportunity, b: ArbitrageOpportunity): number {
  return (
    b.netProfit - a.netProfit ||
    b.marginPct - a.marginPct ||
    compareText(a.buyMarketplace, b.buyMarketplace) ||
    compareText(a.sellMarketplace, b.sellMarketplace)
  );
}

/**
 * Cross-key ranking used when opportunities for several keys are merged.
 */
export function compareOpportunitiesGlobally(a: ArbitrageOpportunity, b: ArbitrageOpportunity): number {
  return (
    b.netProfit - a.netProfit ||
    b.marginPct - a.marginPct ||
    compareIdentityKeys(a.identityKey, b.identityKey) ||
    compareText(a.buyMarketplace, b.buyMarketplace) ||
    compareText(a.sellMarketplace, b.sellMarketplace)
  );
}

/**
 * Price one ordered (buy, sell) pair. Returns null when the listings
 * are in different currencies.
 */
export function priceOpportunity(
  key: IdentityKey,
  buy: Listing,
  sell: Listing,
  fees: FeeModel,
): ArbitrageOpportunity | null {
  if (buy.currency !== sell.currency) return null;

  const estimated = sell.bidPrice === null;
  const sellPrice = sell.bidPrice ?? sell.askPrice;
  const fee = fees.feeFor(sell.marketplace, sellPrice);
  const netProceeds = sellPrice - fee;
  const netProfit = netProceeds - buy.askPrice;

  return {
    identityKey: { styleCode: key.styleCode, size: key.size },
    buyMarketplace: buy.marketplace,
    buyPrice: buy.askPrice,
    buyUrl: buy.url,
    sellMarketplace: sell.marketplace,
    sellPrice,
    sellUrl: sell.url,
    sellPriceBasis: estimated ? 'ask' : 'bid',
    estimated,
    fee,
    netProceeds,
    grossSpread: sellPrice - buy.askPrice,
    netProfit,
    marginPct: ratioPct(netProfit, buy.askPrice),
    currency: buy.currency,
  };
}

/**
 * Enumerate and rank opportunities for one identity key.
 */
export function detectOpportunities(
  key: IdentityKey,
  listings: readonly Listing[],
  fees: FeeModel,
  options: DetectOptions = {},
): ArbitrageOpportunity[] {
  const { minNetProfit = 0, minGrossSpread = 0 } = options;
  if (listings.length < 2) return [];

  const candidates = selectCandidates(listings, fees);
  const opportunities: ArbitrageOpportunity[] = [];

  for (const buySide of candidates) {
    for (const sellSide of candidates) {
      if (sameMarketplace(buySide.marketplace, sellSide.marketplace)) continue;

      const opp = priceOpportunity(key, buySide.buy, sellSide.sell, fees);
      if (!opp) continue;
      if (opp.netProfit <= minNetProfit) continue;
      if (opp.grossSpread < minGrossSpread) continue;

      opportunities.push(opp);
    }
  }

  return opportunities.sort(compareOpportunities);
}
