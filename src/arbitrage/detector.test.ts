import { describe, it, expect } from 'vitest';
import { detectOpportunities, priceOpportunity, unpricedMarketplaces } from './detector';
import { createFeeModel, DEFAULT_FEE_SCHEDULES } from './fees';
import type { IdentityKey, Listing } from '../types';

// =============================================================================
// Helpers
// =============================================================================

const KEY: IdentityKey = { styleCode: 'DZ5485-612', size: 10 };

function makeListing(
  marketplace: string,
  askPrice: number,
  bidPrice: number | null = null,
  overrides: Partial<Listing> = {},
): Listing {
  return {
    marketplace,
    styleCode: KEY.styleCode,
    size: KEY.size,
    askPrice,
    bidPrice,
    currency: 'USD',
    fetchedAt: new Date('2026-03-01T12:00:00Z'),
    condition: 'new',
    url: `https://${marketplace.toLowerCase().replace(/\s+/g, '')}.test/${askPrice}`,
    ...overrides,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe('detectOpportunities', () => {
  const fees = createFeeModel();

  it('prices buying on GOAT and selling into the StockX bid', () => {
    const listings = [makeListing('GOAT', 18000), makeListing('StockX', 25000, 23000)];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities).toHaveLength(1);
    expect(opportunities[0]).toMatchObject({
      identityKey: KEY,
      buyMarketplace: 'GOAT',
      buyPrice: 18000,
      sellMarketplace: 'StockX',
      sellPrice: 23000,
      sellPriceBasis: 'bid',
      estimated: false,
      fee: 2185,
      netProceeds: 20815,
      grossSpread: 5000,
      netProfit: 2815,
      marginPct: 15.64,
      currency: 'USD',
    });
  });

  it('requires net profit strictly above the minimum', () => {
    const listings = [makeListing('GOAT', 18000), makeListing('StockX', 25000, 23000)];
    expect(detectOpportunities(KEY, listings, fees, { minNetProfit: 2815 })).toHaveLength(0);
    expect(detectOpportunities(KEY, listings, fees, { minNetProfit: 2814 })).toHaveLength(1);
  });

  it('requires gross spread at or above the minimum', () => {
    const listings = [makeListing('GOAT', 18000), makeListing('StockX', 25000, 23000)];
    expect(detectOpportunities(KEY, listings, fees, { minGrossSpread: 5000 })).toHaveLength(1);
    expect(detectOpportunities(KEY, listings, fees, { minGrossSpread: 5001 })).toHaveLength(0);
  });

  it('finds nothing once the fee eats the spread', () => {
    const steep = createFeeModel({ GOAT: { ratePct: 9.5, flatFee: 0 }, StockX: { ratePct: 30, flatFee: 0 } });
    const listings = [makeListing('GOAT', 18000), makeListing('StockX', 25000, 23000)];
    expect(steep.netProceeds('StockX', 23000)).toBe(16100);
    expect(detectOpportunities(KEY, listings, steep)).toEqual([]);
  });

  it('considers every ordered pair of marketplaces', () => {
    const listings = [makeListing('GOAT', 18000), makeListing('StockX', 25000, 23000), makeListing('eBay', 20000)];

    const opportunities = detectOpportunities(KEY, listings, fees, {
      minNetProfit: -1_000_000,
      minGrossSpread: -1_000_000,
    });

    expect(opportunities).toHaveLength(6);
    expect(new Set(opportunities.map((o) => `${o.buyMarketplace}>${o.sellMarketplace}`)).size).toBe(6);
  });

  it('never pairs a marketplace with itself', () => {
    const listings = [makeListing('StockX', 10000), makeListing('stockx', 30000, 29000)];
    expect(detectOpportunities(KEY, listings, fees)).toEqual([]);
  });

  it('returns nothing for fewer than two listings', () => {
    expect(detectOpportunities(KEY, [], fees)).toEqual([]);
    expect(detectOpportunities(KEY, [makeListing('GOAT', 18000)], fees)).toEqual([]);
  });

  it('estimates the sell price from the ask when there is no bid', () => {
    const listings = [makeListing('eBay', 20000), makeListing('Flight Club', 30000)];

    const [opportunity] = detectOpportunities(KEY, listings, fees);

    expect(opportunity).toMatchObject({
      buyMarketplace: 'eBay',
      sellMarketplace: 'Flight Club',
      sellPrice: 30000,
      sellPriceBasis: 'ask',
      estimated: true,
      fee: 2850,
      netProfit: 7150,
    });
  });

  it('uses the cheapest ask and the highest bid per marketplace', () => {
    const listings = [
      makeListing('GOAT', 19000),
      makeListing('GOAT', 18000),
      makeListing('StockX', 26000, 22000),
      makeListing('StockX', 25000, 23000),
      makeListing('StockX', 24000),
    ];

    const [best] = detectOpportunities(KEY, listings, fees);

    expect(best.buyMarketplace).toBe('GOAT');
    expect(best.buyPrice).toBe(18000);
    expect(best.sellPrice).toBe(23000);
    expect(best.sellPriceBasis).toBe('bid');
  });

  it('skips pairs in different currencies', () => {
    const listings = [makeListing('GOAT', 18000, null, { currency: 'EUR' }), makeListing('StockX', 25000, 23000)];
    expect(detectOpportunities(KEY, listings, fees)).toEqual([]);
  });

  it('does not let a listing in another currency displace a pairable one', () => {
    const listings = [
      makeListing('GOAT', 15000, null, { currency: 'EUR' }),
      makeListing('GOAT', 18000),
      makeListing('StockX', 25000, 23000),
    ];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities.map((o) => [o.buyMarketplace, o.buyPrice, o.sellMarketplace, o.netProfit])).toEqual([
      ['GOAT', 18000, 'StockX', 2815],
    ]);
  });

  it('ranks equal net profit by margin before marketplace names', () => {
    const listings = [
      makeListing('Grailed', 10000),
      makeListing('Flight Club', 20000),
      makeListing('StockX', 40000, 20000),
      makeListing('GOAT', 40000, 31050),
    ];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities.map((o) => [o.buyMarketplace, o.sellMarketplace, o.netProfit, o.marginPct])).toEqual([
      ['Grailed', 'GOAT', 18100, 181],
      ['Grailed', 'Flight Club', 8100, 81],
      ['Grailed', 'StockX', 8100, 81],
      ['Flight Club', 'GOAT', 8100, 40.5],
    ]);
  });

  it('returns the same ranking whatever the input order', () => {
    const listings = [
      makeListing('Grailed', 10000),
      makeListing('Flight Club', 20000),
      makeListing('StockX', 40000, 20000),
      makeListing('StockX', 38000),
      makeListing('GOAT', 40000, 31050),
      makeListing('GOAT', 12000),
      makeListing('eBay', 15000),
    ];
    const reordered = [listings[4], listings[0], listings[6], listings[3], listings[1], listings[5], listings[2]];

    const first = detectOpportunities(KEY, listings, fees);

    expect(first.length).toBeGreaterThan(0);
    expect(detectOpportunities(KEY, reordered, fees)).toEqual(first);
    expect(detectOpportunities(KEY, [...listings].reverse(), fees)).toEqual(first);
  });

  it('ranks by net profit, then buy marketplace on ties', () => {
    const listings = [
      makeListing('GOAT', 10000),
      makeListing('Flight Club', 10000),
      makeListing('StockX', 30000, 20000),
    ];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities.map((o) => [o.buyMarketplace, o.sellMarketplace, o.netProfit])).toEqual([
      ['Flight Club', 'StockX', 8100],
      ['GOAT', 'StockX', 8100],
    ]);
  });

  it('leaves marketplaces without a fee schedule out of pairing', () => {
    const listings = [
      makeListing('Nice Kicks', 10000),
      makeListing('GOAT', 18000),
      makeListing('StockX', 25000, 23000),
    ];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities.map((o) => o.buyMarketplace)).toEqual(['GOAT']);
    expect(unpricedMarketplaces(listings, fees)).toEqual(['Nice Kicks']);
  });

  it('pairs unscheduled marketplaces fee-free when assumeNoFee is set', () => {
    const lenient = createFeeModel(DEFAULT_FEE_SCHEDULES, { assumeNoFee: true });
    const listings = [
      makeListing('Nice Kicks', 10000),
      makeListing('GOAT', 18000),
      makeListing('StockX', 25000, 23000),
    ];

    const opportunities = detectOpportunities(KEY, listings, lenient);

    expect(opportunities.map((o) => [o.buyMarketplace, o.sellMarketplace, o.netProfit])).toEqual([
      ['Nice Kicks', 'StockX', 10815],
      ['Nice Kicks', 'GOAT', 6290],
      ['GOAT', 'StockX', 2815],
    ]);
    expect(unpricedMarketplaces(listings, lenient)).toEqual([]);
  });

  it('keeps the accounting identities on every result', () => {
    const listings = [
      makeListing('eBay', 15000),
      makeListing('GOAT', 18000),
      makeListing('StockX', 25000, 23000),
      makeListing('Flight Club', 27000),
    ];

    const opportunities = detectOpportunities(KEY, listings, fees);

    expect(opportunities.length).toBeGreaterThan(0);
    for (const o of opportunities) {
      expect(o.buyMarketplace).not.toBe(o.sellMarketplace);
      expect(o.fee + o.netProceeds).toBe(o.sellPrice);
      expect(o.netProceeds - o.buyPrice).toBe(o.netProfit);
      expect(o.sellPrice - o.buyPrice).toBe(o.grossSpread);
      expect(o.netProfit).toBeGreaterThan(0);
    }
    for (let i = 1; i < opportunities.length; i++) {
      expect(opportunities[i - 1].netProfit).toBeGreaterThanOrEqual(opportunities[i].netProfit);
    }
  });
});

describe('priceOpportunity', () => {
  it('reports a zero margin for a free buy', () => {
    const fees = createFeeModel();
    const opportunity = priceOpportunity(KEY, makeListing('GOAT', 0), makeListing('StockX', 25000, 23000), fees);
    expect(opportunity?.netProfit).toBe(20815);
    expect(opportunity?.marginPct).toBe(0);
  });

  it('returns null across currencies', () => {
    const fees = createFeeModel();
    const buy = makeListing('GOAT', 18000, null, { currency: 'GBP' });
    expect(priceOpportunity(KEY, buy, makeListing('StockX', 25000, 23000), fees)).toBeNull();
  });
});
