import { describe, it, expect } from 'vitest';
import { assembleReport } from './report';
import type { ReportContext } from './report';
import type { ArbitrageOpportunity, Listing } from '../types';
import type { AnalyzedGroup } from './types';

const NOW = new Date('2026-03-01T12:00:00Z');

function makeListing(styleCode: string, marketplace: string, askPrice: number): Listing {
  return {
    marketplace,
    styleCode,
    size: 10,
    askPrice,
    bidPrice: null,
    currency: 'USD',
    fetchedAt: NOW,
    condition: 'new',
  };
}

function makeOpportunity(
  styleCode: string,
  buyMarketplace: string,
  sellMarketplace: string,
  netProfit: number,
  marginPct: number,
): ArbitrageOpportunity {
  return {
    identityKey: { styleCode, size: 10 },
    buyMarketplace,
    buyPrice: 10000,
    sellMarketplace,
    sellPrice: 20000,
    sellPriceBasis: 'ask',
    estimated: true,
    fee: 1900,
    netProceeds: 18100,
    grossSpread: 10000,
    netProfit,
    marginPct,
    currency: 'USD',
  };
}

function makeContext(overrides: Partial<ReportContext> = {}): ReportContext {
  return {
    query: { query: 'jordan' },
    generatedAt: NOW,
    sources: [],
    skipped: { total: 0, byReason: {} },
    ...overrides,
  };
}

describe('assembleReport', () => {
  it('keeps listings in group order and ranks opportunities across groups', () => {
    const groups: AnalyzedGroup[] = [
      {
        key: { styleCode: 'A1', size: 10 },
        listings: [makeListing('A1', 'eBay', 100), makeListing('A1', 'GOAT', 200)],
        opportunities: [makeOpportunity('A1', 'eBay', 'GOAT', 500, 5)],
      },
      {
        key: { styleCode: 'B2', size: 10 },
        listings: [makeListing('B2', 'StockX', 300)],
        opportunities: [makeOpportunity('B2', 'GOAT', 'StockX', 900, 9), makeOpportunity('B2', 'eBay', 'StockX', 500, 5)],
      },
    ];

    const report = assembleReport(makeContext(), groups);

    expect(report.listings.map((l) => [l.styleCode, l.marketplace])).toEqual([
      ['A1', 'eBay'],
      ['A1', 'GOAT'],
      ['B2', 'StockX'],
    ]);
    expect(report.opportunities.map((o) => [o.identityKey.styleCode, o.buyMarketplace, o.netProfit])).toEqual([
      ['B2', 'GOAT', 900],
      ['A1', 'eBay', 500],
      ['B2', 'eBay', 500],
    ]);
    expect(report.generatedAt).toBe(NOW);
    expect(report.warnings).toEqual([]);
  });

  it('warns about failed sources and unpriced marketplaces', () => {
    const report = assembleReport(
      makeContext({
        sources: [
          { source: 'stockx', status: 'failed', received: 0, accepted: 0, skipped: 0, durationMs: 12, error: 'stockx: HTTP 503' },
          { source: 'goat', status: 'ok', received: 3, accepted: 3, skipped: 0, durationMs: 8 },
          { source: 'flightclub', status: 'unconfigured', received: 0, accepted: 0, skipped: 0, durationMs: 0 },
        ],
        unpricedMarketplaces: ['Nice Kicks'],
      }),
      [],
    );

    expect(report.warnings).toEqual([
      'Source stockx unavailable: stockx: HTTP 503',
      'No fee schedule for Nice Kicks; its listings were not paired',
    ]);
    expect(report.listings).toEqual([]);
    expect(report.opportunities).toEqual([]);
  });
});
