import { describe, it, expect, vi } from 'vitest';
import { scanForArbitrage } from './scanner';
import { createFeeModel } from './fees';
import { createDemoSource } from '../sources/file-source';
import type { RawListingRecord } from '../types';
import type { MarketplaceSource } from '../sources/types';

// =============================================================================
// Helpers
// =============================================================================

function createMockSource(id: string, name: string, records: RawListingRecord[]): MarketplaceSource {
  return {
    id,
    name,
    isConfigured: () => true,
    search: vi.fn().mockResolvedValue(records),
    getByStyleCode: vi.fn().mockResolvedValue(records),
  };
}

const NOW = new Date('2026-03-01T12:00:00Z');

// =============================================================================
// Tests
// =============================================================================

describe('scanForArbitrage', () => {
  it('finds the GOAT to StockX opportunity end to end', async () => {
    const sources = [
      createMockSource('goat', 'GOAT', [{ styleCode: 'DZ5485-612', size: '10', askPrice: '180.00' }]),
      createMockSource('stockx', 'StockX', [
        { styleCode: 'DZ5485-612', size: '10', askPrice: '250.00', bidPrice: '230.00' },
      ]),
    ];

    const report = await scanForArbitrage(sources, { query: 'DZ5485-612', styleCode: 'DZ5485-612' }, {
      fees: createFeeModel(),
      now: NOW,
    });

    expect(report.generatedAt).toBe(NOW);
    expect(report.listings).toHaveLength(2);
    expect(report.opportunities).toHaveLength(1);
    expect(report.opportunities[0]).toMatchObject({
      buyMarketplace: 'GOAT',
      sellMarketplace: 'StockX',
      fee: 2185,
      netProceeds: 20815,
      netProfit: 2815,
      marginPct: 15.64,
    });
    expect(report.warnings).toEqual([]);
  });

  it('warns when a marketplace has no fee schedule', async () => {
    const sources = [
      createMockSource('feed', 'Feed', [
        { marketplace: 'Nice Kicks', styleCode: 'A1', size: '10', askPrice: '100' },
        { marketplace: 'GOAT', styleCode: 'A1', size: '10', askPrice: '120' },
      ]),
    ];

    const report = await scanForArbitrage(sources, { query: 'a1' }, { fees: createFeeModel(), now: NOW });

    expect(report.opportunities).toEqual([]);
    expect(report.warnings).toEqual(['No fee schedule for Nice Kicks; its listings were not paired']);
  });

  it('runs against the bundled demo listings', async () => {
    const report = await scanForArbitrage([createDemoSource()], { query: '' }, {
      fees: createFeeModel(),
      now: NOW,
    });

    expect(report.sources).toEqual([
      expect.objectContaining({ source: 'demo', status: 'ok', received: 11, accepted: 9, skipped: 2 }),
    ]);
    expect(report.skipped).toEqual({ total: 2, byReason: { used_condition: 1, invalid_size: 1 } });
    expect(report.listings.map((l) => `${l.marketplace}:${l.askPrice}`)).toEqual([
      'eBay:29999',
      'GOAT:32500',
      'GOAT:32900',
      'StockX:34000',
      'Flight Club:36000',
      'eBay:24500',
      'GOAT:25800',
      'StockX:27500',
      'Kicks Crew:28900',
    ]);
    expect(
      report.opportunities.map((o) => [o.identityKey.styleCode, o.buyMarketplace, o.sellMarketplace, o.netProfit]),
    ).toEqual([
      ['DZ5485-612', 'eBay', 'Flight Club', 2581],
      ['FV5029-006', 'eBay', 'Kicks Crew', 2088],
      ['FV5029-006', 'GOAT', 'Kicks Crew', 788],
      ['DZ5485-612', 'GOAT', 'Flight Club', 80],
    ]);
    expect(report.opportunities.every((o) => o.estimated)).toBe(true);
  });

  it('applies the gross spread threshold', async () => {
    const report = await scanForArbitrage([createDemoSource()], { query: '' }, {
      fees: createFeeModel(),
      minGrossSpread: 4000,
      now: NOW,
    });

    expect(report.opportunities.map((o) => o.grossSpread)).toEqual([6001, 4400]);
  });
});
