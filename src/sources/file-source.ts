/**
 * File source - listing records from a local JSON file
 *
 * Useful for replaying captured feeds and for the bundled demo data.
 * The file holds an array of records (or { listings: [...] }).
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { createLogger } from '../utils/logger';
import { SourceUnavailableError, errorMessage } from '../utils/errors';
import { normalizeStyleCode, styleCodeMatchKey } from '../listing/identity';
import type { RawListingRecord } from '../types';
import { extractRecords } from './http-source';
import type { DemoSourceConfig, FileSourceConfig, MarketplaceSource } from './types';

const logger = createLogger('file-source');

/** Bundled sample data; the figures are made up */
export const DEMO_LISTINGS_PATH = join(__dirname, '..', '..', 'data', 'demo-listings.json');

function textField(record: RawListingRecord, ...names: string[]): string {
  for (const name of names) {
    const value = record[name];
    if (typeof value === 'string') return value;
  }
  return '';
}

/** Every whitespace-separated query token appears in name or style code */
export function matchesQuery(record: RawListingRecord, query: string): boolean {
  const haystack = `${textField(record, 'name')} ${textField(record, 'styleCode', 'style_code')}`.toLowerCase();
  const tokens = query.toLowerCase().split(/\s+/).filter(Boolean);
  return tokens.every((token) => haystack.includes(token));
}

export function matchesStyleCode(record: RawListingRecord, styleCode: string): boolean {
  const wanted = normalizeStyleCode(styleCode);
  const actual = normalizeStyleCode(record.styleCode ?? record.style_code);
  return wanted !== null && actual !== null && styleCodeMatchKey(wanted) === styleCodeMatchKey(actual);
}

export function createFileSource(config: FileSourceConfig): MarketplaceSource {
  const path = resolve(config.path);

  async function load(): Promise<RawListingRecord[]> {
    let body: unknown;
    try {
      body = JSON.parse(await readFile(path, 'utf-8'));
    } catch (err) {
      throw new SourceUnavailableError(config.id, `cannot read ${path}: ${errorMessage(err)}`, { cause: err });
    }
    const records = extractRecords(body);
    if (!records) {
      throw new SourceUnavailableError(config.id, `${path} is neither an array nor { listings: [...] }`);
    }
    logger.debug({ source: config.id, path, count: records.length }, 'Loaded listing records');
    return records;
  }

  return {
    id: config.id,
    name: config.name,

    isConfigured(): boolean {
      return existsSync(path);
    },

    async search(query: string): Promise<RawListingRecord[]> {
      const records = await load();
      return records.filter((record) => matchesQuery(record, query));
    },

    async getByStyleCode(styleCode: string): Promise<RawListingRecord[]> {
      const records = await load();
      return records.filter((record) => matchesStyleCode(record, styleCode));
    },
  };
}

export function createDemoSource(config: DemoSourceConfig = { kind: 'demo', id: 'demo', name: 'Demo' }): MarketplaceSource {
  return createFileSource({ kind: 'file', id: config.id, name: config.name, path: DEMO_LISTINGS_PATH });
}
