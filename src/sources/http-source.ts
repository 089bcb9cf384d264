/**
 * HTTP JSON source - a marketplace feed that already serves listing records
 *
 * The endpoint must return either an array of records or an object with a
 * `listings` array. Each record is a plain field mapping handed to the
 * normalizer unchanged.
 */

import { createLogger } from '../utils/logger';
import { SourceUnavailableError, HttpError, errorMessage } from '../utils/errors';
import { getJson } from '../utils/http';
import type { RawListingRecord } from '../types';
import type { HttpSourceConfig, MarketplaceSource } from './types';

const logger = createLogger('http-source');

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is RawListingRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the record array out of a feed response.
 */
export function extractRecords(body: unknown): RawListingRecord[] | null {
  let items: unknown = body;
  if (isRecord(body)) items = body.listings;
  if (!Array.isArray(items)) return null;
  return items.filter(isRecord);
}

/**
 * Replace {name} placeholders with URL-encoded values; missing values
 * become empty strings.
 */
export function expandUrlTemplate(template: string, values: Record<string, string | number | undefined>): string {
  return template.replace(/\{(\w+)\}/g, (_, name: string) => {
    const value = values[name];
    return value === undefined ? '' : encodeURIComponent(String(value));
  });
}

export function createHttpSource(config: HttpSourceConfig, env: Env = process.env): MarketplaceSource {
  const apiKey = (): string => (config.apiKeyEnv ? env[config.apiKeyEnv]?.trim() ?? '' : '');

  function headers(): Record<string, string> {
    const key = apiKey();
    if (!key) return {};
    const header = config.apiKeyHeader ?? 'Authorization';
    return { [header]: header.toLowerCase() === 'authorization' ? `Bearer ${key}` : key };
  }

  async function fetchRecords(url: string): Promise<RawListingRecord[]> {
    let body: unknown;
    try {
      body = await getJson(url, { headers: headers(), timeoutMs: config.timeoutMs });
    } catch (err) {
      throw new SourceUnavailableError(config.id, errorMessage(err), {
        statusCode: err instanceof HttpError ? err.statusCode : undefined,
        cause: err,
      });
    }

    const records = extractRecords(body);
    if (!records) {
      throw new SourceUnavailableError(config.id, 'response is neither an array nor { listings: [...] }');
    }
    logger.debug({ source: config.id, count: records.length }, 'Fetched listing records');
    return records;
  }

  return {
    id: config.id,
    name: config.name,

    isConfigured(): boolean {
      return !config.apiKeyEnv || apiKey().length > 0;
    },

    async search(query: string, size?: number): Promise<RawListingRecord[]> {
      return fetchRecords(expandUrlTemplate(config.searchUrl, { query, size }));
    },

    async getByStyleCode(styleCode: string, size?: number): Promise<RawListingRecord[]> {
      const template = config.styleCodeUrl ?? config.searchUrl;
      return fetchRecords(expandUrlTemplate(template, { styleCode, query: styleCode, size }));
    },
  };
}
