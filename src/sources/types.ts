/**
 * Marketplace source contract
 */

import type { RawListingRecord } from '../types';

/**
 * A marketplace data source. Implementations fetch and return plain field
 * mappings; normalization happens in the aggregator. A rejected promise
 * means the source is unavailable for this scan.
 */
export interface MarketplaceSource {
  /** Stable identifier from configuration, e.g. "stockx" */
  readonly id: string;
  /** Marketplace name attached to records that do not carry their own */
  readonly name: string;
  /** False when credentials or data are missing; such sources are skipped */
  isConfigured(): boolean;
  search(query: string, size?: number): Promise<RawListingRecord[]>;
  getByStyleCode(styleCode: string, size?: number): Promise<RawListingRecord[]>;
}

export interface HttpSourceConfig {
  kind: 'http';
  id: string;
  name: string;
  /** URL template; {query} and {size} are substituted */
  searchUrl: string;
  /** URL template; {styleCode} and {size} are substituted. Defaults to searchUrl with {query} = style code. */
  styleCodeUrl?: string;
  /** Env var holding the API key; source is unconfigured when it is empty */
  apiKeyEnv?: string;
  /** Header carrying the key. "Authorization" sends "Bearer <key>". */
  apiKeyHeader?: string;
  timeoutMs?: number;
}

export interface FileSourceConfig {
  kind: 'file';
  id: string;
  name: string;
  path: string;
}

export interface DemoSourceConfig {
  kind: 'demo';
  id: string;
  name: string;
}

export type SourceConfig = HttpSourceConfig | FileSourceConfig | DemoSourceConfig;
