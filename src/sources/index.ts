/**
 * Source Registry - builds marketplace sources from configuration
 */

import { createLogger } from '../utils/logger';
import { createHttpSource } from './http-source';
import { createDemoSource, createFileSource } from './file-source';
import type { MarketplaceSource, SourceConfig } from './types';

const logger = createLogger('sources');

export type { MarketplaceSource, SourceConfig, HttpSourceConfig, FileSourceConfig, DemoSourceConfig } from './types';
export { createHttpSource } from './http-source';
export { createFileSource, createDemoSource, DEMO_LISTINGS_PATH } from './file-source';

export function createSource(config: SourceConfig, env: Record<string, string | undefined> = process.env): MarketplaceSource {
  switch (config.kind) {
    case 'http':
      return createHttpSource(config, env);
    case 'file':
      return createFileSource(config);
    case 'demo':
      return createDemoSource(config);
  }
}

export function createSources(
  configs: readonly SourceConfig[],
  env: Record<string, string | undefined> = process.env,
): MarketplaceSource[] {
  const sources = configs.map((config) => createSource(config, env));
  const unconfigured = sources.filter((source) => !source.isConfigured()).map((source) => source.id);
  if (unconfigured.length > 0) {
    logger.info({ sources: unconfigured }, 'Skipping unconfigured sources');
  }
  return sources;
}
