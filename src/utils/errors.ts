/**
 * Error types shared across the scan pipeline.
 *
 * Failures are scoped to the unit they affect: one listing, one marketplace,
 * or one source. Only NoSourcesConfiguredError and ConfigError abort a run.
 */

/**
 * No fee schedule exists for a marketplace. Fatal to that marketplace's
 * opportunities only.
 */
export class UnknownFeeScheduleError extends Error {
  readonly marketplace: string;

  constructor(marketplace: string) {
    super(`No fee schedule configured for marketplace "${marketplace}"`);
    this.name = 'UnknownFeeScheduleError';
    this.marketplace = marketplace;
  }
}

/**
 * A marketplace source failed to return a listing batch.
 */
export class SourceUnavailableError extends Error {
  readonly source: string;
  readonly statusCode?: number;

  constructor(source: string, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(`${source}: ${message}`, { cause: options.cause });
    this.name = 'SourceUnavailableError';
    this.source = source;
    this.statusCode = options.statusCode;
  }
}

/**
 * Every known source is missing credentials or data.
 */
export class NoSourcesConfiguredError extends Error {
  readonly sources: string[];

  constructor(sources: string[]) {
    const known = sources.length > 0 ? ` (known: ${sources.join(', ')})` : '';
    super(`No marketplace sources are configured${known}`);
    this.name = 'NoSourcesConfiguredError';
    this.sources = sources;
  }
}

/**
 * Non-2xx HTTP response.
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(url: string, statusCode: number, body: string) {
    super(`HTTP ${statusCode} from ${url}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Configuration file or environment failed validation.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
