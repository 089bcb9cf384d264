/**
 * HTTP utilities for source feeds: JSON GET with a per-request timeout.
 * Retries are left to the caller.
 */

import { createLogger } from './logger';
import { HttpError } from './errors';

const logger = createLogger('http');

/** Default per-request timeout (15 seconds) to prevent hanging requests */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export interface GetJsonOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * GET a URL and parse the JSON body. Throws HttpError on non-2xx, and the
 * underlying abort/parse error on timeout or malformed JSON.
 */
export async function getJson(url: string, options: GetJsonOptions = {}): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const started = Date.now();

  const response = await fetch(url, {
    method: 'GET',
    headers: { Accept: 'application/json', ...options.headers },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    logger.warn({ host: hostOf(url), status: response.status }, 'HTTP request failed');
    throw new HttpError(url, response.status, body);
  }

  const data: unknown = await response.json();
  logger.debug({ host: hostOf(url), status: response.status, ms: Date.now() - started }, 'HTTP request complete');
  return data;
}
