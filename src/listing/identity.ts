/**
 * Identity keys - style code and marketplace normalization
 */

import type { IdentityKey, Listing } from '../types';

/**
 * Trim and uppercase a style code, turning whitespace/underscore runs into
 * single hyphens: " dz5485 612 " -> "DZ5485-612".
 * Returns null when nothing alphanumeric is left.
 */
export function normalizeStyleCode(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const code = String(value)
    .trim()
    .toUpperCase()
    .replace(/[\s_]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return /[A-Z0-9]/.test(code) ? code : null;
}

/**
 * Alphanumeric-only form used for matching, so "DZ5485-612" and
 * "DZ5485 612" and "dz5485612" all compare equal.
 */
export function styleCodeMatchKey(styleCode: string): string {
  return styleCode.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Lowercase alphanumeric form of a marketplace name: "Flight Club" -> "flightclub".
 */
export function marketplaceKey(marketplace: string): string {
  return marketplace.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function sameMarketplace(a: string, b: string): boolean {
  return marketplaceKey(a) === marketplaceKey(b);
}

export function identityKeyOf(listing: Listing): IdentityKey {
  return { styleCode: listing.styleCode, size: listing.size };
}

/** String form used as a map key: "DZ5485612@10.0" */
export function formatIdentityKey(key: IdentityKey): string {
  return `${styleCodeMatchKey(key.styleCode)}@${key.size.toFixed(1)}`;
}

/** Code-unit string comparison, independent of locale */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Order by match key, then size ascending */
export function compareIdentityKeys(a: IdentityKey, b: IdentityKey): number {
  return compareText(styleCodeMatchKey(a.styleCode), styleCodeMatchKey(b.styleCode)) || a.size - b.size;
}
