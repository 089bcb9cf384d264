/**
 * Size normalization onto the canonical US men's scale
 *
 * Conversions:
 *   US men's       identity            "10", "US 10", "M10", "10M"
 *   US women's     minus 1.5           "W8", "8W", "WMNS 8"
 *   Youth / GS     identity, 3.5Y-7Y   "7Y", "6.5 GS"
 *   UK             plus 1              "UK 9"
 *   EU             chart lookup        "EU 44", "44 EU"
 *   Toddler (C)    unconvertible
 *
 * Results must be half sizes within [MIN_SIZE, MAX_SIZE].
 */

export type SizeSystem = 'us-men' | 'us-women' | 'youth' | 'uk' | 'eu' | 'toddler';

export const MIN_SIZE = 3.5;
export const MAX_SIZE = 18;

const WOMENS_OFFSET = 1.5;
const UK_OFFSET = 1;
const YOUTH_MIN = 3.5;
const YOUTH_MAX = 7;

// Nike men's chart, EU -> US
const EU_TO_US_MEN: Record<string, number> = {
  '35.5': 3.5, '36': 4, '36.5': 4.5, '37.5': 5, '38': 5.5,
  '38.5': 6, '39': 6.5, '40': 7, '40.5': 7.5, '41': 8,
  '42': 8.5, '42.5': 9, '43': 9.5, '44': 10, '44.5': 10.5,
  '45': 11, '45.5': 11.5, '46': 12, '47': 12.5, '47.5': 13,
  '48': 13.5, '48.5': 14, '49': 14.5, '49.5': 15, '50.5': 16,
  '51.5': 17, '52.5': 18,
};

const SYSTEM_ALIASES: Record<string, SizeSystem> = {
  'us': 'us-men', 'usm': 'us-men', 'men': 'us-men', 'mens': 'us-men', 'usmen': 'us-men', 'usmens': 'us-men',
  'mensus': 'us-men', 'm': 'us-men',
  'w': 'us-women', 'usw': 'us-women', 'women': 'us-women', 'womens': 'us-women', 'wmns': 'us-women',
  'uswomen': 'us-women', 'uswomens': 'us-women', 'womensus': 'us-women', 'uswmns': 'us-women',
  'y': 'youth', 'gs': 'youth', 'youth': 'youth', 'kids': 'youth',
  'uk': 'uk',
  'eu': 'eu', 'eur': 'eu',
  'c': 'toddler', 'td': 'toddler', 'toddler': 'toddler', 'infant': 'toddler',
};

const NUMBER = '(\\d{1,2}(?:\\.\\d+)?)';

const PATTERNS: Array<{ pattern: RegExp; system: SizeSystem | null }> = [
  { pattern: new RegExp(`^UK\\s*${NUMBER}$`), system: 'uk' },
  { pattern: new RegExp(`^${NUMBER}\\s*UK$`), system: 'uk' },
  { pattern: new RegExp(`^EUR?\\s*${NUMBER}$`), system: 'eu' },
  { pattern: new RegExp(`^${NUMBER}\\s*EUR?$`), system: 'eu' },
  { pattern: new RegExp(`^(?:US\\s*)?(?:W|WMNS|WOMEN'?S)\\s*${NUMBER}$`), system: 'us-women' },
  { pattern: new RegExp(`^(?:US\\s*)?${NUMBER}\\s*(?:W|WMNS|WOMEN'?S)$`), system: 'us-women' },
  { pattern: new RegExp(`^${NUMBER}\\s*(?:Y|GS)$`), system: 'youth' },
  { pattern: new RegExp(`^${NUMBER}\\s*(?:C|TD)$`), system: 'toddler' },
  { pattern: new RegExp(`^(?:US\\s*)?(?:M|MEN'?S)\\s*${NUMBER}$`), system: 'us-men' },
  { pattern: new RegExp(`^(?:US\\s*)?${NUMBER}\\s*(?:M|MEN'?S)$`), system: 'us-men' },
  // Bare number: system comes from the record, if any
  { pattern: new RegExp(`^(?:US\\s*)?${NUMBER}$`), system: null },
];

export function parseSizeSystem(value: unknown): SizeSystem | null {
  if (typeof value !== 'string') return null;
  const key = value.toLowerCase().replace(/[^a-z]/g, '');
  return SYSTEM_ALIASES[key] ?? null;
}

function isHalfSize(size: number): boolean {
  return Number.isInteger(size * 2);
}

/**
 * Convert a size in the given system to US men's.
 * Returns null when the size has no men's equivalent.
 */
export function convertToUsMen(size: number, system: SizeSystem): number | null {
  if (!Number.isFinite(size) || size <= 0) return null;

  let converted: number | null = null;
  switch (system) {
    case 'us-men':
      converted = size;
      break;
    case 'us-women':
      converted = size - WOMENS_OFFSET;
      break;
    case 'youth':
      converted = size >= YOUTH_MIN && size <= YOUTH_MAX ? size : null;
      break;
    case 'uk':
      converted = size + UK_OFFSET;
      break;
    case 'eu':
      converted = EU_TO_US_MEN[String(size)] ?? null;
      break;
    case 'toddler':
      break;
  }

  if (converted === null) return null;
  if (!isHalfSize(converted)) return null;
  if (converted < MIN_SIZE || converted > MAX_SIZE) return null;
  return converted;
}

/**
 * Normalize a raw size value onto the canonical scale.
 *
 * A marker in the value itself ("W8", "UK 9") wins over `systemHint`;
 * a bare number uses `systemHint`, defaulting to US men's.
 */
export function normalizeSize(value: unknown, systemHint?: unknown): number | null {
  // Only consulted for bare numbers; an unreadable hint makes those unconvertible
  const hinted = (): SizeSystem | null =>
    systemHint === undefined || systemHint === null || systemHint === '' ? 'us-men' : parseSizeSystem(systemHint);

  if (typeof value === 'number') {
    const system = hinted();
    return system === null ? null : convertToUsMen(value, system);
  }
  if (typeof value !== 'string') return null;

  const text = value
    .trim()
    .toUpperCase()
    .replace(/^(?:SIZE|SZ)\.?\s*/, '')
    .replace(/\s+/g, ' ');

  for (const { pattern, system } of PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const resolved = system ?? hinted();
      return resolved === null ? null : convertToUsMen(parseFloat(match[1]), resolved);
    }
  }
  return null;
}
