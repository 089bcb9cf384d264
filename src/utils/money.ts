/**
 * Fixed-point money helpers.
 *
 * Prices are integer cents. Parsing works on the decimal text so that
 * values like 0.145 round to 15 cents, not 14.
 */

/** Integer amount in currency minor units. */
export type Cents = number;

const MONEY_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/;

/**
 * Parse a price into cents. Accepts numbers and strings such as
 * "$1,234.50" or "230". Rounds half-up at the third decimal.
 * Returns null for anything that is not a finite decimal amount.
 */
export function parseMoney(value: unknown): Cents | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = String(value);
    // Very large or very small numbers stringify in exponent form
    if (/e/i.test(text)) text = value.toFixed(6);
  } else if (typeof value === 'string') {
    text = value.trim().replace(/^\$/, '').replace(/,/g, '').trim();
  } else {
    return null;
  }

  const match = MONEY_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const digits = fraction.padEnd(3, '0');
  let cents = parseInt(whole, 10) * 100 + parseInt(digits.slice(0, 2), 10);
  if (parseInt(digits[2], 10) >= 5) cents += 1;
  if (!Number.isSafeInteger(cents)) return null;

  return sign && cents !== 0 ? -cents : cents;
}

/**
 * Render cents as a plain decimal string, e.g. 20815 -> "208.15".
 */
export function formatMoney(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Convert a percentage rate (9.5) into integer basis points (950).
 * Finer rates are rounded; configuration rejects them.
 */
export function percentToBasisPoints(pct: number): number {
  return Math.round(pct * 100);
}

/**
 * amount * basisPoints / 10000, rounded up to the next whole cent.
 * Used for fees so that they are never understated.
 */
export function applyBasisPointsCeil(amount: Cents, basisPoints: number): Cents {
  if (amount <= 0 || basisPoints <= 0) return 0;
  const product = amount * basisPoints;
  return Math.floor((product + 9999) / 10000);
}

/**
 * Ratio of two cent amounts as a percentage rounded to 2 decimals.
 * Returns 0 when the denominator is 0.
 */
export function ratioPct(numerator: Cents, denominator: Cents): number {
  if (denominator === 0) return 0;
  return Math.round((numerator * 10000) / denominator) / 100;
}
