import type { Outcome } from '../types/valuation.js';
import { InvalidOddsError } from './errors.js';

export type OddsFormat = 'decimal' | 'american' | 'fractional';

const NUMERIC_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/** American prices are never inside (-100, +100): -200 -> 1.5, +150 -> 2.5 */
export function americanToDecimal(american: number, outcome: Outcome = 'team1'): number {
  if (!Number.isFinite(american) || Math.abs(american) < 100) {
    throw new InvalidOddsError(outcome, american, 'american odds must be +100 or more, or -100 or less');
  }
  if (american < 0) return 1 + 100 / Math.abs(american);
  return 1 + american / 100;
}

/** "5/2" -> 3.5, "evens" -> 2 */
export function fractionalToDecimal(fractional: string, outcome: Outcome = 'team1'): number {
  const raw = fractional.trim().toLowerCase();
  if (raw === 'evens' || raw === 'evs') return 2;

  const m = raw.match(/^(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)$/);
  if (!m) {
    throw new InvalidOddsError(outcome, fractional, 'fractional odds must look like "5/2"');
  }
  const numerator = parseFloat(m[1]!);
  const denominator = parseFloat(m[2]!);
  if (denominator <= 0) {
    throw new InvalidOddsError(outcome, fractional, 'denominator must be positive');
  }
  return 1 + numerator / denominator;
}

/**
 * Convert a price in any supported format to decimal odds.
 * Does not apply the "> 1.0" rule; the valuator does that.
 */
export function toDecimalOdds(
  price: number | string,
  format: OddsFormat,
  outcome: Outcome = 'team1',
): number {
  switch (format) {
    case 'decimal':
    case 'american': {
      const malformed = typeof price === 'string' && !NUMERIC_PATTERN.test(price.trim());
      const value = typeof price === 'number' ? price : Number(price.trim());
      if (malformed || !Number.isFinite(value)) {
        throw new InvalidOddsError(outcome, price, `${format} odds must be numeric`);
      }
      return format === 'decimal' ? value : americanToDecimal(value, outcome);
    }
    case 'fractional':
      return fractionalToDecimal(String(price), outcome);
  }
}
