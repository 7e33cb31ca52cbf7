import Decimal from 'decimal.js';
import { MalformedNumberError } from '../errors/rebalance.errors';

// Shared Decimal.js settings for balances, totals and fractions
Decimal.set({
  precision: 28,           // 28 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

// Plain decimal literal: optional sign, digits with optional fraction, optional exponent.
// Rejects what the Decimal constructor would otherwise accept (Infinity, NaN, hex).
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses untrusted text into a Decimal.
 * @param context - prefix for the error message, e.g. `balances.csv row 4`
 * @throws MalformedNumberError
 */
export function parseDecimal(input: string, context: string): Decimal {
  const text = input.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    throw new MalformedNumberError(input, context);
  }
  return new Decimal(text);
}

/**
 * Like `parseDecimal`, but negative values are rejected (`-0` is zero).
 * @throws MalformedNumberError
 */
export function parseNonNegative(input: string, context: string): Decimal {
  const value = parseDecimal(input, context);
  if (value.isNegative() && !value.isZero()) {
    throw new MalformedNumberError(input, context, 'must not be negative');
  }
  return value;
}

/**
 * Parses a user-entered money amount ("$12,500.00", " 1,000 ").
 * Thousands separators and a leading dollar sign are ignored.
 * @throws MalformedNumberError when unparseable or negative
 */
export function parseAmount(input: string, context = 'Investment amount'): Decimal {
  const cleaned = input.trim().replace(/^\$/, '').replace(/,/g, '');
  return parseNonNegative(cleaned, context);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Converts Decimal to USD string with 2 decimal places.
 */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/** `$1,234.50` */
export function formatCurrency(value: Decimal): string {
  const fixed = toUSD(value);
  const negative = fixed.startsWith('-');
  const [whole, cents] = (negative ? fixed.slice(1) : fixed).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${negative ? '-' : ''}$${grouped}.${cents}`;
}

/** Fraction to `12.34%`; undefined fractions render as `N/A` */
export function formatPercent(fraction: Decimal | null): string {
  if (fraction === null) {
    return 'N/A';
  }
  return `${fraction.times(100).toFixed(2, Decimal.ROUND_HALF_UP)}%`;
}

/**
 * Exact sum of Decimal values; empty input sums to 0.
 */
export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Division that reports a zero divisor as `null` instead of throwing.
 */
export function safeDivide(a: Decimal, b: Decimal): Decimal | null {
  if (b.isZero()) {
    return null;
  }
  return a.dividedBy(b);
}
