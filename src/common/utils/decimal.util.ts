import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 28,            // 28 significant digits
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpPos: 9e15,           // No exponential notation for large numbers
  toExpNeg: -9e15,          // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

// Plain decimal literal: optional sign, digits with optional fraction, optional exponent.
const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Lenient conversion for untrusted input.
 * Returns undefined for anything that is not a finite decimal literal
 * (NaN, Infinity, hex/binary notation, blank text, objects).
 */
export function tryParseDecimal(value: unknown): Decimal | undefined {
  if (Decimal.isDecimal(value)) {
    return value.isFinite() ? new Decimal(value) : undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : undefined;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    return DECIMAL_LITERAL.test(text) ? new Decimal(text) : undefined;
  }
  return undefined;
}

/**
 * Division where a zero denominator yields zero.
 * A zero result means "no volume yet", not a literal zero average.
 */
export function safeDivide(numerator: Decimal, denominator: Decimal): Decimal {
  if (denominator.isZero()) {
    return ZERO;
  }
  return numerator.dividedBy(denominator);
}

/** Exact sum; zero for an empty list. */
export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let sum = ZERO;
  for (const value of values) {
    sum = sum.plus(value);
  }
  return sum;
}

/**
 * Canonical text form for reports: plain notation, no trailing zeros,
 * and never "-0".
 */
export function toPlainString(value: Decimal): string {
  return value.isZero() ? '0' : value.toString();
}
