/**
 * Numeric values produced by evaluation
 * Exact rationals where every step stayed rational, floats otherwise
 */

import { Rational } from "./rational.ts";

export type NumericValue =
  | { exact: true; value: Rational }
  | { exact: false; value: number };

/** Floats this close to an integer (relative) count as that integer */
export const INTEGER_TOLERANCE = 1e-9;

export function exact(value: Rational): NumericValue {
  return { exact: true, value };
}

export function approx(value: number): NumericValue {
  return { exact: false, value };
}

export function toNumber(v: NumericValue): number {
  return v.exact ? v.value.toNumber() : v.value;
}

/**
 * Integer value as bigint, or null when the value is not integral
 * Floats are snapped within INTEGER_TOLERANCE and must be safe integers after snapping
 */
export function toInteger(v: NumericValue): bigint | null {
  if (v.exact) {
    return v.value.isInteger() ? v.value.num : null;
  }
  const rounded = Math.round(v.value);
  if (!Number.isSafeInteger(rounded)) return null;
  if (Math.abs(v.value - rounded) > INTEGER_TOLERANCE * Math.max(1, Math.abs(v.value))) {
    return null;
  }
  return BigInt(rounded);
}

/** -1, 0 or 1 */
export function signOf(v: NumericValue): number {
  return v.exact ? v.value.sign() : Math.sign(v.value);
}

/** Integer if whole, otherwise fixed to 6 decimals */
function formatResult(n: number): number {
  return Number.isInteger(n) ? n : +n.toFixed(6);
}

/**
 * Human-readable form: integers in full, other values as decimals
 * @example
 * formatNumeric(exact(Rational.of(1n, 2n))) // "0.5"
 */
export function formatNumeric(v: NumericValue): string {
  const integer = toInteger(v);
  if (integer !== null) return integer.toString();
  return String(formatResult(toNumber(v)));
}
