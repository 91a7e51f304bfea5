/**
 * Integer helpers for classifying results
 * No regex, no side effects - just computation
 */

import { bitLength, isqrt } from "../math/rational.ts";

/** Divisors are not enumerated above this value */
export const DIVISOR_LIMIT = 10n ** 12n;

/** Primality is not tested for integers wider than this many bits */
export const PRIMALITY_BIT_LIMIT = 2048;

/** Below this, trial division decides primality */
const TRIAL_DIVISION_LIMIT = 1n << 40n;

/** Miller-Rabin with these bases is exact below 3.3 * 10^24 */
const MILLER_RABIN_BASES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n];

/** (base ^ exponent) mod modulus */
export function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = base % modulus;
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % modulus;
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return result;
}

/** Check if n is prime using 6k+-1 trial division */
function isPrimeByTrialDivision(n: bigint): boolean {
  if (n < 2n) return false;
  if (n < 4n) return true;
  if (n % 2n === 0n || n % 3n === 0n) return false;

  const limit = isqrt(n);
  for (let i = 5n; i <= limit; i += 6n) {
    if (n % i === 0n || n % (i + 2n) === 0n) return false;
  }
  return true;
}

function isStrongProbablePrime(n: bigint, base: bigint): boolean {
  let d = n - 1n;
  let s = 0;
  while (d % 2n === 0n) {
    d /= 2n;
    s++;
  }
  let x = modPow(base, d, n);
  if (x === 1n || x === n - 1n) return true;
  for (let r = 1; r < s; r++) {
    x = (x * x) % n;
    if (x === n - 1n) return true;
  }
  return false;
}

/**
 * Primality test
 * Trial division for small n, Miller-Rabin over fixed bases above that
 * (exact below 3.3 * 10^24, a strong probable-prime test beyond)
 */
export function isPrime(n: bigint): boolean {
  if (n < TRIAL_DIVISION_LIMIT) return isPrimeByTrialDivision(n);
  for (const base of MILLER_RABIN_BASES) {
    if (n % base === 0n) return false;
  }
  return MILLER_RABIN_BASES.every((base) => isStrongProbablePrime(n, base));
}

/**
 * All divisors of n, ascending
 * Paired trial division up to ⌊√n⌋: each i dividing n contributes i and n/i,
 * the square root of a perfect square only once.
 * Returns [] for n <= 0 and null above DIVISOR_LIMIT.
 *
 * @example
 * getDivisors(36n) // [1n, 2n, 3n, 4n, 6n, 9n, 12n, 18n, 36n]
 */
export function getDivisors(n: bigint): bigint[] | null {
  if (n <= 0n) return [];
  if (n > DIVISOR_LIMIT) return null;

  const value = Number(n);
  const small: number[] = [];
  const large: number[] = [];
  const limit = Math.floor(Math.sqrt(value));
  for (let i = 1; i <= limit; i++) {
    if (value % i === 0) {
      small.push(i);
      const pair = value / i;
      if (pair !== i) large.push(pair);
    }
  }
  return [...small, ...large.reverse()].map((d) => BigInt(d));
}

export type Parity = "even" | "odd";

/** r = 2K when even, r = 2K+1 when odd */
export interface ParityInfo {
  parity: Parity;
  k: bigint;
}

/**
 * Parity decomposition of an integer
 * Holds for negatives too: -3 = 2(-2) + 1
 */
export function parityOf(r: bigint): ParityInfo {
  if (r % 2n === 0n) return { parity: "even", k: r / 2n };
  return { parity: "odd", k: (r - 1n) / 2n };
}

export type PrimalityInfo =
  | { kind: "prime" }
  | { kind: "composite"; divisors: bigint[] | null }
  | { kind: "unit" }
  | { kind: "zero" }
  | { kind: "negative" }
  | { kind: "too-large" };

export interface ClassifyOptions {
  /** Enumerate divisors of composites */
  withDivisors?: boolean;
}

/** Prime, composite (with divisors), 1, 0, negative, or too wide to test */
export function classifyPrimality(r: bigint, options: ClassifyOptions = {}): PrimalityInfo {
  const { withDivisors = true } = options;
  if (r < 0n) return { kind: "negative" };
  if (r === 0n) return { kind: "zero" };
  if (r === 1n) return { kind: "unit" };
  if (bitLength(r) > PRIMALITY_BIT_LIMIT) return { kind: "too-large" };
  if (isPrime(r)) return { kind: "prime" };
  return { kind: "composite", divisors: withDivisors ? getDivisors(r) : null };
}
