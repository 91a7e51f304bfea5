/**
 * Exact rational numbers over bigint
 * Used wherever sampled results must stay exact (parity and primality of large values)
 */

/** Exponents above this are left to floating point */
export const MAX_EXACT_EXPONENT = 4096n;

/** Results wider than this many bits are left to floating point */
const MAX_EXACT_BITS = 1_000_000;

/** Greatest common divisor of two bigints (always non-negative) */
export function bigGcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/** Least common multiple of two positive bigints */
export function bigLcm(a: bigint, b: bigint): bigint {
  return (a / bigGcd(a, b)) * b;
}

/** Integer square root: largest r with r*r <= n, for n >= 0 */
export function isqrt(n: bigint): bigint {
  if (n < 0n) throw new RangeError("isqrt of negative number");
  if (n < 2n) return n;
  // Newton iteration from an overestimate
  let x = 1n << BigInt(Math.ceil(bitLength(n) / 2));
  while (true) {
    const y = (x + n / x) >> 1n;
    if (y >= x) return x;
    x = y;
  }
}

export function bitLength(n: bigint): number {
  return (n < 0n ? -n : n).toString(2).length;
}

export class Rational {
  static readonly ZERO = new Rational(0n, 1n);
  static readonly ONE = new Rational(1n, 1n);
  static readonly TWO = new Rational(2n, 1n);

  /** Always reduced, denominator always positive */
  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  /** Build a reduced fraction; the denominator must be non-zero */
  static of(num: bigint, den: bigint = 1n): Rational {
    if (den === 0n) throw new RangeError("Zero denominator");
    const sign = den < 0n ? -1n : 1n;
    const g = bigGcd(num, den) || 1n;
    return new Rational((sign * num) / g, (sign * den) / g);
  }

  static fromInteger(n: number | bigint): Rational {
    return Rational.of(BigInt(n));
  }

  /**
   * Parse a decimal literal exactly: "12", "2.5", ".5", "1e3", "2.5e-3"
   * Returns null for anything else
   */
  static parse(literal: string): Rational | null {
    const match = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(literal.trim());
    if (!match) return null;
    const [, sign, intPart = "", fracPart = "", expPart] = match;
    if (intPart === "" && fracPart === "") return null;

    let value = Rational.of(BigInt(intPart + fracPart || "0"), 10n ** BigInt(fracPart.length));
    if (expPart !== undefined) {
      const exp = BigInt(expPart);
      if (exp > MAX_EXACT_EXPONENT || exp < -MAX_EXACT_EXPONENT) return null;
      const scale = 10n ** (exp < 0n ? -exp : exp);
      value =
        exp < 0n
          ? Rational.of(value.num, value.den * scale)
          : Rational.of(value.num * scale, value.den);
    }
    return sign === "-" ? value.neg() : value;
  }

  /** Convert a finite JS number exactly (binary fractions included) */
  static fromNumber(n: number): Rational | null {
    if (!Number.isFinite(n)) return null;
    if (Number.isInteger(n)) return Rational.of(BigInt(n));
    return Rational.parse(n.toString());
  }

  add(other: Rational): Rational {
    return Rational.of(this.num * other.den + other.num * this.den, this.den * other.den);
  }

  sub(other: Rational): Rational {
    return Rational.of(this.num * other.den - other.num * this.den, this.den * other.den);
  }

  mul(other: Rational): Rational {
    return Rational.of(this.num * other.num, this.den * other.den);
  }

  /** Returns null on division by zero */
  div(other: Rational): Rational | null {
    if (other.num === 0n) return null;
    return Rational.of(this.num * other.den, this.den * other.num);
  }

  /** Floored remainder, with the sign of the divisor; null on modulo by zero */
  mod(other: Rational): Rational | null {
    if (other.num === 0n) return null;
    const quotient = Rational.of(this.num * other.den, this.den * other.num);
    let floored = quotient.num / quotient.den;
    if (quotient.num < 0n && floored * quotient.den !== quotient.num) floored -= 1n;
    return this.sub(Rational.of(floored).mul(other));
  }

  neg(): Rational {
    return new Rational(-this.num, this.den);
  }

  abs(): Rational {
    return this.num < 0n ? this.neg() : this;
  }

  /**
   * Integer power; null for 0 to a negative power
   * or when the exact result would be too large to be worth computing
   */
  pow(exponent: bigint): Rational | null {
    if (exponent < -MAX_EXACT_EXPONENT || exponent > MAX_EXACT_EXPONENT) return null;
    if (exponent === 0n) return Rational.ONE;
    if (exponent < 0n) {
      if (this.num === 0n) return null;
      return Rational.ONE.div(this)?.pow(-exponent) ?? null;
    }
    const width = Math.max(bitLength(this.num), bitLength(this.den));
    if (width * Number(exponent) > MAX_EXACT_BITS) return null;
    return new Rational(this.num ** exponent, this.den ** exponent);
  }

  /** Exact square root when numerator and denominator are perfect squares */
  sqrt(): Rational | null {
    if (this.num < 0n) return null;
    const n = isqrt(this.num);
    const d = isqrt(this.den);
    if (n * n !== this.num || d * d !== this.den) return null;
    return new Rational(n, d);
  }

  compare(other: Rational): number {
    const diff = this.num * other.den - other.num * this.den;
    return diff < 0n ? -1 : diff > 0n ? 1 : 0;
  }

  equals(other: Rational): boolean {
    return this.num === other.num && this.den === other.den;
  }

  sign(): -1 | 0 | 1 {
    return this.num < 0n ? -1 : this.num > 0n ? 1 : 0;
  }

  isInteger(): boolean {
    return this.den === 1n;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  toNumber(): number {
    if (this.den === 1n) return Number(this.num);
    // Scale both sides down so Number() stays finite
    const shift = Math.max(bitLength(this.num), bitLength(this.den)) - 1000;
    if (shift > 0) {
      const s = BigInt(shift);
      return Number(this.num >> s) / Number(this.den >> s);
    }
    return Number(this.num) / Number(this.den);
  }

  /** "3", "-1/2" */
  toString(): string {
    return this.den === 1n ? this.num.toString() : `${this.num}/${this.den}`;
  }
}
