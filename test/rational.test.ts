import { describe, expect, test } from "vitest";
import {
  INTEGER_TOLERANCE,
  Rational,
  approx,
  bigGcd,
  bigLcm,
  exact,
  formatNumeric,
  isqrt,
  toInteger,
} from "../src/math/index.ts";

const r = (num: bigint, den: bigint = 1n) => Rational.of(num, den);

describe("Rational", () => {
  describe("construction", () => {
    test("reduces and keeps the denominator positive", () => {
      expect(r(2n, 4n).toString()).toBe("1/2");
      expect(r(1n, -2n).toString()).toBe("-1/2");
      expect(r(0n, 5n).toString()).toBe("0");
      expect(r(6n, 3n).toString()).toBe("2");
    });

    test("rejects a zero denominator", () => {
      expect(() => r(1n, 0n)).toThrow(RangeError);
    });

    test("parses decimal literals exactly", () => {
      expect(Rational.parse("12")?.toString()).toBe("12");
      expect(Rational.parse("2.5")?.toString()).toBe("5/2");
      expect(Rational.parse(".5")?.toString()).toBe("1/2");
      expect(Rational.parse("1e3")?.toString()).toBe("1000");
      expect(Rational.parse("2.5e-3")?.toString()).toBe("1/400");
      expect(Rational.parse("-0.75")?.toString()).toBe("-3/4");
    });

    test("rejects non-literals", () => {
      expect(Rational.parse("abc")).toBeNull();
      expect(Rational.parse(".")).toBeNull();
      expect(Rational.parse("1e99999")).toBeNull();
    });

    test("fromNumber", () => {
      expect(Rational.fromNumber(0.1)?.toString()).toBe("1/10");
      expect(Rational.fromNumber(-7)?.toString()).toBe("-7");
      expect(Rational.fromNumber(Number.POSITIVE_INFINITY)).toBeNull();
    });
  });

  describe("arithmetic", () => {
    test("add, sub, mul, div", () => {
      expect(r(1n, 2n).add(r(1n, 3n)).toString()).toBe("5/6");
      expect(r(1n, 2n).sub(r(1n, 3n)).toString()).toBe("1/6");
      expect(r(2n, 3n).mul(r(3n, 4n)).toString()).toBe("1/2");
      expect(r(1n, 2n).div(r(1n, 4n))?.toString()).toBe("2");
      expect(r(1n).div(Rational.ZERO)).toBeNull();
    });

    test("mod is floored and takes the sign of the divisor", () => {
      expect(r(7n).mod(r(3n))?.toString()).toBe("1");
      expect(r(-7n).mod(r(3n))?.toString()).toBe("2");
      expect(r(7n).mod(r(-3n))?.toString()).toBe("-2");
      expect(r(-6n).mod(r(3n))?.toString()).toBe("0");
      expect(r(-1n, 2n).mod(r(1n))?.toString()).toBe("1/2");
      expect(r(7n, 2n).mod(r(1n))?.toString()).toBe("1/2");
      expect(r(7n).mod(Rational.ZERO)).toBeNull();
    });

    test("integer powers", () => {
      expect(r(2n, 3n).pow(2n)?.toString()).toBe("4/9");
      expect(r(2n, 3n).pow(-2n)?.toString()).toBe("9/4");
      expect(r(5n).pow(0n)?.toString()).toBe("1");
      expect(Rational.ZERO.pow(-1n)).toBeNull();
      expect(r(2n).pow(5000n)).toBeNull();
    });

    test("exact square roots only", () => {
      expect(r(9n, 4n).sqrt()?.toString()).toBe("3/2");
      expect(r(2n).sqrt()).toBeNull();
      expect(r(-4n).sqrt()).toBeNull();
    });

    test("comparison and predicates", () => {
      expect(r(1n, 2n).compare(r(1n, 3n))).toBe(1);
      expect(r(-1n).compare(r(0n))).toBe(-1);
      expect(r(2n, 4n).equals(r(1n, 2n))).toBe(true);
      expect(r(-3n).sign()).toBe(-1);
      expect(r(4n, 2n).isInteger()).toBe(true);
      expect(r(1n, 4n).toNumber()).toBe(0.25);
    });
  });

  describe("bigint helpers", () => {
    test("gcd, lcm and integer square root", () => {
      expect(bigGcd(12n, -18n)).toBe(6n);
      expect(bigLcm(4n, 6n)).toBe(12n);
      expect(isqrt(10n)).toBe(3n);
      expect(isqrt(16n)).toBe(4n);
      expect(isqrt(10n ** 30n)).toBe(10n ** 15n);
    });
  });
});

describe("numeric values", () => {
  test("toInteger on exact values", () => {
    expect(toInteger(exact(r(12n)))).toBe(12n);
    expect(toInteger(exact(r(1n, 2n)))).toBeNull();
  });

  test("toInteger snaps floats within tolerance", () => {
    expect(toInteger(approx(2 + INTEGER_TOLERANCE / 10))).toBe(2n);
    expect(toInteger(approx(2.5))).toBeNull();
    expect(toInteger(approx(1e300))).toBeNull();
  });

  test("formatNumeric", () => {
    expect(formatNumeric(exact(r(1n, 2n)))).toBe("0.5");
    expect(formatNumeric(exact(r(10n ** 20n)))).toBe("100000000000000000000");
    expect(formatNumeric(approx(Math.SQRT2))).toBe("1.414214");
  });
});
