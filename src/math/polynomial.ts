/**
 * Multivariate polynomials with exact rational coefficients
 *
 * Provides expansion of expressions into polynomial normal form and
 * symbolic parity analysis of integer-valued polynomials.
 *
 * @module polynomial
 */

import type { ASTNode } from "./ast.ts";
import { Rational, bigLcm } from "./rational.ts";

/** A coefficient times a product of variable powers */
export interface Term {
  coefficient: Rational;
  /** Variable → exponent (> 0), sorted by variable name */
  powers: ReadonlyArray<readonly [string, number]>;
}

/** Terms keyed by monomial ("" for the constant term) */
export type Polynomial = ReadonlyMap<string, Term>;

/** Largest exponent expanded symbolically */
export const MAX_POLY_EXPONENT = 64;

/** Expansions that would produce more terms than this are abandoned */
export const MAX_POLY_TERMS = 2000;

// =============================================================================
// CONSTRUCTION
// =============================================================================

function monomialKey(powers: ReadonlyArray<readonly [string, number]>): string {
  return powers.map(([name, exp]) => `${name}^${exp}`).join("*");
}

function fromTerms(terms: Iterable<Term>): Polynomial {
  const result = new Map<string, Term>();
  for (const term of terms) {
    const key = monomialKey(term.powers);
    const existing = result.get(key);
    const coefficient = existing ? existing.coefficient.add(term.coefficient) : term.coefficient;
    if (coefficient.isZero()) {
      result.delete(key);
    } else {
      result.set(key, { coefficient, powers: term.powers });
    }
  }
  return result;
}

export function constantPolynomial(value: Rational): Polynomial {
  return fromTerms([{ coefficient: value, powers: [] }]);
}

export function variablePolynomial(name: string): Polynomial {
  return fromTerms([{ coefficient: Rational.ONE, powers: [[name, 1]] }]);
}

// =============================================================================
// ARITHMETIC
// =============================================================================

export function addPolynomials(a: Polynomial, b: Polynomial): Polynomial {
  return fromTerms([...a.values(), ...b.values()]);
}

export function scalePolynomial(p: Polynomial, factor: Rational): Polynomial {
  return fromTerms(
    [...p.values()].map((t) => ({ coefficient: t.coefficient.mul(factor), powers: t.powers })),
  );
}

function multiplyPowers(
  a: ReadonlyArray<readonly [string, number]>,
  b: ReadonlyArray<readonly [string, number]>,
): Array<readonly [string, number]> {
  const merged = new Map<string, number>(a);
  for (const [name, exp] of b) {
    merged.set(name, (merged.get(name) ?? 0) + exp);
  }
  return [...merged.entries()].sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0));
}

/** Returns null when the product would exceed MAX_POLY_TERMS */
export function multiplyPolynomials(a: Polynomial, b: Polynomial): Polynomial | null {
  if (a.size * b.size > MAX_POLY_TERMS * 8) return null;
  const terms: Term[] = [];
  for (const ta of a.values()) {
    for (const tb of b.values()) {
      terms.push({
        coefficient: ta.coefficient.mul(tb.coefficient),
        powers: multiplyPowers(ta.powers, tb.powers),
      });
    }
  }
  const product = fromTerms(terms);
  return product.size > MAX_POLY_TERMS ? null : product;
}

/** Non-negative integer power by repeated squaring */
export function powerPolynomial(p: Polynomial, exponent: number): Polynomial | null {
  let result: Polynomial | null = constantPolynomial(Rational.ONE);
  let base: Polynomial | null = p;
  let e = exponent;
  while (e > 0) {
    if (!base || !result) return null;
    if (e & 1) result = multiplyPolynomials(result, base);
    e >>= 1;
    if (e > 0) base = multiplyPolynomials(base, base);
  }
  return result;
}

/** The constant value of a polynomial with no variable terms, else null */
export function constantValue(p: Polynomial): Rational | null {
  if (p.size === 0) return Rational.ZERO;
  if (p.size > 1) return null;
  const only = p.get("");
  return only ? only.coefficient : null;
}

// =============================================================================
// CONVERSION
// =============================================================================

/**
 * Expand an AST into a polynomial
 * Returns null for anything that is not a polynomial: division by a variable,
 * roots, modulo, functions, negative or symbolic exponents.
 *
 * @example
 * formatPolynomial(toPolynomial(parseExpression("(n+1)²").ast))
 * // "n^2 + 2*n + 1"
 */
export function toPolynomial(node: ASTNode): Polynomial | null {
  switch (node.type) {
    case "number":
      return constantPolynomial(node.value);

    case "variable":
      return variablePolynomial(node.name);

    case "unary": {
      if (node.operator !== "-" && node.operator !== "+") return null;
      const operand = toPolynomial(node.operand);
      if (!operand) return null;
      return node.operator === "-" ? scalePolynomial(operand, Rational.ONE.neg()) : operand;
    }

    case "binary": {
      const left = toPolynomial(node.left);
      const right = toPolynomial(node.right);
      if (!left || !right) return null;

      switch (node.operator) {
        case "+":
          return addPolynomials(left, right);
        case "-":
          return addPolynomials(left, scalePolynomial(right, Rational.ONE.neg()));
        case "*":
          return multiplyPolynomials(left, right);
        case "/": {
          const divisor = constantValue(right);
          const inverse = divisor ? Rational.ONE.div(divisor) : null;
          return inverse ? scalePolynomial(left, inverse) : null;
        }
        case "^": {
          const exponent = constantValue(right);
          if (!exponent || !exponent.isInteger() || exponent.sign() < 0) return null;
          if (exponent.num > BigInt(MAX_POLY_EXPONENT)) return null;
          return powerPolynomial(left, Number(exponent.num));
        }
        default:
          return null;
      }
    }
  }
}

export function polynomialVariables(p: Polynomial): string[] {
  const names = new Set<string>();
  for (const term of p.values()) {
    for (const [name] of term.powers) names.add(name);
  }
  return [...names].sort();
}

function totalDegree(term: Term): number {
  return term.powers.reduce((sum, [, exp]) => sum + exp, 0);
}

export function polynomialDegree(p: Polynomial): number {
  let degree = 0;
  for (const term of p.values()) degree = Math.max(degree, totalDegree(term));
  return degree;
}

/** Evaluate with every variable bound; null when one is missing */
export function evaluatePolynomial(p: Polynomial, bindings: Record<string, Rational>): Rational | null {
  let sum = Rational.ZERO;
  for (const term of p.values()) {
    let product = term.coefficient;
    for (const [name, exp] of term.powers) {
      const value = bindings[name];
      if (!value) return null;
      const power = value.pow(BigInt(exp));
      if (!power) return null;
      product = product.mul(power);
    }
    sum = sum.add(product);
  }
  return sum;
}

// =============================================================================
// FORMATTING
// =============================================================================

/** Higher total degree first, then by exponent of each variable in name order */
function compareTerms(a: Term, b: Term, variables: string[]): number {
  const byDegree = totalDegree(b) - totalDegree(a);
  if (byDegree !== 0) return byDegree;
  const expA = new Map(a.powers);
  const expB = new Map(b.powers);
  for (const name of variables) {
    const diff = (expB.get(name) ?? 0) - (expA.get(name) ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function formatMonomial(powers: ReadonlyArray<readonly [string, number]>): string {
  return powers.map(([name, exp]) => (exp === 1 ? name : `${name}^${exp}`)).join("*");
}

/** Format a term without its sign */
function formatTermMagnitude(term: Term): string {
  const magnitude = term.coefficient.abs();
  const mono = formatMonomial(term.powers);
  if (!mono) return magnitude.toString();

  const numerator = magnitude.num === 1n ? mono : `${magnitude.num}*${mono}`;
  return magnitude.den === 1n ? numerator : `${numerator}/${magnitude.den}`;
}

/**
 * Format a polynomial in expanded normal form
 *
 * @example
 * // n(n+1)/2
 * formatPolynomial(p) // "n^2/2 + n/2"
 */
export function formatPolynomial(p: Polynomial): string {
  if (p.size === 0) return "0";
  const variables = polynomialVariables(p);
  const terms = [...p.values()].sort((a, b) => compareTerms(a, b, variables));

  return terms
    .map((term, index) => {
      const body = formatTermMagnitude(term);
      const negative = term.coefficient.sign() < 0;
      if (index === 0) return negative ? `-${body}` : body;
      return negative ? ` - ${body}` : ` + ${body}`;
    })
    .join("");
}

// =============================================================================
// PARITY
// =============================================================================

export type ResidueParity = "even" | "odd" | "non-integer";

export type ParityKind = "always-even" | "always-odd" | "depends" | "non-integer" | "undetermined";

export interface ParityVerdict {
  kind: ParityKind;
  /** Residues are taken modulo this period (0 when undetermined) */
  period: number;
  /** Parity of the value at each residue 0 … period-1 */
  residues: Array<{ residue: number; parity: ResidueParity }>;
}

/** Periods above this are not enumerated */
export const MAX_PARITY_PERIOD = 2048;

const UNDETERMINED: ParityVerdict = { kind: "undetermined", period: 0, residues: [] };

/**
 * Decide the parity of p(v) over every integer v
 *
 * With d the lcm of the coefficient denominators, p(v + 2d) - p(v) is an even
 * integer, so the residues v = 0 … 2d-1 cover every case.
 * Variables other than `variable` must already be substituted.
 *
 * @example
 * parityVerdict(toPolynomial(parseExpression("n(n+1)").ast), "n").kind // "always-even"
 */
export function parityVerdict(p: Polynomial, variable: string): ParityVerdict {
  const others = polynomialVariables(p).filter((name) => name !== variable);
  if (others.length > 0) return UNDETERMINED;

  let d = 1n;
  for (const term of p.values()) d = bigLcm(d, term.coefficient.den);
  const period = 2n * d;
  if (period > BigInt(MAX_PARITY_PERIOD)) return UNDETERMINED;

  const residues: ParityVerdict["residues"] = [];
  for (let r = 0; r < Number(period); r++) {
    const value = evaluatePolynomial(p, { [variable]: Rational.fromInteger(r) });
    if (!value) return UNDETERMINED;
    const parity: ResidueParity = !value.isInteger()
      ? "non-integer"
      : value.num % 2n === 0n
        ? "even"
        : "odd";
    residues.push({ residue: r, parity });
  }

  const kinds = new Set(residues.map((r) => r.parity));
  let kind: ParityKind;
  if (kinds.has("non-integer")) kind = "non-integer";
  else if (kinds.size === 2) kind = "depends";
  else kind = kinds.has("even") ? "always-even" : "always-odd";

  return { kind, period: Number(period), residues };
}
