/**
 * Expression analysis: symbolic forms, sampling, set membership, parity, primality
 *
 * @module analyzer
 */

import { type NaturalSet, belongsTo, minimumOf } from "../compute/membership.ts";
import { type PrimalityInfo, classifyPrimality, parityOf } from "../compute/number-theory.ts";
import { EvaluationError, ExpressionError } from "../errors.ts";
import {
  type ASTNode,
  type ParityVerdict,
  type Polynomial,
  Rational,
  type NumericValue,
  collectVariables,
  evaluateAST,
  formatAST,
  formatPolynomial,
  parityVerdict,
  parseExpression,
  simplifyAST,
  substituteAST,
  toInteger,
  toPolynomial,
} from "../math/index.ts";
import {
  type AnalysisOptions,
  type ExpressionAnalysis,
  type ParsedExpression,
  type ParityPattern,
  PRIME_CHECK_LIMIT,
  SAMPLE_COUNT,
  type SamplePoint,
  type ValueCheck,
  type ValueReport,
  type ValueWarning,
} from "./types.ts";

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse user input into an expression with its three textual forms
 * Throws ExpressionError on invalid syntax.
 *
 * @example
 * prepareExpression("n(n+1)").forms
 * // { original: "n*(n + 1)", expanded: "n^2 + n", simplified: "n*(n + 1)" }
 * prepareExpression("n-(n-1)").forms.simplified // "1"
 */
export function prepareExpression(source: string): ParsedExpression {
  const { ast, error } = parseExpression(source);
  if (!ast) {
    throw new ExpressionError(error ?? "Invalid expression", source);
  }

  const reduced = simplifyAST(ast);
  const polynomial = toPolynomial(ast);
  // Expanding wins only when it cancels variables out
  const simplified =
    polynomial && polynomialOccurrences(polynomial) < astOccurrences(reduced)
      ? formatPolynomial(polynomial)
      : formatAST(reduced);

  return {
    source,
    ast,
    variables: collectVariables(ast),
    polynomial,
    forms: {
      original: formatAST(ast),
      expanded: polynomial ? formatPolynomial(polynomial) : simplified,
      simplified,
    },
  };
}

function astOccurrences(node: ASTNode): number {
  switch (node.type) {
    case "number":
      return 0;
    case "variable":
      return 1;
    case "unary":
      return astOccurrences(node.operand);
    case "binary":
      return astOccurrences(node.left) + astOccurrences(node.right);
  }
}

function polynomialOccurrences(polynomial: Polynomial): number {
  let count = 0;
  for (const term of polynomial.values()) count += term.powers.length;
  return count;
}

/** "n" when present, else the first variable in name order; null for constants */
export function choosePrimaryVariable(variables: readonly string[]): string | null {
  if (variables.includes("n")) return "n";
  return [...variables].sort()[0] ?? null;
}

/**
 * Parse a value typed by the user: "7", "-2", "2.5", "3/2"
 * Returns null for anything that is not a constant expression.
 */
export function parseNumericInput(text: string): NumericValue | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const { ast } = parseExpression(trimmed);
  if (!ast || collectVariables(ast).length > 0) return null;
  return evaluateAST(ast).value;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export interface DescribeOptions {
  /** Only check primality for results up to this value */
  primeLimit?: bigint;
  /** Enumerate divisors of composites */
  withDivisors?: boolean;
}

/** Classify a value: membership, parity, primality */
export function describeValue(
  value: NumericValue,
  set: NaturalSet,
  options: DescribeOptions = {},
): ValueReport {
  const { primeLimit, withDivisors = true } = options;
  const integer = toInteger(value);
  if (integer === null) {
    return { value, belongs: belongsTo(set, value), parity: null, primality: null };
  }

  let primality: PrimalityInfo | null = null;
  if (primeLimit === undefined) {
    primality = classifyPrimality(integer, { withDivisors });
  } else if (integer > 1n && integer <= primeLimit) {
    primality = classifyPrimality(integer, { withDivisors });
  }

  return {
    value,
    belongs: belongsTo(set, value),
    parity: parityOf(integer),
    primality,
  };
}

/** Analyze an expression without variables */
export function analyzeConstant(parsed: ParsedExpression, set: NaturalSet): ValueReport {
  const { value, error } = evaluateAST(parsed.ast);
  if (!value) {
    throw new EvaluationError(error ?? "Could not evaluate expression");
  }
  return describeValue(value, set);
}

// =============================================================================
// SAMPLING
// =============================================================================

/** Every non-primary variable bound, defaulting to the set minimum */
export function resolveFixedValues(
  parsed: ParsedExpression,
  options: AnalysisOptions,
): Record<string, Rational> {
  const fallback = Rational.fromInteger(minimumOf(options.set));
  const fixed: Record<string, Rational> = {};
  for (const name of parsed.variables) {
    if (name === options.variable) continue;
    fixed[name] = options.fixed?.[name] ?? fallback;
  }
  return fixed;
}

function summarizePattern(evenCount: number, oddCount: number): ParityPattern {
  if (evenCount > 0 && oddCount > 0) return "both";
  if (evenCount > 0) return "even";
  if (oddCount > 0) return "odd";
  return "unclear";
}

/** Symbolic parity of the expression in the primary variable, other variables fixed */
export function symbolicParity(
  parsed: ParsedExpression,
  variable: string,
  fixed: Record<string, Rational>,
): ParityVerdict {
  const bound = toPolynomial(substituteAST(parsed.ast, fixed));
  if (!bound) return { kind: "undetermined", period: 0, residues: [] };
  return parityVerdict(bound, variable);
}

/**
 * Sample the primary variable over SAMPLE_COUNT consecutive values from the set minimum
 *
 * @example
 * const analysis = analyzeExpression(prepareExpression("n²"), { set: "N", variable: "n" });
 * analysis.samples.map((s) => s.input); // [0, 1, ..., 9]
 * analysis.pattern;                      // "both"
 */
export function analyzeExpression(
  parsed: ParsedExpression,
  options: AnalysisOptions,
): ExpressionAnalysis {
  const { set, variable } = options;
  const minimum = minimumOf(set);
  const fixed = resolveFixedValues(parsed, options);

  const samples: SamplePoint[] = [];
  for (let input = minimum; input < minimum + SAMPLE_COUNT; input++) {
    const { value, error } = evaluateAST(parsed.ast, {
      ...fixed,
      [variable]: Rational.fromInteger(input),
    });
    samples.push(
      value
        ? {
            input,
            report: describeValue(value, set, {
              primeLimit: PRIME_CHECK_LIMIT,
              withDivisors: false,
            }),
          }
        : { input, report: null, error },
    );
  }

  const problems = samples.filter((s) => s.report !== null && !s.report.belongs);
  const evenCount = samples.filter((s) => s.report?.parity?.parity === "even").length;
  const oddCount = samples.filter((s) => s.report?.parity?.parity === "odd").length;

  return {
    expression: parsed,
    set,
    variable,
    minimum,
    fixed,
    samples,
    problems,
    evenCount,
    oddCount,
    pattern: summarizePattern(evenCount, oddCount),
    verdict: symbolicParity(parsed, variable, fixed),
  };
}

// =============================================================================
// FREE-FORM VALUES
// =============================================================================

/**
 * Evaluate the expression at one user-supplied value of the primary variable
 * Throws EvaluationError when the expression is undefined there.
 */
export function checkValue(
  parsed: ParsedExpression,
  options: AnalysisOptions,
  input: NumericValue,
): ValueCheck {
  const minimum = minimumOf(options.set);
  const warnings: ValueWarning[] = [];
  const numeric: Rational | number = input.value;
  const below = input.exact
    ? input.value.compare(Rational.fromInteger(minimum)) < 0
    : input.value < minimum;
  if (below) warnings.push({ kind: "below-minimum", minimum });
  if (toInteger(input) === null) warnings.push({ kind: "not-integer" });

  const { value, error } = evaluateAST(parsed.ast, {
    ...resolveFixedValues(parsed, options),
    [options.variable]: numeric,
  });
  if (!value) {
    throw new EvaluationError(error ?? "Could not evaluate expression");
  }

  return { input, warnings, report: describeValue(value, options.set) };
}
