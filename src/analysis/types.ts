/**
 * Type definitions for the analysis module
 */

import type { NaturalSet } from "../compute/membership.ts";
import type { ParityInfo, PrimalityInfo } from "../compute/number-theory.ts";
import type { ASTNode } from "../math/ast.ts";
import type { NumericValue } from "../math/numeric.ts";
import type { ParityVerdict, Polynomial } from "../math/polynomial.ts";
import type { Rational } from "../math/rational.ts";

/** Number of consecutive values sampled for the primary variable */
export const SAMPLE_COUNT = 10;

/** Number of samples shown in the membership preview */
export const SAMPLE_PREVIEW = 5;

/** Sampled integer results up to this value get a prime/composite note */
export const PRIME_CHECK_LIMIT = 1000n;

export interface ExpressionForms {
  /** As typed, with implicit multiplication made explicit */
  original: string;
  /** Polynomial normal form when the expression is a polynomial */
  expanded: string;
  /** After constant folding and identity rules */
  simplified: string;
}

export interface ParsedExpression {
  source: string;
  ast: ASTNode;
  /** Free variables, sorted */
  variables: string[];
  polynomial: Polynomial | null;
  forms: ExpressionForms;
}

export interface AnalysisOptions {
  set: NaturalSet;
  /** Primary variable, the one sampled */
  variable: string;
  /** Values held fixed for every other variable (default: the set minimum) */
  fixed?: Record<string, Rational>;
}

/** Classification of a single numeric result */
export interface ValueReport {
  value: NumericValue;
  belongs: boolean;
  /** null when the value is not an integer */
  parity: ParityInfo | null;
  /** null when the value is not an integer, or was not checked */
  primality: PrimalityInfo | null;
}

export interface SamplePoint {
  /** Value of the primary variable */
  input: number;
  /** null when evaluation failed at this point */
  report: ValueReport | null;
  error?: string;
}

/** Parity seen across the samples */
export type ParityPattern = "both" | "even" | "odd" | "unclear";

export interface ExpressionAnalysis {
  expression: ParsedExpression;
  set: NaturalSet;
  variable: string;
  minimum: number;
  fixed: Record<string, Rational>;
  samples: SamplePoint[];
  /** Samples whose result is outside the chosen set */
  problems: SamplePoint[];
  evenCount: number;
  oddCount: number;
  pattern: ParityPattern;
  verdict: ParityVerdict;
}

export type ValueWarning =
  | { kind: "below-minimum"; minimum: number }
  | { kind: "not-integer" };

/** Result of testing one user-supplied value of the primary variable */
export interface ValueCheck {
  input: NumericValue;
  warnings: ValueWarning[];
  report: ValueReport;
}
