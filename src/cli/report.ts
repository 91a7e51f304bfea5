/**
 * Report rendering: analysis results → localized output lines
 * Pure functions, no I/O.
 */

import type {
  ExpressionAnalysis,
  ParsedExpression,
  SamplePoint,
  ValueCheck,
  ValueReport,
} from "../analysis/types.ts";
import { SAMPLE_PREVIEW } from "../analysis/types.ts";
import type { NaturalSet } from "../compute/membership.ts";
import type { PrimalityInfo } from "../compute/number-theory.ts";
import { formatNumeric } from "../math/numeric.ts";
import type { ParityVerdict, ResidueParity } from "../math/polynomial.ts";
import type { Translate } from "../i18n/translations.ts";

const SHORT_RULE = "-".repeat(30);
const LONG_RULE = "-".repeat(40);

export function membershipStatus(set: NaturalSet, belongs: boolean, t: Translate): string {
  if (set === "N") return t(belongs ? "belongs_to_n" : "not_belongs_to_n");
  return t(belongs ? "belongs_to_n_star" : "not_belongs_to_n_star");
}

/** "[1, 2, 3, 6]" */
export function formatDivisors(divisors: readonly bigint[]): string {
  return `[${divisors.join(", ")}]`;
}

function parityText(report: ValueReport, t: Translate): string | null {
  if (!report.parity) return null;
  const word = t(report.parity.parity === "even" ? "even" : "odd");
  return `${formatNumeric(report.value)} = ${word}, K = ${report.parity.k}`;
}

// =============================================================================
// EXPRESSION ANALYSIS
// =============================================================================

export function renderSymbolicAnalysis(expression: ParsedExpression, t: Translate): string[] {
  return [
    "",
    t("symbolic_analysis"),
    SHORT_RULE,
    t("original", expression.forms.original),
    t("expanded", expression.forms.expanded),
    t("simplified", expression.forms.simplified),
  ];
}

function sampleError(analysis: ExpressionAnalysis, sample: SamplePoint, t: Translate): string {
  return t("could_not_evaluate", analysis.variable, sample.input, sample.error ?? "");
}

export function renderMembership(analysis: ExpressionAnalysis, t: Translate): string[] {
  const { variable, set } = analysis;
  const original = analysis.expression.forms.original;
  const lines = ["", t("set_membership")];

  for (const sample of analysis.samples) {
    if (!sample.report) lines.push(sampleError(analysis, sample, t));
  }

  lines.push("", t("sample_evaluations"));
  const evaluated = analysis.samples.filter((s) => s.report !== null);
  for (const sample of evaluated.slice(0, SAMPLE_PREVIEW)) {
    if (!sample.report) continue;
    const mark = sample.report.belongs ? "✅" : "❌";
    lines.push(
      `  ${variable} = ${sample.input}: ${original} = ${formatNumeric(sample.report.value)} ${mark}`,
    );
  }

  lines.push("");
  if (analysis.problems.length > 0) {
    lines.push(t("found_problems", set));
    for (const sample of analysis.problems) {
      if (!sample.report) continue;
      lines.push(
        `  ${variable} = ${sample.input}: ${t("result_label")} = ${formatNumeric(sample.report.value)}`,
      );
    }
  } else {
    lines.push(t("appears_to_belong", set));
  }
  return lines;
}

function samplePrimeNote(primality: PrimalityInfo | null, value: string, t: Translate): string | null {
  if (primality?.kind === "prime") return `    └─ ${t("prime", value)}`;
  if (primality?.kind === "composite") return `    └─ ${t("composite", value)}`;
  return null;
}

function residueWord(parity: ResidueParity, t: Translate): string {
  if (parity === "even") return t("even");
  if (parity === "odd") return t("odd");
  return t("non_integer");
}

export function renderVerdict(verdict: ParityVerdict, variable: string, t: Translate): string[] {
  if (verdict.kind === "undetermined") return [t("could_not_determine")];

  const pattern = verdict.residues
    .map(({ residue, parity }) =>
      t("residue_line", variable, residue, verdict.period, residueWord(parity, t)),
    )
    .join("; ");

  const lines = [t("mod_expression", pattern)];
  switch (verdict.kind) {
    case "always-even":
      lines.push(t("always_even", variable));
      break;
    case "always-odd":
      lines.push(t("always_odd", variable));
      break;
    case "depends":
      lines.push(t("depends_on_n", variable));
      break;
    case "non-integer":
      lines.push(t("not_always_integer", variable));
      break;
  }
  return lines;
}

export function renderParity(analysis: ExpressionAnalysis, t: Translate): string[] {
  const { variable } = analysis;
  const lines = ["", t("parity_analysis"), LONG_RULE];

  for (const sample of analysis.samples) {
    const prefix = `  ${variable} = ${sample.input}: `;
    if (!sample.report) {
      lines.push(`  ${sampleError(analysis, sample, t)}`);
      continue;
    }
    const parity = parityText(sample.report, t);
    if (!parity) {
      lines.push(`${prefix}${formatNumeric(sample.report.value)} ${t("non_integer")}`);
      continue;
    }
    lines.push(`${prefix}${parity}`);
    const note = samplePrimeNote(sample.report.primality, formatNumeric(sample.report.value), t);
    if (note) lines.push(note);
  }

  lines.push("", t("pattern_summary"));
  switch (analysis.pattern) {
    case "both":
      lines.push(t("produces_both"));
      break;
    case "even":
      lines.push(t("produces_even"));
      break;
    case "odd":
      lines.push(t("produces_odd"));
      break;
    case "unclear":
      lines.push(t("pattern_unclear"));
      break;
  }

  lines.push(...renderVerdict(analysis.verdict, variable, t));
  return lines;
}

/** Symbolic forms, membership and parity, in that order */
export function renderAnalysis(analysis: ExpressionAnalysis, t: Translate): string[] {
  return [
    ...renderSymbolicAnalysis(analysis.expression, t),
    ...renderMembership(analysis, t),
    ...renderParity(analysis, t),
  ];
}

// =============================================================================
// SINGLE VALUES
// =============================================================================

/** Prime / composite / special-value lines for an integer result */
export function renderPrimality(report: ValueReport, t: Translate, indent: string): string[] {
  const value = formatNumeric(report.value);
  if (!report.parity) {
    return [`${indent}${t("prime_na_non_integer")}`];
  }
  const primality = report.primality;
  switch (primality?.kind) {
    case "prime":
      return [`${indent}${t("prime_analysis", value)}`, `${indent}${t("prime_divisors", value)}`];
    case "composite":
      return [
        `${indent}${t("composite_analysis", value)}`,
        `${indent}${
          primality.divisors
            ? t("all_divisors", formatDivisors(primality.divisors))
            : t("divisors_unavailable")
        }`,
      ];
    case "unit":
      return [`${indent}${t("neither_prime")}`, `${indent}${t("divisors_one")}`];
    case "zero":
      return [`${indent}${t("zero_special")}`];
    case "too-large":
      return [`${indent}${t("prime_too_large")}`];
    default:
      return [`${indent}${t("prime_na")}`];
  }
}

export function renderConstant(report: ValueReport, set: NaturalSet, t: Translate): string[] {
  const value = formatNumeric(report.value);
  const lines = [
    "",
    t("constant_analysis"),
    SHORT_RULE,
    t("constant_value", value),
    "",
    t("set_membership"),
    t("constant_evaluation"),
    `  ${value} ${membershipStatus(set, report.belongs, t)}`,
    "",
    t("parity_analysis"),
    LONG_RULE,
  ];

  const parity = parityText(report, t);
  if (!parity) {
    lines.push(`  ${value} ${t("non_integer")}`, `  ${t("prime_na_non_integer")}`);
    return lines;
  }
  lines.push(`  ${parity}`);
  const [first, ...rest] = renderPrimality(report, t, "");
  if (first !== undefined) lines.push(`  └─ ${first}`);
  for (const line of rest) lines.push(`     ${line}`);
  return lines;
}

export function renderValueCheck(
  check: ValueCheck,
  expression: ParsedExpression,
  variable: string,
  set: NaturalSet,
  t: Translate,
): string[] {
  const input = formatNumeric(check.input);
  const lines: string[] = [];

  for (const warning of check.warnings) {
    if (warning.kind === "below-minimum") {
      lines.push(t("warning_not_in_set", input, set, warning.minimum));
    } else {
      lines.push(t("warning_not_integer", input, set));
    }
  }

  const { report } = check;
  lines.push(
    "",
    t("result_for_n", variable, input),
    `   ${expression.forms.original} = ${formatNumeric(report.value)}`,
    `   ${t("set_membership_result", membershipStatus(set, report.belongs, t))}`,
  );

  if (report.parity) {
    const key = report.parity.parity === "even" ? "parity_even" : "parity_odd";
    lines.push(`   ${t(key, report.parity.k)}`);
  } else {
    lines.push(`   ${t("parity_na")}`);
  }
  lines.push(...renderPrimality(report, t, "   "));
  return lines;
}
