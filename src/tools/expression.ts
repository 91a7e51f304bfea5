import { z } from "zod";
import {
  analyzeConstant,
  analyzeExpression,
  checkValue,
  choosePrimaryVariable,
  parseNumericInput,
  prepareExpression,
} from "../analysis/index.ts";
import { renderAnalysis, renderConstant, renderValueCheck } from "../cli/report.ts";
import { NATURAL_SETS } from "../compute/membership.ts";
import { configFromEnv } from "../config.ts";
import { errorMessage } from "../errors.ts";
import {
  type Translate,
  type Translations,
  DEFAULT_TRANSLATIONS_PATH,
  FALLBACK_LANGUAGE,
  createTranslator,
  loadTranslations,
} from "../i18n/translations.ts";
import { Rational } from "../math/rational.ts";

/**
 * Expression analysis tools: the interactive checker, one call at a time
 */

let cached: { path: string; translations: Translations } | null = null;

/** Translator for one call; throws TranslationLoadError when the table cannot be loaded */
function translator(language: string | undefined): Translate {
  const config = configFromEnv(process.env);
  const path = config.translationsPath ?? DEFAULT_TRANSLATIONS_PATH;
  if (cached?.path !== path) {
    cached = { path, translations: loadTranslations(path) };
  }
  return createTranslator(cached.translations, language ?? config.language ?? FALLBACK_LANGUAGE);
}

const common = {
  expression: z.string().min(1).describe("Expression, e.g. 2n+1, n², n(n+1)/2"),
  set: z.enum(NATURAL_SETS).default("N").describe("Set the variable ranges over: N or N*"),
  variable: z
    .string()
    .optional()
    .describe("Variable to vary (default: n when present, else the first variable)"),
  fixed: z
    .record(z.string(), z.string())
    .optional()
    .describe("Values held fixed for the other variables, e.g. { \"k\": \"3\" }"),
  language: z.string().optional().describe("Output language code (en, fr, ar)"),
};

type CommonArgs = {
  expression: string;
  set?: "N" | "N*";
  variable?: string;
  fixed?: Record<string, string>;
  language?: string;
};

/** Fixed values typed as text → exact rationals; throws on anything non-numeric */
function parseFixed(fixed: Record<string, string> | undefined): Record<string, Rational> {
  const values: Record<string, Rational> = {};
  for (const [name, text] of Object.entries(fixed ?? {})) {
    const value = parseNumericInput(text);
    const rational = value?.exact ? value.value : value ? Rational.fromNumber(value.value) : null;
    if (!rational) throw new Error(`Invalid fixed value for ${name}: ${text}`);
    values[name] = rational;
  }
  return values;
}

function resolveVariable(variables: readonly string[], requested: string | undefined): string {
  const variable = requested ?? choosePrimaryVariable(variables);
  if (variable === null || !variables.includes(variable)) {
    throw new Error(`Unknown variable: ${requested ?? ""}. Found: ${variables.join(", ")}`);
  }
  return variable;
}

export const analyzeExpressionTool = {
  name: "analyze_expression",
  description: `Analyze an expression over N or N*.

Samples the chosen variable over 10 consecutive values from the set minimum,
reports set membership, parity as 2K or 2K+1, primality of small results,
and a symbolic parity verdict.`,

  parameters: z.object(common),

  execute: async (args: CommonArgs): Promise<string> => {
    let t: Translate;
    try {
      t = translator(args.language);
    } catch (error) {
      return `❌ ${errorMessage(error)}`;
    }
    const set = args.set ?? "N";
    try {
      const parsed = prepareExpression(args.expression);
      if (parsed.variables.length === 0) {
        return [t("no_n_variable"), ...renderConstant(analyzeConstant(parsed, set), set, t)].join(
          "\n",
        );
      }
      const variable = resolveVariable(parsed.variables, args.variable);
      const analysis = analyzeExpression(parsed, {
        set,
        variable,
        fixed: parseFixed(args.fixed),
      });
      return [t("expression_parsed", parsed.forms.original), ...renderAnalysis(analysis, t)].join(
        "\n",
      );
    } catch (error) {
      return t("invalid_expression", errorMessage(error));
    }
  },
};

export const checkValueTool = {
  name: "check_value",
  description:
    "Evaluate an expression at one value of its variable: membership, parity, primality and divisors",

  parameters: z.object({
    ...common,
    value: z.string().min(1).describe("Value of the variable, e.g. 7, -2, 2.5 or 3/2"),
  }),

  execute: async (args: CommonArgs & { value: string }): Promise<string> => {
    let t: Translate;
    try {
      t = translator(args.language);
    } catch (error) {
      return `❌ ${errorMessage(error)}`;
    }
    const set = args.set ?? "N";
    const input = parseNumericInput(args.value);
    if (!input) return t("enter_valid_number");

    try {
      const parsed = prepareExpression(args.expression);
      const variable = resolveVariable(parsed.variables, args.variable);
      const check = checkValue(parsed, { set, variable, fixed: parseFixed(args.fixed) }, input);
      return renderValueCheck(check, parsed, variable, set, t).join("\n").trimStart();
    } catch (error) {
      return t("error_evaluating", errorMessage(error));
    }
  },
};
