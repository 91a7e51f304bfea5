/**
 * Interactive session: language → set → expression → analysis → value testing
 */

import {
  analyzeConstant,
  analyzeExpression,
  checkValue,
  choosePrimaryVariable,
  parseNumericInput,
  prepareExpression,
} from "../analysis/index.ts";
import type { ParsedExpression } from "../analysis/index.ts";
import { type NaturalSet, isNaturalSet, minimumOf } from "../compute/membership.ts";
import { EvaluationError, ExpressionError, PromptInterruptedError } from "../errors.ts";
import {
  type Translate,
  type Translations,
  FALLBACK_LANGUAGE,
  availableLanguages,
  createTranslator,
} from "../i18n/translations.ts";
import { Rational } from "../math/rational.ts";
import type { Prompter, Writer } from "./prompter.ts";
import { renderAnalysis, renderConstant, renderValueCheck } from "./report.ts";

export interface SessionOptions {
  translations: Translations;
  /** Skip the language menu when this language exists in the table */
  language?: string;
  prompter: Prompter;
  write: Writer;
}

export type SessionOutcome = "completed" | "interrupted";

/** Mutable prompt context: the translator changes once a language is chosen */
interface SessionContext {
  options: SessionOptions;
  t: Translate;
  lang: string;
}

function say(ctx: SessionContext, ...lines: string[]): void {
  for (const line of lines) ctx.options.write(line);
}

/**
 * Run one interactive session to completion
 * Ctrl+C or end of input ends it with the "interrupted" message.
 */
export async function runSession(options: SessionOptions): Promise<SessionOutcome> {
  const ctx: SessionContext = {
    options,
    t: createTranslator(options.translations, FALLBACK_LANGUAGE),
    lang: FALLBACK_LANGUAGE,
  };

  try {
    await converse(ctx);
    return "completed";
  } catch (error) {
    if (error instanceof PromptInterruptedError) {
      say(ctx, "", "", ctx.t("interrupted"));
      return "interrupted";
    }
    throw error;
  }
}

async function converse(ctx: SessionContext): Promise<void> {
  ctx.lang = await chooseLanguage(ctx);
  ctx.t = createTranslator(ctx.options.translations, ctx.lang);
  const { t } = ctx;

  say(ctx, "", t("welcome"), "=".repeat(50), `${t("description")}`, "");

  const set = await chooseSet(ctx);
  const parsed = await readExpression(ctx, set);
  if (!parsed) {
    say(ctx, "", t("analysis_complete"));
    return;
  }

  const variable = await choosePrimary(ctx, parsed);
  const fixed = await readFixedValues(ctx, parsed, variable, set);

  say(
    ctx,
    "",
    t("expression_parsed", parsed.forms.original),
    t("analyzing", `${variable} ≥ ${minimumOf(set)}`),
  );

  const analysis = analyzeExpression(parsed, { set, variable, fixed });
  say(ctx, ...renderAnalysis(analysis, t));

  say(ctx, "", t("test_specific"));
  const answer = await ctx.options.prompter.ask(t("yes_no"));
  if (answer.trim().toLowerCase() === t("yes_token").toLowerCase()) {
    await testValues(ctx, parsed, set, variable, fixed);
  }

  say(ctx, "", t("analysis_complete"));
}

async function chooseLanguage(ctx: SessionContext): Promise<string> {
  const { translations, language, prompter } = ctx.options;
  if (language !== undefined && language in translations) return language;

  const languages = availableLanguages(translations);
  say(ctx, ctx.t("choose_language"));
  languages.forEach((option, index) => say(ctx, `${index + 1}. ${option.name}`));

  const choices = languages.map((_, index) => String(index + 1)).join("/");
  while (true) {
    const answer = (await prompter.ask(ctx.t("language_prompt", choices))).trim();
    const picked = languages[Number(answer) - 1];
    if (/^\d+$/.test(answer) && picked) return picked.code;
    say(ctx, ctx.t("invalid_choice"));
  }
}

async function chooseSet(ctx: SessionContext): Promise<NaturalSet> {
  const { t } = ctx;
  while (true) {
    const answer = (await ctx.options.prompter.ask(t("choose_set"))).trim().toUpperCase();
    if (isNaturalSet(answer)) {
      if (answer === "N") {
        say(ctx, "", t("chose_n"), t("n_description"));
      } else {
        say(ctx, "", t("chose_n_star"), t("n_star_description"));
      }
      return answer;
    }
    say(ctx, t("invalid_set"));
  }
}

/**
 * Read expressions until one parses
 * Constants are analyzed on the spot and yield null.
 */
async function readExpression(
  ctx: SessionContext,
  set: NaturalSet,
): Promise<ParsedExpression | null> {
  const { t } = ctx;
  while (true) {
    say(ctx, "");
    const source = await ctx.options.prompter.ask(t("enter_expression"));
    try {
      const parsed = prepareExpression(source);
      if (parsed.variables.length > 0) return parsed;

      const report = analyzeConstant(parsed, set);
      say(ctx, t("no_n_variable"), ...renderConstant(report, set, t));
      return null;
    } catch (error) {
      if (!(error instanceof ExpressionError) && !(error instanceof EvaluationError)) throw error;
      say(ctx, t("invalid_expression", error.message), t("multiplication_tip"));
    }
  }
}

async function choosePrimary(ctx: SessionContext, parsed: ParsedExpression): Promise<string> {
  const { t } = ctx;
  const fallback = choosePrimaryVariable(parsed.variables) ?? "n";
  if (parsed.variables.length < 2) return fallback;

  const list = parsed.variables.join(", ");
  while (true) {
    const answer = (await ctx.options.prompter.ask(t("choose_variable", list, fallback))).trim();
    if (answer === "") return fallback;
    if (parsed.variables.includes(answer)) return answer;
    say(ctx, t("invalid_variable", list));
  }
}

async function readFixedValues(
  ctx: SessionContext,
  parsed: ParsedExpression,
  variable: string,
  set: NaturalSet,
): Promise<Record<string, Rational>> {
  const { t } = ctx;
  const minimum = minimumOf(set);
  const fixed: Record<string, Rational> = {};

  for (const name of parsed.variables) {
    if (name === variable) continue;
    while (true) {
      const answer = (await ctx.options.prompter.ask(t("fixed_value_prompt", name, minimum))).trim();
      if (answer === "") {
        fixed[name] = Rational.fromInteger(minimum);
        break;
      }
      const value = parseNumericInput(answer);
      const exactValue = value?.exact ? value.value : value ? Rational.fromNumber(value.value) : null;
      if (exactValue) {
        fixed[name] = exactValue;
        break;
      }
      say(ctx, t("enter_valid_number"));
    }
  }
  return fixed;
}

async function testValues(
  ctx: SessionContext,
  parsed: ParsedExpression,
  set: NaturalSet,
  variable: string,
  fixed: Record<string, Rational>,
): Promise<void> {
  const { t } = ctx;
  const done = t("done_token").toLowerCase();
  say(ctx, "", t("specific_testing"), "-".repeat(30), t("note_range", set, minimumOf(set)));

  while (true) {
    say(ctx, "");
    const answer = (await ctx.options.prompter.ask(t("enter_n_value", variable))).trim();
    if (answer.toLowerCase() === done) return;

    const input = parseNumericInput(answer);
    if (!input) {
      say(ctx, t("enter_valid_number"));
      continue;
    }

    try {
      const check = checkValue(parsed, { set, variable, fixed }, input);
      say(ctx, ...renderValueCheck(check, parsed, variable, set, t));
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      say(ctx, t("error_evaluating", error.message));
    }
  }
}
