/**
 * Translation table: loading, lookup and placeholder formatting
 * The table is read once at startup and never modified.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { TranslationLoadError, errorMessage } from "../errors.ts";

/** Language every lookup falls back to */
export const FALLBACK_LANGUAGE = "en";

export const DEFAULT_TRANSLATIONS_PATH = fileURLToPath(
  new URL("./translations.json", import.meta.url),
);

export const TranslationsSchema = z
  .record(z.string(), z.record(z.string(), z.string()))
  .refine((table) => FALLBACK_LANGUAGE in table, {
    message: `Missing "${FALLBACK_LANGUAGE}" language`,
  });

/** Language code → message key → text */
export type Translations = z.infer<typeof TranslationsSchema>;

/**
 * Read and validate the translation file
 * Throws TranslationLoadError when the file is missing, unreadable, not JSON,
 * or not shaped as { lang: { key: text } }
 */
export function loadTranslations(path: string = DEFAULT_TRANSLATIONS_PATH): Translations {
  if (!existsSync(path)) {
    throw new TranslationLoadError(`Translation file not found: ${path}`, "missing", path);
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    throw new TranslationLoadError(
      `Could not read ${path}: ${errorMessage(error)}`,
      "unreadable",
      path,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new TranslationLoadError(
      `Error reading ${path}: ${errorMessage(error)}`,
      "malformed",
      path,
    );
  }

  const parsed = TranslationsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new TranslationLoadError(
      `Invalid translation file ${path}${where}: ${issue?.message ?? "unknown problem"}`,
      "invalid",
      path,
    );
  }
  return parsed.data;
}

/** Text in the given language, else English, else the key itself */
export function getText(translations: Translations, key: string, lang: string): string {
  return translations[lang]?.[key] ?? translations[FALLBACK_LANGUAGE]?.[key] ?? key;
}

export type FormatArg = string | number | bigint;

/**
 * Fill "{}" placeholders in order, or "{0}", "{1}" by index
 *
 * @example
 * formatText("{} = {}", "n", 4)   // "n = 4"
 * formatText("{1} / {0}", "a", "b") // "b / a"
 */
export function formatText(template: string, ...args: FormatArg[]): string {
  let next = 0;
  return template.replace(/\{(\d*)\}/g, (match, index: string) => {
    const position = index === "" ? next++ : Number(index);
    const arg = args[position];
    return arg === undefined ? match : String(arg);
  });
}

/** Look up a key and fill its placeholders */
export type Translate = (key: string, ...args: FormatArg[]) => string;

export function createTranslator(translations: Translations, lang: string): Translate {
  return (key, ...args) => formatText(getText(translations, key, lang), ...args);
}

export interface LanguageOption {
  code: string;
  /** Display name from the language's own "language_name" entry */
  name: string;
}

/** Languages in file order, English first */
export function availableLanguages(translations: Translations): LanguageOption[] {
  const codes = Object.keys(translations).sort((a, b) =>
    a === FALLBACK_LANGUAGE ? -1 : b === FALLBACK_LANGUAGE ? 1 : 0,
  );
  return codes.map((code) => ({
    code,
    name: translations[code]?.language_name ?? code,
  }));
}
