/**
 * Runtime configuration from the environment (and .env, via dotenv)
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

/** Unset and blank mean the same thing */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = z
  .string()
  .optional()
  .transform((value) => value === "1" || value?.toLowerCase() === "true");

export const EnvSchema = z.object({
  /** Language code used without asking, e.g. "fr" */
  EXPRESSION_CHECKER_LANG: optionalText,
  /** Path of an alternative translation file */
  EXPRESSION_CHECKER_TRANSLATIONS: optionalText,
  /** Print diagnostics to stderr */
  EXPRESSION_CHECKER_DEBUG: flag,
});

export interface AppConfig {
  language?: string;
  translationsPath?: string;
  debug: boolean;
}

/** Parse configuration from an environment map */
export function configFromEnv(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    language: parsed.EXPRESSION_CHECKER_LANG,
    translationsPath: parsed.EXPRESSION_CHECKER_TRANSLATIONS,
    debug: parsed.EXPRESSION_CHECKER_DEBUG,
  };
}

/** Load .env into process.env (existing variables win), then parse */
export function loadConfig(): AppConfig {
  loadDotenv();
  return configFromEnv(process.env);
}

/** Diagnostics to stderr, only when debug is enabled */
export function debugLog(config: Pick<AppConfig, "debug">, ...args: unknown[]): void {
  if (config.debug) console.error("[expression-checker]", ...args);
}
