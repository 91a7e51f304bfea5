/**
 * Command-line entry point
 *
 * Usage: expression-checker [--lang <code>] [--translations <path>] [--help]
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { createReadlinePrompter, consoleWriter } from "./cli/prompter.ts";
import { runSession } from "./cli/session.ts";
import { debugLog, loadConfig } from "./config.ts";
import { TranslationLoadError, errorMessage } from "./errors.ts";
import {
  DEFAULT_TRANSLATIONS_PATH,
  FALLBACK_LANGUAGE,
  type Translations,
  createTranslator,
  loadTranslations,
} from "./i18n/translations.ts";
import type { Prompter, Writer } from "./cli/prompter.ts";

export const USAGE = `Usage: expression-checker [options]

Options:
  --lang <code>          Language to use without asking (en, fr, ar)
  --translations <path>  Translation file to load
  --help                 Show this help`;

export interface CliOptions {
  language?: string;
  translationsPath?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Parse "--flag value" and "--flag=value" arguments */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    const takeValue = (): string => {
      if (eq !== -1) return arg.slice(eq + 1);
      const value = args[++i];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`Missing value for ${name}`);
      }
      return value;
    };

    switch (name) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--lang":
        options.language = takeValue();
        break;
      case "--translations":
        options.translationsPath = takeValue();
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

export interface MainDependencies {
  prompter?: Prompter;
  write?: Writer;
}

/** Run the program, resolving to the process exit code */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  deps: MainDependencies = {},
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const translationsPath =
    options.translationsPath ?? config.translationsPath ?? DEFAULT_TRANSLATIONS_PATH;
  const language = options.language ?? config.language;
  debugLog(config, "translations:", translationsPath, "language:", language ?? "(ask)");

  let translations: Translations;
  try {
    translations = loadTranslations(translationsPath);
  } catch (error) {
    if (!(error instanceof TranslationLoadError)) throw error;
    console.error(`❌ ${error.message}`);
    if (error.reason === "missing") {
      console.error("The translation file must sit next to the program, or be given with --translations.");
    }
    return 1;
  }

  const prompter = deps.prompter ?? createReadlinePrompter();
  try {
    const outcome = await runSession({
      translations,
      language,
      prompter,
      write: deps.write ?? consoleWriter,
    });
    debugLog(config, "session", outcome);
    return 0;
  } catch (error) {
    const t = createTranslator(translations, language ?? FALLBACK_LANGUAGE);
    console.error(t("fatal_error", errorMessage(error)));
    debugLog(config, error);
    return 1;
  } finally {
    prompter.close();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    },
  );
}
