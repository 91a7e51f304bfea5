import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, test } from "vitest";
import { TranslationLoadError } from "../src/errors.ts";
import {
  type Translations,
  availableLanguages,
  createTranslator,
  formatText,
  getText,
  loadTranslations,
} from "../src/i18n/translations.ts";

const dir = mkdtempSync(join(tmpdir(), "expression-checker-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeFixture(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

function loadError(path: string): TranslationLoadError {
  try {
    loadTranslations(path);
  } catch (error) {
    if (error instanceof TranslationLoadError) return error;
    throw error;
  }
  throw new Error("expected loadTranslations to throw");
}

describe("loadTranslations", () => {
  test("bundled file has English, French and Arabic", () => {
    const translations = loadTranslations();
    expect(availableLanguages(translations)).toEqual([
      { code: "en", name: "English" },
      { code: "fr", name: "Français" },
      { code: "ar", name: "العربية" },
    ]);
  });

  test("every language defines every English key", () => {
    const translations = loadTranslations();
    const english = Object.keys(translations.en ?? {}).sort();
    for (const lang of ["fr", "ar"]) {
      expect(Object.keys(translations[lang] ?? {}).sort()).toEqual(english);
    }
  });

  test("done and yes tokens are language data", () => {
    const translations = loadTranslations();
    expect(getText(translations, "done_token", "en")).toBe("done");
    expect(getText(translations, "done_token", "fr")).toBe("fini");
    expect(getText(translations, "done_token", "ar")).toBe("انتهى");
    expect(getText(translations, "yes_token", "fr")).toBe("o");
  });

  test("missing file", () => {
    const error = loadError(join(dir, "absent.json"));
    expect(error.reason).toBe("missing");
    expect(error.path).toBe(join(dir, "absent.json"));
  });

  test("malformed JSON", () => {
    expect(loadError(writeFixture("broken.json", "{ not json")).reason).toBe("malformed");
  });

  test("wrong shape", () => {
    expect(loadError(writeFixture("no-en.json", '{"fr": {"a": "b"}}')).reason).toBe("invalid");
    expect(loadError(writeFixture("number.json", '{"en": {"a": 1}}')).reason).toBe("invalid");
  });

  test("custom file", () => {
    const path = writeFixture("custom.json", '{"en": {"language_name": "Plain"}}');
    expect(loadTranslations(path)).toEqual({ en: { language_name: "Plain" } });
  });
});

describe("getText", () => {
  const table: Translations = { en: { a: "A", b: "B" }, fr: { a: "A-fr" } };

  test("language first, then English, then the key", () => {
    expect(getText(table, "a", "fr")).toBe("A-fr");
    expect(getText(table, "b", "fr")).toBe("B");
    expect(getText(table, "zz", "fr")).toBe("zz");
    expect(getText(table, "a", "de")).toBe("A");
  });
});

describe("formatText", () => {
  test("sequential placeholders", () => {
    expect(formatText("{} = {}", "n", 4)).toBe("n = 4");
    expect(formatText("K = {}", 12n)).toBe("K = 12");
  });

  test("indexed placeholders", () => {
    expect(formatText("{1} / {0}", "a", "b")).toBe("b / a");
  });

  test("missing arguments leave the placeholder", () => {
    expect(formatText("{} and {}", "x")).toBe("x and {}");
  });

  test("set notation is not a placeholder", () => {
    expect(formatText("N = {0, 1, 2, 3, ...}")).toBe("N = {0, 1, 2, 3, ...}");
  });
});

describe("createTranslator", () => {
  test("looks up and formats in the chosen language", () => {
    const t = createTranslator(loadTranslations(), "fr");
    expect(t("chose_n")).toBe("✅ Vous avez choisi N (entiers naturels).");
    expect(t("parity_odd", 4n)).toBe("Parité : impair (2K+1), K = 4");
  });
});
