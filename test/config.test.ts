import { afterEach, describe, expect, test, vi } from "vitest";
import { configFromEnv, debugLog } from "../src/config.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("configFromEnv", () => {
  test("defaults", () => {
    expect(configFromEnv({})).toEqual({ debug: false });
  });

  test("reads language, path and debug flag", () => {
    expect(
      configFromEnv({
        EXPRESSION_CHECKER_LANG: " fr ",
        EXPRESSION_CHECKER_TRANSLATIONS: "/tmp/t.json",
        EXPRESSION_CHECKER_DEBUG: "1",
      }),
    ).toEqual({ language: "fr", translationsPath: "/tmp/t.json", debug: true });
  });

  test("debug accepts true in any case, nothing else", () => {
    expect(configFromEnv({ EXPRESSION_CHECKER_DEBUG: "TRUE" }).debug).toBe(true);
    expect(configFromEnv({ EXPRESSION_CHECKER_DEBUG: "no" }).debug).toBe(false);
  });

  test("blank values count as unset", () => {
    expect(configFromEnv({ EXPRESSION_CHECKER_LANG: "  " }).language).toBeUndefined();
  });
});

describe("debugLog", () => {
  test("prints to stderr only when enabled", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    debugLog({ debug: false }, "hidden");
    expect(spy).not.toHaveBeenCalled();
    debugLog({ debug: true }, "shown", 1);
    expect(spy).toHaveBeenCalledWith("[expression-checker]", "shown", 1);
  });
});
