import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { USAGE, UsageError, main, parseArgs } from "../src/cli.ts";
import { ScriptedPrompter, captureWriter } from "./helpers/scripted-prompter.ts";

const dir = mkdtempSync(join(tmpdir(), "expression-checker-cli-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseArgs", () => {
  test("no arguments", () => {
    expect(parseArgs([])).toEqual({ help: false });
  });

  test("separate and inline values", () => {
    expect(parseArgs(["--lang", "fr"])).toEqual({ help: false, language: "fr" });
    expect(parseArgs(["--lang=ar", "--translations=/x/t.json"])).toEqual({
      help: false,
      language: "ar",
      translationsPath: "/x/t.json",
    });
  });

  test("help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  test("unknown arguments and missing values", () => {
    expect(() => parseArgs(["--bogus"])).toThrow(UsageError);
    expect(() => parseArgs(["--lang"])).toThrow("Missing value for --lang");
    expect(() => parseArgs(["--lang", "--help"])).toThrow("Missing value for --lang");
  });
});

function silenceConsole() {
  return {
    errors: vi.spyOn(console, "error").mockImplementation(() => {}),
    logs: vi.spyOn(console, "log").mockImplementation(() => {}),
  };
}

describe("main", () => {
  beforeEach(() => {
    vi.stubEnv("EXPRESSION_CHECKER_LANG", "");
    vi.stubEnv("EXPRESSION_CHECKER_TRANSLATIONS", "");
    vi.stubEnv("EXPRESSION_CHECKER_DEBUG", "");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  test("--help prints usage and exits 0", async () => {
    const { logs } = silenceConsole();
    expect(await main(["--help"])).toBe(0);
    expect(logs).toHaveBeenCalledWith(USAGE);
  });

  test("bad arguments exit 1", async () => {
    const { errors } = silenceConsole();
    expect(await main(["--nope"])).toBe(1);
    expect(errors).toHaveBeenCalledWith("Unknown argument: --nope");
  });

  test("missing translation file exits 1", async () => {
    const { errors } = silenceConsole();
    const path = join(dir, "absent.json");
    expect(await main(["--translations", path])).toBe(1);
    expect(errors).toHaveBeenCalledWith(`❌ Translation file not found: ${path}`);
  });

  test("malformed translation file exits 1", async () => {
    silenceConsole();
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ nope", "utf-8");
    expect(await main(["--translations", path])).toBe(1);
  });

  test("a completed session exits 0 and closes the prompter", async () => {
    const prompter = new ScriptedPrompter(["N", "n", "no"]);
    const { lines, write } = captureWriter();

    expect(await main(["--lang", "en"], { prompter, write })).toBe(0);
    expect(prompter.closed).toBe(true);
    expect(lines.at(-1)).toBe("🎉 Analysis complete!");
  });

  test("an interrupted session exits 0", async () => {
    const prompter = new ScriptedPrompter([]);
    const { lines, write } = captureWriter();

    expect(await main(["--lang=fr"], { prompter, write })).toBe(0);
    expect(lines.at(-1)).toBe("👋 Programme interrompu. Au revoir !");
  });

  test("language from the environment", async () => {
    vi.stubEnv("EXPRESSION_CHECKER_LANG", "fr");
    const prompter = new ScriptedPrompter([]);
    const { write } = captureWriter();

    await main([], { prompter, write });
    expect(prompter.questions).toEqual(["Choisissez l'ensemble (N ou N*) : "]);
  });

  test("unexpected errors exit 1 with a localized message", async () => {
    const { errors } = silenceConsole();
    const prompter = new ScriptedPrompter([]);
    prompter.ask = async () => {
      throw new Error("disk on fire");
    };

    expect(await main(["--lang", "en"], { prompter, write: () => {} })).toBe(1);
    expect(errors).toHaveBeenCalledWith("❌ An unexpected error occurred: disk on fire");
  });
});
