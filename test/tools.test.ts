/**
 * MCP tool tests
 *
 * Validates tool schemas (object at root, as MCP requires) and tool output.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { z } from "zod";
import { analyzeExpressionTool, checkValueTool } from "../src/tools/index.ts";

interface JsonSchemaObject {
  type?: string | string[];
  oneOf?: unknown[];
  properties?: Record<string, unknown>;
  required?: string[];
}

function toJsonSchema(schema: z.ZodType): JsonSchemaObject {
  return z.toJSONSchema(schema) as JsonSchemaObject;
}

beforeEach(() => {
  vi.stubEnv("EXPRESSION_CHECKER_LANG", "");
  vi.stubEnv("EXPRESSION_CHECKER_TRANSLATIONS", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

const tools = [
  { name: "analyze_expression", schema: analyzeExpressionTool.parameters },
  { name: "check_value", schema: checkValueTool.parameters },
] as const;

describe("MCP schema compliance", () => {
  for (const { name, schema } of tools) {
    test(`${name} schema is a plain object`, () => {
      const json = toJsonSchema(schema);
      expect(json.type).toBe("object");
      expect(json.oneOf).toBeUndefined();
      expect(json.properties).toHaveProperty("expression");
      expect(json.required).toContain("expression");
    });
  }

  test("check_value requires a value", () => {
    expect(toJsonSchema(checkValueTool.parameters).required).toContain("value");
  });
});

describe("analyze_expression", () => {
  test("reports an expression over N", async () => {
    const lines = (await analyzeExpressionTool.execute({ expression: "n²", set: "N" })).split("\n");
    expect(lines[0]).toBe("✅ Expression parsed: n^2");
    expect(lines).toContain("Expanded:   n^2");
    expect(lines).toContain("  n = 3: 9 = odd (2K+1), K = 4");
    expect(lines.at(-1)).toBe("🔄 The parity depends on n.");
  });

  test("constants are analyzed with divisors", async () => {
    const lines = (await analyzeExpressionTool.execute({ expression: "12" })).split("\n");
    expect(lines[0]).toBe("ℹ️ The expression has no variable, so it is analyzed as a constant.");
    expect(lines.at(-1)).toBe("     Divisors: [1, 2, 3, 4, 6, 12]");
  });

  test("fixed values and language", async () => {
    const text = await analyzeExpressionTool.execute({
      expression: "n+k",
      set: "N*",
      fixed: { k: "1" },
      language: "fr",
    });
    expect(text.split("\n")).toContain("  n = 1: n + k = 2 ✅");
    expect(text.split("\n").at(-1)).toBe("🔄 La parité dépend de n.");
  });

  test("errors come back as messages", async () => {
    expect(await analyzeExpressionTool.execute({ expression: "2+" })).toBe(
      "❌ Invalid expression: Expression ends with operator",
    );
    expect(await analyzeExpressionTool.execute({ expression: "n", variable: "m" })).toBe(
      "❌ Invalid expression: Unknown variable: m. Found: n",
    );
    expect(
      await analyzeExpressionTool.execute({ expression: "n+k", fixed: { k: "q" } }),
    ).toBe("❌ Invalid expression: Invalid fixed value for k: q");
  });
});

describe("check_value", () => {
  test("evaluates one value", async () => {
    expect(await checkValueTool.execute({ expression: "2n+1", set: "N", value: "4" })).toBe(
      [
        "📍 Result for n = 4:",
        "   2*n + 1 = 9",
        "   Set membership: ✅ belongs to N",
        "   Parity: odd (2K+1), K = 4",
        "   🟠 9 is composite",
        "   Divisors: [1, 3, 9]",
      ].join("\n"),
    );
  });

  test("fixed values", async () => {
    const text = await checkValueTool.execute({ expression: "n+k", value: "1", fixed: { k: "2" } });
    expect(text.split("\n")).toContain("   🔵 3 is prime");
  });

  test("invalid input", async () => {
    expect(await checkValueTool.execute({ expression: "n", value: "x" })).toBe(
      "❌ Please enter a valid number.",
    );
    expect(await checkValueTool.execute({ expression: "1/n", value: "0" })).toBe(
      "❌ Error evaluating expression: Division by zero",
    );
  });
});

describe("translation table", () => {
  const missing = join(tmpdir(), "expression-checker-no-such-table.json");

  test("a missing table comes back as a message", async () => {
    vi.stubEnv("EXPRESSION_CHECKER_TRANSLATIONS", missing);
    expect(await analyzeExpressionTool.execute({ expression: "n" })).toBe(
      `❌ Translation file not found: ${missing}`,
    );
    expect(await checkValueTool.execute({ expression: "n", value: "1" })).toBe(
      `❌ Translation file not found: ${missing}`,
    );
  });

  test("the default language comes from the environment", async () => {
    vi.stubEnv("EXPRESSION_CHECKER_LANG", "fr");
    expect(await checkValueTool.execute({ expression: "n", value: "x" })).toBe(
      "❌ Veuillez entrer un nombre valide.",
    );
  });
});
