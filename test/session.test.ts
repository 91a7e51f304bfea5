import { describe, expect, test } from "vitest";
import { runSession } from "../src/cli/session.ts";
import { loadTranslations } from "../src/i18n/translations.ts";
import { ScriptedPrompter, captureWriter } from "./helpers/scripted-prompter.ts";

const translations = loadTranslations();

async function play(answers: string[], language?: string) {
  const prompter = new ScriptedPrompter(answers);
  const { lines, write } = captureWriter();
  const outcome = await runSession({ translations, language, prompter, write });
  return { outcome, lines, questions: prompter.questions };
}

describe("runSession", () => {
  test("full English session with value testing", async () => {
    const { outcome, lines, questions } = await play(["1", "n", "n²", "y", "3", "abc", "done"]);

    expect(outcome).toBe("completed");
    expect(lines.slice(0, 4)).toEqual([
      "🌍 Choose your language / Choisissez votre langue / اختر لغتك:",
      "1. English",
      "2. Français",
      "3. العربية",
    ]);
    expect(questions).toEqual([
      "Enter choice (1/2/3): ",
      "Choose the set (N or N*): ",
      "Enter an expression (e.g. 2n+1, n², n(n+1)/2): ",
      "Test values? (y/n): ",
      "Enter a value for n (or 'done' to finish): ",
      "Enter a value for n (or 'done' to finish): ",
      "Enter a value for n (or 'done' to finish): ",
    ]);
    expect(lines).toContain("✅ You chose N (natural numbers).");
    expect(lines).toContain("✅ Expression parsed: n^2");
    expect(lines).toContain("📊 Analyzing expression for n ≥ 0...");
    expect(lines).toContain("Note: for N, values start at 0.");

    const result = lines.indexOf("📍 Result for n = 3:");
    expect(lines.slice(result, result + 6)).toEqual([
      "📍 Result for n = 3:",
      "   n^2 = 9",
      "   Set membership: ✅ belongs to N",
      "   Parity: odd (2K+1), K = 4",
      "   🟠 9 is composite",
      "   Divisors: [1, 3, 9]",
    ]);
    expect(lines).toContain("❌ Please enter a valid number.");
    expect(lines.at(-1)).toBe("🎉 Analysis complete!");
  });

  test("preset French language skips the menu and testing", async () => {
    const { outcome, lines, questions } = await play(["n*", "2n+1", "n"], "fr");

    expect(outcome).toBe("completed");
    expect(questions[0]).toBe("Choisissez l'ensemble (N ou N*) : ");
    expect(lines).toContain("✅ Vous avez choisi N* (entiers naturels non nuls).");
    expect(lines).toContain("✅ Toujours impair, pour tout entier n.");
    expect(lines).not.toContain("🧪 Test de valeurs précises");
    expect(lines.at(-1)).toBe("🎉 Analyse terminée !");
  });

  test("invalid answers are repeated; constants end the session", async () => {
    const { outcome, lines } = await play(["9", "x", "2", "Z", "N", "2+*3", "5"]);

    expect(outcome).toBe("completed");
    expect(lines.filter((l) => l === "❌ Invalid choice. Please try again.")).toHaveLength(2);
    expect(lines).toContain("❌ Veuillez entrer N ou N*.");
    expect(lines).toContain("❌ Expression invalide : Unexpected operator '*'");
    expect(lines).toContain(
      "💡 Astuce : écrivez les produits 2*n ou 2n, et les puissances n^2 ou n².",
    );
    expect(lines).toContain("  5 = impair (2K+1), K = 2");
    expect(lines).toContain("  └─ 🔵 5 est premier");
    expect(lines.at(-1)).toBe("🎉 Analyse terminée !");
  });

  test("several variables: choose one and fix the others", async () => {
    const { lines, questions } = await play(["N", "an+b", "", "2", "", "no"], "en");

    expect(questions.slice(2, 5)).toEqual([
      "Variables found: a, b, n. Which one varies? [n]: ",
      "Value held fixed for a [0]: ",
      "Value held fixed for b [0]: ",
    ]);
    expect(lines).toContain("✅ Expression parsed: a*n + b");
    expect(lines).toContain("  n = 1: a*n + b = 2 ✅");
    expect(lines).toContain("The expression produces only even values (2K).");
    expect(lines).toContain("✅ Always even, for every integer n.");
  });

  test("an unknown primary variable is asked again", async () => {
    const { questions, lines } = await play(["N", "xy", "z", "y", "1", "no"], "en");

    expect(lines).toContain("❌ Please enter one of: x, y");
    expect(questions.slice(2)).toEqual([
      "Variables found: x, y. Which one varies? [x]: ",
      "Variables found: x, y. Which one varies? [x]: ",
      "Value held fixed for x [0]: ",
      "Test values? (y/n): ",
    ]);
  });

  test("evaluation errors during value testing are reported", async () => {
    const { lines } = await play(["N*", "1/(n-2)", "y", "2", "done"], "en");
    expect(lines).toContain("❌ Error evaluating expression: Division by zero");
  });

  test("Ctrl+C ends the session with a goodbye", async () => {
    const { outcome, lines } = await play(["1"]);

    expect(outcome).toBe("interrupted");
    expect(lines.slice(-3)).toEqual(["", "", "👋 Program interrupted. Goodbye!"]);
  });

  test("interruption speaks the chosen language", async () => {
    const { lines } = await play([], "ar");
    expect(lines.at(-1)).toBe("👋 تمت مقاطعة البرنامج. إلى اللقاء!");
  });
});
