/**
 * Error types raised at the edges of the analysis pipeline
 * The math layer itself reports failures as result objects.
 */

/** The expression text could not be parsed */
export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

/** A parsed expression could not be evaluated at a point */
export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/** The translation resource is missing or malformed; fatal */
export class TranslationLoadError extends Error {
  constructor(
    message: string,
    public readonly reason: "missing" | "malformed" | "invalid" | "unreadable",
    public readonly path: string,
  ) {
    super(message);
    this.name = "TranslationLoadError";
  }
}

/** The user cancelled a prompt (Ctrl+C or closed input) */
export class PromptInterruptedError extends Error {
  constructor() {
    super("Prompt interrupted");
    this.name = "PromptInterruptedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
