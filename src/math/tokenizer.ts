/**
 * Math Expression Tokenizer
 * Tokenizes user-typed expressions into structured tokens with operator metadata
 */

import {
  getOperatorArityInContext,
  getOperatorPrecedence,
  isMathOperator,
  isPostfixOperator,
  isRightAssociative,
} from "./operators.ts";

/** Named functions accepted in expressions, applied as prefix operators */
const KNOWN_FUNCTIONS = ["sqrt", "abs"] as const;

/**
 * Normalize raw input before tokenizing
 * - "**" → "^"
 * - "²" and "³" stay as postfix power operators
 * - surrounding whitespace removed
 */
export function normalizeInput(text: string): string {
  return text.trim().replace(/\*\*/g, "^");
}

// =============================================================================
// EXPRESSION VALIDATION
// =============================================================================

export interface ExpressionValidation {
  valid: boolean;
  error?: string;
  /** Position in expression where error was detected */
  errorIndex?: number;
}

/**
 * Validate a token stream for structural correctness
 * Checks for:
 * - Consecutive binary operators ("2 + * 3")
 * - Missing operands ("5 +")
 * - Mismatched parentheses
 * - Postfix operator without operand ("² 5")
 */
export function validateTokens(tokens: MathToken[]): ExpressionValidation {
  if (tokens.length === 0) {
    return { valid: false, error: "Empty expression" };
  }

  let parenDepth = 0;
  let expectOperand = true;

  for (const token of tokens) {
    switch (token.type) {
      case "number":
      case "variable":
        expectOperand = false;
        break;

      case "function":
        expectOperand = true;
        break;

      case "paren":
        if (token.value === "(") {
          parenDepth++;
          expectOperand = true;
          break;
        }
        parenDepth--;
        if (parenDepth < 0) {
          return {
            valid: false,
            error: "Unmatched closing parenthesis",
            errorIndex: token.position,
          };
        }
        if (expectOperand) {
          return {
            valid: false,
            error: "Empty parentheses or missing operand",
            errorIndex: token.position,
          };
        }
        break;

      case "operator":
        if (isPostfixOperator(token.value)) {
          if (expectOperand) {
            return {
              valid: false,
              error: `Postfix operator '${token.value}' without operand`,
              errorIndex: token.position,
            };
          }
          break;
        }
        if (token.arity === 2 && expectOperand) {
          return {
            valid: false,
            error: `Unexpected operator '${token.value}'`,
            errorIndex: token.position,
          };
        }
        expectOperand = true;
        break;

      case "unknown":
        return {
          valid: false,
          error: `Unknown character '${token.value}'`,
          errorIndex: token.position,
        };
    }
  }

  if (parenDepth > 0) {
    return { valid: false, error: "Unclosed parenthesis" };
  }
  if (expectOperand) {
    return { valid: false, error: "Expression ends with operator" };
  }

  return { valid: true };
}

/** Tokenize and validate an expression string */
export function validateExpression(expr: string): ExpressionValidation {
  const { tokens, errors } = tokenizeMathExpression(expr);
  if (errors.length > 0) {
    return { valid: false, error: errors[0] };
  }
  return validateTokens(tokens);
}

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type MathTokenType = "number" | "operator" | "variable" | "function" | "paren" | "unknown";

/** A single token from a math expression */
export interface MathToken {
  type: MathTokenType;
  value: string;
  position: number;
  /** For operators: precedence level (1-4) */
  precedence?: number;
  /** For operators: arity in context (1 or 2) */
  arity?: 1 | 2;
  /** For operators: whether right-associative */
  rightAssociative?: boolean;
  /** Set on multiplication tokens the tokenizer inserted itself */
  implicit?: boolean;
}

export interface TokenizeResult {
  tokens: MathToken[];
  errors: string[];
}

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize a math expression into structured tokens
 * Variables are single letters, so "ab" reads as "a * b" and "25n" as "25 * n".
 *
 * @example
 * tokenizeMathExpression("2n + 1")
 * // [
 * //   { type: "number", value: "2", position: 0 },
 * //   { type: "operator", value: "*", position: 1, implicit: true, ... },
 * //   { type: "variable", value: "n", position: 1 },
 * //   { type: "operator", value: "+", position: 3, precedence: 1, arity: 2 },
 * //   { type: "number", value: "1", position: 5 },
 * // ]
 */
export function tokenizeMathExpression(input: string): TokenizeResult {
  const expr = normalizeInput(input);
  const tokens: MathToken[] = [];
  const errors: string[] = [];
  let i = 0;
  let lastWasOperator = true; // Start as if after operator (for unary detection)

  while (i < expr.length) {
    const char = expr.charAt(i);
    const startPos = i;

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // Brackets of every kind collapse to round parentheses
    if (/[()[\]{}]/.test(char)) {
      const open = char === "(" || char === "[" || char === "{";
      tokens.push({ type: "paren", value: open ? "(" : ")", position: startPos });
      lastWasOperator = open;
      i++;
      continue;
    }

    if (isMathOperator(char)) {
      const arity = getOperatorArityInContext(char, lastWasOperator);
      tokens.push({
        type: "operator",
        value: char,
        position: startPos,
        precedence: getOperatorPrecedence(char) ?? undefined,
        arity: arity ?? undefined,
        rightAssociative: isRightAssociative(char) || undefined,
      });
      lastWasOperator = !isPostfixOperator(char);
      i++;
      continue;
    }

    // Numbers (decimals and scientific notation)
    if (/[\d.]/.test(char)) {
      let numStr = "";
      while (i < expr.length) {
        const c = expr.charAt(i);
        if (/[\d.]/.test(c)) {
          numStr += c;
          i++;
          continue;
        }
        // 1e10, 2.5e-3; "2e" followed by a letter is 2 * e
        const exponent = /^[eE][+-]?\d/.exec(expr.slice(i));
        if (exponent && !/[eE]/.test(numStr)) {
          numStr += exponent[0];
          i += exponent[0].length;
          continue;
        }
        break;
      }
      if ((numStr.match(/\./g) ?? []).length > 1 || numStr === "." || /[eE].*\./.test(numStr)) {
        errors.push(`Malformed number '${numStr}' at position ${startPos}`);
      }
      tokens.push({ type: "number", value: numStr, position: startPos });
      lastWasOperator = false;
      continue;
    }

    // Letters: a known function name, otherwise one variable per letter
    if (/[a-zA-Z]/.test(char)) {
      let run = "";
      while (i < expr.length && /[a-zA-Z]/.test(expr.charAt(i))) {
        run += expr.charAt(i);
        i++;
      }
      lastWasOperator = pushLetters(run, startPos, tokens);
      continue;
    }

    tokens.push({ type: "unknown", value: char, position: startPos });
    errors.push(`Unknown character '${char}' at position ${startPos}`);
    i++;
  }

  return { tokens: insertImplicitMultiplication(tokens), errors };
}

/**
 * Push the tokens for a run of letters
 * Returns whether the last token pushed behaves like an operator
 */
function pushLetters(run: string, startPos: number, tokens: MathToken[]): boolean {
  const lower = run.toLowerCase();
  const fn = KNOWN_FUNCTIONS.find((name) => lower.startsWith(name));

  let offset = 0;
  if (fn) {
    tokens.push({
      type: "function",
      value: fn,
      position: startPos,
      precedence: 4,
      arity: 1,
    });
    offset = fn.length;
    if (offset === run.length) return true;
  }

  for (let k = offset; k < run.length; k++) {
    tokens.push({ type: "variable", value: run.charAt(k), position: startPos + k });
  }
  return false;
}

/**
 * Insert implicit multiplication operators between adjacent operands
 * Handles: 25n, n2, ab, n(…), (…)n, (a)(b), n²m, 2√n, 2sqrt(n)
 * @internal
 */
function insertImplicitMultiplication(tokens: MathToken[]): MathToken[] {
  const result: MathToken[] = [];

  for (const [i, curr] of tokens.entries()) {
    result.push(curr);

    const next = tokens[i + 1];
    if (!next) continue;

    const currIsOperand =
      curr.type === "number" ||
      curr.type === "variable" ||
      (curr.type === "paren" && curr.value === ")") ||
      (curr.type === "operator" && isPostfixOperator(curr.value));

    const nextIsOperand =
      next.type === "number" ||
      next.type === "variable" ||
      next.type === "function" ||
      (next.type === "paren" && next.value === "(") ||
      (next.type === "operator" && next.value === "√");

    if (currIsOperand && nextIsOperand) {
      result.push({
        type: "operator",
        value: "*",
        position: next.position,
        precedence: 2,
        arity: 2,
        implicit: true,
      });
    }
  }

  return result;
}

// =============================================================================
// TOKEN FORMATTING
// =============================================================================

/**
 * Rebuild the normalized text of a token stream, with inserted multiplications made explicit
 *
 * @example
 * formatTokens(tokenizeMathExpression("25n(n+1)").tokens);
 * // "25*n*(n+1)"
 */
export function formatTokens(tokens: MathToken[]): string {
  return tokens.map((token) => token.value).join("");
}
