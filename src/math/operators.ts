/**
 * Math Operator Utilities
 * Operator table for expression input (ASCII + Unicode)
 */

// ASCII: + - * / ^ %
// Unicode: × ÷ − · √ ² ³
// √ is a prefix operator, ² and ³ are postfix

/** Pattern to match a single math operator character */
const SINGLE_OPERATOR_PATTERN = /^[+\-*/^%×÷−·√²³]$/;

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: Addition/subtraction
 * - Level 2: Multiplication/division/modulo
 * - Level 3: Exponentiation and superscripts
 * - Level 4: Prefix operators
 */
export const OPERATOR_PRECEDENCE: Record<string, number> = {
  "+": 1,
  "-": 1,
  "−": 1, // Unicode minus

  "*": 2,
  "/": 2,
  "%": 2,
  "×": 2,
  "÷": 2,
  "·": 2, // Middle dot

  "^": 3,
  "²": 3,
  "³": 3,

  "√": 4,
};

/** Right-associative operators: 2^3^2 = 2^(3^2) */
export const RIGHT_ASSOCIATIVE = new Set(["^", "²", "³"]);

/** Operators that always take one operand */
export const UNARY_OPERATORS = new Set(["√", "²", "³"]);

/** Postfix operators: n², n³ */
export const POSTFIX_OPERATORS = new Set(["²", "³"]);

/** "-" is binary in "5-3" but unary in "-5" or "5*-3" */
export const AMBIGUOUS_OPERATORS = new Set(["-", "−", "+"]);

export function isMathOperator(char: string): boolean {
  return SINGLE_OPERATOR_PATTERN.test(char);
}

export function isPostfixOperator(char: string): boolean {
  return POSTFIX_OPERATORS.has(char);
}

/** Returns null for unrecognized characters */
export function getOperatorPrecedence(char: string): number | null {
  return OPERATOR_PRECEDENCE[char] ?? null;
}

export function isRightAssociative(char: string): boolean {
  return RIGHT_ASSOCIATIVE.has(char);
}

/**
 * Determine operator arity based on context
 * @param afterOperator - Whether this operator follows another operator or is at start
 */
export function getOperatorArityInContext(char: string, afterOperator: boolean): 1 | 2 | null {
  if (!isMathOperator(char)) return null;
  if (UNARY_OPERATORS.has(char)) return 1;
  if (afterOperator && AMBIGUOUS_OPERATORS.has(char)) return 1;
  return 2;
}

/**
 * Normalize operator to canonical ASCII form
 * − → -, × and · → *, ÷ → /
 */
export function normalizeOperator(op: string): string {
  switch (op) {
    case "−":
      return "-";
    case "×":
    case "·":
      return "*";
    case "÷":
      return "/";
    default:
      return op;
  }
}
