/**
 * Math Expression AST (Abstract Syntax Tree)
 * Building, simplification, formatting, and evaluation of math expressions
 */

import { type NumericValue, approx, exact, toNumber } from "./numeric.ts";
import { normalizeOperator } from "./operators.ts";
import { Rational } from "./rational.ts";
import { type MathToken, tokenizeMathExpression, validateTokens } from "./tokenizer.ts";

// =============================================================================
// AST NODE TYPES
// =============================================================================

/** Number literal node, held exactly */
export interface NumberNode {
  type: "number";
  value: Rational;
}

export interface VariableNode {
  type: "variable";
  name: string;
}

/** Prefix operation: "-", "+", "sqrt", "abs" */
export interface UnaryNode {
  type: "unary";
  operator: string;
  operand: ASTNode;
}

/** Binary operation: "+", "-", "*", "/", "%", "^" */
export interface BinaryNode {
  type: "binary";
  operator: string;
  left: ASTNode;
  right: ASTNode;
}

export type ASTNode = NumberNode | VariableNode | UnaryNode | BinaryNode;

export interface ASTResult {
  ast: ASTNode | null;
  error?: string;
}

export function num(value: Rational | number | bigint): NumberNode {
  return {
    type: "number",
    value: value instanceof Rational ? value : Rational.fromInteger(value),
  };
}

// =============================================================================
// AST BUILDING (Shunting-Yard Algorithm)
// =============================================================================

/**
 * Tokenize, validate and build the AST of an expression string
 *
 * @example
 * parseExpression("n(n+1)/2").ast
 * // n * (n + 1) / 2
 */
export function parseExpression(expr: string): ASTResult {
  const { tokens, errors } = tokenizeMathExpression(expr);
  if (errors.length > 0) {
    return { ast: null, error: errors[0] };
  }

  const validation = validateTokens(tokens);
  if (!validation.valid) {
    return { ast: null, error: validation.error };
  }

  return buildAST(tokens);
}

/**
 * Build an Abstract Syntax Tree from tokens using the shunting-yard algorithm
 * Respects operator precedence and associativity.
 * Postfix ² and ³ bind to the operand just read: -n² is -(n²), 2^n² is 2^(n²).
 */
export function buildAST(tokens: MathToken[]): ASTResult {
  if (tokens.length === 0) {
    return { ast: null, error: "Empty expression" };
  }

  const outputStack: ASTNode[] = [];
  const operatorStack: MathToken[] = [];

  for (const token of tokens) {
    const result = processASTToken(token, outputStack, operatorStack);
    if (result?.error) return { ast: null, error: result.error };
  }

  for (let op = operatorStack.pop(); op; op = operatorStack.pop()) {
    if (op.type === "paren") {
      return { ast: null, error: "Mismatched parentheses" };
    }
    const result = applyOperator(op, outputStack);
    if (result.error) return { ast: null, error: result.error };
  }

  const [ast] = outputStack;
  if (!ast || outputStack.length !== 1) {
    return { ast: null, error: "Invalid expression structure" };
  }

  return { ast };
}

function processASTToken(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): { error?: string } | null {
  switch (token.type) {
    case "number": {
      const value = Rational.parse(token.value);
      if (!value) return { error: `Number out of range: ${token.value}` };
      outputStack.push({ type: "number", value });
      return null;
    }

    case "variable":
      outputStack.push({ type: "variable", name: token.value });
      return null;

    case "function":
      operatorStack.push(token);
      return null;

    case "operator":
      return processASTOperator(token, outputStack, operatorStack);

    case "paren":
      return processASTParen(token, outputStack, operatorStack);

    case "unknown":
      return { error: `Unknown token: ${token.value}` };
  }
}

function processASTOperator(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): { error?: string } | null {
  // Postfix power applies to the operand just completed
  if (token.value === "²" || token.value === "³") {
    const base = outputStack.pop();
    if (!base) return { error: `Missing operand for ${token.value}` };
    outputStack.push({
      type: "binary",
      operator: "^",
      left: base,
      right: num(token.value === "²" ? 2 : 3),
    });
    return null;
  }

  if (token.arity === 1) {
    operatorStack.push(token);
    return null;
  }

  // Binary operator - pop higher/equal precedence operators
  for (let top = operatorStack.at(-1); top; top = operatorStack.at(-1)) {
    if (top.type === "paren") break;

    const topPrec = top.precedence ?? 0;
    const currPrec = token.precedence ?? 0;
    const shouldPop = topPrec > currPrec || (topPrec === currPrec && !token.rightAssociative);

    if (!shouldPop) break;

    operatorStack.pop();
    const result = applyOperator(top, outputStack);
    if (result.error) return result;
  }

  operatorStack.push(token);
  return null;
}

function processASTParen(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): { error?: string } | null {
  if (token.value === "(") {
    operatorStack.push(token);
    return null;
  }

  // Closing paren - pop until matching open
  for (let top = operatorStack.pop(); top; top = operatorStack.pop()) {
    if (top.type === "paren") return null;
    const result = applyOperator(top, outputStack);
    if (result.error) return result;
  }
  return { error: "Mismatched parentheses" };
}

/** Apply an operator to operands on the stack */
function applyOperator(op: MathToken, stack: ASTNode[]): { error?: string } {
  if (op.arity === 1) {
    const operand = stack.pop();
    if (!operand) {
      return { error: `Missing operand for unary operator ${op.value}` };
    }
    const operator = op.value === "√" ? "sqrt" : normalizeOperator(op.value);
    stack.push({ type: "unary", operator, operand });
    return {};
  }

  const right = stack.pop();
  const left = stack.pop();
  if (!left || !right) {
    return { error: `Missing operands for binary operator ${op.value}` };
  }
  stack.push({ type: "binary", operator: normalizeOperator(op.value), left, right });
  return {};
}

// =============================================================================
// AST SIMPLIFICATION
// =============================================================================

/**
 * Simplify an AST by performing constant folding and algebraic simplification
 * Transformations applied:
 * - Constant folding: 2 + 3 → 5, 1/2 + 1/3 → 5/6 (exact)
 * - Identity: x + 0 → x, x * 1 → x, x ^ 1 → x
 * - Zero: x * 0 → 0, 0 / x → 0
 * - Power of zero: x ^ 0 → 1
 * - Double negation: --x → x
 * - Self subtraction: x - x → 0
 * - Self division: x / x → 1
 */
export function simplifyAST(node: ASTNode): ASTNode {
  switch (node.type) {
    case "number":
    case "variable":
      return node;

    case "unary":
      return simplifyUnary(node);

    case "binary":
      return simplifyBinary(node);
  }
}

function simplifyUnary(node: UnaryNode): ASTNode {
  const operand = simplifyAST(node.operand);

  // Double negation: --x → x
  if (node.operator === "-" && operand.type === "unary" && operand.operator === "-") {
    return operand.operand;
  }

  if (operand.type === "number") {
    const result = foldUnary(node.operator, operand.value);
    if (result !== null) return num(result);
  }

  if (node.operator === "+") return operand;

  return { ...node, operand };
}

function simplifyBinary(node: BinaryNode): ASTNode {
  const left = simplifyAST(node.left);
  const right = simplifyAST(node.right);

  if (left.type === "number" && right.type === "number") {
    const result = foldBinary(node.operator, left.value, right.value);
    if (result !== null) return num(result);
  }

  const simplified = simplifyByOperator(node.operator, left, right);
  if (simplified) return simplified;

  return { ...node, left, right };
}

function isValue(node: ASTNode, value: number): boolean {
  return node.type === "number" && node.value.equals(Rational.fromInteger(value));
}

/** Apply operator-specific simplification rules */
function simplifyByOperator(op: string, left: ASTNode, right: ASTNode): ASTNode | null {
  switch (op) {
    case "+":
      if (isValue(right, 0)) return left;
      if (isValue(left, 0)) return right;
      break;
    case "-":
      if (isValue(right, 0)) return left;
      if (isValue(left, 0)) return simplifyUnary({ type: "unary", operator: "-", operand: right });
      if (astEqual(left, right)) return num(0);
      break;
    case "*":
      if (isValue(right, 0) || isValue(left, 0)) return num(0);
      if (isValue(right, 1)) return left;
      if (isValue(left, 1)) return right;
      break;
    case "/":
      if (isValue(right, 1)) return left;
      if (isValue(left, 0) && !isValue(right, 0)) return num(0);
      if (astEqual(left, right)) return num(1);
      break;
    case "^":
      if (isValue(right, 0)) return num(1);
      if (isValue(right, 1)) return left;
      if (isValue(left, 1)) return num(1);
      break;
  }
  return null;
}

function foldUnary(op: string, value: Rational): Rational | null {
  switch (op) {
    case "-":
      return value.neg();
    case "+":
      return value;
    case "abs":
      return value.abs();
    case "sqrt":
      return value.sqrt();
    default:
      return null;
  }
}

function foldBinary(op: string, left: Rational, right: Rational): Rational | null {
  switch (op) {
    case "+":
      return left.add(right);
    case "-":
      return left.sub(right);
    case "*":
      return left.mul(right);
    case "/":
      return left.div(right);
    case "%":
      return left.mod(right);
    case "^":
      return right.isInteger() ? left.pow(right.num) : null;
    default:
      return null;
  }
}

/** Check if two AST nodes are structurally equal */
function astEqual(a: ASTNode, b: ASTNode): boolean {
  switch (a.type) {
    case "number":
      return b.type === "number" && a.value.equals(b.value);
    case "variable":
      return b.type === "variable" && a.name === b.name;
    case "unary":
      return b.type === "unary" && a.operator === b.operator && astEqual(a.operand, b.operand);
    case "binary":
      return (
        b.type === "binary" &&
        a.operator === b.operator &&
        astEqual(a.left, b.left) &&
        astEqual(a.right, b.right)
      );
  }
}

// =============================================================================
// AST FORMATTING
// =============================================================================

export interface FormatASTOptions {
  /** Use Unicode operators (× instead of *, ÷ instead of /, − instead of -) */
  useUnicode?: boolean;
  /** Spaces around "+" and "-" only (default), around every binary operator, or none */
  spaces?: "additive" | "all" | "none";
}

const UNICODE_OPS: Record<string, string> = {
  "*": "×",
  "/": "÷",
  "-": "−",
};

// Binding strength used to decide parentheses
const NEGATION = 2.5;
const ATOM = 4;

function binaryPrecedence(op: string): number {
  switch (op) {
    case "+":
    case "-":
      return 1;
    case "*":
    case "/":
    case "%":
      return 2;
    default:
      return 3;
  }
}

function nodePrecedence(node: ASTNode): number {
  switch (node.type) {
    case "number":
      if (node.value.sign() < 0) return NEGATION;
      return node.value.isInteger() ? ATOM : 2;
    case "variable":
      return ATOM;
    case "unary":
      return node.operator === "-" || node.operator === "+" ? NEGATION : ATOM;
    case "binary":
      return binaryPrecedence(node.operator);
  }
}

/**
 * Format an AST node back to a human-readable expression string
 *
 * @example
 * formatAST(parseExpression("2*n+1").ast)
 * // "2*n + 1"
 *
 * @example
 * formatAST(ast, { useUnicode: true, spaces: "all" });
 * // "2 × n + 1"
 */
export function formatAST(node: ASTNode, options: FormatASTOptions = {}): string {
  const { useUnicode = false, spaces = "additive" } = options;

  const formatOp = (op: string): string => (useUnicode ? (UNICODE_OPS[op] ?? op) : op);

  const wrap = (child: ASTNode, needsParens: boolean): string => {
    const text = fmt(child);
    return needsParens ? `(${text})` : text;
  };

  function fmt(n: ASTNode): string {
    switch (n.type) {
      case "number":
        return n.value.sign() < 0 ? `${formatOp("-")}${n.value.abs()}` : n.value.toString();

      case "variable":
        return n.name;

      case "unary":
        if (n.operator === "sqrt" || n.operator === "abs") {
          return `${n.operator}(${fmt(n.operand)})`;
        }
        return `${formatOp(n.operator)}${wrap(n.operand, nodePrecedence(n.operand) < NEGATION)}`;

      case "binary": {
        const prec = binaryPrecedence(n.operator);
        const rightAssoc = n.operator === "^";
        const leftPrec = nodePrecedence(n.left);
        const rightPrec = nodePrecedence(n.right);

        const leftParens = rightAssoc ? leftPrec <= prec : leftPrec < prec;
        const rightParens =
          rightPrec === NEGATION || (rightAssoc ? rightPrec < prec : rightPrec <= prec);

        const spaced = spaces === "all" || (spaces === "additive" && prec === 1);
        const sp = spaced ? " " : "";
        return `${wrap(n.left, leftParens)}${sp}${formatOp(n.operator)}${sp}${wrap(n.right, rightParens)}`;
      }
    }
  }

  return fmt(node);
}

// =============================================================================
// VARIABLES
// =============================================================================

/** Collect all variable names from an AST, sorted */
export function collectVariables(node: ASTNode): string[] {
  const vars = new Set<string>();

  function traverse(n: ASTNode): void {
    switch (n.type) {
      case "number":
        break;
      case "variable":
        vars.add(n.name);
        break;
      case "unary":
        traverse(n.operand);
        break;
      case "binary":
        traverse(n.left);
        traverse(n.right);
        break;
    }
  }

  traverse(node);
  return [...vars].sort();
}

/** Replace variables with number literals; unlisted variables are left alone */
export function substituteAST(node: ASTNode, bindings: Record<string, Rational>): ASTNode {
  switch (node.type) {
    case "number":
      return node;
    case "variable": {
      const value = bindings[node.name];
      return value ? num(value) : node;
    }
    case "unary":
      return { ...node, operand: substituteAST(node.operand, bindings) };
    case "binary":
      return {
        ...node,
        left: substituteAST(node.left, bindings),
        right: substituteAST(node.right, bindings),
      };
  }
}

// =============================================================================
// EXPRESSION EVALUATION
// =============================================================================

export interface EvalResult {
  value: NumericValue | null;
  error?: string;
}

export type Bindings = Record<string, Rational | number>;

function fail(error: string): EvalResult {
  return { value: null, error };
}

function finite(value: number): EvalResult {
  if (Number.isNaN(value)) return fail("Result is not a real number");
  if (!Number.isFinite(value)) return fail("Result out of range");
  return { value: approx(value) };
}

/**
 * Evaluate an AST with variable bindings
 * Stays exact while every step is rational, falls back to floating point otherwise.
 *
 * @example
 * evaluateAST(parseExpression("n²+1").ast, { n: 3 }); // { value: exact 10 }
 * evaluateAST(parseExpression("1/n").ast, { n: 0 });  // { value: null, error: "Division by zero" }
 */
export function evaluateAST(node: ASTNode, bindings: Bindings = {}): EvalResult {
  switch (node.type) {
    case "number":
      return { value: exact(node.value) };

    case "variable": {
      const bound = bindings[node.name];
      if (bound === undefined) {
        return fail(`Unbound variable: ${node.name}`);
      }
      if (bound instanceof Rational) return { value: exact(bound) };
      const asRational = Rational.fromNumber(bound);
      return asRational ? { value: exact(asRational) } : finite(bound);
    }

    case "unary": {
      const operand = evaluateAST(node.operand, bindings);
      if (!operand.value) return operand;
      return evaluateUnary(node.operator, operand.value);
    }

    case "binary": {
      const left = evaluateAST(node.left, bindings);
      if (!left.value) return left;

      const right = evaluateAST(node.right, bindings);
      if (!right.value) return right;

      return evaluateBinary(node.operator, left.value, right.value);
    }
  }
}

function evaluateUnary(op: string, operand: NumericValue): EvalResult {
  if (operand.exact) {
    const folded = foldUnary(op, operand.value);
    if (folded) return { value: exact(folded) };
  }

  const x = toNumber(operand);
  switch (op) {
    case "-":
      return finite(-x);
    case "+":
      return finite(x);
    case "abs":
      return finite(Math.abs(x));
    case "sqrt":
      if (x < 0) return fail("Square root of negative number");
      return finite(Math.sqrt(x));
    default:
      return fail(`Unknown unary operator: ${op}`);
  }
}

function evaluateBinary(op: string, left: NumericValue, right: NumericValue): EvalResult {
  const a = toNumber(left);
  const b = toNumber(right);

  if ((op === "/" || op === "%") && b === 0) {
    return fail(op === "/" ? "Division by zero" : "Modulo by zero");
  }
  if (op === "^" && a === 0 && b < 0) {
    return fail("Division by zero");
  }

  if (left.exact && right.exact) {
    const folded = foldBinary(op, left.value, right.value);
    if (folded) return { value: exact(folded) };
  }

  switch (op) {
    case "+":
      return finite(a + b);
    case "-":
      return finite(a - b);
    case "*":
      return finite(a * b);
    case "/":
      return finite(a / b);
    case "%":
      return finite(a - b * Math.floor(a / b));
    case "^":
      return finite(a ** b);
    default:
      return fail(`Unknown binary operator: ${op}`);
  }
}

/**
 * Evaluate an expression string with optional variable bindings
 *
 * @example
 * evaluateExpression("2 + 3 * 4"); // { value: exact 14 }
 * evaluateExpression("x² + y²", { x: 3, y: 4 }); // { value: exact 25 }
 */
export function evaluateExpression(expr: string, bindings: Bindings = {}): EvalResult {
  const { ast, error } = parseExpression(expr);
  if (!ast) {
    return fail(error ?? "Failed to build AST");
  }
  return evaluateAST(ast, bindings);
}
