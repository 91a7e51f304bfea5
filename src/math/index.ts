/**
 * Math module barrel export
 * Re-exports operators, tokenizer, AST, exact numbers and polynomials
 */

export * from "./ast.ts";
export * from "./numeric.ts";
export * from "./operators.ts";
export * from "./polynomial.ts";
export * from "./rational.ts";
export * from "./tokenizer.ts";
