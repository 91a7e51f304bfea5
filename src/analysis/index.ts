/**
 * Analysis module barrel export
 */

export * from "./analyzer.ts";
export * from "./types.ts";
