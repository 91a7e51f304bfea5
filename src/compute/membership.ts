/**
 * Set membership for N and N*
 */

import { type NumericValue, signOf, toInteger } from "../math/numeric.ts";

export const NATURAL_SETS = ["N", "N*"] as const;

/** N: non-negative integers. N*: positive integers. */
export type NaturalSet = (typeof NATURAL_SETS)[number];

export function isNaturalSet(value: string): value is NaturalSet {
  return NATURAL_SETS.some((set) => set === value);
}

/** Smallest member: 0 for N, 1 for N* */
export function minimumOf(set: NaturalSet): number {
  return set === "N*" ? 1 : 0;
}

/** N iff value >= 0 and integral; N* iff value > 0 and integral */
export function belongsTo(set: NaturalSet, value: NumericValue): boolean {
  if (toInteger(value) === null) return false;
  const sign = signOf(value);
  return set === "N" ? sign >= 0 : sign > 0;
}
