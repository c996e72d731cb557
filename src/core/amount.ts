import type { Amount } from "../types/brands";

export const U128_MAX: Amount = 2n ** 128n - 1n;

export const isAmount = (v: bigint): boolean => v >= 0n && v <= U128_MAX;

export const assertAmount = (v: bigint, label = "amount"): Amount => {
  if (!isAmount(v)) throw new RangeError(`${label} out of u128 range: ${v}`);
  return v;
};

/* Increases clamp at U128_MAX; decreases clamp at zero. */
export const saturatingAdd = (a: Amount, b: Amount): Amount => {
  const sum = a + b;
  return sum > U128_MAX ? U128_MAX : sum;
};

export const saturatingSub = (a: Amount, b: Amount): Amount =>
  a > b ? a - b : 0n;
