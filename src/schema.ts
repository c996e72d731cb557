import {
  bigint,
  integer,
  literal,
  maxValue,
  minValue,
  number,
  object,
  pipe,
  regex,
  string,
  transform,
  tuple,
  union,
  variant,
  type InferOutput,
} from "valibot";
import { U128_MAX } from "./core/amount";
import { asAddress } from "./types/brands";

/* Inputs from the dispatcher: amounts may arrive as bigint or as decimal strings. */

export const addressSchema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{40}$/, "expected a 0x-prefixed 20-byte hex address"),
  transform(asAddress),
);

export const amountSchema = pipe(
  union([
    bigint(),
    pipe(
      string(),
      regex(/^[0-9]+$/, "expected a decimal amount"),
      transform((s) => BigInt(s)),
    ),
  ]),
  minValue(0n, "amount must not be negative"),
  maxValue(U128_MAX, "amount exceeds u128"),
);

export const decimalsSchema = pipe(number(), integer(), minValue(0), maxValue(255));

export const commandSchema = variant("type", [
  object({ type: literal("transfer"), to: addressSchema, value: amountSchema }),
  object({
    type: literal("transferFrom"),
    from: addressSchema,
    to: addressSchema,
    value: amountSchema,
  }),
  object({ type: literal("approve"), spender: addressSchema, value: amountSchema }),
  object({
    type: literal("increaseAllowance"),
    spender: addressSchema,
    delta: amountSchema,
  }),
  object({
    type: literal("decreaseAllowance"),
    spender: addressSchema,
    delta: amountSchema,
  }),
  object({ type: literal("mint"), value: amountSchema }),
  object({ type: literal("burn"), value: amountSchema }),
]);

export const inputSchema = tuple([addressSchema, commandSchema]);

export type WireCommand = InferOutput<typeof commandSchema>;
export type WireInput = InferOutput<typeof inputSchema>;
