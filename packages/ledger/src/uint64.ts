import { z } from "zod";

export const U64_MAX = (1n << 64n) - 1n;

const decimalString = z.string().regex(/^(0|[1-9][0-9]*)$/, "expected a decimal integer string");

/** A uint64 written as a decimal string or a non-negative safe integer. */
export const uint64Schema = z
  .union([decimalString, z.number().int().nonnegative().refine(Number.isSafeInteger, "unsafe integer")])
  .transform((value) => BigInt(value))
  .refine((value) => value <= U64_MAX, "exceeds uint64 range");

export function fitsU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/** Sum of two uint64 values, or undefined on overflow. */
export function addU64(a: bigint, b: bigint): bigint | undefined {
  const sum = a + b;
  return sum <= U64_MAX ? sum : undefined;
}

export const hexKeySchema = z.string().regex(/^[0-9a-f]{64}$/, "expected 64 lowercase hex chars");
