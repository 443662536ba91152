/**
 * @file 64-bit bitmask codec over bigint
 *
 * Same layout as the 32-bit codec, widened to a machine word. Masks are kept
 * in `[0, 2^64 - 1]` via `BigInt.asUintN`.
 */
import { InvalidMaskError } from "./errors";
import { assertIdentifier, isMask64 } from "./guards";
import type { Identifier, Mask64 } from "./types";

export const WIDTH_64 = 64;

function bitOf(id: Identifier): Mask64 {
  return 1n << BigInt(id);
}

/** Validate a mask input and return it as an unsigned 64-bit integer. */
export function toUint64(mask: bigint): Mask64 {
  if (!isMask64(mask)) {
    throw new InvalidMaskError(mask, WIDTH_64);
  }
  return BigInt.asUintN(WIDTH_64, mask);
}

/**
 *
 */
export function encode64(ids: readonly Identifier[]): Mask64 {
  for (const id of ids) {
    assertIdentifier(id, WIDTH_64);
  }
  let mask = 0n;
  for (const id of ids) {
    mask |= bitOf(id);
  }
  return mask;
}

/**
 *
 */
export function decode64(mask: Mask64): Identifier[] {
  const ids: Identifier[] = [];
  for (let m = toUint64(mask), bit = 0; m !== 0n; m >>= 1n, bit++) {
    if ((m & 1n) === 1n) {
      ids.push(bit);
    }
  }
  return ids;
}

/**
 *
 */
export function hasBit64(mask: Mask64, id: Identifier): boolean {
  assertIdentifier(id, WIDTH_64);
  return (toUint64(mask) & bitOf(id)) !== 0n;
}

/**
 *
 */
export function toggleBit64(mask: Mask64, id: Identifier): Mask64 {
  assertIdentifier(id, WIDTH_64);
  return toUint64(mask) ^ bitOf(id);
}
