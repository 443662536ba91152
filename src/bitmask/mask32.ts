/**
 * @file 32-bit bitmask codec over plain numbers
 *
 * Bit `i` of the mask is set iff identifier `i` is a member of the set, so the
 * mask for a single identifier is `1 << i`. For example `[1, 3, 5]` encodes to
 * `0b101010` (42).
 *
 * JS bitwise operators work on signed 32-bit integers; every mask returned here
 * is brought back to its unsigned form with `>>> 0`, so `encode([31])` is
 * `2 ** 31` rather than `-(2 ** 31)`.
 */
import { InvalidMaskError } from "./errors";
import { assertIdentifier, isMask32 } from "./guards";
import type { Identifier, Mask32 } from "./types";

export const WIDTH_32 = 32;

/** Validate a mask input and return it as an unsigned 32-bit integer. */
export function toUint32(mask: number): Mask32 {
  if (!isMask32(mask)) {
    throw new InvalidMaskError(mask, WIDTH_32);
  }
  return mask >>> 0;
}

/**
 * Set one bit per identifier, starting from the empty mask.
 * All identifiers are checked before the first shift.
 */
export function encode(ids: readonly Identifier[]): Mask32 {
  for (const id of ids) {
    assertIdentifier(id, WIDTH_32);
  }
  let mask = 0;
  for (const id of ids) {
    mask |= 1 << id;
  }
  return mask >>> 0;
}

/** Ascending list of set bit positions. */
export function decode(mask: Mask32): Identifier[] {
  const ids: Identifier[] = [];
  // unsigned shift so a set top bit does not sign-extend
  for (let m = toUint32(mask), bit = 0; m !== 0; m >>>= 1, bit++) {
    if ((m & 1) === 1) {
      ids.push(bit);
    }
  }
  return ids;
}

/**
 *
 */
export function hasBit(mask: Mask32, id: Identifier): boolean {
  assertIdentifier(id, WIDTH_32);
  return (toUint32(mask) & (1 << id)) !== 0;
}

/**
 *
 */
export function toggleBit(mask: Mask32, id: Identifier): Mask32 {
  assertIdentifier(id, WIDTH_32);
  return (toUint32(mask) ^ (1 << id)) >>> 0;
}
