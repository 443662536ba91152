/**
 * @file Type guards for identifiers and mask inputs
 */
import { InvalidIdentifierError } from "./errors";
import type { BitWidth, Identifier } from "./types";

const INT32_MIN = -0x80000000;
const UINT32_MAX = 0xffffffff;
const INT64_MIN = -(1n << 63n);
const UINT64_MAX = (1n << 64n) - 1n;

/** Narrow to an integer bit position that fits the given width. */
export function isIdentifier(value: unknown, width: BitWidth): value is Identifier {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    return false;
  }
  return value >= 0 && value < width;
}

/** Throw InvalidIdentifierError unless `value` is a valid identifier for `width`. */
export function assertIdentifier(value: number, width: BitWidth): asserts value is Identifier {
  if (!Number.isInteger(value)) {
    throw new InvalidIdentifierError(value, width, "not-integer");
  }
  if (value < 0 || value >= width) {
    throw new InvalidIdentifierError(value, width, "out-of-range");
  }
}

/** Accepts both the signed and unsigned reading of a 32-bit pattern. */
export function isMask32(value: unknown): value is number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    return false;
  }
  return value >= INT32_MIN && value <= UINT32_MAX;
}

/** Accepts both the signed and unsigned reading of a 64-bit pattern. */
export function isMask64(value: unknown): value is bigint {
  if (typeof value !== "bigint") {
    return false;
  }
  return value >= INT64_MIN && value <= UINT64_MAX;
}
