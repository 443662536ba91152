/**
 * @file Bitmask error types
 */
import type { BitWidth } from "./types";

export type InvalidIdentifierReason = "not-integer" | "out-of-range";

/** Thrown when an identifier is not an integer in `[0, width - 1]`. */
export class InvalidIdentifierError extends Error {
  readonly id: number;
  readonly width: BitWidth;
  readonly reason: InvalidIdentifierReason;

  constructor(id: number, width: BitWidth, reason: InvalidIdentifierReason) {
    const detail = reason === "not-integer" ? "not an integer" : `outside [0, ${width - 1}]`;
    super(`invalid identifier ${id}: ${detail}`);
    this.name = "InvalidIdentifierError";
    this.id = id;
    this.width = width;
    this.reason = reason;
  }
}

/** Thrown when a mask input cannot be read as a `width`-bit integer. */
export class InvalidMaskError extends Error {
  readonly mask: number | bigint;
  readonly width: BitWidth;

  constructor(mask: number | bigint, width: BitWidth) {
    super(`invalid mask ${String(mask)}: not a ${width}-bit integer`);
    this.name = "InvalidMaskError";
    this.mask = mask;
    this.width = width;
  }
}

/** Thrown when codec options fail validation. */
export class BitmaskConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BitmaskConfigError";
  }
}
