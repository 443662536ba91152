/**
 * @file Shared types for fixed-width bitmask codecs
 */

/** Supported mask widths. 32-bit masks are `number`, 64-bit masks are `bigint`. */
export type BitWidth = 32 | 64;

/** Bit position naming one member of the encoded set, in `[0, width - 1]`. */
export type Identifier = number;

export type Mask32 = number;
export type Mask64 = bigint;

export type BitmaskCodec<M extends Mask32 | Mask64> = {
  width: BitWidth;
  encode: (ids: readonly Identifier[]) => M;
  decode: (mask: M) => Identifier[];
  hasBit: (mask: M, id: Identifier) => boolean;
  toggleBit: (mask: M, id: Identifier) => M;
  /** Validate a mask input and return its unsigned form. */
  normalize: (mask: M) => M;
};

export type BitmaskCodecOptions = {
  width?: BitWidth;
  /** Throw on invalid identifiers (default). When false, warn and ignore them. */
  strict?: boolean;
};

export type NormalizedCodecOptions = Required<BitmaskCodecOptions>;
