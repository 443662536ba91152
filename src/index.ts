/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Consumers import from here only. Implementations live under src/bitmask/*.
 */

/**
 * 32-bit codec (default width): masks are unsigned numbers in [0, 2^32 - 1],
 * identifiers are integers in [0, 31].
 * @public
 */
export { encode, decode, hasBit, toggleBit, toUint32, WIDTH_32 } from "./bitmask/index";

/**
 * 64-bit codec: masks are bigints in [0, 2^64 - 1], identifiers are integers in [0, 63].
 * @public
 */
export { encode64, decode64, hasBit64, toggleBit64, toUint64, WIDTH_64 } from "./bitmask/index";

/**
 * Width-bound codec object and its options
 * @public
 */
export { createBitmaskCodec, normalizeCodecOptions, defineCodecOptions, DEFAULT_CODEC_OPTIONS } from "./bitmask/index";
export type { BitmaskCodec, BitmaskCodecOptions, NormalizedCodecOptions } from "./bitmask/index";

/**
 * Guards, errors and value types
 * @public
 */
export { isIdentifier, assertIdentifier, isMask32, isMask64 } from "./bitmask/index";
export { InvalidIdentifierError, InvalidMaskError, BitmaskConfigError } from "./bitmask/index";
export type { InvalidIdentifierReason, BitWidth, Identifier, Mask32, Mask64 } from "./bitmask/index";
