export { encode, decode, hasBit, toggleBit, toUint32, WIDTH_32 } from "./mask32";
export { encode64, decode64, hasBit64, toggleBit64, toUint64, WIDTH_64 } from "./mask64";
export { createBitmaskCodec } from "./codec";
export { normalizeCodecOptions, defineCodecOptions, DEFAULT_CODEC_OPTIONS } from "./config";
export { isIdentifier, assertIdentifier, isMask32, isMask64 } from "./guards";
export { InvalidIdentifierError, InvalidMaskError, BitmaskConfigError } from "./errors";
export type { InvalidIdentifierReason } from "./errors";
export type {
  BitWidth,
  Identifier,
  Mask32,
  Mask64,
  BitmaskCodec,
  BitmaskCodecOptions,
  NormalizedCodecOptions,
} from "./types";
