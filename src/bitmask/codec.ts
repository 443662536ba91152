/**
 * @file Width-bound bitmask codec factory
 *
 * Binds the free functions of one width into a single object so callers can
 * pick the width once (e.g. from configuration) and pass the codec around.
 * A lenient codec (`strict: false`) reports invalid identifiers through
 * console.warn and leaves the mask untouched instead of throwing.
 */
import { normalizeCodecOptions } from "./config";
import { isIdentifier } from "./guards";
import { decode, encode, hasBit, toggleBit, toUint32, WIDTH_32 } from "./mask32";
import { decode64, encode64, hasBit64, toggleBit64, toUint64, WIDTH_64 } from "./mask64";
import type { BitmaskCodec, BitmaskCodecOptions, BitWidth, Identifier, Mask32, Mask64 } from "./types";

const codec32: BitmaskCodec<Mask32> = {
  width: WIDTH_32,
  encode,
  decode,
  hasBit,
  toggleBit,
  normalize: toUint32,
};

const codec64: BitmaskCodec<Mask64> = {
  width: WIDTH_64,
  encode: encode64,
  decode: decode64,
  hasBit: hasBit64,
  toggleBit: toggleBit64,
  normalize: toUint64,
};

function lenient<M extends Mask32 | Mask64>(base: BitmaskCodec<M>): BitmaskCodec<M> {
  const accept = (op: string, id: Identifier, width: BitWidth): boolean => {
    if (isIdentifier(id, width)) {
      return true;
    }
    console.warn(`[Bitmask] ${op} ignored identifier ${id} (valid range [0, ${width - 1}])`);
    return false;
  };
  return {
    width: base.width,
    encode: (ids) => base.encode(ids.filter((id) => accept("encode", id, base.width))),
    decode: base.decode,
    hasBit: (mask, id) => {
      const m = base.normalize(mask);
      return accept("hasBit", id, base.width) ? base.hasBit(m, id) : false;
    },
    toggleBit: (mask, id) => {
      const m = base.normalize(mask);
      return accept("toggleBit", id, base.width) ? base.toggleBit(m, id) : m;
    },
    normalize: base.normalize,
  };
}

/**
 * Create a codec for the configured width (32 by default).
 * @example
 * const codec = createBitmaskCodec({ width: 64 });
 * codec.encode([1, 63]); // 9223372036854775810n
 */
export function createBitmaskCodec(options?: BitmaskCodecOptions & { width?: 32 }): BitmaskCodec<Mask32>;
export function createBitmaskCodec(options: BitmaskCodecOptions & { width: 64 }): BitmaskCodec<Mask64>;
export function createBitmaskCodec(options?: BitmaskCodecOptions): BitmaskCodec<Mask32> | BitmaskCodec<Mask64>;
export function createBitmaskCodec(options?: BitmaskCodecOptions): BitmaskCodec<Mask32> | BitmaskCodec<Mask64> {
  const { width, strict } = normalizeCodecOptions(options);
  if (width === WIDTH_64) {
    return strict ? codec64 : lenient(codec64);
  }
  return strict ? codec32 : lenient(codec32);
}
