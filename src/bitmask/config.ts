/**
 * @file Codec option normalization + validation (raw -> NormalizedCodecOptions)
 */
import { BitmaskConfigError } from "./errors";
import type { BitmaskCodecOptions, BitWidth, NormalizedCodecOptions } from "./types";

export const DEFAULT_CODEC_OPTIONS: NormalizedCodecOptions = { width: 32, strict: true };

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>(["width", "strict"] satisfies (keyof BitmaskCodecOptions)[]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBitWidth(value: unknown): value is BitWidth {
  return value === 32 || value === 64;
}

/** Authoring helper to get type inference for options kept in their own module. */
export function defineCodecOptions<T extends BitmaskCodecOptions>(options: T): T {
  return options;
}

/** Validate raw options and apply defaults. Throws BitmaskConfigError on invalid input. */
export function normalizeCodecOptions(raw: unknown): NormalizedCodecOptions {
  if (raw === undefined) {
    return { ...DEFAULT_CODEC_OPTIONS };
  }
  if (!isRecord(raw)) {
    throw new BitmaskConfigError("options must be an object");
  }
  const unknownKeys = Object.keys(raw).filter((k) => !KNOWN_KEYS.has(k));
  if (unknownKeys.length > 0) {
    throw new BitmaskConfigError(`unknown option(s): ${unknownKeys.join(", ")}`);
  }
  const { width, strict } = raw;
  if (width !== undefined && !isBitWidth(width)) {
    throw new BitmaskConfigError(`width must be 32 or 64 (got ${String(width)})`);
  }
  if (strict !== undefined && typeof strict !== "boolean") {
    throw new BitmaskConfigError("strict must be a boolean");
  }
  return {
    width: width ?? DEFAULT_CODEC_OPTIONS.width,
    strict: strict ?? DEFAULT_CODEC_OPTIONS.strict,
  };
}
