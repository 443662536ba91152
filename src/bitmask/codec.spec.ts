/**
 * @file Tests for the width-bound codec factory
 */
import { createBitmaskCodec } from "./codec";
import { BitmaskConfigError, InvalidIdentifierError, InvalidMaskError } from "./errors";

describe("bitmask/codec", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("defaults to a strict 32-bit codec", () => {
    const codec = createBitmaskCodec();
    expect(codec.width).toBe(32);
    expect(codec.encode([1, 3, 5])).toBe(42);
    expect(codec.decode(42)).toEqual([1, 3, 5]);
    expect(codec.hasBit(42, 3)).toBe(true);
    expect(codec.toggleBit(42, 3)).toBe(34);
    expect(codec.normalize(-1)).toBe(0xffffffff);
    expect(() => codec.encode([32])).toThrow(InvalidIdentifierError);
  });

  it("binds bigint operations for width 64", () => {
    const codec = createBitmaskCodec({ width: 64 });
    expect(codec.width).toBe(64);
    expect(codec.encode([1, 63])).toBe(9223372036854775810n);
    expect(codec.decode(9223372036854775810n)).toEqual([1, 63]);
    expect(codec.hasBit(8n, 3)).toBe(true);
    expect(codec.toggleBit(8n, 3)).toBe(0n);
    expect(() => codec.hasBit(8n, 64)).toThrow(InvalidIdentifierError);
  });

  it("lenient codec warns about and ignores invalid identifiers", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const codec = createBitmaskCodec({ strict: false });

    expect(codec.encode([1, 40, 3])).toBe(10);
    expect(warn).toHaveBeenCalledWith("[Bitmask] encode ignored identifier 40 (valid range [0, 31])");

    expect(codec.hasBit(42, -1)).toBe(false);
    expect(warn).toHaveBeenLastCalledWith("[Bitmask] hasBit ignored identifier -1 (valid range [0, 31])");

    expect(codec.toggleBit(-1, 32)).toBe(0xffffffff);
    expect(warn).toHaveBeenLastCalledWith("[Bitmask] toggleBit ignored identifier 32 (valid range [0, 31])");
    expect(warn).toHaveBeenCalledTimes(3);

    expect(codec.toggleBit(0, 2)).toBe(4);
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it("lenient 64-bit codec reports the 64-bit range", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const codec = createBitmaskCodec({ width: 64, strict: false });
    expect(codec.encode([64, 2])).toBe(4n);
    expect(warn).toHaveBeenCalledWith("[Bitmask] encode ignored identifier 64 (valid range [0, 63])");
  });

  it("lenient codec still rejects invalid masks", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const codec = createBitmaskCodec({ strict: false });
    expect(() => codec.toggleBit(2 ** 32, 1)).toThrow(InvalidMaskError);
    expect(() => codec.hasBit(0.5, 40)).toThrow(InvalidMaskError);
  });

  it("rejects invalid options", () => {
    expect(() => createBitmaskCodec({ width: 16 as unknown as 32 })).toThrow(BitmaskConfigError);
  });
});
