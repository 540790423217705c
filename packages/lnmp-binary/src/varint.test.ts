import { describe, expect, it } from "vitest";
import {
  VarintError,
  decodeSignedVarint,
  decodeVarint,
  decodeVarintNumber,
  encodeSignedVarint,
  encodeVarint,
  varintLength,
  zigzagDecode,
  zigzagEncode,
} from "./varint.ts";

const U64_MAX = (1n << 64n) - 1n;
const I64_MAX = (1n << 63n) - 1n;
const I64_MIN = -(1n << 63n);

function varintError(fn: () => unknown): VarintError {
  try {
    fn();
  } catch (e) {
    if (e instanceof VarintError) return e;
    throw e;
  }
  throw new Error("expected VarintError");
}

describe("encodeVarint", () => {
  it("uses one byte below 128", () => {
    expect(encodeVarint(0)).toEqual(Uint8Array.of(0x00));
    expect(encodeVarint(127)).toEqual(Uint8Array.of(0x7f));
  });

  it("spills into continuation groups", () => {
    expect(encodeVarint(128)).toEqual(Uint8Array.of(0x80, 0x01));
    expect(encodeVarint(300n)).toEqual(Uint8Array.of(0xac, 0x02));
  });

  it("encodes u64::MAX in ten bytes", () => {
    const bytes = encodeVarint(U64_MAX);
    expect(bytes.length).toBe(10);
    expect(Array.from(bytes.subarray(0, 9))).toEqual(new Array(9).fill(0xff));
    expect(bytes[9]).toBe(0x01);
  });

  it("rejects negative and oversized values", () => {
    expect(varintError(() => encodeVarint(-1)).kind).toBe("negative");
    expect(varintError(() => encodeVarint(U64_MAX + 1n)).kind).toBe("overflow");
  });

  it("agrees with varintLength", () => {
    for (const v of [0n, 127n, 128n, 16383n, 16384n, U64_MAX]) {
      expect(varintLength(v)).toBe(encodeVarint(v).length);
    }
  });
});

describe("decodeVarint", () => {
  it("returns the value and the next offset", () => {
    expect(decodeVarint(Uint8Array.of(0xac, 0x02), 0)).toEqual({ value: 300n, next: 2 });
    expect(decodeVarint(Uint8Array.of(0xff, 0x05, 0x99), 1)).toEqual({ value: 5n, next: 2 });
  });

  it("round-trips the 64-bit maximum", () => {
    expect(decodeVarint(encodeVarint(U64_MAX), 0).value).toBe(U64_MAX);
  });

  it("fails on a dangling continuation bit", () => {
    const err = varintError(() => decodeVarint(Uint8Array.of(0x80), 0));
    expect(err.kind).toBe("eof");
    expect(err.offset).toBe(0);
    expect(err.available).toBe(1);
  });

  it("fails when the tenth group carries more than bit 63", () => {
    const tooWide = Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x02);
    expect(varintError(() => decodeVarint(tooWide, 0)).kind).toBe("overflow");

    const tooLong = new Uint8Array(11).fill(0x80);
    expect(varintError(() => decodeVarint(tooLong, 0)).kind).toBe("overflow");
  });

  it("accepts padded encodings unless strict", () => {
    const padded = Uint8Array.of(0x80, 0x00);
    expect(decodeVarint(padded, 0)).toEqual({ value: 0n, next: 2 });
    expect(varintError(() => decodeVarint(padded, 0, { strict: true })).kind).toBe("nonMinimal");
    expect(decodeVarint(Uint8Array.of(0x00), 0, { strict: true }).value).toBe(0n);
  });

  it("refuses numbers beyond the safe integer range", () => {
    const bytes = encodeVarint(2n ** 53n);
    expect(varintError(() => decodeVarintNumber(bytes, 0)).kind).toBe("tooLarge");
    expect(decodeVarintNumber(encodeVarint(2n ** 53n - 1n), 0).value).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe("zigzag", () => {
  it("interleaves signs", () => {
    expect([0n, -1n, 1n, -2n, 2n].map(zigzagEncode)).toEqual([0n, 1n, 2n, 3n, 4n]);
    expect([0n, 1n, 2n, 3n, 4n].map(zigzagDecode)).toEqual([0n, -1n, 1n, -2n, 2n]);
  });

  it("maps the i64 extremes to the top of u64", () => {
    expect(zigzagEncode(I64_MAX)).toBe(U64_MAX - 1n);
    expect(zigzagEncode(I64_MIN)).toBe(U64_MAX);
    expect(zigzagDecode(U64_MAX)).toBe(I64_MIN);
  });

  it("keeps small negatives short", () => {
    expect(encodeSignedVarint(-1n)).toEqual(Uint8Array.of(0x01));
    expect(encodeSignedVarint(-65n)).toEqual(Uint8Array.of(0x81, 0x01));
    expect(decodeSignedVarint(Uint8Array.of(0x81, 0x01), 0)).toEqual({ value: -65n, next: 2 });
  });

  it("rejects values outside i64", () => {
    expect(varintError(() => encodeSignedVarint(I64_MAX + 1n)).kind).toBe("overflow");
  });
});
