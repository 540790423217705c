/**
 * Varint encoding/decoding using LEB128 format.
 *
 * LEB128 (Little Endian Base 128) stores 7 bits of data per byte,
 * using the high bit as a continuation flag. Signed values go through
 * zigzag first so that small negatives stay short.
 */

/** Longest legal encoding of a 64-bit value. */
export const MAX_VARINT_BYTES = 10;

const U64_MAX = (1n << 64n) - 1n;
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

export type VarintErrorKind = "eof" | "overflow" | "nonMinimal" | "negative" | "tooLarge";

export class VarintError extends Error {
  constructor(
    public kind: VarintErrorKind,
    message: string,
    /** Offset of the first byte of the offending varint. */
    public offset: number,
    /** Bytes of the varint that were present, for `eof`. */
    public available = 0,
  ) {
    super(message);
    this.name = "VarintError";
  }

  static eof(offset: number, groups: number): VarintError {
    return new VarintError("eof", `varint: eof after ${groups} group(s)`, offset, groups);
  }

  static overflow(offset: number): VarintError {
    return new VarintError("overflow", "varint: exceeds 64 bits", offset);
  }

  static nonMinimal(offset: number): VarintError {
    return new VarintError("nonMinimal", "varint: non-minimal encoding", offset);
  }

  static negative(value: bigint): VarintError {
    return new VarintError("negative", `varint: cannot encode negative value ${value}`, 0);
  }

  static tooLarge(value: bigint, offset: number): VarintError {
    return new VarintError("tooLarge", `varint: ${value} does not fit in a safe integer`, offset);
  }
}

export interface VarintOptions {
  /** Reject encodings that carry trailing zero groups. */
  strict?: boolean;
}

/**
 * Encodes an unsigned 64-bit integer. The output is always the shortest
 * encoding of the value.
 */
export function encodeVarint(value: bigint | number): Uint8Array {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw VarintError.negative(remaining);
  if (remaining > U64_MAX) throw VarintError.overflow(0);

  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

/** Number of bytes `encodeVarint(value)` produces. */
export function varintLength(value: bigint | number): number {
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  let n = 1;
  while (remaining >= 0x80n) {
    remaining >>= 7n;
    n++;
  }
  return n;
}

export function decodeVarint(
  buf: Uint8Array,
  offset: number,
  options: VarintOptions = {},
): { value: bigint; next: number } {
  let result = 0n;
  let shift = 0n;
  let i = offset;
  let groups = 0;
  while (true) {
    if (i >= buf.length) throw VarintError.eof(offset, groups);
    const byte = buf[i++];
    groups++;
    // The 10th group only has room for bit 63.
    if (groups === MAX_VARINT_BYTES && byte > 0x01) throw VarintError.overflow(offset);
    result |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (options.strict && groups > 1 && byte === 0) throw VarintError.nonMinimal(offset);
      return { value: result, next: i };
    }
    shift += 7n;
  }
}

/**
 * Decodes an unsigned varint and returns it as a number.
 * Throws if the value doesn't fit in a safe integer.
 */
export function decodeVarintNumber(
  buf: Uint8Array,
  offset: number,
  options: VarintOptions = {},
): { value: number; next: number } {
  const { value, next } = decodeVarint(buf, offset, options);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw VarintError.tooLarge(value, offset);
  return { value: Number(value), next };
}

// ============================================================================
// Zigzag
// ============================================================================

/** True if `value` fits in a signed 64-bit integer. */
export function isInt64(value: bigint): boolean {
  return value >= I64_MIN && value <= I64_MAX;
}

/**
 * Maps a signed 64-bit integer onto an unsigned one:
 * 0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3, 2 -> 4, etc.
 */
export function zigzagEncode(value: bigint): bigint {
  return BigInt.asUintN(64, (value << 1n) ^ (value >> 63n));
}

export function zigzagDecode(value: bigint): bigint {
  return (value >> 1n) ^ -(value & 1n);
}

export function encodeSignedVarint(value: bigint): Uint8Array {
  if (!isInt64(value)) throw VarintError.overflow(0);
  return encodeVarint(zigzagEncode(value));
}

export function decodeSignedVarint(
  buf: Uint8Array,
  offset: number,
  options: VarintOptions = {},
): { value: bigint; next: number } {
  const { value, next } = decodeVarint(buf, offset, options);
  return { value: zigzagDecode(value), next };
}
