import { decodeSignedVarint, decodeVarint, decodeVarintNumber, encodeVarint } from "./varint.ts";
import type { VarintOptions } from "./varint.ts";

export class ByteReadError extends Error {
  constructor(
    public kind: "eof" | "invalidUtf8" | "invalidBool",
    message: string,
    public offset: number,
    /** Bytes the read needed, for `eof`. */
    public needed = 0,
    /** Bytes that were left, for `eof`. */
    public available = 0,
  ) {
    super(message);
    this.name = "ByteReadError";
  }

  static eof(what: string, offset: number, needed: number, available: number): ByteReadError {
    return new ByteReadError(
      "eof",
      `${what}: need ${needed} byte(s) at offset ${offset}, have ${available}`,
      offset,
      needed,
      available,
    );
  }

  static invalidUtf8(offset: number): ByteReadError {
    return new ByteReadError("invalidUtf8", `invalid UTF-8 at offset ${offset}`, offset);
  }

  static invalidBool(offset: number, byte: number): ByteReadError {
    return new ByteReadError(
      "invalidBool",
      `bool: invalid value 0x${byte.toString(16).padStart(2, "0")}`,
      offset,
    );
  }
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// ============================================================================
// UTF-8
// ============================================================================

const encoder = new TextEncoder();
// ignoreBOM keeps a leading U+FEFF in the decoded string.
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function encodeUtf8(str: string): Uint8Array {
  return encoder.encode(str);
}

/** Strict decode: malformed input throws instead of producing U+FFFD. */
export function decodeUtf8(bytes: Uint8Array, offset = 0): string {
  try {
    return decoder.decode(bytes);
  } catch {
    throw ByteReadError.invalidUtf8(offset);
  }
}

/**
 * Checks well-formedness without allocating a string. Accepts exactly
 * what `decodeUtf8` accepts: no overlongs, no surrogates, nothing past U+10FFFF.
 */
export function isValidUtf8(bytes: Uint8Array): boolean {
  let i = 0;
  while (i < bytes.length) {
    const b0 = bytes[i];
    if (b0 < 0x80) {
      i++;
      continue;
    }
    let need: number;
    let lo = 0x80;
    let hi = 0xbf;
    if (b0 >= 0xc2 && b0 <= 0xdf) {
      need = 1;
    } else if (b0 >= 0xe0 && b0 <= 0xef) {
      need = 2;
      if (b0 === 0xe0) lo = 0xa0;
      if (b0 === 0xed) hi = 0x9f;
    } else if (b0 >= 0xf0 && b0 <= 0xf4) {
      need = 3;
      if (b0 === 0xf0) lo = 0x90;
      if (b0 === 0xf4) hi = 0x8f;
    } else {
      return false;
    }
    if (i + need >= bytes.length) return false;
    const b1 = bytes[i + 1];
    if (b1 < lo || b1 > hi) return false;
    for (let k = 2; k <= need; k++) {
      const b = bytes[i + k];
      if (b < 0x80 || b > 0xbf) return false;
    }
    i += need + 1;
  }
  return true;
}

// ============================================================================
// Encoding helpers
// ============================================================================

/** Varint length prefix followed by the UTF-8 bytes. */
export function encodeString(str: string): Uint8Array {
  return encodeBytes(encodeUtf8(str));
}

/** Varint length prefix followed by the raw bytes. */
export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concat(encodeVarint(bytes.length), bytes);
}

// ============================================================================
// ByteReader
// ============================================================================

/**
 * Sequential reader over a Uint8Array. Slices it hands out with
 * `borrow` alias the underlying buffer; `take` copies.
 */
export class ByteReader {
  private readonly data: Uint8Array;
  private offset: number;

  constructor(data: Uint8Array, offset = 0) {
    this.data = data;
    this.offset = offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  get buffer(): Uint8Array {
    return this.data;
  }

  hasRemaining(count = 1): boolean {
    return this.remaining >= count;
  }

  private ensure(what: string, count: number): void {
    if (count > this.remaining) {
      throw ByteReadError.eof(what, this.offset, count, this.remaining);
    }
  }

  readByte(): number {
    this.ensure("u8", 1);
    return this.data[this.offset++];
  }

  readBool(): boolean {
    this.ensure("bool", 1);
    const byte = this.data[this.offset];
    if (byte > 1) throw ByteReadError.invalidBool(this.offset, byte);
    this.offset++;
    return byte === 1;
  }

  readU16BE(): number {
    this.ensure("u16", 2);
    const v = (this.data[this.offset] << 8) | this.data[this.offset + 1];
    this.offset += 2;
    return v;
  }

  readU32BE(): number {
    this.ensure("u32", 4);
    const v = this.view().getUint32(this.offset, false);
    this.offset += 4;
    return v;
  }

  readU64BE(): bigint {
    this.ensure("u64", 8);
    const v = this.view().getBigUint64(this.offset, false);
    this.offset += 8;
    return v;
  }

  readF64LE(): number {
    this.ensure("f64", 8);
    const v = this.view().getFloat64(this.offset, true);
    this.offset += 8;
    return v;
  }

  readVarint(options?: VarintOptions): bigint {
    const { value, next } = decodeVarint(this.data, this.offset, options);
    this.offset = next;
    return value;
  }

  readVarintNumber(options?: VarintOptions): number {
    const { value, next } = decodeVarintNumber(this.data, this.offset, options);
    this.offset = next;
    return value;
  }

  readSignedVarint(options?: VarintOptions): bigint {
    const { value, next } = decodeSignedVarint(this.data, this.offset, options);
    this.offset = next;
    return value;
  }

  /** Next `count` bytes as a view into the source buffer. */
  borrow(count: number): Uint8Array {
    this.ensure("bytes", count);
    const out = this.data.subarray(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  /** Next `count` bytes as an owned copy. */
  take(count: number): Uint8Array {
    return this.borrow(count).slice();
  }

  readString(count: number): string {
    const start = this.offset;
    return decodeUtf8(this.borrow(count), start);
  }

  private view(): DataView {
    return new DataView(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }
}
