// Frame reader: ByteReader with codec errors.

import { ByteReadError, ByteReader, isValidUtf8 } from "@lnmp/binary";
import type { FieldId } from "@lnmp/core";
import { BinaryError } from "./error.ts";

export class FrameReader {
  private readonly inner: ByteReader;

  constructor(
    buf: Uint8Array,
    offset = 0,
    /** Reject non-minimal varints. */
    private readonly strictVarints = false,
  ) {
    this.inner = new ByteReader(buf, offset);
  }

  get position(): number {
    return this.inner.position;
  }

  get remaining(): number {
    return this.inner.remaining;
  }

  get buffer(): Uint8Array {
    return this.inner.buffer;
  }

  private guard<T>(read: () => T, fid?: FieldId): T {
    try {
      return read();
    } catch (e) {
      throw BinaryError.fromReadError(e, fid);
    }
  }

  u8(): number {
    return this.guard(() => this.inner.readByte());
  }

  fid(): FieldId {
    return this.guard(() => this.inner.readU16BE());
  }

  varint(): bigint {
    return this.guard(() => this.inner.readVarint({ strict: this.strictVarints }));
  }

  signedVarint(): bigint {
    return this.guard(() => this.inner.readSignedVarint({ strict: this.strictVarints }));
  }

  /** Varint used as a length or count. */
  length(): number {
    return this.guard(() => this.inner.readVarintNumber({ strict: this.strictVarints }));
  }

  /**
   * Element count for an array whose elements take at least
   * `minElementBytes` each. Counts the rest of the input cannot hold
   * fail before anything is allocated.
   */
  count(minElementBytes: number): number {
    const n = this.length();
    if (n * minElementBytes > this.remaining) {
      throw BinaryError.unexpectedEof(n * minElementBytes, this.remaining);
    }
    return n;
  }

  f64(): number {
    return this.guard(() => this.inner.readF64LE());
  }

  bool(fid: FieldId, typeTag: number): boolean {
    try {
      return this.inner.readBool();
    } catch (e) {
      if (e instanceof ByteReadError && e.kind === "invalidBool") {
        throw BinaryError.invalidValue(fid, typeTag, e.message);
      }
      throw BinaryError.fromReadError(e, fid);
    }
  }

  borrow(n: number): Uint8Array {
    return this.guard(() => this.inner.borrow(n));
  }

  /** Length-prefixed UTF-8, decoded to an owned string. */
  string(fid: FieldId): string {
    const n = this.length();
    return this.guard(() => this.inner.readString(n), fid);
  }

  /** Length-prefixed UTF-8, validated but left in place. */
  stringBytes(fid: FieldId): Uint8Array {
    const bytes = this.borrow(this.length());
    if (!isValidUtf8(bytes)) throw BinaryError.invalidUtf8(fid);
    return bytes;
  }

  /** Length-prefixed opaque bytes, left in place. */
  blob(): Uint8Array {
    return this.borrow(this.length());
  }
}

/**
 * Per-level FID bookkeeping: duplicates are always rejected, ordering
 * only when asked for.
 */
export class LevelCheck {
  private readonly seen = new Set<FieldId>();
  private prev = -1;

  constructor(private readonly validateOrdering: boolean) {}

  accept(fid: FieldId): void {
    if (this.seen.has(fid)) throw BinaryError.canonicalViolation(`duplicate field F${fid}`);
    if (this.validateOrdering && fid < this.prev) {
      throw BinaryError.canonicalViolation(`F${fid} follows F${this.prev}`);
    }
    this.seen.add(fid);
    this.prev = fid;
  }
}
