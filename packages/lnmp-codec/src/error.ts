// Errors produced by the binary codec.
//
// Every error carries structured details so callers can react to the
// exact failure without parsing the message.

import { ByteReadError, VarintError } from "@lnmp/binary";
import type { FieldId } from "@lnmp/core";

export type BinaryErrorDetails =
  | { kind: "UnsupportedVersion"; found: number; supported: readonly number[] }
  | { kind: "InvalidFID"; fid: number; reason: string }
  | { kind: "InvalidTypeTag"; tag: number }
  | { kind: "InvalidValue"; fieldId: FieldId; typeTag: number; reason: string }
  | { kind: "TrailingData"; bytesRemaining: number }
  | { kind: "CanonicalViolation"; reason: string }
  | { kind: "UnexpectedEof"; expected: number; found: number }
  | { kind: "InvalidVarInt"; reason: string }
  | { kind: "InvalidUtf8"; fieldId: FieldId }
  | { kind: "NestingDepthExceeded"; depth: number; max: number }
  | { kind: "NestedStructureNotSupported"; fieldId?: FieldId }
  | { kind: "RecordSizeExceeded"; size: number; max: number }
  | { kind: "InvalidNestedStructure"; reason: string }
  | { kind: "TextFormatError"; reason: string }
  | { kind: "DeltaError"; reason: string };

export type BinaryErrorKind = BinaryErrorDetails["kind"];

function hex(byte: number): string {
  return `0x${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}

function describe(d: BinaryErrorDetails): string {
  switch (d.kind) {
    case "UnsupportedVersion":
      return `Unsupported version ${hex(d.found)}, supported versions: ${d.supported.map(hex).join(", ")}`;
    case "InvalidFID":
      return `Invalid FID ${d.fid}: ${d.reason}`;
    case "InvalidTypeTag":
      return `Invalid type tag: ${hex(d.tag)}`;
    case "InvalidValue":
      return `Invalid value for F${d.fieldId} (type ${hex(d.typeTag)}): ${d.reason}`;
    case "TrailingData":
      return `Trailing data: ${d.bytesRemaining} bytes remaining`;
    case "CanonicalViolation":
      return `Canonical violation: ${d.reason}`;
    case "UnexpectedEof":
      return `Unexpected end of input: expected ${d.expected} bytes, found ${d.found}`;
    case "InvalidVarInt":
      return `Invalid VarInt: ${d.reason}`;
    case "InvalidUtf8":
      return `Invalid UTF-8 in F${d.fieldId}`;
    case "NestingDepthExceeded":
      return `Nesting depth exceeded: depth ${d.depth} exceeds maximum ${d.max}`;
    case "NestedStructureNotSupported":
      return d.fieldId === undefined
        ? "Nested structures are not supported"
        : `Nested structure in F${d.fieldId} is not supported`;
    case "RecordSizeExceeded":
      return `Record size exceeded: ${d.size} bytes exceeds maximum ${d.max}`;
    case "InvalidNestedStructure":
      return `Invalid nested structure: ${d.reason}`;
    case "TextFormatError":
      return `Text format error: ${d.reason}`;
    case "DeltaError":
      return `Delta error: ${d.reason}`;
  }
}

export class BinaryError extends Error {
  readonly kind: BinaryErrorKind;

  constructor(public readonly details: BinaryErrorDetails) {
    super(describe(details));
    this.name = "BinaryError";
    this.kind = details.kind;
  }

  static unsupportedVersion(found: number, supported: readonly number[]): BinaryError {
    return new BinaryError({ kind: "UnsupportedVersion", found, supported });
  }

  static invalidFid(fid: number, reason: string): BinaryError {
    return new BinaryError({ kind: "InvalidFID", fid, reason });
  }

  static invalidTypeTag(tag: number): BinaryError {
    return new BinaryError({ kind: "InvalidTypeTag", tag });
  }

  static invalidValue(fieldId: FieldId, typeTag: number, reason: string): BinaryError {
    return new BinaryError({ kind: "InvalidValue", fieldId, typeTag, reason });
  }

  static trailingData(bytesRemaining: number): BinaryError {
    return new BinaryError({ kind: "TrailingData", bytesRemaining });
  }

  static canonicalViolation(reason: string): BinaryError {
    return new BinaryError({ kind: "CanonicalViolation", reason });
  }

  static unexpectedEof(expected: number, found: number): BinaryError {
    return new BinaryError({ kind: "UnexpectedEof", expected, found });
  }

  static invalidVarInt(reason: string): BinaryError {
    return new BinaryError({ kind: "InvalidVarInt", reason });
  }

  static invalidUtf8(fieldId: FieldId): BinaryError {
    return new BinaryError({ kind: "InvalidUtf8", fieldId });
  }

  static nestingDepthExceeded(depth: number, max: number): BinaryError {
    return new BinaryError({ kind: "NestingDepthExceeded", depth, max });
  }

  static nestedStructureNotSupported(fieldId?: FieldId): BinaryError {
    return new BinaryError({ kind: "NestedStructureNotSupported", fieldId });
  }

  static recordSizeExceeded(size: number, max: number): BinaryError {
    return new BinaryError({ kind: "RecordSizeExceeded", size, max });
  }

  static invalidNestedStructure(reason: string): BinaryError {
    return new BinaryError({ kind: "InvalidNestedStructure", reason });
  }

  static textFormat(reason: string): BinaryError {
    return new BinaryError({ kind: "TextFormatError", reason });
  }

  static delta(reason: string): BinaryError {
    return new BinaryError({ kind: "DeltaError", reason });
  }

  /**
   * Map a low-level read failure onto the codec taxonomy. Anything that
   * is not a read failure is returned unchanged.
   */
  static fromReadError(err: unknown, fieldId?: FieldId): unknown {
    if (err instanceof VarintError) {
      if (err.kind === "eof") return BinaryError.unexpectedEof(err.available + 1, err.available);
      return BinaryError.invalidVarInt(`${err.message} at offset ${err.offset}`);
    }
    if (err instanceof ByteReadError) {
      if (err.kind === "eof") return BinaryError.unexpectedEof(err.needed, err.available);
      if (err.kind === "invalidUtf8" && fieldId !== undefined) return BinaryError.invalidUtf8(fieldId);
    }
    return err;
  }
}

/** Result form for callers that prefer not to catch. */
export type DecodeOutcome<T> = { ok: true; value: T } | { ok: false; error: BinaryError };
