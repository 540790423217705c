// Entry codec: one (FID, type tag, value) triple, recursing into nested
// records with an explicit depth.
//
// Entry layout: FID(2, BE) | TYPE_TAG(1) | VALUE
// Record body:  COUNT(varint) | ENTRY*

import {
  concat,
  encodeBool,
  encodeBytes,
  encodeF64LE,
  encodeSignedVarint,
  encodeString,
  encodeU16BE,
  encodeVarint,
  isInt64,
  type DecodeResult,
} from "@lnmp/binary";
import {
  HybridDType,
  LnmpRecord,
  dtypeWidth,
  hybridValidate,
  isValidFid,
  type FieldId,
  type HybridNumericArray,
  type LnmpField,
  type LnmpValue,
} from "@lnmp/core";
import { BinaryError } from "./error.ts";
import { FrameReader, LevelCheck } from "./reader.ts";
import { TypeTag, isNestedTag, isTypeTag, typeTagOf } from "./type-tag.ts";

/** Smallest possible entry: FID, tag and a one-byte payload. */
export const MIN_ENTRY_BYTES = 4;

export const DEFAULT_MAX_DEPTH = 32;

// ============================================================================
// Hybrid array flags
// ============================================================================

/** dtype codes carried in the low bits of the hybrid flags byte. */
export const HybridDTypeCode = {
  I32: 0x00,
  I64: 0x01,
  F32: 0x02,
  F64: 0x03,
} as const satisfies Record<HybridDType, number>;

export const HYBRID_SPARSE = 0x80;
const HYBRID_DTYPE_MASK = 0x03;

function dtypeFromCode(code: number): HybridDType | undefined {
  switch (code) {
    case HybridDTypeCode.I32:
      return HybridDType.I32;
    case HybridDTypeCode.I64:
      return HybridDType.I64;
    case HybridDTypeCode.F32:
      return HybridDType.F32;
    case HybridDTypeCode.F64:
      return HybridDType.F64;
    default:
      return undefined;
  }
}

// ============================================================================
// Encoding
// ============================================================================

export interface EntryEncodeOptions {
  /** Reject unsorted nested records instead of sorting them. */
  validateCanonical: boolean;
  /** Allow NestedRecord / NestedArray values. */
  enableNested: boolean;
  maxDepth: number;
}

const DEFAULT_ENTRY_ENCODE: EntryEncodeOptions = {
  validateCanonical: false,
  enableNested: true,
  maxDepth: DEFAULT_MAX_DEPTH,
};

/**
 * Put fields in canonical order. Duplicates are always an error;
 * unsorted input is an error only under `validateCanonical`.
 */
export function canonicalFields(fields: readonly LnmpField[], validateCanonical: boolean): LnmpField[] {
  const seen = new Set<FieldId>();
  let sorted = true;
  for (let i = 0; i < fields.length; i++) {
    const fid = fields[i].fid;
    if (!isValidFid(fid)) throw BinaryError.invalidFid(fid, "must be an integer in 0..=65535");
    if (seen.has(fid)) throw BinaryError.canonicalViolation(`duplicate field F${fid}`);
    seen.add(fid);
    if (i > 0 && fid < fields[i - 1].fid) {
      if (validateCanonical) {
        throw BinaryError.canonicalViolation(`F${fid} follows F${fields[i - 1].fid}`);
      }
      sorted = false;
    }
  }
  return sorted ? [...fields] : [...fields].sort((a, b) => a.fid - b.fid);
}

export function resolveEntryEncodeOptions(options: Partial<EntryEncodeOptions> = {}): EntryEncodeOptions {
  return {
    validateCanonical: options.validateCanonical ?? DEFAULT_ENTRY_ENCODE.validateCanonical,
    enableNested: options.enableNested ?? DEFAULT_ENTRY_ENCODE.enableNested,
    maxDepth: options.maxDepth ?? DEFAULT_ENTRY_ENCODE.maxDepth,
  };
}

/** Encode one entry on its own, at top level. */
export function encodeEntry(f: LnmpField, options: Partial<EntryEncodeOptions> = {}): Uint8Array {
  const opts = resolveEntryEncodeOptions(options);
  if (!isValidFid(f.fid)) throw BinaryError.invalidFid(f.fid, "must be an integer in 0..=65535");
  const out: Uint8Array[] = [];
  writeEntry(out, f, opts, 0);
  return concat(...out);
}

export function writeEntry(out: Uint8Array[], f: LnmpField, opts: EntryEncodeOptions, depth: number): void {
  out.push(encodeU16BE(f.fid));
  writeTaggedValue(out, f.fid, f.value, opts, depth);
}

/** TYPE_TAG | VALUE, without the FID. */
export function writeTaggedValue(
  out: Uint8Array[],
  fid: FieldId,
  value: LnmpValue,
  opts: EntryEncodeOptions,
  depth: number,
): void {
  out.push(Uint8Array.of(typeTagOf(value)));
  writeValue(out, fid, value, opts, depth);
}

/** Count followed by the entries in canonical order. */
export function writeRecordBody(
  out: Uint8Array[],
  fields: readonly LnmpField[],
  opts: EntryEncodeOptions,
  depth: number,
): void {
  const ordered = canonicalFields(fields, opts.validateCanonical);
  out.push(encodeVarint(ordered.length));
  for (const f of ordered) writeEntry(out, f, opts, depth);
}

/** Depth of the records inside a nested value found at `depth`. */
export function nestedDepth(opts: { maxDepth: number }, depth: number): number {
  const inner = depth + 1;
  if (inner > opts.maxDepth) throw BinaryError.nestingDepthExceeded(inner, opts.maxDepth);
  return inner;
}

const LONE_SURROGATE = /\p{Cs}/u;

function checkString(fid: FieldId, tag: number, s: string): void {
  if (LONE_SURROGATE.test(s)) throw BinaryError.invalidValue(fid, tag, "string contains a lone surrogate");
}

function checkInt(fid: FieldId, tag: number, v: bigint): void {
  if (!isInt64(v)) throw BinaryError.invalidValue(fid, tag, `${v} is outside the i64 range`);
}

function writeValue(
  out: Uint8Array[],
  fid: FieldId,
  value: LnmpValue,
  opts: EntryEncodeOptions,
  depth: number,
): void {
  const tag = typeTagOf(value);
  switch (value.tag) {
    case "Int":
      checkInt(fid, tag, value.value);
      out.push(encodeSignedVarint(value.value));
      return;
    case "Float":
      out.push(encodeF64LE(value.value));
      return;
    case "Bool":
      out.push(encodeBool(value.value));
      return;
    case "String":
      checkString(fid, tag, value.value);
      out.push(encodeString(value.value));
      return;
    case "StringArray":
      out.push(encodeVarint(value.value.length));
      for (const s of value.value) {
        checkString(fid, tag, s);
        out.push(encodeString(s));
      }
      return;
    case "IntArray":
      out.push(encodeVarint(value.value.length));
      for (const v of value.value) {
        checkInt(fid, tag, v);
        out.push(encodeSignedVarint(v));
      }
      return;
    case "FloatArray":
      out.push(encodeVarint(value.value.length));
      for (const v of value.value) out.push(encodeF64LE(v));
      return;
    case "BoolArray":
      out.push(encodeVarint(value.value.length), ...value.value.map(encodeBool));
      return;
    case "NestedRecord": {
      if (!opts.enableNested) throw BinaryError.nestedStructureNotSupported(fid);
      const inner = nestedDepth(opts, depth);
      writeRecordBody(out, value.value.fields, opts, inner);
      return;
    }
    case "NestedArray": {
      if (!opts.enableNested) throw BinaryError.nestedStructureNotSupported(fid);
      const inner = nestedDepth(opts, depth);
      out.push(encodeVarint(value.value.length));
      for (const record of value.value) writeRecordBody(out, record.fields, opts, inner);
      return;
    }
    case "HybridNumericArray":
      writeHybrid(out, fid, value.value);
      return;
    case "Embedding":
    case "EmbeddingDelta":
    case "QuantizedEmbedding":
      out.push(encodeBytes(value.value));
      return;
  }
}

function writeHybrid(out: Uint8Array[], fid: FieldId, arr: HybridNumericArray): void {
  const problem = hybridValidate(arr);
  if (problem !== undefined) throw BinaryError.invalidValue(fid, TypeTag.HybridNumericArray, problem);
  const flags = HybridDTypeCode[arr.dtype] | (arr.sparse ? HYBRID_SPARSE : 0);
  out.push(Uint8Array.of(flags), encodeVarint(arr.dim));
  if (arr.sparse) {
    const stride = 4 + dtypeWidth(arr.dtype);
    out.push(encodeVarint(arr.data.length / stride));
  }
  out.push(arr.data);
}

// ============================================================================
// Decoding
// ============================================================================

export interface EntryDecodeOptions {
  /** Each FID must exceed the previous one at its level. */
  validateOrdering: boolean;
  /** Nested tags are rejected when false. */
  allowNested: boolean;
  maxDepth: number;
  /** Reject non-minimal varints. */
  strictVarints: boolean;
}

const DEFAULT_ENTRY_DECODE: EntryDecodeOptions = {
  validateOrdering: false,
  allowNested: true,
  maxDepth: DEFAULT_MAX_DEPTH,
  strictVarints: false,
};

export function resolveEntryDecodeOptions(options: Partial<EntryDecodeOptions> = {}): EntryDecodeOptions {
  return {
    validateOrdering: options.validateOrdering ?? DEFAULT_ENTRY_DECODE.validateOrdering,
    allowNested: options.allowNested ?? DEFAULT_ENTRY_DECODE.allowNested,
    maxDepth: options.maxDepth ?? DEFAULT_ENTRY_DECODE.maxDepth,
    strictVarints: options.strictVarints ?? DEFAULT_ENTRY_DECODE.strictVarints,
  };
}

/** Decode a single top-level entry starting at `offset`. */
export function decodeEntry(
  buf: Uint8Array,
  offset = 0,
  options: Partial<EntryDecodeOptions> = {},
): DecodeResult<LnmpField> {
  const opts = resolveEntryDecodeOptions(options);
  const reader = new FrameReader(buf, offset, opts.strictVarints);
  const value = readEntry(reader, opts, 0);
  return { value, next: reader.position };
}

function readTag(reader: FrameReader, fid: FieldId, opts: Pick<EntryDecodeOptions, "allowNested">): TypeTag {
  const tag = reader.u8();
  if (!isTypeTag(tag)) throw BinaryError.invalidTypeTag(tag);
  if (isNestedTag(tag) && !opts.allowNested) throw BinaryError.nestedStructureNotSupported(fid);
  return tag;
}

/** FID and tag of the next entry, with the tag and nesting checks applied. */
export function readEntryHead(
  reader: FrameReader,
  opts: Pick<EntryDecodeOptions, "allowNested">,
): { fid: FieldId; tag: TypeTag } {
  const fid = reader.fid();
  return { fid, tag: readTag(reader, fid, opts) };
}

/** TYPE_TAG | VALUE for a field whose FID was read elsewhere. */
export function readTaggedValue(
  reader: FrameReader,
  fid: FieldId,
  opts: EntryDecodeOptions,
  depth: number,
): LnmpValue {
  return readValue(reader, fid, readTag(reader, fid, opts), opts, depth);
}

export function readEntry(reader: FrameReader, opts: EntryDecodeOptions, depth: number): LnmpField {
  const { fid, tag } = readEntryHead(reader, opts);
  return { fid, value: readValue(reader, fid, tag, opts, depth) };
}

export function readRecordBody(reader: FrameReader, opts: EntryDecodeOptions, depth: number): LnmpRecord {
  const count = reader.count(MIN_ENTRY_BYTES);
  const check = new LevelCheck(opts.validateOrdering);
  const fields: LnmpField[] = [];
  for (let i = 0; i < count; i++) {
    const f = readEntry(reader, opts, depth);
    check.accept(f.fid);
    fields.push(f);
  }
  return new LnmpRecord(fields);
}

function readValue(
  reader: FrameReader,
  fid: FieldId,
  tag: TypeTag,
  opts: EntryDecodeOptions,
  depth: number,
): LnmpValue {
  switch (tag) {
    case TypeTag.Int:
      return { tag: "Int", value: reader.signedVarint() };
    case TypeTag.Float:
      return { tag: "Float", value: reader.f64() };
    case TypeTag.Bool:
      return { tag: "Bool", value: reader.bool(fid, tag) };
    case TypeTag.String:
      return { tag: "String", value: reader.string(fid) };
    case TypeTag.StringArray: {
      const n = reader.count(1);
      const value: string[] = [];
      for (let i = 0; i < n; i++) value.push(reader.string(fid));
      return { tag: "StringArray", value };
    }
    case TypeTag.IntArray: {
      const n = reader.count(1);
      const value: bigint[] = [];
      for (let i = 0; i < n; i++) value.push(reader.signedVarint());
      return { tag: "IntArray", value };
    }
    case TypeTag.FloatArray: {
      const n = reader.count(8);
      const value: number[] = [];
      for (let i = 0; i < n; i++) value.push(reader.f64());
      return { tag: "FloatArray", value };
    }
    case TypeTag.BoolArray: {
      const n = reader.count(1);
      const value: boolean[] = [];
      for (let i = 0; i < n; i++) value.push(reader.bool(fid, tag));
      return { tag: "BoolArray", value };
    }
    case TypeTag.NestedRecord: {
      const inner = nestedDepth(opts, depth);
      return { tag: "NestedRecord", value: readRecordBody(reader, opts, inner) };
    }
    case TypeTag.NestedArray: {
      const inner = nestedDepth(opts, depth);
      // An empty record is one count byte.
      const n = reader.count(1);
      const value: LnmpRecord[] = [];
      for (let i = 0; i < n; i++) value.push(readRecordBody(reader, opts, inner));
      return { tag: "NestedArray", value };
    }
    case TypeTag.HybridNumericArray: {
      const arr = readHybrid(reader, fid);
      return { tag: "HybridNumericArray", value: { ...arr, data: arr.data.slice() } };
    }
    case TypeTag.Embedding:
      return { tag: "Embedding", value: reader.blob().slice() };
    case TypeTag.EmbeddingDelta:
      return { tag: "EmbeddingDelta", value: reader.blob().slice() };
    case TypeTag.QuantizedEmbedding:
      return { tag: "QuantizedEmbedding", value: reader.blob().slice() };
  }
}

/** Hybrid array whose `data` still points into the reader's buffer. */
export function readHybrid(reader: FrameReader, fid: FieldId): HybridNumericArray {
  const tag = TypeTag.HybridNumericArray;
  const flags = reader.u8();
  if ((flags & ~(HYBRID_SPARSE | HYBRID_DTYPE_MASK)) !== 0) {
    throw BinaryError.invalidValue(fid, tag, `reserved hybrid flag bits set: 0x${flags.toString(16)}`);
  }
  const dtype = dtypeFromCode(flags & HYBRID_DTYPE_MASK);
  if (dtype === undefined) throw BinaryError.invalidValue(fid, tag, "unknown dtype");
  const sparse = (flags & HYBRID_SPARSE) !== 0;
  const dim = reader.length();
  if (dim > 0xffffffff) throw BinaryError.invalidValue(fid, tag, `dim ${dim} exceeds u32`);
  const width = dtypeWidth(dtype);

  let data: Uint8Array;
  if (sparse) {
    const stride = 4 + width;
    const nnz = reader.count(stride);
    if (nnz > dim) throw BinaryError.invalidValue(fid, tag, `${nnz} sparse entries for dim ${dim}`);
    data = reader.borrow(nnz * stride);
  } else {
    if (dim * width > reader.remaining) throw BinaryError.unexpectedEof(dim * width, reader.remaining);
    data = reader.borrow(dim * width);
  }
  const arr: HybridNumericArray = { dtype, sparse, dim, data };
  const problem = hybridValidate(arr);
  if (problem !== undefined) throw BinaryError.invalidValue(fid, tag, problem);
  return arr;
}
