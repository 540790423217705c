// Zero-copy decoding.
//
// A RecordView walks the same structure as `decode` but leaves strings,
// float and bool arrays, hybrid arrays and blobs in the input buffer.
// Every such slice aliases `source`: do not mutate that buffer while a
// view derived from it is in use. Holding the view keeps `source`
// reachable.

import { decodeUtf8 } from "@lnmp/binary";
import { LnmpRecord, type FieldId, type HybridNumericArray, type LnmpField, type LnmpValue } from "@lnmp/core";
import { BinaryError } from "./error.ts";
import { MIN_ENTRY_BYTES, nestedDepth, readEntryHead, readHybrid, type EntryDecodeOptions } from "./entry.ts";
import { FrameVersion, readFrameHeader } from "./frame.ts";
import { FrameReader, LevelCheck } from "./reader.ts";
import { TypeTag } from "./type-tag.ts";

export type ValueView =
  | { tag: "Int"; value: bigint }
  | { tag: "Float"; value: number }
  | { tag: "Bool"; value: boolean }
  /** Validated UTF-8. */
  | { tag: "String"; bytes: Uint8Array }
  | { tag: "StringArray"; items: Uint8Array[] }
  | { tag: "IntArray"; value: bigint[] }
  /** 8 little-endian bytes per element. */
  | { tag: "FloatArray"; bytes: Uint8Array }
  /** One 0x00/0x01 byte per element. */
  | { tag: "BoolArray"; bytes: Uint8Array }
  | { tag: "NestedRecord"; record: RecordView }
  | { tag: "NestedArray"; records: RecordView[] }
  | { tag: "HybridNumericArray"; value: HybridNumericArray }
  | { tag: "Embedding"; bytes: Uint8Array }
  | { tag: "EmbeddingDelta"; bytes: Uint8Array }
  | { tag: "QuantizedEmbedding"; bytes: Uint8Array };

export interface FieldView {
  fid: FieldId;
  tag: TypeTag;
  /** Offset of the entry's FID in `source`. */
  offset: number;
  value: ValueView;
}

export class RecordView implements Iterable<FieldView> {
  private readonly index: readonly FieldView[];

  constructor(
    readonly source: Uint8Array,
    readonly version: FrameVersion,
    readonly flags: number,
    private readonly entries: readonly FieldView[],
  ) {
    let ascending = true;
    for (let i = 1; i < entries.length; i++) {
      if (entries[i].fid < entries[i - 1].fid) {
        ascending = false;
        break;
      }
    }
    this.index = ascending ? entries : [...entries].sort((a, b) => a.fid - b.fid);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Fields in wire order. */
  get fields(): readonly FieldView[] {
    return this.entries;
  }

  /** Binary search over the FID index. */
  getField(fid: FieldId): FieldView | undefined {
    let lo = 0;
    let hi = this.index.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const candidate = this.index[mid];
      if (candidate.fid === fid) return candidate;
      if (candidate.fid < fid) lo = mid + 1;
      else hi = mid - 1;
    }
    return undefined;
  }

  get(fid: FieldId): ValueView | undefined {
    return this.getField(fid)?.value;
  }

  /** Decodes a String field on demand. */
  getString(fid: FieldId): string | undefined {
    const v = this.get(fid);
    return v?.tag === "String" ? decodeUtf8(v.bytes) : undefined;
  }

  getInt(fid: FieldId): bigint | undefined {
    const v = this.get(fid);
    return v?.tag === "Int" ? v.value : undefined;
  }

  /** Owned copy, field for field equal to what `decode` returns. */
  toOwned(): LnmpRecord {
    const fields: LnmpField[] = this.entries.map((f) => ({ fid: f.fid, value: viewToValue(f.value) }));
    return new LnmpRecord(fields);
  }

  [Symbol.iterator](): Iterator<FieldView> {
    return this.entries[Symbol.iterator]();
  }
}

function readFloats(bytes: Uint8Array): number[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out: number[] = [];
  for (let off = 0; off + 8 <= bytes.length; off += 8) out.push(view.getFloat64(off, true));
  return out;
}

/** Copy a borrowed value out of its buffer. */
export function viewToValue(v: ValueView): LnmpValue {
  switch (v.tag) {
    case "Int":
    case "Float":
    case "Bool":
      return v;
    case "IntArray":
      return { tag: "IntArray", value: [...v.value] };
    case "String":
      return { tag: "String", value: decodeUtf8(v.bytes) };
    case "StringArray":
      return { tag: "StringArray", value: v.items.map((b) => decodeUtf8(b)) };
    case "FloatArray":
      return { tag: "FloatArray", value: readFloats(v.bytes) };
    case "BoolArray":
      return { tag: "BoolArray", value: Array.from(v.bytes, (b) => b === 1) };
    case "NestedRecord":
      return { tag: "NestedRecord", value: v.record.toOwned() };
    case "NestedArray":
      return { tag: "NestedArray", value: v.records.map((r) => r.toOwned()) };
    case "HybridNumericArray":
      return { tag: "HybridNumericArray", value: { ...v.value, data: v.value.data.slice() } };
    case "Embedding":
      return { tag: "Embedding", value: v.bytes.slice() };
    case "EmbeddingDelta":
      return { tag: "EmbeddingDelta", value: v.bytes.slice() };
    case "QuantizedEmbedding":
      return { tag: "QuantizedEmbedding", value: v.bytes.slice() };
  }
}

// ============================================================================
// Walk
// ============================================================================

interface ViewContext {
  version: FrameVersion;
  flags: number;
  opts: EntryDecodeOptions;
}

function readViewBody(reader: FrameReader, ctx: ViewContext, depth: number): RecordView {
  const count = reader.count(MIN_ENTRY_BYTES);
  const check = new LevelCheck(ctx.opts.validateOrdering);
  const entries: FieldView[] = [];
  for (let i = 0; i < count; i++) {
    const offset = reader.position;
    const { fid, tag } = readEntryHead(reader, ctx.opts);
    const value = readViewValue(reader, fid, tag, ctx, depth);
    check.accept(fid);
    entries.push({ fid, tag, offset, value });
  }
  return new RecordView(reader.buffer, ctx.version, ctx.flags, entries);
}

function readViewValue(
  reader: FrameReader,
  fid: FieldId,
  tag: TypeTag,
  ctx: ViewContext,
  depth: number,
): ValueView {
  switch (tag) {
    case TypeTag.Int:
      return { tag: "Int", value: reader.signedVarint() };
    case TypeTag.Float:
      return { tag: "Float", value: reader.f64() };
    case TypeTag.Bool:
      return { tag: "Bool", value: reader.bool(fid, tag) };
    case TypeTag.String:
      return { tag: "String", bytes: reader.stringBytes(fid) };
    case TypeTag.StringArray: {
      const n = reader.count(1);
      const items: Uint8Array[] = [];
      for (let i = 0; i < n; i++) items.push(reader.stringBytes(fid));
      return { tag: "StringArray", items };
    }
    case TypeTag.IntArray: {
      const n = reader.count(1);
      const value: bigint[] = [];
      for (let i = 0; i < n; i++) value.push(reader.signedVarint());
      return { tag: "IntArray", value };
    }
    case TypeTag.FloatArray: {
      const n = reader.count(8);
      return { tag: "FloatArray", bytes: reader.borrow(n * 8) };
    }
    case TypeTag.BoolArray: {
      const n = reader.count(1);
      const bytes = reader.borrow(n);
      const bad = bytes.findIndex((b) => b > 1);
      if (bad >= 0) {
        throw BinaryError.invalidValue(fid, tag, `bool: invalid value 0x${bytes[bad].toString(16).padStart(2, "0")}`);
      }
      return { tag: "BoolArray", bytes };
    }
    case TypeTag.NestedRecord:
      return { tag: "NestedRecord", record: readViewBody(reader, ctx, nestedDepth(ctx.opts, depth)) };
    case TypeTag.NestedArray: {
      const inner = nestedDepth(ctx.opts, depth);
      const n = reader.count(1);
      const records: RecordView[] = [];
      for (let i = 0; i < n; i++) records.push(readViewBody(reader, ctx, inner));
      return { tag: "NestedArray", records };
    }
    case TypeTag.HybridNumericArray:
      return { tag: "HybridNumericArray", value: readHybrid(reader, fid) };
    case TypeTag.Embedding:
      return { tag: "Embedding", bytes: reader.blob() };
    case TypeTag.EmbeddingDelta:
      return { tag: "EmbeddingDelta", bytes: reader.blob() };
    case TypeTag.QuantizedEmbedding:
      return { tag: "QuantizedEmbedding", bytes: reader.blob() };
  }
}

/**
 * Walk a frame once, building the FID index and borrowing payload
 * slices from `bytes`.
 */
export function decodeViewWith(bytes: Uint8Array, opts: EntryDecodeOptions, strictParsing: boolean): RecordView {
  const reader = new FrameReader(bytes, 0, opts.strictVarints);
  const { version, flags } = readFrameHeader(reader);
  const ctx: ViewContext = {
    version,
    flags,
    opts: { ...opts, allowNested: opts.allowNested && version === FrameVersion.V0_5 },
  };
  const view = readViewBody(reader, ctx, 0);
  if (strictParsing && reader.remaining > 0) throw BinaryError.trailingData(reader.remaining);
  return view;
}
