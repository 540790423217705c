// Delta packets: partial updates to a record the peer already holds.
//
// Packet: 0xB0 | OP_COUNT(varint) | OP*
// Op:     FID(2, BE) | OP_CODE(1) | PAYLOAD_LEN(varint) | PAYLOAD
//
// Set/Update payload is TYPE_TAG | VALUE, Merge payload is OP_COUNT | OP*,
// Delete payload is empty.

import { concat, encodeU16BE, encodeVarint } from "@lnmp/binary";
import {
  LnmpRecord,
  isValidFid,
  valueNestedRecord,
  valuesEqual,
  type FieldId,
  type LnmpValue,
} from "@lnmp/core";
import { BinaryError } from "./error.ts";
import {
  nestedDepth,
  readTaggedValue,
  resolveEntryDecodeOptions,
  resolveEntryEncodeOptions,
  writeTaggedValue,
  type EntryDecodeOptions,
  type EntryEncodeOptions,
} from "./entry.ts";
import { FrameReader } from "./reader.ts";

export const DELTA_TAG = 0xb0;

export const DeltaOperation = {
  SetField: 0x01,
  DeleteField: 0x02,
  UpdateField: 0x03,
  MergeRecord: 0x04,
} as const;
export type DeltaOperation = (typeof DeltaOperation)[keyof typeof DeltaOperation];

export type DeltaOp =
  | { tag: "SetField"; fid: FieldId; value: LnmpValue }
  | { tag: "DeleteField"; fid: FieldId }
  | { tag: "UpdateField"; fid: FieldId; value: LnmpValue }
  | { tag: "MergeRecord"; fid: FieldId; ops: DeltaOp[] };

export function setField(fid: FieldId, value: LnmpValue): DeltaOp {
  return { tag: "SetField", fid, value };
}

export function deleteField(fid: FieldId): DeltaOp {
  return { tag: "DeleteField", fid };
}

export function updateField(fid: FieldId, value: LnmpValue): DeltaOp {
  return { tag: "UpdateField", fid, value };
}

export function mergeRecord(fid: FieldId, ops: DeltaOp[]): DeltaOp {
  return { tag: "MergeRecord", fid, ops };
}

function hex(byte: number): string {
  return `0x${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}

// ============================================================================
// Compute / apply
// ============================================================================

/**
 * Operations that turn `base` into `updated`, in ascending FID order.
 * Changed nested records become a MergeRecord of their own delta.
 */
export function computeDelta(base: LnmpRecord, updated: LnmpRecord): DeltaOp[] {
  const fids = new Set<FieldId>();
  for (const f of base.fields) fids.add(f.fid);
  for (const f of updated.fields) fids.add(f.fid);

  const ops: DeltaOp[] = [];
  for (const fid of [...fids].sort((a, b) => a - b)) {
    const before = base.get(fid);
    const after = updated.get(fid);
    if (after === undefined) {
      ops.push(deleteField(fid));
    } else if (before === undefined) {
      ops.push(setField(fid, after));
    } else if (!valuesEqual(before, after)) {
      if (before.tag === "NestedRecord" && after.tag === "NestedRecord") {
        ops.push(mergeRecord(fid, computeDelta(before.value, after.value)));
      } else {
        ops.push(updateField(fid, after));
      }
    }
  }
  return ops;
}

/** Apply `ops` to a copy of `base`. */
export function applyDelta(base: LnmpRecord, ops: readonly DeltaOp[]): LnmpRecord {
  const out = new LnmpRecord(base.fields);
  for (const op of ops) {
    if (!isValidFid(op.fid)) throw BinaryError.delta(`invalid target F${op.fid}`);
    switch (op.tag) {
      case "SetField":
        out.setField(op.fid, op.value);
        break;
      case "DeleteField":
        out.removeField(op.fid);
        break;
      case "UpdateField":
        if (!out.hasField(op.fid)) throw BinaryError.delta(`cannot update missing F${op.fid}`);
        out.setField(op.fid, op.value);
        break;
      case "MergeRecord": {
        const existing = out.get(op.fid);
        if (existing === undefined) throw BinaryError.delta(`cannot merge into missing F${op.fid}`);
        if (existing.tag !== "NestedRecord") {
          throw BinaryError.delta(`cannot merge into F${op.fid}: it holds ${existing.tag}`);
        }
        out.setField(op.fid, valueNestedRecord(applyDelta(existing.value, op.ops)));
        break;
      }
    }
  }
  return out;
}

// ============================================================================
// Wire form
// ============================================================================

function writeOps(out: Uint8Array[], ops: readonly DeltaOp[], opts: EntryEncodeOptions, depth: number): void {
  out.push(encodeVarint(ops.length));
  for (const op of ops) {
    if (!isValidFid(op.fid)) throw BinaryError.delta(`invalid target F${op.fid}`);
    const payload: Uint8Array[] = [];
    switch (op.tag) {
      case "SetField":
      case "UpdateField":
        writeTaggedValue(payload, op.fid, op.value, opts, depth);
        break;
      case "DeleteField":
        break;
      case "MergeRecord":
        writeOps(payload, op.ops, opts, nestedDepth(opts, depth));
        break;
    }
    const body = concat(...payload);
    out.push(encodeU16BE(op.fid), Uint8Array.of(DeltaOperation[op.tag]), encodeVarint(body.length), body);
  }
}

export function encodeDelta(ops: readonly DeltaOp[], options: Partial<EntryEncodeOptions> = {}): Uint8Array {
  const out: Uint8Array[] = [Uint8Array.of(DELTA_TAG)];
  writeOps(out, ops, resolveEntryEncodeOptions(options), 0);
  return concat(...out);
}

function readOps(reader: FrameReader, opts: EntryDecodeOptions, depth: number): DeltaOp[] {
  // Smallest op: FID, op code and a zero length.
  const count = reader.count(4);
  const ops: DeltaOp[] = [];
  for (let i = 0; i < count; i++) {
    const fid = reader.fid();
    const code = reader.u8();
    const body = new FrameReader(reader.borrow(reader.length()), 0, opts.strictVarints);
    let op: DeltaOp;
    switch (code) {
      case DeltaOperation.SetField:
        op = setField(fid, readTaggedValue(body, fid, opts, depth));
        break;
      case DeltaOperation.UpdateField:
        op = updateField(fid, readTaggedValue(body, fid, opts, depth));
        break;
      case DeltaOperation.DeleteField:
        op = deleteField(fid);
        break;
      case DeltaOperation.MergeRecord:
        op = mergeRecord(fid, readOps(body, opts, nestedDepth(opts, depth)));
        break;
      default:
        throw BinaryError.delta(`invalid operation code ${hex(code)}`);
    }
    if (body.remaining > 0) {
      throw BinaryError.delta(`${body.remaining} unread payload bytes in operation on F${fid}`);
    }
    ops.push(op);
  }
  return ops;
}

export function decodeDelta(bytes: Uint8Array, options: Partial<EntryDecodeOptions> = {}): DeltaOp[] {
  const opts = resolveEntryDecodeOptions(options);
  const reader = new FrameReader(bytes, 0, opts.strictVarints);
  if (reader.remaining === 0) throw BinaryError.delta("empty delta packet");
  const tag = reader.u8();
  if (tag !== DELTA_TAG) throw BinaryError.delta(`expected delta tag ${hex(DELTA_TAG)}, found ${hex(tag)}`);
  const ops = readOps(reader, opts, 0);
  if (reader.remaining > 0) throw BinaryError.trailingData(reader.remaining);
  return ops;
}
