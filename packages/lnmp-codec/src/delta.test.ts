import { describe, expect, it } from "vitest";
import { LnmpRecord, field, recordsEqual, valueBool, valueInt, valueNestedRecord, valueString } from "@lnmp/core";
import {
  applyDelta,
  computeDelta,
  decodeDelta,
  deleteField,
  encodeDelta,
  mergeRecord,
  setField,
  updateField,
} from "./delta.ts";
import { BinaryError } from "./error.ts";

function binaryError(fn: () => unknown): BinaryError {
  try {
    fn();
  } catch (e) {
    if (e instanceof BinaryError) return e;
    throw e;
  }
  throw new Error("expected BinaryError");
}

function base(): LnmpRecord {
  return new LnmpRecord([
    field(1, valueInt(1)),
    field(2, valueString("a")),
    field(3, valueNestedRecord(new LnmpRecord([field(1, valueInt(1))]))),
    field(5, valueBool(false)),
  ]);
}

function updated(): LnmpRecord {
  return new LnmpRecord([
    field(1, valueInt(1)),
    field(2, valueString("b")),
    field(3, valueNestedRecord(new LnmpRecord([field(1, valueInt(2))]))),
    field(4, valueBool(true)),
  ]);
}

describe("computeDelta", () => {
  it("describes the change in ascending FID order", () => {
    expect(computeDelta(base(), updated())).toEqual([
      updateField(2, valueString("b")),
      mergeRecord(3, [updateField(1, valueInt(2))]),
      setField(4, valueBool(true)),
      deleteField(5),
    ]);
  });

  it("is empty for equal records", () => {
    expect(computeDelta(base(), base())).toEqual([]);
  });
});

describe("applyDelta", () => {
  it("rebuilds the updated record without touching the base", () => {
    const original = base();
    const result = applyDelta(original, computeDelta(original, updated()));

    expect(recordsEqual(result, updated())).toBe(true);
    expect(recordsEqual(original, base())).toBe(true);
  });

  it("treats deleting a missing field as a no-op", () => {
    expect(applyDelta(base(), [deleteField(99)]).size).toBe(4);
  });

  it("refuses updates and merges it cannot apply", () => {
    expect(binaryError(() => applyDelta(new LnmpRecord(), [updateField(1, valueInt(1))])).message).toBe(
      "Delta error: cannot update missing F1",
    );
    expect(binaryError(() => applyDelta(base(), [mergeRecord(7, [])])).details).toEqual({
      kind: "DeltaError",
      reason: "cannot merge into missing F7",
    });
    expect(binaryError(() => applyDelta(base(), [mergeRecord(1, [])])).message).toBe(
      "Delta error: cannot merge into F1: it holds Int",
    );
  });
});

describe("delta wire form", () => {
  it("encodes set and delete operations", () => {
    const bytes = encodeDelta([setField(1, valueInt(1)), deleteField(2)]);
    expect(Array.from(bytes)).toEqual([
      0xb0, 0x02,
      0x00, 0x01, 0x01, 0x02, 0x01, 0x02,
      0x00, 0x02, 0x02, 0x00,
    ]);
  });

  it("nests merge operations inside the payload", () => {
    const ops = [mergeRecord(3, [updateField(1, valueBool(true))])];
    const bytes = encodeDelta(ops);
    expect(Array.from(bytes)).toEqual([
      0xb0, 0x01,
      0x00, 0x03, 0x04, 0x07,
      0x01, 0x00, 0x01, 0x03, 0x02, 0x03, 0x01,
    ]);
    expect(decodeDelta(bytes)).toEqual(ops);
  });

  it("round-trips a computed delta", () => {
    const ops = computeDelta(base(), updated());
    expect(decodeDelta(encodeDelta(ops))).toEqual(ops);
  });

  it("rejects malformed packets", () => {
    expect(binaryError(() => decodeDelta(Uint8Array.of(0xb1))).message).toBe(
      "Delta error: expected delta tag 0xB0, found 0xB1",
    );
    expect(binaryError(() => decodeDelta(Uint8Array.of(0xb0, 0x01, 0x00, 0x01, 0x09, 0x00))).message).toBe(
      "Delta error: invalid operation code 0x09",
    );
    expect(binaryError(() => decodeDelta(Uint8Array.of(0xb0, 0x01, 0x00, 0x01, 0x02, 0x01, 0xff))).message).toBe(
      "Delta error: 1 unread payload bytes in operation on F1",
    );
    expect(binaryError(() => decodeDelta(new Uint8Array(0))).kind).toBe("DeltaError");

    const padded = Uint8Array.of(...encodeDelta([deleteField(2)]), 0x00);
    expect(binaryError(() => decodeDelta(padded)).details).toEqual({ kind: "TrailingData", bytesRemaining: 1 });
  });
});
