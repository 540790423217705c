import { describe, expect, it } from "vitest";
import {
  HybridDType,
  LnmpRecord,
  field,
  hybridDense,
  valueBool,
  valueFloat,
  valueInt,
  valueNestedArray,
  valueNestedRecord,
  valueString,
} from "@lnmp/core";
import { BinaryEncoder, encode, resolveEncoderConfig } from "./encoder.ts";
import { BinaryError } from "./error.ts";
import { FrameVersion, binaryEntry } from "./frame.ts";
import { TypeTag } from "./type-tag.ts";

function binaryError(fn: () => unknown): BinaryError {
  try {
    fn();
  } catch (e) {
    if (e instanceof BinaryError) return e;
    throw e;
  }
  throw new Error("expected BinaryError");
}

/** Records nested `levels` deep below the top-level field. */
function chain(levels: number): LnmpRecord {
  let record = new LnmpRecord([field(1, valueInt(0))]);
  for (let i = 0; i < levels; i++) record = new LnmpRecord([field(1, valueNestedRecord(record))]);
  return record;
}

const WORKED_EXAMPLE = [
  0x04, 0x00, 0x02,
  0x00, 0x07, 0x03, 0x01,
  0x00, 0x0c, 0x01, 0x88, 0xe3, 0x01,
];

describe("BinaryEncoder", () => {
  it("encodes fields in ascending FID order whatever the insertion order", () => {
    const a = new LnmpRecord([field(12, valueInt(14532)), field(7, valueBool(true))]);
    const b = new LnmpRecord([field(7, valueBool(true)), field(12, valueInt(14532))]);

    expect(Array.from(encode(a))).toEqual(WORKED_EXAMPLE);
    expect(encode(b)).toEqual(encode(a));
  });

  it("is deterministic across calls", () => {
    const encoder = new BinaryEncoder();
    const record = new LnmpRecord([field(3, valueString("x")), field(1, valueFloat(0.5))]);
    expect(encoder.encode(record)).toEqual(encoder.encode(record));
  });

  it("picks version 0x05 only for nested records", () => {
    const flat = new LnmpRecord([field(1, valueInt(1))]);
    const nested = new LnmpRecord([field(1, valueNestedRecord(new LnmpRecord([field(2, valueInt(1))])))]);

    expect(encode(flat)[0]).toBe(FrameVersion.V0_4);
    expect(Array.from(encode(nested))).toEqual([0x05, 0x00, 0x01, 0x00, 0x01, 0x06, 0x01, 0x00, 0x02, 0x01, 0x02]);
  });

  it("writes the configured flags byte", () => {
    const record = new LnmpRecord([field(1, valueBool(false))]);
    expect(Array.from(encode(record, { flags: 0x80 }))).toEqual([0x04, 0x80, 0x01, 0x00, 0x01, 0x03, 0x00]);
    expect(() => resolveEncoderConfig({ flags: 256 })).toThrow(RangeError);
  });

  it("sorts nested records too", () => {
    const inner = new LnmpRecord([field(9, valueBool(true)), field(2, valueBool(false))]);
    const bytes = encode(new LnmpRecord([field(1, valueNestedRecord(inner))]));
    expect(Array.from(bytes.subarray(6))).toEqual([0x02, 0x00, 0x02, 0x03, 0x00, 0x00, 0x09, 0x03, 0x01]);
  });

  it("rejects duplicate FIDs in every mode", () => {
    const record = new LnmpRecord();
    record.addField(field(3, valueInt(1)));
    record.addField(field(3, valueInt(2)));

    for (const validateCanonical of [false, true]) {
      const err = binaryError(() => encode(record, { validateCanonical }));
      expect(err.details).toEqual({ kind: "CanonicalViolation", reason: "duplicate field F3" });
    }
  });

  it("rejects duplicates inside a nested array element", () => {
    const element = new LnmpRecord();
    element.addField(field(1, valueInt(1)));
    element.addField(field(1, valueInt(1)));
    const record = new LnmpRecord([field(4, valueNestedArray([element]))]);
    expect(binaryError(() => encode(record)).kind).toBe("CanonicalViolation");
  });

  it("rejects unsorted input under validateCanonical", () => {
    const record = new LnmpRecord([field(2, valueInt(1)), field(1, valueInt(1))]);
    const err = binaryError(() => encode(record, { validateCanonical: true }));
    expect(err.message).toBe("Canonical violation: F1 follows F2");
    expect(encode(record)).toHaveLength(11);
  });

  it("refuses nested values when nesting is disabled", () => {
    const record = new LnmpRecord([field(5, valueNestedArray([]))]);
    const err = binaryError(() => encode(record, { enableNested: false }));
    expect(err.details).toEqual({ kind: "NestedStructureNotSupported", fieldId: 5 });
  });

  it("allows exactly maxDepth levels of nesting", () => {
    expect(() => encode(chain(32))).not.toThrow();
    const err = binaryError(() => encode(chain(33)));
    expect(err.details).toEqual({ kind: "NestingDepthExceeded", depth: 33, max: 32 });
    expect(binaryError(() => encode(chain(2), { maxDepth: 1 })).details).toEqual({
      kind: "NestingDepthExceeded",
      depth: 2,
      max: 1,
    });
  });

  it("enforces maxRecordSize on the whole frame", () => {
    const record = new LnmpRecord([field(12, valueInt(14532)), field(7, valueBool(true))]);
    expect(encode(record, { maxRecordSize: 13 })).toHaveLength(13);
    expect(binaryError(() => encode(record, { maxRecordSize: 12 })).details).toEqual({
      kind: "RecordSizeExceeded",
      size: 13,
      max: 12,
    });
  });

  it("rejects values that cannot be represented", () => {
    const big = new LnmpRecord([field(1, valueInt(1n << 63n))]);
    expect(binaryError(() => encode(big)).kind).toBe("InvalidValue");

    const surrogate = new LnmpRecord([field(2, valueString("a\ud800b"))]);
    expect(binaryError(() => encode(surrogate)).details).toEqual({
      kind: "InvalidValue",
      fieldId: 2,
      typeTag: TypeTag.String,
      reason: "string contains a lone surrogate",
    });

    const bad = hybridDense(HybridDType.F64, [1]);
    const truncated = new LnmpRecord([
      field(3, { tag: "HybridNumericArray", value: { ...bad, data: bad.data.subarray(0, 3) } }),
    ]);
    expect(binaryError(() => encode(truncated)).message).toBe(
      "Invalid value for F3 (type 0x09): dense F64 data is 3 bytes, expected 8",
    );
  });

  it("rejects invalid FIDs", () => {
    const encoder = new BinaryEncoder();
    const frame = { version: FrameVersion.V0_4, flags: 0, entries: [binaryEntry(field(70000, valueInt(1)))] };
    expect(binaryError(() => encoder.encodeFrame(frame)).kind).toBe("InvalidFID");
  });

  it("checks frame models before writing them", () => {
    const encoder = new BinaryEncoder();
    const nested = binaryEntry(field(1, valueNestedRecord(new LnmpRecord())));
    expect(binaryError(() => encoder.encodeFrame({ version: FrameVersion.V0_4, flags: 0, entries: [nested] })).kind).toBe(
      "NestedStructureNotSupported",
    );

    const mislabelled = { fid: 1, tag: TypeTag.Float, value: valueInt(1) };
    expect(binaryError(() => encoder.encodeFrame({ version: FrameVersion.V0_4, flags: 0, entries: [mislabelled] })).kind).toBe(
      "InvalidValue",
    );
  });
});
