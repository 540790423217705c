import { describe, expect, it } from "vitest";
import {
  HybridDType,
  LnmpRecord,
  field,
  hybridSparse,
  valueBool,
  valueBoolArray,
  valueEmbedding,
  valueFloat,
  valueFloatArray,
  valueHybrid,
  valueInt,
  valueIntArray,
  valueNestedArray,
  valueNestedRecord,
  valueString,
  valueStringArray,
} from "@lnmp/core";
import { decode, decodeView } from "./decoder.ts";
import { encode } from "./encoder.ts";
import { BinaryError } from "./error.ts";
import { TypeTag } from "./type-tag.ts";

const WORKED_EXAMPLE = Uint8Array.of(
  0x04, 0x00, 0x02,
  0x00, 0x07, 0x03, 0x01,
  0x00, 0x0c, 0x01, 0x88, 0xe3, 0x01,
);

describe("RecordView", () => {
  it("matches decode field for field", () => {
    const inner = new LnmpRecord([field(1, valueString("deep")), field(2, valueFloatArray([0.25]))]);
    const bytes = encode(
      new LnmpRecord([
        field(1, valueInt(-1)),
        field(2, valueFloat(2.5)),
        field(3, valueBool(true)),
        field(4, valueStringArray(["α", "β"])),
        field(5, valueNestedRecord(inner)),
        field(6, valueNestedArray([inner, inner])),
        field(7, valueHybrid(hybridSparse(HybridDType.I32, 8, [[0, -5], [7, 5]]))),
        field(8, valueEmbedding(Uint8Array.of(9, 8, 7))),
        field(9, valueIntArray([300, -300])),
        field(10, valueBoolArray([false, true])),
      ]),
    );

    expect(decodeView(bytes).toOwned()).toEqual(decode(bytes));
  });

  it("records each entry's offset and tag", () => {
    const view = decodeView(WORKED_EXAMPLE);
    expect(view.version).toBe(0x04);
    expect(view.size).toBe(2);
    expect(view.fields.map((f) => [f.fid, f.tag, f.offset])).toEqual([
      [7, TypeTag.Bool, 3],
      [12, TypeTag.Int, 7],
    ]);
    expect(view.getInt(12)).toBe(14532n);
    expect(view.get(7)).toEqual({ tag: "Bool", value: true });
    expect(view.getField(8)).toBeUndefined();
  });

  it("borrows string bytes from the source buffer", () => {
    const bytes = Uint8Array.of(0x04, 0x00, 0x01, 0x00, 0x04, 0x04, 0x02, 0x68, 0x69);
    const view = decodeView(bytes);
    const value = view.get(4);

    expect(value?.tag).toBe("String");
    if (value?.tag !== "String") return;
    expect(value.bytes.buffer).toBe(bytes.buffer);
    expect(value.bytes.byteOffset).toBe(7);
    expect(view.getString(4)).toBe("hi");
    expect(view.source).toBe(bytes);
  });

  it("looks fields up by FID when the wire order is not ascending", () => {
    const bytes = Uint8Array.of(0x04, 0x00, 0x02, 0x00, 0x02, 0x03, 0x01, 0x00, 0x01, 0x03, 0x00);
    const view = decodeView(bytes);

    expect(view.fields.map((f) => f.fid)).toEqual([2, 1]);
    expect(view.getField(1)?.offset).toBe(7);
    expect([...view].map((f) => f.fid)).toEqual([2, 1]);
  });

  it("applies the decoder's checks", () => {
    const padded = Uint8Array.of(...WORKED_EXAMPLE, 0x00);
    expect(decodeView(padded).size).toBe(2);
    expect(() => decodeView(padded, { strictParsing: true })).toThrow(BinaryError);

    const badUtf8 = Uint8Array.of(0x04, 0x00, 0x01, 0x00, 0x02, 0x04, 0x02, 0xc0, 0x80);
    expect(() => decodeView(badUtf8)).toThrow("Invalid UTF-8 in F2");

    const duplicate = Uint8Array.of(0x04, 0x00, 0x02, 0x00, 0x01, 0x03, 0x01, 0x00, 0x01, 0x03, 0x00);
    expect(() => decodeView(duplicate)).toThrow("Canonical violation: duplicate field F1");

    const nestedInV4 = Uint8Array.of(0x04, 0x00, 0x01, 0x00, 0x01, 0x07, 0x00);
    expect(() => decodeView(nestedInV4)).toThrow("Nested structure in F1 is not supported");
  });

  it("exposes nested views", () => {
    const bytes = encode(new LnmpRecord([field(3, valueNestedRecord(new LnmpRecord([field(1, valueString("x"))])))]));
    const nested = decodeView(bytes).get(3);
    expect(nested?.tag).toBe("NestedRecord");
    if (nested?.tag !== "NestedRecord") return;
    expect(nested.record.getString(1)).toBe("x");
    expect(nested.record.source).toBe(bytes);
  });
});
