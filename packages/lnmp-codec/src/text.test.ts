import { describe, expect, it } from "vitest";
import { LnmpRecord, field, valueBool, valueInt } from "@lnmp/core";
import { BinaryDecoder } from "./decoder.ts";
import { BinaryEncoder } from "./encoder.ts";
import { BinaryError } from "./error.ts";
import type { RecordTextEncoder, RecordTextParser } from "./text.ts";

// Toy grammar: "F<fid>=<int>" pairs separated by ';'.
const parser: RecordTextParser = {
  parse(text) {
    const record = new LnmpRecord();
    for (const pair of text.split(";")) {
      const match = /^F(\d+)=(-?\d+)$/.exec(pair);
      if (match === null) throw new Error(`cannot parse "${pair}"`);
      record.addField(field(Number(match[1]), valueInt(BigInt(match[2]))));
    }
    return record;
  },
};

const textEncoder: RecordTextEncoder = {
  encode(record) {
    return record.fields.map((f) => `F${f.fid}=${f.value.tag === "Int" ? f.value.value : "?"}`).join(";");
  },
};

describe("text bridge", () => {
  it("encodes text through the parser", () => {
    const bytes = new BinaryEncoder().encodeText("F2=-1;F1=5", parser);
    expect(Array.from(bytes)).toEqual([0x04, 0x00, 0x02, 0x00, 0x01, 0x01, 0x0a, 0x00, 0x02, 0x01, 0x01]);
  });

  it("renders decoded records through the encoder", () => {
    const bytes = new BinaryEncoder().encode(new LnmpRecord([field(9, valueInt(3)), field(4, valueInt(-2))]));
    expect(new BinaryDecoder().decodeToText(bytes, textEncoder)).toBe("F4=-2;F9=3");
  });

  it("wraps grammar failures as TextFormatError", () => {
    try {
      new BinaryEncoder().encodeText("F1=x", parser);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(BinaryError);
      if (e instanceof BinaryError) {
        expect(e.details).toEqual({ kind: "TextFormatError", reason: 'cannot parse "F1=x"' });
      }
    }
  });

  it("passes codec errors through unchanged", () => {
    const duplicate: RecordTextParser = {
      parse: () => new LnmpRecord([field(1, valueBool(true)), field(1, valueBool(false))]),
    };
    expect(() => new BinaryEncoder().encodeText("", duplicate)).toThrow("Canonical violation: duplicate field F1");
  });
});
