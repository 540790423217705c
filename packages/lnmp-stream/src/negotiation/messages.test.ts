import { describe, expect, it } from "vitest";
import { decodeNegotiationMessage, encodeNegotiationMessage, propose, reject } from "./messages.ts";
import { NegotiationError, defaultCapabilities } from "./types.ts";

function malformed(bytes: number[]): string {
  try {
    decodeNegotiationMessage(Uint8Array.from(bytes));
  } catch (e) {
    if (e instanceof NegotiationError && e.kind === "malformedMessage") return e.message;
    throw e;
  }
  throw new Error("expected a malformed message");
}

describe("negotiation messages", () => {
  it("encodes a PROPOSE", () => {
    const bytes = encodeNegotiationMessage(propose(defaultCapabilities()));
    expect(Array.from(bytes)).toEqual([0x01, 0x05, 0x00, 0x00, 0x7f, 0xfe, 0x20, 0x1f]);
  });

  it("encodes a REJECT with a length-prefixed reason", () => {
    expect(Array.from(encodeNegotiationMessage(reject("no")))).toEqual([0x03, 0x02, 0x6e, 0x6f]);
  });

  it("decodes an ACCEPT", () => {
    expect(decodeNegotiationMessage(Uint8Array.of(0x02, 0x04, 0x00, 0x00, 0x00, 0x12, 0x04, 0x82, 0x02))).toEqual({
      tag: "Accept",
      capabilities: { maxVersion: 4, supportedTypeTags: 0x12, maxNestingDepth: 4, featureFlags: 0x102 },
    });
  });

  it("reads back a REJECT", () => {
    expect(decodeNegotiationMessage(encodeNegotiationMessage(reject("feature not agreed: DELTA")))).toEqual({
      tag: "Reject",
      reason: "feature not agreed: DELTA",
    });
  });

  it("rejects unknown types, truncation and trailing bytes", () => {
    expect(malformed([0x09])).toBe("malformed negotiation message: unknown message type 0x09");
    expect(malformed([0x01, 0x05, 0x00])).toMatch(/^malformed negotiation message: u32/);
    expect(malformed([0x03, 0x00, 0xaa])).toBe("malformed negotiation message: 1 trailing bytes");
    expect(malformed([])).toMatch(/^malformed negotiation message: u8/);
  });

  it("refuses to encode capabilities that do not fit the wire", () => {
    const caps = { ...defaultCapabilities(), maxVersion: 256 };
    expect(() => encodeNegotiationMessage(propose(caps))).toThrow(RangeError);
  });
});
