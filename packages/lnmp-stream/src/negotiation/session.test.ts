import { describe, expect, it } from "vitest";
import { LnmpRecord, field, valueEmbedding, valueInt, valueNestedRecord, valueString } from "@lnmp/core";
import { TypeTag } from "@lnmp/codec";
import { silentLogger } from "../logging.ts";
import { decodeNegotiationMessage, encodeNegotiationMessage, propose } from "./messages.ts";
import { NegotiationSession } from "./session.ts";
import {
  FeatureFlags,
  NegotiationError,
  NegotiationState,
  defaultCapabilities,
  typeTagMask,
  type Capabilities,
} from "./types.ts";

const limited: Capabilities = {
  maxVersion: 0x05,
  supportedTypeTags: typeTagMask([TypeTag.Int, TypeTag.String, TypeTag.NestedRecord]),
  maxNestingDepth: 1,
  featureFlags: FeatureFlags.NESTED | FeatureFlags.STREAMING,
};

function session(caps: Capabilities, options: ConstructorParameters<typeof NegotiationSession>[1] = {}) {
  return new NegotiationSession(caps, { logger: silentLogger, ...options });
}

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof NegotiationError) return e.kind;
    throw e;
  }
  return undefined;
}

function handshake(): NegotiationSession {
  const a = session(defaultCapabilities());
  const b = session(limited);
  a.receive(b.respond(a.propose()));
  return a;
}

describe("NegotiationSession", () => {
  it("agrees on the same set on both sides", () => {
    const a = session(defaultCapabilities());
    const b = session(limited);
    expect(a.state).toBe(NegotiationState.Init);

    const proposal = a.propose();
    expect(a.state).toBe(NegotiationState.Proposed);

    const reply = b.respond(proposal);
    expect(b.state).toBe(NegotiationState.Accepted);

    const agreed = a.receive(reply);
    expect(a.state).toBe(NegotiationState.Accepted);
    expect(agreed).toEqual(b.agreed);
    expect(agreed).toEqual({
      maxVersion: 0x05,
      supportedTypeTags: 0x52,
      maxNestingDepth: 1,
      featureFlags: FeatureFlags.NESTED | FeatureFlags.STREAMING,
    });
    expect(Object.isFrozen(agreed)).toBe(true);
  });

  it("answers with REJECT when a mandatory feature is missing", () => {
    const a = session(limited);
    const b = session(defaultCapabilities(), { mandatoryFeatures: FeatureFlags.DELTA });

    const reply = b.respond(a.propose());
    expect(b.state).toBe(NegotiationState.Rejected);
    expect(b.rejection?.kind).toBe("missingFeature");
    expect(decodeNegotiationMessage(reply)).toEqual({ tag: "Reject", reason: "feature not agreed: DELTA" });

    expect(() => a.receive(reply)).toThrow("peer rejected negotiation: feature not agreed: DELTA");
    expect(a.state).toBe(NegotiationState.Rejected);
    expect(a.agreed).toBeUndefined();
  });

  it("rejects an ACCEPT that drops a feature the initiator needs", () => {
    const a = session(defaultCapabilities(), { mandatoryFeatures: FeatureFlags.EMBEDDINGS });
    const b = session(limited);
    expect(kindOf(() => a.receive(b.respond(a.propose())))).toBe("missingFeature");
    expect(a.state).toBe(NegotiationState.Rejected);
  });

  it("enforces call order", () => {
    const a = session(defaultCapabilities());
    expect(kindOf(() => a.receive(Uint8Array.of(0x03, 0x00)))).toBe("invalidState");
    a.propose();
    expect(() => a.propose()).toThrow("cannot propose in state proposed");
    expect(kindOf(() => a.respond(encodeNegotiationMessage(propose(limited))))).toBe("invalidState");
  });

  it("rejects a malformed reply", () => {
    const a = session(defaultCapabilities());
    a.propose();
    expect(kindOf(() => a.receive(Uint8Array.of(0x02, 0x05)))).toBe("malformedMessage");
    expect(a.state).toBe(NegotiationState.Rejected);
  });

  it("answers anything but PROPOSE with REJECT", () => {
    const b = session(limited);
    const reply = decodeNegotiationMessage(b.respond(Uint8Array.of(0x03, 0x00)));
    expect(reply).toEqual({
      tag: "Reject",
      reason: "malformed negotiation message: expected PROPOSE, got REJECT",
    });
  });

  it("gates features and type tags on the agreed set", () => {
    const a = handshake();
    expect(() => a.requireFeature(FeatureFlags.STREAMING)).not.toThrow();
    expect(kindOf(() => a.requireFeature(FeatureFlags.DELTA))).toBe("missingFeature");
    expect(() => a.requireTypeTag(TypeTag.String)).not.toThrow();
    expect(() => a.requireTypeTag(TypeTag.FloatArray)).toThrow("type tag not agreed: FloatArray");
  });

  it("checks records against the agreed set", () => {
    const a = handshake();
    const inner = new LnmpRecord([field(1, valueInt(1))]);
    expect(() =>
      a.checkRecord(new LnmpRecord([field(1, valueString("ok")), field(2, valueNestedRecord(inner))])),
    ).not.toThrow();

    const tooDeep = new LnmpRecord([field(1, valueNestedRecord(new LnmpRecord([field(1, valueNestedRecord(inner))])))]);
    expect(() => a.checkRecord(tooDeep)).toThrow("nesting depth 2 exceeds agreed maximum 1");

    const embedded = new LnmpRecord([field(3, valueEmbedding(Uint8Array.of(1)))]);
    expect(() => a.checkRecord(embedded)).toThrow("type tag not agreed: Embedding");
  });

  it("refuses to gate before agreement", () => {
    const a = session(defaultCapabilities());
    expect(kindOf(() => a.requireFeature(FeatureFlags.NESTED))).toBe("invalidState");
    expect(kindOf(() => a.checkRecord(new LnmpRecord()))).toBe("invalidState");
  });
});
