// Capability negotiation type definitions

import { TypeTag } from "@lnmp/codec";

/** Lowest frame version a peer must speak. */
export const MIN_PROTOCOL_VERSION = 0x04;

/** Frame version this implementation writes for nested records. */
export const PROTOCOL_VERSION = 0x05;

export const FeatureFlags = {
  NESTED: 0x01,
  STREAMING: 0x02,
  DELTA: 0x04,
  HYBRID_ARRAYS: 0x08,
  EMBEDDINGS: 0x10,
  /** Both sides must checksum streamed chunks. */
  REQUIRES_CHECKSUMS: 0x100,
  /** Both sides must send canonical frames only. */
  REQUIRES_CANONICAL: 0x200,
} as const;
export type FeatureFlag = (typeof FeatureFlags)[keyof typeof FeatureFlags];

/** Bits that say "I can"; intersected with AND. */
export const SUPPORT_MASK = 0x00ff;
/** Bits that say "you must"; combined with OR. */
export const REQUIREMENT_MASK = 0xff00;

export function featureName(flag: number): string {
  for (const [name, value] of Object.entries(FeatureFlags)) {
    if (value === flag) return name;
  }
  return `0x${flag.toString(16)}`;
}

/** Names of every bit set in `flags`, lowest first. */
export function featureNames(flags: number): string[] {
  const names: string[] = [];
  for (let bit = 1; bit <= flags; bit *= 2) {
    if ((flags & bit) !== 0) names.push(featureName(bit));
  }
  return names;
}

/** What one peer can do. Read-only once a session agrees on it. */
export interface Capabilities {
  maxVersion: number;
  /** Bit n set ⇔ type tag n supported. */
  supportedTypeTags: number;
  maxNestingDepth: number;
  featureFlags: number;
}

export function typeTagMask(tags: Iterable<TypeTag>): number {
  let mask = 0;
  for (const tag of tags) mask |= 1 << tag;
  return mask >>> 0;
}

export function supportsTypeTag(caps: Pick<Capabilities, "supportedTypeTags">, tag: TypeTag): boolean {
  return (caps.supportedTypeTags & (1 << tag)) !== 0;
}

export function hasFeature(caps: Pick<Capabilities, "featureFlags">, flag: number): boolean {
  return (caps.featureFlags & flag) === flag;
}

export const ALL_TYPE_TAGS = typeTagMask(Object.values(TypeTag));

/** Everything this implementation can do. */
export function defaultCapabilities(): Capabilities {
  return {
    maxVersion: PROTOCOL_VERSION,
    supportedTypeTags: ALL_TYPE_TAGS,
    maxNestingDepth: 32,
    featureFlags:
      FeatureFlags.NESTED |
      FeatureFlags.STREAMING |
      FeatureFlags.DELTA |
      FeatureFlags.HYBRID_ARRAYS |
      FeatureFlags.EMBEDDINGS,
  };
}

/**
 * Capabilities both peers can use: the lower version and depth, the
 * common type tags and support bits, every requirement either side makes.
 */
export function intersectCapabilities(a: Capabilities, b: Capabilities): Capabilities {
  const support = a.featureFlags & b.featureFlags & SUPPORT_MASK;
  const requirements = (a.featureFlags | b.featureFlags) & REQUIREMENT_MASK;
  return {
    maxVersion: Math.min(a.maxVersion, b.maxVersion),
    supportedTypeTags: (a.supportedTypeTags & b.supportedTypeTags) >>> 0,
    maxNestingDepth: Math.min(a.maxNestingDepth, b.maxNestingDepth),
    featureFlags: support | requirements,
  };
}

export function validateCapabilities(caps: Capabilities): void {
  if (!Number.isInteger(caps.maxVersion) || caps.maxVersion < 0 || caps.maxVersion > 0xff) {
    throw new RangeError(`maxVersion must fit in a u8, got ${caps.maxVersion}`);
  }
  if (!Number.isInteger(caps.supportedTypeTags) || caps.supportedTypeTags < 0 || caps.supportedTypeTags > 0xffffffff) {
    throw new RangeError(`supportedTypeTags must fit in a u32, got ${caps.supportedTypeTags}`);
  }
  if (!Number.isSafeInteger(caps.maxNestingDepth) || caps.maxNestingDepth < 0) {
    throw new RangeError(`maxNestingDepth must be a non-negative integer, got ${caps.maxNestingDepth}`);
  }
  if (!Number.isSafeInteger(caps.featureFlags) || caps.featureFlags < 0) {
    throw new RangeError(`featureFlags must be a non-negative integer, got ${caps.featureFlags}`);
  }
}

export const NegotiationState = {
  Init: "init",
  Proposed: "proposed",
  Accepted: "accepted",
  Rejected: "rejected",
} as const;
export type NegotiationState = (typeof NegotiationState)[keyof typeof NegotiationState];

export type NegotiationErrorKind =
  | "versionMismatch"
  | "missingFeature"
  | "missingTypeTag"
  | "depthExceeded"
  | "fidConflict"
  | "invalidState"
  | "rejected"
  | "malformedMessage";

/** Error types for negotiation and for use of unagreed capabilities. */
export class NegotiationError extends Error {
  constructor(
    public kind: NegotiationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "NegotiationError";
  }

  static versionMismatch(local: number, remote: number): NegotiationError {
    return new NegotiationError(
      "versionMismatch",
      `protocol version mismatch: local 0x${local.toString(16).padStart(2, "0")}, remote 0x${remote.toString(16).padStart(2, "0")}, need at least 0x${MIN_PROTOCOL_VERSION.toString(16).padStart(2, "0")}`,
    );
  }

  static missingFeature(flags: number): NegotiationError {
    return new NegotiationError("missingFeature", `feature not agreed: ${featureNames(flags).join(", ")}`);
  }

  static missingTypeTag(tag: string): NegotiationError {
    return new NegotiationError("missingTypeTag", `type tag not agreed: ${tag}`);
  }

  static depthExceeded(depth: number, max: number): NegotiationError {
    return new NegotiationError("depthExceeded", `nesting depth ${depth} exceeds agreed maximum ${max}`);
  }

  static fidConflict(fid: number, local: string, remote: string): NegotiationError {
    return new NegotiationError("fidConflict", `F${fid} is "${local}" locally but "${remote}" remotely`);
  }

  static invalidState(operation: string, state: NegotiationState): NegotiationError {
    return new NegotiationError("invalidState", `cannot ${operation} in state ${state}`);
  }

  static rejected(reason: string): NegotiationError {
    return new NegotiationError("rejected", `peer rejected negotiation: ${reason}`);
  }

  static malformedMessage(reason: string): NegotiationError {
    return new NegotiationError("malformedMessage", `malformed negotiation message: ${reason}`);
  }
}
