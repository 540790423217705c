// Capability negotiation between two peers.

export {
  MIN_PROTOCOL_VERSION,
  PROTOCOL_VERSION,
  FeatureFlags,
  type FeatureFlag,
  SUPPORT_MASK,
  REQUIREMENT_MASK,
  featureName,
  featureNames,
  type Capabilities,
  typeTagMask,
  supportsTypeTag,
  hasFeature,
  ALL_TYPE_TAGS,
  defaultCapabilities,
  intersectCapabilities,
  validateCapabilities,
  NegotiationState,
  type NegotiationErrorKind,
  NegotiationError,
} from "./types.ts";

export {
  MessageType,
  type NegotiationMessage,
  propose,
  accept,
  reject,
  encodeNegotiationMessage,
  decodeNegotiationMessage,
} from "./messages.ts";

export { SchemaNegotiator, type SchemaNegotiatorOptions } from "./negotiator.ts";
export { NegotiationSession, type NegotiationSessionOptions } from "./session.ts";
