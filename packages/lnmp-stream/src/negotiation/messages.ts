// Negotiation wire messages.
//
// TYPE(1) | BODY
//   PROPOSE, ACCEPT: MAX_VERSION(1) | TYPE_TAGS(4, BE) | MAX_DEPTH(varint) | FEATURES(varint)
//   REJECT:          REASON_LEN(varint) | REASON(UTF-8)

import {
  ByteReadError,
  ByteReader,
  VarintError,
  concat,
  encodeString,
  encodeU32BE,
  encodeVarint,
} from "@lnmp/binary";
import { NegotiationError, validateCapabilities, type Capabilities } from "./types.ts";

export const MessageType = {
  Propose: 0x01,
  Accept: 0x02,
  Reject: 0x03,
} as const;
export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export type NegotiationMessage =
  | { tag: "Propose"; capabilities: Capabilities }
  | { tag: "Accept"; capabilities: Capabilities }
  | { tag: "Reject"; reason: string };

export function propose(capabilities: Capabilities): NegotiationMessage {
  return { tag: "Propose", capabilities };
}

export function accept(capabilities: Capabilities): NegotiationMessage {
  return { tag: "Accept", capabilities };
}

export function reject(reason: string): NegotiationMessage {
  return { tag: "Reject", reason };
}

function encodeCapabilities(caps: Capabilities): Uint8Array {
  validateCapabilities(caps);
  return concat(
    Uint8Array.of(caps.maxVersion),
    encodeU32BE(caps.supportedTypeTags),
    encodeVarint(caps.maxNestingDepth),
    encodeVarint(caps.featureFlags),
  );
}

export function encodeNegotiationMessage(message: NegotiationMessage): Uint8Array {
  switch (message.tag) {
    case "Propose":
      return concat(Uint8Array.of(MessageType.Propose), encodeCapabilities(message.capabilities));
    case "Accept":
      return concat(Uint8Array.of(MessageType.Accept), encodeCapabilities(message.capabilities));
    case "Reject":
      return concat(Uint8Array.of(MessageType.Reject), encodeString(message.reason));
  }
}

function readCapabilities(reader: ByteReader): Capabilities {
  return {
    maxVersion: reader.readByte(),
    supportedTypeTags: reader.readU32BE(),
    maxNestingDepth: reader.readVarintNumber(),
    featureFlags: reader.readVarintNumber(),
  };
}

function readMessage(reader: ByteReader): NegotiationMessage {
  const type = reader.readByte();
  switch (type) {
    case MessageType.Propose:
      return propose(readCapabilities(reader));
    case MessageType.Accept:
      return accept(readCapabilities(reader));
    case MessageType.Reject:
      return reject(reader.readString(reader.readVarintNumber()));
    default:
      throw NegotiationError.malformedMessage(`unknown message type 0x${type.toString(16).padStart(2, "0")}`);
  }
}

/** Parse exactly one message. */
export function decodeNegotiationMessage(bytes: Uint8Array): NegotiationMessage {
  const reader = new ByteReader(bytes);
  let message: NegotiationMessage;
  try {
    message = readMessage(reader);
  } catch (e) {
    if (e instanceof ByteReadError || e instanceof VarintError) throw NegotiationError.malformedMessage(e.message);
    throw e;
  }
  if (reader.remaining > 0) throw NegotiationError.malformedMessage(`${reader.remaining} trailing bytes`);
  return message;
}
