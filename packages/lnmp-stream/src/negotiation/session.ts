// One connection's negotiation handshake.

import type { FieldId, LnmpRecord, LnmpValue } from "@lnmp/core";
import { recordDepth } from "@lnmp/core";
import { typeTagName, typeTagOf, type TypeTag } from "@lnmp/codec";
import { createLogger, LogNamespace, type Logger } from "../logging.ts";
import {
  accept,
  decodeNegotiationMessage,
  encodeNegotiationMessage,
  propose,
  reject,
  type NegotiationMessage,
} from "./messages.ts";
import { SchemaNegotiator, type SchemaNegotiatorOptions } from "./negotiator.ts";
import {
  FeatureFlags,
  NegotiationError,
  NegotiationState,
  hasFeature,
  supportsTypeTag,
  type Capabilities,
} from "./types.ts";

export interface NegotiationSessionOptions extends SchemaNegotiatorOptions {
  logger?: Logger;
}

/** Feature a value needs beyond its type tag, if any. */
function featureFor(value: LnmpValue): number {
  switch (value.tag) {
    case "NestedRecord":
    case "NestedArray":
      return FeatureFlags.NESTED;
    case "HybridNumericArray":
      return FeatureFlags.HYBRID_ARRAYS;
    case "Embedding":
    case "EmbeddingDelta":
    case "QuantizedEmbedding":
      return FeatureFlags.EMBEDDINGS;
    default:
      return 0;
  }
}

/**
 * Negotiation state for one connection.
 *
 * The initiating side calls `propose()` and hands the peer's reply to
 * `receive()`. The passive side hands the peer's proposal to `respond()`
 * and sends back what it returns. Either way the session ends Accepted,
 * with `agreed` fixed for the rest of the connection, or Rejected.
 */
export class NegotiationSession {
  private _state: NegotiationState = NegotiationState.Init;
  private _agreed: Readonly<Capabilities> | undefined;
  private _rejection: NegotiationError | undefined;
  private readonly negotiator: SchemaNegotiator;
  private readonly log: Logger;

  constructor(local: Capabilities, options: NegotiationSessionOptions = {}) {
    this.negotiator = new SchemaNegotiator(local, options);
    this.log = options.logger ?? createLogger(LogNamespace.Negotiation);
  }

  get state(): NegotiationState {
    return this._state;
  }

  get local(): Capabilities {
    return this.negotiator.local;
  }

  /** The capability set both peers agreed on; undefined until Accepted. */
  get agreed(): Readonly<Capabilities> | undefined {
    return this._agreed;
  }

  /** Why the session ended Rejected, if it did. */
  get rejection(): NegotiationError | undefined {
    return this._rejection;
  }

  /** Init → Proposed. Returns the PROPOSE message to send. */
  propose(): Uint8Array {
    if (this._state !== NegotiationState.Init) throw NegotiationError.invalidState("propose", this._state);
    const bytes = encodeNegotiationMessage(propose(this.local));
    this._state = NegotiationState.Proposed;
    this.log.debug("proposed", { capabilities: this.local });
    return bytes;
  }

  /**
   * Handle the peer's reply to our proposal. ACCEPT moves to Accepted and
   * returns the agreed capabilities; REJECT, or an ACCEPT we cannot live
   * with, moves to Rejected and throws.
   */
  receive(bytes: Uint8Array, remoteFidNames?: ReadonlyMap<FieldId, string>): Readonly<Capabilities> {
    if (this._state !== NegotiationState.Proposed) throw NegotiationError.invalidState("receive", this._state);
    const message = this.decode(bytes);
    switch (message.tag) {
      case "Accept":
        return this.settle(message.capabilities, remoteFidNames);
      case "Reject":
        throw this.rejectWith(NegotiationError.rejected(message.reason));
      case "Propose":
        throw this.rejectWith(NegotiationError.malformedMessage("expected ACCEPT or REJECT, got PROPOSE"));
    }
  }

  /**
   * Answer the peer's proposal: Init → Accepted with an ACCEPT carrying
   * the agreed set, or Init → Rejected with a REJECT naming the reason.
   * The reason is also kept in `rejection`.
   */
  respond(bytes: Uint8Array, remoteFidNames?: ReadonlyMap<FieldId, string>): Uint8Array {
    if (this._state !== NegotiationState.Init) throw NegotiationError.invalidState("respond", this._state);
    let reply: NegotiationMessage;
    try {
      const message = this.decode(bytes);
      if (message.tag !== "Propose") {
        throw NegotiationError.malformedMessage(`expected PROPOSE, got ${message.tag.toUpperCase()}`);
      }
      reply = accept(this.settle(message.capabilities, remoteFidNames));
    } catch (e) {
      if (!(e instanceof NegotiationError)) throw e;
      reply = reject(this.rejectWith(e).message);
    }
    return encodeNegotiationMessage(reply);
  }

  private decode(bytes: Uint8Array): NegotiationMessage {
    try {
      return decodeNegotiationMessage(bytes);
    } catch (e) {
      if (e instanceof NegotiationError) throw this.rejectWith(e);
      throw e;
    }
  }

  private settle(remote: Capabilities, remoteFidNames?: ReadonlyMap<FieldId, string>): Readonly<Capabilities> {
    let agreed: Capabilities;
    try {
      agreed = this.negotiator.negotiate(remote, remoteFidNames);
    } catch (e) {
      if (e instanceof NegotiationError) throw this.rejectWith(e);
      throw e;
    }
    this._agreed = Object.freeze(agreed);
    this._state = NegotiationState.Accepted;
    this.log.debug("accepted", { agreed });
    return this._agreed;
  }

  private rejectWith(error: NegotiationError): NegotiationError {
    if (this._state !== NegotiationState.Rejected) {
      this._state = NegotiationState.Rejected;
      this._rejection = error;
      this.log.warn("rejected", { kind: error.kind, message: error.message });
    }
    return error;
  }

  private requireAgreed(operation: string): Readonly<Capabilities> {
    if (this._state !== NegotiationState.Accepted || this._agreed === undefined) {
      throw NegotiationError.invalidState(operation, this._state);
    }
    return this._agreed;
  }

  /** Throws unless every bit of `flags` was agreed. */
  requireFeature(flags: number): void {
    const agreed = this.requireAgreed("use a feature");
    const missing = flags & ~agreed.featureFlags;
    if (missing !== 0) throw NegotiationError.missingFeature(missing);
  }

  requireTypeTag(tag: TypeTag): void {
    const agreed = this.requireAgreed("use a type tag");
    if (!supportsTypeTag(agreed, tag)) throw NegotiationError.missingTypeTag(typeTagName(tag));
  }

  /**
   * Throws if `record` uses a type tag, feature or nesting depth outside
   * the agreed set.
   */
  checkRecord(record: LnmpRecord): void {
    const agreed = this.requireAgreed("check a record");
    const depth = recordDepth(record);
    if (depth > agreed.maxNestingDepth) throw NegotiationError.depthExceeded(depth, agreed.maxNestingDepth);
    this.checkFields(agreed, record);
  }

  private checkFields(agreed: Readonly<Capabilities>, record: LnmpRecord): void {
    for (const { value } of record.fields) {
      const tag = typeTagOf(value);
      if (!supportsTypeTag(agreed, tag)) throw NegotiationError.missingTypeTag(typeTagName(tag));
      const feature = featureFor(value);
      if (feature !== 0 && !hasFeature(agreed, feature)) throw NegotiationError.missingFeature(feature);
      if (value.tag === "NestedRecord") this.checkFields(agreed, value.value);
      if (value.tag === "NestedArray") for (const inner of value.value) this.checkFields(agreed, inner);
    }
  }
}
