// Capability intersection with mandatory-feature checks.

import type { FieldId } from "@lnmp/core";
import { typeTagName, type TypeTag } from "@lnmp/codec";
import {
  MIN_PROTOCOL_VERSION,
  NegotiationError,
  SUPPORT_MASK,
  intersectCapabilities,
  supportsTypeTag,
  type Capabilities,
} from "./types.ts";

export interface SchemaNegotiatorOptions {
  /** Support bits the agreed set must keep; negotiation fails otherwise. */
  mandatoryFeatures?: number;
  /** Type tags the agreed set must keep. */
  mandatoryTypeTags?: readonly TypeTag[];
  /** Field names this side assigns to FIDs, compared against the peer's. */
  fidNames?: ReadonlyMap<FieldId, string>;
}

/**
 * Computes what two peers can both use.
 *
 * @example
 * ```typescript
 * const negotiator = new SchemaNegotiator(defaultCapabilities(), {
 *   mandatoryFeatures: FeatureFlags.STREAMING,
 * });
 * const agreed = negotiator.negotiate(remoteCapabilities);
 * ```
 */
export class SchemaNegotiator {
  readonly mandatoryFeatures: number;
  readonly mandatoryTypeTags: readonly TypeTag[];
  private readonly fidNames: ReadonlyMap<FieldId, string>;

  constructor(
    readonly local: Capabilities,
    options: SchemaNegotiatorOptions = {},
  ) {
    this.mandatoryFeatures = (options.mandatoryFeatures ?? 0) & SUPPORT_MASK;
    this.mandatoryTypeTags = options.mandatoryTypeTags ?? [];
    this.fidNames = options.fidNames ?? new Map();
  }

  /**
   * Intersect local and remote capabilities. Throws NegotiationError when
   * either side is too old, when a mandatory feature or type tag does not
   * survive, or when a FID is named differently on each side.
   */
  negotiate(remote: Capabilities, remoteFidNames?: ReadonlyMap<FieldId, string>): Capabilities {
    if (this.local.maxVersion < MIN_PROTOCOL_VERSION || remote.maxVersion < MIN_PROTOCOL_VERSION) {
      throw NegotiationError.versionMismatch(this.local.maxVersion, remote.maxVersion);
    }
    const agreed = intersectCapabilities(this.local, remote);

    const missing = this.mandatoryFeatures & ~agreed.featureFlags;
    if (missing !== 0) throw NegotiationError.missingFeature(missing);

    for (const tag of this.mandatoryTypeTags) {
      if (!supportsTypeTag(agreed, tag)) throw NegotiationError.missingTypeTag(typeTagName(tag));
    }

    if (remoteFidNames) this.checkFidNames(remoteFidNames);
    return agreed;
  }

  private checkFidNames(remote: ReadonlyMap<FieldId, string>): void {
    for (const [fid, name] of this.fidNames) {
      const other = remote.get(fid);
      if (other !== undefined && other !== name) throw NegotiationError.fidConflict(fid, name, other);
    }
  }
}

