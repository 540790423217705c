// Frame encoder.

import { concat, encodeVarint } from "@lnmp/binary";
import { isNested, isValidFid, type LnmpField, type LnmpRecord } from "@lnmp/core";
import { BinaryError } from "./error.ts";
import { DEFAULT_MAX_DEPTH, canonicalFields, writeEntry, type EntryEncodeOptions } from "./entry.ts";
import { FrameVersion, binaryEntry, type BinaryFrame } from "./frame.ts";
import { LevelCheck } from "./reader.ts";
import { parseText, type RecordTextParser } from "./text.ts";
import { typeTagOf } from "./type-tag.ts";

export interface EncoderConfig {
  /**
   * Reject input that is not already in ascending FID order. When false
   * the encoder sorts. Duplicate FIDs are rejected either way.
   */
  validateCanonical: boolean;
  /** Allow nested records. When false, nested values are an error. */
  enableNested: boolean;
  /** Deepest nested record allowed; top-level fields sit at depth 0. */
  maxDepth: number;
  /** Upper bound on the encoded frame, in bytes. */
  maxRecordSize?: number;
  /** Value written to the FLAGS byte. */
  flags: number;
}

export const DEFAULT_ENCODER_CONFIG: Readonly<EncoderConfig> = {
  validateCanonical: false,
  enableNested: true,
  maxDepth: DEFAULT_MAX_DEPTH,
  flags: 0,
};

export function resolveEncoderConfig(config: Partial<EncoderConfig> = {}): EncoderConfig {
  const flags = config.flags ?? DEFAULT_ENCODER_CONFIG.flags;
  if (!Number.isInteger(flags) || flags < 0 || flags > 0xff) {
    throw new RangeError(`frame flags must be a byte, got ${flags}`);
  }
  return {
    validateCanonical: config.validateCanonical ?? DEFAULT_ENCODER_CONFIG.validateCanonical,
    enableNested: config.enableNested ?? DEFAULT_ENCODER_CONFIG.enableNested,
    maxDepth: config.maxDepth ?? DEFAULT_ENCODER_CONFIG.maxDepth,
    maxRecordSize: config.maxRecordSize,
    flags,
  };
}

/**
 * Encodes records into canonical binary frames.
 *
 * Two records with the same FID→value mapping encode to the same bytes,
 * whatever order their fields were inserted in.
 *
 * @example
 * ```typescript
 * const bytes = new BinaryEncoder().encode(record);
 * ```
 */
export class BinaryEncoder {
  readonly config: EncoderConfig;

  constructor(config: Partial<EncoderConfig> = {}) {
    this.config = resolveEncoderConfig(config);
  }

  private entryOptions(): EntryEncodeOptions {
    return {
      validateCanonical: this.config.validateCanonical,
      enableNested: this.config.enableNested,
      maxDepth: this.config.maxDepth,
    };
  }

  /**
   * Canonical frame for a record: top-level entries sorted, version
   * 0x05 when any field is nested and 0x04 otherwise.
   */
  toFrame(record: LnmpRecord): BinaryFrame {
    const fields = canonicalFields(record.fields, this.config.validateCanonical);
    const nested = fields.find((f) => isNested(f.value));
    if (nested !== undefined && !this.config.enableNested) {
      throw BinaryError.nestedStructureNotSupported(nested.fid);
    }
    return {
      version: nested === undefined ? FrameVersion.V0_4 : FrameVersion.V0_5,
      flags: this.config.flags,
      entries: fields.map(binaryEntry),
    };
  }

  /** Serialize a frame model. Entries are written in the order given. */
  encodeFrame(frame: BinaryFrame): Uint8Array {
    const opts = this.entryOptions();
    const out: Uint8Array[] = [Uint8Array.of(frame.version, frame.flags), encodeVarint(frame.entries.length)];
    const check = new LevelCheck(this.config.validateCanonical);
    for (const entry of frame.entries) {
      if (!isValidFid(entry.fid)) throw BinaryError.invalidFid(entry.fid, "must be an integer in 0..=65535");
      check.accept(entry.fid);
      if (entry.tag !== typeTagOf(entry.value)) {
        throw BinaryError.invalidValue(entry.fid, entry.tag, `tag does not match ${entry.value.tag} value`);
      }
      if (frame.version === FrameVersion.V0_4 && isNested(entry.value)) {
        throw BinaryError.nestedStructureNotSupported(entry.fid);
      }
      const f: LnmpField = { fid: entry.fid, value: entry.value };
      writeEntry(out, f, opts, 0);
    }
    const bytes = concat(...out);
    const max = this.config.maxRecordSize;
    if (max !== undefined && bytes.length > max) throw BinaryError.recordSizeExceeded(bytes.length, max);
    return bytes;
  }

  encode(record: LnmpRecord): Uint8Array {
    return this.encodeFrame(this.toFrame(record));
  }

  /** Parse text with the supplied grammar, then encode. */
  encodeText(text: string, parser: RecordTextParser): Uint8Array {
    return this.encode(parseText(text, parser));
  }
}

export function encode(record: LnmpRecord, config: Partial<EncoderConfig> = {}): Uint8Array {
  return new BinaryEncoder(config).encode(record);
}
