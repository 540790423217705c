// Frame decoder.

import type { LnmpRecord } from "@lnmp/core";
import { BinaryError, type DecodeOutcome } from "./error.ts";
import { DEFAULT_MAX_DEPTH, MIN_ENTRY_BYTES, readEntry, type EntryDecodeOptions } from "./entry.ts";
import { FrameVersion, binaryEntry, frameToRecord, readFrameHeader, type BinaryEntry, type BinaryFrame } from "./frame.ts";
import { FrameReader, LevelCheck } from "./reader.ts";
import { renderText, type RecordTextEncoder } from "./text.ts";
import { decodeViewWith, type RecordView } from "./view.ts";

export interface DecoderConfig {
  /** Require strictly ascending FIDs at every level. */
  validateOrdering: boolean;
  /** Reject bytes after the last entry, and non-minimal varints. */
  strictParsing: boolean;
  /** Reject non-minimal varints without the rest of strict parsing. */
  strictVarints: boolean;
  /** Deepest nested record accepted; top-level fields sit at depth 0. */
  maxDepth: number;
  /** Accept nested values in 0x05 frames. */
  allowNested: boolean;
}

export const DEFAULT_DECODER_CONFIG: Readonly<DecoderConfig> = {
  validateOrdering: false,
  strictParsing: false,
  strictVarints: false,
  maxDepth: DEFAULT_MAX_DEPTH,
  allowNested: true,
};

export function resolveDecoderConfig(config: Partial<DecoderConfig> = {}): DecoderConfig {
  return {
    validateOrdering: config.validateOrdering ?? DEFAULT_DECODER_CONFIG.validateOrdering,
    strictParsing: config.strictParsing ?? DEFAULT_DECODER_CONFIG.strictParsing,
    strictVarints: config.strictVarints ?? DEFAULT_DECODER_CONFIG.strictVarints,
    maxDepth: config.maxDepth ?? DEFAULT_DECODER_CONFIG.maxDepth,
    allowNested: config.allowNested ?? DEFAULT_DECODER_CONFIG.allowNested,
  };
}

/**
 * Decodes binary frames. Every call either returns a complete record or
 * throws a BinaryError; nothing partial escapes.
 */
export class BinaryDecoder {
  readonly config: DecoderConfig;

  constructor(config: Partial<DecoderConfig> = {}) {
    this.config = resolveDecoderConfig(config);
  }

  private entryOptions(): EntryDecodeOptions {
    return {
      validateOrdering: this.config.validateOrdering || this.config.strictParsing,
      allowNested: this.config.allowNested,
      maxDepth: this.config.maxDepth,
      strictVarints: this.config.strictVarints || this.config.strictParsing,
    };
  }

  decodeFrame(bytes: Uint8Array): BinaryFrame {
    const opts = this.entryOptions();
    const reader = new FrameReader(bytes, 0, opts.strictVarints);
    const { version, flags } = readFrameHeader(reader);
    const entryOpts: EntryDecodeOptions = {
      ...opts,
      allowNested: opts.allowNested && version === FrameVersion.V0_5,
    };

    const count = reader.count(MIN_ENTRY_BYTES);
    const check = new LevelCheck(opts.validateOrdering);
    const entries: BinaryEntry[] = [];
    for (let i = 0; i < count; i++) {
      const f = readEntry(reader, entryOpts, 0);
      check.accept(f.fid);
      entries.push(binaryEntry(f));
    }

    if (this.config.strictParsing && reader.remaining > 0) {
      throw BinaryError.trailingData(reader.remaining);
    }
    return { version, flags, entries };
  }

  decode(bytes: Uint8Array): LnmpRecord {
    return frameToRecord(this.decodeFrame(bytes));
  }

  tryDecode(bytes: Uint8Array): DecodeOutcome<LnmpRecord> {
    try {
      return { ok: true, value: this.decode(bytes) };
    } catch (e) {
      if (e instanceof BinaryError) return { ok: false, error: e };
      throw e;
    }
  }

  /** Zero-copy decode. The view borrows from `bytes`. */
  decodeView(bytes: Uint8Array): RecordView {
    return decodeViewWith(bytes, this.entryOptions(), this.config.strictParsing);
  }

  /** Decode, then render with the supplied text grammar. */
  decodeToText(bytes: Uint8Array, encoder: RecordTextEncoder): string {
    return renderText(this.decode(bytes), encoder);
  }
}

export function decode(bytes: Uint8Array, config: Partial<DecoderConfig> = {}): LnmpRecord {
  return new BinaryDecoder(config).decode(bytes);
}

export function tryDecode(bytes: Uint8Array, config: Partial<DecoderConfig> = {}): DecodeOutcome<LnmpRecord> {
  return new BinaryDecoder(config).tryDecode(bytes);
}

export function decodeView(bytes: Uint8Array, config: Partial<DecoderConfig> = {}): RecordView {
  return new BinaryDecoder(config).decodeView(bytes);
}
