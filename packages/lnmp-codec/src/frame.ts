// Binary frame model and header.
//
// Frame layout: VERSION(1) | FLAGS(1) | ENTRY_COUNT(varint) | ENTRY*

import { LnmpRecord, type FieldId, type LnmpField, type LnmpValue } from "@lnmp/core";
import { BinaryError } from "./error.ts";
import { FrameReader } from "./reader.ts";
import { typeTagOf, type TypeTag } from "./type-tag.ts";

export const FrameVersion = {
  /** Flat records only. */
  V0_4: 0x04,
  /** Nested records and arrays, with depth limits. */
  V0_5: 0x05,
} as const;
export type FrameVersion = (typeof FrameVersion)[keyof typeof FrameVersion];

export const SUPPORTED_VERSIONS: readonly FrameVersion[] = [FrameVersion.V0_4, FrameVersion.V0_5];

export function isFrameVersion(byte: number): byte is FrameVersion {
  return byte === FrameVersion.V0_4 || byte === FrameVersion.V0_5;
}

export interface BinaryEntry {
  fid: FieldId;
  tag: TypeTag;
  value: LnmpValue;
}

export interface BinaryFrame {
  version: FrameVersion;
  flags: number;
  entries: BinaryEntry[];
}

export function binaryEntry(f: LnmpField): BinaryEntry {
  return { fid: f.fid, tag: typeTagOf(f.value), value: f.value };
}

/** Fields of the frame, in frame order. */
export function frameToRecord(frame: BinaryFrame): LnmpRecord {
  return new LnmpRecord(frame.entries.map((e) => ({ fid: e.fid, value: e.value })));
}

export interface FrameHeader {
  version: FrameVersion;
  flags: number;
}

/** Version byte of a frame starting at `offset`, if the input reaches it. */
export function detectVersion(bytes: Uint8Array, offset = 0): number | undefined {
  return offset < bytes.length ? bytes[offset] : undefined;
}

/**
 * Reads VERSION and FLAGS; the entry count belongs to the record body.
 * An unknown version byte is reported before a missing flags byte.
 */
export function readFrameHeader(reader: FrameReader): FrameHeader {
  const version = detectVersion(reader.buffer, reader.position);
  if (version !== undefined && !isFrameVersion(version)) {
    throw BinaryError.unsupportedVersion(version, SUPPORTED_VERSIONS);
  }
  if (version === undefined || reader.remaining < 2) throw BinaryError.unexpectedEof(2, reader.remaining);
  reader.u8();
  const flags = reader.u8();
  return { version, flags };
}
