// `.lnmp` container: a 12-byte header, optional metadata, then the payload.
//
// Header: MAGIC("LNMP") | VERSION(1) | MODE(1) | FLAGS(2, BE) | METADATA_LEN(4, BE)

import { ByteReader, concat, decodeUtf8, encodeU32BE, encodeU64BE, encodeUtf8 } from "@lnmp/binary";
import type { LnmpRecord } from "@lnmp/core";
import { BinaryDecoder } from "./decoder.ts";
import { BinaryEncoder } from "./encoder.ts";
import { parseText, renderText, type RecordTextEncoder, type RecordTextParser } from "./text.ts";

export const CONTAINER_MAGIC = Uint8Array.of(0x4c, 0x4e, 0x4d, 0x50); // "LNMP"
export const CONTAINER_VERSION = 1;
export const CONTAINER_HEADER_SIZE = 12;

export const ContainerMode = {
  Text: 0x01,
  Binary: 0x02,
  Stream: 0x03,
  Delta: 0x04,
  QuantumSafe: 0x05,
  Embedding: 0x06,
} as const;
export type ContainerMode = (typeof ContainerMode)[keyof typeof ContainerMode];

export const ContainerFlags = {
  CHECKSUM_REQUIRED: 0x0001,
  COMPRESSED: 0x0002,
  ENCRYPTED: 0x0004,
  QSIG: 0x0008,
  QKEX: 0x0010,
  EXT_META_BLOCK: 0x8000,
} as const;

/** Flags a version 1 writer may set. */
const V1_WRITABLE_FLAGS = ContainerFlags.CHECKSUM_REQUIRED;

const STREAM_METADATA_SIZE = 6;
const DELTA_METADATA_SIZE = 10;

export type ContainerErrorKind =
  | "truncatedHeader"
  | "invalidMagic"
  | "unsupportedVersion"
  | "unknownMode"
  | "reservedFlags"
  | "truncatedMetadata"
  | "invalidMetadataLength"
  | "invalidMetadataValue"
  | "metadataTooLarge"
  | "unsupportedMode";

export class ContainerError extends Error {
  constructor(
    public kind: ContainerErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ContainerError";
  }

  static truncatedHeader(length: number): ContainerError {
    return new ContainerError("truncatedHeader", `LNMP header is truncated: ${length} of ${CONTAINER_HEADER_SIZE} bytes`);
  }

  static invalidMagic(): ContainerError {
    return new ContainerError("invalidMagic", "LNMP magic does not match");
  }

  static unsupportedVersion(version: number): ContainerError {
    return new ContainerError("unsupportedVersion", `LNMP header version ${version} is not supported`);
  }

  static unknownMode(mode: number): ContainerError {
    return new ContainerError("unknownMode", `LNMP mode 0x${mode.toString(16).padStart(2, "0")} is not recognized`);
  }

  static reservedFlags(flags: number): ContainerError {
    return new ContainerError("reservedFlags", `flags 0x${flags.toString(16).padStart(4, "0")} are not allowed in version 1`);
  }

  static truncatedMetadata(expected: number, actual: number): ContainerError {
    return new ContainerError("truncatedMetadata", `metadata truncated: expected ${expected} bytes, got ${actual}`);
  }

  static invalidMetadataLength(mode: ContainerMode, expected: number, actual: number): ContainerError {
    return new ContainerError(
      "invalidMetadataLength",
      `mode 0x${mode.toString(16).padStart(2, "0")} needs ${expected} metadata bytes, got ${actual}`,
    );
  }

  static invalidMetadataValue(fieldName: string, value: number): ContainerError {
    return new ContainerError("invalidMetadataValue", `invalid ${fieldName} 0x${value.toString(16).padStart(2, "0")}`);
  }

  static metadataTooLarge(length: number): ContainerError {
    return new ContainerError("metadataTooLarge", `metadata of ${length} bytes does not fit a u32 length`);
  }

  static unsupportedMode(mode: ContainerMode): ContainerError {
    return new ContainerError("unsupportedMode", `mode 0x${mode.toString(16).padStart(2, "0")} cannot carry a record here`);
  }
}

function isContainerMode(byte: number): byte is ContainerMode {
  return byte >= ContainerMode.Text && byte <= ContainerMode.Embedding;
}

// ============================================================================
// Header
// ============================================================================

export interface ContainerHeader {
  version: number;
  mode: ContainerMode;
  flags: number;
  metadataLength: number;
}

export function containerHeader(mode: ContainerMode): ContainerHeader {
  return { version: CONTAINER_VERSION, mode, flags: 0, metadataLength: 0 };
}

export function encodeContainerHeader(header: ContainerHeader): Uint8Array {
  const out = new Uint8Array(CONTAINER_HEADER_SIZE);
  out.set(CONTAINER_MAGIC, 0);
  out[4] = header.version;
  out[5] = header.mode;
  out[6] = (header.flags >>> 8) & 0xff;
  out[7] = header.flags & 0xff;
  out.set(encodeU32BE(header.metadataLength), 8);
  return out;
}

export function parseContainerHeader(bytes: Uint8Array): ContainerHeader {
  if (bytes.length < CONTAINER_HEADER_SIZE) throw ContainerError.truncatedHeader(bytes.length);
  for (let i = 0; i < CONTAINER_MAGIC.length; i++) {
    if (bytes[i] !== CONTAINER_MAGIC[i]) throw ContainerError.invalidMagic();
  }
  const reader = new ByteReader(bytes, 4);
  const version = reader.readByte();
  if (version !== CONTAINER_VERSION) throw ContainerError.unsupportedVersion(version);
  const mode = reader.readByte();
  if (!isContainerMode(mode)) throw ContainerError.unknownMode(mode);
  const flags = reader.readU16BE();
  const metadataLength = reader.readU32BE();
  return { version, mode, flags, metadataLength };
}

// ============================================================================
// Metadata
// ============================================================================

/** Metadata for mode Stream. */
export interface StreamMetadata {
  chunkSize: number;
  checksumType: number;
  flags: number;
}

/** Metadata for mode Delta. */
export interface DeltaMetadata {
  baseSnapshot: bigint;
  algorithm: number;
  compression: number;
}

export function encodeStreamMetadata(meta: StreamMetadata): Uint8Array {
  return concat(encodeU32BE(meta.chunkSize), Uint8Array.of(meta.checksumType & 0xff, meta.flags & 0xff));
}

export function decodeStreamMetadata(bytes: Uint8Array): StreamMetadata {
  if (bytes.length < STREAM_METADATA_SIZE) throw ContainerError.truncatedMetadata(STREAM_METADATA_SIZE, bytes.length);
  const reader = new ByteReader(bytes);
  return { chunkSize: reader.readU32BE(), checksumType: reader.readByte(), flags: reader.readByte() };
}

export function encodeDeltaMetadata(meta: DeltaMetadata): Uint8Array {
  return concat(encodeU64BE(meta.baseSnapshot), Uint8Array.of(meta.algorithm & 0xff, meta.compression & 0xff));
}

export function decodeDeltaMetadata(bytes: Uint8Array): DeltaMetadata {
  if (bytes.length < DELTA_METADATA_SIZE) throw ContainerError.truncatedMetadata(DELTA_METADATA_SIZE, bytes.length);
  const reader = new ByteReader(bytes);
  return { baseSnapshot: reader.readU64BE(), algorithm: reader.readByte(), compression: reader.readByte() };
}

function validateMetadata(mode: ContainerMode, metadata: Uint8Array): void {
  if (mode === ContainerMode.Stream && metadata.length !== STREAM_METADATA_SIZE) {
    throw ContainerError.invalidMetadataLength(mode, STREAM_METADATA_SIZE, metadata.length);
  }
  if (mode === ContainerMode.Delta) {
    if (metadata.length !== DELTA_METADATA_SIZE) {
      throw ContainerError.invalidMetadataLength(mode, DELTA_METADATA_SIZE, metadata.length);
    }
    const { algorithm, compression } = decodeDeltaMetadata(metadata);
    if (algorithm > 1) throw ContainerError.invalidMetadataValue("algorithm", algorithm);
    if (compression > 1) throw ContainerError.invalidMetadataValue("compression", compression);
  }
}

// ============================================================================
// Whole container
// ============================================================================

export interface ContainerFrame {
  header: ContainerHeader;
  /** Borrowed from the input. */
  metadata: Uint8Array;
  /** Borrowed from the input. */
  payload: Uint8Array;
}

export function parseContainer(bytes: Uint8Array): ContainerFrame {
  const header = parseContainerHeader(bytes);
  const available = bytes.length - CONTAINER_HEADER_SIZE;
  if (available < header.metadataLength) throw ContainerError.truncatedMetadata(header.metadataLength, available);
  const metadataEnd = CONTAINER_HEADER_SIZE + header.metadataLength;
  const metadata = bytes.subarray(CONTAINER_HEADER_SIZE, metadataEnd);
  validateMetadata(header.mode, metadata);
  return { header, metadata, payload: bytes.subarray(metadataEnd) };
}

export interface ContainerCodecs {
  decoder?: BinaryDecoder;
  encoder?: BinaryEncoder;
  textParser?: RecordTextParser;
  textEncoder?: RecordTextEncoder;
}

/** Decode the record in a Binary or Text container. */
export function decodeContainerRecord(frame: ContainerFrame, codecs: ContainerCodecs = {}): LnmpRecord {
  switch (frame.header.mode) {
    case ContainerMode.Binary:
      return (codecs.decoder ?? new BinaryDecoder()).decode(frame.payload);
    case ContainerMode.Text:
      if (codecs.textParser === undefined) throw ContainerError.unsupportedMode(frame.header.mode);
      return parseText(decodeUtf8(frame.payload), codecs.textParser);
    default:
      throw ContainerError.unsupportedMode(frame.header.mode);
  }
}

/**
 * @example
 * ```typescript
 * const file = new ContainerBuilder(ContainerMode.Binary).encodeRecord(record);
 * ```
 */
export class ContainerBuilder {
  private header: ContainerHeader;
  private metadata: Uint8Array = new Uint8Array(0);

  constructor(mode: ContainerMode) {
    this.header = containerHeader(mode);
  }

  withFlags(flags: number): this {
    this.header = { ...this.header, flags };
    return this;
  }

  withMetadata(metadata: Uint8Array): this {
    if (metadata.length > 0xffffffff) throw ContainerError.metadataTooLarge(metadata.length);
    this.metadata = metadata;
    this.header = { ...this.header, metadataLength: metadata.length };
    return this;
  }

  /** Attach stream metadata and switch to mode Stream. */
  withStreamMetadata(meta: StreamMetadata): this {
    this.header = { ...this.header, mode: ContainerMode.Stream };
    return this.withMetadata(encodeStreamMetadata(meta));
  }

  /** Attach delta metadata and switch to mode Delta. */
  withDeltaMetadata(meta: DeltaMetadata): this {
    this.header = { ...this.header, mode: ContainerMode.Delta };
    return this.withMetadata(encodeDeltaMetadata(meta));
  }

  get currentHeader(): ContainerHeader {
    return this.header;
  }

  wrapPayload(payload: Uint8Array): Uint8Array {
    const reserved = this.header.flags & ~V1_WRITABLE_FLAGS;
    if (reserved !== 0) throw ContainerError.reservedFlags(reserved);
    validateMetadata(this.header.mode, this.metadata);
    return concat(encodeContainerHeader(this.header), this.metadata, payload);
  }

  encodeRecord(record: LnmpRecord, codecs: ContainerCodecs = {}): Uint8Array {
    switch (this.header.mode) {
      case ContainerMode.Binary:
        return this.wrapPayload((codecs.encoder ?? new BinaryEncoder()).encode(record));
      case ContainerMode.Text:
        if (codecs.textEncoder === undefined) throw ContainerError.unsupportedMode(this.header.mode);
        return this.wrapPayload(encodeUtf8(renderText(record, codecs.textEncoder)));
      default:
        throw ContainerError.unsupportedMode(this.header.mode);
    }
  }
}
