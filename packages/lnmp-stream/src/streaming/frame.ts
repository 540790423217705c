// Streaming frame wire format.
//
// FRAME_TYPE(1) | FLAGS(1) | STREAM_ID(varint) | SEQUENCE(varint)
//   | PAYLOAD_LEN(varint) | PAYLOAD | CHECKSUM(4, BE, iff FLAGS & CHECKSUM)

import {
  ByteReadError,
  ByteReader,
  VarintError,
  concat,
  crc32,
  encodeU32BE,
  encodeVarint,
} from "@lnmp/binary";
import {
  FrameType,
  KNOWN_FLAGS,
  StreamFlags,
  StreamingError,
  isFrameType,
  type Sequence,
  type StreamId,
} from "./types.ts";

export interface StreamingFrame {
  type: FrameType;
  flags: number;
  streamId: StreamId;
  sequence: Sequence;
  payload: Uint8Array;
  /** Stored CRC-32, present iff the CHECKSUM flag is set. */
  checksum?: number;
}

export function hasFlag(frame: Pick<StreamingFrame, "flags">, flag: number): boolean {
  return (frame.flags & flag) !== 0;
}

/**
 * Serialize a frame. With the CHECKSUM flag set and no stored checksum,
 * the CRC-32 of the payload is written.
 */
export function encodeStreamingFrame(frame: StreamingFrame): Uint8Array {
  const parts = [
    Uint8Array.of(frame.type, frame.flags),
    encodeVarint(frame.streamId),
    encodeVarint(frame.sequence),
    encodeVarint(frame.payload.length),
    frame.payload,
  ];
  if (hasFlag(frame, StreamFlags.CHECKSUM)) parts.push(encodeU32BE(frame.checksum ?? crc32(frame.payload)));
  return concat(...parts);
}

function readFrame(reader: ByteReader): StreamingFrame {
  const type = reader.readByte();
  if (!isFrameType(type)) throw StreamingError.invalidFrameType(type);
  const flags = reader.readByte();
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw StreamingError.malformedFrame(`unknown flags 0x${flags.toString(16).padStart(2, "0")}`);
  }
  if ((flags & StreamFlags.COMPRESSED) !== 0) {
    throw StreamingError.malformedFrame("compressed payloads are not supported");
  }
  const streamId = reader.readVarint();
  const sequence = reader.readVarint();
  const payload = reader.borrow(reader.readVarintNumber());
  const frame: StreamingFrame = { type, flags, streamId, sequence, payload };
  if ((flags & StreamFlags.CHECKSUM) !== 0) frame.checksum = reader.readU32BE();
  return frame;
}

/**
 * Parse exactly one frame. The payload borrows from `bytes`.
 */
export function decodeStreamingFrame(bytes: Uint8Array): StreamingFrame {
  const reader = new ByteReader(bytes);
  let frame: StreamingFrame;
  try {
    frame = readFrame(reader);
  } catch (e) {
    if (e instanceof ByteReadError || e instanceof VarintError) throw StreamingError.malformedFrame(e.message);
    throw e;
  }
  if (reader.remaining > 0) throw StreamingError.malformedFrame(`${reader.remaining} trailing bytes`);
  return frame;
}

/** Computed CRC-32 of the payload, and whether it matches the stored one. */
export function verifyChecksum(frame: StreamingFrame): { ok: boolean; computed: number } {
  const computed = crc32(frame.payload);
  return { ok: frame.checksum === computed, computed };
}
