// Streaming type definitions

/** Stream ID type (matches wire format). */
export type StreamId = bigint;

/** Frame sequence number; BEGIN is 0. */
export type Sequence = bigint;

export const FrameType = {
  Begin: 0x00,
  Chunk: 0x01,
  End: 0x02,
  Error: 0x03,
} as const;
export type FrameType = (typeof FrameType)[keyof typeof FrameType];

export function isFrameType(byte: number): byte is FrameType {
  return byte >= FrameType.Begin && byte <= FrameType.Error;
}

export function frameTypeName(type: FrameType): string {
  switch (type) {
    case FrameType.Begin:
      return "BEGIN";
    case FrameType.Chunk:
      return "CHUNK";
    case FrameType.End:
      return "END";
    case FrameType.Error:
      return "ERROR";
  }
}

export const StreamFlags = {
  /** More CHUNK frames follow. */
  HAS_MORE: 0x01,
  /** Reserved; never set by this layer and rejected on receipt. */
  COMPRESSED: 0x02,
  /** A CRC-32 of the payload follows it. */
  CHECKSUM: 0x04,
} as const;

export const KNOWN_FLAGS = StreamFlags.HAS_MORE | StreamFlags.COMPRESSED | StreamFlags.CHECKSUM;

export interface StreamingConfig {
  /** Largest payload one CHUNK frame may carry. */
  chunkSize: number;
  /** Append a CRC-32 to CHUNK frames, and require one on receipt. */
  enableChecksums: boolean;
  streamId: StreamId;
  /** Upper bound on a reassembled payload, in bytes. */
  maxPayloadSize: number;
}

export const DEFAULT_STREAMING_CONFIG: Readonly<StreamingConfig> = {
  chunkSize: 4096,
  enableChecksums: true,
  streamId: 1n,
  maxPayloadSize: 16 * 1024 * 1024,
};

export function resolveStreamingConfig(config: Partial<StreamingConfig> = {}): StreamingConfig {
  const resolved: StreamingConfig = {
    chunkSize: config.chunkSize ?? DEFAULT_STREAMING_CONFIG.chunkSize,
    enableChecksums: config.enableChecksums ?? DEFAULT_STREAMING_CONFIG.enableChecksums,
    streamId: config.streamId ?? DEFAULT_STREAMING_CONFIG.streamId,
    maxPayloadSize: config.maxPayloadSize ?? DEFAULT_STREAMING_CONFIG.maxPayloadSize,
  };
  if (!Number.isInteger(resolved.chunkSize) || resolved.chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${resolved.chunkSize}`);
  }
  if (resolved.streamId < 0n || resolved.streamId >= 1n << 64n) {
    throw new RangeError(`streamId must fit in a u64, got ${resolved.streamId}`);
  }
  return resolved;
}

export const EncoderState = {
  Idle: "idle",
  Started: "started",
  Streaming: "streaming",
  Ended: "ended",
  Errored: "errored",
} as const;
export type EncoderState = (typeof EncoderState)[keyof typeof EncoderState];

export const DecoderState = {
  WaitingBegin: "waitingBegin",
  Accumulating: "accumulating",
  Complete: "complete",
  Errored: "errored",
} as const;
export type DecoderState = (typeof DecoderState)[keyof typeof DecoderState];

/** What one `feedFrame` call observed. */
export type StreamEvent =
  | { tag: "StreamStarted"; streamId: StreamId }
  | { tag: "ChunkReceived"; streamId: StreamId; sequence: Sequence; bytes: Uint8Array }
  | { tag: "StreamComplete"; streamId: StreamId; totalBytes: number }
  | { tag: "StreamError"; streamId: StreamId; message: string };

export type StreamingErrorKind =
  | "invalidFrameType"
  | "checksumMismatch"
  | "unexpectedFrame"
  | "outOfOrder"
  | "streamMismatch"
  | "notStarted"
  | "alreadyComplete"
  | "errored"
  | "chunkSizeExceeded"
  | "payloadTooLarge"
  | "malformedFrame"
  | "checksumMissing";

/** Error types for streaming operations. */
export class StreamingError extends Error {
  constructor(
    public kind: StreamingErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "StreamingError";
  }

  static invalidFrameType(byte: number): StreamingError {
    return new StreamingError("invalidFrameType", `invalid frame type 0x${byte.toString(16).padStart(2, "0")}`);
  }

  static checksumMismatch(sequence: Sequence, expected: number, actual: number): StreamingError {
    return new StreamingError(
      "checksumMismatch",
      `checksum mismatch in frame ${sequence}: stored 0x${expected.toString(16).padStart(8, "0")}, computed 0x${actual.toString(16).padStart(8, "0")}`,
    );
  }

  static unexpectedFrame(type: FrameType, state: string): StreamingError {
    return new StreamingError("unexpectedFrame", `unexpected ${frameTypeName(type)} frame in state ${state}`);
  }

  static outOfOrder(expected: Sequence, found: Sequence): StreamingError {
    return new StreamingError("outOfOrder", `expected sequence ${expected}, got ${found}`);
  }

  static streamMismatch(expected: StreamId, found: StreamId): StreamingError {
    return new StreamingError("streamMismatch", `frame for stream ${found} on stream ${expected}`);
  }

  static notStarted(): StreamingError {
    return new StreamingError("notStarted", "stream not started");
  }

  static alreadyComplete(): StreamingError {
    return new StreamingError("alreadyComplete", "stream already complete");
  }

  static errored(): StreamingError {
    return new StreamingError("errored", "stream is in the errored state");
  }

  static chunkSizeExceeded(size: number, max: number): StreamingError {
    return new StreamingError("chunkSizeExceeded", `chunk of ${size} bytes exceeds chunk size ${max}`);
  }

  static payloadTooLarge(size: number, max: number): StreamingError {
    return new StreamingError("payloadTooLarge", `payload of ${size} bytes exceeds maximum ${max}`);
  }

  static malformedFrame(reason: string): StreamingError {
    return new StreamingError("malformedFrame", `malformed frame: ${reason}`);
  }

  static checksumMissing(sequence: Sequence): StreamingError {
    return new StreamingError("checksumMissing", `frame ${sequence} carries no checksum`);
  }
}
