// Chunked transport of one encoded payload.

export {
  type StreamId,
  type Sequence,
  FrameType,
  isFrameType,
  frameTypeName,
  StreamFlags,
  KNOWN_FLAGS,
  type StreamingConfig,
  DEFAULT_STREAMING_CONFIG,
  resolveStreamingConfig,
  EncoderState,
  DecoderState,
  type StreamEvent,
  type StreamingErrorKind,
  StreamingError,
} from "./types.ts";

export {
  type StreamingFrame,
  hasFlag,
  encodeStreamingFrame,
  decodeStreamingFrame,
  verifyChecksum,
} from "./frame.ts";

export { StreamingEncoder, type StreamingEncoderOptions } from "./encoder.ts";
export { StreamingDecoder, type StreamingDecoderOptions } from "./decoder.ts";
