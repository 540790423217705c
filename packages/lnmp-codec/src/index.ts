// LNMP binary codec: canonical frames, zero-copy views, containers and deltas.

export { TypeTag, isTypeTag, typeTagOf, isNestedTag, typeTagName } from "./type-tag.ts";

export {
  BinaryError,
  type BinaryErrorDetails,
  type BinaryErrorKind,
  type DecodeOutcome,
} from "./error.ts";

export {
  MIN_ENTRY_BYTES,
  DEFAULT_MAX_DEPTH,
  HybridDTypeCode,
  HYBRID_SPARSE,
  type EntryEncodeOptions,
  type EntryDecodeOptions,
  canonicalFields,
  encodeEntry,
  decodeEntry,
} from "./entry.ts";

export {
  FrameVersion,
  SUPPORTED_VERSIONS,
  isFrameVersion,
  type BinaryEntry,
  type BinaryFrame,
  type FrameHeader,
  binaryEntry,
  frameToRecord,
  detectVersion,
} from "./frame.ts";

export { type RecordTextParser, type RecordTextEncoder, parseText, renderText } from "./text.ts";

export {
  type EncoderConfig,
  DEFAULT_ENCODER_CONFIG,
  resolveEncoderConfig,
  BinaryEncoder,
  encode,
} from "./encoder.ts";

export {
  type DecoderConfig,
  DEFAULT_DECODER_CONFIG,
  resolveDecoderConfig,
  BinaryDecoder,
  decode,
  tryDecode,
  decodeView,
} from "./decoder.ts";

export { type ValueView, type FieldView, RecordView, viewToValue } from "./view.ts";

export {
  CONTAINER_MAGIC,
  CONTAINER_VERSION,
  CONTAINER_HEADER_SIZE,
  ContainerMode,
  ContainerFlags,
  ContainerError,
  type ContainerErrorKind,
  type ContainerHeader,
  type ContainerFrame,
  type ContainerCodecs,
  type StreamMetadata,
  type DeltaMetadata,
  containerHeader,
  encodeContainerHeader,
  parseContainerHeader,
  parseContainer,
  encodeStreamMetadata,
  decodeStreamMetadata,
  encodeDeltaMetadata,
  decodeDeltaMetadata,
  decodeContainerRecord,
  ContainerBuilder,
} from "./container.ts";

export {
  DELTA_TAG,
  DeltaOperation,
  type DeltaOp,
  setField,
  deleteField,
  updateField,
  mergeRecord,
  computeDelta,
  applyDelta,
  encodeDelta,
  decodeDelta,
} from "./delta.ts";
