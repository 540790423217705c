// Binary building blocks shared by the LNMP packages.

export {
  MAX_VARINT_BYTES,
  VarintError,
  type VarintErrorKind,
  type VarintOptions,
  encodeVarint,
  varintLength,
  decodeVarint,
  decodeVarintNumber,
  isInt64,
  zigzagEncode,
  zigzagDecode,
  encodeSignedVarint,
  decodeSignedVarint,
} from "./varint.ts";

export {
  ByteReadError,
  ByteReader,
  concat,
  bytesEqual,
  encodeUtf8,
  decodeUtf8,
  isValidUtf8,
  encodeString,
  encodeBytes,
} from "./bytes.ts";

export {
  type DecodeResult,
  encodeBool,
  encodeU16BE,
  encodeU32BE,
  encodeU64BE,
  encodeF64LE,
} from "./primitives.ts";

export { crc32, crc32Update } from "./crc32.ts";
