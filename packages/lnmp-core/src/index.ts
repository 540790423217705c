// LNMP record model

export {
  type FieldId,
  MAX_FID,
  isValidFid,
  type IntValue,
  type FloatValue,
  type BoolValue,
  type StringValue,
  type StringArrayValue,
  type IntArrayValue,
  type FloatArrayValue,
  type BoolArrayValue,
  type NestedRecordValue,
  type NestedArrayValue,
  type HybridNumericArrayValue,
  type EmbeddingValue,
  type EmbeddingDeltaValue,
  type QuantizedEmbeddingValue,
  type LnmpValue,
  type ValueTag,
  type LnmpField,
  valueInt,
  valueFloat,
  valueBool,
  valueString,
  valueStringArray,
  valueIntArray,
  valueFloatArray,
  valueBoolArray,
  valueNestedRecord,
  valueNestedArray,
  valueHybrid,
  valueEmbedding,
  valueEmbeddingDelta,
  valueQuantizedEmbedding,
  field,
  isNested,
} from "./types.ts";

export {
  HybridDType,
  type HybridNumericArray,
  type HybridElement,
  dtypeWidth,
  hybridDense,
  hybridSparse,
  hybridStoredCount,
  hybridValidate,
  hybridEntries,
  hybridToArray,
} from "./hybrid.ts";

export { LnmpRecord } from "./record.ts";
export { RecordBuilder } from "./builder.ts";
export { valuesEqual, recordsEqual, recordDepth, valueDepth } from "./equality.ts";
export { type StructuralLimits, DEFAULT_LIMITS, resolveLimits, validateRecord } from "./limits.ts";
export { RecordError, type RecordErrorKind } from "./errors.ts";
