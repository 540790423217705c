// LNMP value model.
//
// A value is a tagged union; `tag` names the variant and matches the
// wire type tag names one-to-one.

import type { LnmpRecord } from "./record.ts";
import type { HybridNumericArray } from "./hybrid.ts";

/** Field identifier, a u16 key unique within one record level. */
export type FieldId = number;

export const MAX_FID = 0xffff;

export function isValidFid(fid: number): boolean {
  return Number.isInteger(fid) && fid >= 0 && fid <= MAX_FID;
}

// ============================================================================
// Value variants
// ============================================================================

export interface IntValue {
  tag: "Int";
  /** Signed 64-bit integer. */
  value: bigint;
}

export interface FloatValue {
  tag: "Float";
  value: number;
}

export interface BoolValue {
  tag: "Bool";
  value: boolean;
}

export interface StringValue {
  tag: "String";
  value: string;
}

export interface StringArrayValue {
  tag: "StringArray";
  value: string[];
}

export interface IntArrayValue {
  tag: "IntArray";
  value: bigint[];
}

export interface FloatArrayValue {
  tag: "FloatArray";
  value: number[];
}

export interface BoolArrayValue {
  tag: "BoolArray";
  value: boolean[];
}

export interface NestedRecordValue {
  tag: "NestedRecord";
  value: LnmpRecord;
}

export interface NestedArrayValue {
  tag: "NestedArray";
  value: LnmpRecord[];
}

export interface HybridNumericArrayValue {
  tag: "HybridNumericArray";
  value: HybridNumericArray;
}

/**
 * Vector payloads produced elsewhere. The codec carries them as opaque bytes.
 */
export interface EmbeddingValue {
  tag: "Embedding";
  value: Uint8Array;
}

export interface EmbeddingDeltaValue {
  tag: "EmbeddingDelta";
  value: Uint8Array;
}

export interface QuantizedEmbeddingValue {
  tag: "QuantizedEmbedding";
  value: Uint8Array;
}

export type LnmpValue =
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | StringArrayValue
  | IntArrayValue
  | FloatArrayValue
  | BoolArrayValue
  | NestedRecordValue
  | NestedArrayValue
  | HybridNumericArrayValue
  | EmbeddingValue
  | EmbeddingDeltaValue
  | QuantizedEmbeddingValue;

export type ValueTag = LnmpValue["tag"];

export interface LnmpField {
  fid: FieldId;
  value: LnmpValue;
}

// ============================================================================
// Factory helpers
// ============================================================================

export function valueInt(value: bigint | number): IntValue {
  return { tag: "Int", value: BigInt(value) };
}

export function valueFloat(value: number): FloatValue {
  return { tag: "Float", value };
}

export function valueBool(value: boolean): BoolValue {
  return { tag: "Bool", value };
}

export function valueString(value: string): StringValue {
  return { tag: "String", value };
}

export function valueStringArray(value: string[]): StringArrayValue {
  return { tag: "StringArray", value };
}

export function valueIntArray(value: Array<bigint | number>): IntArrayValue {
  return { tag: "IntArray", value: value.map((v) => BigInt(v)) };
}

export function valueFloatArray(value: number[]): FloatArrayValue {
  return { tag: "FloatArray", value };
}

export function valueBoolArray(value: boolean[]): BoolArrayValue {
  return { tag: "BoolArray", value };
}

export function valueNestedRecord(value: LnmpRecord): NestedRecordValue {
  return { tag: "NestedRecord", value };
}

export function valueNestedArray(value: LnmpRecord[]): NestedArrayValue {
  return { tag: "NestedArray", value };
}

export function valueHybrid(value: HybridNumericArray): HybridNumericArrayValue {
  return { tag: "HybridNumericArray", value };
}

export function valueEmbedding(value: Uint8Array): EmbeddingValue {
  return { tag: "Embedding", value };
}

export function valueEmbeddingDelta(value: Uint8Array): EmbeddingDeltaValue {
  return { tag: "EmbeddingDelta", value };
}

export function valueQuantizedEmbedding(value: Uint8Array): QuantizedEmbeddingValue {
  return { tag: "QuantizedEmbedding", value };
}

export function field(fid: FieldId, value: LnmpValue): LnmpField {
  return { fid, value };
}

/** True for the variants that carry records. */
export function isNested(value: LnmpValue): value is NestedRecordValue | NestedArrayValue {
  return value.tag === "NestedRecord" || value.tag === "NestedArray";
}
