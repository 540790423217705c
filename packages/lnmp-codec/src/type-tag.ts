// Wire type tags. Keys match the `tag` of the value they introduce.

import type { LnmpValue } from "@lnmp/core";

export const TypeTag = {
  Int: 0x01,
  Float: 0x02,
  Bool: 0x03,
  String: 0x04,
  StringArray: 0x05,
  NestedRecord: 0x06,
  NestedArray: 0x07,
  Embedding: 0x08,
  HybridNumericArray: 0x09,
  EmbeddingDelta: 0x0a,
  QuantizedEmbedding: 0x0b,
  IntArray: 0x0c,
  FloatArray: 0x0d,
  BoolArray: 0x0e,
} as const;
export type TypeTag = (typeof TypeTag)[keyof typeof TypeTag];

const KNOWN = new Set<number>(Object.values(TypeTag));

export function isTypeTag(byte: number): byte is TypeTag {
  return KNOWN.has(byte);
}

export function typeTagOf(value: LnmpValue): TypeTag {
  return TypeTag[value.tag];
}

export function isNestedTag(tag: TypeTag): boolean {
  return tag === TypeTag.NestedRecord || tag === TypeTag.NestedArray;
}

export function typeTagName(tag: number): string {
  for (const [name, value] of Object.entries(TypeTag)) {
    if (value === tag) return name;
  }
  return `0x${tag.toString(16).padStart(2, "0")}`;
}
