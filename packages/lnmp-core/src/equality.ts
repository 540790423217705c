// Structural equality over values and records.

import { bytesEqual } from "@lnmp/binary";
import type { LnmpRecord } from "./record.ts";
import type { LnmpValue } from "./types.ts";

function arraysEqual<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!eq(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Deep equality. Floats compare with `Object.is`, so NaN equals NaN and
 * 0 differs from -0, matching what survives an encode/decode cycle.
 */
export function valuesEqual(a: LnmpValue, b: LnmpValue): boolean {
  switch (a.tag) {
    case "Int":
    case "Bool":
    case "String":
      return b.tag === a.tag && b.value === a.value;
    case "Float":
      return b.tag === "Float" && Object.is(a.value, b.value);
    case "StringArray":
      return b.tag === "StringArray" && arraysEqual(a.value, b.value, (x, y) => x === y);
    case "IntArray":
      return b.tag === "IntArray" && arraysEqual(a.value, b.value, (x, y) => x === y);
    case "FloatArray":
      return b.tag === "FloatArray" && arraysEqual(a.value, b.value, Object.is);
    case "BoolArray":
      return b.tag === "BoolArray" && arraysEqual(a.value, b.value, (x, y) => x === y);
    case "NestedRecord":
      return b.tag === "NestedRecord" && recordsEqual(a.value, b.value);
    case "NestedArray":
      return b.tag === "NestedArray" && arraysEqual(a.value, b.value, recordsEqual);
    case "HybridNumericArray":
      return (
        b.tag === "HybridNumericArray" &&
        a.value.dtype === b.value.dtype &&
        a.value.sparse === b.value.sparse &&
        a.value.dim === b.value.dim &&
        bytesEqual(a.value.data, b.value.data)
      );
    case "Embedding":
    case "EmbeddingDelta":
    case "QuantizedEmbedding":
      return b.tag === a.tag && bytesEqual(a.value, b.value);
  }
}

/**
 * Same FID→value mapping, ignoring insertion order.
 */
export function recordsEqual(a: LnmpRecord, b: LnmpRecord): boolean {
  if (a.size !== b.size) return false;
  const left = a.sortedFields();
  const right = b.sortedFields();
  for (let i = 0; i < left.length; i++) {
    if (left[i].fid !== right[i].fid) return false;
    if (!valuesEqual(left[i].value, right[i].value)) return false;
  }
  return true;
}

/** Nesting depth of a record: 0 when no field holds a record. */
export function recordDepth(record: LnmpRecord): number {
  let depth = 0;
  for (const f of record.fields) depth = Math.max(depth, valueDepth(f.value));
  return depth;
}

export function valueDepth(value: LnmpValue): number {
  if (value.tag === "NestedRecord") return 1 + recordDepth(value.value);
  if (value.tag === "NestedArray") {
    return 1 + value.value.reduce((d, r) => Math.max(d, recordDepth(r)), 0);
  }
  return 0;
}
