// Structural limits applied to untrusted records before they are used.

import { encodeUtf8 } from "@lnmp/binary";
import { RecordError } from "./errors.ts";
import type { LnmpRecord } from "./record.ts";
import type { LnmpField } from "./types.ts";

export interface StructuralLimits {
  /** Deepest allowed nested record; a flat record has depth 0. */
  maxDepth: number;
  /** Total fields across all levels. */
  maxFields: number;
  /** Longest string, in UTF-8 bytes. */
  maxStringLength: number;
  /** Most items in any array value. */
  maxArrayItems: number;
}

export const DEFAULT_LIMITS: StructuralLimits = {
  maxDepth: 32,
  maxFields: 4096,
  maxStringLength: 16 * 1024,
  maxArrayItems: 1024,
};

export function resolveLimits(limits: Partial<StructuralLimits> = {}): StructuralLimits {
  return {
    maxDepth: limits.maxDepth ?? DEFAULT_LIMITS.maxDepth,
    maxFields: limits.maxFields ?? DEFAULT_LIMITS.maxFields,
    maxStringLength: limits.maxStringLength ?? DEFAULT_LIMITS.maxStringLength,
    maxArrayItems: limits.maxArrayItems ?? DEFAULT_LIMITS.maxArrayItems,
  };
}

/** Throws a RecordError for the first limit the record breaks. */
export function validateRecord(record: LnmpRecord, limits: Partial<StructuralLimits> = {}): void {
  const resolved = resolveLimits(limits);
  const counter = { fields: 0 };
  validateFields(record.fields, 0, resolved, counter);
}

function validateFields(
  fields: readonly LnmpField[],
  depth: number,
  limits: StructuralLimits,
  counter: { fields: number },
): void {
  if (depth > limits.maxDepth) throw RecordError.maxDepthExceeded(limits.maxDepth, depth);

  for (const f of fields) {
    counter.fields++;
    if (counter.fields > limits.maxFields) {
      throw RecordError.maxFieldsExceeded(limits.maxFields, counter.fields);
    }
    const v = f.value;
    switch (v.tag) {
      case "String":
        checkString(f.fid, v.value, limits);
        break;
      case "StringArray":
        checkItems(f.fid, v.value.length, limits);
        for (const s of v.value) checkString(f.fid, s, limits);
        break;
      case "IntArray":
      case "FloatArray":
      case "BoolArray":
        checkItems(f.fid, v.value.length, limits);
        break;
      case "HybridNumericArray":
        checkItems(f.fid, v.value.dim, limits);
        break;
      case "NestedRecord":
        validateFields(v.value.fields, depth + 1, limits, counter);
        break;
      case "NestedArray":
        checkItems(f.fid, v.value.length, limits);
        for (const r of v.value) validateFields(r.fields, depth + 1, limits, counter);
        break;
      default:
        break;
    }
  }
}

function checkString(fid: number, s: string, limits: StructuralLimits): void {
  // Cheap upper bound first: a UTF-16 code unit is at most 3 UTF-8 bytes.
  if (s.length * 3 <= limits.maxStringLength) return;
  const len = encodeUtf8(s).length;
  if (len > limits.maxStringLength) throw RecordError.maxStringLengthExceeded(fid, limits.maxStringLength, len);
}

function checkItems(fid: number, count: number, limits: StructuralLimits): void {
  if (count > limits.maxArrayItems) throw RecordError.maxArrayLengthExceeded(fid, limits.maxArrayItems, count);
}
