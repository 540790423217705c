// Hybrid numeric arrays: fixed-dtype numeric vectors kept as raw
// little-endian bytes, in dense or sparse layout.
//
// Dense data is `dim` elements back to back. Sparse data is a run of
// (u32 LE index, element) pairs with strictly ascending indices.

import { isInt64 } from "@lnmp/binary";
import { RecordError } from "./errors.ts";

export const HybridDType = {
  I32: "I32",
  I64: "I64",
  F32: "F32",
  F64: "F64",
} as const;
export type HybridDType = (typeof HybridDType)[keyof typeof HybridDType];

export interface HybridNumericArray {
  dtype: HybridDType;
  sparse: boolean;
  /** Logical length of the vector. */
  dim: number;
  data: Uint8Array;
}

/** I64 elements are bigints; everything else is a number. */
export type HybridElement = number | bigint;

const SPARSE_INDEX_BYTES = 4;

export function dtypeWidth(dtype: HybridDType): 4 | 8 {
  return dtype === HybridDType.I32 || dtype === HybridDType.F32 ? 4 : 8;
}

function writeElement(view: DataView, offset: number, dtype: HybridDType, v: HybridElement): void {
  switch (dtype) {
    case HybridDType.I32: {
      const n = Number(v);
      if (!Number.isInteger(n) || n < -0x80000000 || n > 0x7fffffff) {
        throw RecordError.invalidValue(`${v} is not an i32`);
      }
      view.setInt32(offset, n, true);
      return;
    }
    case HybridDType.I64: {
      if (typeof v === "number" && !Number.isInteger(v)) {
        throw RecordError.invalidValue(`${v} is not an i64`);
      }
      const n = BigInt(v);
      if (!isInt64(n)) throw RecordError.invalidValue(`${v} is not an i64`);
      view.setBigInt64(offset, n, true);
      return;
    }
    case HybridDType.F32:
      view.setFloat32(offset, Number(v), true);
      return;
    case HybridDType.F64:
      view.setFloat64(offset, Number(v), true);
      return;
  }
}

function readElement(view: DataView, offset: number, dtype: HybridDType): HybridElement {
  switch (dtype) {
    case HybridDType.I32:
      return view.getInt32(offset, true);
    case HybridDType.I64:
      return view.getBigInt64(offset, true);
    case HybridDType.F32:
      return view.getFloat32(offset, true);
    case HybridDType.F64:
      return view.getFloat64(offset, true);
  }
}

function viewOf(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

export function hybridDense(dtype: HybridDType, values: readonly HybridElement[]): HybridNumericArray {
  const width = dtypeWidth(dtype);
  const data = new Uint8Array(values.length * width);
  const view = viewOf(data);
  values.forEach((v, i) => writeElement(view, i * width, dtype, v));
  return { dtype, sparse: false, dim: values.length, data };
}

export function hybridSparse(
  dtype: HybridDType,
  dim: number,
  entries: ReadonlyArray<readonly [number, HybridElement]>,
): HybridNumericArray {
  const width = dtypeWidth(dtype);
  const stride = SPARSE_INDEX_BYTES + width;
  const data = new Uint8Array(entries.length * stride);
  const view = viewOf(data);
  entries.forEach(([index, v], i) => {
    view.setUint32(i * stride, index, true);
    writeElement(view, i * stride + SPARSE_INDEX_BYTES, dtype, v);
  });
  const arr: HybridNumericArray = { dtype, sparse: true, dim, data };
  const problem = hybridValidate(arr);
  if (problem !== undefined) throw RecordError.invalidValue(problem);
  return arr;
}

/** Number of stored elements: `dim` when dense, the pair count when sparse. */
export function hybridStoredCount(arr: HybridNumericArray): number {
  const width = dtypeWidth(arr.dtype);
  return arr.sparse ? arr.data.length / (SPARSE_INDEX_BYTES + width) : arr.data.length / width;
}

/**
 * Returns a description of the first structural problem, or undefined
 * when the array is well formed.
 */
export function hybridValidate(arr: HybridNumericArray): string | undefined {
  if (!Number.isInteger(arr.dim) || arr.dim < 0 || arr.dim > 0xffffffff) {
    return `invalid dim ${arr.dim}`;
  }
  const width = dtypeWidth(arr.dtype);
  if (!arr.sparse) {
    if (arr.data.length !== arr.dim * width) {
      return `dense ${arr.dtype} data is ${arr.data.length} bytes, expected ${arr.dim * width}`;
    }
    return undefined;
  }
  const stride = SPARSE_INDEX_BYTES + width;
  if (arr.data.length % stride !== 0) {
    return `sparse ${arr.dtype} data length ${arr.data.length} is not a multiple of ${stride}`;
  }
  const view = viewOf(arr.data);
  let prev = -1;
  for (let off = 0; off < arr.data.length; off += stride) {
    const index = view.getUint32(off, true);
    if (index >= arr.dim) return `sparse index ${index} out of range for dim ${arr.dim}`;
    if (index <= prev) return `sparse index ${index} not ascending after ${prev}`;
    prev = index;
  }
  return undefined;
}

/** Stored (index, value) pairs in index order. */
export function hybridEntries(arr: HybridNumericArray): Array<[number, HybridElement]> {
  const width = dtypeWidth(arr.dtype);
  const view = viewOf(arr.data);
  const out: Array<[number, HybridElement]> = [];
  if (arr.sparse) {
    const stride = SPARSE_INDEX_BYTES + width;
    for (let off = 0; off + stride <= arr.data.length; off += stride) {
      out.push([view.getUint32(off, true), readElement(view, off + SPARSE_INDEX_BYTES, arr.dtype)]);
    }
  } else {
    for (let i = 0; (i + 1) * width <= arr.data.length; i++) {
      out.push([i, readElement(view, i * width, arr.dtype)]);
    }
  }
  return out;
}

/** Expands to `dim` elements, filling gaps of a sparse array with zero. */
export function hybridToArray(arr: HybridNumericArray): HybridElement[] {
  const zero: HybridElement = arr.dtype === HybridDType.I64 ? 0n : 0;
  const out: HybridElement[] = new Array<HybridElement>(arr.dim).fill(zero);
  for (const [index, v] of hybridEntries(arr)) {
    if (index < arr.dim) out[index] = v;
  }
  return out;
}
