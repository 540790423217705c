import { describe, expect, it } from "vitest";
import {
  HybridDType,
  hybridDense,
  hybridEntries,
  hybridSparse,
  hybridStoredCount,
  hybridToArray,
  hybridValidate,
} from "./hybrid.ts";
import { RecordError } from "./errors.ts";

describe("hybrid numeric arrays", () => {
  it("packs dense i32 values little-endian", () => {
    const arr = hybridDense(HybridDType.I32, [1, -1]);
    expect(arr.dim).toBe(2);
    expect(arr.sparse).toBe(false);
    expect(arr.data).toEqual(Uint8Array.of(0x01, 0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff));
  });

  it("reads back dense f64 and i64 values", () => {
    expect(hybridToArray(hybridDense(HybridDType.F64, [1.5, -2]))).toEqual([1.5, -2]);
    expect(hybridToArray(hybridDense(HybridDType.I64, [5n, -1n]))).toEqual([5n, -1n]);
  });

  it("rejects values the dtype cannot hold", () => {
    expect(() => hybridDense(HybridDType.I32, [2 ** 31])).toThrow(RecordError);
    expect(() => hybridDense(HybridDType.I64, [0.5])).toThrow(RecordError);
  });

  it("expands sparse arrays with zero fill", () => {
    const arr = hybridSparse(HybridDType.F32, 10, [
      [2, 0.5],
      [7, 1],
    ]);
    expect(arr.data.length).toBe(16);
    expect(hybridStoredCount(arr)).toBe(2);
    expect(hybridEntries(arr)).toEqual([
      [2, 0.5],
      [7, 1],
    ]);
    const dense = hybridToArray(arr);
    expect(dense).toHaveLength(10);
    expect(dense[2]).toBe(0.5);
    expect(dense[7]).toBe(1);
    expect(dense[0]).toBe(0);
  });

  it("requires ascending in-range sparse indices", () => {
    expect(() =>
      hybridSparse(HybridDType.F64, 4, [
        [3, 1],
        [1, 1],
      ]),
    ).toThrow("sparse index 1 not ascending after 3");
    expect(() => hybridSparse(HybridDType.F64, 4, [[4, 1]])).toThrow("sparse index 4 out of range for dim 4");
  });

  it("describes a dense length mismatch", () => {
    expect(hybridValidate({ dtype: HybridDType.F64, sparse: false, dim: 1, data: new Uint8Array(3) })).toBe(
      "dense F64 data is 3 bytes, expected 8",
    );
    expect(hybridValidate(hybridDense(HybridDType.F32, [1, 2, 3]))).toBeUndefined();
  });
});
