import { describe, expect, it } from "vitest";
import { allocateData, type BaseArray, rowSize, TensorSignal } from "../src";

function array(key: number): BaseArray {
  return {
    key,
    dtype: "float32",
    shape: [4, 2],
    data: allocateData("float32", [0, 1, 2, 3, 4, 5, 6, 7]),
    trainable: false,
    minibatched: false,
  };
}

describe("TensorSignal", () => {
  const sig = new TensorSignal([0, 1, 2, 3], 0, "float32", [4, 2], false, "m");

  it("gathers rows of its base array", () => {
    expect(rowSize(array(0))).toBe(2);
    expect(sig.gather(array(0))).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(sig.rows).toBe(4);
  });

  it("slices rows with a step", () => {
    const sliced = sig.sliceRows(1, 2, 2, "odd rows");
    expect(sliced.indices).toEqual([1, 3]);
    expect(sliced.shape).toEqual([2, 2]);
    expect(sliced.gather(array(0))).toEqual([2, 3, 6, 7]);
    expect(() => sig.sliceRows(2, 2, 2)).toThrow("row 4 is out of range");
  });

  it("reshapes without moving rows", () => {
    const flat = sig.reshape([8]);
    expect(flat.indices).toEqual(sig.indices);
    expect(flat.shape).toEqual([8]);
    expect(() => sig.reshape([3, 2])).toThrow("cannot reshape");
  });

  it("refuses to gather from another base array", () => {
    expect(() => sig.gather(array(1))).toThrow("indexes base array 0, got 1");
  });

  it("compares by key, rows and shape", () => {
    expect(sig.equals(new TensorSignal([0, 1, 2, 3], 0, "float32", [4, 2], false))).toBe(true);
    expect(sig.equals(new TensorSignal([0, 1, 2, 3], 1, "float32", [4, 2], false))).toBe(false);
    expect(sig.equals(sig.sliceRows(0, 1, 4).reshape([8]))).toBe(false);
  });
});
