import { shapesEqual, sizeOf, tailShape } from "../core/shape";

/**
 * Identifier of a backing array, minted per layout build.
 */
export type LayoutKey = number;

/**
 * Storage dtypes: floats collapse to the configured simulation precision,
 * integers to int32.
 */
export type LayoutDType = "float32" | "float64" | "int32";

export type BaseArrayData = Float32Array | Float64Array | Int32Array;

/**
 * One contiguous buffer holding the concatenated initial values of every
 * base signal assigned to it. Rows run along axis 0; minibatched arrays
 * carry the minibatch as a trailing axis.
 */
export interface BaseArray {
  key: LayoutKey;
  dtype: LayoutDType;
  shape: number[];
  data: BaseArrayData;
  trainable: boolean;
  minibatched: boolean;
}

/** Elements per row of a base array. */
export function rowSize(array: BaseArray): number {
  return sizeOf(tailShape(array.shape));
}

export function allocateData(dtype: LayoutDType, values: number[]): BaseArrayData {
  switch (dtype) {
    case "float32":
      return Float32Array.from(values);
    case "float64":
      return Float64Array.from(values);
    case "int32":
      return Int32Array.from(values);
  }
}

/**
 * Compiled view of a signal: rows `indices` of base array `key`, presented
 * with `shape`.
 */
export class TensorSignal {
  constructor(
    readonly indices: readonly number[],
    readonly key: LayoutKey,
    readonly dtype: LayoutDType,
    readonly shape: readonly number[],
    readonly minibatched: boolean,
    readonly label = "TensorSignal",
  ) {}

  get rows(): number {
    return this.indices.length;
  }

  /**
   * Same rows under a new shape with the same element count.
   */
  reshape(shape: readonly number[], label = this.label): TensorSignal {
    if (sizeOf(shape) !== sizeOf(this.shape)) {
      throw new Error(
        `cannot reshape TensorSignal ${this.label} [${this.shape}] to [${shape}]`,
      );
    }
    return new TensorSignal(
      this.indices,
      this.key,
      this.dtype,
      shape.slice(),
      this.minibatched,
      label,
    );
  }

  /**
   * Rows `start, start + step, ...` (`count` of them).
   */
  sliceRows(
    start: number,
    step: number,
    count: number,
    label = this.label,
  ): TensorSignal {
    const indices: number[] = [];
    for (let k = 0; k < count; k++) {
      const row = start + k * step;
      if (row < 0 || row >= this.indices.length) {
        throw new Error(
          `row ${row} is out of range for TensorSignal ${this.label} with ${this.indices.length} row(s)`,
        );
      }
      indices.push(this.indices[row]);
    }
    return new TensorSignal(
      indices,
      this.key,
      this.dtype,
      [count, ...tailShape(this.shape)],
      this.minibatched,
      label,
    );
  }

  /**
   * Flat values of the addressed rows, minibatch axis included.
   */
  gather(array: BaseArray): number[] {
    if (array.key !== this.key) {
      throw new Error(
        `TensorSignal ${this.label} indexes base array ${this.key}, got ${array.key}`,
      );
    }
    const width = rowSize(array);
    const out: number[] = [];
    for (const row of this.indices) {
      for (let j = 0; j < width; j++) {
        out.push(array.data[row * width + j]);
      }
    }
    return out;
  }

  equals(other: TensorSignal): boolean {
    return (
      this.key === other.key &&
      this.dtype === other.dtype &&
      this.minibatched === other.minibatched &&
      shapesEqual(this.shape, other.shape) &&
      shapesEqual(this.indices, other.indices)
    );
  }

  toString(): string {
    return `TensorSignal(${this.label}, key=${this.key}, rows=[${this.indices}], shape=[${this.shape}])`;
  }
}
