import {
  contiguousStrides,
  shapesEqual,
  sizeOf,
  tailShape,
} from "../core/shape";

export type DType =
  | "float16"
  | "float32"
  | "float64"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "bool";

export type SignalOptions = {
  name?: string;
  /** Defaults to float64. */
  dtype?: DType;
  /** Defaults to a vector covering `initialValue`. */
  shape?: number[];
  /** Flat row-major values; a single value is broadcast to the full shape. */
  initialValue?: number | number[];
  trainable?: boolean;
  minibatched?: boolean;
};

type ViewGeometry = {
  base: Signal;
  name: string;
  shape: number[];
  offset: number;
  strides: number[];
};

const INTEGER_DTYPES = new Set<DType>(["int8", "int16", "int32", "int64"]);

let anonymousCounter = 0;

/**
 * Handle to a region of state. A base signal owns its initial value; a view
 * addresses a strided region of its base's elements.
 */
export class Signal {
  readonly name: string;
  readonly dtype: DType;
  readonly shape: readonly number[];
  readonly trainable: boolean;
  readonly minibatched: boolean;
  readonly base: Signal;
  /** Element offset into the base. */
  readonly offset: number;
  /** Element strides into the base, one per axis of `shape`. */
  readonly strides: readonly number[];

  private readonly ownValue: readonly number[];
  private footprint: Set<number> | null = null;

  constructor(options: SignalOptions, view?: ViewGeometry) {
    if (view) {
      this.base = view.base;
      this.name = view.name;
      this.dtype = view.base.dtype;
      this.shape = view.shape;
      this.trainable = view.base.trainable;
      this.minibatched = view.base.minibatched;
      this.offset = view.offset;
      this.strides = view.strides;
      this.ownValue = [];
      return;
    }

    const raw = options.initialValue ?? 0;
    const values = typeof raw === "number" ? [raw] : raw.slice();
    const shape = options.shape ?? [values.length];
    const size = sizeOf(shape);
    if (values.length !== 1 && values.length !== size) {
      throw new Error(
        `signal initial value has ${values.length} element(s), expected 1 or ${size} for shape [${shape}]`,
      );
    }
    if (shape.some((dim) => !Number.isInteger(dim) || dim < 0)) {
      throw new Error(`signal shape [${shape}] must contain non-negative integers`);
    }
    const dtype = options.dtype ?? "float64";
    if (INTEGER_DTYPES.has(dtype)) {
      const bad = values.find((value) => !Number.isInteger(value));
      if (bad !== undefined) {
        throw new Error(`signal of dtype ${dtype} has non-integer initial value ${bad}`);
      }
    }

    this.base = this;
    this.name = options.name ?? `signal${anonymousCounter++}`;
    this.dtype = dtype;
    this.shape = shape.slice();
    this.trainable = options.trainable ?? false;
    this.minibatched = options.minibatched ?? false;
    this.offset = 0;
    this.strides = contiguousStrides(shape);
    this.ownValue = values;
  }

  get isView(): boolean {
    return this.base !== this;
  }

  get size(): number {
    return sizeOf(this.shape);
  }

  get ndim(): number {
    return this.shape.length;
  }

  /** Strides of length-1 axes never move the cursor, so they are not compared. */
  get isContiguous(): boolean {
    const expected = contiguousStrides(this.shape);
    return this.shape.every((dim, d) => dim <= 1 || this.strides[d] === expected[d]);
  }

  /**
   * Initial value as stored: for a base this may be a single broadcast
   * value, for a view it is always the full strided read of the base.
   */
  get initialValue(): readonly number[] {
    if (!this.isView) return this.ownValue;
    const source = this.base.initialValue;
    return this.elementIndices().map((idx) =>
      source.length === 1 ? source[0] : source[idx],
    );
  }

  /**
   * Flat element indices into the base, in row-major view order.
   */
  elementIndices(): number[] {
    const out: number[] = [];
    const shape = this.shape;
    const strides = this.strides;
    const count = this.size;
    const cursor = new Array<number>(shape.length).fill(0);
    for (let n = 0; n < count; n++) {
      let idx = this.offset;
      for (let d = 0; d < shape.length; d++) {
        idx += cursor[d] * strides[d];
      }
      out.push(idx);
      for (let d = shape.length - 1; d >= 0; d--) {
        cursor[d] += 1;
        if (cursor[d] < shape[d]) break;
        cursor[d] = 0;
      }
    }
    return out;
  }

  /**
   * True when both signals address at least one common base element.
   */
  mayShareMemory(other: Signal): boolean {
    if (this.base !== other.base) return false;
    if (!this.isView || !other.isView) return this.size > 0 && other.size > 0;
    const mine = this.getFootprint();
    for (const idx of other.getFootprint()) {
      if (mine.has(idx)) return true;
    }
    return false;
  }

  /**
   * Arbitrary strided view of this signal's base.
   */
  view(
    shape: number[],
    options: { offset?: number; strides?: number[]; name?: string } = {},
  ): Signal {
    if (this.isView) {
      throw new Error(`cannot take a strided view of view ${this.name}; view its base instead`);
    }
    const strides = options.strides ?? contiguousStrides(shape);
    if (strides.length !== shape.length) {
      throw new Error(
        `view strides [${strides}] do not match view shape [${shape}]`,
      );
    }
    const view = new Signal(
      {},
      {
        base: this,
        name: options.name ?? `${this.name}[view]`,
        shape: shape.slice(),
        offset: options.offset ?? 0,
        strides: strides.slice(),
      },
    );
    for (const idx of view.elementIndices()) {
      if (idx < 0 || idx >= this.size) {
        throw new Error(
          `view [${shape}] at offset ${view.offset} falls outside ${this.name} [${this.shape}]`,
        );
      }
    }
    return view;
  }

  reshape(shape: number[], name?: string): Signal {
    if (sizeOf(shape) !== this.size) {
      throw new Error(
        `cannot reshape ${this.name} [${this.shape}] to [${shape}]`,
      );
    }
    if (!this.isContiguous) {
      throw new Error(`cannot reshape non-contiguous view ${this.name}`);
    }
    return this.base.view(shape, {
      offset: this.offset,
      name: name ?? `${this.name}.reshape`,
    });
  }

  /**
   * Row slice `[start, stop)` with `step` along axis 0.
   */
  slice(start: number, stop: number, step = 1, name?: string): Signal {
    if (this.shape.length === 0) {
      throw new Error(`cannot slice scalar signal ${this.name}`);
    }
    if (step <= 0) {
      throw new Error(`slice step must be positive, got ${step}`);
    }
    const rows = Math.max(0, Math.ceil((stop - start) / step));
    const strides = this.strides.slice();
    strides[0] = this.strides[0] * step;
    return this.base.view([rows, ...tailShape(this.shape)], {
      offset: this.offset + start * this.strides[0],
      strides,
      name: name ?? `${this.name}[${start}:${stop}:${step}]`,
    });
  }

  toString(): string {
    return `Signal(${this.name}, [${this.shape}], ${this.dtype})`;
  }

  private getFootprint(): Set<number> {
    if (!this.footprint) {
      this.footprint = new Set(this.elementIndices());
    }
    return this.footprint;
  }
}

/**
 * Whether two signals can live in the same batch slot: their bases must be
 * combinable into one backing array and their display shapes must agree
 * beyond axis 0.
 */
export function signalsCompatible(a: Signal, b: Signal): boolean {
  return (
    a.dtype === b.dtype &&
    shapesEqual(tailShape(a.base.shape), tailShape(b.base.shape)) &&
    shapesEqual(tailShape(a.shape), tailShape(b.shape)) &&
    a.trainable === b.trainable &&
    a.minibatched === b.minibatched
  );
}
