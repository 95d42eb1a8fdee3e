/**
 * Memory Layout Builder
 *
 * Packs base signals, in signal order, into a few contiguous backing arrays
 * keyed by (dtype, tail shape, trainable, minibatched), and compiles every
 * signal into a TensorSignal that addresses rows of one of them. View
 * signals reuse their base's rows (reshape) or a strided subset (slice).
 */

import {
  contiguousStrides,
  leadingDim,
  normalizeShape,
  shapesEqual,
  sizeOf,
  tailShape,
} from "../core/shape";
import { allSignals } from "../graph/operator";
import type { DType, Signal } from "../graph/signal";
import { debugLog } from "./debug-log";
import { LayoutConsistencyError, UnsupportedSignalError } from "./errors";
import type { Plan } from "./planner";
import {
  allocateData,
  type BaseArray,
  type LayoutDType,
  type LayoutKey,
  TensorSignal,
} from "./tensor-signal";

export type FloatType = "float32" | "float64";

export type MemoryLayoutOptions = {
  /** Precision for every floating point signal. Default: float32 */
  floatType?: FloatType;
  /** Length of the trailing axis added to minibatched signals. Default: 1 */
  minibatchSize?: number;
};

export interface MemoryLayout {
  baseArrays: Map<LayoutKey, BaseArray>;
  signalMap: Map<Signal, TensorSignal>;
  minibatchSize: number;
}

type PendingArray = {
  dtype: LayoutDType;
  tail: number[];
  trainable: boolean;
  minibatched: boolean;
  chunks: number[][];
  rows: number;
};

const RTOL = 1e-5;
const ATOL = 1e-8;

// ============================================================================
// Value Utilities
// ============================================================================

/**
 * Storage dtype for a signal dtype.
 * @throws UnsupportedSignalError for anything but 32/64-bit floats and ints.
 */
export function layoutDType(dtype: DType, floatType: FloatType): LayoutDType {
  switch (dtype) {
    case "float32":
    case "float64":
      return floatType;
    case "int32":
    case "int64":
      return "int32";
    default:
      throw new UnsupportedSignalError(`unsupported signal dtype ${dtype}`);
  }
}

/**
 * Repeat `values` cyclically to `size` elements.
 */
export function broadcastValues(values: readonly number[], size: number): number[] {
  if (values.length === size) return values.slice();
  if (values.length === 0) {
    throw new Error(`cannot broadcast an empty value to ${size} element(s)`);
  }
  const out = new Array<number>(size);
  for (let i = 0; i < size; i++) {
    out[i] = values[i % values.length];
  }
  return out;
}

/**
 * Repeat each element `minibatchSize` times along a new trailing axis.
 */
export function tileMinibatch(values: readonly number[], minibatchSize: number): number[] {
  const out: number[] = [];
  for (const value of values) {
    for (let m = 0; m < minibatchSize; m++) {
      out.push(value);
    }
  }
  return out;
}

function isClose(actual: number, expected: number): boolean {
  if (Number.isNaN(actual) || Number.isNaN(expected)) return false;
  return Math.abs(actual - expected) <= ATOL + RTOL * Math.abs(expected);
}

// ============================================================================
// Partitioning
// ============================================================================

/**
 * Points in the signal order where no group's read or write span is open.
 * Signals on either side of a break never need to share a backing array.
 *
 * Reset groups are ignored: one large reset block would otherwise span most
 * of the order.
 *
 * @returns positions `i + 1` for every index `i` that closes all spans
 */
export function findPartitionBreaks(
  signals: readonly Signal[],
  plan: Plan,
): number[] {
  const positions = new Map<Signal, number>();
  signals.forEach((sig, i) => positions.set(sig, i));
  const positionOf = (sig: Signal): number => {
    const pos = positions.get(sig.base);
    if (pos === undefined) {
      throw new Error(`memory layout: base signal ${sig.base.name} is not in the signal order`);
    }
    return pos;
  };

  const diff = new Map<Signal, number>();
  const bump = (sig: Signal, delta: number): void => {
    diff.set(sig, (diff.get(sig) ?? 0) + delta);
  };

  for (const group of plan) {
    if (group[0].kind === "reset") continue;
    const slots = allSignals(group[0]).length;
    for (let slot = 0; slot < slots; slot++) {
      const bases = group.map((op) => allSignals(op)[slot].base);
      let first = bases[0];
      let last = bases[0];
      for (const sig of bases) {
        if (positionOf(sig) < positionOf(first)) first = sig;
        if (positionOf(sig) > positionOf(last)) last = sig;
      }
      bump(first, 1);
      bump(last, -1);
    }
  }

  const breaks: number[] = [];
  let open = 0;
  signals.forEach((sig, i) => {
    open += diff.get(sig) ?? 0;
    if (open === 0) {
      breaks.push(i + 1);
    }
  });
  return breaks;
}

// ============================================================================
// Layout
// ============================================================================

function arrayParamsKey(
  dtype: LayoutDType,
  shape: readonly number[],
  sig: Signal,
): string {
  return `${dtype}|${tailShape(shape).join("x")}|${sig.trainable}|${sig.minibatched}`;
}

function viewDescriptor(sig: Signal, base: TensorSignal): TensorSignal {
  const shape = normalizeShape(sig.shape);

  if (sig.size === sig.base.size) {
    if (sig.offset !== 0 || !sig.isContiguous) {
      throw new UnsupportedSignalError(
        `view ${sig.name} permutes the elements of ${sig.base.name}; only reshapes of a whole base are supported`,
      );
    }
    return base.reshape(shape, sig.name);
  }

  const baseTail = tailShape(sig.base.shape);
  if (!shapesEqual(tailShape(sig.shape), baseTail)) {
    throw new UnsupportedSignalError(
      `view ${sig.name} both slices and reshapes ${sig.base.name}, which is not supported`,
    );
  }

  const rowElems = sizeOf(baseTail);
  const innerStrides = sig.strides.slice(1);
  if (!shapesEqual(innerStrides, contiguousStrides(sig.base.shape).slice(1))) {
    throw new UnsupportedSignalError(
      `view ${sig.name} is strided within rows of ${sig.base.name}`,
    );
  }
  const rowStride = sig.ndim === 0 ? rowElems : sig.strides[0];
  if (sig.offset % rowElems !== 0 || rowStride % rowElems !== 0) {
    throw new UnsupportedSignalError(
      `view ${sig.name} does not start and step on whole rows of ${sig.base.name}`,
    );
  }

  const start = sig.offset / rowElems;
  const step = rowStride / rowElems;
  return base.sliceRows(start, step, leadingDim(sig.shape), sig.name);
}

function checkLayout(layout: MemoryLayout): void {
  for (const [sig, tensorSig] of layout.signalMap) {
    const expectedShape = normalizeShape(sig.shape);
    if (!shapesEqual(tensorSig.shape, expectedShape)) {
      throw new LayoutConsistencyError(
        `TensorSignal shape [${tensorSig.shape}] does not match Signal ${sig.name} shape [${expectedShape}]`,
      );
    }

    const array = layout.baseArrays.get(tensorSig.key);
    if (!array) {
      throw new LayoutConsistencyError(
        `TensorSignal ${tensorSig.label} refers to missing base array ${tensorSig.key}`,
      );
    }
    const actual = tensorSig.gather(array);
    const expected = broadcastValues(sig.initialValue, sig.size);
    const tile = sig.minibatched ? layout.minibatchSize : 1;
    if (actual.length !== expected.length * tile) {
      throw new LayoutConsistencyError(
        `TensorSignal ${tensorSig.label} holds ${actual.length} value(s), Signal ${sig.name} has ${expected.length * tile}`,
      );
    }
    for (let i = 0; i < actual.length; i++) {
      if (!isClose(actual[i], expected[Math.floor(i / tile)])) {
        throw new LayoutConsistencyError(
          `TensorSignal values don't match Signal ${sig.name} values (element ${Math.floor(i / tile)})`,
        );
      }
    }
  }
}

/**
 * Group signal data into backing arrays and describe every signal as rows
 * of one of them.
 *
 * @param signals - base signals in memory order (e.g. from orderSignals)
 * @param plan - execution plan; supplies partition spans and view signals
 */
export function buildMemoryLayout(
  signals: readonly Signal[],
  plan: Plan,
  options: MemoryLayoutOptions = {},
): MemoryLayout {
  const floatType = options.floatType ?? "float32";
  const minibatchSize = options.minibatchSize ?? 1;
  if (!Number.isInteger(minibatchSize) || minibatchSize < 1) {
    throw new Error(`minibatchSize must be a positive integer, got ${minibatchSize}`);
  }

  const breaks = new Set(findPartitionBreaks(signals, plan));
  const pending = new Map<LayoutKey, PendingArray>();
  const signalMap = new Map<Signal, TensorSignal>();
  let currKeys = new Map<string, LayoutKey>();
  let nextKey = 0;

  signals.forEach((sig, i) => {
    if (sig.isView) {
      throw new Error(`memory layout: ${sig.name} is a view; the signal order must hold base signals`);
    }
    if (signalMap.has(sig)) {
      throw new Error(`memory layout: ${sig.name} appears twice in the signal order`);
    }

    if (breaks.has(i)) {
      // new partition: nothing before the break shares an array with it
      currKeys = new Map();
    }

    const dtype = layoutDType(sig.dtype, floatType);
    const shape = normalizeShape(sig.shape);
    const params = arrayParamsKey(dtype, shape, sig);

    let key = currKeys.get(params);
    if (key === undefined) {
      key = nextKey++;
      currKeys.set(params, key);
      pending.set(key, {
        dtype,
        tail: tailShape(shape),
        trainable: sig.trainable,
        minibatched: sig.minibatched,
        chunks: [],
        rows: 0,
      });
    }
    const entry = pending.get(key);
    if (!entry) {
      throw new Error(`memory layout: no pending array for key ${key}`);
    }

    let values = broadcastValues(sig.initialValue, sizeOf(shape));
    if (sig.minibatched) {
      values = tileMinibatch(values, minibatchSize);
    }
    entry.chunks.push(values);
    entry.rows += shape[0];

    const indices: number[] = [];
    for (let row = entry.rows - shape[0]; row < entry.rows; row++) {
      indices.push(row);
    }
    signalMap.set(
      sig,
      new TensorSignal(indices, key, dtype, shape, sig.minibatched, sig.name),
    );
  });

  const baseArrays = new Map<LayoutKey, BaseArray>();
  for (const [key, entry] of pending) {
    const shape = [entry.rows, ...entry.tail];
    if (entry.minibatched) shape.push(minibatchSize);
    baseArrays.set(key, {
      key,
      dtype: entry.dtype,
      shape,
      data: allocateData(entry.dtype, entry.chunks.flat()),
      trainable: entry.trainable,
      minibatched: entry.minibatched,
    });
  }

  for (const group of plan) {
    for (const op of group) {
      for (const sig of allSignals(op)) {
        if (!sig.isView || signalMap.has(sig)) continue;
        const base = signalMap.get(sig.base);
        if (!base) {
          throw new Error(`memory layout: base of view ${sig.name} is not in the signal order`);
        }
        signalMap.set(sig, viewDescriptor(sig, base));
      }
    }
  }

  const layout: MemoryLayout = { baseArrays, signalMap, minibatchSize };
  checkLayout(layout);

  debugLog(
    "memory-layout",
    () =>
      `${baseArrays.size} base array(s), ${breaks.size} partition break(s): ${Array.from(
        baseArrays.values(),
        (array) => `${array.key}:${array.dtype}[${array.shape}]${array.trainable ? " trainable" : ""}`,
      ).join(", ")}`,
  );
  return layout;
}

/**
 * Initial value of `sig` read back from the layout, minibatch tiling
 * undone (first minibatch entry).
 */
export function readSignalValue(layout: MemoryLayout, sig: Signal): number[] {
  const tensorSig = layout.signalMap.get(sig);
  if (!tensorSig) {
    throw new Error(`memory layout: no TensorSignal for ${sig.name}`);
  }
  const array = layout.baseArrays.get(tensorSig.key);
  if (!array) {
    throw new Error(`memory layout: no base array ${tensorSig.key}`);
  }
  const values = tensorSig.gather(array);
  if (!tensorSig.minibatched) return values;
  return values.filter((_, i) => i % layout.minibatchSize === 0);
}
