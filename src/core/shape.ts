/**
 * Pure shape helpers shared by the graph and engine layers.
 */

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(
  a: readonly number[],
  b: readonly number[],
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Shape beyond axis 0 (empty for scalars and vectors). */
export function tailShape(shape: readonly number[]): number[] {
  return shape.slice(1);
}

/** Scalars are stored as length-1 vectors. */
export function normalizeShape(shape: readonly number[]): number[] {
  return shape.length === 0 ? [1] : shape.slice();
}

/** Extent of axis 0, counting a scalar as 1. */
export function leadingDim(shape: readonly number[]): number {
  return shape.length === 0 ? 1 : shape[0];
}

/**
 * Row-major (C-style) strides in elements: last dimension is contiguous.
 */
export function contiguousStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}
