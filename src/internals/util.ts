/**
 * Shape helpers shared by the translator, the selections and the broadcast
 * engine.
 */

// ---------------------------------------------------------------------------
// Shapes
// ---------------------------------------------------------------------------

/** Number of elements in an array of the given shape. */
export function product(shape: readonly number[]): number {
  let n = 1
  for (const dim of shape) n *= dim
  return n
}

export function shape_equal(
  a: readonly number[],
  b: readonly number[],
): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i])
}

/**
 * Compute C-order strides for a shape.
 *
 * @param shape - Array dimensions
 * @returns Stride array, in elements
 */
export function get_strides(shape: readonly number[]): number[] {
  let step = 1
  const stride = new Array<number>(shape.length)
  for (let i = shape.length - 1; i >= 0; i--) {
    stride[i] = step
    step *= shape[i]
  }
  return stride
}

/**
 * Convert a flat index into a multi-index over `shape`, last axis varying
 * fastest.
 */
export function unravel_index(
  index: number,
  shape: readonly number[],
): number[] {
  const out = new Array<number>(shape.length)
  for (let i = shape.length - 1; i >= 0; i--) {
    out[i] = index % shape[i]
    index = Math.floor(index / shape[i])
  }
  return out
}
