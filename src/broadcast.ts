/**
 * Broadcasting of a source array onto a regular selection.
 *
 * A source shape is first matched against the selection axis by axis
 * (`expand_shape`); the selection is then covered by repeating a region of
 * that expanded shape, one chunk at a time (`ChunkSequence`).
 */

import { err_broadcast } from './internals/errors.js'
import { product, unravel_index } from './internals/util.js'
import type { Dataspace } from './types.js'

/** What `expand_shape` needs to know about a regular selection. */
export interface BroadcastTarget {
  mshape: readonly number[]
  array_shape: readonly number[]
  block: readonly number[]
  scalar: readonly boolean[]
}

/**
 * Match the dimensions of a source array to the selection.
 *
 * The result has the selection's rank. E.g. with a dataset of shape
 * `[10, 5, 4, 2]` indexed `['...', 0]`, a source of shape `[5, 4]` expands to
 * `[1, 5, 4, 1]`; repeating that chunk 10 times covers the selection.
 *
 * @throws {SelectionError} `BroadcastIncompatible` when a source dimension
 *   is neither 1, the selected length, nor the block length of its axis.
 */
export function expand_shape(
  target: BroadcastTarget,
  source_shape: readonly number[],
): number[] {
  const { mshape, block, scalar } = target
  const remaining = [...source_shape]
  const eshape: number[] = []

  for (let axis = mshape.length - 1; axis >= 0; axis--) {
    const t = scalar[axis] ? undefined : remaining.pop()
    if (t === undefined) {
      eshape.push(1)
    } else if (t === 1 || t === mshape[axis] || t === block[axis]) {
      eshape.push(t)
    } else {
      err_broadcast(source_shape, target.array_shape)
    }
  }

  // Leading source dimensions that were not consumed must be 1.
  if (remaining.some((n) => n > 1)) err_broadcast(source_shape, target.array_shape)

  return eshape.reverse()
}

// ---------------------------------------------------------------------------
// ChunkSequence
// ---------------------------------------------------------------------------

/**
 * Single-pass sequence of dataspaces covering a selection.
 *
 * Tiled sequences own one copied dataspace and reposition it on every pull,
 * so a yielded value is only valid until `next()` is called again. Iterating
 * a second time continues where the first loop stopped.
 */
export class ChunkSequence implements IterableIterator<Dataspace> {
  /** Number of dataspaces this sequence yields in total. */
  readonly total: number
  private index = 0

  private constructor(
    private readonly space: Dataspace,
    private readonly grid: readonly number[] | null,
    private readonly place: (chunk_idx: number[]) => number[],
  ) {
    this.total = grid === null ? 1 : product(grid)
  }

  /** Yield `space` once, unmodified. */
  static once(space: Dataspace): ChunkSequence {
    return new ChunkSequence(space, null, () => [])
  }

  /**
   * Yield `space` repositioned to `place(idx)` for every `idx` of the chunk
   * grid, last axis varying fastest. `space` should describe one chunk
   * anchored at the origin.
   */
  static tiled(
    space: Dataspace,
    grid: readonly number[],
    place: (chunk_idx: number[]) => number[],
  ): ChunkSequence {
    return new ChunkSequence(space, grid, place)
  }

  next(): IteratorResult<Dataspace> {
    if (this.index >= this.total) return { done: true, value: undefined }
    const idx = this.index++
    if (this.grid !== null) {
      this.space.offset_simple(this.place(unravel_index(idx, this.grid)))
    }
    return { done: false, value: this.space }
  }

  [Symbol.iterator](): ChunkSequence {
    return this
  }
}
