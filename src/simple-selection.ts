import { ChunkSequence, expand_shape } from './broadcast.js'
import { err_broadcast, err_invalid_index } from './internals/errors.js'
import { parse_args } from './internals/parser.js'
import { handle_simple } from './internals/translate.js'
import { product } from './internals/util.js'
import { BaseSelection, create_space } from './selection.js'
import type { SelectArgs, StorageHandle } from './types.js'

/**
 * A single regular (rectangular) selection built from integers, slices and
 * MultiBlockSlices. The only kind that can broadcast.
 */
export class SimpleSelection extends BaseSelection {
  readonly kind = 'simple' as const

  private _start: number[]
  private _count: number[]
  private _stride: number[]
  private _block: number[]
  private _scalar: boolean[]
  private _array_shape: number[]

  constructor(shape: readonly number[], storage: StorageHandle) {
    super(create_space(shape, storage))
    const rank = this.shape.length
    this._start = new Array<number>(rank).fill(0)
    this._count = [...this.shape]
    this._stride = new Array<number>(rank).fill(1)
    this._block = new Array<number>(rank).fill(1)
    this._scalar = new Array<boolean>(rank).fill(false)
    this._array_shape = [...this.shape]
  }

  get mshape(): readonly number[] {
    return this._count.map((count, axis) => count * this._block[axis])
  }

  get array_shape(): readonly number[] {
    return this._array_shape
  }

  apply(args: SelectArgs): this {
    const exprs = parse_args(args)

    if (this.shape.length === 0) {
      if (exprs.length > 0 && exprs[0].kind !== 'ellipsis') {
        err_invalid_index('invalid index for scalar dataset (only [] and "..." allowed)')
      }
      this._id.select_all()
      return this
    }

    const { start, count, stride, block, scalar } = handle_simple(this.shape, exprs)
    this._id.select_hyperslab(start, count, stride, block)

    this._start = start
    this._count = count
    this._stride = stride
    this._block = block
    this._scalar = scalar
    this._array_shape = this.mshape.filter((_, axis) => !scalar[axis])
    return this
  }

  /**
   * Match the dimensions of a source array to this selection. See
   * {@link expand_shape}.
   */
  expand_shape(source_shape: readonly number[]): number[] {
    return expand_shape(
      {
        mshape: this.mshape,
        array_shape: this._array_shape,
        block: this._block,
        scalar: this._scalar,
      },
      source_shape,
    )
  }

  /**
   * Dataspaces to transfer `source_shape` into, one per repetition of the
   * source. When no repetition is needed the committed dataspace itself is
   * yielded; otherwise a copy is yielded, repositioned before each pull.
   */
  broadcast(source_shape: readonly number[]): ChunkSequence {
    if (this.shape.length === 0) {
      if (product(source_shape) !== 1) err_broadcast(source_shape, [])
      this._id.select_all()
      return ChunkSequence.once(this._id)
    }

    const mshape = this.mshape
    const chunk_shape = this.expand_shape(source_shape)
    const chunks = mshape.map((n, axis) =>
      chunk_shape[axis] === 0 ? 0 : Math.floor(n / chunk_shape[axis]),
    )

    if (product(chunks) === 1) return ChunkSequence.once(this._id)

    const sid = this._id.copy()
    if (product(chunks) === 0) return ChunkSequence.tiled(sid, chunks, () => [])

    // A chunk spanning a whole axis keeps that axis' stride pattern; a smaller
    // one is a single run inside a block, stepped through every block.
    const spans = chunk_shape.map((n, axis) => n === mshape[axis])
    sid.select_hyperslab(
      new Array<number>(mshape.length).fill(0),
      spans.map((full, axis) => (full ? this._count[axis] : 1)),
      spans.map((full, axis) => (full ? this._stride[axis] : 1)),
      spans.map((full, axis) => (full ? this._block[axis] : chunk_shape[axis])),
    )

    const per_block = chunk_shape.map((n, axis) => (spans[axis] ? 1 : this._block[axis] / n))
    return ChunkSequence.tiled(sid, chunks, (chunk_idx) =>
      chunk_idx.map(
        (k, axis) =>
          this._start[axis] +
          Math.floor(k / per_block[axis]) * this._stride[axis] +
          (k % per_block[axis]) * chunk_shape[axis],
      ),
    )
  }
}
