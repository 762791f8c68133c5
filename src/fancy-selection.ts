import { ChunkSequence } from './broadcast.js'
import { err_broadcast, err_fancy_combination, err_invalid_index, err_non_monotonic } from './internals/errors.js'
import { expand_ellipsis, parse_args, type IndexExpression } from './internals/parser.js'
import { handle_simple } from './internals/translate.js'
import { shape_equal } from './internals/util.js'
import { BaseSelection, create_space } from './selection.js'
import type { HyperslabDescriptor, SelectArgs, StorageHandle } from './types.js'

function sequence_values(expr: IndexExpression): number[] | null {
  if (expr.kind === 'index-list') return expr.values
  if (expr.kind === 'boolean-mask') {
    if (expr.mask.shape.length !== 1) {
      err_invalid_index('boolean indexing arrays must be 1-D')
    }
    return expr.mask.nonzero().map(([i]) => i)
  }
  return null
}

/**
 * Advanced selection: integers and slices on every axis but one, which takes
 * an increasing index list or a 1-D boolean mask. The result is the union of
 * one hyperslab per listed index.
 *
 * Broadcasting is not supported; a source must match `array_shape` exactly.
 */
export class FancySelection extends BaseSelection {
  readonly kind = 'fancy' as const

  private _mshape: number[]
  private _array_shape: number[]

  constructor(shape: readonly number[], storage: StorageHandle) {
    super(create_space(shape, storage))
    this._mshape = [...this.shape]
    this._array_shape = [...this.shape]
  }

  get mshape(): readonly number[] {
    return this._mshape
  }

  get array_shape(): readonly number[] {
    return this._array_shape
  }

  apply(args: SelectArgs): this {
    const exprs = expand_ellipsis(parse_args(args), this.shape.length)

    const sequences = new Map<number, number[]>()
    exprs.forEach((expr, axis) => {
      const values = sequence_values(expr)
      if (values === null) return
      for (let i = 1; i < values.length; i++) {
        if (values[i - 1] >= values[i]) err_non_monotonic(axis)
      }
      sequences.set(axis, values)
    })
    if (sequences.size !== 1) err_fancy_combination(sequences.size)
    const [[seq_axis, values]] = sequences

    // [0:5, [1, 3]] becomes [0:5, 1] | [0:5, 3]; an empty list becomes an
    // empty slice so the result keeps its shape.
    const vectors: IndexExpression[][] =
      values.length > 0
        ? values.map((value) =>
            exprs.map((expr, axis): IndexExpression => (axis === seq_axis ? { kind: 'integer', value } : expr)),
          )
        : [
            exprs.map((expr, axis): IndexExpression =>
              axis === seq_axis ? { kind: 'slice', slice: { start: 0, stop: 0, step: null } } : expr,
            ),
          ]

    this._id.select_none()
    let sel: HyperslabDescriptor | undefined
    for (const vector of vectors) {
      sel = handle_simple(this.shape, vector)
      this._id.select_hyperslab(sel.start, sel.count, sel.stride, sel.block, 'or')
    }
    if (sel === undefined) return this
    const { count, block, scalar } = sel

    // Collapsed (integer) axes are dropped from array_shape; the sequence
    // axis is kept even when it has length 0 or 1.
    const collapsed = scalar.map((s, axis) => s && axis !== seq_axis)
    this._mshape = count.map((n, axis) => {
      if (axis === seq_axis) return values.length
      return collapsed[axis] ? 1 : n * block[axis]
    })
    this._array_shape = this._mshape.filter((_, axis) => !collapsed[axis])
    return this
  }

  expand_shape(source_shape: readonly number[]): number[] {
    if (!shape_equal(source_shape, this._array_shape)) {
      err_broadcast(source_shape, this._array_shape)
    }
    return [...source_shape]
  }

  broadcast(source_shape: readonly number[]): ChunkSequence {
    this.expand_shape(source_shape)
    return ChunkSequence.once(this._id)
  }
}
