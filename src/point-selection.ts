import {
  err_boundscheck,
  err_invalid_index,
  err_length_mismatch,
  err_shape_mismatch,
} from './internals/errors.js'
import { parse_args } from './internals/parser.js'
import { shape_equal } from './internals/util.js'
import { BaseSelection, create_space } from './selection.js'
import { SelectType, type PointOperator, type SelectArgs, type StorageHandle } from './types.js'

/** A list of coordinates, or a single coordinate given flat. */
export type PointList = readonly (readonly number[])[] | readonly number[]

function is_flat(points: PointList): points is readonly number[] {
  return points.length > 0 && typeof points[0] === 'number'
}

/**
 * A point-wise selection. Points are given as coordinate lists to `set()`,
 * `append()` and `prepend()`, or as a full-rank boolean mask to `apply()`.
 * `mshape` is always 1-D.
 */
export class PointSelection extends BaseSelection {
  readonly kind = 'points' as const

  constructor(shape: readonly number[], storage: StorageHandle) {
    super(create_space(shape, storage))
  }

  /** Select the true entries of a boolean mask shaped like the dataset. */
  apply(args: SelectArgs): this {
    const exprs = parse_args(args)
    const expr = exprs.length === 1 ? exprs[0] : undefined
    if (expr?.kind !== 'boolean-mask') {
      return err_invalid_index('point selections can only be indexed by a boolean array')
    }
    if (!shape_equal(expr.mask.shape, this.shape)) {
      err_shape_mismatch('boolean indexing array', expr.mask.shape, this.shape)
    }
    this.set(expr.mask.nonzero())
    return this
  }

  /** Add points to the end of the current selection. */
  append(points: PointList): void {
    this.perform_selection(points, 'append')
  }

  /** Add points to the beginning of the current selection. */
  prepend(points: PointList): void {
    this.perform_selection(points, 'prepend')
  }

  /** Replace the current selection with the given points. */
  set(points: PointList): void {
    this.perform_selection(points, 'set')
  }

  private perform_selection(points: PointList, op: PointOperator): void {
    const coords = is_flat(points) ? [points] : points
    for (const coord of coords) this.check_point(coord)

    // Appending to a region that isn't point-based starts a new point list.
    if (this._id.get_select_type() !== SelectType.POINTS) op = 'set'

    if (coords.length === 0) {
      this._id.select_none()
    } else {
      this._id.select_elements(coords, op)
    }
  }

  private check_point(coord: readonly number[]): void {
    if (coord.length !== this.shape.length) {
      err_length_mismatch(
        `point [${coord.join(', ')}] has ${coord.length} coordinates; dataset rank is ${this.shape.length}`,
      )
    }
    coord.forEach((c, axis) => {
      if (!Number.isInteger(c) || c < 0 || c >= this.shape[axis]) {
        err_boundscheck(c, this.shape[axis])
      }
    })
  }
}
