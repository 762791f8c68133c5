import { err_length_mismatch, format_shape } from './internals/errors.js'
import { get_strides } from './internals/util.js'

/**
 * A boolean array in C order. Used as a full-rank mask for point selections
 * or, when 1-D, as one axis of an advanced selection.
 */
export class BooleanMask {
  readonly data: readonly boolean[]
  readonly shape: readonly number[]

  constructor(data: ArrayLike<boolean | number>, shape?: readonly number[]) {
    this.data = Array.from(data, (v) => Boolean(v))
    this.shape = shape ?? [this.data.length]
    const size = this.shape.reduce((a, b) => a * b, 1)
    if (size !== this.data.length) {
      err_length_mismatch(
        `mask of ${this.data.length} elements can't have shape ${format_shape(this.shape)}`,
      )
    }
  }

  /** Coordinates of the true entries, in row-major order. */
  nonzero(): number[][] {
    const stride = get_strides(this.shape)
    const coords: number[][] = []
    this.data.forEach((selected, flat) => {
      if (!selected) return
      coords.push(stride.map((s, axis) => Math.floor(flat / s) % this.shape[axis]))
    })
    return coords
  }
}
