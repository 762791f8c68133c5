import { err_multi_block } from './internals/errors.js'

export interface MultiBlockSliceOptions {
  /** Offset of the first element of the first block. */
  start?: number
  /** Distance between the starts of consecutive blocks. */
  stride?: number
  /** Number of blocks; `null` selects as many full blocks as fit. */
  count?: number | null
  /** Number of elements in each block. */
  block?: number
}

/**
 * A slice described by start, stride, count and block, passed straight to the
 * hyperslab primitive. The defaults (`start=0, stride=1, count=null,
 * block=1`) select the whole axis.
 */
export class MultiBlockSlice {
  readonly start: number
  readonly stride: number
  readonly count: number | null
  readonly block: number

  constructor({
    start = 0,
    stride = 1,
    count = null,
    block = 1,
  }: MultiBlockSliceOptions = {}) {
    for (const [name, value] of [
      ['start', start],
      ['stride', stride],
      ['count', count],
      ['block', block],
    ] as const) {
      if (value !== null && !Number.isInteger(value)) {
        err_multi_block(`${name} must be an integer (got ${value})`)
      }
    }
    if (start < 0) err_multi_block("start can't be negative")
    if (stride < 1 || (count !== null && count < 1) || block < 1) {
      err_multi_block("stride, count and block can't be 0 or negative")
    }
    if (block > stride) err_multi_block('blocks will overlap if block > stride')

    this.start = start
    this.stride = stride
    this.count = count
    this.block = block
  }

  /**
   * Resolve and validate `[start, count, stride, block]` for an axis of
   * `length` elements.
   */
  indices(length: number): [number, number, number, number] {
    let count: number
    if (this.count === null) {
      count = Math.floor((length - this.start - this.block) / this.stride) + 1
      if (count < 1) {
        err_multi_block(
          `no full blocks can be selected using ${this.toString()} on dimension of length ${length}`,
        )
      }
    } else {
      count = this.count
    }

    const end_index = this.start + this.block + (count - 1) * this.stride - 1
    if (end_index >= length) {
      err_multi_block(
        `${this.toString(count)} range (${this.start} - ${end_index}) extends beyond maximum index (${length - 1})`,
      )
    }

    return [this.start, count, this.stride, this.block]
  }

  toString(count: number | null = this.count): string {
    return `MultiBlockSlice(start=${this.start}, stride=${this.stride}, count=${count}, block=${this.block})`
  }
}
