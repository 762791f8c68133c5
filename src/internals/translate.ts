/**
 * Hyperslab translation — turns one axis's index expression into the
 * (start, count, stride, block) parameters of the hyperslab primitive.
 */

import type { Indices, Slice } from 'zarrita'
import type { MultiBlockSlice } from '../multi-block-slice.js'
import type { HyperslabDescriptor } from '../types.js'
import { err_boundscheck, err_invalid_index, err_slice_step } from './errors.js'
import { expand_ellipsis, type IndexExpression } from './parser.js'

/** `[start, count, stride]` for a single axis. */
export type AxisHyperslab = [start: number, count: number, stride: number]

// ---------------------------------------------------------------------------
// Slices
// ---------------------------------------------------------------------------

function clamp_bound(
  value: number | null,
  length: number,
  fallback: number,
): number {
  if (value === null) return fallback
  if (value < 0) return Math.max(value + length, 0)
  return Math.min(value, length)
}

/**
 * Resolve a forward Slice to concrete `[start, stop, step]` in `[0, length]`,
 * following the usual slice clamping rules.
 */
export function slice_indices(
  { start, stop, step }: Slice,
  length: number,
): Indices {
  step = step ?? 1
  if (step < 1) err_slice_step(step)
  return [clamp_bound(start, length, 0), clamp_bound(stop, length, length), step]
}

// ---------------------------------------------------------------------------
// Per-axis translation
// ---------------------------------------------------------------------------

export function translate_int(index: number, length: number): AxisHyperslab {
  const normalized = index < 0 ? index + length : index
  if (normalized < 0 || normalized >= length) err_boundscheck(index, length)
  return [normalized, 1, 1]
}

export function translate_slice(dim_sel: Slice, length: number): AxisHyperslab {
  const [start, stop, step] = slice_indices(dim_sel, length)
  if (stop <= start) return [0, 0, 1]
  const count = 1 + Math.floor((stop - start - 1) / step)
  return [start, count, step]
}

export function translate_multi_block_slice(
  dim_sel: MultiBlockSlice,
  length: number,
): [start: number, count: number, stride: number, block: number] {
  return dim_sel.indices(length)
}

// ---------------------------------------------------------------------------
// Whole selection
// ---------------------------------------------------------------------------

/**
 * Translate a tuple of integers, slices and MultiBlockSlices. Missing
 * trailing axes are fully selected.
 *
 * @throws {SelectionError} `InvalidIndexType` for an expression that is not
 *   a plain per-axis index, plus whatever the per-axis translators raise.
 */
export function handle_simple(
  shape: readonly number[],
  exprs: readonly IndexExpression[],
): HyperslabDescriptor {
  const sel: HyperslabDescriptor = {
    start: [],
    count: [],
    stride: [],
    block: [],
    scalar: [],
  }

  expand_ellipsis(exprs, shape.length).forEach((expr, axis) => {
    const length = shape[axis]
    let start: number
    let count: number
    let stride: number
    let block = 1
    let scalar = false
    switch (expr.kind) {
      case 'slice':
        ;[start, count, stride] = translate_slice(expr.slice, length)
        break
      case 'strided-block':
        ;[start, count, stride, block] = translate_multi_block_slice(expr.block, length)
        break
      case 'integer':
        ;[start, count, stride] = translate_int(expr.value, length)
        scalar = true
        break
      default:
        return err_invalid_index(
          `illegal index of kind "${expr.kind}" on axis ${axis} (must be a slice or number)`,
        )
    }
    sel.start.push(start)
    sel.count.push(count)
    sel.stride.push(stride)
    sel.block.push(block)
    sel.scalar.push(scalar)
  })

  return sel
}
