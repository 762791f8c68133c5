/**
 * Index argument parsing.
 *
 * Raw arguments are classified once, at the boundary, into the closed
 * `IndexExpression` union; everything downstream switches on `kind`.
 */

import type { Slice } from 'zarrita'
import { BooleanMask } from '../boolean-mask.js'
import { MultiBlockSlice } from '../multi-block-slice.js'
import { RegionReference } from '../region-reference.js'
import { BaseSelection } from '../selection.js'
import type { SelectArgs } from '../types.js'
import {
  err_invalid_index,
  err_too_many_ellipses,
  err_too_many_indices,
} from './errors.js'

export type IndexExpression =
  | { kind: 'integer'; value: number }
  | { kind: 'slice'; slice: Slice }
  | { kind: 'strided-block'; block: MultiBlockSlice }
  | { kind: 'ellipsis' }
  | { kind: 'index-list'; values: number[] }
  | { kind: 'boolean-mask'; mask: BooleanMask }
  | { kind: 'existing-selection'; selection: BaseSelection }
  | { kind: 'region-reference'; reference: RegionReference }

export const FULL_SLICE: IndexExpression = {
  kind: 'slice',
  slice: { start: null, stop: null, step: null },
}

export const ELLIPSIS: IndexExpression = { kind: 'ellipsis' }

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function describe(arg: unknown): string {
  if (typeof arg === 'object' && arg !== null) {
    return Array.isArray(arg) ? `[${arg.map(String).join(', ')}]` : arg.constructor.name
  }
  return String(arg)
}

function is_slice_bound(value: unknown): value is number | null {
  return value === null || Number.isInteger(value)
}

function is_slice(arg: object): arg is Slice {
  return (
    'start' in arg &&
    'stop' in arg &&
    'step' in arg &&
    is_slice_bound(arg.start) &&
    is_slice_bound(arg.stop) &&
    is_slice_bound(arg.step)
  )
}

function classify_sequence(items: readonly unknown[]): IndexExpression | null {
  if (items.length > 0 && items.every((v) => typeof v === 'boolean')) {
    return { kind: 'boolean-mask', mask: new BooleanMask(items.map((v) => v === true)) }
  }
  const values: number[] = []
  for (const v of items) {
    if (typeof v !== 'number' || !Number.isInteger(v)) return null
    values.push(v)
  }
  return { kind: 'index-list', values }
}

/**
 * Classify one raw index argument.
 *
 * @throws {SelectionError} `InvalidIndexType` for anything that is not a
 *   recognized index value.
 */
export function classify_index(arg: unknown): IndexExpression {
  if (arg === '...') return ELLIPSIS
  if (arg === null) return FULL_SLICE
  if (typeof arg === 'number' && Number.isInteger(arg)) {
    return { kind: 'integer', value: arg }
  }
  if (typeof arg === 'object') {
    if (arg instanceof MultiBlockSlice) return { kind: 'strided-block', block: arg }
    if (arg instanceof BooleanMask) return { kind: 'boolean-mask', mask: arg }
    if (arg instanceof BaseSelection) return { kind: 'existing-selection', selection: arg }
    if (arg instanceof RegionReference) return { kind: 'region-reference', reference: arg }
    if (Array.isArray(arg)) {
      const expr = classify_sequence(arg)
      if (expr) return expr
    } else if (is_slice(arg)) {
      return { kind: 'slice', slice: arg }
    }
  }
  return err_invalid_index(
    `illegal index "${describe(arg)}" (must be an integer, slice, MultiBlockSlice, ellipsis, index list, boolean array or region)`,
  )
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Turn `select()` arguments into a tuple of classified expressions. A
 * top-level array of booleans is one 1-D mask, not a tuple.
 */
export function parse_args(args: SelectArgs): IndexExpression[] {
  const tuple: readonly unknown[] = Array.isArray(args) ? args : [args]
  if (tuple.length > 0 && tuple.every((v) => typeof v === 'boolean')) {
    return [classify_index(tuple)]
  }
  return tuple.map((arg) => classify_index(arg))
}

/**
 * Expand the ellipsis and fill in missing trailing axes with full slices.
 *
 * @throws {SelectionError} `TooManyEllipses` or `TooManyIndices`.
 */
export function expand_ellipsis(
  exprs: readonly IndexExpression[],
  rank: number,
): IndexExpression[] {
  const n_el = exprs.filter((e) => e.kind === 'ellipsis').length
  if (n_el > 1) err_too_many_ellipses()
  const args = n_el === 0 && exprs.length !== rank ? [...exprs, ELLIPSIS] : exprs

  const expanded: IndexExpression[] = []
  for (const expr of args) {
    if (expr.kind === 'ellipsis') {
      for (let i = 0; i < rank - args.length + 1; i++) expanded.push(FULL_SLICE)
    } else {
      expanded.push(expr)
    }
  }

  if (expanded.length > rank) err_too_many_indices(expanded.length, rank)
  return expanded
}
