/**
 * Selection errors.
 *
 * Every failure in this package is a `SelectionError`; `kind` tells them
 * apart. The `err_*` helpers keep the messages in one place.
 */

export type SelectionErrorKind =
  | 'ShapeMismatch'
  | 'InvalidIndexType'
  | 'IndexOutOfRange'
  | 'InvalidSliceStep'
  | 'InvalidMultiBlockParameters'
  | 'TooManyEllipses'
  | 'TooManyIndices'
  | 'UnsupportedFancyCombination'
  | 'NonMonotonicIndexSequence'
  | 'LengthMismatch'
  | 'BroadcastIncompatible'
  | 'UnsupportedSelectionMode'

export class SelectionError extends Error {
  readonly kind: SelectionErrorKind

  constructor(kind: SelectionErrorKind, msg: string) {
    super(msg)
    this.name = 'SelectionError'
    this.kind = kind
  }
}

export function format_shape(shape: readonly number[]): string {
  return `(${shape.join(', ')}${shape.length === 1 ? ',' : ''})`
}

// ---------------------------------------------------------------------------
// Throw helpers
// ---------------------------------------------------------------------------

export function err_shape_mismatch(
  what: string,
  got: readonly number[],
  expected: readonly number[],
): never {
  throw new SelectionError(
    'ShapeMismatch',
    `${what} shape ${format_shape(got)} does not match dataset shape ${format_shape(expected)}`,
  )
}

export function err_invalid_index(msg: string): never {
  throw new SelectionError('InvalidIndexType', msg)
}

export function err_boundscheck(index: number, dim_len: number): never {
  throw new SelectionError(
    'IndexOutOfRange',
    `index (${index}) out of range (0-${dim_len - 1})`,
  )
}

export function err_slice_step(step: number): never {
  throw new SelectionError(
    'InvalidSliceStep',
    `only slices with step >= 1 are supported (got ${step})`,
  )
}

export function err_multi_block(msg: string): never {
  throw new SelectionError('InvalidMultiBlockParameters', msg)
}

export function err_too_many_ellipses(): never {
  throw new SelectionError('TooManyEllipses', 'only one ellipsis may be used')
}

export function err_too_many_indices(given: number, rank: number): never {
  throw new SelectionError(
    'TooManyIndices',
    `too many indices for array; expected ${rank}, got ${given}`,
  )
}

export function err_fancy_combination(sequences: number): never {
  throw new SelectionError(
    'UnsupportedFancyCombination',
    sequences === 0
      ? 'advanced selection needs one index list or boolean array'
      : `only one index list or boolean array is allowed per selection (got ${sequences})`,
  )
}

export function err_non_monotonic(axis: number): never {
  throw new SelectionError(
    'NonMonotonicIndexSequence',
    `indexing elements on axis ${axis} must be in increasing order`,
  )
}

export function err_length_mismatch(msg: string): never {
  throw new SelectionError('LengthMismatch', msg)
}

export function err_broadcast(
  source_shape: readonly number[],
  target_shape: readonly number[],
): never {
  throw new SelectionError(
    'BroadcastIncompatible',
    `can't broadcast ${format_shape(source_shape)} -> ${format_shape(target_shape)}`,
  )
}

export function err_selection_mode(what: string, code: number): never {
  throw new SelectionError(
    'UnsupportedSelectionMode',
    `unrecognized ${what} ${code}`,
  )
}
