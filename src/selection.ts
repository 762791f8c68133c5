/**
 * Selections — a dataspace plus the logical shape of what is selected in it.
 *
 * Four kinds share the {@link Selection} interface:
 *
 * - `pass-through`: an adopted region (existing dataspace or a resolved
 *   region reference). Not indexable, 1-D, no broadcasting.
 * - `points`: an ordered list of coordinates.
 * - `simple`: one regular hyperslab; supports broadcasting.
 * - `fancy`: a union of hyperslabs built from one index list or mask.
 *
 * `apply()` replaces the committed region in place; it never accumulates
 * onto what a previous call selected. A selection whose `apply()` threw is
 * left in an undefined state and should be discarded.
 */

import { ChunkSequence } from './broadcast.js'
import { err_broadcast, err_invalid_index } from './internals/errors.js'
import { product } from './internals/util.js'
import type { Dataspace, SelectArgs, StorageHandle } from './types.js'

export type SelectionKind = 'pass-through' | 'points' | 'simple' | 'fancy'

export interface Selection {
  readonly kind: SelectionKind
  /** The dataspace holding the committed region. */
  readonly id: Dataspace
  /** Shape of the whole dataspace. */
  readonly shape: readonly number[]
  /** Number of selected points; always `product(mshape)`. */
  readonly nselect: number
  /** Shape of the selected region, collapsed axes counted as 1. */
  readonly mshape: readonly number[]
  /** Shape an in-memory array must have (or broadcast to). */
  readonly array_shape: readonly number[]
  apply(args: SelectArgs): this
  expand_shape(source_shape: readonly number[]): number[]
  broadcast(source_shape: readonly number[]): ChunkSequence
}

/** Create a dataspace over `shape` with everything selected. */
export function create_space(
  shape: readonly number[],
  storage: StorageHandle,
): Dataspace {
  const space = storage.create_simple(shape)
  space.select_all()
  return space
}

/**
 * Shared behaviour: an "unshaped" selection whose logical shape is the flat
 * list of selected points.
 */
export abstract class BaseSelection implements Selection {
  abstract readonly kind: SelectionKind
  readonly shape: readonly number[]
  protected readonly _id: Dataspace

  constructor(space: Dataspace) {
    this._id = space
    this.shape = [...space.shape]
  }

  get id(): Dataspace {
    return this._id
  }

  get nselect(): number {
    return this._id.get_select_npoints()
  }

  get mshape(): readonly number[] {
    return [this.nselect]
  }

  get array_shape(): readonly number[] {
    return this.mshape
  }

  abstract apply(args: SelectArgs): this

  expand_shape(source_shape: readonly number[]): number[] {
    if (product(source_shape) !== this.nselect) {
      err_broadcast(source_shape, this.array_shape)
    }
    return [...source_shape]
  }

  broadcast(source_shape: readonly number[]): ChunkSequence {
    this.expand_shape(source_shape)
    return ChunkSequence.once(this._id)
  }
}

/**
 * A region adopted as-is, from an existing dataspace or a region reference.
 */
export class PassThroughSelection extends BaseSelection {
  readonly kind = 'pass-through' as const

  apply(_args: SelectArgs): this {
    return err_invalid_index('pass-through selections do not support indexing')
  }
}
