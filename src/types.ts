/**
 * Types for ndselect
 *
 * Includes the contract of the external selection engine (dataspaces and the
 * storage handle that creates and resolves them) and the raw index arguments
 * accepted by `select()`.
 */

import type { Slice } from 'zarrita'
import type { BooleanMask } from './boolean-mask.js'
import type { MultiBlockSlice } from './multi-block-slice.js'
import type { RegionReference } from './region-reference.js'
import type { Selection } from './selection.js'

// ---------------------------------------------------------------------------
// Engine codes
// ---------------------------------------------------------------------------

/** Extent classes reported by `Dataspace.get_simple_extent_type()`. */
export const ExtentClass = {
  SCALAR: 0,
  SIMPLE: 1,
  NULL: 2,
} as const

/** Selection modes reported by `Dataspace.get_select_type()`. */
export const SelectType = {
  NONE: 0,
  POINTS: 1,
  HYPERSLABS: 2,
  ALL: 3,
} as const

/** How a hyperslab combines with the region already committed. */
export type HyperslabOperator = 'set' | 'or' | 'notb'

/** How a point list combines with the region already committed. */
export type PointOperator = 'set' | 'append' | 'prepend'

// ---------------------------------------------------------------------------
// Engine contract
// ---------------------------------------------------------------------------

/**
 * Handle to an extent and its committed selection, owned by the storage
 * engine. Every method mutates or queries the handle in place.
 */
export interface Dataspace {
  /** Extent of the whole space. */
  readonly shape: readonly number[]
  /** One of {@link ExtentClass}; engines may report codes this layer does not know. */
  get_simple_extent_type(): number
  /** One of {@link SelectType}; engines may report codes this layer does not know. */
  get_select_type(): number
  get_select_npoints(): number
  /** Inclusive lower and upper corners of the selected points. */
  get_select_bounds(): [number[], number[]]
  select_all(): void
  select_none(): void
  select_hyperslab(
    start: readonly number[],
    count: readonly number[],
    stride?: readonly number[],
    block?: readonly number[],
    op?: HyperslabOperator,
  ): void
  select_elements(points: readonly (readonly number[])[], op?: PointOperator): void
  /** Shift the committed selection by `offset` (replaces any previous offset). */
  offset_simple(offset: readonly number[]): void
  copy(): Dataspace
}

/**
 * The opaque handle a dataset hands to `select()`. Only used to create
 * dataspaces and to resolve region references.
 */
export interface StorageHandle {
  create_simple(shape: readonly number[]): Dataspace
  get_region(reference: RegionReference): Dataspace
}

// ---------------------------------------------------------------------------
// Index arguments
// ---------------------------------------------------------------------------

/** Ellipsis marker, expanded to as many full-range slices as needed. */
export type Ellipsis = '...'

/** A single raw index argument, as written by a caller. */
export type IndexArg =
  | number
  | Slice
  | null
  | Ellipsis
  | MultiBlockSlice
  | readonly number[]
  | readonly boolean[]
  | BooleanMask
  | Selection
  | RegionReference

/**
 * Arguments to `select()`. An array at the top level is always the index
 * tuple, so an index list on its own is written `[[1, 3, 5]]`.
 */
export type SelectArgs = IndexArg | readonly IndexArg[]

/** Per-axis hyperslab parameters produced by the translator. */
export interface HyperslabDescriptor {
  start: number[]
  count: number[]
  stride: number[]
  block: number[]
  scalar: boolean[]
}
