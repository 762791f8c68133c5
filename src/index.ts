/**
 * ndselect — index translation and selection composition for N-dimensional
 * dataspaces.
 *
 * Turns NumPy-style indexing arguments into hyperslab and point selections
 * on an external selection engine, and plans the chunked transfers needed to
 * broadcast a smaller array across a selection.
 */

export { select } from './select.js'
export { BaseSelection, PassThroughSelection, create_space } from './selection.js'
export type { Selection, SelectionKind } from './selection.js'
export { SimpleSelection } from './simple-selection.js'
export { FancySelection } from './fancy-selection.js'
export { PointSelection } from './point-selection.js'
export type { PointList } from './point-selection.js'
export { ChunkSequence, expand_shape } from './broadcast.js'
export type { BroadcastTarget } from './broadcast.js'
export { guess_shape } from './guess-shape.js'

// Index values
export { slice } from 'zarrita'
export type { Slice } from 'zarrita'
export { MultiBlockSlice } from './multi-block-slice.js'
export type { MultiBlockSliceOptions } from './multi-block-slice.js'
export { BooleanMask } from './boolean-mask.js'
export { RegionReference } from './region-reference.js'

// Engine contract
export { ExtentClass, SelectType } from './types.js'
export type {
  Dataspace,
  StorageHandle,
  HyperslabOperator,
  PointOperator,
  IndexArg,
  SelectArgs,
  Ellipsis,
  HyperslabDescriptor,
} from './types.js'

// Internals — exported for callers that drive the engine directly
export { SelectionError } from './internals/errors.js'
export type { SelectionErrorKind } from './internals/errors.js'
export {
  classify_index,
  expand_ellipsis,
  parse_args,
} from './internals/parser.js'
export type { IndexExpression } from './internals/parser.js'
export {
  handle_simple,
  slice_indices,
  translate_int,
  translate_multi_block_slice,
  translate_slice,
} from './internals/translate.js'
export type { AxisHyperslab } from './internals/translate.js'
