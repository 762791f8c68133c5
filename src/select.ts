import { FancySelection } from './fancy-selection.js'
import { err_shape_mismatch } from './internals/errors.js'
import { parse_args, type IndexExpression } from './internals/parser.js'
import { shape_equal } from './internals/util.js'
import { PointSelection } from './point-selection.js'
import { PassThroughSelection, type Selection } from './selection.js'
import { SimpleSelection } from './simple-selection.js'
import type { SelectArgs, StorageHandle } from './types.js'

function is_simple(expr: IndexExpression): boolean {
  return (
    expr.kind === 'integer' ||
    expr.kind === 'slice' ||
    expr.kind === 'strided-block' ||
    expr.kind === 'ellipsis'
  )
}

/**
 * Build a selection over a dataset of the given shape from indexing
 * arguments.
 *
 * - a single `Selection` is returned as-is (its shape must match);
 * - a single boolean mask gives a `PointSelection`;
 * - a single `RegionReference` is resolved through `storage` and adopted as
 *   a `PassThroughSelection` (its shape must match);
 * - integers, slices, `null`, `'...'` and MultiBlockSlices only give a
 *   `SimpleSelection`;
 * - anything that also has an index list or 1-D mask gives a
 *   `FancySelection`.
 *
 * @param shape - Shape of the source dataspace
 * @param args - One index argument, or a tuple of them
 * @param storage - Creates dataspaces and resolves region references
 */
export function select(
  shape: readonly number[],
  args: SelectArgs,
  storage: StorageHandle,
): Selection {
  const exprs = parse_args(args)

  if (exprs.length === 1) {
    const [expr] = exprs
    switch (expr.kind) {
      case 'existing-selection':
        if (!shape_equal(expr.selection.shape, shape)) {
          err_shape_mismatch('selection', expr.selection.shape, shape)
        }
        return expr.selection
      case 'boolean-mask':
        return new PointSelection(shape, storage).apply(expr.mask)
      case 'region-reference': {
        const sid = storage.get_region(expr.reference)
        if (!shape_equal(sid.shape, shape)) {
          err_shape_mismatch('reference', sid.shape, shape)
        }
        return new PassThroughSelection(sid)
      }
    }
  }

  if (!exprs.every(is_simple)) {
    return new FancySelection(shape, storage).apply(args)
  }
  return new SimpleSelection(shape, storage).apply(args)
}
