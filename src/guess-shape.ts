import { err_selection_mode } from './internals/errors.js'
import { product } from './internals/util.js'
import { ExtentClass, SelectType, type Dataspace } from './types.js'

/**
 * Deduce the shape of the selection committed in a dataspace, with no other
 * knowledge of how it was built.
 *
 * Returns one of:
 * - the per-axis selection shape, same length as the dataspace rank;
 * - `[N]` for point selections and for hyperslab unions that are not one
 *   regular grid;
 * - `null` for NULL dataspaces and for scalar dataspaces with nothing
 *   selected.
 *
 * @throws {SelectionError} `UnsupportedSelectionMode` for an extent class or
 *   selection mode this layer does not know.
 */
export function guess_shape(sid: Dataspace): number[] | null {
  const sel_class = sid.get_simple_extent_type()
  const sel_type = sid.get_select_type()

  if (sel_class === ExtentClass.NULL) return null

  if (sel_class === ExtentClass.SCALAR) {
    if (sel_type === SelectType.NONE) return null
    if (sel_type === SelectType.ALL) return []
  } else if (sel_class !== ExtentClass.SIMPLE) {
    err_selection_mode('dataspace class', sel_class)
  }

  const N = sid.get_select_npoints()
  const rank = sid.shape.length

  switch (sel_type) {
    case SelectType.NONE:
      return new Array<number>(rank).fill(0)
    case SelectType.ALL:
      return [...sid.shape]
    case SelectType.POINTS:
      // Point selections are always flat, whatever the rank.
      return [N]
    case SelectType.HYPERSLABS:
      break
    default:
      err_selection_mode('selection method', sel_type)
  }

  if (N === 0) return new Array<number>(rank).fill(0)

  const [bottom, top] = sid.get_select_bounds()
  const boxshape = top.map((t, axis) => t - bottom[axis] + 1)

  // Number of elements along an axis: mask off everything past the first
  // plane of the bounding box and divide N by what is left.
  const get_n_axis = (axis: number): number => {
    if (boxshape[axis] === 1) return 1

    const start = [...bottom]
    start[axis] += 1
    const count = [...boxshape]
    count[axis] -= 1

    const masked = sid.copy()
    masked.select_hyperslab(start, count, undefined, undefined, 'notb')
    return Math.floor(N / masked.get_select_npoints())
  }

  const shape = Array.from({ length: rank }, (_, axis) => get_n_axis(axis))

  // Several hyperslabs are in effect; fall back to 1-D.
  if (product(shape) !== N) return [N]

  return shape
}
