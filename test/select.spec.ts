import { describe, expect, test } from 'vitest'
import {
  FancySelection,
  MultiBlockSlice,
  PassThroughSelection,
  RegionReference,
  SimpleSelection,
  select,
  slice,
  type Selection,
} from '../src/index.js'
import { MemoryDataspace, MemoryStorage, coords_of } from './helpers/memory-dataspace.js'
import { kind_of } from './helpers/errors.js'

function stored_region(shape: number[]): MemoryDataspace {
  const space = new MemoryDataspace(shape)
  space.select_hyperslab([0, 0], [2, 2])
  return space
}

describe('select', () => {
  test('integers, slices, ellipses and strided blocks give a simple selection', () => {
    const storage = new MemoryStorage()
    expect(select([4, 4], 1, storage)).toBeInstanceOf(SimpleSelection)
    expect(select([4, 4], [slice(1, 3), '...'], storage)).toBeInstanceOf(SimpleSelection)
    expect(select([4, 4], [null, new MultiBlockSlice({ stride: 2 })], storage)).toBeInstanceOf(
      SimpleSelection,
    )
  })

  test('index lists give a fancy selection', () => {
    const storage = new MemoryStorage()
    expect(select([4, 4], [[0, 2]], storage)).toBeInstanceOf(FancySelection)
    expect(select([4, 4], [1, [3]], storage)).toBeInstanceOf(FancySelection)
  })

  test('each call creates its own dataspace', () => {
    const storage = new MemoryStorage()
    const a = select([4, 4], 0, storage)
    const b = select([4, 4], 0, storage)
    expect(storage.created).toHaveLength(2)
    expect(a.id).not.toBe(b.id)
  })

  test('an existing selection is returned as-is', () => {
    const storage = new MemoryStorage()
    const sel = select([4, 4], 1, storage)
    expect(select([4, 4], sel, storage)).toBe(sel)
  })

  test('a selection typed as the Selection interface can be passed back', () => {
    const storage = new MemoryStorage()
    const first: Selection = select([4, 4], [slice(0, 2), null], storage)
    const again: Selection = select([4, 4], [first], storage)
    expect(again).toBe(first)
    expect(storage.created).toHaveLength(1)
  })

  test('an existing selection must match the dataset shape', () => {
    const storage = new MemoryStorage()
    const sel = select([4, 4], 1, storage)
    expect(kind_of(() => select([4, 5], sel, storage))).toBe('ShapeMismatch')
    expect(() => select([4, 5], sel, storage)).toThrow(
      'selection shape (4, 4) does not match dataset shape (4, 5)',
    )
  })

  describe('region references', () => {
    test('are resolved and adopted unchanged', () => {
      const ref = new RegionReference(stored_region([4, 4]))
      const sel = select([4, 4], ref, new MemoryStorage())
      expect(sel).toBeInstanceOf(PassThroughSelection)
      expect(sel.kind).toBe('pass-through')
      expect(sel.shape).toEqual([4, 4])
      expect(sel.nselect).toBe(4)
      expect(sel.mshape).toEqual([4])
      expect(sel.array_shape).toEqual([4])
      expect(coords_of(sel.id)).toEqual([[0, 0], [0, 1], [1, 0], [1, 1]])
    })

    test('must match the dataset shape', () => {
      const ref = new RegionReference(stored_region([4, 4]))
      expect(kind_of(() => select([4, 5], ref, new MemoryStorage()))).toBe('ShapeMismatch')
      expect(() => select([4, 5], ref, new MemoryStorage())).toThrow(
        'reference shape (4, 4) does not match dataset shape (4, 5)',
      )
    })

    test('cannot be indexed further', () => {
      const sel = select([4, 4], new RegionReference(stored_region([4, 4])), new MemoryStorage())
      expect(kind_of(() => sel.apply(0))).toBe('InvalidIndexType')
    })

    test('only broadcast sources with the same number of points', () => {
      const sel = select([4, 4], new RegionReference(stored_region([4, 4])), new MemoryStorage())
      expect([...sel.broadcast([4])]).toEqual([sel.id])
      expect([...sel.broadcast([2, 2])]).toEqual([sel.id])
      expect(kind_of(() => sel.broadcast([3]))).toBe('BroadcastIncompatible')
    })

    test('are not index values inside a tuple', () => {
      const ref = new RegionReference(stored_region([4, 4]))
      expect(kind_of(() => select([4, 4], [ref, [1, 2]], new MemoryStorage()))).toBe(
        'InvalidIndexType',
      )
    })
  })
})
