import { describe, expect, test } from 'vitest'
import { ChunkSequence, SelectionError, expand_shape } from '../src/index.js'
import { MemoryDataspace } from './helpers/memory-dataspace.js'

describe('expand_shape', () => {
  const target = {
    mshape: [10, 5, 4, 1],
    array_shape: [10, 5, 4],
    block: [1, 1, 1, 1],
    scalar: [false, false, false, true],
  }

  test('inserts size-1 axes for collapsed and missing dimensions', () => {
    expect(expand_shape(target, [5, 4])).toEqual([1, 5, 4, 1])
    expect(expand_shape(target, [4])).toEqual([1, 1, 4, 1])
    expect(expand_shape(target, [])).toEqual([1, 1, 1, 1])
    expect(expand_shape(target, [10, 1, 4])).toEqual([10, 1, 4, 1])
  })

  test('accepts leading size-1 dimensions beyond the rank', () => {
    expect(expand_shape(target, [1, 1, 10, 5, 4])).toEqual([10, 5, 4, 1])
  })

  test('accepts the block length of an axis', () => {
    const blocked = { mshape: [6], array_shape: [6], block: [3], scalar: [false] }
    expect(expand_shape(blocked, [3])).toEqual([3])
    expect(() => expand_shape(blocked, [2])).toThrow("can't broadcast (2,) -> (6,)")
  })

  test('rejects dimensions that fit nowhere', () => {
    expect(() => expand_shape(target, [7])).toThrow(SelectionError)
    expect(() => expand_shape(target, [7])).toThrow("can't broadcast (7,) -> (10, 5, 4)")
    expect(() => expand_shape(target, [2, 10, 5, 4])).toThrow(
      "can't broadcast (2, 10, 5, 4) -> (10, 5, 4)",
    )
  })
})

describe('ChunkSequence', () => {
  test('once yields the dataspace a single time', () => {
    const space = new MemoryDataspace([3])
    const seq = ChunkSequence.once(space)
    expect(seq.total).toBe(1)
    expect(seq.next()).toEqual({ done: false, value: space })
    expect(seq.next().done).toBe(true)
  })

  test('tiled repositions one dataspace, last axis fastest', () => {
    const space = new MemoryDataspace([8, 3])
    const seq = ChunkSequence.tiled(space, [2, 3], ([i, j]) => [1 + 2 * i, j])
    expect(seq.total).toBe(6)

    const offsets: number[][] = []
    for (const value of seq) {
      expect(value).toBe(space)
      offsets.push([...space.offset])
    }
    expect(offsets).toEqual([
      [1, 0], [1, 1], [1, 2],
      [3, 0], [3, 1], [3, 2],
    ])
  })

  test('stopping early and resuming continues the same pass', () => {
    const space = new MemoryDataspace([4])
    const seq = ChunkSequence.tiled(space, [4], ([i]) => [i])
    for (const _ of seq) {
      if (space.offset[0] === 1) break
    }
    const rest: number[] = []
    for (const _ of seq) rest.push(space.offset[0])
    expect(rest).toEqual([2, 3])
  })

  test('an empty grid yields nothing', () => {
    const seq = ChunkSequence.tiled(new MemoryDataspace([0, 5]), [0, 1], () => [0, 0])
    expect(seq.total).toBe(0)
    expect([...seq]).toEqual([])
  })
})
