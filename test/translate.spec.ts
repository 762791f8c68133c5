import { describe, expect, test } from 'vitest'
import {
  MultiBlockSlice,
  handle_simple,
  parse_args,
  slice,
  translate_int,
  translate_multi_block_slice,
  translate_slice,
} from '../src/index.js'
import { kind_of } from './helpers/errors.js'

describe('translate_int', () => {
  test('accepts every index in [-length, length) and normalizes negatives', () => {
    const length = 6
    for (let i = -length; i < length; i++) {
      const expected = i < 0 ? i + length : i
      expect(translate_int(i, length)).toEqual([expected, 1, 1])
    }
  })

  test('rejects indices outside the axis', () => {
    expect(kind_of(() => translate_int(6, 6))).toBe('IndexOutOfRange')
    expect(kind_of(() => translate_int(-7, 6))).toBe('IndexOutOfRange')
    expect(() => translate_int(10, 10)).toThrow('index (10) out of range (0-9)')
  })
})

describe('translate_slice', () => {
  test('resolves bounds like a half-open range', () => {
    expect(translate_slice(slice(2, 8), 10)).toEqual([2, 6, 1])
    expect(translate_slice(slice(null), 10)).toEqual([0, 10, 1])
    expect(translate_slice(slice(1, 10, 3), 10)).toEqual([1, 3, 3])
    expect(translate_slice(slice(-3, null), 10)).toEqual([7, 3, 1])
    expect(translate_slice(slice(0, 100), 5)).toEqual([0, 5, 1])
  })

  test('empty ranges become the empty region', () => {
    expect(translate_slice(slice(5, 2), 10)).toEqual([0, 0, 1])
    expect(translate_slice(slice(3, 3), 10)).toEqual([0, 0, 1])
    expect(translate_slice(slice(20, null), 10)).toEqual([0, 0, 1])
  })

  test('count matches the number of elements a range iteration visits', () => {
    const length = 9
    const bounds = [null, -12, -4, -1, 0, 2, 5, 9, 14]
    for (const start of bounds) {
      for (const stop of bounds) {
        for (const step of [1, 2, 3, 7]) {
          const visited = Array.from({ length }, (_, i) => i)
            .slice(start ?? undefined, stop ?? undefined)
            .filter((_, i) => i % step === 0)
          const [first, count, stride] = translate_slice(slice(start, stop, step), length)
          expect(count).toBe(visited.length)
          if (count > 0) {
            expect(first).toBe(visited[0])
            expect(stride).toBe(step)
          }
        }
      }
    }
  })

  test('rejects steps below 1', () => {
    expect(kind_of(() => translate_slice(slice(null, null, 0), 10))).toBe('InvalidSliceStep')
    expect(kind_of(() => translate_slice(slice(null, null, -1), 10))).toBe('InvalidSliceStep')
  })
})

describe('translate_multi_block_slice', () => {
  const block = new MultiBlockSlice({ start: 2, stride: 3, count: 2, block: 2 })

  test('validates an explicit count against the axis length', () => {
    expect(translate_multi_block_slice(block, 10)).toEqual([2, 2, 3, 2])
  })

  test('reports the canonical form when the range does not fit', () => {
    expect(kind_of(() => translate_multi_block_slice(block, 6))).toBe(
      'InvalidMultiBlockParameters',
    )
    expect(() => translate_multi_block_slice(block, 6)).toThrow(
      'MultiBlockSlice(start=2, stride=3, count=2, block=2) range (2 - 6) extends beyond maximum index (5)',
    )
  })

  test('fits as many full blocks as possible when count is omitted', () => {
    const open = new MultiBlockSlice({ stride: 3, block: 2 })
    expect(translate_multi_block_slice(open, 10)).toEqual([0, 3, 3, 2])
  })

  test('fails when not even one block fits', () => {
    const late = new MultiBlockSlice({ start: 8, stride: 3, block: 3 })
    expect(() => translate_multi_block_slice(late, 10)).toThrow(
      'no full blocks can be selected using MultiBlockSlice(start=8, stride=3, count=null, block=3) on dimension of length 10',
    )
  })
})

describe('handle_simple', () => {
  test('translates every axis after expanding the ellipsis', () => {
    expect(handle_simple([10, 5, 4, 2], parse_args(['...', 0]))).toEqual({
      start: [0, 0, 0, 0],
      count: [10, 5, 4, 1],
      stride: [1, 1, 1, 1],
      block: [1, 1, 1, 1],
      scalar: [false, false, false, true],
    })
  })

  test('mixes integers, slices and strided blocks', () => {
    const sel = handle_simple(
      [4, 10, 8],
      parse_args([-1, new MultiBlockSlice({ start: 1, stride: 4, count: 2, block: 2 }), slice(2, null, 2)]),
    )
    expect(sel).toEqual({
      start: [3, 1, 2],
      count: [1, 2, 3],
      stride: [1, 4, 2],
      block: [1, 2, 1],
      scalar: [true, false, false],
    })
  })

  test('rejects index lists', () => {
    expect(kind_of(() => handle_simple([4, 4], parse_args([[1, 2], 0])))).toBe('InvalidIndexType')
  })
})
