import { fileURLToPath } from 'url'
import { describe, test, expect } from 'vitest'
import { LayoutError, OutOfBoundsError } from '../src/errors'
import { DEFAULT_LAYOUT, cellKind, inBounds, loadLayout, parseLayout } from '../src/layout'
import { CellType, Orientation } from '../src/types'

describe('parseLayout', () => {
  test('default layout', () => {
    expect(DEFAULT_LAYOUT.width).toBe(8)
    expect(DEFAULT_LAYOUT.height).toBe(8)
    expect(DEFAULT_LAYOUT.goal).toEqual([0, 3])
    expect(DEFAULT_LAYOUT.agentStarts).toEqual([
      [6, 1],
      [6, 6],
    ])
    expect(DEFAULT_LAYOUT.agentOrientations).toEqual([Orientation.East, Orientation.West])
    expect(DEFAULT_LAYOUT.smallObjectStart).toEqual([3, 1])
    expect(DEFAULT_LAYOUT.largeObjectStart).toEqual([
      [3, 3],
      [3, 4],
    ])
    expect(DEFAULT_LAYOUT.name).toBe('Coop Box Pushing')
  })

  test('all cell type mappings', () => {
    const result = parseLayout('#.bBBG01', 'types')
    const row = result.grid[0]
    expect(row[0]).toBe(CellType.Wall)
    expect(row[1]).toBe(CellType.Open)
    expect(row[2]).toBe(CellType.SmallObject)
    expect(row[3]).toBe(CellType.LargeObject)
    expect(row[4]).toBe(CellType.LargeObject)
    expect(row[5]).toBe(CellType.Goal)
    expect(row[6]).toBe(CellType.Open) // Agent start → Open
    expect(row[7]).toBe(CellType.Open)
  })

  test('custom start orientations', () => {
    const result = parseLayout('.bBBG01', 'test', [Orientation.North, Orientation.South])
    expect(result.agentOrientations).toEqual([Orientation.North, Orientation.South])
  })

  test('missing agent throws', () => {
    expect(() => parseLayout('.bBBG0', 'test')).toThrow('one start for each agent')
  })

  test('duplicate agent throws', () => {
    expect(() => parseLayout('0bBBG0', 'test')).toThrow('Agent 0 start appears more than once')
  })

  test('goal count is checked', () => {
    expect(() => parseLayout('GbBBG01', 'test')).toThrow('exactly one goal')
  })

  test('large object must be two adjacent cells', () => {
    expect(() => parseLayout('B.bBG01', 'test')).toThrow('two adjacent cells')
    expect(() => parseLayout('.bBG01.', 'test')).toThrow('two adjacent cells')
  })

  test('vertical large object is accepted', () => {
    const result = parseLayout('B.b\nB01\nG..', 'vertical')
    expect(result.largeObjectStart).toEqual([
      [0, 0],
      [1, 0],
    ])
  })

  test('unknown character throws', () => {
    expect(() => parseLayout('.bBBG01x', 'test')).toThrow("Unknown character 'x' at (0, 7)")
  })

  test('ragged rows throws', () => {
    expect(() => parseLayout('.bBB\nG01', 'test')).toThrow(LayoutError)
    expect(() => parseLayout('.bBB\nG01', 'test')).toThrow('ragged')
  })

  test('id and name derived from layout id', () => {
    const result = parseLayout('.bBBG01', 'my_cool_layout')
    expect(result.id).toBe('my_cool_layout')
    expect(result.name).toBe('My Cool Layout')
  })
})

describe('layout queries', () => {
  test('inBounds', () => {
    expect(inBounds(DEFAULT_LAYOUT, [0, 0])).toBe(true)
    expect(inBounds(DEFAULT_LAYOUT, [7, 7])).toBe(true)
    expect(inBounds(DEFAULT_LAYOUT, [-1, 0])).toBe(false)
    expect(inBounds(DEFAULT_LAYOUT, [0, 8])).toBe(false)
  })

  test('cellKind reads the static grid', () => {
    expect(cellKind(DEFAULT_LAYOUT, [0, 3])).toBe(CellType.Goal)
    expect(cellKind(DEFAULT_LAYOUT, [3, 1])).toBe(CellType.SmallObject)
    expect(cellKind(DEFAULT_LAYOUT, [6, 1])).toBe(CellType.Open)
  })

  test('cellKind outside the grid throws', () => {
    expect(() => cellKind(DEFAULT_LAYOUT, [8, 0])).toThrow(OutOfBoundsError)
    expect(() => cellKind(DEFAULT_LAYOUT, [0, -1])).toThrow('Coordinate (0, -1) is outside the grid')
  })
})

describe('loadLayout', () => {
  test('reads a layout file from disk', () => {
    const file = fileURLToPath(new URL('../data/layouts/walled_corridor.txt', import.meta.url))
    const layout = loadLayout(file)

    expect(layout.id).toBe('walled_corridor')
    expect(layout.name).toBe('Walled Corridor')
    expect(layout.width).toBe(10)
    expect(layout.height).toBe(7)
    expect(layout.goal).toEqual([1, 4])
    expect(layout.agentStarts).toEqual([
      [5, 2],
      [5, 5],
    ])
    expect(layout.smallObjectStart).toEqual([4, 7])
    expect(layout.largeObjectStart).toEqual([
      [3, 3],
      [3, 4],
    ])
    expect(cellKind(layout, [0, 0])).toBe(CellType.Wall)
  })
})
