import fs from 'fs'
import path from 'path'
import { LayoutError, OutOfBoundsError } from './errors'
import { CellType, Coord, Layout, Orientation, Pair, ReadonlyCoord } from './types'

const CHAR_TO_CELL: Record<string, CellType> = {
  '.': CellType.Open,
  '#': CellType.Wall,
  b: CellType.SmallObject,
  B: CellType.LargeObject,
  G: CellType.Goal,
  '0': CellType.Open, // Agent starts treated as open
  '1': CellType.Open,
}

export const DEFAULT_LAYOUT_TEXT = [
  '...G....',
  '........',
  '........',
  '.b.BB...',
  '........',
  '........',
  '.0....1.',
  '........',
].join('\n')

function areAdjacent(a: Coord, b: Coord): boolean {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]) === 1
}

export function parseLayout(
  text: string,
  layoutId: string,
  orientations: Pair<Orientation> = [Orientation.East, Orientation.West],
): Layout {
  const lines = text.replace(/\n$/, '').split('\n')
  if (text.trim() === '') throw new LayoutError('Empty layout text')

  const height = lines.length
  const width = lines[0].length

  const agentStarts: (Coord | null)[] = [null, null]
  const smallObjects: Coord[] = []
  const largeObject: Coord[] = []
  const goals: Coord[] = []
  const grid: CellType[][] = []

  for (let row = 0; row < height; row++) {
    const line = lines[row]
    if (line.length !== width) {
      throw new LayoutError(`Row ${row} has length ${line.length}, expected ${width} (ragged rows)`)
    }
    const cells: CellType[] = []
    for (let col = 0; col < width; col++) {
      const ch = line[col]
      if (!(ch in CHAR_TO_CELL)) {
        throw new LayoutError(`Unknown character '${ch}' at (${row}, ${col})`)
      }
      cells.push(CHAR_TO_CELL[ch])
      if (ch === '0' || ch === '1') {
        const agent = Number(ch)
        if (agentStarts[agent] !== null) {
          throw new LayoutError(`Agent ${agent} start appears more than once`)
        }
        agentStarts[agent] = [row, col]
      } else if (ch === 'b') {
        smallObjects.push([row, col])
      } else if (ch === 'B') {
        largeObject.push([row, col])
      } else if (ch === 'G') {
        goals.push([row, col])
      }
    }
    grid.push(cells)
  }

  const [start0, start1] = agentStarts
  if (start0 === null || start1 === null) {
    throw new LayoutError("Layout needs one start for each agent ('0' and '1')")
  }
  if (goals.length !== 1) {
    throw new LayoutError(`Layout needs exactly one goal ('G'), found ${goals.length}`)
  }
  if (smallObjects.length !== 1) {
    throw new LayoutError(`Layout needs exactly one small object ('b'), found ${smallObjects.length}`)
  }
  if (largeObject.length !== 2 || !areAdjacent(largeObject[0], largeObject[1])) {
    throw new LayoutError("Large object ('B') must cover exactly two adjacent cells")
  }
  if (orientations.includes(Orientation.Invalid)) {
    throw new LayoutError('Start orientations must be a compass direction')
  }

  const name = layoutId
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ')

  return {
    id: layoutId,
    name,
    width,
    height,
    grid,
    agentStarts: [start0, start1],
    agentOrientations: orientations,
    smallObjectStart: smallObjects[0],
    largeObjectStart: largeObject,
    goal: goals[0],
  }
}

/** Reads a layout from a .txt file; the id is the file's base name */
export function loadLayout(filePath: string, orientations?: Pair<Orientation>): Layout {
  const raw = fs.readFileSync(filePath, 'utf-8')
  return parseLayout(raw, path.basename(filePath, '.txt'), orientations)
}

export function inBounds(layout: Layout, [row, col]: ReadonlyCoord): boolean {
  return row >= 0 && row < layout.height && col >= 0 && col < layout.width
}

/** Cell kind at coord. Call inBounds first where the coordinate may fall off the grid. */
export function cellKind(layout: Layout, coord: ReadonlyCoord): CellType {
  if (!inBounds(layout, coord)) throw new OutOfBoundsError(coord[0], coord[1])
  return layout.grid[coord[0]][coord[1]]
}

export const DEFAULT_LAYOUT = parseLayout(DEFAULT_LAYOUT_TEXT, 'coop_box_pushing')
