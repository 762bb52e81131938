/**
 * Egocentric, partially-observable encoding of one agent's view.
 *
 * An agent sees a (2r+1) x (2r+1) window centred on itself, where r is
 * config.viewRadius. The window is rotated with the agent: the top row is
 * what lies ahead, the right column what lies to its right. It never sees
 * the other agent's orientation or anything outside the window.
 *
 * Encoding (row-major over the window, then scalars):
 *   [cell(0,0)[0..6], cell(0,1)[0..6], ..., cell(2r,2r)[0..6],
 *    facing_north, facing_east, facing_south, facing_west,
 *    steps_remaining / horizon, won]
 *
 * - Each cell is multi-hot over Channel: terrain (Open, Wall, Goal) plus
 *   whatever stands on it (SmallObject, LargeObject, Self, OtherAgent)
 * - Cells off the grid read as Wall
 * - dtype: Float32
 */
import { StaleStateAccessError } from './errors'
import { cellKind, inBounds } from './layout'
import { forward, otherPlayer, rotate, sameCell } from './play'
import * as t from './types'

export enum Channel {
  Open,
  Wall,
  Goal,
  SmallObject,
  LargeObject,
  Self,
  OtherAgent,
}

export const NUM_CHANNELS = 7
export const NUM_SCALAR_FEATURES = 6

const FACINGS = [t.Orientation.North, t.Orientation.East, t.Orientation.South, t.Orientation.West]

export function observationSize(viewRadius: number): number {
  const side = 2 * viewRadius + 1
  return side * side * NUM_CHANNELS + NUM_SCALAR_FEATURES
}

export function observationShape(viewRadius: number): number[] {
  return [observationSize(viewRadius)]
}

/** World cell for window offset (ahead, right) relative to the agent */
function egocentricCell(agent: t.AgentState, ahead: number, right: number): t.Coord {
  const [fr, fc] = forward([0, 0], agent.orientation)
  const [rr, rc] = forward([0, 0], rotate(agent.orientation, 1))
  const [row, col] = agent.position
  return [row + ahead * fr + right * rr, col + ahead * fc + right * rc]
}

function encodeCell(state: t.EpisodeState, player: t.Player, coord: t.Coord, out: number[]) {
  const channels = new Array<number>(NUM_CHANNELS).fill(0)

  if (!inBounds(state.layout, coord)) {
    channels[Channel.Wall] = 1
    out.push(...channels)
    return
  }

  const kind = cellKind(state.layout, coord)
  if (kind === t.CellType.Wall) channels[Channel.Wall] = 1
  else if (kind === t.CellType.Goal) channels[Channel.Goal] = 1
  else channels[Channel.Open] = 1

  if (sameCell(state.smallObject, coord)) channels[Channel.SmallObject] = 1
  if (state.largeObject.some((c) => sameCell(c, coord))) channels[Channel.LargeObject] = 1
  if (sameCell(state.agents[player].position, coord)) channels[Channel.Self] = 1
  if (sameCell(state.agents[otherPlayer(player)].position, coord)) {
    channels[Channel.OtherAgent] = 1
  }

  out.push(...channels)
}

/**
 * Fresh observation vector for one agent. Throws StaleStateAccessError
 * before the chance outcome has assigned orientations.
 */
export function stateToObservation(state: t.EpisodeState, player: t.Player): Float32Array {
  const agent = state.agents[player]
  if (state.initiative === null || agent.orientation === t.Orientation.Invalid) {
    throw new StaleStateAccessError('Observation requested before the chance outcome was applied')
  }

  const radius = state.config.viewRadius
  const values: number[] = []

  for (let ahead = radius; ahead >= -radius; ahead--) {
    for (let right = -radius; right <= radius; right++) {
      encodeCell(state, player, egocentricCell(agent, ahead, right), values)
    }
  }

  for (const o of FACINGS) values.push(agent.orientation === o ? 1 : 0)
  const { horizon } = state.config
  values.push((horizon - state.stepCount) / horizon)
  values.push(state.won ? 1 : 0)

  return Float32Array.from(values)
}
