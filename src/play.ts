import { decodeChanceOutcome } from './chance'
import { InvalidActionError, StaleStateAccessError } from './errors'
import { cellKind, inBounds } from './layout'
import * as t from './types'

const COMPASS: t.Orientation[] = [
  t.Orientation.North,
  t.Orientation.East,
  t.Orientation.South,
  t.Orientation.West,
]

// Indexed by Orientation
const ROW_OFFSETS = [-1, 0, 1, 0]
const COL_OFFSETS = [0, 1, 0, -1]

export const ALL_ACTIONS: t.Action[] = [
  t.Action.TurnLeft,
  t.Action.TurnRight,
  t.Action.MoveForward,
  t.Action.Stay,
]

/** Resolution of one agent's action, before it is applied */
type Outcome =
  | { kind: 'stay'; status: t.ActionStatus; orientation: t.Orientation }
  | { kind: 'move'; target: t.Coord; pushTo: t.Coord | null }

type Plan = Outcome | { kind: 'push-large'; target: t.Coord }

function assertNever(value: never): never {
  throw new InvalidActionError(`Unhandled value ${String(value)}`)
}

export function otherPlayer(player: t.Player): t.Player {
  return player === 0 ? 1 : 0
}

export function isAction(value: number): value is t.Action {
  return Number.isInteger(value) && value >= t.Action.TurnLeft && value <= t.Action.Stay
}

export function sameCell(a: t.ReadonlyCoord, b: t.ReadonlyCoord): boolean {
  return a[0] === b[0] && a[1] === b[1]
}

function containsCell(cells: readonly t.ReadonlyCoord[], coord: t.ReadonlyCoord): boolean {
  return cells.some((c) => sameCell(c, coord))
}

/** Rotate clockwise by a number of quarter turns */
export function rotate(orientation: t.Orientation, quarterTurns: number): t.Orientation {
  if (orientation === t.Orientation.Invalid) {
    throw new StaleStateAccessError('Agent orientation has not been assigned')
  }
  return COMPASS[(orientation + quarterTurns) % 4]
}

/** The cell one step ahead of coord along orientation (may be off the grid) */
export function forward([row, col]: t.ReadonlyCoord, orientation: t.Orientation): t.Coord {
  if (orientation === t.Orientation.Invalid) {
    throw new StaleStateAccessError('Agent orientation has not been assigned')
  }
  return [row + ROW_OFFSETS[orientation], col + COL_OFFSETS[orientation]]
}

function isPassable(layout: t.Layout, coord: t.ReadonlyCoord): boolean {
  return inBounds(layout, coord) && cellKind(layout, coord) !== t.CellType.Wall
}

/** Copy of a layout coordinate, so episodes never share arrays with the layout */
function copyCoord([row, col]: t.ReadonlyCoord): t.Coord {
  return [row, col]
}

/** Fresh episode: agents and objects on their start cells, waiting for the chance draw */
export function createInitialState(layout: t.Layout, config: t.Config): t.EpisodeState {
  return {
    layout,
    config,
    agents: [
      { position: copyCoord(layout.agentStarts[0]), orientation: t.Orientation.Invalid },
      { position: copyCoord(layout.agentStarts[1]), orientation: t.Orientation.Invalid },
    ],
    smallObject: copyCoord(layout.smallObjectStart),
    largeObject: layout.largeObjectStart.map(copyCoord),
    stepCount: 0,
    initiative: null,
    lastStatus: [t.ActionStatus.Unresolved, t.ActionStatus.Unresolved],
    lastReward: 0,
    totalReward: 0,
    won: false,
  }
}

/** Fixes initiative and start orientations. Allowed once per episode. */
export function applyChanceOutcome(state: t.EpisodeState, outcome: number): t.EpisodeState {
  if (state.initiative !== null) {
    throw new InvalidActionError('Chance outcome was already applied for this episode')
  }
  const { priority, mirrored } = decodeChanceOutcome(outcome)
  const turns = mirrored ? 2 : 0
  const [base0, base1] = state.layout.agentOrientations

  return {
    ...state,
    initiative: priority,
    agents: [
      { ...state.agents[0], orientation: rotate(base0, turns) },
      { ...state.agents[1], orientation: rotate(base1, turns) },
    ],
  }
}

export function isTerminal(state: t.EpisodeState): boolean {
  return state.won || state.stepCount >= state.config.horizon
}

function fail(orientation: t.Orientation): Outcome {
  return { kind: 'stay', status: t.ActionStatus.Fail, orientation }
}

function planMove(state: t.EpisodeState, player: t.Player): Plan {
  const me = state.agents[player]
  const other = state.agents[otherPlayer(player)]
  const target = forward(me.position, me.orientation)

  if (!isPassable(state.layout, target)) return fail(me.orientation)
  if (containsCell(state.largeObject, target)) return { kind: 'push-large', target }

  if (sameCell(target, state.smallObject)) {
    const pushTo = forward(target, me.orientation)
    if (
      !isPassable(state.layout, pushTo) ||
      sameCell(pushTo, other.position) ||
      containsCell(state.largeObject, pushTo)
    ) {
      return fail(me.orientation)
    }
    return { kind: 'move', target, pushTo }
  }

  return { kind: 'move', target, pushTo: null }
}

function planAction(state: t.EpisodeState, player: t.Player, action: t.Action): Plan {
  const { orientation } = state.agents[player]
  switch (action) {
    case t.Action.TurnLeft:
      return { kind: 'stay', status: t.ActionStatus.Success, orientation: rotate(orientation, 3) }
    case t.Action.TurnRight:
      return { kind: 'stay', status: t.ActionStatus.Success, orientation: rotate(orientation, 1) }
    case t.Action.Stay:
      return { kind: 'stay', status: t.ActionStatus.Success, orientation }
    case t.Action.MoveForward:
      return planMove(state, player)
    default:
      return assertNever(action)
  }
}

/**
 * The large object moves only when both agents push it together: same
 * orientation, each entering a different footprint cell, and every cell of
 * the shifted footprint free. Returns the shifted footprint, or null.
 */
function largeObjectDestination(state: t.EpisodeState, plans: t.Pair<Plan>): t.Coord[] | null {
  const [plan0, plan1] = plans
  if (plan0.kind !== 'push-large' || plan1.kind !== 'push-large') return null

  const orientation = state.agents[0].orientation
  if (state.agents[1].orientation !== orientation) return null
  if (sameCell(plan0.target, plan1.target)) return null

  const shifted = state.largeObject.map((c) => forward(c, orientation))
  const clear = shifted.every(
    (c) =>
      isPassable(state.layout, c) &&
      !sameCell(c, state.smallObject) &&
      !state.agents.some((a) => sameCell(a.position, c)),
  )
  return clear ? shifted : null
}

function claims(outcome: Outcome): t.Coord[] {
  if (outcome.kind !== 'move') return []
  return outcome.pushTo === null ? [outcome.target] : [outcome.target, outcome.pushTo]
}

/**
 * Resolves one simultaneous turn. Every outcome is computed from the
 * pre-turn state and applied at once, so the order agents are looked at in
 * never matters. Initiative only decides which agent gets a contested cell.
 *
 * Returns a NEW EpisodeState; the input is left untouched.
 */
export function step(state: t.EpisodeState, actions: t.Pair<t.Action>): t.EpisodeState {
  if (state.initiative === null) {
    throw new InvalidActionError('Chance outcome must be applied before the first turn')
  }
  if (isTerminal(state)) {
    throw new InvalidActionError('Episode is over; no further turns can be resolved')
  }
  const priority = state.initiative
  const [pos0, pos1] = [state.agents[0].position, state.agents[1].position]

  const plans: t.Pair<Plan> = [planAction(state, 0, actions[0]), planAction(state, 1, actions[1])]

  const largeTo = largeObjectDestination(state, plans)
  const outcomes = plans.map((plan, p): Outcome => {
    if (plan.kind !== 'push-large') return plan
    return largeTo === null
      ? fail(state.agents[p].orientation)
      : { kind: 'move', target: plan.target, pushTo: null }
  })
  let [out0, out1] = outcomes

  // Head-on swap: neither agent moves
  if (
    out0.kind === 'move' &&
    out1.kind === 'move' &&
    sameCell(out0.target, pos1) &&
    sameCell(out1.target, pos0)
  ) {
    out0 = fail(state.agents[0].orientation)
    out1 = fail(state.agents[1].orientation)
  }

  // Contested cell: only the agent with initiative keeps its move
  const claims1 = claims(out1)
  if (claims(out0).some((c) => containsCell(claims1, c))) {
    if (priority === 0) out1 = fail(state.agents[1].orientation)
    else out0 = fail(state.agents[0].orientation)
  }

  // Entering the other agent's cell works only if that agent leaves it
  if (out0.kind === 'move' && sameCell(out0.target, pos1) && out1.kind !== 'move') {
    out0 = fail(state.agents[0].orientation)
  }
  if (out1.kind === 'move' && sameCell(out1.target, pos0) && out0.kind !== 'move') {
    out1 = fail(state.agents[1].orientation)
  }

  const resolved: t.Pair<Outcome> = [out0, out1]
  const agents = resolved.map((outcome, p): t.AgentState => {
    const agent = state.agents[p]
    return outcome.kind === 'move'
      ? { position: outcome.target, orientation: agent.orientation }
      : { position: agent.position, orientation: outcome.orientation }
  })
  const lastStatus = resolved.map((outcome) =>
    outcome.kind === 'move' ? t.ActionStatus.Success : outcome.status,
  )

  let smallObject = state.smallObject
  for (const outcome of resolved) {
    if (outcome.kind === 'move' && outcome.pushTo !== null) smallObject = outcome.pushTo
  }

  const largeObject = largeTo === null ? state.largeObject : largeTo
  const won = largeTo !== null && containsCell(largeTo, state.layout.goal)

  const { stepCost, winBonus, bumpPenalty } = state.config
  const failures = lastStatus.filter((s) => s === t.ActionStatus.Fail).length
  let reward = stepCost + bumpPenalty * failures
  if (won) reward += winBonus

  return {
    ...state,
    agents: [agents[0], agents[1]],
    smallObject,
    largeObject,
    stepCount: state.stepCount + 1,
    lastStatus: [lastStatus[0], lastStatus[1]],
    lastReward: reward,
    totalReward: state.totalReward + reward,
    won,
  }
}

export function actionToString(action: t.Action): string {
  switch (action) {
    case t.Action.TurnLeft:
      return 'turn left'
    case t.Action.TurnRight:
      return 'turn right'
    case t.Action.MoveForward:
      return 'move forward'
    case t.Action.Stay:
      return 'stay'
    default:
      return assertNever(action)
  }
}

const ORIENTATION_CHAR: Record<t.Orientation, string> = {
  [t.Orientation.North]: '^',
  [t.Orientation.East]: '>',
  [t.Orientation.South]: 'v',
  [t.Orientation.West]: '<',
  [t.Orientation.Invalid]: '?',
}

function cellChar(state: t.EpisodeState, coord: t.Coord): string {
  for (const [p, agent] of state.agents.entries()) {
    if (!sameCell(agent.position, coord)) continue
    return agent.orientation === t.Orientation.Invalid ? String(p) : ORIENTATION_CHAR[agent.orientation]
  }
  if (sameCell(state.smallObject, coord)) return 'b'
  if (containsCell(state.largeObject, coord)) return 'B'

  switch (cellKind(state.layout, coord)) {
    case t.CellType.Wall:
      return '#'
    case t.CellType.Goal:
      return 'G'
    default:
      return '.'
  }
}

/** Debug rendering: the grid row by row, then one line per status field */
export function stateToString(state: t.EpisodeState): string {
  const lines: string[] = []
  for (let row = 0; row < state.layout.height; row++) {
    let line = ''
    for (let col = 0; col < state.layout.width; col++) line += cellChar(state, [row, col])
    lines.push(line)
  }

  state.agents.forEach((agent, p) => {
    const [row, col] = agent.position
    lines.push(
      `Agent ${p}: (${row}, ${col}) facing ${t.Orientation[agent.orientation]}, ` +
        `last action ${t.ActionStatus[state.lastStatus[p]]}`,
    )
  })
  lines.push(`Initiative: ${state.initiative === null ? 'undecided' : `agent ${state.initiative}`}`)
  lines.push(`Step: ${state.stepCount}/${state.config.horizon}`)
  lines.push(`Last reward: ${state.lastReward}`)
  lines.push(`Total reward: ${state.totalReward}`)
  lines.push(`Won: ${state.won ? 'yes' : 'no'}`)
  return lines.join('\n')
}
