export enum CellType {
  Open,
  Wall,
  SmallObject,
  LargeObject,
  Goal,
}

export enum Orientation {
  North,
  East,
  South,
  West,
  Invalid,
}

export enum Action {
  TurnLeft,
  TurnRight,
  MoveForward,
  Stay,
}

export enum ActionStatus {
  Unresolved,
  Success,
  Fail,
}

/** Who acts next at a given episode state */
export enum Mover {
  Chance,
  Simultaneous,
  Terminal,
}

export type Player = 0 | 1

/** [row, col] */
export type Coord = [number, number]

export type ReadonlyCoord = readonly [number, number]

export type Pair<T> = [T, T]

/** Static map, loaded once and shared by every episode played on it */
export interface Layout {
  readonly id: string
  readonly name: string
  readonly width: number
  readonly height: number
  readonly grid: readonly (readonly CellType[])[] // grid[row][col]
  readonly agentStarts: readonly [ReadonlyCoord, ReadonlyCoord]
  readonly agentOrientations: readonly [Orientation, Orientation]
  readonly smallObjectStart: ReadonlyCoord
  readonly largeObjectStart: readonly ReadonlyCoord[]
  readonly goal: ReadonlyCoord
}

export interface Config {
  horizon: number
  stepCost: number
  winBonus: number
  bumpPenalty: number
  viewRadius: number
}

export interface AgentState {
  position: Coord
  orientation: Orientation
}

/** Runtime episode state. Never mutated: each resolved turn produces a new one. */
export interface EpisodeState {
  layout: Layout
  config: Config
  agents: Pair<AgentState>
  smallObject: Coord
  largeObject: Coord[]
  stepCount: number
  initiative: Player | null // null until the chance outcome is applied
  lastStatus: Pair<ActionStatus>
  lastReward: number
  totalReward: number
  won: boolean
}

export interface ChanceOutcome {
  outcome: number
  probability: number
}

/** Result of one random rollout */
export interface RolloutResult {
  chanceOutcome: number
  steps: number
  won: boolean
  totalReturn: number
}
