import { NUM_CHANCE_OUTCOMES, chanceOutcomes } from './chance'
import { parseConfig } from './config'
import { InvalidActionError, StaleStateAccessError } from './errors'
import { DEFAULT_LAYOUT } from './layout'
import { observationShape, stateToObservation } from './observation'
import * as play from './play'
import * as t from './types'

export const NUM_PLAYERS = 2

function toPlayer(player: number): t.Player {
  if (player === 0) return 0
  if (player === 1) return 1
  throw new InvalidActionError(`Player index must be 0 or 1, got ${player}`)
}

function toAction(action: number): t.Action {
  if (play.isAction(action)) return action
  throw new InvalidActionError(`Action must be one of 0..${t.Action.Stay}, got ${action}`)
}

/**
 * One episode as seen by a host turn-management loop: a chance node, then
 * simultaneous turns until the episode is won or the horizon is reached.
 */
export class Episode {
  private state: t.EpisodeState
  private pending: [t.Action | null, t.Action | null] = [null, null]

  constructor(state: t.EpisodeState) {
    this.state = state
  }

  currentMover(): t.Mover {
    if (this.state.initiative === null) return t.Mover.Chance
    if (play.isTerminal(this.state)) return t.Mover.Terminal
    return t.Mover.Simultaneous
  }

  /** No action masking in this domain: all four actions are always legal */
  legalActions(player: number): t.Action[] {
    toPlayer(player)
    return [...play.ALL_ACTIONS]
  }

  chanceOutcomes(): t.ChanceOutcome[] {
    return chanceOutcomes()
  }

  applyChanceOutcome(outcome: number): void {
    if (this.currentMover() !== t.Mover.Chance) {
      throw new InvalidActionError('Not a chance node')
    }
    this.state = play.applyChanceOutcome(this.state, outcome)
  }

  /** Records one agent's action; the turn resolves once both have been submitted */
  submitAction(player: number, action: number): void {
    if (this.currentMover() !== t.Mover.Simultaneous) {
      throw new InvalidActionError('Actions can only be submitted at a simultaneous-move node')
    }
    const p = toPlayer(player)
    if (this.pending[p] !== null) {
      throw new InvalidActionError(`Agent ${p} already submitted an action this turn`)
    }
    this.pending[p] = toAction(action)

    const [a0, a1] = this.pending
    if (a0 !== null && a1 !== null) this.resolve([a0, a1])
  }

  applySimultaneousActions(action0: number, action1: number): void {
    if (this.currentMover() !== t.Mover.Simultaneous) {
      throw new InvalidActionError('Actions can only be applied at a simultaneous-move node')
    }
    if (this.pending[0] !== null || this.pending[1] !== null) {
      throw new InvalidActionError('A turn is already partially submitted')
    }
    this.resolve([toAction(action0), toAction(action1)])
  }

  private resolve(actions: t.Pair<t.Action>) {
    this.state = play.step(this.state, actions)
    this.pending = [null, null]
  }

  isTerminal(): boolean {
    return this.currentMover() === t.Mover.Terminal
  }

  private assertStarted() {
    if (this.state.initiative === null) {
      throw new StaleStateAccessError('Episode has not started; apply a chance outcome first')
    }
  }

  /** Team reward of the last resolved turn; identical for both agents */
  stepReward(): t.Pair<number> {
    this.assertStarted()
    return [this.state.lastReward, this.state.lastReward]
  }

  totalReturn(): t.Pair<number> {
    this.assertStarted()
    return [this.state.totalReward, this.state.totalReward]
  }

  lastStatus(player: number): t.ActionStatus {
    return this.state.lastStatus[toPlayer(player)]
  }

  observationVector(player: number): Float32Array {
    return stateToObservation(this.state, toPlayer(player))
  }

  actionToString(action: number): string {
    return play.actionToString(toAction(action))
  }

  /** The current immutable state value */
  snapshot(): t.EpisodeState {
    return this.state
  }

  clone(): Episode {
    const copy = new Episode(this.state)
    copy.pending = [this.pending[0], this.pending[1]]
    return copy
  }

  toString(): string {
    return play.stateToString(this.state)
  }
}

/** Static facts about the game plus a factory for new episodes */
export class Game {
  readonly numPlayers = NUM_PLAYERS
  readonly numDistinctActions = play.ALL_ACTIONS.length
  readonly maxChanceOutcomes = NUM_CHANCE_OUTCOMES
  readonly config: t.Config
  readonly layout: t.Layout

  constructor(params: Record<string, unknown> = {}, layout: t.Layout = DEFAULT_LAYOUT) {
    this.config = parseConfig(params)
    this.layout = layout
  }

  maxGameLength(): number {
    return this.config.horizon
  }

  /** Every turn a step cost and both agents bumping */
  minUtility(): number {
    const { horizon, stepCost, bumpPenalty } = this.config
    return horizon * (stepCost + NUM_PLAYERS * bumpPenalty)
  }

  /** Winning on the very first turn */
  maxUtility(): number {
    return this.config.winBonus + this.config.stepCost
  }

  observationShape(): number[] {
    return observationShape(this.config.viewRadius)
  }

  newInitialState(): Episode {
    return new Episode(play.createInitialState(this.layout, this.config))
  }
}
