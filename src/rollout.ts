import { sampleChanceOutcome } from './chance'
import { Game } from './game'
import { ALL_ACTIONS } from './play'
import * as t from './types'

function randomAction(rng: () => number): t.Action {
  return ALL_ACTIONS[Math.floor(rng() * ALL_ACTIONS.length)]
}

/**
 * Plays one episode to the end: the chance draw, then uniformly random
 * actions for both agents each turn. Deterministic for a given rng.
 */
export function randomRollout(game: Game, rng: () => number): t.RolloutResult {
  const episode = game.newInitialState()
  const chanceOutcome = sampleChanceOutcome(rng)
  episode.applyChanceOutcome(chanceOutcome)

  while (!episode.isTerminal()) {
    episode.applySimultaneousActions(randomAction(rng), randomAction(rng))
  }

  const state = episode.snapshot()
  return {
    chanceOutcome,
    steps: state.stepCount,
    won: state.won,
    totalReturn: episode.totalReturn()[0],
  }
}
