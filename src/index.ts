export * from './types'
export * from './errors'
export { DEFAULT_CONFIG, parseConfig } from './config'
export { DEFAULT_LAYOUT, DEFAULT_LAYOUT_TEXT, cellKind, inBounds, loadLayout, parseLayout } from './layout'
export {
  NUM_CHANCE_OUTCOMES,
  chanceOutcomeToString,
  chanceOutcomes,
  decodeChanceOutcome,
  sampleChanceOutcome,
} from './chance'
export type { Initiative } from './chance'
export {
  ALL_ACTIONS,
  actionToString,
  applyChanceOutcome,
  createInitialState,
  isTerminal,
  stateToString,
  step,
} from './play'
export { Channel, observationShape, observationSize, stateToObservation } from './observation'
export { Episode, Game, NUM_PLAYERS } from './game'
export { randomRollout } from './rollout'
