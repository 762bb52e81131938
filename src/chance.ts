import { InvalidActionError } from './errors'
import { ChanceOutcome, Player } from './types'

export const NUM_CHANCE_OUTCOMES = 4

export interface Initiative {
  /** Agent that wins a contested cell */
  priority: Player
  /** Start orientations rotated 180° from the layout's */
  mirrored: boolean
}

/** The single draw made at episode start: four outcomes, equally likely */
export function chanceOutcomes(): ChanceOutcome[] {
  return Array.from({ length: NUM_CHANCE_OUTCOMES }, (_, outcome) => ({
    outcome,
    probability: 1 / NUM_CHANCE_OUTCOMES,
  }))
}

export function isChanceOutcome(outcome: number): boolean {
  return Number.isInteger(outcome) && outcome >= 0 && outcome < NUM_CHANCE_OUTCOMES
}

/** Bit 0 picks the priority agent, bit 1 mirrors the start orientations */
export function decodeChanceOutcome(outcome: number): Initiative {
  if (!isChanceOutcome(outcome)) {
    throw new InvalidActionError(`Chance outcome must be 0..${NUM_CHANCE_OUTCOMES - 1}, got ${outcome}`)
  }
  return {
    priority: (outcome & 1) === 0 ? 0 : 1,
    mirrored: (outcome & 2) !== 0,
  }
}

export function chanceOutcomeToString(outcome: number): string {
  const { priority, mirrored } = decodeChanceOutcome(outcome)
  return `initiative: agent ${priority}, orientations: ${mirrored ? 'mirrored' : 'default'}`
}

/** Inverse-CDF draw over chanceOutcomes() */
export function sampleChanceOutcome(rng: () => number): number {
  const u = rng()
  let cumulative = 0
  for (const { outcome, probability } of chanceOutcomes()) {
    cumulative += probability
    if (u < cumulative) return outcome
  }
  return NUM_CHANCE_OUTCOMES - 1
}
