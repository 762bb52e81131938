import { describe, test, expect } from 'vitest'
import {
  NUM_CHANCE_OUTCOMES,
  chanceOutcomeToString,
  chanceOutcomes,
  decodeChanceOutcome,
  sampleChanceOutcome,
} from '../src/chance'
import { InvalidActionError } from '../src/errors'

describe('initiative chance', () => {
  test('four equally likely outcomes', () => {
    const outcomes = chanceOutcomes()
    expect(outcomes.map((o) => o.outcome)).toEqual([0, 1, 2, 3])
    expect(outcomes.every((o) => o.probability === 0.25)).toBe(true)
    expect(NUM_CHANCE_OUTCOMES).toBe(4)
  })

  test('decodes priority and mirroring from the outcome bits', () => {
    expect(decodeChanceOutcome(0)).toEqual({ priority: 0, mirrored: false })
    expect(decodeChanceOutcome(1)).toEqual({ priority: 1, mirrored: false })
    expect(decodeChanceOutcome(2)).toEqual({ priority: 0, mirrored: true })
    expect(decodeChanceOutcome(3)).toEqual({ priority: 1, mirrored: true })
  })

  test('rejects outcomes outside 0..3', () => {
    expect(() => decodeChanceOutcome(4)).toThrow(InvalidActionError)
    expect(() => decodeChanceOutcome(-1)).toThrow(InvalidActionError)
    expect(() => decodeChanceOutcome(1.5)).toThrow('Chance outcome must be 0..3, got 1.5')
  })

  test('describes an outcome', () => {
    expect(chanceOutcomeToString(3)).toBe('initiative: agent 1, orientations: mirrored')
    expect(chanceOutcomeToString(0)).toBe('initiative: agent 0, orientations: default')
  })

  test('samples by cumulative probability', () => {
    expect(sampleChanceOutcome(() => 0)).toBe(0)
    expect(sampleChanceOutcome(() => 0.3)).toBe(1)
    expect(sampleChanceOutcome(() => 0.6)).toBe(2)
    expect(sampleChanceOutcome(() => 0.99)).toBe(3)
  })
})
