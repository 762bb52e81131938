import { InvalidConfigError } from './errors'
import * as t from './types'

export const DEFAULT_CONFIG: t.Config = {
  horizon: 100,
  stepCost: -0.1,
  winBonus: 100,
  bumpPenalty: 0,
  viewRadius: 1,
}

type Rule = (value: number) => boolean

const RULES: Record<keyof t.Config, [Rule, string]> = {
  horizon: [(v) => Number.isInteger(v) && v > 0, 'a positive integer'],
  stepCost: [(v) => Number.isFinite(v) && v <= 0, 'a finite number <= 0'],
  winBonus: [(v) => Number.isFinite(v) && v >= 0, 'a finite number >= 0'],
  bumpPenalty: [(v) => Number.isFinite(v) && v <= 0, 'a finite number <= 0'],
  viewRadius: [(v) => Number.isInteger(v) && v >= 0, 'a non-negative integer'],
}

function isConfigKey(key: string): key is keyof t.Config {
  return key in RULES
}

/**
 * Builds a Config from loosely-typed game parameters, filling in defaults.
 * Throws InvalidConfigError on unknown keys or out-of-range values.
 */
export function parseConfig(params: Record<string, unknown> = {}): t.Config {
  const config: t.Config = { ...DEFAULT_CONFIG }

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue
    if (!isConfigKey(key)) {
      throw new InvalidConfigError(`Unknown parameter '${key}'`)
    }
    const [rule, expected] = RULES[key]
    if (typeof value !== 'number' || !rule(value)) {
      throw new InvalidConfigError(`Parameter '${key}' must be ${expected}, got ${String(value)}`)
    }
    config[key] = value
  }

  return config
}
