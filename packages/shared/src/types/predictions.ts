import type { EpochDate } from './dates'

export const DIRECTIONS = ['up', 'down', 'neutral'] as const

/** Price direction an agent can call */
export type Direction = (typeof DIRECTIONS)[number]

/**
 * A prediction made by an agent together with the direction the market actually took.
 */
export interface PredictionOutcome {
  readonly confidence: number
  readonly predictedDirection: Direction
  /** Null while the outcome is not known yet */
  readonly actualDirection: Direction | null
  readonly timestamp: EpochDate
}

export function isDirection(value: string): value is Direction {
  return DIRECTIONS.some(direction => direction === value)
}
