import type {
  AgentPerformanceRecord,
  AgentRanking,
  EpochDate,
  MarketRegime,
  RegimeSnapshot,
  RotationDecision,
} from '@metaeval/shared'

/**
 * Base event data interface
 */
export interface EventData {
  readonly timestamp: EpochDate
}

/**
 * Event handler function type
 */
export type EventHandler<T extends EventData> = (data: T) => void | Promise<void>

/**
 * Event subscription returned when subscribing
 */
export interface EventSubscription {
  readonly id: number
  readonly eventType: string
  unsubscribe(): void
}

/**
 * Names of the periodic cycles the engine runs
 */
export type CycleName = 'performance' | 'ranking' | 'rotation' | 'regime'

export const CYCLE_NAMES: readonly CycleName[] = ['performance', 'ranking', 'rotation', 'regime']

export function isCycleName(value: string): value is CycleName {
  return CYCLE_NAMES.some(name => name === value)
}

// Evaluation events
export interface RegimeClassifiedEvent extends EventData {
  readonly snapshot: RegimeSnapshot
}

export interface PerformanceCollectedEvent extends EventData {
  readonly regime: MarketRegime
  readonly records: readonly AgentPerformanceRecord[]
  readonly failedWrites: number
}

export interface RankingsUpdatedEvent extends EventData {
  readonly regime: MarketRegime
  readonly rankings: readonly AgentRanking[]
}

export interface RotationRecommendedEvent extends EventData {
  readonly decision: RotationDecision
}

export interface CycleFailedEvent extends EventData {
  readonly cycle: CycleName
  readonly error: string
}

/**
 * Payload of every event the evaluation engine emits, by event type
 */
export interface EvaluationEvents {
  'regime.classified': RegimeClassifiedEvent
  'performance.collected': PerformanceCollectedEvent
  'rankings.updated': RankingsUpdatedEvent
  'rotation.recommended': RotationRecommendedEvent
  'cycle.failed': CycleFailedEvent
}

export type EvaluationEventType = keyof EvaluationEvents

/**
 * Event type constants
 */
export const EventTypes = {
  REGIME_CLASSIFIED: 'regime.classified',
  PERFORMANCE_COLLECTED: 'performance.collected',
  RANKINGS_UPDATED: 'rankings.updated',
  ROTATION_RECOMMENDED: 'rotation.recommended',
  CYCLE_FAILED: 'cycle.failed',
} as const satisfies Record<string, EvaluationEventType>
