export { EventBus } from './event-bus'
export { RealTimeSource, SimulatedTimeSource } from './time-source'
export type { TimeSource } from './time-source'
export { CYCLE_NAMES, EventTypes, isCycleName } from './types'
export type {
  CycleFailedEvent,
  CycleName,
  EvaluationEvents,
  EvaluationEventType,
  EventData,
  EventHandler,
  EventSubscription,
  PerformanceCollectedEvent,
  RankingsUpdatedEvent,
  RegimeClassifiedEvent,
  RotationRecommendedEvent,
} from './types'
