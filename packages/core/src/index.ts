/**
 * Meta-evaluation engine exports
 */

// Configuration
export * from './config'

// Event system
export * from './events'

// Regime, scoring, ranking and rotation
export * from './evaluation'

// Market data
export * from './market-data'

// Logging and timeouts
export * from './utils'

// Re-export shared types for convenience
export type {
  AgentPerformanceRecord,
  AgentRanking,
  MarketIndicators,
  MarketRegime,
  PerformanceAggregates,
  PerformanceMetrics,
  PriceBar,
  PredictionOutcome,
  RegimeSnapshot,
  RotationDecision,
} from '@metaeval/shared'

export const version = '1.0.0'
