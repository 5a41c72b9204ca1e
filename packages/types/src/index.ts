// Logging
export type { Logger } from './logger'

// Market data provider
export type {
  MarketDataProvider
} from './market-data'

// Store interfaces
export type {
  ActiveAgentSet,
  EvaluationStore,
  PredictionHistoryStore
} from './repositories'
