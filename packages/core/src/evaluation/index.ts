export { StaticActiveAgentSet } from './active-agents'
export {
  calculateEma,
  calculatePercentB,
  calculateRelativeMacd,
  calculateRsi,
  computeMarketIndicators,
} from './market-indicators'
export { MetaEvaluationEngine } from './meta-evaluation-engine'
export type { MetaEvaluationEngineDependencies } from './meta-evaluation-engine'
export { MockEvaluationStore } from './mock-evaluation-store'
export { deriveMetrics, neutralDefaultRecord, PerformanceScorer } from './performance-scorer'
export type { PerformanceScorerOptions } from './performance-scorer'
export { abortableSleep, PeriodicCycle } from './periodic-cycle'
export type { PeriodicCycleOptions } from './periodic-cycle'
export {
  buildFallbackRanking,
  COMPOSITE_WEIGHTS,
  computeCompositeScore,
  RankingEngine,
  rankPerformanceRecords,
} from './ranking-engine'
export type { RankingEngineOptions, RegimeRanking } from './ranking-engine'
export {
  classifyRegime,
  computeSeriesStatistics,
  FALLBACK_INDICATORS,
  fallbackSnapshot,
  RegimeClassifier,
  trendDirectionOf,
} from './regime-classifier'
export type { RegimeClassifierOptions, RegimeDecision, SeriesStatistics } from './regime-classifier'
export {
  DEFAULT_ROTATION_THRESHOLD,
  evaluateRotation,
  RotationDecisionEngine,
  rotationDecisionId,
} from './rotation-engine'
export type { RotationDecisionEngineOptions } from './rotation-engine'
export { defaultSummary, SummaryAssembler } from './summary-assembler'
export type {
  EvaluationSummary,
  RotationSummary,
  SummaryAssemblerOptions,
  TopAgentSummary,
} from './summary-assembler'
export { FixedEstimator, SeededEstimator } from './synthetic-estimator'
export type { SyntheticEstimator } from './synthetic-estimator'
