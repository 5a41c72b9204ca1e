/**
 * Repository exports
 */

export { BaseRepository } from './base-repository'
export { ActiveAgentRepository } from './active-agent-repository'
export { PerformanceRepository } from './performance-repository'
export { PredictionRepository, type PredictionInput } from './prediction-repository'
export { RankingRepository } from './ranking-repository'
export { RegimeRepository } from './regime-repository'
export { RotationRepository } from './rotation-repository'
