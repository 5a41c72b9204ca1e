import type { AgentPerformanceRecord, EpochDate, MarketRegime, PerformanceMetrics } from '@metaeval/shared'
import type { Logger, PredictionHistoryStore } from '@metaeval/types'
import type { TimeSource } from '../events/time-source'
import { describeError } from '../utils/logger'
import { withTimeout } from '../utils/with-timeout'
import type { SyntheticEstimator } from './synthetic-estimator'

/**
 * Metrics that follow from an accuracy figure.
 * sharpe = max(0, (a - 0.5) * 4), return = (a - 0.5) * 0.2,
 * drawdown = max(0, 0.1 - a * 0.2), win rate = a.
 */
export function deriveMetrics(accuracy: number, confidence: number, responseTime: number): PerformanceMetrics {
  return {
    accuracy,
    sharpeRatio: Math.max(0, (accuracy - 0.5) * 4),
    totalReturn: (accuracy - 0.5) * 0.2,
    maxDrawdown: Math.max(0, 0.1 - accuracy * 0.2),
    winRate: accuracy,
    confidence,
    responseTime,
  }
}

/**
 * Placeholder record for an agent whose scoring failed
 */
export function neutralDefaultRecord(agentId: string, regime: MarketRegime, timestamp: EpochDate): AgentPerformanceRecord {
  return {
    agentId,
    accuracy: 0.5,
    sharpeRatio: 0,
    totalReturn: 0,
    maxDrawdown: 0.1,
    winRate: 0.5,
    confidence: 0.5,
    responseTime: 1,
    regime,
    timestamp,
    source: 'default',
    sampleSize: 0,
  }
}

export interface PerformanceScorerOptions {
  readonly store: PredictionHistoryStore
  readonly estimator: SyntheticEstimator
  readonly timeSource: TimeSource
  readonly logger: Logger
  readonly historyWindowDays: number
  readonly historyLimit: number
  readonly timeoutMs: number
}

/**
 * Scores one agent for one regime from its recent prediction history
 */
export class PerformanceScorer {
  constructor(private readonly options: PerformanceScorerOptions) {}

  /**
   * Never rejects. No history gives a synthetic estimate, a failing store the neutral default.
   */
  async score(agentId: string, regime: MarketRegime): Promise<AgentPerformanceRecord> {
    const { store, estimator, timeSource, logger, historyWindowDays, historyLimit, timeoutMs } = this.options

    try {
      const predictions = await withTimeout(
        store.getRecentPredictions(agentId, historyWindowDays, historyLimit),
        timeoutMs,
        'getRecentPredictions',
      )
      const resolved = predictions.filter(p => p.actualDirection !== null)
      const timestamp = timeSource.nowEpoch()

      if (resolved.length === 0) {
        const base = estimator.uniform(0.4, 0.7)
        const responseTime = estimator.uniform(0.5, 3.0)
        return {
          agentId,
          ...deriveMetrics(base, base, responseTime),
          regime,
          timestamp,
          source: 'synthetic',
          sampleSize: 0,
        }
      }

      const correct = resolved.filter(p => p.predictedDirection === p.actualDirection).length
      const accuracy = correct / resolved.length
      const confidence = resolved.reduce((sum, p) => sum + p.confidence, 0) / resolved.length
      const responseTime = estimator.uniform(0.1, 2.0)

      return {
        agentId,
        ...deriveMetrics(accuracy, confidence, responseTime),
        regime,
        timestamp,
        source: 'history',
        sampleSize: resolved.length,
      }
    } catch (error) {
      logger.warn('Scoring failed, using neutral default', { agentId, regime, error: describeError(error) })
      return neutralDefaultRecord(agentId, regime, timeSource.nowEpoch())
    }
  }
}
