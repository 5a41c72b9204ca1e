import {
  type AgentPerformanceRecord,
  type AgentRanking,
  type EpochDate,
  hoursBefore,
  type MarketRegime,
  type PerformanceMetrics,
} from '@metaeval/shared'
import type { EvaluationStore, Logger } from '@metaeval/types'
import type { TimeSource } from '../events/time-source'
import { describeError } from '../utils/logger'
import { withTimeout } from '../utils/with-timeout'
import { deriveMetrics } from './performance-scorer'
import type { SyntheticEstimator } from './synthetic-estimator'

/**
 * Weights of the composite score, summing to 1
 */
export const COMPOSITE_WEIGHTS = {
  accuracy: 0.25,
  sharpeRatio: 0.2,
  totalReturn: 0.2,
  winRate: 0.15,
  confidence: 0.1,
  latency: 0.1,
} as const

/**
 * Ranking of one regime as produced by a ranking pass
 */
export interface RegimeRanking {
  readonly regime: MarketRegime
  readonly rankings: readonly AgentRanking[]
  /** True when no performance records were available and the ranking was estimated */
  readonly fallback: boolean
}

/**
 * Weighted blend of the metrics. Latency contributes 1 / (1 + responseTime).
 */
export function computeCompositeScore(metrics: PerformanceMetrics): number {
  return (
    metrics.accuracy * COMPOSITE_WEIGHTS.accuracy +
    metrics.sharpeRatio * COMPOSITE_WEIGHTS.sharpeRatio +
    metrics.totalReturn * COMPOSITE_WEIGHTS.totalReturn +
    metrics.winRate * COMPOSITE_WEIGHTS.winRate +
    metrics.confidence * COMPOSITE_WEIGHTS.confidence +
    (1 / (1 + metrics.responseTime)) * COMPOSITE_WEIGHTS.latency
  )
}

function metricsOf(record: AgentPerformanceRecord): PerformanceMetrics {
  return {
    accuracy: record.accuracy,
    sharpeRatio: record.sharpeRatio,
    totalReturn: record.totalReturn,
    maxDrawdown: record.maxDrawdown,
    winRate: record.winRate,
    confidence: record.confidence,
    responseTime: record.responseTime,
  }
}

/**
 * Sort by composite score, best first, keeping input order on ties, and number the ranks 1..N
 */
function assignRanks(entries: readonly Omit<AgentRanking, 'rank'>[]): AgentRanking[] {
  return [...entries]
    .sort((a, b) => b.compositeScore - a.compositeScore)
    .map((entry, index) => ({ ...entry, rank: index + 1 }))
}

/**
 * Rank performance records ordered newest first. Only the first record seen per agent counts.
 */
export function rankPerformanceRecords(
  records: readonly AgentPerformanceRecord[],
  regime: MarketRegime,
  timestamp: EpochDate,
): AgentRanking[] {
  const newest = new Map<string, AgentPerformanceRecord>()
  for (const record of records) {
    if (!newest.has(record.agentId)) {
      newest.set(record.agentId, record)
    }
  }

  return assignRanks([...newest.values()].map(record => {
    const metrics = metricsOf(record)
    return {
      agentId: record.agentId,
      regime,
      compositeScore: computeCompositeScore(metrics),
      metrics,
      synthetic: record.source !== 'history',
      timestamp,
    }
  }))
}

/**
 * Estimated ranking of the whole roster, used while no performance records exist
 */
export function buildFallbackRanking(
  roster: readonly string[],
  regime: MarketRegime,
  estimator: SyntheticEstimator,
  timestamp: EpochDate,
): AgentRanking[] {
  return assignRanks(roster.map(agentId => {
    const base = estimator.uniform(0.4, 0.8)
    const responseTime = estimator.uniform(0.5, 2.0)
    return {
      agentId,
      regime,
      compositeScore: base,
      metrics: deriveMetrics(base, base, responseTime),
      synthetic: true,
      timestamp,
    }
  }))
}

export interface RankingEngineOptions {
  readonly store: EvaluationStore
  readonly estimator: SyntheticEstimator
  readonly timeSource: TimeSource
  readonly logger: Logger
  readonly roster: readonly string[]
  readonly rankingWindowHours: number
  readonly timeoutMs: number
}

/**
 * Ranks agents within a regime from their recent performance records
 */
export class RankingEngine {
  constructor(private readonly options: RankingEngineOptions) {}

  async rank(regime: MarketRegime): Promise<RegimeRanking> {
    const { store, estimator, timeSource, logger, roster, rankingWindowHours, timeoutMs } = this.options
    const now = timeSource.nowEpoch()

    let records: readonly AgentPerformanceRecord[] = []
    try {
      records = await withTimeout(
        store.getPerformanceByRegime(regime, hoursBefore(now, rankingWindowHours)),
        timeoutMs,
        'getPerformanceByRegime',
      )
    } catch (error) {
      logger.warn('Performance records unavailable, using fallback ranking', { regime, error: describeError(error) })
    }

    if (records.length === 0) {
      return { regime, rankings: buildFallbackRanking(roster, regime, estimator, now), fallback: true }
    }
    return { regime, rankings: rankPerformanceRecords(records, regime, now), fallback: false }
  }
}
