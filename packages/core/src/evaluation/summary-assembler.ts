import {
  epochToIso,
  hoursBefore,
  type IsoDate,
  type MarketRegime,
  type PerformanceAggregates,
} from '@metaeval/shared'
import type { EvaluationStore, Logger } from '@metaeval/types'
import type { TimeSource } from '../events/time-source'
import { describeError } from '../utils/logger'
import { withTimeout } from '../utils/with-timeout'

export interface TopAgentSummary {
  readonly agentId: string
  readonly rank: number
  readonly compositeScore: number
  readonly accuracy: number
}

export interface RotationSummary {
  readonly decisionId: string
  readonly fromAgent: string
  readonly toAgent: string
  readonly reason: string
  readonly confidence: number
  readonly createdAt: IsoDate
}

/**
 * Consolidated read model of the engine's state
 */
export interface EvaluationSummary {
  readonly currentRegime: MarketRegime
  readonly regimeConfidence: number
  readonly topAgents: readonly TopAgentSummary[]
  readonly recentRotations: readonly RotationSummary[]
  readonly performanceSummary: PerformanceAggregates
  /** Time of the latest regime snapshot */
  readonly lastUpdated: IsoDate | null
}

const EMPTY_AGGREGATES: PerformanceAggregates = {
  totalAgents: 0,
  avgAccuracy: 0,
  avgSharpeRatio: 0,
  avgTotalReturn: 0,
  avgResponseTime: 0,
}

export function defaultSummary(): EvaluationSummary {
  return {
    currentRegime: 'neutral',
    regimeConfidence: 0.6,
    topAgents: [],
    recentRotations: [],
    performanceSummary: EMPTY_AGGREGATES,
    lastUpdated: null,
  }
}

export interface SummaryAssemblerOptions {
  readonly store: EvaluationStore
  readonly timeSource: TimeSource
  readonly logger: Logger
  readonly topAgents: number
  readonly recentRotations: number
  readonly windowHours: number
  readonly timeoutMs: number
}

/**
 * Reads the latest regime, its ranking, recent rotations and trailing aggregates
 */
export class SummaryAssembler {
  constructor(private readonly options: SummaryAssemblerOptions) {}

  /**
   * Never rejects; a failed read answers the default summary
   */
  async getSummary(): Promise<EvaluationSummary> {
    const { store, timeSource, logger, topAgents, recentRotations, windowHours, timeoutMs } = this.options

    try {
      const snapshot = await withTimeout(store.getLatestRegimeSnapshot(), timeoutMs, 'getLatestRegimeSnapshot')
      const regime = snapshot?.regime ?? 'neutral'

      const [rankings, decisions, aggregates] = await Promise.all([
        withTimeout(store.getRankings(regime, topAgents), timeoutMs, 'getRankings'),
        withTimeout(store.getRecentRotationDecisions(recentRotations), timeoutMs, 'getRecentRotationDecisions'),
        withTimeout(
          store.getPerformanceAggregates(hoursBefore(timeSource.nowEpoch(), windowHours)),
          timeoutMs,
          'getPerformanceAggregates',
        ),
      ])

      return {
        currentRegime: regime,
        regimeConfidence: snapshot?.confidence ?? 0,
        topAgents: rankings.slice(0, topAgents).map(ranking => ({
          agentId: ranking.agentId,
          rank: ranking.rank,
          compositeScore: ranking.compositeScore,
          accuracy: ranking.metrics.accuracy,
        })),
        recentRotations: decisions.slice(0, recentRotations).map(decision => ({
          decisionId: decision.decisionId,
          fromAgent: decision.fromAgent,
          toAgent: decision.toAgent,
          reason: decision.reason,
          confidence: decision.confidence,
          createdAt: epochToIso(decision.timestamp),
        })),
        performanceSummary: aggregates,
        lastUpdated: snapshot ? epochToIso(snapshot.timestamp) : null,
      }
    } catch (error) {
      logger.error('Summary unavailable, answering defaults', { error: describeError(error) })
      return defaultSummary()
    }
  }
}
