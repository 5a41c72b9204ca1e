import {
  type AgentRanking,
  compactTimestamp,
  type EpochDate,
  type MarketRegime,
  type RotationDecision,
} from '@metaeval/shared'
import type { ActiveAgentSet, Logger } from '@metaeval/types'
import type { TimeSource } from '../events/time-source'
import { withTimeout } from '../utils/with-timeout'
import type { RankingEngine } from './ranking-engine'

export const DEFAULT_ROTATION_THRESHOLD = 0.1

// Score gaps are compared at this many decimals so 0.8 - 0.7 counts as exactly 0.1
const IMPROVEMENT_SCALE = 1e9

export function rotationDecisionId(timestamp: EpochDate): string {
  return `rotation_${compactTimestamp(timestamp)}`
}

/**
 * Decide whether the weakest active agent should give way to the regime's best agent.
 *
 * No decision when the ranking has fewer than two rows, the best agent is already active,
 * no active agent is ranked, both rows are synthetic, or the score gap does not exceed `threshold`.
 */
export function evaluateRotation(
  ranking: readonly AgentRanking[],
  activeAgents: readonly string[],
  regime: MarketRegime,
  now: EpochDate,
  threshold = DEFAULT_ROTATION_THRESHOLD,
): RotationDecision | null {
  if (ranking.length < 2) {
    return null
  }

  const ordered = [...ranking].sort((a, b) => a.rank - b.rank)
  const active = new Set(activeAgents)
  const best = ordered[0]
  if (active.has(best.agentId)) {
    return null
  }

  const candidate = [...ordered].reverse().find(entry => active.has(entry.agentId))
  if (!candidate) {
    return null
  }

  // Two estimates carry no evidence either way
  if (best.synthetic && candidate.synthetic) {
    return null
  }

  const improvement = Math.round((best.compositeScore - candidate.compositeScore) * IMPROVEMENT_SCALE) / IMPROVEMENT_SCALE
  if (!(improvement > threshold)) {
    return null
  }

  return {
    decisionId: rotationDecisionId(now),
    fromAgent: candidate.agentId,
    toAgent: best.agentId,
    reason: `Performance improvement: ${(improvement * 100).toFixed(2)}%`,
    confidence: Math.min(0.95, improvement * 2),
    expectedImprovement: improvement,
    regime,
    timestamp: now,
    applied: false,
    appliedAt: null,
  }
}

export interface RotationDecisionEngineOptions {
  readonly rankingEngine: RankingEngine
  readonly activeAgents: ActiveAgentSet
  readonly timeSource: TimeSource
  readonly logger: Logger
  readonly threshold: number
  readonly timeoutMs: number
}

/**
 * Ranks a regime, reads the active set and recommends at most one rotation
 */
export class RotationDecisionEngine {
  constructor(private readonly options: RotationDecisionEngineOptions) {}

  async evaluate(regime: MarketRegime): Promise<RotationDecision | null> {
    const { rankingEngine, activeAgents, timeSource, logger, threshold, timeoutMs } = this.options

    const { rankings } = await rankingEngine.rank(regime)
    const active = await withTimeout(activeAgents.getActiveAgents(), timeoutMs, 'getActiveAgents')
    const decision = evaluateRotation(rankings, active, regime, timeSource.nowEpoch(), threshold)

    if (decision) {
      logger.info('Rotation recommended', {
        decisionId: decision.decisionId,
        fromAgent: decision.fromAgent,
        toAgent: decision.toAgent,
        expectedImprovement: decision.expectedImprovement,
      })
    } else {
      logger.debug('No rotation warranted', { regime, activeAgents: active.length })
    }
    return decision
  }
}
