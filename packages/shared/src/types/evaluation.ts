import type { EpochDate } from './dates'

/**
 * Discrete label summarising short-term market behaviour.
 */
export const MARKET_REGIMES = ['bull', 'bear', 'neutral', 'volatile', 'trending'] as const

export type MarketRegime = (typeof MARKET_REGIMES)[number]

export type TrendDirection = 'up' | 'down' | 'neutral'

/**
 * Which scorer path produced a performance record.
 * - history: derived from the agent's recorded predictions
 * - synthetic: no history, estimated from a synthetic base draw
 * - default: scoring failed, neutral placeholder
 */
export type PerformanceSource = 'history' | 'synthetic' | 'default'

/**
 * Auxiliary technical readings attached to a regime snapshot.
 */
export interface MarketIndicators {
  readonly rsi: number
  readonly macd: number
  readonly bollingerPosition: number
}

/**
 * Result of one regime classification cycle.
 */
export interface RegimeSnapshot {
  readonly regime: MarketRegime
  /** Classifier confidence in [0, 0.95] */
  readonly confidence: number
  /** Annualised volatility of daily returns */
  readonly volatility: number
  /** Absolute total-period return */
  readonly trendStrength: number
  /** Recent volume divided by the window average */
  readonly volumeRatio: number
  readonly trendDirection: TrendDirection
  readonly indicators: MarketIndicators
  readonly timestamp: EpochDate
  /** True when the snapshot is the placeholder used while market data is unavailable */
  readonly fallback: boolean
}

/**
 * Metrics shared by performance records and ranking rows.
 */
export interface PerformanceMetrics {
  readonly accuracy: number
  /** Risk-adjusted return score */
  readonly sharpeRatio: number
  readonly totalReturn: number
  readonly maxDrawdown: number
  readonly winRate: number
  /** Mean confidence of the agent's predictions */
  readonly confidence: number
  /** Response latency in seconds */
  readonly responseTime: number
}

/**
 * One agent's evaluation for one collection cycle. Never mutated after it is stored.
 */
export interface AgentPerformanceRecord extends PerformanceMetrics {
  readonly agentId: string
  readonly regime: MarketRegime
  readonly timestamp: EpochDate
  readonly source: PerformanceSource
  /** Number of predictions the metrics were computed from */
  readonly sampleSize: number
}

/**
 * A ranked agent within a regime.
 */
export interface AgentRanking {
  readonly agentId: string
  readonly regime: MarketRegime
  /** 1 is best */
  readonly rank: number
  readonly compositeScore: number
  readonly metrics: PerformanceMetrics
  /** True when the row is not backed by real prediction history */
  readonly synthetic: boolean
  readonly timestamp: EpochDate
}

/**
 * Recommendation to replace an active agent with a better-ranked one.
 */
export interface RotationDecision {
  readonly decisionId: string
  readonly fromAgent: string
  readonly toAgent: string
  readonly reason: string
  readonly confidence: number
  /** Composite score delta between the two agents */
  readonly expectedImprovement: number
  readonly regime: MarketRegime
  readonly timestamp: EpochDate
  readonly applied: boolean
  readonly appliedAt: EpochDate | null
}

/**
 * Aggregate statistics over a trailing window of performance records.
 */
export interface PerformanceAggregates {
  readonly totalAgents: number
  readonly avgAccuracy: number
  readonly avgSharpeRatio: number
  readonly avgTotalReturn: number
  readonly avgResponseTime: number
}

export function isMarketRegime(value: string): value is MarketRegime {
  return MARKET_REGIMES.some(regime => regime === value)
}
