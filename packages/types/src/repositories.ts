import type {
  AgentPerformanceRecord,
  AgentRanking,
  EpochDate,
  MarketRegime,
  PerformanceAggregates,
  PredictionOutcome,
  RegimeSnapshot,
  RotationDecision,
} from '@metaeval/shared'

/**
 * Read access to the predictions each agent has made
 */
export interface PredictionHistoryStore {
  /**
   * Get an agent's most recent predictions, newest first
   * @param agentId - Agent name
   * @param windowDays - Only predictions made within this many days
   * @param limit - Maximum number of predictions
   */
  getRecentPredictions(agentId: string, windowDays: number, limit: number): Promise<PredictionOutcome[]>
}

/**
 * The set of agents currently deployed for live decisions
 */
export interface ActiveAgentSet {
  getActiveAgents(): Promise<readonly string[]>
}

/**
 * Storage contract for every artifact the evaluation engine produces.
 * Implement in the data layer.
 */
export interface EvaluationStore {
  /** Append one performance record */
  savePerformance(record: AgentPerformanceRecord): Promise<void>

  /**
   * Get performance records for a regime created at or after `since`, newest first
   */
  getPerformanceByRegime(regime: MarketRegime, since: EpochDate): Promise<AgentPerformanceRecord[]>

  /**
   * Replace the whole ranking set of a regime.
   * Deletion and insertion must happen atomically.
   */
  replaceRankings(regime: MarketRegime, rankings: readonly AgentRanking[]): Promise<void>

  /** Get the stored ranking of a regime ordered by rank */
  getRankings(regime: MarketRegime, limit?: number): Promise<AgentRanking[]>

  /** Append one rotation decision */
  saveRotationDecision(decision: RotationDecision): Promise<void>

  /** Get the most recent rotation decisions, newest first */
  getRecentRotationDecisions(limit: number): Promise<RotationDecision[]>

  /** Append one regime snapshot */
  saveRegimeSnapshot(snapshot: RegimeSnapshot): Promise<void>

  /** Get the newest regime snapshot */
  getLatestRegimeSnapshot(): Promise<RegimeSnapshot | null>

  /** Aggregate statistics over performance records created at or after `since` */
  getPerformanceAggregates(since: EpochDate): Promise<PerformanceAggregates>
}
