import type {
  AgentPerformanceRecord,
  AgentRanking,
  EpochDate,
  MarketRegime,
  PerformanceAggregates,
  RegimeSnapshot,
  RotationDecision,
} from '@metaeval/shared'
import type { EvaluationStore } from '@metaeval/types'

/**
 * In-memory EvaluationStore for tests, with switches to simulate failures
 */
export class MockEvaluationStore implements EvaluationStore {
  readonly performance: AgentPerformanceRecord[] = []
  readonly rankings = new Map<MarketRegime, readonly AgentRanking[]>()
  readonly decisions: RotationDecision[] = []
  readonly snapshots: RegimeSnapshot[] = []

  // For testing - simulate errors
  public shouldFailReads = false
  public shouldFailWrites = false
  /** savePerformance rejects for these agents only */
  public readonly failingAgents = new Set<string>()

  // For testing - track method calls
  public replaceRankingsCalls = 0

  async savePerformance(record: AgentPerformanceRecord): Promise<void> {
    this.checkWrite()
    if (this.failingAgents.has(record.agentId)) {
      throw new Error(`Mock save failed for ${record.agentId}`)
    }
    this.performance.push(record)
  }

  async getPerformanceByRegime(regime: MarketRegime, since: EpochDate): Promise<AgentPerformanceRecord[]> {
    this.checkRead()
    return newestFirst(this.performance.filter(r => r.regime === regime && r.timestamp >= since))
  }

  async replaceRankings(regime: MarketRegime, rankings: readonly AgentRanking[]): Promise<void> {
    this.replaceRankingsCalls++
    this.checkWrite()
    this.rankings.set(regime, [...rankings])
  }

  async getRankings(regime: MarketRegime, limit?: number): Promise<AgentRanking[]> {
    this.checkRead()
    const rankings = [...(this.rankings.get(regime) ?? [])].sort((a, b) => a.rank - b.rank)
    return limit === undefined ? rankings : rankings.slice(0, limit)
  }

  async saveRotationDecision(decision: RotationDecision): Promise<void> {
    this.checkWrite()
    if (this.decisions.some(d => d.decisionId === decision.decisionId)) {
      throw new Error(`Duplicate decision ${decision.decisionId}`)
    }
    this.decisions.push(decision)
  }

  async getRecentRotationDecisions(limit: number): Promise<RotationDecision[]> {
    this.checkRead()
    return newestFirst(this.decisions).slice(0, limit)
  }

  async saveRegimeSnapshot(snapshot: RegimeSnapshot): Promise<void> {
    this.checkWrite()
    this.snapshots.push(snapshot)
  }

  async getLatestRegimeSnapshot(): Promise<RegimeSnapshot | null> {
    this.checkRead()
    return newestFirst(this.snapshots)[0] ?? null
  }

  async getPerformanceAggregates(since: EpochDate): Promise<PerformanceAggregates> {
    this.checkRead()
    const records = this.performance.filter(r => r.timestamp >= since)
    const average = (pick: (record: AgentPerformanceRecord) => number): number =>
      records.length === 0 ? 0 : records.reduce((sum, r) => sum + pick(r), 0) / records.length

    return {
      totalAgents: new Set(records.map(r => r.agentId)).size,
      avgAccuracy: average(r => r.accuracy),
      avgSharpeRatio: average(r => r.sharpeRatio),
      avgTotalReturn: average(r => r.totalReturn),
      avgResponseTime: average(r => r.responseTime),
    }
  }

  private checkRead(): void {
    if (this.shouldFailReads) {
      throw new Error('Mock read failed')
    }
  }

  private checkWrite(): void {
    if (this.shouldFailWrites) {
      throw new Error('Mock write failed')
    }
  }
}

/**
 * Order by timestamp descending; later insertions win ties
 */
function newestFirst<T extends { readonly timestamp: EpochDate }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.timestamp - a.item.timestamp || b.index - a.index)
    .map(({ item }) => item)
}
