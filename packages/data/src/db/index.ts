import {
  type AgentPerformanceRecord,
  type AgentRanking,
  daysBefore,
  type EpochDate,
  epochDateNow,
  type MarketRegime,
  type PerformanceAggregates,
  type RegimeSnapshot,
  type RotationDecision,
} from '@metaeval/shared'
import type { EvaluationStore, Logger } from '@metaeval/types'
import { RotationConfirmationError } from '../errors'
import { ActiveAgentRepository } from '../repositories/active-agent-repository'
import { PerformanceRepository } from '../repositories/performance-repository'
import { PredictionRepository } from '../repositories/prediction-repository'
import { RankingRepository } from '../repositories/ranking-repository'
import { RegimeRepository } from '../repositories/regime-repository'
import { RotationRepository } from '../repositories/rotation-repository'
import type { ConnectionManager, SQLiteConfig } from './connection-manager'
import { createConnectionManager } from './connection-manager'
import { initializeDatabase } from './database'

export { ConnectionManager, createConnectionManager } from './connection-manager'
export type { SQLiteConfig } from './connection-manager'
export { dropAllTables, initializeDatabase } from './database'
export { getAllSchemaStatements, SCHEMA_STATEMENTS } from './schema'

/**
 * Rows removed by a retention pass
 */
export interface CleanupResult {
  readonly performanceDeleted: number
  readonly snapshotsDeleted: number
  readonly decisionsDeleted: number
  readonly predictionsDeleted: number
}

/**
 * SQLite-backed evaluation store with all repositories
 */
export class EvaluationDatabase implements EvaluationStore {
  readonly connectionManager: ConnectionManager
  readonly performance: PerformanceRepository
  readonly rankings: RankingRepository
  readonly rotations: RotationRepository
  readonly regimes: RegimeRepository
  readonly predictions: PredictionRepository
  readonly activeAgents: ActiveAgentRepository
  private readonly logger?: Logger

  constructor(
    config: Partial<SQLiteConfig> = {},
    options: { logger?: Logger; now?: () => EpochDate } = {},
  ) {
    this.logger = options.logger
    this.connectionManager = createConnectionManager({ logger: options.logger, ...config })

    this.performance = new PerformanceRepository(this.connectionManager)
    this.rankings = new RankingRepository(this.connectionManager)
    this.rotations = new RotationRepository(this.connectionManager)
    this.regimes = new RegimeRepository(this.connectionManager)
    this.predictions = new PredictionRepository(this.connectionManager, options.now)
    this.activeAgents = new ActiveAgentRepository(this.connectionManager)
  }

  /**
   * Open the connection and create the schema
   */
  async initialize(): Promise<void> {
    await this.connectionManager.initialize()
    await initializeDatabase(this.connectionManager, this.logger)
  }

  close(): void {
    this.connectionManager.close()
  }

  savePerformance(record: AgentPerformanceRecord): Promise<void> {
    return this.performance.save(record)
  }

  getPerformanceByRegime(regime: MarketRegime, since: EpochDate): Promise<AgentPerformanceRecord[]> {
    return this.performance.getByRegime(regime, since)
  }

  replaceRankings(regime: MarketRegime, rankings: readonly AgentRanking[]): Promise<void> {
    return this.rankings.replace(regime, rankings)
  }

  getRankings(regime: MarketRegime, limit?: number): Promise<AgentRanking[]> {
    return this.rankings.getByRegime(regime, limit)
  }

  saveRotationDecision(decision: RotationDecision): Promise<void> {
    return this.rotations.save(decision)
  }

  getRecentRotationDecisions(limit: number): Promise<RotationDecision[]> {
    return this.rotations.getRecent(limit)
  }

  saveRegimeSnapshot(snapshot: RegimeSnapshot): Promise<void> {
    return this.regimes.save(snapshot)
  }

  getLatestRegimeSnapshot(): Promise<RegimeSnapshot | null> {
    return this.regimes.getLatest()
  }

  getPerformanceAggregates(since: EpochDate): Promise<PerformanceAggregates> {
    return this.performance.getAggregates(since)
  }

  /**
   * Apply a recommended rotation: swap the agents in the active set and flag the decision.
   * Both writes happen in one transaction.
   */
  async confirmRotation(decisionId: string, at: EpochDate = epochDateNow()): Promise<RotationDecision> {
    const confirmed = await this.connectionManager.transaction((db) => {
      const decision = this.rotations.findByIdSync(db, decisionId)
      if (!decision) {
        throw new RotationConfirmationError(`Rotation decision ${decisionId} not found`, decisionId)
      }
      if (decision.applied) {
        throw new RotationConfirmationError(`Rotation decision ${decisionId} was already applied`, decisionId)
      }
      if (!this.activeAgents.swapSync(db, decision.fromAgent, decision.toAgent, at)) {
        throw new RotationConfirmationError(
          `Active set no longer has ${decision.fromAgent} without ${decision.toAgent}`,
          decisionId,
        )
      }
      this.rotations.markAppliedSync(db, decisionId, at)
      return { ...decision, applied: true, appliedAt: at }
    })

    this.logger?.info('Rotation applied', {
      decisionId,
      fromAgent: confirmed.fromAgent,
      toAgent: confirmed.toAgent,
    })
    return confirmed
  }

  /**
   * Delete records older than `daysToKeep`. Rankings are replaced every cycle and are not touched.
   */
  async cleanup(daysToKeep = 90, now: EpochDate = epochDateNow()): Promise<CleanupResult> {
    const cutoff = daysBefore(now, daysToKeep)

    const result: CleanupResult = {
      performanceDeleted: await this.performance.cleanup(cutoff),
      snapshotsDeleted: await this.regimes.cleanup(cutoff),
      decisionsDeleted: await this.rotations.cleanup(cutoff),
      predictionsDeleted: await this.predictions.cleanup(cutoff),
    }

    this.logger?.info('Retention cleanup finished', { daysToKeep, ...result })
    return result
  }

  /**
   * Row counts per table
   */
  async getStats(): Promise<Record<string, number>> {
    const stats = await this.connectionManager.getStats()
    return stats.rowCounts
  }
}

/**
 * Create and initialize an evaluation database
 */
export async function createEvaluationDatabase(
  config: Partial<SQLiteConfig> = {},
  options: { logger?: Logger; now?: () => EpochDate } = {},
): Promise<EvaluationDatabase> {
  const db = new EvaluationDatabase(config, options)
  await db.initialize()
  return db
}
