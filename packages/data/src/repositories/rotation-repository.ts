import {
  type EpochDate,
  type IsoDate,
  isoToEpoch,
  type MarketRegime,
  type RotationDecision,
  toIsoDate,
} from '@metaeval/shared'
import type Database from 'better-sqlite3'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database rotation decision dto
 */
interface RotationDecisionDto {
  decision_id: string
  from_agent: string
  to_agent: string
  reason: string
  confidence: number
  expected_improvement: number
  regime: MarketRegime
  is_applied: number
  applied_at: IsoDate | null
  created_at: IsoDate
}

/**
 * Repository for the rotation decision log
 */
export class RotationRepository extends BaseRepository<RotationDecisionDto> {
  protected readonly tableName = 'meta_rotation_decisions'

  constructor(connectionManager: ConnectionManager) {
    super(connectionManager)
  }

  /**
   * Append a decision
   */
  async save(decision: RotationDecision): Promise<void> {
    await this.insert({
      decision_id: decision.decisionId,
      from_agent: decision.fromAgent,
      to_agent: decision.toAgent,
      reason: decision.reason,
      confidence: decision.confidence,
      expected_improvement: decision.expectedImprovement,
      regime: decision.regime,
      is_applied: decision.applied ? 1 : 0,
      applied_at: decision.appliedAt === null ? null : toIsoDate(decision.appliedAt),
      created_at: toIsoDate(decision.timestamp),
    })
  }

  /**
   * Get the newest decisions first
   */
  async getRecent(limit: number): Promise<RotationDecision[]> {
    const dtos = await this.findMany(undefined, [], 'created_at DESC, decision_id DESC', limit)
    return dtos.map(dto => this.dtoToDecision(dto))
  }

  async findById(decisionId: string): Promise<RotationDecision | null> {
    const dto = await this.findOne('decision_id = ?', [decisionId])
    return dto ? this.dtoToDecision(dto) : null
  }

  /**
   * Read a decision inside an open transaction
   */
  findByIdSync(db: Database.Database, decisionId: string): RotationDecision | null {
    const dto = db
      .prepare<[string], RotationDecisionDto>(`SELECT * FROM ${this.tableName} WHERE decision_id = ?`)
      .get(decisionId)
    return dto ? this.dtoToDecision(dto) : null
  }

  /**
   * Flag a decision as applied inside an open transaction
   */
  markAppliedSync(db: Database.Database, decisionId: string, appliedAt: EpochDate): void {
    db.prepare(`UPDATE ${this.tableName} SET is_applied = 1, applied_at = ? WHERE decision_id = ?`)
      .run(toIsoDate(appliedAt), decisionId)
  }

  /**
   * Delete decisions created before `olderThan`
   */
  async cleanup(olderThan: EpochDate): Promise<number> {
    return this.delete('created_at < ?', [toIsoDate(olderThan)])
  }

  private dtoToDecision(dto: RotationDecisionDto): RotationDecision {
    return {
      decisionId: dto.decision_id,
      fromAgent: dto.from_agent,
      toAgent: dto.to_agent,
      reason: dto.reason,
      confidence: dto.confidence,
      expectedImprovement: dto.expected_improvement,
      regime: dto.regime,
      timestamp: isoToEpoch(dto.created_at),
      applied: dto.is_applied === 1,
      appliedAt: dto.applied_at === null ? null : isoToEpoch(dto.applied_at),
    }
  }
}
