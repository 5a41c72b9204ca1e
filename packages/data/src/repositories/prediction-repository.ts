import {
  daysBefore,
  type Direction,
  type EpochDate,
  epochDateNow,
  type IsoDate,
  isoToEpoch,
  type PredictionOutcome,
  toIsoDate,
} from '@metaeval/shared'
import type { PredictionHistoryStore } from '@metaeval/types'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database agent signal dto
 */
interface AgentSignalDto {
  id: number
  agent_name: string
  symbol: string | null
  predicted_direction: Direction
  actual_direction: Direction | null
  confidence: number
  timestamp: IsoDate
}

/**
 * A prediction to record
 */
export interface PredictionInput {
  readonly agentId: string
  readonly symbol?: string
  readonly predictedDirection: Direction
  readonly actualDirection?: Direction | null
  readonly confidence: number
  readonly timestamp: EpochDate
}

/**
 * Repository for agent predictions and their outcomes
 */
export class PredictionRepository extends BaseRepository<AgentSignalDto> implements PredictionHistoryStore {
  protected readonly tableName = 'agent_signals'

  constructor(
    connectionManager: ConnectionManager,
    private readonly now: () => EpochDate = epochDateNow,
  ) {
    super(connectionManager)
  }

  async recordPrediction(prediction: PredictionInput): Promise<void> {
    await this.insert({
      agent_name: prediction.agentId,
      symbol: prediction.symbol ?? null,
      predicted_direction: prediction.predictedDirection,
      actual_direction: prediction.actualDirection ?? null,
      confidence: prediction.confidence,
      timestamp: toIsoDate(prediction.timestamp),
    })
  }

  /**
   * Fill in the observed direction of every unresolved prediction an agent made at `timestamp`
   * @returns Number of predictions resolved
   */
  async resolvePrediction(agentId: string, timestamp: EpochDate, actualDirection: Direction): Promise<number> {
    return this.update(
      { actual_direction: actualDirection },
      'agent_name = ? AND timestamp = ? AND actual_direction IS NULL',
      [agentId, toIsoDate(timestamp)],
    )
  }

  /**
   * Resolved predictions an agent made within the window, newest first.
   * Unresolved predictions can't be scored and are left out.
   */
  async getRecentPredictions(agentId: string, windowDays: number, limit: number): Promise<PredictionOutcome[]> {
    const since = daysBefore(this.now(), windowDays)
    const dtos = await this.findMany(
      'agent_name = ? AND timestamp >= ? AND actual_direction IS NOT NULL',
      [agentId, toIsoDate(since)],
      'timestamp DESC, id DESC',
      limit,
    )

    return dtos.map(dto => ({
      confidence: dto.confidence,
      predictedDirection: dto.predicted_direction,
      actualDirection: dto.actual_direction,
      timestamp: isoToEpoch(dto.timestamp),
    }))
  }

  async cleanup(olderThan: EpochDate): Promise<number> {
    return this.delete('timestamp < ?', [toIsoDate(olderThan)])
  }
}
