import {
  type AgentPerformanceRecord,
  type EpochDate,
  type IsoDate,
  isoToEpoch,
  type MarketRegime,
  type PerformanceAggregates,
  type PerformanceSource,
  toIsoDate,
} from '@metaeval/shared'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database performance record dto
 */
interface PerformanceDto {
  id: number
  agent_name: string
  accuracy: number
  sharpe_ratio: number
  total_return: number
  max_drawdown: number
  win_rate: number
  confidence: number
  response_time: number
  regime: MarketRegime
  source: PerformanceSource
  sample_size: number
  created_at: IsoDate
}

/**
 * Database aggregate row
 */
interface AggregateDto {
  total_agents: number
  avg_accuracy: number | null
  avg_sharpe_ratio: number | null
  avg_total_return: number | null
  avg_response_time: number | null
}

/**
 * Repository for per-cycle agent performance records (append-only)
 */
export class PerformanceRepository extends BaseRepository<PerformanceDto> {
  protected readonly tableName = 'meta_agent_performance'

  constructor(connectionManager: ConnectionManager) {
    super(connectionManager)
  }

  /**
   * Append a performance record
   */
  async save(record: AgentPerformanceRecord): Promise<void> {
    await this.insert(this.recordToDto(record))
  }

  /**
   * Get records of a regime created at or after `since`, newest first
   */
  async getByRegime(regime: MarketRegime, since: EpochDate, limit?: number): Promise<AgentPerformanceRecord[]> {
    const dtos = await this.findMany(
      'regime = ? AND created_at >= ?',
      [regime, toIsoDate(since)],
      'created_at DESC, id DESC',
      limit,
    )
    return dtos.map(dto => this.dtoToRecord(dto))
  }

  /**
   * Averages over every record created at or after `since`
   */
  async getAggregates(since: EpochDate): Promise<PerformanceAggregates> {
    const rows = await this.query<AggregateDto>(`
      SELECT
        COUNT(DISTINCT agent_name) as total_agents,
        AVG(accuracy) as avg_accuracy,
        AVG(sharpe_ratio) as avg_sharpe_ratio,
        AVG(total_return) as avg_total_return,
        AVG(response_time) as avg_response_time
      FROM ${this.tableName}
      WHERE created_at >= ?
    `, [toIsoDate(since)])

    const row = rows[0]
    return {
      totalAgents: row?.total_agents ?? 0,
      avgAccuracy: row?.avg_accuracy ?? 0,
      avgSharpeRatio: row?.avg_sharpe_ratio ?? 0,
      avgTotalReturn: row?.avg_total_return ?? 0,
      avgResponseTime: row?.avg_response_time ?? 0,
    }
  }

  /**
   * Delete records created before `olderThan`
   * @returns Number of records deleted
   */
  async cleanup(olderThan: EpochDate): Promise<number> {
    return this.delete('created_at < ?', [toIsoDate(olderThan)])
  }

  private recordToDto(record: AgentPerformanceRecord): Partial<PerformanceDto> {
    return {
      agent_name: record.agentId,
      accuracy: record.accuracy,
      sharpe_ratio: record.sharpeRatio,
      total_return: record.totalReturn,
      max_drawdown: record.maxDrawdown,
      win_rate: record.winRate,
      confidence: record.confidence,
      response_time: record.responseTime,
      regime: record.regime,
      source: record.source,
      sample_size: record.sampleSize,
      created_at: toIsoDate(record.timestamp),
    }
  }

  private dtoToRecord(dto: PerformanceDto): AgentPerformanceRecord {
    return {
      agentId: dto.agent_name,
      accuracy: dto.accuracy,
      sharpeRatio: dto.sharpe_ratio,
      totalReturn: dto.total_return,
      maxDrawdown: dto.max_drawdown,
      winRate: dto.win_rate,
      confidence: dto.confidence,
      responseTime: dto.response_time,
      regime: dto.regime,
      source: dto.source,
      sampleSize: dto.sample_size,
      timestamp: isoToEpoch(dto.created_at),
    }
  }
}
