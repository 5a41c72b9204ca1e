import {
  type AgentRanking,
  type IsoDate,
  isoToEpoch,
  type MarketRegime,
  toIsoDate,
} from '@metaeval/shared'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database ranking row dto
 */
interface RankingDto {
  id: number
  agent_name: string
  regime: MarketRegime
  rank: number
  composite_score: number
  accuracy: number
  sharpe_ratio: number
  total_return: number
  max_drawdown: number
  win_rate: number
  confidence: number
  response_time: number
  synthetic: number
  created_at: IsoDate
}

/**
 * Repository for the current ranking set of each regime
 */
export class RankingRepository extends BaseRepository<RankingDto> {
  protected readonly tableName = 'meta_agent_rankings'

  constructor(connectionManager: ConnectionManager) {
    super(connectionManager)
  }

  /**
   * Supersede the regime's ranking set with a new one.
   * The delete and the inserts run in one transaction, so readers see either set, never a mix.
   */
  async replace(regime: MarketRegime, rankings: readonly AgentRanking[]): Promise<void> {
    const dtos = rankings.map(ranking => this.rankingToDto(regime, ranking))

    await this.transaction((db) => {
      db.prepare(`DELETE FROM ${this.tableName} WHERE regime = ?`).run(regime)
      this.insertBatchSync(db, dtos)
    })
  }

  /**
   * Get a regime's ranking ordered by rank
   */
  async getByRegime(regime: MarketRegime, limit?: number): Promise<AgentRanking[]> {
    const dtos = await this.findMany('regime = ?', [regime], 'rank ASC', limit)
    return dtos.map(dto => this.dtoToRanking(dto))
  }

  private rankingToDto(regime: MarketRegime, ranking: AgentRanking): Partial<RankingDto> {
    return {
      agent_name: ranking.agentId,
      regime,
      rank: ranking.rank,
      composite_score: ranking.compositeScore,
      accuracy: ranking.metrics.accuracy,
      sharpe_ratio: ranking.metrics.sharpeRatio,
      total_return: ranking.metrics.totalReturn,
      max_drawdown: ranking.metrics.maxDrawdown,
      win_rate: ranking.metrics.winRate,
      confidence: ranking.metrics.confidence,
      response_time: ranking.metrics.responseTime,
      synthetic: ranking.synthetic ? 1 : 0,
      created_at: toIsoDate(ranking.timestamp),
    }
  }

  private dtoToRanking(dto: RankingDto): AgentRanking {
    return {
      agentId: dto.agent_name,
      regime: dto.regime,
      rank: dto.rank,
      compositeScore: dto.composite_score,
      metrics: {
        accuracy: dto.accuracy,
        sharpeRatio: dto.sharpe_ratio,
        totalReturn: dto.total_return,
        maxDrawdown: dto.max_drawdown,
        winRate: dto.win_rate,
        confidence: dto.confidence,
        responseTime: dto.response_time,
      },
      synthetic: dto.synthetic === 1,
      timestamp: isoToEpoch(dto.created_at),
    }
  }
}
