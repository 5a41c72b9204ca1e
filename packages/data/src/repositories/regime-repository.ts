import {
  type EpochDate,
  type IsoDate,
  isoToEpoch,
  type MarketIndicators,
  type MarketRegime,
  type RegimeSnapshot,
  toIsoDate,
  type TrendDirection,
} from '@metaeval/shared'
import type { ConnectionManager } from '../db/connection-manager'
import { BaseRepository } from './base-repository'

/**
 * Database regime analysis dto
 */
interface RegimeAnalysisDto {
  id: number
  regime: MarketRegime
  confidence: number
  volatility: number
  trend_strength: number
  volume_ratio: number
  trend_direction: TrendDirection
  market_indicators: string
  is_fallback: number
  created_at: IsoDate
}

/**
 * Repository for the append-only regime snapshot history
 */
export class RegimeRepository extends BaseRepository<RegimeAnalysisDto> {
  protected readonly tableName = 'meta_regime_analysis'

  constructor(connectionManager: ConnectionManager) {
    super(connectionManager)
  }

  async save(snapshot: RegimeSnapshot): Promise<void> {
    await this.insert({
      regime: snapshot.regime,
      confidence: snapshot.confidence,
      volatility: snapshot.volatility,
      trend_strength: snapshot.trendStrength,
      volume_ratio: snapshot.volumeRatio,
      trend_direction: snapshot.trendDirection,
      market_indicators: JSON.stringify(snapshot.indicators),
      is_fallback: snapshot.fallback ? 1 : 0,
      created_at: toIsoDate(snapshot.timestamp),
    })
  }

  async getLatest(): Promise<RegimeSnapshot | null> {
    const [dto] = await this.findMany(undefined, [], 'created_at DESC, id DESC', 1)
    return dto ? this.dtoToSnapshot(dto) : null
  }

  /**
   * Get the newest snapshots first
   */
  async getHistory(limit = 20): Promise<RegimeSnapshot[]> {
    const dtos = await this.findMany(undefined, [], 'created_at DESC, id DESC', limit)
    return dtos.map(dto => this.dtoToSnapshot(dto))
  }

  async cleanup(olderThan: EpochDate): Promise<number> {
    return this.delete('created_at < ?', [toIsoDate(olderThan)])
  }

  private dtoToSnapshot(dto: RegimeAnalysisDto): RegimeSnapshot {
    return {
      regime: dto.regime,
      confidence: dto.confidence,
      volatility: dto.volatility,
      trendStrength: dto.trend_strength,
      volumeRatio: dto.volume_ratio,
      trendDirection: dto.trend_direction,
      indicators: parseIndicators(dto.market_indicators),
      timestamp: isoToEpoch(dto.created_at),
      fallback: dto.is_fallback === 1,
    }
  }
}

function parseIndicators(json: string): MarketIndicators {
  const parsed: unknown = JSON.parse(json)
  const source = typeof parsed === 'object' && parsed !== null ? new Map(Object.entries(parsed)) : new Map()
  const read = (key: string, fallback: number): number => {
    const value = source.get(key)
    return typeof value === 'number' ? value : fallback
  }

  return {
    rsi: read('rsi', 50),
    macd: read('macd', 0),
    bollingerPosition: read('bollingerPosition', 0.5),
  }
}
