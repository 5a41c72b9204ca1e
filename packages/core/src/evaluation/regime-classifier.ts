import type { EpochDate, MarketIndicators, MarketRegime, PriceBar, RegimeSnapshot, TrendDirection } from '@metaeval/shared'
import type { Logger, MarketDataProvider } from '@metaeval/types'
import type { TimeSource } from '../events/time-source'
import { describeError } from '../utils/logger'
import { withTimeout } from '../utils/with-timeout'
import { computeMarketIndicators } from './market-indicators'
import type { SyntheticEstimator } from './synthetic-estimator'

const TRADING_DAYS_PER_YEAR = 252
const RECENT_VOLUME_BARS = 5

/**
 * Statistics of a daily price series the regime is decided from
 */
export interface SeriesStatistics {
  /** Annualised sample standard deviation of daily returns */
  readonly volatility: number
  /** Last close / first close - 1 */
  readonly trend: number
  /** Mean volume of the last five bars over the mean of all bars */
  readonly volumeRatio: number
}

export interface RegimeDecision {
  readonly regime: MarketRegime
  readonly confidence: number
}

export const FALLBACK_INDICATORS: MarketIndicators = { rsi: 50, macd: 0, bollingerPosition: 0.5 }

/**
 * Decide the regime label, first matching rule wins:
 * volatile above 25% volatility, bull/bear beyond a 5% trend,
 * neutral within a 2% trend, trending otherwise.
 */
export function classifyRegime({ volatility, trend }: { volatility: number; trend: number }): RegimeDecision {
  const strength = Math.abs(trend)

  if (volatility > 0.25) {
    return { regime: 'volatile', confidence: Math.min(0.95, volatility * 2) }
  }
  if (trend > 0.05) {
    return { regime: 'bull', confidence: Math.min(0.95, strength * 10) }
  }
  if (trend < -0.05) {
    return { regime: 'bear', confidence: Math.min(0.95, strength * 10) }
  }
  if (strength < 0.02) {
    return { regime: 'neutral', confidence: 0.8 }
  }
  return { regime: 'trending', confidence: Math.min(0.95, strength * 8) }
}

export function computeSeriesStatistics(bars: readonly PriceBar[]): SeriesStatistics {
  const closes = bars.map(bar => bar.close)

  const returns: number[] = []
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] !== 0) {
      returns.push(closes[i] / closes[i - 1] - 1)
    }
  }

  let volatility = 0
  if (returns.length >= 2) {
    const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length
    const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1)
    volatility = Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR)
  }

  const first = closes[0]
  const last = closes[closes.length - 1]
  const trend = first ? last / first - 1 : 0

  const mean = (values: readonly number[]): number =>
    values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length
  const volumes = bars.map(bar => bar.volume)
  const overallVolume = mean(volumes)
  const volumeRatio = overallVolume === 0 ? 1 : mean(volumes.slice(-RECENT_VOLUME_BARS)) / overallVolume

  return { volatility, trend, volumeRatio }
}

export function trendDirectionOf(trend: number): TrendDirection {
  if (trend > 0) return 'up'
  if (trend < 0) return 'down'
  return 'neutral'
}

/**
 * Snapshot used whenever the market data cannot be read
 */
export function fallbackSnapshot(timestamp: EpochDate): RegimeSnapshot {
  return {
    regime: 'neutral',
    confidence: 0.6,
    volatility: 0.15,
    trendStrength: 0.02,
    volumeRatio: 1,
    trendDirection: 'neutral',
    indicators: FALLBACK_INDICATORS,
    timestamp,
    fallback: true,
  }
}

export interface RegimeClassifierOptions {
  readonly provider: MarketDataProvider
  readonly estimator: SyntheticEstimator
  readonly timeSource: TimeSource
  readonly logger: Logger
  readonly symbol: string
  readonly lookbackDays: number
  readonly timeoutMs: number
}

/**
 * Reads the symbol's recent daily bars and labels the market regime.
 * Never rejects: a missing or failing feed yields the fallback snapshot.
 */
export class RegimeClassifier {
  constructor(private readonly options: RegimeClassifierOptions) {}

  async classify(): Promise<RegimeSnapshot> {
    const { provider, symbol, lookbackDays, timeoutMs, logger } = this.options

    let bars: readonly PriceBar[]
    try {
      bars = await withTimeout(provider.getPriceHistory(symbol, lookbackDays), timeoutMs, 'getPriceHistory')
    } catch (error) {
      logger.warn('Price history unavailable, using fallback regime', { symbol, error: describeError(error) })
      return fallbackSnapshot(this.options.timeSource.nowEpoch())
    }

    if (bars.length === 0) {
      logger.warn('Price history empty, using fallback regime', { symbol })
      return fallbackSnapshot(this.options.timeSource.nowEpoch())
    }

    return this.classifyBars(bars)
  }

  /**
   * Classify an already loaded series
   */
  classifyBars(bars: readonly PriceBar[]): RegimeSnapshot {
    const statistics = computeSeriesStatistics(bars)
    const { regime, confidence } = classifyRegime(statistics)

    const snapshot: RegimeSnapshot = {
      regime,
      confidence,
      volatility: statistics.volatility,
      trendStrength: Math.abs(statistics.trend),
      volumeRatio: statistics.volumeRatio,
      trendDirection: trendDirectionOf(statistics.trend),
      indicators: computeMarketIndicators(bars.map(bar => bar.close), this.options.estimator),
      timestamp: this.options.timeSource.nowEpoch(),
      fallback: false,
    }

    this.options.logger.debug('Regime classified', {
      regime,
      confidence,
      volatility: statistics.volatility,
      trend: statistics.trend,
    })
    return snapshot
  }
}
