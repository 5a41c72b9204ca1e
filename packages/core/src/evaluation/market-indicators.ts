import type { MarketIndicators } from '@metaeval/shared'
import type { SyntheticEstimator } from './synthetic-estimator'

/**
 * Relative Strength Index with Wilder's smoothing.
 * RSI = 100 - (100 / (1 + RS)), RS = average gain / average loss.
 * Returns null when there are fewer than `period + 1` closes.
 */
export function calculateRsi(closes: readonly number[], period = 14): number | null {
  if (closes.length < period + 1 || period < 1) {
    return null
  }

  const changes: number[] = []
  for (let i = 1; i < closes.length; i++) {
    changes.push(closes[i] - closes[i - 1])
  }

  let avgGain = 0
  let avgLoss = 0
  for (let i = 0; i < period; i++) {
    avgGain += Math.max(0, changes[i])
    avgLoss += Math.max(0, -changes[i])
  }
  avgGain /= period
  avgLoss /= period

  for (let i = period; i < changes.length; i++) {
    avgGain = ((period - 1) * avgGain + Math.max(0, changes[i])) / period
    avgLoss = ((period - 1) * avgLoss + Math.max(0, -changes[i])) / period
  }

  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100
  }
  return 100 - 100 / (1 + avgGain / avgLoss)
}

/**
 * Exponential moving average seeded with the simple average of the first `period` closes
 */
export function calculateEma(closes: readonly number[], period: number): number | null {
  if (closes.length < period || period < 1) {
    return null
  }

  const multiplier = 2 / (period + 1)
  let ema = closes.slice(0, period).reduce((sum, close) => sum + close, 0) / period
  for (let i = period; i < closes.length; i++) {
    ema = (closes[i] - ema) * multiplier + ema
  }
  return ema
}

/**
 * MACD line (fast EMA - slow EMA) divided by the last close, so it compares across price levels
 */
export function calculateRelativeMacd(closes: readonly number[], fastPeriod = 12, slowPeriod = 26): number | null {
  const fast = calculateEma(closes, fastPeriod)
  const slow = calculateEma(closes, slowPeriod)
  const lastClose = closes[closes.length - 1]
  if (fast === null || slow === null || !lastClose) {
    return null
  }
  return (fast - slow) / lastClose
}

/**
 * Bollinger %B: (close - lower band) / (upper band - lower band).
 * A flat window, where the bands collapse, sits at 0.5.
 */
export function calculatePercentB(closes: readonly number[], period = 20, stdDevMultiplier = 2): number | null {
  if (closes.length < period || period < 1) {
    return null
  }

  const window = closes.slice(-period)
  const sma = window.reduce((sum, close) => sum + close, 0) / period
  const variance = window.reduce((sum, close) => sum + (close - sma) ** 2, 0) / period
  const stdDev = Math.sqrt(variance)

  const upper = sma + stdDev * stdDevMultiplier
  const lower = sma - stdDev * stdDevMultiplier
  if (upper === lower) {
    return 0.5
  }
  return (window[window.length - 1] - lower) / (upper - lower)
}

/**
 * Indicator readings for a close series. Readings the series is too short for are estimated.
 */
export function computeMarketIndicators(closes: readonly number[], estimator: SyntheticEstimator): MarketIndicators {
  return {
    rsi: calculateRsi(closes) ?? estimator.uniform(30, 70),
    macd: calculateRelativeMacd(closes) ?? estimator.uniform(-0.02, 0.02),
    bollingerPosition: calculatePercentB(closes) ?? estimator.uniform(0.2, 0.8),
  }
}
