import type { EpochDate } from './dates'

/**
 * One daily OHLCV observation of the tracked market symbol.
 */
export interface PriceBar {
  /** Bar open time, Unix milliseconds */
  readonly timestamp: EpochDate
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number
  readonly volume: number
}
