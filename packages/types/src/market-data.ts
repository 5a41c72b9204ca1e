import type { PriceBar } from '@metaeval/shared'

/**
 * Source of daily price history for the symbol the regime is read from.
 * May return an empty series or reject; callers degrade to a fallback snapshot.
 */
export interface MarketDataProvider {
  /**
   * Get daily bars for the trailing lookback window, oldest first
   * @param symbol - Market symbol (e.g. 'SPY')
   * @param lookbackDays - Calendar days to cover
   */
  getPriceHistory(symbol: string, lookbackDays: number): Promise<readonly PriceBar[]>
}
