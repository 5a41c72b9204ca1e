import { daysBefore, toEpochDate, type PriceBar } from '@metaeval/shared'
import type { Logger, MarketDataProvider } from '@metaeval/types'
import { parse } from 'csv-parse'
import { createReadStream } from 'node:fs'
import path from 'node:path'
import type { TimeSource } from '../events/time-source'

export interface CsvPriceHistoryProviderOptions {
  /** Directory holding one `<SYMBOL>.csv` file per symbol */
  readonly directory: string
  readonly timeSource: TimeSource
  readonly logger: Logger
}

type CsvRow = Record<string, string | undefined>

/**
 * Reads daily bars from CSV files with a `timestamp,open,high,low,close,volume` header.
 * Timestamps may be ISO dates or Unix milliseconds.
 */
export class CsvPriceHistoryProvider implements MarketDataProvider {
  constructor(private readonly options: CsvPriceHistoryProviderOptions) {}

  async getPriceHistory(symbol: string, lookbackDays: number): Promise<readonly PriceBar[]> {
    const filePath = path.join(this.options.directory, `${symbol}.csv`)
    const since = daysBefore(this.options.timeSource.nowEpoch(), lookbackDays)
    const now = this.options.timeSource.nowEpoch()

    const bars = await this.readBars(filePath)
    return bars
      .filter(bar => bar.timestamp >= since && bar.timestamp <= now)
      .sort((a, b) => a.timestamp - b.timestamp)
  }

  private readBars(filePath: string): Promise<PriceBar[]> {
    const { logger } = this.options
    const bars: PriceBar[] = []
    let skipped = 0

    return new Promise((resolve, reject) => {
      const parser = parse({
        columns: (header: string[]) => header.map(column => column.toLowerCase()),
        skip_empty_lines: true,
        trim: true,
      })

      parser.on('data', (row: CsvRow) => {
        const bar = parseRow(row)
        if (bar) {
          bars.push(bar)
        } else {
          skipped++
        }
      })
      parser.on('error', reject)
      parser.on('end', () => {
        if (skipped > 0) {
          logger.warn('Skipped malformed price rows', { filePath, skipped })
        }
        resolve(bars)
      })

      const stream = createReadStream(filePath)
      stream.on('error', reject)
      stream.pipe(parser)
    })
  }
}

function parseTimestamp(value: string): number {
  return /^\d+$/.test(value) ? Number(value) : new Date(value).getTime()
}

function parseRow(row: CsvRow): PriceBar | null {
  const { timestamp, open, high, low, close, volume } = row
  if (!timestamp || !open || !high || !low || !close) {
    return null
  }

  const parsed = {
    timestamp: parseTimestamp(timestamp),
    open: parseFloat(open),
    high: parseFloat(high),
    low: parseFloat(low),
    close: parseFloat(close),
    volume: volume ? parseFloat(volume) : 0,
  }

  if (Object.values(parsed).some(value => !Number.isFinite(value))) {
    return null
  }

  return { ...parsed, timestamp: toEpochDate(parsed.timestamp) }
}
