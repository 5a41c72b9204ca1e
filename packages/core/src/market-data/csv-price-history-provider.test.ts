import { toEpochDate } from '@metaeval/shared'
import assert from 'node:assert/strict'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, mock } from 'node:test'
import { SimulatedTimeSource } from '../events/time-source'
import { NoopLogger } from '../utils/logger'
import { CsvPriceHistoryProvider } from './csv-price-history-provider'

const NOW = toEpochDate(new Date('2026-03-20T00:00:00.000Z'))

describe('CsvPriceHistoryProvider', () => {
  let directory: string
  let logger: NoopLogger
  let provider: CsvPriceHistoryProvider

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'metaeval-prices-'))
    logger = new NoopLogger()
    provider = new CsvPriceHistoryProvider({
      directory,
      timeSource: new SimulatedTimeSource(NOW),
      logger,
    })
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('should return bars inside the lookback window oldest first', async () => {
    await writeFile(path.join(directory, 'SPY.csv'), [
      'timestamp,open,high,low,close,volume',
      '2026-03-10T00:00:00.000Z,90,91,89,90.5,1000',
      '2026-03-18T00:00:00.000Z,102,104,101,103,1200',
      '2026-03-16T00:00:00.000Z,100,101,99,100.5,900',
      `${Date.UTC(2026, 2, 17)},101,102,100,101.5,1100`,
      '2026-03-25T00:00:00.000Z,110,111,109,110,1000',
      '',
    ].join('\n'))

    const bars = await provider.getPriceHistory('SPY', 5)

    assert.deepEqual(bars.map(bar => bar.close), [100.5, 101.5, 103])
    assert.deepEqual(bars[0], {
      timestamp: Date.UTC(2026, 2, 16),
      open: 100,
      high: 101,
      low: 99,
      close: 100.5,
      volume: 900,
    })
  })

  it('should accept capitalised headers and a missing volume', async () => {
    await writeFile(path.join(directory, 'QQQ.csv'), [
      'Timestamp,Open,High,Low,Close,Volume',
      '2026-03-19T00:00:00.000Z,50,51,49,50.25,',
    ].join('\n'))

    const bars = await provider.getPriceHistory('QQQ', 5)

    assert.equal(bars.length, 1)
    assert.equal(bars[0].close, 50.25)
    assert.equal(bars[0].volume, 0)
  })

  it('should skip malformed rows and report how many', async () => {
    const warn = mock.method(logger, 'warn')
    const filePath = path.join(directory, 'SPY.csv')
    await writeFile(filePath, [
      'timestamp,open,high,low,close,volume',
      '2026-03-18T00:00:00.000Z,102,104,101,103,1200',
      '2026-03-19T00:00:00.000Z,abc,104,101,103,1200',
      'not-a-date,102,104,101,103,1200',
    ].join('\n'))

    const bars = await provider.getPriceHistory('SPY', 5)

    assert.equal(bars.length, 1)
    assert.equal(warn.mock.callCount(), 1)
    assert.deepEqual(warn.mock.calls[0].arguments, ['Skipped malformed price rows', { filePath, skipped: 2 }])
  })

  it('should reject when the symbol has no file', async () => {
    await assert.rejects(provider.getPriceHistory('NOPE', 5), { code: 'ENOENT' })
  })
})
