import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import {
  compactTimestamp,
  daysBefore,
  epochToIso,
  hoursBefore,
  isoToEpoch,
  toEpochDate,
  toIsoDate,
} from './dates'

describe('Date utility functions', () => {
  describe('toIsoDate', () => {
    it('should convert Date object to IsoDate', () => {
      const date = new Date('2024-01-15T12:30:45.123Z')
      assert.equal(toIsoDate(date), '2024-01-15T12:30:45.123Z')
    })

    it('should convert seconds to IsoDate when precision is "s"', () => {
      const seconds = Math.floor(new Date('2024-01-15T12:30:45.000Z').getTime() / 1000)
      assert.equal(toIsoDate(seconds, 's'), '2024-01-15T12:30:45.000Z')
    })
  })

  describe('toEpochDate', () => {
    it('should convert seconds to milliseconds when precision is "s"', () => {
      assert.equal(toEpochDate(1705321845, 's'), 1705321845000)
    })
  })

  describe('iso and epoch round trip', () => {
    it('should keep millisecond precision', () => {
      const epoch = toEpochDate(1705321845123)
      assert.equal(isoToEpoch(epochToIso(epoch)), epoch)
    })
  })

  describe('window helpers', () => {
    it('should move back by hours', () => {
      const epoch = toEpochDate(new Date('2024-01-15T12:00:00.000Z'))
      assert.equal(epochToIso(hoursBefore(epoch, 24)), '2024-01-14T12:00:00.000Z')
    })

    it('should move back by days', () => {
      const epoch = toEpochDate(new Date('2024-01-15T12:00:00.000Z'))
      assert.equal(epochToIso(daysBefore(epoch, 7)), '2024-01-08T12:00:00.000Z')
    })
  })

  describe('compactTimestamp', () => {
    it('should format as YYYYMMDD_HHMMSS_mmm in UTC', () => {
      assert.equal(compactTimestamp(toEpochDate(1705321845123)), '20240115_123045_123')
    })

    it('should zero-pad milliseconds', () => {
      const epoch = toEpochDate(new Date('2026-03-01T04:05:06.007Z'))
      assert.equal(compactTimestamp(epoch), '20260301_040506_007')
    })
  })
})
