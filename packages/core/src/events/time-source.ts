import { epochDateNow, toEpochDate, type EpochDate } from '@metaeval/shared'

/**
 * Time source abstraction for consistent time access.
 * Supports both real time and simulated time for tests and replays.
 */
export interface TimeSource {
  /**
   * Get current time as EpochDate (milliseconds since Unix epoch)
   */
  nowEpoch(): EpochDate

  /**
   * Get current time as Date
   */
  nowDate(): Date
}

/**
 * Wall-clock time source
 */
export class RealTimeSource implements TimeSource {
  nowEpoch(): EpochDate {
    return epochDateNow()
  }

  nowDate(): Date {
    return new Date()
  }
}

/**
 * Manually advanced time source
 */
export class SimulatedTimeSource implements TimeSource {
  private currentTime: EpochDate
  private readonly startTime: EpochDate

  constructor(startTime: EpochDate = epochDateNow()) {
    this.startTime = startTime
    this.currentTime = startTime
  }

  nowEpoch(): EpochDate {
    return this.currentTime
  }

  nowDate(): Date {
    return new Date(this.currentTime)
  }

  /**
   * Advance time by specified milliseconds
   */
  advance(milliseconds: number): void {
    if (milliseconds < 0) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = toEpochDate(this.currentTime + milliseconds)
  }

  /**
   * Advance time to specific date
   */
  advanceTo(date: EpochDate | Date): void {
    const ms = date instanceof Date ? toEpochDate(date) : date
    if (ms < this.currentTime) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = ms
  }

  /**
   * Reset to start time
   */
  reset(): void {
    this.currentTime = this.startTime
  }

  /**
   * Get elapsed time since start
   */
  getElapsed(): number {
    return this.currentTime - this.startTime
  }
}
