import { epochDateNow, type EpochDate, toEpochDate } from '@tradeloop/shared'

/**
 * Time source abstraction for consistent time access.
 * Market-hours checks and the daily risk gate read the clock through it.
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
 * Wall-clock source for live trading
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
 * Manually driven clock for tests and replays
 */
export class SimulatedTimeSource implements TimeSource {
  private currentTime: EpochDate

  constructor(startTime: EpochDate | Date = epochDateNow()) {
    this.currentTime = startTime instanceof Date ? toEpochDate(startTime) : startTime
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
}
