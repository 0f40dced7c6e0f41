import { clockTimeIn, type ClockTime, secondsOfDay } from '@tradeloop/shared'

export interface MarketSession {
  readonly open: ClockTime
  readonly close: ClockTime
  readonly timeZone: string
}

export const NSE_SESSION: Omit<MarketSession, 'timeZone'> = {
  open: { hours: 9, minutes: 15, seconds: 0 },
  close: { hours: 15, minutes: 30, seconds: 0 },
}

/**
 * Exchange session clock. Both boundaries are exclusive: trading happens
 * strictly after the open and strictly before the close.
 */
export class MarketHours {
  private readonly openMs: number
  private readonly closeMs: number

  constructor(private readonly session: MarketSession) {
    this.openMs = secondsOfDay(session.open) * 1000
    this.closeMs = secondsOfDay(session.close) * 1000
    if (this.openMs >= this.closeMs) {
      throw new Error('Market open must be before market close')
    }
  }

  static forTimeZone(timeZone: string): MarketHours {
    return new MarketHours({ ...NSE_SESSION, timeZone })
  }

  get timeZone(): string {
    return this.session.timeZone
  }

  isOpen(at: Date): boolean {
    const local = secondsOfDay(clockTimeIn(at, this.session.timeZone)) * 1000 + at.getUTCMilliseconds()
    return local > this.openMs && local < this.closeMs
  }
}
