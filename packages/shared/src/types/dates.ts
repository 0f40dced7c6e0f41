/**
 * Branded string type for ISO 8601 date strings.
 *
 * The format is: YYYY-MM-DDTHH:mm:ss.sssZ
 *
 * @example
 * const date: IsoDate = '2024-01-15T12:30:45.123Z' as IsoDate
 */
export type IsoDate = string & { readonly __brand: 'IsoDate' }

/**
 * Branded number type for epoch timestamps in milliseconds since 1970-01-01.
 *
 * @example
 * const timestamp: EpochDate = 1705321845123 as EpochDate
 */
export type EpochDate = number & { readonly __brand: 'EpochDate' }

/**
 * Branded calendar date (YYYY-MM-DD) as seen on the exchange's wall clock.
 * The circuit breaker re-arms when this value changes.
 */
export type TradingDay = string & { readonly __brand: 'TradingDay' }

/**
 * Wall-clock time of day in a specific timezone.
 */
export interface ClockTime {
  readonly hours: number
  readonly minutes: number
  readonly seconds: number
}

/**
 * Converts a Date object or timestamp to an ISO 8601 formatted date string.
 *
 * @param value - A Date object or numeric timestamp to convert
 * @param precision - Precision for numeric timestamps: 'ms' (default) or 's'
 *
 * @example
 * toIsoDate(1705321845, 's') // '2024-01-15T12:30:45.000Z'
 */
export function toIsoDate(value: Date): IsoDate
export function toIsoDate(value: number, precision?: 'ms' | 's'): IsoDate
export function toIsoDate(value: Date | number, precision?: 'ms' | 's'): IsoDate {
  if (typeof value === 'number') {
    value = new Date(precision === 's' ? value * 1000 : value)
  }
  return value.toISOString() as IsoDate
}

/**
 * Converts a Date object or timestamp to an epoch timestamp in milliseconds.
 *
 * @example
 * toEpochDate(1705321845, 's') // 1705321845000
 */
export function toEpochDate(value: Date): EpochDate
export function toEpochDate(value: number, precision?: 'ms' | 's'): EpochDate
export function toEpochDate(value: Date | number, precision?: 'ms' | 's'): EpochDate {
  if (typeof value === 'number') {
    return (precision === 's' ? value * 1000 : value) as EpochDate
  }
  return value.getTime() as EpochDate
}

export function epochDateNow(): EpochDate {
  return Date.now() as EpochDate
}

const dayFormatters = new Map<string, Intl.DateTimeFormat>()
const clockFormatters = new Map<string, Intl.DateTimeFormat>()

function dayFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = dayFormatters.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    })
    dayFormatters.set(timeZone, formatter)
  }
  return formatter
}

function clockFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = clockFormatters.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    })
    clockFormatters.set(timeZone, formatter)
  }
  return formatter
}

function partValue(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  const part = parts.find(p => p.type === type)
  if (!part) {
    throw new Error(`Missing ${type} in formatted date`)
  }
  return part.value
}

/**
 * Returns the calendar date of an instant on the wall clock of `timeZone`.
 *
 * @example
 * toTradingDay(new Date('2024-01-15T20:00:00Z'), 'Asia/Kolkata') // '2024-01-16'
 */
export function toTradingDay(value: Date | EpochDate | IsoDate, timeZone: string): TradingDay {
  const date = value instanceof Date ? value : new Date(value)
  const parts = dayFormatter(timeZone).formatToParts(date)
  return `${partValue(parts, 'year')}-${partValue(parts, 'month')}-${partValue(parts, 'day')}` as TradingDay
}

/**
 * Parses a YYYY-MM-DD string into a TradingDay, rejecting anything else.
 */
export function parseTradingDay(value: string): TradingDay {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
    throw new Error(`Invalid trading day: ${value}`)
  }
  return value as TradingDay
}

/**
 * Returns the time of day of an instant on the wall clock of `timeZone`.
 */
export function clockTimeIn(value: Date, timeZone: string): ClockTime {
  const parts = clockFormatter(timeZone).formatToParts(value)
  return {
    hours: Number(partValue(parts, 'hour')),
    minutes: Number(partValue(parts, 'minute')),
    seconds: Number(partValue(parts, 'second')),
  }
}

/**
 * Seconds elapsed since midnight for a clock time.
 */
export function secondsOfDay(time: ClockTime): number {
  return time.hours * 3600 + time.minutes * 60 + time.seconds
}
