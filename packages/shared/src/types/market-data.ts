import type { EpochDate } from './dates'

/**
 * A single OHLCV observation ("bar") at a given interval.
 */
export interface Candle {
  /** Unix timestamp in milliseconds */
  readonly timestamp: EpochDate
  /** Opening price at the start of the period */
  readonly open: number
  /** Highest price during the period */
  readonly high: number
  /** Lowest price during the period */
  readonly low: number
  /** Closing price at the end of the period */
  readonly close: number
  /** Total volume traded during the period */
  readonly volume: number
}

/**
 * Bar intervals requested from the broker.
 */
export type Interval = '1m' | '5m' | '15m' | '1h' | '1d'

/**
 * Ordered price history for one symbol and interval.
 * Candles are ascending by timestamp with no duplicate timestamps.
 */
export interface PriceSeries {
  readonly symbol: string
  readonly interval: Interval
  readonly candles: readonly Candle[]
}

/**
 * Last traded price for a symbol.
 */
export interface Quote {
  readonly symbol: string
  readonly price: number
  readonly timestamp: EpochDate
}

/**
 * Sorts candles ascending and drops repeated timestamps, keeping the last
 * occurrence of each.
 */
export function normalizeCandles(candles: readonly Candle[]): Candle[] {
  const byTimestamp = new Map<number, Candle>()
  for (const candle of candles) {
    byTimestamp.set(candle.timestamp, candle)
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp)
}
