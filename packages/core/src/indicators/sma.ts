import type { Candle } from '@tradeloop/shared'
import type { IIndicator, IndicatorResult, MovingAverageConfig } from './interfaces'

/**
 * Simple Moving Average (SMA) indicator
 *
 * Calculates the arithmetic mean of closing prices over a specified period.
 * Formula: SMA = (P1 + P2 + ... + Pn) / n
 * where P = closing price and n = period
 */
export class SMAIndicator implements IIndicator<MovingAverageConfig> {
  readonly config: MovingAverageConfig

  constructor(config: MovingAverageConfig) {
    if (!Number.isInteger(config.period) || config.period < 1) {
      throw new Error('SMA period must be a positive integer')
    }
    this.config = { ...config }
  }

  calculate(candles: readonly Candle[]): IndicatorResult | null {
    const lastCandle = candles[candles.length - 1]
    const value = SMAIndicator.calculate(candles, this.config.period)
    if (value === null || !lastCandle) {
      return null
    }

    return { value, timestamp: lastCandle.timestamp }
  }

  /**
   * Static helper to calculate SMA without creating an instance
   */
  static calculate(candles: readonly Candle[], period: number): number | null {
    if (candles.length < period || period < 1) {
      return null
    }

    const relevantCandles = candles.slice(-period)
    const sum = relevantCandles.reduce((acc, candle) => acc + candle.close, 0)
    return sum / period
  }
}
