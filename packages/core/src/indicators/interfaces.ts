import type { Candle, EpochDate } from '@tradeloop/shared'

/**
 * Result of an indicator calculation
 */
export interface IndicatorResult {
  readonly value: number
  readonly timestamp: EpochDate // Unix timestamp in milliseconds
}

/**
 * Configuration for moving averages
 */
export interface MovingAverageConfig {
  readonly period: number
}

/**
 * Base interface for all indicators
 */
export interface IIndicator<TConfig = MovingAverageConfig> {
  readonly config: TConfig

  /**
   * Calculate indicator value for latest candle
   */
  calculate(candles: readonly Candle[]): IndicatorResult | null
}
