import type { PriceSeries, Signal, TradeAction } from '@tradeloop/shared'
import { SMAIndicator } from '../indicators/sma'

export interface CrossoverWindows {
  readonly short: number
  readonly medium: number
  readonly long: number
}

export const DEFAULT_WINDOWS: CrossoverWindows = { short: 7, medium: 14, long: 21 }

export interface MovingAverages {
  readonly short: number
  readonly medium: number
  readonly long: number
}

/**
 * Anything that turns a price series into a trading signal
 */
export interface SignalGenerator {
  signal(series: PriceSeries): Signal
}

/**
 * Moving-average crossover over closing prices.
 *
 * BUY when short > medium > long, else SELL when short < medium, else HOLD.
 * Series shorter than the long window always HOLD.
 */
export class MovingAverageSignalGenerator implements SignalGenerator {
  private readonly shortSma: SMAIndicator
  private readonly mediumSma: SMAIndicator
  private readonly longSma: SMAIndicator

  constructor(readonly windows: CrossoverWindows = DEFAULT_WINDOWS) {
    if (!(windows.short < windows.medium && windows.medium < windows.long)) {
      throw new Error('Crossover windows must satisfy short < medium < long')
    }
    this.shortSma = new SMAIndicator({ period: windows.short })
    this.mediumSma = new SMAIndicator({ period: windows.medium })
    this.longSma = new SMAIndicator({ period: windows.long })
  }

  /**
   * Latest bar's averages, or null when the series is too short
   */
  movingAverages(series: PriceSeries): MovingAverages | null {
    const { candles } = series
    const short = this.shortSma.calculate(candles)
    const medium = this.mediumSma.calculate(candles)
    const long = this.longSma.calculate(candles)

    if (!short || !medium || !long) {
      return null
    }
    return { short: short.value, medium: medium.value, long: long.value }
  }

  signal(series: PriceSeries): Signal {
    const ma = this.movingAverages(series)
    if (!ma) {
      return 'HOLD'
    }

    if (ma.short > ma.medium && ma.medium > ma.long) {
      return 'BUY'
    }
    if (ma.short < ma.medium) {
      return 'SELL'
    }
    return 'HOLD'
  }
}

/**
 * Merge the daily and intraday signals: BUY needs both, SELL needs either
 */
export function combineSignals(daily: Signal, intraday: Signal): TradeAction | null {
  if (daily === 'SELL' || intraday === 'SELL') {
    return 'SELL'
  }
  if (daily === 'BUY' && intraday === 'BUY') {
    return 'BUY'
  }
  return null
}
