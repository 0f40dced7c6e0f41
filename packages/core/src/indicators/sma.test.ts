import { type Candle, toEpochDate } from '@tradeloop/shared'
import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { SMAIndicator } from './sma'

function barsClosingAt(closes: readonly number[]): Candle[] {
  return closes.map((close, i) => ({
    timestamp: toEpochDate(Date.UTC(2024, 2, 1 + i)),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
  }))
}

describe('SMAIndicator', () => {
  const closes = [2410, 2420, 2430, 2440, 2450, 2460, 2470]

  it('should average the closes of the trailing window', () => {
    const result = new SMAIndicator({ period: 3 }).calculate(barsClosingAt(closes))

    // (2450 + 2460 + 2470) / 3
    assert.deepEqual(result, { value: 2460, timestamp: Date.UTC(2024, 2, 7) })
  })

  it('should use the whole series when it is exactly one window long', () => {
    const result = new SMAIndicator({ period: 7 }).calculate(barsClosingAt(closes))

    assert.equal(result?.value, 2440)
  })

  it('should return null for a series shorter than the window', () => {
    assert.equal(new SMAIndicator({ period: 8 }).calculate(barsClosingAt(closes)), null)
    assert.equal(new SMAIndicator({ period: 1 }).calculate([]), null)
  })

  it('should reject a window that is not a positive integer', () => {
    assert.throws(() => new SMAIndicator({ period: 0 }), /SMA period must be a positive integer/)
    assert.throws(() => new SMAIndicator({ period: 2.5 }), /SMA period must be a positive integer/)
  })

  it('should ignore opens, highs and lows', () => {
    const bars = barsClosingAt([100, 200]).map(bar => ({ ...bar, open: 1, high: 9999, low: 0 }))

    assert.equal(SMAIndicator.calculate(bars, 2), 150)
  })
})
