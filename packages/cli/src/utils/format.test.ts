import type { CycleResult } from '@tradeloop/core'
import { parseTradingDay, toEpochDate } from '@tradeloop/shared'
import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { describeCycle, formatAmount, formatTimestamp, riskRows, tradeRows } from './format'

const base: CycleResult = {
  status: 'completed',
  startedAt: toEpochDate(0),
  symbols: ['RELIANCE', 'TCS'],
  trades: [],
  errors: [],
}

describe('format', () => {
  it('should sign amounts', () => {
    assert.equal(formatAmount(12.5), '+12.50')
    assert.equal(formatAmount(-3), '-3.00')
    assert.equal(formatAmount(0), '0.00')
  })

  it('should render timestamps on the exchange clock', () => {
    assert.equal(formatTimestamp(Date.parse('2024-03-04T05:00:09Z'), 'Asia/Kolkata'), '2024-03-04 10:30:09')
  })

  it('should build trade rows under a header', () => {
    const rows = tradeRows(
      [
        {
          id: 1,
          timestamp: toEpochDate(Date.parse('2024-03-04T05:00:00Z')),
          symbol: 'TCS',
          action: 'BUY',
          quantity: 5,
          price: 3500,
          orderId: 'ord-1',
        },
        {
          id: 2,
          timestamp: toEpochDate(Date.parse('2024-03-04T06:00:00Z')),
          symbol: 'TCS',
          action: 'SELL',
          quantity: 5,
          price: 3490.25,
          orderId: 'ord-2',
          profit: -48.75,
        },
      ],
      'UTC'
    )

    assert.deepEqual(rows, [
      ['Time', 'Symbol', 'Action', 'Qty', 'Price', 'Order', 'Profit'],
      ['2024-03-04 05:00:00', 'TCS', 'BUY', '5', '3500.00', 'ord-1', '-'],
      ['2024-03-04 06:00:00', 'TCS', 'SELL', '5', '3490.25', 'ord-2', '-48.75'],
    ])
  })

  it('should summarise the risk gate', () => {
    const day = parseTradingDay('2024-03-04')
    assert.deepEqual(riskRows({ day, realizedPnL: -2100, lossLimit: 2000, tripped: true }), [
      ['Trading day', '2024-03-04'],
      ['Realized P&L', '-2100.00'],
      ['Loss limit', '-2000.00'],
      ['Circuit breaker', 'TRIPPED'],
    ])
  })

  describe('describeCycle', () => {
    it('should list executed trades', () => {
      const result: CycleResult = {
        ...base,
        trades: [
          {
            timestamp: toEpochDate(0),
            symbol: 'RELIANCE',
            action: 'BUY',
            quantity: 4000,
            price: 2555.5,
            orderId: 'ord-1',
          },
        ],
      }
      assert.equal(describeCycle(result), 'Cycle completed over 2 symbols: BUY 4000 RELIANCE @ 2555.50')
    })

    it('should mention symbol errors', () => {
      const result: CycleResult = { ...base, errors: [new Error('x')] }
      assert.equal(describeCycle(result), 'Cycle completed over 2 symbols: no trades (1 symbol errors)')
    })

    it('should describe early exits', () => {
      assert.equal(describeCycle({ ...base, status: 'halted' }), 'Cycle halted: daily loss limit breached')
      assert.equal(describeCycle({ ...base, status: 'closed' }), 'Market closed: nothing to do')
      assert.equal(
        describeCycle({ ...base, status: 'failed', errors: [new Error('Strategy cycle failed: boom')] }),
        'Cycle failed: Strategy cycle failed: boom'
      )
    })
  })
})
