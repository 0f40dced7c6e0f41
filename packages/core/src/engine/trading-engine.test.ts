import { createDatabase, type Database, PersistenceError } from '@tradeloop/data'
import { type Candle, type Interval, type PriceSeries, type Trade, toEpochDate } from '@tradeloop/shared'
import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { MockBrokerGateway } from '../broker/mock-broker-gateway'
import { DEFAULT_UNIVERSE } from '../config/app-config'
import { CycleError, StrategyError } from '../errors'
import { SimulatedTimeSource } from '../events/time-source'
import { MockNotificationSink } from '../notifications/mock-notification-sink'
import { RiskManager } from '../risk/risk-manager'
import { MovingAverageSignalGenerator } from '../strategy/signal-generator'
import { MarketHours } from './market-hours'
import { FixedSymbolSelector, type SymbolSelector } from './symbol-selector'
import { MINUTE_BARS, type TradeRecorder, TradingEngine } from './trading-engine'

const TIME_ZONE = 'Asia/Kolkata'
// 10:30 IST, inside the session
const MARKET_OPEN_INSTANT = new Date('2024-03-04T05:00:00Z')
// 17:30 IST, after the close
const MARKET_CLOSED_INSTANT = new Date('2024-03-04T12:00:00Z')

function trend(symbol: string, interval: Interval, count: number, start: number, step: number): PriceSeries {
  const spacing = interval === '1d' ? 86_400_000 : 60_000
  const candles: Candle[] = Array.from({ length: count }, (_, i) => {
    const close = start + i * step
    return {
      timestamp: toEpochDate(Date.UTC(2024, 0, 1) + i * spacing),
      open: close,
      high: close + 1,
      low: close - 1,
      close,
      volume: 10_000,
    }
  })
  return { symbol, interval, candles }
}

function rising(symbol: string, broker: MockBrokerGateway): void {
  broker.setSeries(trend(symbol, '1d', 30, 2400, 10))
  broker.setSeries(trend(symbol, '1m', 30, 2500, 1))
}

describe('TradingEngine', () => {
  let db: Database
  let broker: MockBrokerGateway
  let notifier: MockNotificationSink
  let clock: SimulatedTimeSource

  function engineWith(overrides: { ledger?: TradeRecorder; symbols?: SymbolSelector } = {}): TradingEngine {
    const risk = new RiskManager(
      db.trades,
      { initialCapital: 100_000, maxDailyLossPct: 0.02, positionSizePct: 0.2, timeZone: TIME_ZONE },
      clock
    )
    return new TradingEngine(
      {
        broker,
        history: broker,
        signals: new MovingAverageSignalGenerator(),
        risk,
        ledger: overrides.ledger ?? db.trades,
        notifier,
        marketHours: MarketHours.forTimeZone(TIME_ZONE),
        symbols: overrides.symbols ?? new FixedSymbolSelector(DEFAULT_UNIVERSE, 5),
        timeSource: clock,
      },
      { portfolioValue: 100_000 }
    )
  }

  beforeEach(async () => {
    db = await createDatabase({ databasePath: ':memory:', timeZone: TIME_ZONE })
    broker = new MockBrokerGateway()
    notifier = new MockNotificationSink()
    clock = new SimulatedTimeSource(MARKET_OPEN_INSTANT)
  })

  afterEach(() => {
    db.close()
  })

  describe('end to end', () => {
    it('should buy a rising symbol and write exactly one ledger row', async () => {
      rising('RELIANCE', broker)

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.deepEqual(result.symbols, ['RELIANCE', 'TCS', 'HDFCBANK', 'INFY', 'ICICIBANK'])
      // 100000 x 0.20 / 5
      assert.deepEqual(broker.orders, [{ symbol: 'RELIANCE', action: 'BUY', quantity: 4000 }])

      const rows = await db.trades.recentTrades()
      assert.equal(rows.length, 1)
      assert.equal(rows[0]?.symbol, 'RELIANCE')
      assert.equal(rows[0]?.action, 'BUY')
      assert.equal(rows[0]?.quantity, 4000)
      assert.equal(rows[0]?.price, 100)
      assert.equal(rows[0]?.orderId, 'mock-1')
      assert.equal(rows[0]?.timestamp, MARKET_OPEN_INSTANT.getTime())

      assert.equal(result.trades.length, 1)
      assert.deepEqual(notifier.subjects(), ['Trade Executed'])
      assert.equal(notifier.alerts[0]?.body, 'BUY 4000 RELIANCE @ 100.00 (order mock-1)')
    })

    it('should request daily and one-minute history for every selected symbol', async () => {
      await engineWith().runCycle()

      assert.deepEqual(
        broker.historyRequests.filter(r => r.symbol === 'TCS'),
        [{ symbol: 'TCS', interval: '1d', durationBars: 21 }]
      )

      rising('TCS', broker)
      broker.historyRequests.length = 0
      await engineWith().runCycle()
      assert.deepEqual(
        broker.historyRequests.filter(r => r.symbol === 'TCS'),
        [
          { symbol: 'TCS', interval: '1d', durationBars: 21 },
          { symbol: 'TCS', interval: '1m', durationBars: MINUTE_BARS },
        ]
      )
    })

    it('should sell when either signal turns down', async () => {
      broker.setSeries(trend('INFY', '1d', 30, 2400, 10))
      broker.setSeries(trend('INFY', '1m', 30, 1600, -1))

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.deepEqual(broker.orders, [{ symbol: 'INFY', action: 'SELL', quantity: 4000 }])
    })

    it('should not trade when only one signal is a buy', async () => {
      broker.setSeries(trend('TCS', '1d', 30, 3000, 5))
      broker.setSeries(trend('TCS', '1m', 30, 3500, 0))

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.deepEqual(broker.orders, [])
      assert.equal(await db.trades.countTrades(), 0)
    })
  })

  describe('gate check', () => {
    it('should halt and alert when the daily loss limit is breached', async () => {
      rising('RELIANCE', broker)
      await db.trades.record({
        timestamp: clock.nowEpoch(),
        symbol: 'TCS',
        action: 'SELL',
        quantity: 10,
        price: 3500,
        orderId: 'earlier',
        profit: -2500,
      })

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'halted')
      assert.deepEqual(result.symbols, [])
      assert.deepEqual(broker.historyRequests, [])
      assert.deepEqual(notifier.subjects(), ['Trading Halted'])
    })

    it('should resume on the next trading day', async () => {
      rising('RELIANCE', broker)
      await db.trades.record({
        timestamp: clock.nowEpoch(),
        symbol: 'TCS',
        action: 'SELL',
        quantity: 10,
        price: 3500,
        orderId: 'earlier',
        profit: -2500,
      })
      clock.advance(24 * 60 * 60 * 1000)

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.equal(result.trades.length, 1)
    })
  })

  describe('market check', () => {
    it('should stop with no side effects outside market hours', async () => {
      rising('RELIANCE', broker)
      clock = new SimulatedTimeSource(MARKET_CLOSED_INSTANT)

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'closed')
      assert.deepEqual(broker.historyRequests, [])
      assert.deepEqual(notifier.alerts, [])
    })
  })

  describe('execution', () => {
    it('should not record an order that is still pending', async () => {
      rising('RELIANCE', broker)
      broker.placementOutcome = 'pending'

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.equal(broker.orders.length, 1)
      assert.equal(await db.trades.countTrades(), 0)
      assert.deepEqual(notifier.alerts, [])
    })

    it('should not record a rejected or unplaced order', async () => {
      rising('RELIANCE', broker)
      broker.placementOutcome = 'rejected'
      await engineWith().runCycle()
      broker.placementOutcome = 'unavailable'
      await engineWith().runCycle()

      assert.equal(broker.orders.length, 2)
      assert.equal(await db.trades.countTrades(), 0)
    })

    it('should price the fill from the live quote when the broker reports none', async () => {
      rising('RELIANCE', broker)
      broker.fillPrice = undefined
      broker.setQuote('RELIANCE', 2531.4)

      const result = await engineWith().runCycle()

      assert.equal(result.trades[0]?.price, 2531.4)
    })

    it('should fall back to the last one-minute close', async () => {
      rising('RELIANCE', broker)
      broker.fillPrice = undefined

      const result = await engineWith().runCycle()

      // 2500 + 29 x 1
      assert.equal(result.trades[0]?.price, 2529)
    })
  })

  describe('failure isolation', () => {
    it('should keep processing other symbols when one fails', async () => {
      broker.failFor('RELIANCE')
      rising('TCS', broker)

      const result = await engineWith().runCycle()

      assert.equal(result.status, 'completed')
      assert.equal(result.errors.length, 1)
      const [failure] = result.errors
      assert.ok(failure instanceof StrategyError)
      assert.equal(failure.symbol, 'RELIANCE')
      assert.deepEqual(broker.orders, [{ symbol: 'TCS', action: 'BUY', quantity: 4000 }])
    })

    it('should fail the cycle and alert when the ledger write fails', async () => {
      rising('RELIANCE', broker)
      rising('TCS', broker)
      const brokenLedger: TradeRecorder = {
        async record(_trade: Trade): Promise<number> {
          throw new Error('disk I/O error')
        },
      }

      const result = await engineWith({ ledger: brokenLedger }).runCycle()

      assert.equal(result.status, 'failed')
      assert.equal(broker.orders.length, 1)
      const [failure] = result.errors
      assert.ok(failure instanceof CycleError)
      assert.ok(failure.cause instanceof PersistenceError)
      assert.deepEqual(notifier.subjects(), ['Trade Ledger Failure'])
    })

    it('should fail the cycle when symbol selection fails', async () => {
      const result = await engineWith({
        symbols: {
          async select(): Promise<readonly string[]> {
            throw new Error('screener offline')
          },
        },
      }).runCycle()

      assert.equal(result.status, 'failed')
      assert.equal(result.errors[0]?.message, 'Strategy cycle failed: screener offline')
    })
  })
})
