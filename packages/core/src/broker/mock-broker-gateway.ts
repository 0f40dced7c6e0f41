import {
  type HistoryResult,
  type Interval,
  type OrderConfirmation,
  type OrderPlacement,
  type PriceSeries,
  type QuoteResult,
  type TradeAction,
  toEpochDate,
  unavailable,
} from '@tradeloop/shared'
import type { BrokerGateway } from './broker-gateway'

export interface PlacedOrder {
  readonly symbol: string
  readonly action: TradeAction
  readonly quantity: number
}

/**
 * In-memory BrokerGateway for testing
 */
export class MockBrokerGateway implements BrokerGateway {
  private readonly series = new Map<string, PriceSeries>()
  private readonly quotes = new Map<string, number>()
  private readonly failingSymbols = new Set<string>()
  private orderSeq = 0

  // For testing - track method calls
  public readonly historyRequests: Array<{ symbol: string; interval: Interval; durationBars: number }> = []
  public readonly orders: PlacedOrder[] = []

  // For testing - outcome of the next placements
  public placementOutcome: 'executed' | 'pending' | 'rejected' | 'unavailable' = 'executed'
  public fillPrice: number | undefined = 100

  setSeries(series: PriceSeries): void {
    this.series.set(`${series.symbol}:${series.interval}`, series)
  }

  setQuote(symbol: string, price: number): void {
    this.quotes.set(symbol, price)
  }

  /** Make every history request for `symbol` throw */
  failFor(symbol: string): void {
    this.failingSymbols.add(symbol)
  }

  async fetchHistory(symbol: string, interval: Interval, durationBars: number): Promise<HistoryResult> {
    this.historyRequests.push({ symbol, interval, durationBars })
    if (this.failingSymbols.has(symbol)) {
      throw new Error(`Mock history failure for ${symbol}`)
    }
    const series = this.series.get(`${symbol}:${interval}`)
    return series ? { kind: 'series', series } : unavailable(`no ${interval} history for ${symbol}`)
  }

  async placeOrder(symbol: string, action: TradeAction, quantity: number): Promise<OrderPlacement> {
    this.orders.push({ symbol, action, quantity })
    const orderId = `mock-${++this.orderSeq}`

    switch (this.placementOutcome) {
      case 'executed':
        return { kind: 'executed', orderId, price: this.fillPrice }
      case 'pending':
        return { kind: 'pending', orderId }
      case 'rejected':
        return { kind: 'rejected', reason: 'mock rejection' }
      case 'unavailable':
        return unavailable('mock outage')
    }
  }

  async confirmOrder(orderId: string): Promise<OrderConfirmation> {
    return { kind: 'executed', orderId, price: this.fillPrice }
  }

  async getLiveQuote(symbol: string): Promise<QuoteResult> {
    const price = this.quotes.get(symbol)
    return price === undefined
      ? unavailable(`no quote for ${symbol}`)
      : { kind: 'quote', quote: { symbol, price, timestamp: toEpochDate(0) } }
  }
}
