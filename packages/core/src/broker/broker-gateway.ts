import {
  type HistoryResult,
  type Interval,
  type Logger,
  NoopLogger,
  normalizeCandles,
  type OrderConfirmation,
  type OrderPlacement,
  type QuoteResult,
  rejected,
  type TradeAction,
  unavailable,
} from '@tradeloop/shared'
import { ConfirmationTimeout, type TransportError } from '../errors'
import { RealTimeSource, type TimeSource } from '../events/time-source'
import type { HttpRequest } from '../interfaces/network-client'
import type { BrokerConfig } from '../config/app-config'
import type { ResilientNetworkClient } from '../network/resilient-network-client'
import { type Sleeper, sleep } from '../utils/sleep'
import { type OrderRequestBody, parseHistory, parseOrderStatus, parsePlaceOrder, parseQuote } from './wire'

/**
 * Anything that can supply price history for a symbol
 */
export interface HistorySource {
  fetchHistory(symbol: string, interval: Interval, durationBars: number): Promise<HistoryResult>
}

/**
 * Brokerage operations used by the trading loop. No method throws for a
 * transport failure; every outcome is a result variant.
 */
export interface BrokerGateway extends HistorySource {
  /** Submit a market order and poll until it is executed or the poll budget runs out */
  placeOrder(symbol: string, action: TradeAction, quantity: number): Promise<OrderPlacement>
  confirmOrder(orderId: string): Promise<OrderConfirmation>
  getLiveQuote(symbol: string): Promise<QuoteResult>
}

export interface ConfirmationPolicy {
  readonly maxPolls: number
  readonly pollIntervalMs: number
}

export const DEFAULT_CONFIRMATION_POLICY: ConfirmationPolicy = {
  maxPolls: 5,
  pollIntervalMs: 2000,
}

export interface HttpBrokerGatewayOptions {
  readonly confirmation?: Partial<ConfirmationPolicy>
  readonly sleep?: Sleeper
  readonly timeSource?: TimeSource
  readonly logger?: Logger
}

/**
 * Broker gateway over the broker's REST API
 */
export class HttpBrokerGateway implements BrokerGateway {
  private readonly confirmation: ConfirmationPolicy
  private readonly sleep: Sleeper
  private readonly timeSource: TimeSource
  private readonly logger: Logger

  constructor(
    private readonly config: BrokerConfig,
    private readonly client: ResilientNetworkClient,
    options: HttpBrokerGatewayOptions = {}
  ) {
    this.confirmation = { ...DEFAULT_CONFIRMATION_POLICY, ...options.confirmation }
    this.sleep = options.sleep ?? sleep
    this.timeSource = options.timeSource ?? new RealTimeSource()
    this.logger = (options.logger ?? new NoopLogger()).child('broker')
  }

  async fetchHistory(symbol: string, interval: Interval, durationBars: number): Promise<HistoryResult> {
    const query = new URLSearchParams({
      symbol,
      exchange: this.config.exchange,
      segment: this.config.segment,
      interval,
      count: String(durationBars),
    })
    const result = await this.client.request(this.get(`/charts/historical?${query.toString()}`), parseHistory)

    if (!result.ok) {
      return this.unavailable(`history for ${symbol} (${interval})`, result.error)
    }

    return {
      kind: 'series',
      series: { symbol, interval, candles: normalizeCandles(result.data) },
    }
  }

  async placeOrder(symbol: string, action: TradeAction, quantity: number): Promise<OrderPlacement> {
    const body: OrderRequestBody = {
      symbol,
      exchange: this.config.exchange,
      segment: this.config.segment,
      orderType: 'MARKET',
      side: action,
      quantity,
      product: this.config.product,
      validity: 'DAY',
    }

    const submitted = await this.client.request(
      { method: 'POST', url: this.url('/orders'), headers: this.headers(), body },
      parsePlaceOrder
    )

    if (!submitted.ok) {
      const { status } = submitted.error
      // A client error that outlived every retry is the broker refusing the order
      if (status !== undefined && status >= 400 && status < 500) {
        this.logger.warn('Order rejected by broker', { symbol, action, quantity, status })
        return rejected(`${action} ${quantity} ${symbol}: HTTP ${status}`)
      }
      return this.unavailable(`order ${action} ${quantity} ${symbol}`, submitted.error)
    }

    const orderId = submitted.data
    this.logger.info('Order submitted', { orderId, symbol, action, quantity })

    const confirmation = await this.confirmOrder(orderId)
    if (confirmation.kind === 'unavailable') {
      // The order exists at the broker; never let its id be lost
      return { kind: 'pending', orderId }
    }
    return confirmation
  }

  async confirmOrder(orderId: string): Promise<OrderConfirmation> {
    const { maxPolls, pollIntervalMs } = this.confirmation
    let observed = false

    for (let poll = 1; poll <= maxPolls; poll++) {
      const result = await this.client.request(this.get(`/orders/${encodeURIComponent(orderId)}`), parseOrderStatus)

      if (result.ok) {
        observed = true
        const { status, averagePrice, message } = result.data

        if (status === 'EXECUTED' || status === 'TRADED') {
          this.logger.info('Order executed', { orderId, poll, averagePrice })
          return {
            kind: 'executed',
            orderId,
            price: averagePrice !== undefined && averagePrice > 0 ? averagePrice : undefined,
          }
        }

        if (status === 'REJECTED' || status === 'CANCELLED') {
          this.logger.warn('Order not filled', { orderId, status, message })
          return rejected(`Order ${orderId} ${status.toLowerCase()}${message ? `: ${message}` : ''}`)
        }

        this.logger.debug('Order not yet executed', { orderId, poll, status })
      }

      if (poll < maxPolls) {
        await this.sleep(pollIntervalMs)
      }
    }

    if (!observed) {
      return unavailable(`status of order ${orderId} could not be fetched`)
    }

    this.logger.warn('Order confirmation timed out', { error: new ConfirmationTimeout(orderId, maxPolls) })
    return { kind: 'pending', orderId }
  }

  async getLiveQuote(symbol: string): Promise<QuoteResult> {
    const query = new URLSearchParams({ exchange: this.config.exchange })
    const result = await this.client.request(
      this.get(`/quotes/${encodeURIComponent(symbol)}?${query.toString()}`),
      parseQuote
    )

    if (!result.ok) {
      return this.unavailable(`quote for ${symbol}`, result.error)
    }

    return {
      kind: 'quote',
      quote: { symbol, price: result.data.lastPrice, timestamp: this.timeSource.nowEpoch() },
    }
  }

  private unavailable(what: string, error: TransportError) {
    this.logger.error(`Broker unavailable for ${what}`, { error })
    return unavailable(`${what}: ${error.message}`)
  }

  private get(path: string): HttpRequest {
    return { method: 'GET', url: this.url(path), headers: this.headers() }
  }

  private url(path: string): string {
    return `${this.config.baseUrl}${path}`
  }

  private headers(): Record<string, string> {
    return {
      'access-token': this.config.accessToken,
      'client-id': this.config.clientId,
      Authorization: `Bearer ${this.config.accessToken}`,
      'Content-Type': 'application/json',
    }
  }
}
