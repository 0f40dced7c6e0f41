import { type Candle, toEpochDate } from '@tradeloop/shared'
import { z } from 'zod/v4'

/**
 * Broker timestamps arrive as epoch seconds, epoch milliseconds or ISO strings
 */
const wireTimestamp = z.union([
  z.number().positive().transform(value => (value < 1e12 ? toEpochDate(value, 's') : toEpochDate(value))),
  z.string().datetime({ offset: true }).transform(value => toEpochDate(new Date(value))),
])

const wireCandle = z.object({
  timestamp: wireTimestamp,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
})

export const historyResponse = z.object({
  candles: z.array(wireCandle),
})

export const placeOrderResponse = z.object({
  orderId: z.union([z.string().min(1), z.number().transform(String)]),
})

const ORDER_STATUSES = ['PENDING', 'OPEN', 'TRANSIT', 'EXECUTED', 'TRADED', 'REJECTED', 'CANCELLED'] as const

export const orderStatusResponse = z.object({
  orderId: z.union([z.string(), z.number().transform(String)]),
  status: z
    .string()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(ORDER_STATUSES)),
  averagePrice: z.number().nonnegative().optional(),
  message: z.string().optional(),
})

export const quoteResponse = z.object({
  symbol: z.string(),
  lastPrice: z.number().positive(),
})

export type OrderStatusResponse = z.infer<typeof orderStatusResponse>

/**
 * Market order body sent to `POST /orders`
 */
export interface OrderRequestBody {
  readonly symbol: string
  readonly exchange: string
  readonly segment: string
  readonly orderType: 'MARKET'
  readonly side: 'BUY' | 'SELL'
  readonly quantity: number
  readonly product: string
  readonly validity: 'DAY'
}

export function parseHistory(body: unknown): Candle[] {
  return historyResponse.parse(body).candles
}

export function parsePlaceOrder(body: unknown): string {
  return placeOrderResponse.parse(body).orderId
}

export function parseOrderStatus(body: unknown): OrderStatusResponse {
  return orderStatusResponse.parse(body)
}

export function parseQuote(body: unknown): { symbol: string; lastPrice: number } {
  return quoteResponse.parse(body)
}
