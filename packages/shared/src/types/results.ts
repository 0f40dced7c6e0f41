import type { PriceSeries, Quote } from './market-data'

/**
 * The broker could not be reached, or answered with a failure, after every
 * retry was spent.
 */
export interface Unavailable {
  readonly kind: 'unavailable'
  readonly reason: string
}

/** The broker refused the order outright */
export interface Rejected {
  readonly kind: 'rejected'
  readonly reason: string
}

/** The order was observed as executed */
export interface Executed {
  readonly kind: 'executed'
  readonly orderId: string
  /** Average fill price when the broker reports one */
  readonly price?: number
}

/** The order was not observed as executed within the polling window */
export interface Pending {
  readonly kind: 'pending'
  readonly orderId: string
}

export type HistoryResult = { readonly kind: 'series'; readonly series: PriceSeries } | Unavailable

export type QuoteResult = { readonly kind: 'quote'; readonly quote: Quote } | Unavailable

export type OrderConfirmation = Executed | Pending | Rejected | Unavailable

/**
 * Outcome of placing and confirming an order. Only `executed` carries an
 * order id the caller may record.
 */
export type OrderPlacement = Executed | Pending | Rejected | Unavailable

export function unavailable(reason: string): Unavailable {
  return { kind: 'unavailable', reason }
}

export function rejected(reason: string): Rejected {
  return { kind: 'rejected', reason }
}
