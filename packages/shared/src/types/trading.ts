import type { EpochDate } from './dates'

/** Direction of an order placed with the broker */
export type TradeAction = 'BUY' | 'SELL'

/** Output of the moving-average crossover rule */
export type Signal = TradeAction | 'HOLD'

/**
 * An executed trade as written to the ledger. Created once per confirmed
 * fill and never mutated afterwards.
 */
export interface Trade {
  readonly timestamp: EpochDate
  readonly symbol: string
  readonly action: TradeAction
  /** Whole units, always > 0 */
  readonly quantity: number
  /** Fill price, always > 0 */
  readonly price: number
  /** Broker order identifier */
  readonly orderId: string
  /** Realized profit attributed to this trade, computed outside the ledger */
  readonly profit?: number
}

/** A trade read back from the ledger */
export interface StoredTrade extends Trade {
  readonly id: number
}

/**
 * Daily performance row. Only captured; computation is not implemented.
 */
export interface PerformanceSnapshot {
  /** YYYY-MM-DD */
  readonly date: string
  readonly returns: number
  readonly volatility: number
  readonly maxDrawdown: number
}

export function isTradeAction(value: string): value is TradeAction {
  return value === 'BUY' || value === 'SELL'
}
