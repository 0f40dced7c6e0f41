import type { CycleResult, RiskState } from '@tradeloop/core'
import { clockTimeIn, type StoredTrade, toTradingDay } from '@tradeloop/shared'

export const TRADE_HEADER = ['Time', 'Symbol', 'Action', 'Qty', 'Price', 'Order', 'Profit']

/**
 * Signed amount with two decimals, e.g. +12.50 or -3.00
 */
export function formatAmount(value: number): string {
  const sign = value > 0 ? '+' : value < 0 ? '-' : ''
  return `${sign}${Math.abs(value).toFixed(2)}`
}

export function formatTimestamp(epochMs: number, timeZone: string): string {
  const date = new Date(epochMs)
  const { hours, minutes, seconds } = clockTimeIn(date, timeZone)
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${toTradingDay(date, timeZone)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

/**
 * Ledger rows for the status table, header first
 */
export function tradeRows(trades: readonly StoredTrade[], timeZone: string): string[][] {
  return [
    TRADE_HEADER,
    ...trades.map(trade => [
      formatTimestamp(trade.timestamp, timeZone),
      trade.symbol,
      trade.action,
      String(trade.quantity),
      trade.price.toFixed(2),
      trade.orderId,
      trade.profit === undefined ? '-' : formatAmount(trade.profit),
    ]),
  ]
}

export function riskRows(state: RiskState): string[][] {
  return [
    ['Trading day', state.day],
    ['Realized P&L', formatAmount(state.realizedPnL)],
    ['Loss limit', `-${state.lossLimit.toFixed(2)}`],
    ['Circuit breaker', state.tripped ? 'TRIPPED' : 'armed'],
  ]
}

export function describeCycle(result: CycleResult): string {
  switch (result.status) {
    case 'halted':
      return 'Cycle halted: daily loss limit breached'
    case 'closed':
      return 'Market closed: nothing to do'
    case 'failed':
      return `Cycle failed: ${result.errors.map(e => e.message).join('; ')}`
    case 'completed': {
      const traded = result.trades.map(t => `${t.action} ${t.quantity} ${t.symbol} @ ${t.price.toFixed(2)}`)
      const summary = `Cycle completed over ${result.symbols.length} symbols: ${
        traded.length > 0 ? traded.join(', ') : 'no trades'
      }`
      return result.errors.length > 0 ? `${summary} (${result.errors.length} symbol errors)` : summary
    }
  }
}
