import { PersistenceError } from '@tradeloop/data'
import {
  type EpochDate,
  type Logger,
  NoopLogger,
  type PriceSeries,
  type Trade,
  type TradeAction,
} from '@tradeloop/shared'
import type { BrokerGateway, HistorySource } from '../broker/broker-gateway'
import { CycleError, errorMessage, StrategyError } from '../errors'
import type { TimeSource } from '../events/time-source'
import type { NotificationSink } from '../notifications/notification-sink'
import type { RiskManager } from '../risk/risk-manager'
import { combineSignals, type SignalGenerator } from '../strategy/signal-generator'
import type { MarketHours } from './market-hours'
import type { SymbolSelector } from './symbol-selector'

/** Daily bars requested per symbol */
export const DAILY_BARS = 21
/** One-minute bars per trading day in the lookback */
export const MINUTE_BARS_PER_DAY = 75
/** One-minute bars requested per symbol, about 21 trading days */
export const MINUTE_BARS = DAILY_BARS * MINUTE_BARS_PER_DAY

/**
 * Append side of the trade ledger
 */
export interface TradeRecorder {
  record(trade: Trade): Promise<number>
}

/**
 * Terminal state of one strategy cycle
 */
export type CycleStatus = 'halted' | 'closed' | 'completed' | 'failed'

export interface CycleResult {
  readonly status: CycleStatus
  readonly startedAt: EpochDate
  /** Symbols selected for the cycle, empty if it stopped before selection */
  readonly symbols: readonly string[]
  /** Trades recorded in the ledger this cycle */
  readonly trades: readonly Trade[]
  readonly errors: readonly Error[]
}

export interface TradingEngineDependencies {
  readonly broker: BrokerGateway
  /** Where price history is read from; normally the on-disk cache */
  readonly history: HistorySource
  readonly signals: SignalGenerator
  readonly risk: RiskManager
  readonly ledger: TradeRecorder
  readonly notifier: NotificationSink
  readonly marketHours: MarketHours
  readonly symbols: SymbolSelector
  readonly timeSource: TimeSource
  readonly logger?: Logger
}

export interface TradingEngineOptions {
  /** Fixed portfolio value used for sizing */
  readonly portfolioValue: number
}

/**
 * Runs one strategy cycle at a time:
 * risk gate, market hours, symbol selection, then fetch, signal, decide and
 * execute for each symbol.
 */
export class TradingEngine {
  private readonly logger: Logger

  constructor(
    private readonly deps: TradingEngineDependencies,
    private readonly options: TradingEngineOptions
  ) {
    this.logger = (deps.logger ?? new NoopLogger()).child('engine')
  }

  isMarketOpen(): boolean {
    return this.deps.marketHours.isOpen(this.deps.timeSource.nowDate())
  }

  /**
   * Run a single cycle. Never throws; failures are reported in the result.
   */
  async runCycle(): Promise<CycleResult> {
    const startedAt = this.deps.timeSource.nowEpoch()
    const symbols: string[] = []
    const trades: Trade[] = []
    const errors: Error[] = []
    const finish = (status: CycleStatus): CycleResult => ({ status, startedAt, symbols, trades, errors })

    try {
      const riskState = await this.deps.risk.getRiskState()
      if (riskState.tripped) {
        this.logger.warn('Circuit breaker tripped, halting cycle', { ...riskState })
        await this.deps.notifier.alert(
          'Trading Halted',
          `Daily realized P&L ${riskState.realizedPnL.toFixed(2)} on ${riskState.day} breached the loss limit of ` +
            `${riskState.lossLimit.toFixed(2)}. No new orders will be placed today.`
        )
        return finish('halted')
      }

      if (!this.isMarketOpen()) {
        this.logger.debug('Market closed, skipping cycle')
        return finish('closed')
      }

      symbols.push(...(await this.deps.symbols.select()))
      this.logger.info('Starting strategy cycle', { symbols })

      for (const symbol of symbols) {
        try {
          const trade = await this.processSymbol(symbol, symbols.length)
          if (trade) {
            trades.push(trade)
          }
        } catch (error) {
          if (error instanceof PersistenceError) {
            throw error
          }
          const failure =
            error instanceof StrategyError
              ? error
              : new StrategyError(symbol, `Error processing ${symbol}: ${errorMessage(error)}`, { cause: error })
          this.logger.error(failure.message, { symbol, error: failure })
          errors.push(failure)
        }
      }

      this.logger.info('Strategy cycle complete', { trades: trades.length, errors: errors.length })
      return finish('completed')
    } catch (error) {
      const failure = new CycleError(`Strategy cycle failed: ${errorMessage(error)}`, { cause: error })
      this.logger.error(failure.message, { error: failure })
      errors.push(failure)

      if (error instanceof PersistenceError) {
        await this.deps.notifier.alert(
          'Trade Ledger Failure',
          `${failure.message}\nThe risk gate depends on a complete ledger; check storage before trading resumes.`
        )
      }
      return finish('failed')
    }
  }

  /**
   * Fetch, signal, decide and execute for one symbol.
   * Returns the recorded trade, or null when nothing was filled.
   */
  private async processSymbol(symbol: string, numSymbols: number): Promise<Trade | null> {
    const daily = await this.deps.history.fetchHistory(symbol, '1d', DAILY_BARS)
    if (daily.kind === 'unavailable') {
      this.logger.warn('No daily history, skipping symbol', { symbol, reason: daily.reason })
      return null
    }

    const intraday = await this.deps.history.fetchHistory(symbol, '1m', MINUTE_BARS)
    if (intraday.kind === 'unavailable') {
      this.logger.warn('No intraday history, skipping symbol', { symbol, reason: intraday.reason })
      return null
    }

    const dailySignal = this.deps.signals.signal(daily.series)
    const intradaySignal = this.deps.signals.signal(intraday.series)
    const action = combineSignals(dailySignal, intradaySignal)
    this.logger.debug('Signals computed', { symbol, dailySignal, intradaySignal, action })

    if (!action) {
      return null
    }

    return this.execute(symbol, action, numSymbols, intraday.series)
  }

  private async execute(
    symbol: string,
    action: TradeAction,
    numSymbols: number,
    intraday: PriceSeries
  ): Promise<Trade | null> {
    const quantity = Math.floor(this.deps.risk.positionSize(this.options.portfolioValue) / numSymbols)
    if (quantity <= 0) {
      this.logger.warn('Position size rounds to zero, skipping order', { symbol, action })
      return null
    }

    const placement = await this.deps.broker.placeOrder(symbol, action, quantity)
    switch (placement.kind) {
      case 'executed':
        break
      case 'pending':
        this.logger.warn('Order not confirmed in time; not recorded', { symbol, action, quantity, orderId: placement.orderId })
        return null
      case 'rejected':
        this.logger.warn('Order rejected', { symbol, action, quantity, reason: placement.reason })
        return null
      case 'unavailable':
        this.logger.warn('Order could not be placed', { symbol, action, quantity, reason: placement.reason })
        return null
    }

    const price = placement.price ?? (await this.fallbackPrice(symbol, intraday))
    if (price === null) {
      throw new StrategyError(symbol, `No fill price available for executed order ${placement.orderId}`)
    }

    const trade: Trade = {
      timestamp: this.deps.timeSource.nowEpoch(),
      symbol,
      action,
      quantity,
      price,
      orderId: placement.orderId,
    }

    try {
      await this.deps.ledger.record(trade)
    } catch (error) {
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to record trade for ${symbol}`, 'record', { cause: error })
    }

    this.logger.info('Trade executed', { ...trade })
    await this.deps.notifier.alert(
      'Trade Executed',
      `${action} ${quantity} ${symbol} @ ${price.toFixed(2)} (order ${placement.orderId})`
    )
    return trade
  }

  /**
   * Live quote first, then the last one-minute close
   */
  private async fallbackPrice(symbol: string, intraday: PriceSeries): Promise<number | null> {
    const quote = await this.deps.broker.getLiveQuote(symbol)
    if (quote.kind === 'quote') {
      return quote.quote.price
    }

    const lastClose = intraday.candles[intraday.candles.length - 1]?.close
    return lastClose !== undefined && lastClose > 0 ? lastClose : null
  }
}
