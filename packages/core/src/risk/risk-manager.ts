import { type Logger, NoopLogger, toTradingDay, type TradingDay } from '@tradeloop/shared'
import type { TimeSource } from '../events/time-source'

/**
 * Read side of the trade ledger the risk gate depends on
 */
export interface DailyPnLSource {
  dailyRealizedPnL(day: TradingDay): Promise<number>
}

/**
 * Risk parameters, as fractions of portfolio value
 */
export interface RiskParameters {
  /** Fixed capital; also the portfolio value the loss limit is measured against */
  readonly initialCapital: number
  /** Maximum realized loss per trading day (e.g., 0.02 = 2%) */
  readonly maxDailyLossPct: number
  /** Capital allocated per cycle (e.g., 0.2 = 20%) */
  readonly positionSizePct: number
  readonly timeZone: string
}

/**
 * Snapshot of the daily risk gate
 */
export interface RiskState {
  readonly day: TradingDay
  readonly realizedPnL: number
  /** Positive currency amount the day may lose */
  readonly lossLimit: number
  readonly tripped: boolean
}

/** Absorbs floating-point residue from summing ledger profits */
const PNL_EPSILON = 1e-9

/**
 * Daily-loss circuit breaker and position sizing.
 *
 * The breaker is derived from the ledger on every check, so it rearms by
 * itself when the trading day rolls over.
 */
export class RiskManager {
  private readonly logger: Logger

  constructor(
    private readonly ledger: DailyPnLSource,
    private readonly params: RiskParameters,
    private readonly timeSource: TimeSource,
    logger: Logger = new NoopLogger()
  ) {
    if (params.maxDailyLossPct <= 0 || params.maxDailyLossPct >= 1) {
      throw new Error('maxDailyLossPct must be between 0 and 1')
    }
    if (params.positionSizePct <= 0 || params.positionSizePct > 1) {
      throw new Error('positionSizePct must be in (0, 1]')
    }
    this.logger = logger.child('risk')
  }

  /**
   * Largest tolerated daily loss, in currency
   */
  lossLimit(portfolioValue: number = this.params.initialCapital): number {
    return portfolioValue * this.params.maxDailyLossPct
  }

  /**
   * Capital to deploy this cycle. Ignores current exposure.
   */
  positionSize(portfolioValue: number): number {
    return portfolioValue * this.params.positionSizePct
  }

  async getRiskState(): Promise<RiskState> {
    const day = toTradingDay(this.timeSource.nowDate(), this.params.timeZone)
    const realizedPnL = await this.ledger.dailyRealizedPnL(day)
    const lossLimit = this.lossLimit()
    return { day, realizedPnL, lossLimit, tripped: realizedPnL < -lossLimit - PNL_EPSILON }
  }

  async isCircuitBreakerTripped(): Promise<boolean> {
    const state = await this.getRiskState()
    if (state.tripped) {
      this.logger.warn('Daily loss limit breached', { ...state })
    }
    return state.tripped
  }
}
