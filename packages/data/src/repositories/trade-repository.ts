import {
  isTradeAction,
  type IsoDate,
  type StoredTrade,
  type Trade,
  type TradingDay,
  toEpochDate,
  toIsoDate,
  toTradingDay,
} from '@tradeloop/shared'
import type { ConnectionManager } from '../db/connection-manager'
import { PersistenceError } from '../errors'
import { BaseRepository } from './base-repository'

// Widest UTC offsets in use (UTC-12 to UTC+14)
const MAX_OFFSET_BEHIND_MS = 12 * 60 * 60 * 1000
const MAX_OFFSET_AHEAD_MS = 14 * 60 * 60 * 1000
const DAY_MS = 24 * 60 * 60 * 1000

export interface TradeRepositoryOptions {
  /** Timezone whose calendar date defines a trading day */
  readonly timeZone: string
}

/**
 * Database trade dto
 */
interface TradeDto {
  id: number
  timestamp: IsoDate
  symbol: string
  action: string
  quantity: number
  price: number
  order_id: string
  profit: number | null
}

/**
 * Append-only ledger of executed trades
 */
export class TradeRepository extends BaseRepository<TradeDto> {
  protected readonly tableName = 'trades'
  private readonly timeZone: string

  constructor(connectionManager: ConnectionManager, options: TradeRepositoryOptions) {
    super(connectionManager)
    this.timeZone = options.timeZone
  }

  /**
   * Append a trade. A failed write is raised as PersistenceError.
   */
  async record(trade: Trade): Promise<number> {
    if (!Number.isInteger(trade.quantity) || trade.quantity <= 0) {
      throw new PersistenceError(`Trade quantity must be a positive integer, got ${trade.quantity}`, 'record')
    }
    if (!(trade.price > 0)) {
      throw new PersistenceError(`Trade price must be positive, got ${trade.price}`, 'record')
    }

    const model: Omit<TradeDto, 'id'> = {
      timestamp: toIsoDate(trade.timestamp),
      symbol: trade.symbol,
      action: trade.action,
      quantity: trade.quantity,
      price: trade.price,
      order_id: trade.orderId,
      profit: trade.profit ?? null,
    }

    try {
      return await this.insert(model)
    } catch (error) {
      throw new PersistenceError(`Failed to record trade for ${trade.symbol}`, 'record', { cause: error })
    }
  }

  /**
   * Sum of realized profit for trades whose timestamp falls on `day`
   */
  async dailyRealizedPnL(day: TradingDay): Promise<number> {
    const trades = await this.tradesForDay(day)
    return trades.reduce((sum, trade) => sum + (trade.profit ?? 0), 0)
  }

  /**
   * Trades executed on `day` in the ledger's timezone, oldest first
   */
  async tradesForDay(day: TradingDay): Promise<StoredTrade[]> {
    const midnightUtc = Date.parse(`${day}T00:00:00.000Z`)
    const from = toIsoDate(midnightUtc - MAX_OFFSET_AHEAD_MS)
    const to = toIsoDate(midnightUtc + DAY_MS + MAX_OFFSET_BEHIND_MS)

    try {
      const models = await this.findMany('timestamp >= ? AND timestamp < ?', [from, to], 'timestamp ASC, id ASC')
      return models
        .map(model => this.dtoToTrade(model))
        .filter(trade => toTradingDay(trade.timestamp, this.timeZone) === day)
    } catch (error) {
      throw new PersistenceError(`Failed to read trades for ${day}`, 'tradesForDay', { cause: error })
    }
  }

  /**
   * Most recent trades, newest first
   */
  async recentTrades(limit = 10): Promise<StoredTrade[]> {
    const models = await this.findMany(undefined, [], 'timestamp DESC, id DESC', limit)
    return models.map(model => this.dtoToTrade(model))
  }

  async countTrades(): Promise<number> {
    return this.count()
  }

  private dtoToTrade(model: TradeDto): StoredTrade {
    if (!isTradeAction(model.action)) {
      throw new PersistenceError(`Unknown trade action '${model.action}' in row ${model.id}`, 'read')
    }
    return {
      id: model.id,
      timestamp: toEpochDate(new Date(model.timestamp)),
      symbol: model.symbol,
      action: model.action,
      quantity: model.quantity,
      price: model.price,
      orderId: model.order_id,
      profit: model.profit ?? undefined,
    }
  }
}
