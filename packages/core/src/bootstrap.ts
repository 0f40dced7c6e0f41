import { createDatabase, type Database } from '@tradeloop/data'
import type { Logger } from '@tradeloop/shared'
import { type BrokerGateway, HttpBrokerGateway } from './broker/broker-gateway'
import type { AppConfig } from './config/app-config'
import { MarketHours } from './engine/market-hours'
import { Scheduler, type SchedulerOptions } from './engine/scheduler'
import { FixedSymbolSelector } from './engine/symbol-selector'
import { TradingEngine } from './engine/trading-engine'
import { RealTimeSource, type TimeSource } from './events/time-source'
import type { HttpTransport } from './interfaces/network-client'
import { HistoricalDataCache } from './market-data/historical-data-cache'
import { PerformanceMetricsCalculator } from './metrics/performance-metrics'
import { FetchTransport } from './network/fetch-transport'
import { ResilientNetworkClient } from './network/resilient-network-client'
import {
  createSmtpTransport,
  EmailNotificationSink,
  type MailTransport,
  type NotificationSink,
} from './notifications/notification-sink'
import { RiskManager } from './risk/risk-manager'
import { MovingAverageSignalGenerator } from './strategy/signal-generator'
import { createLogger } from './utils/logger'
import type { Sleeper } from './utils/sleep'

/**
 * Fully wired trading system
 */
export interface TradingSystem {
  readonly config: AppConfig
  readonly logger: Logger
  readonly database: Database
  readonly broker: BrokerGateway
  readonly cache: HistoricalDataCache
  readonly risk: RiskManager
  readonly notifier: NotificationSink
  readonly engine: TradingEngine
  readonly scheduler: Scheduler
  readonly metrics: PerformanceMetricsCalculator
  close(): void
}

/**
 * Seams for tests and alternative deployments
 */
export interface TradingSystemOverrides {
  readonly logger?: Logger
  readonly transport?: HttpTransport
  readonly mailTransport?: MailTransport
  readonly timeSource?: TimeSource
  /** Used for retry backoff, confirmation polling and scheduler pauses */
  readonly sleep?: Sleeper
  readonly scheduler?: Omit<SchedulerOptions, 'sleep' | 'logger'>
}

/**
 * Build every component from one immutable configuration.
 * The database is opened and migrated before this resolves.
 */
export async function createTradingSystem(
  config: AppConfig,
  overrides: TradingSystemOverrides = {}
): Promise<TradingSystem> {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level, logDir: config.logging.dir })
  const timeSource = overrides.timeSource ?? new RealTimeSource()
  const { trading } = config

  const database = await createDatabase(
    { databasePath: config.storage.databasePath, timeZone: trading.timeZone },
    logger
  )

  const client = new ResilientNetworkClient(overrides.transport ?? new FetchTransport(config.broker.timeoutMs), {
    sleep: overrides.sleep,
    logger,
  })
  const broker = new HttpBrokerGateway(config.broker, client, { sleep: overrides.sleep, timeSource, logger })
  const cache = new HistoricalDataCache(config.storage.cacheDir, broker, logger)

  const notifier = new EmailNotificationSink(
    overrides.mailTransport ?? createSmtpTransport(config.notifications),
    config.notifications.email,
    logger
  )

  const risk = new RiskManager(
    database.trades,
    {
      initialCapital: trading.initialCapital,
      maxDailyLossPct: trading.maxDailyLossPct,
      positionSizePct: trading.positionSizePct,
      timeZone: trading.timeZone,
    },
    timeSource,
    logger
  )

  const engine = new TradingEngine(
    {
      broker,
      history: cache,
      signals: new MovingAverageSignalGenerator(),
      risk,
      ledger: database.trades,
      notifier,
      marketHours: MarketHours.forTimeZone(trading.timeZone),
      symbols: new FixedSymbolSelector(trading.universe, trading.symbolsPerCycle),
      timeSource,
      logger,
    },
    { portfolioValue: trading.initialCapital }
  )

  const scheduler = new Scheduler(engine, notifier, { ...overrides.scheduler, sleep: overrides.sleep, logger })

  return {
    config,
    logger,
    database,
    broker,
    cache,
    risk,
    notifier,
    engine,
    scheduler,
    metrics: new PerformanceMetricsCalculator(database.performance),
    close: () => database.close(),
  }
}
