/**
 * Core trading engine exports
 */

// Configuration
export { DEFAULT_UNIVERSE, loadConfig } from './config/app-config'
export type {
  AppConfig,
  BrokerConfig,
  LoggingConfig,
  NotificationConfig,
  StorageConfig,
  TradingConfig,
} from './config/app-config'

// Errors
export {
  ConfigValidationError,
  ConfirmationTimeout,
  CycleError,
  errorMessage,
  FatalLoopError,
  isAbortError,
  NotificationError,
  NotImplementedError,
  StrategyError,
  TransportError,
} from './errors'

// Time
export { RealTimeSource, SimulatedTimeSource } from './events/time-source'
export type { TimeSource } from './events/time-source'

// Network
export type { HttpRequest, HttpResponse, HttpTransport, NetworkResult, RetryConfig } from './interfaces/network-client'
export { FetchTransport } from './network/fetch-transport'
export { DEFAULT_RETRY_CONFIG, ResilientNetworkClient } from './network/resilient-network-client'

// Broker and market data
export { DEFAULT_CONFIRMATION_POLICY, HttpBrokerGateway } from './broker/broker-gateway'
export type { BrokerGateway, ConfirmationPolicy, HistorySource } from './broker/broker-gateway'
export { cacheFileName, HistoricalDataCache } from './market-data/historical-data-cache'

// Strategy and risk
export { SMAIndicator } from './indicators'
export { combineSignals, DEFAULT_WINDOWS, MovingAverageSignalGenerator } from './strategy/signal-generator'
export type { SignalGenerator } from './strategy/signal-generator'
export { RiskManager } from './risk/risk-manager'
export type { DailyPnLSource, RiskParameters, RiskState } from './risk/risk-manager'

// Notifications
export {
  createSmtpTransport,
  EmailNotificationSink,
  LogNotificationSink,
} from './notifications/notification-sink'
export type { MailTransport, NotificationSink } from './notifications/notification-sink'

// Engine
export { MarketHours } from './engine/market-hours'
export { FixedSymbolSelector } from './engine/symbol-selector'
export type { SymbolSelector } from './engine/symbol-selector'
export { DAILY_BARS, MINUTE_BARS, TradingEngine } from './engine/trading-engine'
export type { CycleResult, CycleStatus, TradeRecorder } from './engine/trading-engine'
export { Scheduler } from './engine/scheduler'
export type { CycleRunner, SchedulerOptions } from './engine/scheduler'

// Metrics
export { PerformanceMetricsCalculator } from './metrics/performance-metrics'

// Logging
export { createLogger, WinstonLogger } from './utils/logger'
export type { LogLevel } from './utils/logger'
export { sleep } from './utils/sleep'
export type { Sleeper } from './utils/sleep'

// Wiring
export { createTradingSystem } from './bootstrap'
export type { TradingSystem, TradingSystemOverrides } from './bootstrap'
