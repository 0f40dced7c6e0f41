/**
 * Repository exports
 */

export { BaseRepository } from './base-repository'
export { PerformanceRepository } from './performance-repository'
export { TradeRepository, type TradeRepositoryOptions } from './trade-repository'
