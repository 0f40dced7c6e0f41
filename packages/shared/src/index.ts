export * from './types/dates'
export type { Logger } from './types/logger'
export { NoopLogger } from './types/logger'
export * from './types/market-data'
export * from './types/results'
export * from './types/trading'
