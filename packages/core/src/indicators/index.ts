export type { IIndicator, IndicatorResult, MovingAverageConfig } from './interfaces'
export { SMAIndicator } from './sma'
