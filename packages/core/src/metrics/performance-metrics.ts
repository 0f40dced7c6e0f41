import type { PerformanceSnapshot, TradingDay } from '@tradeloop/shared'
import { NotImplementedError } from '../errors'

/**
 * Where computed snapshots would be written
 */
export interface SnapshotStore {
  saveSnapshot(snapshot: PerformanceSnapshot): Promise<void>
}

/**
 * Daily returns, volatility and drawdown. Only the storage side exists so
 * far; computing the figures is an open extension point.
 */
export class PerformanceMetricsCalculator {
  constructor(private readonly store: SnapshotStore) {}

  /**
   * @throws NotImplementedError until a metrics model is chosen
   */
  async calculateMetrics(day: TradingDay): Promise<PerformanceSnapshot> {
    throw new NotImplementedError(`Performance metrics for ${day}`)
  }

  /**
   * Compute and persist the snapshot for `day`
   */
  async captureDaily(day: TradingDay): Promise<PerformanceSnapshot> {
    const snapshot = await this.calculateMetrics(day)
    await this.store.saveSnapshot(snapshot)
    return snapshot
  }
}
