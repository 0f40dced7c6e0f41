import type { PerformanceSnapshot } from '@tradeloop/shared'
import { PersistenceError } from '../errors'
import { BaseRepository } from './base-repository'

interface PerformanceDto {
  date: string
  returns: number
  volatility: number
  max_drawdown: number
}

/**
 * One row per trading day of captured performance figures
 */
export class PerformanceRepository extends BaseRepository<PerformanceDto> {
  protected readonly tableName = 'performance'

  /**
   * Insert or replace the snapshot for its date
   */
  async saveSnapshot(snapshot: PerformanceSnapshot): Promise<void> {
    try {
      await this.connectionManager.execute(
        `INSERT INTO ${this.tableName} (date, returns, volatility, max_drawdown)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(date) DO UPDATE SET
           returns = excluded.returns,
           volatility = excluded.volatility,
           max_drawdown = excluded.max_drawdown`,
        [snapshot.date, snapshot.returns, snapshot.volatility, snapshot.maxDrawdown]
      )
    } catch (error) {
      throw new PersistenceError(`Failed to save performance for ${snapshot.date}`, 'saveSnapshot', { cause: error })
    }
  }

  async getSnapshot(date: string): Promise<PerformanceSnapshot | null> {
    const model = await this.findOne('date = ?', [date])
    return model ? this.dtoToSnapshot(model) : null
  }

  /**
   * Latest snapshots, newest first
   */
  async listSnapshots(limit = 30): Promise<PerformanceSnapshot[]> {
    const models = await this.findMany(undefined, [], 'date DESC', limit)
    return models.map(model => this.dtoToSnapshot(model))
  }

  private dtoToSnapshot(model: PerformanceDto): PerformanceSnapshot {
    return {
      date: model.date,
      returns: model.returns,
      volatility: model.volatility,
      maxDrawdown: model.max_drawdown,
    }
  }
}
