import { parseTradingDay, type PerformanceSnapshot } from '@tradeloop/shared'
import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { NotImplementedError } from '../errors'
import { PerformanceMetricsCalculator, type SnapshotStore } from './performance-metrics'

class RecordingStore implements SnapshotStore {
  readonly saved: PerformanceSnapshot[] = []

  async saveSnapshot(snapshot: PerformanceSnapshot): Promise<void> {
    this.saved.push(snapshot)
  }
}

describe('PerformanceMetricsCalculator', () => {
  const day = parseTradingDay('2024-03-04')

  it('should report that metrics are not implemented', async () => {
    const calculator = new PerformanceMetricsCalculator(new RecordingStore())

    await assert.rejects(calculator.calculateMetrics(day), (error: unknown) => {
      assert.ok(error instanceof NotImplementedError)
      assert.equal(error.message, 'Performance metrics for 2024-03-04 is not implemented')
      return true
    })
  })

  it('should write nothing when capture cannot compute a snapshot', async () => {
    const store = new RecordingStore()

    await assert.rejects(new PerformanceMetricsCalculator(store).captureDaily(day), NotImplementedError)
    assert.deepEqual(store.saved, [])
  })
})
