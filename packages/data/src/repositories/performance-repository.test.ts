import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { createDatabase, type Database } from '../db/database'

describe('PerformanceRepository', () => {
  let db: Database

  beforeEach(async () => {
    db = await createDatabase({ databasePath: ':memory:', timeZone: 'UTC' })
  })

  afterEach(() => {
    db.close()
  })

  it('should store and read a snapshot', async () => {
    await db.performance.saveSnapshot({ date: '2024-01-15', returns: 0.01, volatility: 0.2, maxDrawdown: 0.05 })

    const snapshot = await db.performance.getSnapshot('2024-01-15')
    assert.deepEqual(snapshot, { date: '2024-01-15', returns: 0.01, volatility: 0.2, maxDrawdown: 0.05 })
  })

  it('should keep one row per date', async () => {
    await db.performance.saveSnapshot({ date: '2024-01-15', returns: 0.01, volatility: 0.2, maxDrawdown: 0.05 })
    await db.performance.saveSnapshot({ date: '2024-01-15', returns: -0.02, volatility: 0.3, maxDrawdown: 0.07 })

    const snapshots = await db.performance.listSnapshots()
    assert.equal(snapshots.length, 1)
    assert.equal(snapshots[0]?.returns, -0.02)
  })

  it('should return null for an unknown date', async () => {
    assert.equal(await db.performance.getSnapshot('1999-01-01'), null)
  })

  it('should list newest first', async () => {
    await db.performance.saveSnapshot({ date: '2024-01-14', returns: 0, volatility: 0, maxDrawdown: 0 })
    await db.performance.saveSnapshot({ date: '2024-01-16', returns: 0, volatility: 0, maxDrawdown: 0 })
    await db.performance.saveSnapshot({ date: '2024-01-15', returns: 0, volatility: 0, maxDrawdown: 0 })

    const dates = (await db.performance.listSnapshots(2)).map(s => s.date)
    assert.deepEqual(dates, ['2024-01-16', '2024-01-15'])
  })
})
