import {
  type Candle,
  type HistoryResult,
  type Interval,
  type Logger,
  NoopLogger,
  type PriceSeries,
  toEpochDate,
} from '@tradeloop/shared'
import { asyncBufferFromFile, parquetReadObjects } from 'hyparquet'
import { parquetWriteFile } from 'hyparquet-writer'
import { mkdir, readdir, rename, rm, stat } from 'node:fs/promises'
import * as path from 'node:path'
import { z } from 'zod/v4'
import type { HistorySource } from '../broker/broker-gateway'

const CACHE_EXTENSION = '.parquet'

// Parquet hands INT64 columns back as bigint
const cachedRow = z.object({
  timestamp: z.union([z.bigint(), z.number()]).transform(value => toEpochDate(Number(value))),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
})

/**
 * Cache file name for a (symbol, interval, duration) key
 */
export function cacheFileName(symbol: string, interval: Interval, durationBars: number): string {
  // Percent-encoding keeps distinct symbols in distinct files
  return `${encodeURIComponent(symbol)}_${interval}_${durationBars}${CACHE_EXTENSION}`
}

/**
 * On-disk memo of historical series, one parquet file per key.
 *
 * Entries never expire: a file written in an earlier session is returned as
 * is. Use `clear()` to force fresh history.
 */
export class HistoricalDataCache implements HistorySource {
  private readonly logger: Logger

  constructor(
    private readonly cacheDir: string,
    private readonly source: HistorySource,
    logger: Logger = new NoopLogger()
  ) {
    this.logger = logger.child('history-cache')
  }

  async get(symbol: string, interval: Interval, durationBars: number): Promise<HistoryResult> {
    const filePath = this.pathFor(symbol, interval, durationBars)

    const cached = await this.read(filePath)
    if (cached) {
      this.logger.debug('Cache hit', { symbol, interval, durationBars, bars: cached.length })
      return { kind: 'series', series: { symbol, interval, candles: cached } }
    }

    const fetched = await this.source.fetchHistory(symbol, interval, durationBars)
    if (fetched.kind === 'series') {
      await this.write(filePath, fetched.series)
    }
    return fetched
  }

  fetchHistory(symbol: string, interval: Interval, durationBars: number): Promise<HistoryResult> {
    return this.get(symbol, interval, durationBars)
  }

  async has(symbol: string, interval: Interval, durationBars: number): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(symbol, interval, durationBars))
      return info.isFile()
    } catch {
      return false
    }
  }

  /**
   * Delete every cached series; returns the number of files removed
   */
  async clear(): Promise<number> {
    let entries: string[]
    try {
      entries = await readdir(this.cacheDir)
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0
      }
      throw error
    }

    const files = entries.filter(name => name.endsWith(CACHE_EXTENSION) || name.endsWith('.tmp'))
    await Promise.all(files.map(name => rm(path.join(this.cacheDir, name), { force: true })))
    this.logger.info('Cache cleared', { files: files.length, cacheDir: this.cacheDir })
    return files.length
  }

  private pathFor(symbol: string, interval: Interval, durationBars: number): string {
    return path.join(this.cacheDir, cacheFileName(symbol, interval, durationBars))
  }

  /**
   * Read a cached series; a missing or unreadable file counts as a miss
   */
  private async read(filePath: string): Promise<Candle[] | null> {
    try {
      await stat(filePath)
    } catch {
      return null
    }

    try {
      const file = await asyncBufferFromFile(filePath)
      const rows = await parquetReadObjects({ file })
      return z.array(cachedRow).parse(rows)
    } catch (error) {
      this.logger.warn('Ignoring unreadable cache file', { filePath, error })
      return null
    }
  }

  private async write(filePath: string, series: PriceSeries): Promise<void> {
    const { candles } = series
    if (candles.length === 0) {
      return
    }

    const tmpPath = `${filePath}.tmp`
    try {
      await mkdir(path.dirname(filePath), { recursive: true })
      parquetWriteFile({
        filename: tmpPath,
        columnData: [
          { name: 'timestamp', data: candles.map(c => BigInt(c.timestamp)), type: 'INT64' },
          { name: 'open', data: candles.map(c => c.open), type: 'DOUBLE' },
          { name: 'high', data: candles.map(c => c.high), type: 'DOUBLE' },
          { name: 'low', data: candles.map(c => c.low), type: 'DOUBLE' },
          { name: 'close', data: candles.map(c => c.close), type: 'DOUBLE' },
          { name: 'volume', data: candles.map(c => c.volume), type: 'DOUBLE' },
        ],
      })
      await rename(tmpPath, filePath)
      this.logger.debug('Cached series', { symbol: series.symbol, interval: series.interval, bars: candles.length })
    } catch (error) {
      // The fetched series is still good; only the memo is lost
      this.logger.warn('Failed to write cache file', { filePath, error })
      await rm(tmpPath, { force: true })
    }
  }
}
