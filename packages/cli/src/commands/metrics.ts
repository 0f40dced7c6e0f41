import { NotImplementedError } from '@tradeloop/core'
import { parseTradingDay, toTradingDay } from '@tradeloop/shared'
import chalk from 'chalk'
import { withSystem } from '../utils/system'

interface MetricsOptions {
  date?: string
}

/**
 * Capture the performance snapshot for a trading day
 */
export async function captureMetrics(options: MetricsOptions): Promise<void> {
  await withSystem(async system => {
    const day = options.date
      ? parseTradingDay(options.date)
      : toTradingDay(new Date(), system.config.trading.timeZone)

    try {
      const snapshot = await system.metrics.captureDaily(day)
      console.log(chalk.green(`Saved performance snapshot for ${snapshot.date}`))
    } catch (error) {
      if (error instanceof NotImplementedError) {
        console.log(chalk.yellow(error.message))
        console.log(chalk.gray('Only the performance table exists; no metrics model is configured.'))
        return
      }
      throw error
    }
  })
}
