import chalk from 'chalk'
import { withSystem } from '../utils/system'

/**
 * Run the scheduler until SIGINT or SIGTERM
 */
export async function runLoop(): Promise<void> {
  await withSystem(async system => {
    const controller = new AbortController()
    const stop = (signal: NodeJS.Signals) => {
      system.logger.info(`Received ${signal}, shutting down`)
      console.log(chalk.yellow(`\n${signal} received, stopping after the current step...`))
      controller.abort()
    }
    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)

    const { trading } = system.config
    console.log(chalk.cyan('Trading loop started'))
    console.log(chalk.gray(`  Universe: ${trading.universe.slice(0, trading.symbolsPerCycle).join(', ')} ...`))
    console.log(chalk.gray(`  Capital: ${trading.initialCapital.toFixed(2)} (${trading.timeZone})`))

    try {
      await system.scheduler.run(controller.signal)
    } finally {
      process.off('SIGINT', stop)
      process.off('SIGTERM', stop)
    }
    console.log(chalk.green('Trading loop stopped'))
  })
}
