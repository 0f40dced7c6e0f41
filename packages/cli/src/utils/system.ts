import { ConfigValidationError, createTradingSystem, loadConfig, type TradingSystem } from '@tradeloop/core'
import chalk from 'chalk'

/**
 * Load configuration from the environment and wire the trading system.
 * Exits the process on invalid configuration.
 */
export async function openSystem(): Promise<TradingSystem> {
  try {
    return await createTradingSystem(loadConfig())
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(chalk.red('Invalid configuration:'))
      for (const issue of error.issues) {
        console.error(chalk.red(`  ${issue}`))
      }
      console.error(chalk.gray('Set the variables in the environment or a .env file.'))
      process.exit(1)
    }
    throw error
  }
}

/**
 * Run `action` against a freshly opened system and always close it
 */
export async function withSystem(action: (system: TradingSystem) => Promise<void>): Promise<void> {
  const system = await openSystem()
  try {
    await action(system)
  } finally {
    system.close()
  }
}
