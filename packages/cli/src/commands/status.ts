import chalk from 'chalk'
import { table } from 'table'
import { riskRows, tradeRows } from '../utils/format'
import { withSystem } from '../utils/system'

interface StatusOptions {
  limit: string
}

/**
 * Today's risk gate and the most recent ledger entries
 */
export async function showStatus(options: StatusOptions): Promise<void> {
  const limit = Number.parseInt(options.limit, 10)
  if (!Number.isInteger(limit) || limit < 1) {
    console.error(chalk.red(`--limit must be a positive integer, got ${options.limit}`))
    process.exit(1)
  }

  await withSystem(async system => {
    const { timeZone } = system.config.trading
    const state = await system.risk.getRiskState()
    const today = await system.database.trades.tradesForDay(state.day)
    const recent = await system.database.trades.recentTrades(limit)

    console.log(chalk.cyan('Risk gate:'))
    console.log(table(riskRows(state)))
    if (state.tripped) {
      console.log(chalk.red('Trading is halted for the rest of the day.\n'))
    }

    console.log(chalk.cyan(`Trades today: ${today.length}`))
    if (recent.length === 0) {
      console.log(chalk.gray('The ledger is empty.'))
      return
    }
    console.log(chalk.cyan(`Last ${recent.length} trades:`))
    console.log(table(tradeRows(recent, timeZone)))
  })
}
