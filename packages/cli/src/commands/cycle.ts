import chalk from 'chalk'
import ora from 'ora'
import { describeCycle } from '../utils/format'
import { withSystem } from '../utils/system'

/**
 * Run one strategy cycle now. The risk gate and market hours still apply.
 */
export async function runCycle(): Promise<void> {
  await withSystem(async system => {
    const spinner = ora('Running strategy cycle...').start()
    const result = await system.engine.runCycle()
    const summary = describeCycle(result)

    switch (result.status) {
      case 'completed':
        spinner.succeed(summary)
        for (const error of result.errors) {
          console.log(chalk.yellow(`  ${error.message}`))
        }
        break
      case 'closed':
        spinner.info(summary)
        break
      case 'halted':
        spinner.warn(summary)
        break
      case 'failed':
        spinner.fail(summary)
        process.exitCode = 1
        break
    }
  })
}
