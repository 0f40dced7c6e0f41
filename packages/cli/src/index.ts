#!/usr/bin/env tsx

import 'dotenv/config'
import { Command } from 'commander'
import { clearCache } from './commands/cache-clear'
import { runCycle } from './commands/cycle'
import { captureMetrics } from './commands/metrics'
import { runLoop } from './commands/run'
import { showStatus } from './commands/status'

const program = new Command()

program
  .name('tradeloop')
  .description('Automated equities trading loop with a daily-loss circuit breaker')
  .version('1.0.0')

program
  .command('run')
  .description('Run the trading loop until interrupted (REAL ORDERS)')
  .action(runLoop)

program
  .command('cycle')
  .description('Run a single strategy cycle now')
  .action(runCycle)

program
  .command('status')
  .description("Show today's P&L, circuit breaker state and recent trades")
  .option('-n, --limit <count>', 'Number of recent trades to show', '10')
  .action(showStatus)

program
  .command('metrics')
  .description('Capture the daily performance snapshot')
  .option('-d, --date <YYYY-MM-DD>', 'Trading day (defaults to today)')
  .action(captureMetrics)

program
  .command('cache:clear')
  .description('Delete every cached price series')
  .action(clearCache)

await program.parseAsync()
