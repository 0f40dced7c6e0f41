import { type Logger, NoopLogger } from '@tradeloop/shared'
import { errorMessage, FatalLoopError, isAbortError } from '../errors'
import type { NotificationSink } from '../notifications/notification-sink'
import { type Sleeper, sleep } from '../utils/sleep'
import type { CycleResult } from './trading-engine'

/**
 * What the scheduler drives
 */
export interface CycleRunner {
  isMarketOpen(): boolean
  runCycle(): Promise<CycleResult>
}

export interface SchedulerOptions {
  /** Pause after a cycle during market hours */
  readonly cycleIntervalMs?: number
  /** Pause while the market is closed */
  readonly idleIntervalMs?: number
  /** Pause after an unexpected error */
  readonly errorCooldownMs?: number
  readonly sleep?: Sleeper
  readonly logger?: Logger
}

export const DEFAULT_CYCLE_INTERVAL_MS = 300_000
export const DEFAULT_IDLE_INTERVAL_MS = 3_600_000
export const DEFAULT_ERROR_COOLDOWN_MS = 600_000

/**
 * Process-wide control loop. Runs until its signal is aborted and survives
 * every other error.
 */
export class Scheduler {
  private readonly cycleIntervalMs: number
  private readonly idleIntervalMs: number
  private readonly errorCooldownMs: number
  private readonly sleep: Sleeper
  private readonly logger: Logger
  private iterations = 0

  constructor(
    private readonly engine: CycleRunner,
    private readonly notifier: NotificationSink,
    options: SchedulerOptions = {}
  ) {
    this.cycleIntervalMs = options.cycleIntervalMs ?? DEFAULT_CYCLE_INTERVAL_MS
    this.idleIntervalMs = options.idleIntervalMs ?? DEFAULT_IDLE_INTERVAL_MS
    this.errorCooldownMs = options.errorCooldownMs ?? DEFAULT_ERROR_COOLDOWN_MS
    this.sleep = options.sleep ?? sleep
    this.logger = (options.logger ?? new NoopLogger()).child('scheduler')
  }

  getIterations(): number {
    return this.iterations
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Scheduler started', {
      cycleIntervalMs: this.cycleIntervalMs,
      idleIntervalMs: this.idleIntervalMs,
    })

    while (!signal.aborted) {
      this.iterations++
      try {
        await this.tick(signal)
      } catch (error) {
        if (signal.aborted || isAbortError(error)) {
          break
        }

        const fatal = new FatalLoopError(`Unhandled error in trading loop: ${errorMessage(error)}`, { cause: error })
        this.logger.error(fatal.message, { error: fatal, cooldownMs: this.errorCooldownMs })
        await this.notifier.alert('Critical Error', `${fatal.message}\nResuming in ${this.errorCooldownMs / 1000}s.`)

        try {
          await this.sleep(this.errorCooldownMs, signal)
        } catch (sleepError) {
          if (!isAbortError(sleepError)) {
            throw sleepError
          }
        }
      }
    }

    this.logger.info('Scheduler stopped', { iterations: this.iterations })
  }

  private async tick(signal: AbortSignal): Promise<void> {
    if (!this.engine.isMarketOpen()) {
      this.logger.debug('Market closed, idling', { sleepMs: this.idleIntervalMs })
      await this.sleep(this.idleIntervalMs, signal)
      return
    }

    const result = await this.engine.runCycle()
    this.logger.info('Cycle finished', {
      status: result.status,
      trades: result.trades.length,
      errors: result.errors.length,
    })
    await this.sleep(this.cycleIntervalMs, signal)
  }
}
