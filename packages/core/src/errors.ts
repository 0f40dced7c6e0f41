/**
 * Error taxonomy for the trading loop. Broker failures never escape the
 * gateway as exceptions; they are carried by these classes into logs and
 * result variants.
 */

/**
 * Network or HTTP failure talking to the broker
 */
export class TransportError extends Error {
  readonly status?: number
  readonly code?: string
  readonly retryable: boolean

  constructor(
    message: string,
    details: { status?: number; code?: string; retryable: boolean; cause?: unknown }
  ) {
    super(message, { cause: details.cause })
    this.name = 'TransportError'
    this.status = details.status
    this.code = details.code
    this.retryable = details.retryable
  }
}

/**
 * An order was never observed as executed within the polling window
 */
export class ConfirmationTimeout extends Error {
  constructor(
    public readonly orderId: string,
    public readonly polls: number
  ) {
    super(`Order ${orderId} not executed after ${polls} status polls`)
    this.name = 'ConfirmationTimeout'
  }
}

/**
 * Delivery of an operator alert failed
 */
export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NotificationError'
  }
}

/**
 * Failure while processing one symbol; isolated to that symbol
 */
export class StrategyError extends Error {
  constructor(
    public readonly symbol: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'StrategyError'
  }
}

/**
 * Failure in cycle-level orchestration; the cycle is marked failed
 */
export class CycleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CycleError'
  }
}

/**
 * Anything escaping a scheduler iteration
 */
export class FatalLoopError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FatalLoopError'
  }
}

/**
 * Environment configuration failed validation
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }
}

/**
 * An extension point that has no implementation yet
 */
export class NotImplementedError extends Error {
  constructor(feature: string) {
    super(`${feature} is not implemented`)
    this.name = 'NotImplementedError'
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
