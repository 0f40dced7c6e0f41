import { type Logger, NoopLogger } from '@tradeloop/shared'
import { errorMessage, TransportError } from '../errors'
import type {
  HttpRequest,
  HttpTransport,
  NetworkResult,
  ResponseParser,
  RetryConfig,
} from '../interfaces/network-client'
import { type Sleeper, sleep } from '../utils/sleep'

/**
 * Three attempts, backing off 2^attempt seconds between them
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelay: 1000,
  backoffMultiplier: 2,
}

export interface ResilientNetworkClientOptions {
  readonly retryConfig?: Partial<RetryConfig>
  readonly sleep?: Sleeper
  readonly logger?: Logger
}

/**
 * HTTP client with retry logic and exponential backoff. Failures come back
 * as values; nothing is thrown to the caller.
 */
export class ResilientNetworkClient {
  private readonly retryConfig: RetryConfig
  private readonly sleep: Sleeper
  private readonly logger: Logger

  constructor(
    private readonly transport: HttpTransport,
    options: ResilientNetworkClientOptions = {}
  ) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig }
    this.sleep = options.sleep ?? sleep
    this.logger = (options.logger ?? new NoopLogger()).child('network')
  }

  /**
   * Send a request. Every non-2xx status is retried; an unparseable body is final.
   */
  async request<T>(request: HttpRequest, parse: ResponseParser<T>): Promise<NetworkResult<T>> {
    return this.executeWithRetry(async () => {
      const response = await this.transport.send(request)

      if (response.status < 200 || response.status >= 300) {
        throw new TransportError(`HTTP ${response.status} from ${request.method} ${request.url}`, {
          status: response.status,
          retryable: true,
          cause: response.body,
        })
      }

      try {
        return parse(response.body)
      } catch (error) {
        throw new TransportError(`Malformed response from ${request.method} ${request.url}`, {
          status: response.status,
          retryable: false,
          cause: error,
        })
      }
    }, `${request.method} ${request.url}`)
  }

  /**
   * Execute an operation with retry logic
   */
  async executeWithRetry<T>(operation: () => Promise<T>, context: string): Promise<NetworkResult<T>> {
    const config = this.retryConfig
    let lastError = new TransportError(`${context} was not attempted`, { retryable: false })

    for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
      try {
        const data = await operation()
        return { ok: true, data, attempts: attempt + 1 }
      } catch (error) {
        lastError = this.toTransportError(error, context)

        if (!lastError.retryable || attempt === config.maxAttempts - 1) {
          this.logger.error(`${context} failed`, {
            attempts: attempt + 1,
            status: lastError.status,
            error: lastError,
          })
          return { ok: false, error: lastError, attempts: attempt + 1 }
        }

        const delay = this.calculateBackoff(attempt)
        this.logger.warn(`${context} failed, retrying in ${delay}ms`, {
          attempt: attempt + 1,
          error: lastError.message,
        })
        await this.sleep(delay)
      }
    }

    return { ok: false, error: lastError, attempts: config.maxAttempts }
  }

  /**
   * Check if an error is retryable
   */
  isRetryable(error: unknown): boolean {
    if (error instanceof TransportError) {
      return error.retryable
    }
    // Anything the transport throws without classifying is a transport failure
    return true
  }

  getRetryConfig(): RetryConfig {
    return { ...this.retryConfig }
  }

  private toTransportError(error: unknown, context: string): TransportError {
    if (error instanceof TransportError) {
      return error
    }
    const code =
      error && typeof error === 'object' && 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return new TransportError(`${context}: ${errorMessage(error)}`, {
      code,
      retryable: this.isRetryable(error),
      cause: error,
    })
  }

  /**
   * Delay before the attempt after `attempt`
   */
  private calculateBackoff(attempt: number): number {
    return this.retryConfig.initialDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt)
  }
}
