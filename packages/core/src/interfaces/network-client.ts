import type { TransportError } from '../errors'

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total attempts including the first */
  readonly maxAttempts: number
  /** Delay in milliseconds after the first failed attempt */
  readonly initialDelay: number
  /** Multiplier for exponential backoff */
  readonly backoffMultiplier: number
}

export type HttpMethod = 'GET' | 'POST'

/**
 * A single HTTP exchange with the broker
 */
export interface HttpRequest {
  readonly method: HttpMethod
  /** Absolute URL including query string */
  readonly url: string
  readonly headers?: Record<string, string>
  /** JSON-serialisable body */
  readonly body?: unknown
}

export interface HttpResponse {
  readonly status: number
  /** Parsed JSON body, or null when the body is empty */
  readonly body: unknown
}

/**
 * Moves bytes. It resolves with any HTTP status and rejects only when no
 * response arrived.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>
}

/**
 * Outcome of a request after retries
 */
export type NetworkResult<T> =
  | { readonly ok: true; readonly data: T; readonly attempts: number }
  | { readonly ok: false; readonly error: TransportError; readonly attempts: number }

/**
 * Body parser; throw to mark the response malformed
 */
export type ResponseParser<T> = (body: unknown) => T
