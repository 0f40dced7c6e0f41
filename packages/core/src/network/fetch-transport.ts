import { TransportError } from '../errors'
import type { HttpRequest, HttpResponse, HttpTransport } from '../interfaces/network-client'

function errorCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'ETIMEDOUT'
  }
  return undefined
}

/**
 * HttpTransport over the global fetch
 */
export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    let response: Response
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new TransportError(`${request.method} ${request.url} failed: ${String(error)}`, {
        code: errorCode(error),
        retryable: true,
        cause: error,
      })
    }

    const text = await response.text()
    let body: unknown = null
    if (text.length > 0) {
      try {
        body = JSON.parse(text)
      } catch {
        body = text
      }
    }

    return { status: response.status, body }
  }
}
