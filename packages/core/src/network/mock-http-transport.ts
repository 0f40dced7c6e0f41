import type { HttpRequest, HttpResponse, HttpTransport } from '../interfaces/network-client'

/**
 * Route handler; `call` counts requests to the same route, from 1
 */
export type MockRoute = (request: HttpRequest, call: number) => HttpResponse

/**
 * In-process stand-in for the broker REST API, routed by `METHOD /path`
 */
export class MockHttpTransport implements HttpTransport {
  readonly requests: HttpRequest[] = []
  private readonly calls = new Map<string, number>()

  constructor(private readonly routes: Record<string, MockRoute>) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request)
    const key = `${request.method} ${new URL(request.url).pathname}`
    const call = (this.calls.get(key) ?? 0) + 1
    this.calls.set(key, call)

    const route = this.routes[key]
    if (!route) {
      return { status: 404, body: { message: 'no route' } }
    }
    return route(request, call)
  }

  count(key: string): number {
    return this.calls.get(key) ?? 0
  }
}
