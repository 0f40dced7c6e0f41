import { describe, it, beforeEach } from 'node:test'
import assert from 'node:assert/strict'
import { ResilientNetworkClient } from './resilient-network-client'
import type { HttpRequest, HttpResponse, HttpTransport } from '../interfaces/network-client'
import { TransportError } from '../errors'

class ScriptedTransport implements HttpTransport {
  calls = 0

  constructor(private readonly script: Array<HttpResponse | Error>) {}

  async send(_request: HttpRequest): Promise<HttpResponse> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)]
    this.calls++
    if (step === undefined) {
      throw new Error('empty script')
    }
    if (step instanceof Error) {
      throw step
    }
    return step
  }
}

function networkFailure(code: string): TransportError {
  return new TransportError(`socket ${code}`, { code, retryable: true })
}

const request: HttpRequest = { method: 'GET', url: 'https://broker.test/quotes/TCS' }
const asObject = (body: unknown) => {
  if (body === null || typeof body !== 'object') {
    throw new Error('expected an object')
  }
  return body
}

describe('ResilientNetworkClient', () => {
  let delays: number[]
  const recordSleep = async (ms: number) => {
    delays.push(ms)
  }

  beforeEach(() => {
    delays = []
  })

  describe('request', () => {
    it('should return data from a successful response', async () => {
      const transport = new ScriptedTransport([{ status: 200, body: { lastPrice: 3500 } }])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.deepEqual(result, { ok: true, data: { lastPrice: 3500 }, attempts: 1 })
      assert.deepEqual(delays, [])
    })

    it('should retry on network error and succeed on the third attempt', async () => {
      const transport = new ScriptedTransport([
        networkFailure('ECONNRESET'),
        networkFailure('ETIMEDOUT'),
        { status: 200, body: { ok: 1 } },
      ])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.equal(result.ok, true)
      assert.equal(result.attempts, 3)
      assert.equal(transport.calls, 3)
      assert.deepEqual(delays, [1000, 2000])
    })

    it('should give up after three attempts with two backoff sleeps', async () => {
      const transport = new ScriptedTransport([networkFailure('ECONNREFUSED')])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.equal(result.ok, false)
      assert.equal(result.attempts, 3)
      assert.equal(transport.calls, 3)
      assert.deepEqual(delays, [1000, 2000])
    })

    it('should retry 5xx and 429 responses', async () => {
      const transport = new ScriptedTransport([
        { status: 503, body: null },
        { status: 429, body: null },
        { status: 200, body: {} },
      ])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.equal(result.ok, true)
      assert.equal(transport.calls, 3)
    })

    it('should retry a persistent client error through every attempt', async () => {
      const transport = new ScriptedTransport([{ status: 403, body: { message: 'forbidden' } }])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.equal(result.ok, false)
      assert.equal(result.attempts, 3)
      assert.equal(transport.calls, 3)
      assert.deepEqual(delays, [1000, 2000])
      if (!result.ok) {
        assert.equal(result.error.status, 403)
      }
    })

    it('should recover when a client error clears on retry', async () => {
      const transport = new ScriptedTransport([{ status: 400, body: null }, { status: 200, body: { ok: 1 } }])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.deepEqual(result, { ok: true, data: { ok: 1 }, attempts: 2 })
      assert.deepEqual(delays, [1000])
    })

    it('should not retry a malformed body', async () => {
      const transport = new ScriptedTransport([{ status: 200, body: 'not json' }])
      const client = new ResilientNetworkClient(transport, { sleep: recordSleep })

      const result = await client.request(request, asObject)

      assert.equal(result.ok, false)
      assert.equal(transport.calls, 1)
      if (!result.ok) {
        assert.match(result.error.message, /Malformed response/)
      }
    })
  })

  describe('isRetryable', () => {
    const client = new ResilientNetworkClient(new ScriptedTransport([]))

    it('should follow the classification carried by TransportError', () => {
      assert.equal(client.isRetryable(networkFailure('ECONNRESET')), true)
      assert.equal(client.isRetryable(new TransportError('HTTP 404', { status: 404, retryable: false })), false)
    })

    it('should treat unclassified errors as transport failures', () => {
      assert.equal(client.isRetryable(new Error('socket hang up')), true)
    })
  })

  describe('executeWithRetry', () => {
    it('should execute operation successfully on first try', async () => {
      const client = new ResilientNetworkClient(new ScriptedTransport([]), { sleep: recordSleep })
      let attempts = 0

      const result = await client.executeWithRetry(async () => {
        attempts++
        return 'success'
      }, 'test operation')

      assert.deepEqual(result, { ok: true, data: 'success', attempts: 1 })
      assert.equal(attempts, 1)
    })

    it('should use custom retry configuration', async () => {
      const client = new ResilientNetworkClient(new ScriptedTransport([]), {
        sleep: recordSleep,
        retryConfig: { maxAttempts: 4, initialDelay: 100, backoffMultiplier: 3 },
      })

      const result = await client.executeWithRetry(async () => {
        throw new Error('flaky')
      }, 'test operation')

      assert.equal(result.attempts, 4)
      assert.deepEqual(delays, [100, 300, 900])
      assert.equal(client.getRetryConfig().maxAttempts, 4)
    })
  })
})
