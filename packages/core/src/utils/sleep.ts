import { setTimeout as delay } from 'node:timers/promises'

/**
 * Waits `ms` milliseconds. Rejects with an AbortError when `signal` fires.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>

export const sleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}
