/**
 * LLM Plumbing — Rate Limiter
 *
 * Await-based limiter enforcing a minimum delay between model calls.
 * No background timers; the clock is injectable so tests run instantly.
 */

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const realClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export interface RateLimiterOptions {
  minDelayMs: number
  clock?: Clock
}

export class RateLimiter {
  private readonly minDelayMs: number
  private readonly clock: Clock
  private lastCallTime: number | null = null
  private pending: Promise<void> = Promise.resolve()

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = options.minDelayMs
    this.clock = options.clock ?? realClock
  }

  /**
   * Waits until `minDelayMs` has elapsed since the previous acquire, then
   * stamps the current time. Concurrent callers are served in FIFO order.
   *
   * @returns milliseconds spent waiting
   */
  async acquire(): Promise<number> {
    const previous = this.pending
    let release: () => void = () => undefined
    this.pending = new Promise<void>((r) => {
      release = r
    })

    try {
      await previous
      let waited = 0
      if (this.lastCallTime !== null) {
        const elapsed = this.clock.now() - this.lastCallTime
        if (elapsed < this.minDelayMs) {
          waited = this.minDelayMs - elapsed
          await this.clock.sleep(waited)
        }
      }
      this.lastCallTime = this.clock.now()
      return waited
    } finally {
      release()
    }
  }
}
