/**
 * Reconnection Manager
 *
 * Schedules reconnect attempts with exponential backoff. The delay starts at
 * `initialDelay`, is multiplied after every failed attempt and never exceeds
 * `maxDelay`. A successful connection resets it; an explicit disconnect
 * cancels whatever is pending.
 *
 * @module sync/reconnect
 */

// ====================
// Configuration Types
// ====================

export interface ReconnectOptions {
  /** Delay before the first attempt in ms (default: 1000) */
  initialDelay?: number
  /** Upper bound for any delay in ms (default: 30000) */
  maxDelay?: number
  /** Growth factor applied after each failed attempt (default: 2) */
  backoffMultiplier?: number
  /** Attempts before giving up (default: Infinity) */
  maxAttempts?: number
  /** Fraction of the delay added as random jitter (default: 0) */
  jitter?: number
  /** Random source for jitter, in [0, 1) */
  random?: () => number
}

type ResolvedReconnectOptions = Required<ReconnectOptions>

export const DEFAULT_RECONNECT_OPTIONS: ResolvedReconnectOptions = {
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  maxAttempts: Infinity,
  jitter: 0,
  random: Math.random,
}

// ====================
// Reconnection Manager
// ====================

export class ReconnectionManager {
  private readonly options: ResolvedReconnectOptions
  private delay: number
  private attemptCount = 0
  private timer: ReturnType<typeof setTimeout> | null = null

  constructor(options: ReconnectOptions = {}) {
    this.options = { ...DEFAULT_RECONNECT_OPTIONS, ...options }
    this.delay = this.options.initialDelay
  }

  /** Base delay the next scheduled attempt will wait, before jitter */
  get nextDelay(): number {
    return this.delay
  }

  /** Attempts scheduled since the last success */
  get attempts(): number {
    return this.attemptCount
  }

  get pending(): boolean {
    return this.timer !== null
  }

  /** True once `maxAttempts` attempts have been scheduled without a success */
  get exhausted(): boolean {
    return this.attemptCount >= this.options.maxAttempts
  }

  /**
   * Schedule one reconnect attempt
   *
   * Replaces an attempt that is already pending.
   *
   * @returns the delay used, or null when attempts are exhausted
   */
  schedule(attempt: () => void): number | null {
    this.clearTimer()
    if (this.exhausted) {
      console.error(`[Reconnect] Giving up after ${this.attemptCount} attempts`)
      return null
    }

    const base = this.delay
    const wait = base + base * this.options.jitter * this.options.random()
    this.attemptCount += 1
    this.delay = Math.min(base * this.options.backoffMultiplier, this.options.maxDelay)

    console.log(
      `[Reconnect] Attempt ${this.attemptCount} in ${Math.round(wait)}ms`
    )

    this.timer = setTimeout(() => {
      this.timer = null
      attempt()
    }, wait)
    return wait
  }

  /** Connection succeeded: the next outage starts from the initial delay */
  succeeded(): void {
    this.clearTimer()
    this.attemptCount = 0
    this.delay = this.options.initialDelay
  }

  /** Explicit disconnect: drop any pending attempt */
  cancel(): void {
    this.clearTimer()
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }
}
