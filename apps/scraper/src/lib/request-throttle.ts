/**
 * Enforces a minimum delay between the starts of outbound requests.
 *
 * Useful for scraping a site that would rather not be hammered: one
 * throttle is shared by every caller that talks to the same host.
 */

export interface ThrottleClock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: ThrottleClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export class RequestThrottle {
  readonly delayMs: number
  private readonly clock: ThrottleClock
  private lastRequest: number | null = null
  private tail: Promise<void> = Promise.resolve()

  constructor(delayMs: number, clock: ThrottleClock = systemClock) {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RangeError(`delayMs must be a non-negative number, got ${delayMs}`)
    }
    this.delayMs = delayMs
    this.clock = clock
  }

  /**
   * Run `action` once at least `delayMs` has passed since the previous
   * start. Callers are served in the order they arrived.
   *
   * Only the timing bookkeeping is exclusive; `action` runs outside the
   * lock, so an action may call `throttle` again without deadlocking (the
   * nested call simply queues behind everyone already waiting).
   */
  async throttle<T>(action: () => Promise<T> | T): Promise<T> {
    await this.exclusive(() => this.reserveSlot())
    return action()
  }

  /** Decorator form: every call of the returned function is throttled. */
  wrap<A extends unknown[], R>(fn: (...args: A) => Promise<R> | R): (...args: A) => Promise<R> {
    return (...args: A) => this.throttle(() => fn(...args))
  }

  /** Start time recorded for the most recent request, if any. */
  get lastRequestAt(): number | null {
    return this.lastRequest
  }

  private exclusive(section: () => Promise<void>): Promise<void> {
    const turn = this.tail.then(section)
    // The caller observes a failed section through `turn`; the queue only
    // needs to settle before the next caller goes.
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    )
    return turn
  }

  private async reserveSlot(): Promise<void> {
    const now = this.clock.now()
    const wait = this.lastRequest === null ? 0 : this.lastRequest + this.delayMs - now

    if (wait > 0) {
      await this.clock.sleep(wait)
      // Record the target, not the wake-up time, so oversleeping never
      // pushes later requests back.
      this.lastRequest = now + wait
    } else {
      this.lastRequest = now
    }
  }
}
