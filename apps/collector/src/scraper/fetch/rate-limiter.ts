/**
 * In-process rate limiter
 *
 * Enforces a minimum interval between request dispatches. One instance is shared
 * by every fetch in the process; the single-slot p-limit gate makes the
 * read-modify-write of `lastDispatchAt` exclusive, so concurrent callers queue up
 * and leave one interval apart.
 */

import pLimit from 'p-limit'
import type { RateLimiter } from '../types.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import type { Sleep } from '../utils/sleep.js'

export interface IntervalRateLimiterOptions {
  minDelayMs: number
  /** Clock, for tests */
  now?: () => number
  sleep?: Sleep
}

export class IntervalRateLimiter implements RateLimiter {
  private readonly minDelayMs: number
  private readonly now: () => number
  private readonly sleep: Sleep
  private readonly gate = pLimit(1)
  private lastDispatchAt: number | null = null

  constructor(options: IntervalRateLimiterOptions) {
    this.minDelayMs = Math.max(0, options.minDelayMs)
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  acquire(signal?: AbortSignal): Promise<void> {
    return this.gate(async () => {
      signal?.throwIfAborted()

      if (this.lastDispatchAt !== null) {
        const waitMs = this.lastDispatchAt + this.minDelayMs - this.now()
        if (waitMs > 0) {
          await this.sleep(waitMs, signal)
        }
      }

      this.lastDispatchAt = this.now()
    })
  }

  /** Time of the last granted dispatch, or null before the first */
  getLastDispatchAt(): number | null {
    return this.lastDispatchAt
  }
}
