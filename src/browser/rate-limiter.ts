import { logger } from '../logger'
import { sleep } from '../core/utils/sleep'

export interface Throttle {
  acquire(): Promise<void>
}

/**
 * Spaces task starts at least `minDelayMs` apart across every worker sharing
 * the limiter. Slots are reserved synchronously, so concurrent callers queue
 * up behind each other instead of starting together.
 */
export class RateLimiter implements Throttle {
  private nextSlot = 0

  constructor(
    private readonly minDelayMs: number,
    private readonly clock: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async acquire(): Promise<void> {
    const now = this.clock()
    const slot = Math.max(now, this.nextSlot)
    this.nextSlot = slot + this.minDelayMs

    const delay = slot - now
    if (delay > 0) {
      logger.debug(`Rate limiting: waiting ${(delay / 1000).toFixed(1)}s`)
      await this.wait(delay)
    }
  }
}
