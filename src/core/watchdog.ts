import { logger } from '../logger'
import type { WatchdogConfig } from './types'
import { sleep } from './utils/sleep'
import type { WorkerSlot } from './worker-slot'

export interface WatchdogHost {
  slots(): readonly WorkerSlot[]
  hasPendingWork(): boolean
  isPaused(): boolean
  restartSlot(slot: WorkerSlot, reason: 'stalled'): Promise<void>
}

/**
 * Replaces workers whose last activity is older than the stall threshold
 * while work is waiting. Idle workers with nothing queued are left alone.
 */
export class Watchdog {
  private controller?: AbortController
  private loop?: Promise<void>

  constructor(
    private readonly host: WatchdogHost,
    private readonly config: WatchdogConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  start(): void {
    if (this.loop) return
    const controller = new AbortController()
    this.controller = controller
    this.loop = this.run(controller.signal)
  }

  async stop(): Promise<void> {
    this.controller?.abort()
    await this.loop
    this.loop = undefined
    this.controller = undefined
  }

  /**
   * Inspects every slot once and returns the ids of the workers it restarted
   */
  async check(): Promise<number[]> {
    if (this.host.isPaused() || !this.host.hasPendingWork()) {
      return []
    }

    const now = this.clock()
    const restarted: number[] = []
    for (const slot of this.host.slots()) {
      const idleFor = now - slot.lastActivityAt
      if (idleFor <= this.config.stallThresholdMs) continue

      logger.warn(`Worker ${slot.workerId} inactive for ${Math.round(idleFor / 1000)}s, restarting`)
      await this.host.restartSlot(slot, 'stalled')
      restarted.push(slot.workerId)
    }
    return restarted
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.config.intervalMs, signal)
      if (signal.aborted) break

      try {
        await this.check()
      } catch (error) {
        logger.error('Watchdog check failed:', error)
      }
    }
  }
}
